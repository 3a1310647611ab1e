import { describe, expect, it } from 'vitest'
import { FormatConstants } from '../constants'
import { ConsistencyError, ContractError, ParseError } from '../errors'
import { Label, LabelUtils } from '../label'

function twoEntryLabel(): Label {
  return {
    vertex: new Int32Array([5, 9]),
    coordX: new Float32Array([1.5, -2]),
    coordY: new Float32Array([0, 3.25]),
    coordZ: new Float32Array([10, -0.5]),
    value: new Float32Array([0, 0.75])
  }
}

describe('LabelUtils', () => {
  it('should format the comment, count and one line per entry', () => {
    const text = LabelUtils.format(twoEntryLabel())

    expect(text).toBe(
      `${FormatConstants.LABEL_COMMENT}\n` +
      '2\n' +
      '5 1.5 0 10 0\n' +
      '9 -2 3.25 -0.5 0.75\n'
    )
  })

  it('should parse what it formats', () => {
    const label = twoEntryLabel()

    const parsed = LabelUtils.decode(LabelUtils.encode(label))

    expect(parsed).toEqual(label)
    expect(LabelUtils.numEntries(parsed)).toBe(2)
  })

  it('should accept any whitespace, CRLF line endings and trailing blank lines', () => {
    const text = '#!ascii label from elsewhere\r\n3\r\n0  1.0\t2.0 3.0 0.5\r\n  17 -1 -2 -3 0\r\n42 0 0 0 1e-1\r\n\r\n\r\n'

    const label = LabelUtils.parse(text)

    expect(Array.from(label.vertex)).toEqual([0, 17, 42])
    expect(Array.from(label.coordX)).toEqual([1, -1, 0])
    expect(Array.from(label.coordZ)).toEqual([3, -3, 0])
    expect(label.value[0]).toBe(0.5)
    expect(label.value[2]).toBeCloseTo(0.1, 6)
  })

  it('should parse an empty label', () => {
    const label = LabelUtils.parse('#!ascii label\n0\n')

    expect(LabelUtils.numEntries(label)).toBe(0)
  })

  it('should reject a count that does not match the entries', () => {
    expect(() => LabelUtils.parse('#!ascii\n3\n1 0 0 0 0\n2 0 0 0 0\n'))
      .toThrow('header announces 3 entries but the file has 2')
  })

  it('should reject a malformed count', () => {
    expect(() => LabelUtils.parse('#!ascii\ntwo\n')).toThrow('Line 2: entry count \'two\' is not an integer')
    expect(() => LabelUtils.parse('#!ascii')).toThrow(ParseError)
  })

  it('should report the line of a malformed entry', () => {
    const missingField = '#!ascii\n2\n1 0 0 0 0\n2 0 0 0\n'
    const badNumber = '#!ascii\n1\n1 0 abc 0 0\n'
    const fractionalVertex = '#!ascii\n1\n1.5 0 0 0 0\n'

    expect(() => LabelUtils.parse(missingField)).toThrow('Line 4: expected 5 fields, found 4')
    expect(() => LabelUtils.parse(badNumber)).toThrow('Line 3: \'abc\' is not a number')
    expect(() => LabelUtils.parse(fractionalVertex)).toThrow('Line 3: vertex \'1.5\' is not an integer')
  })

  it('should reject vertices outside the 32-bit range', () => {
    expect(() => LabelUtils.parse('#!ascii\n1\n2147483648 0 0 0 0\n'))
      .toThrow('Line 3: vertex 2147483648 does not fit a 32-bit integer')
    expect(LabelUtils.parse('#!ascii\n1\n-2147483648 0 0 0 0\n').vertex[0]).toBe(-2147483648)
  })

  it('should carry the line number on the error', () => {
    try {
      LabelUtils.parse('#!ascii\n1\nx 0 0 0 0\n')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError)
      expect(error).toMatchObject({ code: 'PARSE', line: 3 })
    }
  })

  it('should refuse to format columns of different lengths', () => {
    const label = twoEntryLabel()
    label.value = new Float32Array(1)

    expect(() => LabelUtils.format(label)).toThrow(ConsistencyError)
  })

  it('should build a membership mask over a surface', () => {
    expect(LabelUtils.vertInLabel(twoEntryLabel(), 10)).toEqual([
      false, false, false, false, false, true, false, false, false, true
    ])
  })

  it('should reject labels that reference vertices outside the surface', () => {
    expect(() => LabelUtils.vertInLabel(twoEntryLabel(), 9)).toThrow(ContractError)
  })
})
