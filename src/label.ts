import { FormatConstants } from './constants'
import { ConsistencyError, ContractError, ParseError } from './errors'

/**
 * A region as a list of vertices (surface labels) or voxel coordinates
 * (volume labels), with an optional value per entry.
 * All arrays have one element per entry.
 */
export interface Label {
  vertex: Int32Array
  coordX: Float32Array
  coordY: Float32Array
  coordZ: Float32Array
  /**
   * Often 0 for every entry, but may carry a statistic
   */
  value: Float32Array
}

const INTEGER = /^[+-]?\d+$/
const INT32_MIN = -0x80000000
const INT32_MAX = 0x7fffffff

const utf8Decoder = new TextDecoder('utf-8')
const utf8Encoder = new TextEncoder()

/**
 * Reader and writer for ASCII label files.
 *
 * Layout: a comment line, the entry count, then one line per entry with
 * `vertex x y z value` separated by whitespace.
 */
export class LabelUtils {
  static numEntries(label: Label): number {
    return label.vertex.length
  }

  /**
   * @throws ParseError if the count or an entry line does not parse, or the
   * number of entries differs from the count
   */
  static parse(text: string): Label {
    const lines = text.split(/\r?\n/)
    // Trailing blank lines are not entries
    while (lines.length > 0 && lines[lines.length - 1].trim() === '') {
      lines.pop()
    }

    if (lines.length < 2) {
      throw new ParseError('label file needs a comment line and a count line')
    }

    const countText = lines[1].trim()
    if (!INTEGER.test(countText)) {
      throw new ParseError(`entry count '${countText}' is not an integer`, 2)
    }
    const count = Number(countText)

    const entryLines = lines.slice(2)
    if (entryLines.length !== count) {
      throw new ParseError(`header announces ${count} entries but the file has ${entryLines.length}`)
    }

    const label: Label = {
      vertex: new Int32Array(count),
      coordX: new Float32Array(count),
      coordY: new Float32Array(count),
      coordZ: new Float32Array(count),
      value: new Float32Array(count)
    }

    entryLines.forEach((line, i) => {
      const lineNumber = i + 3
      const tokens = line.trim().split(/\s+/)
      if (tokens.length !== 5) {
        throw new ParseError(`expected 5 fields, found ${tokens.length}`, lineNumber)
      }
      if (!INTEGER.test(tokens[0])) {
        throw new ParseError(`vertex '${tokens[0]}' is not an integer`, lineNumber)
      }
      const vertex = Number(tokens[0])
      if (vertex < INT32_MIN || vertex > INT32_MAX) {
        throw new ParseError(`vertex ${tokens[0]} does not fit a 32-bit integer`, lineNumber)
      }
      const numbers = tokens.slice(1).map(Number)
      const bad = numbers.findIndex(Number.isNaN)
      if (bad >= 0) {
        throw new ParseError(`'${tokens[bad + 1]}' is not a number`, lineNumber)
      }

      label.vertex[i] = vertex
      label.coordX[i] = numbers[0]
      label.coordY[i] = numbers[1]
      label.coordZ[i] = numbers[2]
      label.value[i] = numbers[3]
    })

    return label
  }

  /**
   * Format a label as text. Numbers are written in their shortest exact
   * decimal form, so parsing the result gives back the same values.
   */
  static format(label: Label): string {
    const count = LabelUtils.numEntries(label)
    const columns: [string, ArrayLike<number>][] = [
      ['coordX', label.coordX],
      ['coordY', label.coordY],
      ['coordZ', label.coordZ],
      ['value', label.value]
    ]
    for (const [name, array] of columns) {
      if (array.length !== count) {
        throw new ConsistencyError(`label has ${count} vertices but ${array.length} entries in '${name}'`)
      }
    }

    const lines = [FormatConstants.LABEL_COMMENT, String(count)]
    for (let i = 0; i < count; i++) {
      lines.push(
        `${label.vertex[i]} ${label.coordX[i]} ${label.coordY[i]} ${label.coordZ[i]} ${label.value[i]}`
      )
    }
    return lines.join('\n') + '\n'
  }

  static decode(bytes: Uint8Array | ArrayBuffer): Label {
    return LabelUtils.parse(utf8Decoder.decode(bytes))
  }

  static encode(label: Label): Uint8Array {
    return utf8Encoder.encode(LabelUtils.format(label))
  }

  /**
   * Mask over the vertices of a surface with `totalVertexCount` vertices,
   * true for every vertex listed in the label
   *
   * @throws ContractError if the label references a vertex index outside the surface
   */
  static vertInLabel(label: Label, totalVertexCount: number): boolean[] {
    const mask = new Array<boolean>(totalVertexCount).fill(false)
    for (const vertex of label.vertex) {
      if (vertex < 0 || vertex >= totalVertexCount) {
        throw new ContractError(
          `label references vertex ${vertex}, outside a surface with ${totalVertexCount} vertices`
        )
      }
      mask[vertex] = true
    }
    return mask
  }
}
