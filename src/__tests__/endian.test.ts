import { describe, expect, it } from 'vitest'
import { BufferByteSink, BufferByteSource } from '../byte-source'
import { EndianReader, EndianWriter, HOST_ENDIANNESS, detectHostEndianness } from '../endian'
import { TruncatedDataError } from '../errors'

function written(write: (writer: EndianWriter) => void): number[] {
  const sink = new BufferByteSink()
  write(new EndianWriter(sink))
  return Array.from(sink.toUint8Array())
}

function reader(bytes: number[]): EndianReader {
  return new EndianReader(new BufferByteSource(Uint8Array.from(bytes)))
}

describe('Endian codec', () => {
  it('should detect the host byte order once', () => {
    expect(['little', 'big']).toContain(HOST_ENDIANNESS)
    expect(detectHostEndianness()).toBe(HOST_ENDIANNESS)
  })

  it('should write scalars big-endian', () => {
    expect(written(w => w.writeInt32(0x01020304))).toEqual([1, 2, 3, 4])
    expect(written(w => w.writeInt32(-2))).toEqual([0xff, 0xff, 0xff, 0xfe])
    expect(written(w => w.writeInt16(-2))).toEqual([0xff, 0xfe])
    expect(written(w => w.writeFloat32(1))).toEqual([0x3f, 0x80, 0, 0])
    expect(written(w => w.writeUint8(200))).toEqual([200])
  })

  it('should write 24-bit magic numbers with the high byte dropped', () => {
    expect(written(w => w.writeInt24(0xfffffe))).toEqual([0xff, 0xff, 0xfe])
    expect(written(w => w.writeInt24(0x12345678))).toEqual([0x34, 0x56, 0x78])
  })

  it('should write arrays big-endian regardless of host order', () => {
    expect(written(w => w.writeInt32Array([1, -2]))).toEqual([0, 0, 0, 1, 0xff, 0xff, 0xff, 0xfe])
    expect(written(w => w.writeInt16Array([258]))).toEqual([1, 2])
    expect(written(w => w.writeFloat32Array(new Float32Array([-2])))).toEqual([0xc0, 0, 0, 0])
  })

  it('should read scalars big-endian', () => {
    expect(reader([1, 2, 3, 4]).readInt32()).toBe(0x01020304)
    expect(reader([0xff, 0xfe]).readInt16()).toBe(-2)
    expect(reader([0xff, 0xff, 0xff]).readInt24()).toBe(16777215)
    expect(reader([0x3f, 0xc0, 0, 0]).readFloat32()).toBe(1.5)
    expect(reader([7]).readUint8()).toBe(7)
  })

  it('should read arrays big-endian', () => {
    expect(reader([0, 0, 0, 1, 0xff, 0xff, 0xff, 0xfe]).readInt32Array(2)).toEqual(new Int32Array([1, -2]))
    expect(reader([1, 2, 0xff, 0xff]).readInt16Array(2)).toEqual(new Int16Array([258, -1]))
    expect(reader([0x3f, 0x80, 0, 0, 0xc0, 0, 0, 0]).readFloat32Array(2)).toEqual(new Float32Array([1, -2]))
  })

  it('should read back what it wrote bit for bit', () => {
    const values = new Float32Array([0.1, -3.75, 1e-30, 123456.789, Math.PI])
    const sink = new BufferByteSink()
    new EndianWriter(sink).writeFloat32Array(values)

    const decoded = new EndianReader(new BufferByteSource(sink.toUint8Array())).readFloat32Array(values.length)

    expect(decoded).toEqual(values)
  })

  it('should not modify the array it writes', () => {
    const values = new Int32Array([1, 2, 3])
    written(w => w.writeInt32Array(values))
    expect(values).toEqual(new Int32Array([1, 2, 3]))
  })

  it('should read newline-terminated lines', () => {
    const bytes = Array.from(new TextEncoder().encode('created by test\n\nrest'))
    const r = reader(bytes)

    expect(r.readLine()).toBe('created by test')
    expect(r.readLine()).toBe('')
    expect(r.readString(4)).toBe('rest')
  })

  it('should fail on short reads', () => {
    expect(() => reader([0, 1]).readInt32()).toThrow(TruncatedDataError)
    expect(() => reader([0x61, 0x62]).readLine()).toThrow(TruncatedDataError)
  })
})
