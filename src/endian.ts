/**
 * Big-endian primitives over byte sources and sinks.
 *
 * All supported formats store numbers big-endian. Scalars go through a
 * DataView; bulk arrays are copied once and byte-swapped in place when the
 * host is little-endian, then viewed as the target typed array. The host byte
 * order is detected once, when this module loads.
 */

import { ByteSink, ByteSource } from './byte-source'
import { ConsistencyError } from './errors'

export type Endianness = 'little' | 'big'

export function detectHostEndianness(): Endianness {
  return new Uint8Array(new Uint16Array([1]).buffer)[0] === 1 ? 'little' : 'big'
}

export const HOST_ENDIANNESS: Endianness = detectHostEndianness()

/**
 * Reverse the byte order of every `width`-byte word in `bytes`
 */
function swapInPlace(bytes: Uint8Array, width: number): void {
  for (let offset = 0; offset < bytes.length; offset += width) {
    for (let lo = offset, hi = offset + width - 1; lo < hi; lo++, hi--) {
      const tmp = bytes[lo]
      bytes[lo] = bytes[hi]
      bytes[hi] = tmp
    }
  }
}

const utf8Decoder = new TextDecoder('utf-8')
const utf8Encoder = new TextEncoder()

/**
 * Reads big-endian values from a byte source
 */
export class EndianReader {
  constructor(
    readonly source: ByteSource,
    private readonly host: Endianness = HOST_ENDIANNESS
  ) { }

  get position(): number {
    return this.source.position
  }

  private view(length: number): DataView {
    const bytes = this.source.read(length)
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  /**
   * Read `count` words of `width` bytes into a fresh buffer in host order
   */
  private readWords(count: number, width: number): ArrayBufferLike {
    const bytes = this.source.read(count * width).slice()
    if (this.host === 'little' && width > 1) {
      swapInPlace(bytes, width)
    }
    return bytes.buffer
  }

  readUint8(): number {
    return this.source.read(1)[0]
  }

  readInt16(): number {
    return this.view(2).getInt16(0, false)
  }

  /**
   * Read a 3-byte magic number into the low 24 bits of an integer
   */
  readInt24(): number {
    const b = this.source.read(3)
    return ((b[0] << 16) | (b[1] << 8) | b[2]) & 0xffffff
  }

  readInt32(): number {
    return this.view(4).getInt32(0, false)
  }

  /**
   * Read a 32-bit count or length field
   *
   * @param field Named in the error message
   * @throws ConsistencyError if the stored value is negative
   */
  readCount(field: string): number {
    const value = this.readInt32()
    if (value < 0) {
      throw new ConsistencyError(`${field} is ${value}, expected a non-negative count`)
    }
    return value
  }

  readFloat32(): number {
    return this.view(4).getFloat32(0, false)
  }

  readBytes(length: number): Uint8Array {
    return this.source.read(length).slice()
  }

  readInt16Array(count: number): Int16Array {
    return new Int16Array(this.readWords(count, 2))
  }

  readInt32Array(count: number): Int32Array {
    return new Int32Array(this.readWords(count, 4))
  }

  readFloat32Array(count: number): Float32Array {
    return new Float32Array(this.readWords(count, 4))
  }

  /**
   * Decode `length` bytes as UTF-8
   */
  readString(length: number): string {
    return utf8Decoder.decode(this.source.read(length))
  }

  /**
   * Consume bytes up to and including the next newline and return the text before it
   */
  readLine(): string {
    const bytes: number[] = []
    let byte = this.readUint8()
    while (byte !== 0x0a) {
      bytes.push(byte)
      byte = this.readUint8()
    }
    return utf8Decoder.decode(new Uint8Array(bytes))
  }

  /**
   * Consume and drop `length` bytes. Works on sources that cannot seek.
   */
  discard(length: number): void {
    this.source.read(length)
  }
}

/**
 * Writes big-endian values to a byte sink
 */
export class EndianWriter {
  constructor(
    readonly sink: ByteSink,
    private readonly host: Endianness = HOST_ENDIANNESS
  ) { }

  private scalar(width: number, set: (view: DataView) => void): void {
    const bytes = new Uint8Array(width)
    set(new DataView(bytes.buffer))
    this.sink.write(bytes)
  }

  private writeWords(words: Int16Array | Int32Array | Float32Array): void {
    const bytes = new Uint8Array(words.buffer, words.byteOffset, words.byteLength)
    if (this.host === 'little') {
      swapInPlace(bytes, words.BYTES_PER_ELEMENT)
    }
    this.sink.write(bytes)
  }

  writeUint8(value: number): void {
    this.sink.write(Uint8Array.of(value))
  }

  writeInt16(value: number): void {
    this.scalar(2, view => view.setInt16(0, value, false))
  }

  /**
   * Write the low 24 bits of `value` as a 3-byte magic number
   */
  writeInt24(value: number): void {
    const masked = value & 0xffffff
    this.sink.write(Uint8Array.of((masked >> 16) & 0xff, (masked >> 8) & 0xff, masked & 0xff))
  }

  writeInt32(value: number): void {
    this.scalar(4, view => view.setInt32(0, value, false))
  }

  writeFloat32(value: number): void {
    this.scalar(4, view => view.setFloat32(0, value, false))
  }

  writeBytes(bytes: Uint8Array): void {
    this.sink.write(bytes)
  }

  writeInt16Array(values: ArrayLike<number>): void {
    this.writeWords(Int16Array.from(values))
  }

  writeInt32Array(values: ArrayLike<number>): void {
    this.writeWords(Int32Array.from(values))
  }

  writeFloat32Array(values: ArrayLike<number>): void {
    this.writeWords(Float32Array.from(values))
  }

  writeString(text: string): void {
    this.sink.write(utf8Encoder.encode(text))
  }

  writeLine(text: string): void {
    this.writeString(`${text}\n`)
  }

  /**
   * Write `length` zero bytes
   */
  writeZeros(length: number): void {
    this.sink.write(new Uint8Array(length))
  }
}
