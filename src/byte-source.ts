/**
 * Byte sources and sinks the codecs read from and write to.
 *
 * A source is consumed front to back. Only some sources can also seek; the
 * codecs check for that capability with `isSeekable` and fall back to
 * consuming bytes when it is missing, so a decompressor's output or a file
 * read in chunks works the same as a buffer held in memory.
 */

import * as fs from 'fs'
import { ContractError, ResourceError, TruncatedDataError } from './errors'

function checkReadLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new ContractError(`cannot read ${length} bytes: length must be a non-negative integer`)
  }
}

/**
 * Sequential byte source
 */
export interface ByteSource {
  /**
   * Number of bytes consumed so far
   */
  readonly position: number

  /**
   * Consume exactly `length` bytes.
   * @throws TruncatedDataError if fewer bytes remain
   * @throws ContractError if `length` is not a non-negative integer
   */
  read(length: number): Uint8Array
}

/**
 * Byte source that also supports random access
 */
export interface SeekableByteSource extends ByteSource {
  /**
   * Total number of bytes in the source
   */
  readonly length: number

  /**
   * Move the read position to an absolute byte offset
   */
  seek(position: number): void
}

export function isSeekable(source: ByteSource): source is SeekableByteSource {
  return 'seek' in source && typeof source.seek === 'function'
}

/**
 * Byte destination for writers
 */
export interface ByteSink {
  write(bytes: Uint8Array): void
}

/**
 * Seekable source over an in-memory buffer
 */
export class BufferByteSource implements SeekableByteSource {
  private offset = 0
  private readonly bytes: Uint8Array

  constructor(data: Uint8Array | ArrayBuffer) {
    this.bytes = data instanceof Uint8Array ? data : new Uint8Array(data)
  }

  get position(): number {
    return this.offset
  }

  get length(): number {
    return this.bytes.length
  }

  read(length: number): Uint8Array {
    checkReadLength(length)
    const available = this.bytes.length - this.offset
    if (length > available) {
      throw new TruncatedDataError(length, available)
    }
    const result = this.bytes.subarray(this.offset, this.offset + length)
    this.offset += length
    return result
  }

  seek(position: number): void {
    if (position < 0 || position > this.bytes.length) {
      throw new TruncatedDataError(position, this.bytes.length)
    }
    this.offset = position
  }
}

/**
 * Sequential-only source over a series of chunks, such as the output of a
 * decompressing stream. Chunks are pulled lazily and never revisited.
 */
export class ChunkedByteSource implements ByteSource {
  private readonly chunks: Iterator<Uint8Array>
  private current: Uint8Array = new Uint8Array(0)
  private currentOffset = 0
  private consumed = 0

  constructor(chunks: Iterable<Uint8Array>) {
    this.chunks = chunks[Symbol.iterator]()
  }

  get position(): number {
    return this.consumed
  }

  read(length: number): Uint8Array {
    checkReadLength(length)
    const result = new Uint8Array(length)
    let filled = 0

    while (filled < length) {
      if (this.currentOffset >= this.current.length) {
        const next = this.chunks.next()
        if (next.done) {
          throw new TruncatedDataError(length, filled)
        }
        this.current = next.value
        this.currentOffset = 0
        continue
      }

      const take = Math.min(length - filled, this.current.length - this.currentOffset)
      result.set(this.current.subarray(this.currentOffset, this.currentOffset + take), filled)
      this.currentOffset += take
      filled += take
    }

    this.consumed += length
    return result
  }
}

/**
 * Sequential-only source reading a file in fixed-size chunks through a file
 * descriptor. Use `FileByteSource.use` so the descriptor is always closed.
 */
export class FileByteSource extends ChunkedByteSource {
  private constructor(fd: number, chunkSize: number) {
    super(FileByteSource.chunks(fd, chunkSize))
  }

  private static *chunks(fd: number, chunkSize: number): Generator<Uint8Array> {
    while (true) {
      const buffer = new Uint8Array(chunkSize)
      const bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null)
      if (bytesRead === 0) {
        return
      }
      yield buffer.subarray(0, bytesRead)
    }
  }

  /**
   * Open `path`, hand a source over it to `fn`, and close the file afterwards,
   * whether `fn` returns or throws.
   *
   * @throws ResourceError if the file cannot be opened
   */
  static use<T>(path: string, fn: (source: ByteSource) => T, chunkSize: number = 64 * 1024): T {
    let fd: number
    try {
      fd = fs.openSync(path, 'r')
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new ResourceError(`Cannot open '${path}': ${reason}`, path)
    }

    try {
      return fn(new FileByteSource(fd, chunkSize))
    } finally {
      fs.closeSync(fd)
    }
  }
}

/**
 * Sink collecting everything written into one buffer
 */
export class BufferByteSink implements ByteSink {
  private chunks: Uint8Array[] = []
  private total = 0

  get length(): number {
    return this.total
  }

  write(bytes: Uint8Array): void {
    // Copy: callers may reuse their buffer after writing
    this.chunks.push(bytes.slice())
    this.total += bytes.length
  }

  toUint8Array(): Uint8Array {
    const result = new Uint8Array(this.total)
    let offset = 0
    for (const chunk of this.chunks) {
      result.set(chunk, offset)
      offset += chunk.length
    }
    return result
  }
}
