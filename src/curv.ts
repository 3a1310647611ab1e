import { BufferByteSink, BufferByteSource, ByteSink, ByteSource } from './byte-source'
import { FormatConstants } from './constants'
import { EndianReader, EndianWriter } from './endian'
import { UnsupportedFormatError } from './errors'
import { ReadOptions, resolveReadOptions } from './logger'

/**
 * Per-vertex scalar data, e.g. cortical thickness
 */
export interface Curv {
  /**
   * Vertex count from the header; equals `data.length`
   */
  numVertices: number

  /**
   * Face count from the header. Informational only, writers often put a placeholder here.
   */
  numFaces: number

  /**
   * Values per vertex; always 1, other layouts are rejected
   */
  numValuesPerVertex: number

  /**
   * One value per mesh vertex
   */
  data: Float32Array
}

/**
 * Reader and writer for binary curv files
 */
export class CurvUtils {
  /**
   * Read a curv file from a byte source.
   *
   * A wrong magic number is reported through the logger and reading continues,
   * since some producers are known to alter it.
   *
   * @throws UnsupportedFormatError if the file stores more than one value per vertex
   */
  static read(source: ByteSource, options: ReadOptions = {}): Curv {
    const { logger } = resolveReadOptions(options)
    const reader = new EndianReader(source)

    const magic = reader.readInt24()
    if (magic !== FormatConstants.CURV_MAGIC) {
      logger.warn(`curv magic number ${magic} does not match expected ${FormatConstants.CURV_MAGIC}, reading anyway`)
    }

    const numVertices = reader.readCount('curv vertex count')
    const numFaces = reader.readCount('curv face count')
    const numValuesPerVertex = reader.readInt32()
    if (numValuesPerVertex !== 1) {
      throw new UnsupportedFormatError(
        `curv files with ${numValuesPerVertex} values per vertex are not supported, expected 1`
      )
    }

    const data = reader.readFloat32Array(numVertices)
    return { numVertices, numFaces, numValuesPerVertex, data }
  }

  /**
   * Write per-vertex values in curv layout
   *
   * @param numFaces Face count stored in the header; readers ignore it
   */
  static write(
    sink: ByteSink,
    data: ArrayLike<number>,
    numFaces: number = FormatConstants.CURV_DEFAULT_NUM_FACES
  ): void {
    const writer = new EndianWriter(sink)
    writer.writeInt24(FormatConstants.CURV_MAGIC)
    writer.writeInt32(data.length)
    writer.writeInt32(numFaces)
    writer.writeInt32(1)
    writer.writeFloat32Array(data)
  }

  static decode(bytes: Uint8Array | ArrayBuffer, options: ReadOptions = {}): Curv {
    return CurvUtils.read(new BufferByteSource(bytes), options)
  }

  /**
   * Decode a curv file and return only its values
   */
  static decodeData(bytes: Uint8Array | ArrayBuffer, options: ReadOptions = {}): Float32Array {
    return CurvUtils.decode(bytes, options).data
  }

  static encode(
    data: ArrayLike<number>,
    numFaces: number = FormatConstants.CURV_DEFAULT_NUM_FACES
  ): Uint8Array {
    const sink = new BufferByteSink()
    CurvUtils.write(sink, data, numFaces)
    return sink.toUint8Array()
  }
}
