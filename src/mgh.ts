/**
 * Reader and writer for MGH volumes and their gzip-compressed MGZ variant.
 *
 * The file starts with a 284-byte header region: version, four dimension
 * lengths, data type, degrees of freedom and the RAS flag, then (when the flag
 * is 1) voxel sizes, direction cosines and the center coordinate, then zero
 * padding. Voxel values follow in the type named by the header, first
 * dimension varying fastest.
 */

import * as zlib from 'zlib'
import {
  BufferByteSink,
  BufferByteSource,
  ByteSink,
  ByteSource,
  ChunkedByteSource,
  isSeekable,
  SeekableByteSource
} from './byte-source'
import { FormatConstants } from './constants'
import { EndianReader, EndianWriter } from './endian'
import { ConsistencyError, ContractError, UnsupportedFormatError } from './errors'

/**
 * MGH voxel data types
 */
export const MriDtype = {
  UCHAR: 0,
  INT: 1,
  FLOAT: 3,
  SHORT: 4
} as const

export type MriDtype = typeof MriDtype[keyof typeof MriDtype]

/**
 * Voxel values, tagged with the data type they are stored as
 */
export type MghData =
  | { dtype: typeof MriDtype.UCHAR; values: Uint8Array }
  | { dtype: typeof MriDtype.INT; values: Int32Array }
  | { dtype: typeof MriDtype.FLOAT; values: Float32Array }
  | { dtype: typeof MriDtype.SHORT; values: Int16Array }

/**
 * Scanner geometry, present when the header's RAS flag is 1
 */
export interface MghRas {
  xsize: number
  ysize: number
  zsize: number
  /**
   * Direction cosines, 3x3 row-major as stored
   */
  mdc: number[]
  /**
   * Center coordinate
   */
  pxyzC: number[]
}

/**
 * MGH header fields except the data type, which lives on `MghData`
 */
export interface MghHeader {
  dim1: number
  dim2: number
  dim3: number
  dim4: number
  dof: number
  /**
   * 1 when `ras` is valid
   */
  rasGoodFlag: number
  ras?: MghRas
}

/**
 * Header as read from a file, before the payload
 */
export interface MghFileHeader extends MghHeader {
  dtype: number
}

export interface Mgh {
  header: MghHeader
  data: MghData
}

const SUPPORTED_DTYPES: readonly number[] = Object.values(MriDtype)

export function isSupportedDtype(dtype: number): dtype is MriDtype {
  return SUPPORTED_DTYPES.includes(dtype)
}

/**
 * Reader and writer for MGH/MGZ files
 */
export class MghUtils {
  static numVoxels(header: MghHeader): number {
    return header.dim1 * header.dim2 * header.dim3 * header.dim4
  }

  /**
   * Read the header fields up to and including the RAS block, leaving the
   * source positioned somewhere inside the padding
   */
  private static readHeaderFields(reader: EndianReader): MghFileHeader {
    const version = reader.readInt32()
    if (version !== FormatConstants.MGH_VERSION) {
      throw new UnsupportedFormatError(
        `MGH format version ${version} is not supported, expected ${FormatConstants.MGH_VERSION}`
      )
    }

    const header: MghFileHeader = {
      dim1: reader.readCount('MGH dim1'),
      dim2: reader.readCount('MGH dim2'),
      dim3: reader.readCount('MGH dim3'),
      dim4: reader.readCount('MGH dim4'),
      dtype: reader.readInt32(),
      dof: reader.readInt32(),
      rasGoodFlag: reader.readInt16()
    }

    if (header.rasGoodFlag === 1) {
      const sizes = Array.from(reader.readFloat32Array(3))
      header.ras = {
        xsize: sizes[0],
        ysize: sizes[1],
        zsize: sizes[2],
        mdc: Array.from(reader.readFloat32Array(9)),
        pxyzC: Array.from(reader.readFloat32Array(3))
      }
    }

    return header
  }

  /**
   * Read the header and jump straight to the payload
   */
  static readHeaderSeekable(source: SeekableByteSource): MghFileHeader {
    const start = source.position
    const header = MghUtils.readHeaderFields(new EndianReader(source))
    source.seek(start + FormatConstants.MGH_HEADER_SIZE)
    return header
  }

  /**
   * Read the header and consume the padding byte by byte, for sources that
   * cannot seek such as a decompressing stream
   */
  static readHeaderSequential(source: ByteSource): MghFileHeader {
    const start = source.position
    const reader = new EndianReader(source)
    const header = MghUtils.readHeaderFields(reader)
    reader.discard(FormatConstants.MGH_HEADER_SIZE - (source.position - start))
    return header
  }

  /**
   * Read the header, seeking past the padding when the source allows it
   */
  static readHeader(source: ByteSource): MghFileHeader {
    return isSeekable(source)
      ? MghUtils.readHeaderSeekable(source)
      : MghUtils.readHeaderSequential(source)
  }

  /**
   * Read `count` values of type `dtype` following the header
   *
   * @throws UnsupportedFormatError for data types other than UCHAR, INT, FLOAT and SHORT
   */
  static readData(source: ByteSource, dtype: number, count: number): MghData {
    const reader = new EndianReader(source)
    switch (dtype) {
      case MriDtype.UCHAR:
        return { dtype: MriDtype.UCHAR, values: reader.readBytes(count) }
      case MriDtype.INT:
        return { dtype: MriDtype.INT, values: reader.readInt32Array(count) }
      case MriDtype.FLOAT:
        return { dtype: MriDtype.FLOAT, values: reader.readFloat32Array(count) }
      case MriDtype.SHORT:
        return { dtype: MriDtype.SHORT, values: reader.readInt16Array(count) }
      default:
        throw new UnsupportedFormatError(
          `MGH data type ${dtype} is not supported, expected one of ${SUPPORTED_DTYPES.join(', ')}`
        )
    }
  }

  static read(source: ByteSource): Mgh {
    const { dtype, ...header } = MghUtils.readHeader(source)
    const data = MghUtils.readData(source, dtype, MghUtils.numVoxels(header))
    return { header, data }
  }

  /**
   * Write a volume.
   *
   * Header and payload are validated before the first byte goes out, so a
   * rejected volume leaves the sink untouched.
   *
   * @throws ConsistencyError if the payload length is not dim1 * dim2 * dim3 * dim4
   * @throws ContractError if the RAS flag is 1 but no RAS block is given
   */
  static write(sink: ByteSink, mgh: Mgh): void {
    const { header, data } = mgh
    const expected = MghUtils.numVoxels(header)
    if (data.values.length !== expected) {
      throw new ConsistencyError(
        `MGH payload has ${data.values.length} values but the dimensions ` +
        `${header.dim1}x${header.dim2}x${header.dim3}x${header.dim4} require ${expected}`
      )
    }
    if (!isSupportedDtype(data.dtype)) {
      throw new UnsupportedFormatError(`MGH data type ${data.dtype} is not supported`)
    }
    const ras = header.rasGoodFlag === 1 ? header.ras : undefined
    if (header.rasGoodFlag === 1 && !ras) {
      throw new ContractError('MGH header has its RAS flag set but carries no RAS block')
    }
    if (ras && (ras.mdc.length !== 9 || ras.pxyzC.length !== 3)) {
      throw new ConsistencyError(
        `MGH RAS block needs 9 direction cosines and 3 center coordinates, got ${ras.mdc.length} and ${ras.pxyzC.length}`
      )
    }

    const writer = new EndianWriter(sink)
    writer.writeInt32(FormatConstants.MGH_VERSION)
    writer.writeInt32(header.dim1)
    writer.writeInt32(header.dim2)
    writer.writeInt32(header.dim3)
    writer.writeInt32(header.dim4)
    writer.writeInt32(data.dtype)
    writer.writeInt32(header.dof)
    writer.writeInt16(header.rasGoodFlag)

    let written = FormatConstants.MGH_FIXED_HEADER_SIZE
    if (ras) {
      writer.writeFloat32Array([ras.xsize, ras.ysize, ras.zsize])
      writer.writeFloat32Array(ras.mdc)
      writer.writeFloat32Array(ras.pxyzC)
      written += FormatConstants.MGH_RAS_BLOCK_SIZE
    }
    writer.writeZeros(FormatConstants.MGH_HEADER_SIZE - written)

    switch (data.dtype) {
      case MriDtype.UCHAR:
        writer.writeBytes(data.values)
        break
      case MriDtype.INT:
        writer.writeInt32Array(data.values)
        break
      case MriDtype.FLOAT:
        writer.writeFloat32Array(data.values)
        break
      case MriDtype.SHORT:
        writer.writeInt16Array(data.values)
        break
    }
  }

  static decode(bytes: Uint8Array | ArrayBuffer): Mgh {
    return MghUtils.read(new BufferByteSource(bytes))
  }

  static encode(mgh: Mgh): Uint8Array {
    const sink = new BufferByteSink()
    MghUtils.write(sink, mgh)
    return sink.toUint8Array()
  }

  /**
   * Decode a gzip-compressed volume. The inflated bytes are consumed as a
   * sequential stream, the same way a streaming decompressor would feed them.
   */
  static decodeMgz(bytes: Uint8Array | ArrayBuffer): Mgh {
    const compressed = bytes instanceof Uint8Array ? bytes : new Uint8Array(bytes)
    const inflated = new Uint8Array(zlib.gunzipSync(compressed))
    return MghUtils.read(new ChunkedByteSource([inflated]))
  }

  static encodeMgz(mgh: Mgh): Uint8Array {
    return new Uint8Array(zlib.gzipSync(MghUtils.encode(mgh)))
  }

  /**
   * Offset of voxel (i, j, k, t) in the payload; the first index varies fastest
   */
  static voxelIndex(header: MghHeader, i: number, j: number, k: number, t: number = 0): number {
    const dims = [header.dim1, header.dim2, header.dim3, header.dim4]
    const index = [i, j, k, t]
    for (let d = 0; d < 4; d++) {
      if (!Number.isInteger(index[d]) || index[d] < 0 || index[d] >= dims[d]) {
        throw new ContractError(
          `voxel (${index.join(', ')}) is outside a volume of size ${dims.join('x')}`
        )
      }
    }
    return i + header.dim1 * (j + header.dim2 * (k + header.dim3 * t))
  }

  static valueAt(mgh: Mgh, i: number, j: number, k: number, t: number = 0): number {
    return mgh.data.values[MghUtils.voxelIndex(mgh.header, i, j, k, t)]
  }
}
