import * as zlib from 'zlib'
import { describe, expect, it } from 'vitest'
import { BufferByteSink, BufferByteSource, ChunkedByteSource } from '../byte-source'
import { ConsistencyError, ContractError, UnsupportedFormatError } from '../errors'
import { Mgh, MghUtils, MriDtype, isSupportedDtype } from '../mgh'

function ucharVolume(): Mgh {
  const values = new Uint8Array(24)
  values.forEach((_, i) => { values[i] = i })
  return {
    header: { dim1: 2, dim2: 3, dim3: 4, dim4: 1, dof: 0, rasGoodFlag: 0 },
    data: { dtype: MriDtype.UCHAR, values }
  }
}

function floatVolumeWithRas(): Mgh {
  return {
    header: {
      dim1: 3,
      dim2: 1,
      dim3: 1,
      dim4: 2,
      dof: 1,
      rasGoodFlag: 1,
      ras: {
        xsize: 1,
        ysize: 1.5,
        zsize: 2,
        mdc: [-1, 0, 0, 0, 0, -1, 0, 1, 0],
        pxyzC: [0.5, -12.25, 3]
      }
    },
    data: { dtype: MriDtype.FLOAT, values: new Float32Array([0.5, 1, 1.5, -2, 0, 8]) }
  }
}

function chunked(bytes: Uint8Array, size: number): ChunkedByteSource {
  const chunks: Uint8Array[] = []
  for (let i = 0; i < bytes.length; i += size) {
    chunks.push(bytes.subarray(i, i + size))
  }
  return new ChunkedByteSource(chunks)
}

describe('MghUtils', () => {
  it('should lay out the header at fixed offsets', () => {
    const bytes = MghUtils.encode(ucharVolume())
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

    expect(bytes.length).toBe(284 + 24)
    expect(view.getInt32(0)).toBe(1)
    expect([view.getInt32(4), view.getInt32(8), view.getInt32(12), view.getInt32(16)]).toEqual([2, 3, 4, 1])
    expect(view.getInt32(20)).toBe(MriDtype.UCHAR)
    expect(view.getInt16(28)).toBe(0)
    expect(bytes.subarray(30, 284).every(b => b === 0)).toBe(true)
    expect(bytes[284 + 23]).toBe(23)
  })

  it('should decode what it encodes', () => {
    const volume = ucharVolume()

    const decoded = MghUtils.decode(MghUtils.encode(volume))

    expect(decoded.header).toEqual(volume.header)
    expect(decoded.data.dtype).toBe(MriDtype.UCHAR)
    expect(decoded.data.values).toEqual(volume.data.values)
  })

  it('should keep the RAS block', () => {
    const volume = floatVolumeWithRas()

    const decoded = MghUtils.decode(MghUtils.encode(volume))

    expect(decoded.header).toEqual(volume.header)
    expect(decoded.data).toEqual(volume.data)
  })

  it('should store every supported data type', () => {
    const header = { dim1: 2, dim2: 1, dim3: 1, dim4: 1, dof: 0, rasGoodFlag: 0 }
    const payloads: Mgh['data'][] = [
      { dtype: MriDtype.INT, values: new Int32Array([-100000, 7]) },
      { dtype: MriDtype.SHORT, values: new Int16Array([-300, 300]) },
      { dtype: MriDtype.FLOAT, values: new Float32Array([0.25, -8]) }
    ]

    for (const data of payloads) {
      const decoded = MghUtils.decode(MghUtils.encode({ header, data }))
      expect(decoded.data).toEqual(data)
    }
  })

  it('should read the same volume from a sequential source', () => {
    const bytes = MghUtils.encode(floatVolumeWithRas())

    const seekable = MghUtils.read(new BufferByteSource(bytes))
    const sequential = MghUtils.read(chunked(bytes, 7))

    expect(sequential).toEqual(seekable)
  })

  it('should leave the source at the payload after reading the header', () => {
    const bytes = MghUtils.encode(ucharVolume())

    const seekable = new BufferByteSource(bytes)
    MghUtils.readHeaderSeekable(seekable)
    const sequential = chunked(bytes, 50)
    MghUtils.readHeaderSequential(sequential)

    expect(seekable.position).toBe(284)
    expect(sequential.position).toBe(284)
  })

  it('should report the header data type', () => {
    const header = MghUtils.readHeader(new BufferByteSource(MghUtils.encode(floatVolumeWithRas())))

    expect(header.dtype).toBe(MriDtype.FLOAT)
    expect(header.ras?.pxyzC).toEqual([0.5, -12.25, 3])
  })

  it('should reject an unsupported data type', () => {
    const bytes = MghUtils.encode(ucharVolume())
    bytes[23] = 2

    expect(() => MghUtils.decode(bytes)).toThrow(UnsupportedFormatError)
    expect(isSupportedDtype(2)).toBe(false)
    expect(isSupportedDtype(4)).toBe(true)
  })

  it('should reject an unsupported version', () => {
    const bytes = MghUtils.encode(ucharVolume())
    bytes[3] = 2

    expect(() => MghUtils.decode(bytes)).toThrow(UnsupportedFormatError)
  })

  it('should reject a negative dimension from any source', () => {
    const bytes = MghUtils.encode(ucharVolume())
    bytes.set([0xff, 0xff, 0xff, 0xfd], 8)

    expect(() => MghUtils.decode(bytes)).toThrow('MGH dim2 is -3, expected a non-negative count')
    expect(() => MghUtils.read(chunked(bytes, 7))).toThrow(ConsistencyError)
  })

  it('should refuse to write a payload that does not match the dimensions', () => {
    const volume = ucharVolume()
    volume.header.dim4 = 2
    const sink = new BufferByteSink()

    expect(() => MghUtils.write(sink, volume)).toThrow(ConsistencyError)
    expect(sink.length).toBe(0)
  })

  it('should refuse to write a RAS flag without a RAS block', () => {
    const volume = floatVolumeWithRas()
    delete volume.header.ras
    const sink = new BufferByteSink()

    expect(() => MghUtils.write(sink, volume)).toThrow(ContractError)
    expect(sink.length).toBe(0)
  })

  it('should refuse a RAS block of the wrong shape', () => {
    const volume = floatVolumeWithRas()
    volume.header.ras?.mdc.pop()

    expect(() => MghUtils.encode(volume)).toThrow(ConsistencyError)
  })

  it('should not write the RAS block when the flag is not set', () => {
    const volume = floatVolumeWithRas()
    volume.header.rasGoodFlag = 0

    const decoded = MghUtils.decode(MghUtils.encode(volume))

    expect(decoded.header.ras).toBeUndefined()
    expect(decoded.data).toEqual(volume.data)
  })

  it('should round-trip through gzip', () => {
    const volume = floatVolumeWithRas()
    const compressed = MghUtils.encodeMgz(volume)

    expect(Array.from(compressed.subarray(0, 2))).toEqual([0x1f, 0x8b])
    expect(new Uint8Array(zlib.gunzipSync(compressed))).toEqual(MghUtils.encode(volume))
    expect(MghUtils.decodeMgz(compressed)).toEqual(MghUtils.decode(MghUtils.encode(volume)))
  })

  it('should index voxels with the first dimension varying fastest', () => {
    const volume = ucharVolume()

    expect(MghUtils.voxelIndex(volume.header, 0, 0, 0)).toBe(0)
    expect(MghUtils.voxelIndex(volume.header, 1, 0, 0)).toBe(1)
    expect(MghUtils.voxelIndex(volume.header, 0, 1, 0)).toBe(2)
    expect(MghUtils.voxelIndex(volume.header, 0, 0, 1)).toBe(6)
    expect(MghUtils.voxelIndex(volume.header, 1, 2, 3, 0)).toBe(23)
    expect(MghUtils.valueAt(volume, 1, 1, 2)).toBe(15)
    expect(MghUtils.numVoxels(volume.header)).toBe(24)
  })

  it('should reject voxel coordinates outside the volume', () => {
    const { header } = ucharVolume()

    expect(() => MghUtils.voxelIndex(header, 2, 0, 0)).toThrow(ContractError)
    expect(() => MghUtils.voxelIndex(header, 0, 0, 0, 1)).toThrow(ContractError)
    expect(() => MghUtils.voxelIndex(header, -1, 0, 0)).toThrow(ContractError)
  })
})
