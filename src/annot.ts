/**
 * Reader and writer for binary parcellation (annot) files.
 *
 * Layout, all 32-bit big-endian integers:
 * - vertex count, then (vertex index, label code) per vertex
 * - colortable flag (must be 1)
 * - negated colortable version (must be -2; positive values mark the old layout)
 * - region count
 * - length-prefixed source file name, then the region count again
 * - per region: id, name length, name bytes (null terminated), r, g, b, a
 */

import { BufferByteSink, BufferByteSource, ByteSink, ByteSource } from './byte-source'
import { Colortable, ColortableUtils } from './colortable'
import { FormatConstants } from './constants'
import { EndianReader, EndianWriter } from './endian'
import { ConsistencyError, UnsupportedFormatError } from './errors'
import { ReadOptions, resolveReadOptions } from './logger'

export interface Annot {
  /**
   * Vertex index per entry, normally 0 to n-1
   */
  vertexIndices: Int32Array

  /**
   * Region color code per vertex; see `Colortable.label`
   */
  vertexLabels: Int32Array

  colortable: Colortable
}

const utf8Encoder = new TextEncoder()

export class AnnotUtils {
  static numVertices(annot: Annot): number {
    return annot.vertexIndices.length
  }

  private static readColortable(reader: EndianReader, options: Required<ReadOptions>): Colortable {
    const hasColortable = reader.readInt32()
    if (hasColortable !== 1) {
      throw new UnsupportedFormatError(`annot files without a colortable are not supported (flag ${hasColortable})`)
    }

    const negatedVersion = reader.readInt32()
    if (negatedVersion > 0) {
      throw new UnsupportedFormatError('annot files with the old colortable layout are not supported')
    }
    const version = -negatedVersion
    if (version !== FormatConstants.ANNOT_COLORTABLE_VERSION) {
      throw new UnsupportedFormatError(
        `annot colortable version ${version} is not supported, expected ${FormatConstants.ANNOT_COLORTABLE_VERSION}`
      )
    }

    const numEntries = reader.readCount('annot colortable entry count')

    // Name of the file the colortable came from; not kept
    const sourceNameLength = reader.readCount('annot colortable file name length')
    reader.discard(sourceNameLength)

    const duplicateCount = reader.readCount('annot repeated colortable entry count')
    if (duplicateCount !== numEntries) {
      options.logger.warn(
        `annot colortable announces ${numEntries} entries and then ${duplicateCount}; using ${numEntries}`
      )
    }

    const colortable: Colortable = { id: [], name: [], r: [], g: [], b: [], a: [], label: [] }
    for (let i = 0; i < numEntries; i++) {
      colortable.id.push(reader.readInt32())
      const nameLength = reader.readCount('annot region name length')
      // Drop the trailing null byte
      colortable.name.push(reader.readString(nameLength).slice(0, -1))
      const r = reader.readInt32()
      const g = reader.readInt32()
      const b = reader.readInt32()
      const a = reader.readInt32()
      colortable.r.push(r)
      colortable.g.push(g)
      colortable.b.push(b)
      colortable.a.push(a)
      colortable.label.push(ColortableUtils.computeLabel(r, g, b, a))
    }
    return colortable
  }

  static read(source: ByteSource, options: ReadOptions = {}): Annot {
    const opts = resolveReadOptions(options)
    const reader = new EndianReader(source)

    const numVertices = reader.readCount('annot vertex count')
    const pairs = reader.readInt32Array(numVertices * 2)
    const vertexIndices = new Int32Array(numVertices)
    const vertexLabels = new Int32Array(numVertices)
    for (let i = 0; i < numVertices; i++) {
      vertexIndices[i] = pairs[i * 2]
      vertexLabels[i] = pairs[i * 2 + 1]
    }

    const colortable = AnnotUtils.readColortable(reader, opts)
    return { vertexIndices, vertexLabels, colortable }
  }

  /**
   * Write an annotation with a version 2 colortable and an empty source file name
   */
  static write(sink: ByteSink, annot: Annot): void {
    const { vertexIndices, vertexLabels, colortable } = annot
    if (vertexIndices.length !== vertexLabels.length) {
      throw new ConsistencyError(
        `annot has ${vertexIndices.length} vertex indices but ${vertexLabels.length} labels`
      )
    }
    const numEntries = ColortableUtils.numEntries(colortable)
    for (const column of [colortable.name, colortable.r, colortable.g, colortable.b, colortable.a]) {
      if (column.length !== numEntries) {
        throw new ConsistencyError(`colortable columns disagree on the number of regions (${numEntries} vs ${column.length})`)
      }
    }

    const pairs = new Int32Array(vertexIndices.length * 2)
    for (let i = 0; i < vertexIndices.length; i++) {
      pairs[i * 2] = vertexIndices[i]
      pairs[i * 2 + 1] = vertexLabels[i]
    }

    const writer = new EndianWriter(sink)
    writer.writeInt32(vertexIndices.length)
    writer.writeInt32Array(pairs)
    writer.writeInt32(1)
    writer.writeInt32(-FormatConstants.ANNOT_COLORTABLE_VERSION)
    writer.writeInt32(numEntries)
    writer.writeInt32(0)
    writer.writeInt32(numEntries)
    for (let i = 0; i < numEntries; i++) {
      const name = utf8Encoder.encode(colortable.name[i])
      writer.writeInt32(colortable.id[i])
      writer.writeInt32(name.length + 1)
      writer.writeBytes(name)
      writer.writeUint8(0)
      writer.writeInt32(colortable.r[i])
      writer.writeInt32(colortable.g[i])
      writer.writeInt32(colortable.b[i])
      writer.writeInt32(colortable.a[i])
    }
  }

  static decode(bytes: Uint8Array | ArrayBuffer, options: ReadOptions = {}): Annot {
    return AnnotUtils.read(new BufferByteSource(bytes), options)
  }

  static encode(annot: Annot): Uint8Array {
    const sink = new BufferByteSink()
    AnnotUtils.write(sink, annot)
    return sink.toUint8Array()
  }

  /**
   * Vertices assigned to the region called `regionName`; empty if there is no such region
   */
  static regionVertices(annot: Annot, regionName: string): number[] {
    const region = ColortableUtils.regionIndexByName(annot.colortable, regionName)
    if (region < 0) {
      return []
    }
    const label = annot.colortable.label[region]
    const vertices: number[] = []
    annot.vertexLabels.forEach((vertexLabel, i) => {
      if (vertexLabel === label) {
        vertices.push(annot.vertexIndices[i])
      }
    })
    return vertices
  }

  /**
   * Region name per vertex; an empty string where the label code is not in the colortable
   */
  static vertexRegionNames(annot: Annot): string[] {
    const nameByLabel = new Map<number, string>()
    annot.colortable.label.forEach((label, i) => nameByLabel.set(label, annot.colortable.name[i]))
    return Array.from(annot.vertexLabels, label => nameByLabel.get(label) ?? '')
  }

  /**
   * Region color per vertex as RGB (or RGBA with `alpha`) bytes; zero where
   * the label code is not in the colortable
   */
  static vertexColors(annot: Annot, alpha: boolean = false): Uint8Array {
    const { colortable } = annot
    const channels = alpha ? 4 : 3
    const regionByLabel = new Map<number, number>()
    colortable.label.forEach((label, i) => regionByLabel.set(label, i))

    const colors = new Uint8Array(annot.vertexLabels.length * channels)
    annot.vertexLabels.forEach((label, v) => {
      const region = regionByLabel.get(label)
      if (region === undefined) {
        return
      }
      const offset = v * channels
      colors[offset] = colortable.r[region]
      colors[offset + 1] = colortable.g[region]
      colors[offset + 2] = colortable.b[region]
      if (alpha) {
        colors[offset + 3] = colortable.a[region]
      }
    })
    return colors
  }
}
