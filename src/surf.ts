import { BufferByteSink, BufferByteSource, ByteSink, ByteSource } from './byte-source'
import { FormatConstants } from './constants'
import { EndianReader, EndianWriter } from './endian'
import { MagicNumberError } from './errors'
import { Mesh } from './mesh'

/**
 * Reader and writer for binary triangle surface files.
 *
 * Layout: 24-bit magic, a creator line and a comment line (both newline
 * terminated), vertex and face counts, then the vertex coordinates as floats
 * and the face indices as 32-bit integers.
 */
export class SurfUtils {
  /**
   * Read a triangle surface.
   *
   * Face indices are returned as stored; checking them against the vertex
   * count is left to the consumer (see `MeshUtils.create`); the topology
   * operations reject out-of-range faces.
   *
   * @throws MagicNumberError if the file is not a triangle surface
   * @throws ConsistencyError if a stored count is negative
   */
  static read(source: ByteSource): Mesh {
    const reader = new EndianReader(source)

    const magic = reader.readInt24()
    if (magic !== FormatConstants.SURF_MAGIC) {
      throw new MagicNumberError(FormatConstants.SURF_MAGIC, magic, 'surf')
    }

    // Creator and comment lines carry nothing we keep
    reader.readLine()
    reader.readLine()

    const numVertices = reader.readCount('surf vertex count')
    const numFaces = reader.readCount('surf face count')

    const vertices = reader.readFloat32Array(numVertices * 3)
    const faces = new Uint32Array(reader.readInt32Array(numFaces * 3))

    return { vertices, faces }
  }

  static write(sink: ByteSink, mesh: Mesh): void {
    const writer = new EndianWriter(sink)
    writer.writeInt24(FormatConstants.SURF_MAGIC)
    writer.writeLine(FormatConstants.SURF_CREATOR)
    writer.writeLine('')
    writer.writeInt32(mesh.vertices.length / 3)
    writer.writeInt32(mesh.faces.length / 3)
    writer.writeFloat32Array(mesh.vertices)
    writer.writeInt32Array(mesh.faces)
  }

  static decode(bytes: Uint8Array | ArrayBuffer): Mesh {
    return SurfUtils.read(new BufferByteSource(bytes))
  }

  static encode(mesh: Mesh): Uint8Array {
    const sink = new BufferByteSink()
    SurfUtils.write(sink, mesh)
    return sink.toUint8Array()
  }
}
