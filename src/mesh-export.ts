import { ContractError } from './errors'
import { Mesh, MeshUtils } from './mesh'

/**
 * Text exports of a mesh for viewers such as MeshLab or Blender
 */
export class MeshExportUtils {
  /**
   * Wavefront OBJ; face indices are 1-based
   */
  static toObj(mesh: Mesh): string {
    const lines: string[] = []
    for (let v = 0; v < mesh.vertices.length; v += 3) {
      lines.push(`v ${mesh.vertices[v]} ${mesh.vertices[v + 1]} ${mesh.vertices[v + 2]}`)
    }
    for (let f = 0; f < mesh.faces.length; f += 3) {
      lines.push(`f ${mesh.faces[f] + 1} ${mesh.faces[f + 1] + 1} ${mesh.faces[f + 2] + 1}`)
    }
    return lines.join('\n') + '\n'
  }

  /**
   * Object File Format
   */
  static toOff(mesh: Mesh): string {
    const lines = ['OFF', `${MeshUtils.numVertices(mesh)} ${MeshUtils.numFaces(mesh)} 0`]
    for (let v = 0; v < mesh.vertices.length; v += 3) {
      lines.push(`${mesh.vertices[v]} ${mesh.vertices[v + 1]} ${mesh.vertices[v + 2]}`)
    }
    for (let f = 0; f < mesh.faces.length; f += 3) {
      lines.push(`3 ${mesh.faces[f]} ${mesh.faces[f + 1]} ${mesh.faces[f + 2]}`)
    }
    return lines.join('\n') + '\n'
  }

  /**
   * ASCII PLY, optionally with per-vertex colors
   *
   * @param colors RGB or RGBA bytes per vertex, e.g. from `AnnotUtils.vertexColors`
   */
  static toPly(mesh: Mesh, colors?: Uint8Array): string {
    const numVertices = MeshUtils.numVertices(mesh)
    let channels = 0
    if (colors) {
      channels = colors.length / numVertices
      if (channels !== 3 && channels !== 4) {
        throw new ContractError(
          `expected 3 or 4 color bytes per vertex for ${numVertices} vertices, got ${colors.length} bytes`
        )
      }
    }

    const lines = [
      'ply',
      'format ascii 1.0',
      `element vertex ${numVertices}`,
      'property float x',
      'property float y',
      'property float z'
    ]
    const channelNames = ['red', 'green', 'blue', 'alpha'].slice(0, channels)
    for (const name of channelNames) {
      lines.push(`property uchar ${name}`)
    }
    lines.push(
      `element face ${MeshUtils.numFaces(mesh)}`,
      'property list uchar int vertex_indices',
      'end_header'
    )

    for (let v = 0; v < numVertices; v++) {
      const position = `${mesh.vertices[v * 3]} ${mesh.vertices[v * 3 + 1]} ${mesh.vertices[v * 3 + 2]}`
      if (colors && channels > 0) {
        const color = Array.from(colors.subarray(v * channels, (v + 1) * channels)).join(' ')
        lines.push(`${position} ${color}`)
      } else {
        lines.push(position)
      }
    }
    for (let f = 0; f < mesh.faces.length; f += 3) {
      lines.push(`3 ${mesh.faces[f]} ${mesh.faces[f + 1]} ${mesh.faces[f + 2]}`)
    }
    return lines.join('\n') + '\n'
  }
}
