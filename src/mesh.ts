import * as THREE from 'three'
import { ConsistencyError, ContractError } from './errors'


/**
 * Triangle mesh with flat vertex and face arrays
 */
export interface Mesh {
  /**
   * Vertex coordinates, x, y, z per vertex
   */
  vertices: Float32Array

  /**
   * Vertex indices, three per triangle
   */
  faces: Uint32Array
}

/**
 * Options for converting a mesh to a THREE.js geometry
 */
export interface BufferGeometryOptions {
  /**
   * Whether to normalize the mesh to fit within a unit cube
   * @default false
   */
  normalize?: boolean

  /**
   * Whether to compute vertex normals
   * @default false
   */
  computeNormals?: boolean

  /**
   * Per-vertex colors, 3 (RGB) or 4 (RGBA) bytes per vertex,
   * e.g. from `AnnotUtils.vertexColors`
   */
  colors?: Uint8Array
}

/**
 * Utility class for mesh operations
 */
export class MeshUtils {

  /**
   * Build a mesh from coordinate and index arrays, checking that both are
   * flat triples and that every face index refers to an existing vertex.
   */
  static create(vertices: ArrayLike<number>, faces: ArrayLike<number>): Mesh {
    if (vertices.length % 3 !== 0) {
      throw new ConsistencyError(`vertex array length ${vertices.length} is not a multiple of 3`)
    }
    if (faces.length % 3 !== 0) {
      throw new ConsistencyError(`face array length ${faces.length} is not a multiple of 3`)
    }
    const numVertices = vertices.length / 3
    for (let i = 0; i < faces.length; i++) {
      const index = faces[i]
      if (!Number.isInteger(index) || index < 0 || index >= numVertices) {
        throw new ConsistencyError(`face index ${index} at position ${i} is outside [0, ${numVertices})`)
      }
    }
    return {
      vertices: Float32Array.from(vertices),
      faces: Uint32Array.from(faces)
    }
  }

  static numVertices(mesh: Mesh): number {
    return mesh.vertices.length / 3
  }

  static numFaces(mesh: Mesh): number {
    return mesh.faces.length / 3
  }

  /**
   * Coordinate `axis` (0 = x, 1 = y, 2 = z) of vertex `vertex`
   */
  static vertexAt(mesh: Mesh, vertex: number, axis: number): number {
    if (vertex < 0 || vertex >= MeshUtils.numVertices(mesh) || axis < 0 || axis > 2) {
      throw new ContractError(
        `vertex coordinate (${vertex}, ${axis}) is out of range for a mesh with ${MeshUtils.numVertices(mesh)} vertices`
      )
    }
    return mesh.vertices[vertex * 3 + axis]
  }

  /**
   * Vertex index at `corner` (0 to 2) of face `face`
   */
  static faceAt(mesh: Mesh, face: number, corner: number): number {
    if (face < 0 || face >= MeshUtils.numFaces(mesh) || corner < 0 || corner > 2) {
      throw new ContractError(
        `face corner (${face}, ${corner}) is out of range for a mesh with ${MeshUtils.numFaces(mesh)} faces`
      )
    }
    return mesh.faces[face * 3 + corner]
  }

  /**
   * Unit cube with corners at 0 and 1.
   *
   * Each square side is split along the diagonal through corner 0 or through
   * the opposite corner 6, so those two have six neighbors and the rest four.
   */
  static constructCube(): Mesh {
    return {
      vertices: new Float32Array([
        0, 0, 0,
        1, 0, 0,
        1, 1, 0,
        0, 1, 0,
        0, 0, 1,
        1, 0, 1,
        1, 1, 1,
        0, 1, 1
      ]),
      faces: new Uint32Array([
        0, 2, 1, 0, 3, 2,  // z = 0
        0, 1, 5, 0, 5, 4,  // y = 0
        0, 4, 7, 0, 7, 3,  // x = 0
        6, 7, 4, 6, 4, 5,  // z = 1
        6, 2, 3, 6, 3, 7,  // y = 1
        6, 5, 1, 6, 1, 2   // x = 1
      ])
    }
  }

  /**
   * Square pyramid: four base corners in the z = 0 plane and an apex above their center
   */
  static constructPyramid(): Mesh {
    return {
      vertices: new Float32Array([
        0, 0, 0,
        1, 0, 0,
        1, 1, 0,
        0, 1, 0,
        0.5, 0.5, 1
      ]),
      faces: new Uint32Array([
        0, 2, 1, 0, 3, 2,  // base
        0, 1, 4,
        1, 2, 4,
        2, 3, 4,
        3, 0, 4
      ])
    }
  }

  /**
   * Flat grid of `nx` by `ny` vertices in the z = 0 plane, each cell split into two triangles.
   * Vertex `x + y * nx` sits at `(x * distX, y * distY, 0)`.
   */
  static constructGrid(nx: number = 4, ny: number = 5, distX: number = 1, distY: number = 1): Mesh {
    if (nx < 2 || ny < 2) {
      throw new ContractError(`a grid needs at least 2 vertices per side, got ${nx} x ${ny}`)
    }

    const vertices = new Float32Array(nx * ny * 3)
    for (let y = 0; y < ny; y++) {
      for (let x = 0; x < nx; x++) {
        const v = (x + y * nx) * 3
        vertices[v] = x * distX
        vertices[v + 1] = y * distY
        vertices[v + 2] = 0
      }
    }

    const faces = new Uint32Array((nx - 1) * (ny - 1) * 6)
    let f = 0
    for (let y = 0; y < ny - 1; y++) {
      for (let x = 0; x < nx - 1; x++) {
        const corner = x + y * nx
        faces.set([corner, corner + 1, corner + nx + 1], f)
        faces.set([corner, corner + nx + 1, corner + nx], f + 3)
        f += 6
      }
    }

    return { vertices, faces }
  }

  /**
   * Converts a mesh to a THREE.js BufferGeometry
   *
   * @param mesh The mesh to convert
   * @param options Options for the conversion
   * @returns THREE.js BufferGeometry
   */
  static convertToBufferGeometry(
    mesh: Mesh,
    options: BufferGeometryOptions = {}
  ): THREE.BufferGeometry {
    const geometry = new THREE.BufferGeometry()

    // Set default options
    const opts = {
      normalize: false,
      computeNormals: false,
      ...options
    }

    const vertices = opts.normalize ? MeshUtils.normalizeVertices(mesh.vertices) : mesh.vertices
    geometry.setAttribute('position', new THREE.BufferAttribute(vertices, 3))

    if (mesh.faces.length > 0) {
      geometry.setIndex(new THREE.BufferAttribute(mesh.faces, 1))
    }

    if (opts.computeNormals) {
      geometry.computeVertexNormals()
    }

    if (opts.colors) {
      const numVertices = MeshUtils.numVertices(mesh)
      const itemSize = opts.colors.length / numVertices
      if (itemSize !== 3 && itemSize !== 4) {
        throw new ContractError(
          `expected 3 or 4 color bytes per vertex for ${numVertices} vertices, got ${opts.colors.length} bytes`
        )
      }
      // Normalized: bytes 0-255 map to 0-1 in the shader
      geometry.setAttribute('color', new THREE.BufferAttribute(opts.colors, itemSize, true))
    }

    return geometry
  }

  /**
   * Normalizes vertices to fit within a unit cube centered at the origin
   *
   * @param vertices The vertices to normalize
   * @returns Normalized vertices
   */
  static normalizeVertices(vertices: Float32Array): Float32Array {
    // Find the bounding box
    let minX = Infinity, minY = Infinity, minZ = Infinity
    let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity

    for (let i = 0; i < vertices.length; i += 3) {
      minX = Math.min(minX, vertices[i])
      minY = Math.min(minY, vertices[i + 1])
      minZ = Math.min(minZ, vertices[i + 2])

      maxX = Math.max(maxX, vertices[i])
      maxY = Math.max(maxY, vertices[i + 1])
      maxZ = Math.max(maxZ, vertices[i + 2])
    }

    const centerX = (minX + maxX) / 2
    const centerY = (minY + maxY) / 2
    const centerZ = (minZ + maxZ) / 2

    // A single point has no extent; leave it at the origin rather than dividing by zero
    const maxSize = Math.max(maxX - minX, maxY - minY, maxZ - minZ) || 1

    const normalizedVertices = new Float32Array(vertices.length)
    for (let i = 0; i < vertices.length; i += 3) {
      normalizedVertices[i] = (vertices[i] - centerX) / maxSize
      normalizedVertices[i + 1] = (vertices[i + 1] - centerY) / maxSize
      normalizedVertices[i + 2] = (vertices[i + 2] - centerZ) / maxSize
    }

    return normalizedVertices
  }
}
