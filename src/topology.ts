/**
 * Graph operations over triangle meshes: adjacency in three equivalent
 * representations, k-ring neighborhoods, neighbor smoothing of per-vertex
 * data, and induced submeshes with mapping of their data back to the full mesh.
 */

import { ContractError } from './errors'
import { Mesh, MeshUtils } from './mesh'

/**
 * Neighbors per vertex, ascending, without the vertex itself
 */
export type AdjacencyList = number[][]

/**
 * Dense symmetric matrix, one row per vertex; 1 where two vertices share an edge
 */
export type AdjacencyMatrix = Uint8Array[]

/**
 * Directed mesh edges. Every triangle edge appears as both (i, j) and (j, i).
 */
export class EdgeSet implements Iterable<[number, number]> {
  private readonly keys = new Set<number>()

  constructor(readonly numVertices: number) { }

  private key(i: number, j: number): number {
    return i * this.numVertices + j
  }

  add(i: number, j: number): void {
    this.keys.add(this.key(i, j))
  }

  has(i: number, j: number): boolean {
    return this.keys.has(this.key(i, j))
  }

  get size(): number {
    return this.keys.size
  }

  /**
   * Pairs ordered by first then second vertex
   */
  *[Symbol.iterator](): Iterator<[number, number]> {
    const sorted = Array.from(this.keys).sort((a, b) => a - b)
    for (const key of sorted) {
      yield [Math.floor(key / this.numVertices), key % this.numVertices]
    }
  }
}

/**
 * Result of cutting a submesh out of a larger mesh
 */
export interface Submesh {
  /**
   * Original vertex index to submesh vertex index
   */
  mapping: Map<number, number>

  submesh: Mesh
}

export class TopologyUtils {
  /**
   * Visit every triangle edge once per direction it appears in a face
   *
   * @throws ContractError if a face refers to a vertex the mesh does not have
   */
  private static forEachEdge(mesh: Mesh, visit: (i: number, j: number) => void): void {
    const { faces } = mesh
    const n = MeshUtils.numVertices(mesh)
    for (let i = 0; i < faces.length; i++) {
      if (faces[i] >= n) {
        throw new ContractError(`face index ${faces[i]} at position ${i} is outside a mesh with ${n} vertices`)
      }
    }
    for (let f = 0; f < faces.length; f += 3) {
      const a = faces[f]
      const b = faces[f + 1]
      const c = faces[f + 2]
      visit(a, b)
      visit(b, c)
      visit(c, a)
    }
  }

  /**
   * Dense adjacency matrix. Needs n^2 bytes, so keep it to modest meshes.
   */
  static adjacencyMatrix(mesh: Mesh): AdjacencyMatrix {
    const n = MeshUtils.numVertices(mesh)
    const matrix: AdjacencyMatrix = Array.from({ length: n }, () => new Uint8Array(n))
    TopologyUtils.forEachEdge(mesh, (i, j) => {
      matrix[i][j] = 1
      matrix[j][i] = 1
    })
    return matrix
  }

  /**
   * Edge set with both directions of every triangle edge. Memory grows with
   * the number of edges rather than the square of the vertex count.
   */
  static edgeSet(mesh: Mesh): EdgeSet {
    const edges = new EdgeSet(MeshUtils.numVertices(mesh))
    TopologyUtils.forEachEdge(mesh, (i, j) => {
      edges.add(i, j)
      edges.add(j, i)
    })
    return edges
  }

  /**
   * Neighbor list per vertex
   *
   * @param viaMatrix Build through the dense matrix (faster on small meshes)
   * rather than the edge set (smaller on large ones). Both give the same result.
   */
  static adjacencyList(mesh: Mesh, viaMatrix: boolean = true): AdjacencyList {
    const n = MeshUtils.numVertices(mesh)
    const adjacency: AdjacencyList = Array.from({ length: n }, () => [])

    if (viaMatrix) {
      const matrix = TopologyUtils.adjacencyMatrix(mesh)
      for (let i = 0; i < n; i++) {
        const row = matrix[i]
        for (let j = 0; j < n; j++) {
          if (row[j] && i !== j) {
            adjacency[i].push(j)
          }
        }
      }
    } else {
      for (const [i, j] of TopologyUtils.edgeSet(mesh)) {
        if (i !== j) {
          adjacency[i].push(j)
        }
      }
    }

    return adjacency
  }

  /**
   * Replace each vertex's neighbors with every vertex reachable within `k` hops, excluding itself
   *
   * @returns `adjacency` itself for k = 0, a new list otherwise
   */
  static expandNeighborhood(adjacency: AdjacencyList, k: number): AdjacencyList {
    if (!Number.isInteger(k) || k < 0) {
      throw new ContractError(`neighborhood size must be a non-negative integer, got ${k}`)
    }
    if (k === 0) {
      return adjacency
    }

    return adjacency.map((_, start) => {
      const reached = new Set<number>([start])
      let frontier = [start]
      for (let hop = 0; hop < k && frontier.length > 0; hop++) {
        const next: number[] = []
        for (const v of frontier) {
          for (const u of adjacency[v]) {
            if (!reached.has(u)) {
              reached.add(u)
              next.push(u)
            }
          }
        }
        frontier = next
      }
      reached.delete(start)
      return Array.from(reached).sort((a, b) => a - b)
    })
  }

  /**
   * Nearest-neighbor smoothing, repeated `iterations` times. Each pass reads
   * only the previous pass's values:
   *
   *   new[v] = old[v] + sum(old[u] for u in adj[v]) / (|adj[v]| + 1)
   *
   * The weights do not sum to 1; magnitudes grow with every pass. NaN spreads
   * to the neighbors of a NaN vertex one ring per pass.
   */
  static smoothPerVertexData(
    adjacency: AdjacencyList,
    data: ArrayLike<number>,
    iterations: number
  ): Float32Array {
    if (adjacency.length !== data.length) {
      throw new ContractError(
        `adjacency covers ${adjacency.length} vertices but the data has ${data.length} values`
      )
    }
    if (!Number.isInteger(iterations) || iterations < 0) {
      throw new ContractError(`iteration count must be a non-negative integer, got ${iterations}`)
    }

    let current = Float32Array.from(data)
    for (let iteration = 0; iteration < iterations; iteration++) {
      const next = new Float32Array(current.length)
      for (let v = 0; v < current.length; v++) {
        const neighbors = adjacency[v]
        let sum = 0
        for (const u of neighbors) {
          sum += current[u]
        }
        next[v] = current[v] + sum / (neighbors.length + 1)
      }
      current = next
    }
    return current
  }

  /**
   * Smooth per-vertex data over the mesh's own adjacency
   */
  static smoothMeshData(mesh: Mesh, data: ArrayLike<number>, iterations: number): Float32Array {
    return TopologyUtils.smoothPerVertexData(TopologyUtils.adjacencyList(mesh), data, iterations)
  }

  /**
   * Induced submesh on the vertices in `keep`.
   *
   * Submesh vertex i is original vertex `keep[i]`. Only faces with all three
   * corners in `keep` survive; faces touching the set with one or two corners
   * are dropped.
   */
  static submeshByVertices(mesh: Mesh, keep: ArrayLike<number>): Submesh {
    const n = MeshUtils.numVertices(mesh)
    const mapping = new Map<number, number>()
    const vertices = new Float32Array(keep.length * 3)

    for (let i = 0; i < keep.length; i++) {
      const original = keep[i]
      if (!Number.isInteger(original) || original < 0 || original >= n) {
        throw new ContractError(`vertex ${original} is outside a mesh with ${n} vertices`)
      }
      if (mapping.has(original)) {
        throw new ContractError(`vertex ${original} is listed more than once`)
      }
      mapping.set(original, i)
      vertices.set(mesh.vertices.subarray(original * 3, original * 3 + 3), i * 3)
    }

    const faces: number[] = []
    const { faces: originalFaces } = mesh
    for (let f = 0; f < originalFaces.length; f += 3) {
      const a = mapping.get(originalFaces[f])
      const b = mapping.get(originalFaces[f + 1])
      const c = mapping.get(originalFaces[f + 2])
      if (a !== undefined && b !== undefined && c !== undefined) {
        faces.push(a, b, c)
      }
    }

    return { mapping, submesh: { vertices, faces: Uint32Array.from(faces) } }
  }

  /**
   * Spread per-vertex data of a submesh back over the original mesh; vertices
   * outside the submesh get NaN
   */
  static restoreToOriginalMesh(
    submeshData: ArrayLike<number>,
    mapping: Map<number, number>,
    numOriginalVertices: number
  ): Float32Array {
    const restored = new Float32Array(numOriginalVertices).fill(NaN)
    for (const [original, sub] of mapping) {
      if (original < 0 || original >= numOriginalVertices) {
        throw new ContractError(
          `mapping references vertex ${original}, outside a mesh with ${numOriginalVertices} vertices`
        )
      }
      if (sub < 0 || sub >= submeshData.length) {
        throw new ContractError(`mapping references submesh vertex ${sub}, but the data has ${submeshData.length} values`)
      }
      restored[original] = submeshData[sub]
    }
    return restored
  }
}
