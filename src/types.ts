/**
 * Types for the indexed-array library
 */

/**
 * A finished indexed array: unique vertices plus the index sequence that
 * reconstructs the original per-corner stream
 */
export interface IndexedArray {
  /**
   * Number of float32 components per vertex
   */
  arity: number

  /**
   * Unique vertices, flattened, `arity` components each, in first-occurrence order
   */
  vertices: Float32Array

  /**
   * One entry per submitted tuple, each `< vertices.length / arity`
   */
  indices: Uint32Array
}

/**
 * Header fields of an encoded artifact
 */
export interface IndexedArrayHeader {
  arity: number
  vertex_count: number
  index_count: number
}

/**
 * Options for converting an indexed array to a THREE.js geometry
 */
export interface ConvertGeometryOptions {
  /**
   * Whether to normalize positions to fit within a unit cube
   * @default false
   */
  normalize?: boolean

  /**
   * Whether to compute normals for arrays that carry none
   * @default false
   */
  computeNormals?: boolean
}
