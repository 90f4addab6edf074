import { IndexedArrayUtils } from './array'
import type { AssembledMesh } from './assembly'
import { ExportConstants } from './constants'
import type { IndexedArray } from './types'

/**
 * One encoded artifact of a model
 */
export interface ModelArtifact {
  /**
   * Material name, or undefined for the collision mesh
   */
  material?: string

  /**
   * Path relative to the export directory, e.g. "crate/wood.ia8"
   */
  path: string

  array: IndexedArray

  data: Uint8Array
}

/**
 * Finish every builder of an assembled mesh and encode it.
 * Material artifacts come first, in activation order, then the collision artifact.
 *
 * @param mesh Assembled builders
 * @param modelName Name of the data directory the artifacts live in
 */
export function buildArtifacts(mesh: AssembledMesh, modelName: string): ModelArtifact[] {
  const artifacts: ModelArtifact[] = []

  for (const [material, builder] of mesh.materials) {
    const array = builder.finish()
    artifacts.push({
      material,
      path: ExportConstants.materialPath(modelName, material),
      array,
      data: IndexedArrayUtils.encode(array)
    })
  }

  const collision = mesh.collision.finish()
  artifacts.push({
    path: ExportConstants.collisionPath(modelName),
    array: collision,
    data: IndexedArrayUtils.encode(collision)
  })

  return artifacts
}

/**
 * Summary line for an artifact, e.g. "3 vertices, 5 indices (each vertex used 1.7 times in avg)"
 */
export function describeArray(array: IndexedArray): string {
  const vertexCount = array.vertices.length / array.arity
  const indexCount = array.indices.length
  const reuse = vertexCount > 0 ? indexCount / vertexCount : 0
  return `${vertexCount} vertices, ${indexCount} indices (each vertex used ${reuse.toFixed(1)} times in avg)`
}
