import { AttributeTuple } from './attribute-tuple'
import type { IndexedArray } from './types'

/**
 * Builds an indexed array from a stream of attribute tuples.
 *
 * Each submitted tuple is looked up by its exact bit pattern. A tuple seen
 * before reuses the index of its first occurrence; a new one is appended, so
 * vertex order is the order in which distinct tuples first appear.
 *
 * @example
 * ```typescript
 * const builder = new IndexedArrayBuilder(3)
 * builder.submit(AttributeTuple.of(0, 0, 0))
 * builder.submit(AttributeTuple.of(1, 0, 0))
 * builder.submit(AttributeTuple.of(0, 0, 0))
 * const { vertices, indices } = builder.finish() // 2 vertices, indices [0, 1, 0]
 * ```
 */
export class IndexedArrayBuilder {
  private readonly vertices: AttributeTuple[] = []
  private readonly indices: number[] = []
  private readonly lookup = new Map<string, number>()
  private finished = false

  constructor(public readonly arity: number) {
    if (!Number.isInteger(arity) || arity < 1) {
      throw new Error(`Invalid arity ${arity}`)
    }
  }

  get vertexCount(): number {
    return this.vertices.length
  }

  get indexCount(): number {
    return this.indices.length
  }

  get isFinished(): boolean {
    return this.finished
  }

  submit(tuple: AttributeTuple): void {
    if (this.finished) {
      throw new Error('Cannot submit to a finished builder')
    }
    if (tuple.arity !== this.arity) {
      throw new Error(`Expected a tuple of arity ${this.arity}, got ${tuple.arity}`)
    }

    const key = tuple.key()
    let position = this.lookup.get(key)
    if (position === undefined) {
      position = this.vertices.length
      this.vertices.push(tuple)
      this.lookup.set(key, position)
    }
    this.indices.push(position)
  }

  /**
   * Vertex at `position` in first-occurrence order
   */
  vertexAt(position: number): AttributeTuple {
    const vertex = this.vertices[position]
    if (vertex === undefined) {
      throw new RangeError(`Vertex ${position} out of range (${this.vertices.length} vertices)`)
    }
    return vertex
  }

  /**
   * Seal the builder and flatten its state.
   * Further submissions throw; calling `finish` again returns an equal array.
   */
  finish(): IndexedArray {
    this.finished = true

    const vertices = new Float32Array(this.vertices.length * this.arity)
    this.vertices.forEach((vertex, i) => vertex.writeTo(vertices, i * this.arity))

    return {
      arity: this.arity,
      vertices,
      indices: Uint32Array.from(this.indices)
    }
  }
}
