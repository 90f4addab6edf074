/**
 * Fixed-arity vector of 32-bit float components describing one vertex.
 *
 * Components are rounded to float32 on construction. Equality compares the
 * float32 bit patterns, so `0` and `-0` are distinct and there is no tolerance.
 */
export class AttributeTuple {
  private readonly components: Float32Array
  private readonly bits: Uint32Array
  private cachedKey: string | undefined

  constructor(components: ArrayLike<number>) {
    if (components.length === 0) {
      throw new Error('Attribute tuple must have at least one component')
    }
    this.components = Float32Array.from(components)
    this.bits = new Uint32Array(this.components.buffer)
  }

  static of(...components: number[]): AttributeTuple {
    return new AttributeTuple(components)
  }

  get arity(): number {
    return this.components.length
  }

  /**
   * Component at position `i` (0-based)
   */
  get(i: number): number {
    if (!Number.isInteger(i) || i < 0 || i >= this.components.length) {
      throw new RangeError(`Component ${i} out of range for arity ${this.components.length}`)
    }
    return this.components[i]
  }

  equals(other: AttributeTuple): boolean {
    if (other.bits.length !== this.bits.length) return false
    for (let i = 0; i < this.bits.length; i++) {
      if (this.bits[i] !== other.bits[i]) return false
    }
    return true
  }

  /**
   * Lookup key built from the exact bit pattern of every component.
   * Equal keys if and only if `equals` holds.
   */
  key(): string {
    if (this.cachedKey === undefined) {
      this.cachedKey = Array.from(this.bits, (b) => b.toString(16)).join(':')
    }
    return this.cachedKey
  }

  /**
   * Copy the components into `target` starting at `offset`
   */
  writeTo(target: Float32Array, offset: number): void {
    target.set(this.components, offset)
  }

  toArray(): number[] {
    return Array.from(this.components)
  }
}
