import { describe, expect, it } from 'vitest'
import { IndexedArrayUtils } from '../array'
import { MalformedArtifactError } from '../errors'
import type { IndexedArray } from '../types'

describe('IndexedArrayUtils', () => {
  const collision: IndexedArray = {
    arity: 3,
    vertices: new Float32Array([0, 0, 0, 1, 0, 0, 0, 1, 0]),
    indices: new Uint32Array([0, 1, 0, 1, 2])
  }

  const material: IndexedArray = {
    arity: 8,
    vertices: new Float32Array([
      -0.5, 0.25, 1, 0, 1, 0, 0, -1,
      1.5, -2, 0.125, 1, 0.5, 0, 1, 0
    ]),
    indices: new Uint32Array([1, 0, 1])
  }

  it('should lay out header, vertex block and index block', () => {
    const data = IndexedArrayUtils.encode(collision)
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

    // 16 header + 4 + 3 * 3 * 4 + 4 + 5 * 4
    expect(data.byteLength).toBe(80)
    expect(Array.from(data.subarray(0, 4))).toEqual([0x49, 0x41, 0x33, 0x00])
    expect(Array.from(data.subarray(4, 16))).toEqual(new Array(12).fill(0))

    expect(view.getUint32(16, true)).toBe(3)
    // Second vertex x = 1.0f
    expect(Array.from(data.subarray(32, 36))).toEqual([0x00, 0x00, 0x80, 0x3f])

    expect(view.getUint32(56, true)).toBe(5)
    expect([60, 64, 68, 72, 76].map((offset) => view.getUint32(offset, true))).toEqual([0, 1, 0, 1, 2])
  })

  it('should write the arity digit into the magic number', () => {
    const data = IndexedArrayUtils.encode(material)

    expect(String.fromCharCode(data[0], data[1], data[2])).toBe('IA8')
    expect(data[3]).toBe(0)
    expect(data.byteLength).toBe(16 + 4 + 2 * 8 * 4 + 4 + 3 * 4)
  })

  it('should encode an empty array to header and zero counts', () => {
    const data = IndexedArrayUtils.encode({
      arity: 3,
      vertices: new Float32Array(0),
      indices: new Uint32Array(0)
    })

    expect(Array.from(data)).toEqual([
      0x49, 0x41, 0x33, 0x00,
      0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0,
      0, 0, 0, 0,
      0, 0, 0, 0
    ])
  })

  it('should encode deterministically', () => {
    expect(IndexedArrayUtils.encode(material)).toEqual(IndexedArrayUtils.encode(material))
  })

  it('should decode an encoded array exactly', () => {
    for (const array of [collision, material]) {
      const decoded = IndexedArrayUtils.decode(IndexedArrayUtils.encode(array))

      expect(decoded.arity).toBe(array.arity)
      expect(decoded.vertices).toEqual(array.vertices)
      expect(decoded.indices).toEqual(array.indices)
    }
  })

  it('should decode from a view into a larger buffer', () => {
    const encoded = IndexedArrayUtils.encode(collision)
    const padded = new Uint8Array(encoded.byteLength + 8)
    padded.set(encoded, 5)

    const decoded = IndexedArrayUtils.decode(padded.subarray(5, 5 + encoded.byteLength))

    expect(Array.from(decoded.indices)).toEqual([0, 1, 0, 1, 2])
  })

  it('should reject arities that do not fit one digit', () => {
    const array = { arity: 10, vertices: new Float32Array(0), indices: new Uint32Array(0) }

    expect(() => IndexedArrayUtils.encode(array)).toThrow('Arity must be a single digit between 1 and 9, got 10')
  })

  it('should reject vertex data that is not a multiple of the arity', () => {
    const array = { arity: 3, vertices: new Float32Array(4), indices: new Uint32Array(0) }

    expect(() => IndexedArrayUtils.encode(array)).toThrow('Vertex data length 4 is not a multiple of arity 3')
  })

  describe('decode validation', () => {
    const valid = () => IndexedArrayUtils.encode(collision)

    it('should reject short input', () => {
      expect(() => IndexedArrayUtils.decode(new Uint8Array(10))).toThrow(MalformedArtifactError)
    })

    it('should reject a wrong magic number', () => {
      const data = valid()
      data[0] = 0x58

      expect(() => IndexedArrayUtils.decode(data)).toThrow('Missing "IA" magic number')
    })

    it('should reject a non-digit arity', () => {
      const data = valid()
      data[2] = 0x41

      expect(() => IndexedArrayUtils.decode(data)).toThrow('Invalid arity byte 0x41')
    })

    it('should reject a non-zero reserved byte', () => {
      const data = valid()
      data[9] = 1

      expect(() => IndexedArrayUtils.decode(data)).toThrow('Header byte 9 must be zero')
    })

    it('should reject truncated input', () => {
      expect(() => IndexedArrayUtils.decode(valid().subarray(0, 70))).toThrow(
        'Artifact is 70 bytes, expected 80'
      )
    })

    it('should reject trailing bytes', () => {
      const data = new Uint8Array(84)
      data.set(valid())

      expect(() => IndexedArrayUtils.decode(data)).toThrow('Artifact is 84 bytes, expected 80')
    })

    it('should reject a vertex count larger than the data', () => {
      const data = valid()
      new DataView(data.buffer).setUint32(16, 1000, true)

      expect(() => IndexedArrayUtils.decode(data)).toThrow(
        'Artifact truncated: 1000 vertices do not fit in 80 bytes'
      )
    })

    it('should reject indices past the vertex count', () => {
      const data = valid()
      new DataView(data.buffer).setUint32(76, 3, true)

      expect(() => IndexedArrayUtils.decode(data)).toThrow(
        'Index 3 at position 4 out of range (3 vertices)'
      )
    })

    it('should read the header of a valid artifact', () => {
      expect(IndexedArrayUtils.readHeader(valid())).toEqual({
        arity: 3,
        vertex_count: 3,
        index_count: 5
      })
    })
  })
})
