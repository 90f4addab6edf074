import { IndexedArrayConstants } from "./constants"
import { MalformedArtifactError } from "./errors"
import type { IndexedArray, IndexedArrayHeader } from "./types"

const ASCII_ZERO = 0x30

/**
 * Utility class for encoding and decoding indexed-array artifacts.
 *
 * Layout (all numbers little-endian):
 *   16 bytes - "IA" + arity digit, 0x00 terminator, 12 reserved zero bytes
 *    4 bytes - vertex count (uint32)
 *    N bytes - vertex_count * arity float32 components
 *    4 bytes - index count (uint32)
 *    N bytes - index_count uint32 indices
 */
export class IndexedArrayUtils {
  /**
   * Encodes an indexed array into an artifact
   *
   * @param array Finished indexed array
   * @returns Artifact bytes
   */
  static encode(array: IndexedArray): Uint8Array {
    const { arity, vertices, indices } = array

    if (!Number.isInteger(arity) || arity < 1 || arity > 9) {
      throw new Error(`Arity must be a single digit between 1 and 9, got ${arity}`)
    }
    if (vertices.length % arity !== 0) {
      throw new Error(`Vertex data length ${vertices.length} is not a multiple of arity ${arity}`)
    }

    const vertexCount = vertices.length / arity
    const buffer = new ArrayBuffer(
      IndexedArrayConstants.encodedSize(arity, vertexCount, indices.length)
    )
    const view = new DataView(buffer)

    // Magic number; terminator and reserved bytes stay zero
    const prefix = IndexedArrayConstants.MAGIC_PREFIX
    view.setUint8(0, prefix.charCodeAt(0))
    view.setUint8(1, prefix.charCodeAt(1))
    view.setUint8(2, ASCII_ZERO + arity)

    let offset = IndexedArrayConstants.VERTEX_COUNT_OFFSET

    // Vertices block
    view.setUint32(offset, vertexCount, true)
    offset += IndexedArrayConstants.COUNT_SIZE
    for (let i = 0; i < vertices.length; i++) {
      view.setFloat32(offset, vertices[i], true)
      offset += IndexedArrayConstants.ELEMENT_SIZE
    }

    // Indices block
    view.setUint32(offset, indices.length, true)
    offset += IndexedArrayConstants.COUNT_SIZE
    for (let i = 0; i < indices.length; i++) {
      view.setUint32(offset, indices[i], true)
      offset += IndexedArrayConstants.ELEMENT_SIZE
    }

    return new Uint8Array(buffer)
  }

  /**
   * Reads and validates the header fields of an artifact
   *
   * @param data Artifact bytes
   * @returns Arity and block counts
   */
  static readHeader(data: Uint8Array): IndexedArrayHeader {
    const minimum = IndexedArrayConstants.encodedSize(1, 0, 0)
    if (data.byteLength < minimum) {
      throw new MalformedArtifactError(
        `Artifact is ${data.byteLength} bytes, shorter than the ${minimum} byte minimum`
      )
    }

    const prefix = IndexedArrayConstants.MAGIC_PREFIX
    if (data[0] !== prefix.charCodeAt(0) || data[1] !== prefix.charCodeAt(1)) {
      throw new MalformedArtifactError('Missing "IA" magic number')
    }

    const arity = data[2] - ASCII_ZERO
    if (arity < 1 || arity > 9) {
      throw new MalformedArtifactError(`Invalid arity byte 0x${data[2].toString(16)}`)
    }

    for (let i = 3; i < IndexedArrayConstants.HEADER_SIZE; i++) {
      if (data[i] !== 0) {
        throw new MalformedArtifactError(`Header byte ${i} must be zero`)
      }
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength)
    const vertexCount = view.getUint32(IndexedArrayConstants.VERTEX_COUNT_OFFSET, true)

    const indexCountOffset = IndexedArrayConstants.VERTEX_COUNT_OFFSET
      + IndexedArrayConstants.COUNT_SIZE
      + vertexCount * arity * IndexedArrayConstants.ELEMENT_SIZE
    if (indexCountOffset + IndexedArrayConstants.COUNT_SIZE > data.byteLength) {
      throw new MalformedArtifactError(
        `Artifact truncated: ${vertexCount} vertices do not fit in ${data.byteLength} bytes`
      )
    }
    const indexCount = view.getUint32(indexCountOffset, true)

    const expected = IndexedArrayConstants.encodedSize(arity, vertexCount, indexCount)
    if (expected !== data.byteLength) {
      throw new MalformedArtifactError(
        `Artifact is ${data.byteLength} bytes, expected ${expected}`
      )
    }

    return { arity, vertex_count: vertexCount, index_count: indexCount }
  }

  /**
   * Decodes an artifact back into an indexed array
   *
   * @param data Artifact bytes
   * @returns Indexed array with the exact encoded components and indices
   */
  static decode(data: Uint8Array): IndexedArray {
    const header = IndexedArrayUtils.readHeader(data)
    const view = new DataView(data.buffer, data.byteOffset, data.byteLength)

    let offset = IndexedArrayConstants.VERTEX_COUNT_OFFSET + IndexedArrayConstants.COUNT_SIZE

    const vertices = new Float32Array(header.vertex_count * header.arity)
    for (let i = 0; i < vertices.length; i++) {
      vertices[i] = view.getFloat32(offset, true)
      offset += IndexedArrayConstants.ELEMENT_SIZE
    }

    offset += IndexedArrayConstants.COUNT_SIZE

    const indices = new Uint32Array(header.index_count)
    for (let i = 0; i < indices.length; i++) {
      const index = view.getUint32(offset, true)
      if (index >= header.vertex_count) {
        throw new MalformedArtifactError(
          `Index ${index} at position ${i} out of range (${header.vertex_count} vertices)`
        )
      }
      indices[i] = index
      offset += IndexedArrayConstants.ELEMENT_SIZE
    }

    return { arity: header.arity, vertices, indices }
  }
}
