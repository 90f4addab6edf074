import * as THREE from 'three';
import { IndexedArrayConstants } from './constants';
import type { ConvertGeometryOptions, IndexedArray } from './types';

/**
 * Converts a decoded indexed array to a THREE.js BufferGeometry
 *
 * Arity 8 arrays become interleaved position/uv/normal attributes over one
 * buffer. Any other arity of at least 3 exposes its first three components as
 * the position.
 *
 * @param array The decoded indexed array
 * @param options Options for the conversion
 * @returns THREE.js BufferGeometry
 */
export function convertToBufferGeometry(
  array: IndexedArray,
  options: ConvertGeometryOptions = {}
): THREE.BufferGeometry {
  const { arity } = array;
  if (arity < 3) {
    throw new Error(`Cannot build a geometry from arity ${arity}: positions need 3 components`);
  }

  // Set default options
  const opts = {
    normalize: false,
    computeNormals: false,
    ...options
  };

  const geometry = new THREE.BufferGeometry();
  const vertices = opts.normalize ? normalizePositions(array.vertices, arity) : array.vertices;

  if (arity === 3) {
    geometry.setAttribute('position', new THREE.BufferAttribute(vertices, 3));
  } else {
    const buffer = new THREE.InterleavedBuffer(vertices, arity);
    geometry.setAttribute('position', new THREE.InterleavedBufferAttribute(buffer, 3, 0));

    if (arity === IndexedArrayConstants.MATERIAL_ARITY) {
      geometry.setAttribute('uv', new THREE.InterleavedBufferAttribute(buffer, 2, 3));
      geometry.setAttribute('normal', new THREE.InterleavedBufferAttribute(buffer, 3, 5));
    }
  }

  geometry.setIndex(new THREE.BufferAttribute(array.indices, 1));

  if (!geometry.getAttribute('normal') && opts.computeNormals) {
    geometry.computeVertexNormals();
  }

  return geometry;
}

/**
 * Scales the positions of an interleaved vertex array to fit within a unit
 * cube centered at the origin. Other components are copied unchanged.
 *
 * @param vertices Flattened vertices
 * @param arity Components per vertex; positions are the first three
 * @returns A normalized copy
 */
export function normalizePositions(vertices: Float32Array, arity: number): Float32Array {
  // Find the bounding box
  let minX = Infinity, minY = Infinity, minZ = Infinity;
  let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;

  for (let i = 0; i < vertices.length; i += arity) {
    minX = Math.min(minX, vertices[i]);
    minY = Math.min(minY, vertices[i + 1]);
    minZ = Math.min(minZ, vertices[i + 2]);

    maxX = Math.max(maxX, vertices[i]);
    maxY = Math.max(maxY, vertices[i + 1]);
    maxZ = Math.max(maxZ, vertices[i + 2]);
  }

  const centerX = (minX + maxX) / 2;
  const centerY = (minY + maxY) / 2;
  const centerZ = (minZ + maxZ) / 2;

  // A single point or an empty array has no extent
  const extent = Math.max(maxX - minX, maxY - minY, maxZ - minZ);
  const maxSize = extent > 0 ? extent : 1;

  const normalized = Float32Array.from(vertices);
  for (let i = 0; i < normalized.length; i += arity) {
    normalized[i] = (vertices[i] - centerX) / maxSize;
    normalized[i + 1] = (vertices[i + 1] - centerY) / maxSize;
    normalized[i + 2] = (vertices[i + 2] - centerZ) / maxSize;
  }

  return normalized;
}
