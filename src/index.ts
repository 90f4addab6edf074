/**
 * Indexed-array library
 *
 * Converts OBJ/MTL meshes into deduplicated vertex + index buffers and the
 * binary IA artifact format, and reads those artifacts back.
 */

export { AttributeTuple } from './attribute-tuple'
export { IndexedArrayBuilder } from './indexed-array'
export { IndexedArrayUtils } from './array'
export { IndexedArrayConstants, ExportConstants } from './constants'
export { assembleMesh, parseMaterialLibrary, normalizeTexturePath } from './assembly'
export type { AssembledMesh, AssembleOptions } from './assembly'
export { parseDirectives } from './directives'
export type { Directive } from './directives'
export { buildArtifacts, describeArray } from './model'
export type { ModelArtifact } from './model'
export { mergeDescriptor, parseDescriptor, formatDescriptor, modelDescriptorSchema } from './descriptor'
export type { ModelDescriptor, DescriptorUpdate, DrawEntry } from './descriptor'
export { exportModel } from './exporter'
export type { ExportOptions, ExportResult } from './exporter'
export { convertToBufferGeometry, normalizePositions } from './converter'
export { ZipUtils } from './utils/zipUtils'
export type { LoadedModel } from './utils/zipUtils'
export { consoleLogger, silentLogger } from './common'
export type { Logger, MaterialLibraryResolver, SourceLocation } from './common'
export * from './errors'
export type { IndexedArray, IndexedArrayHeader, ConvertGeometryOptions } from './types'
