import { AttributeTuple } from './attribute-tuple'
import { silentLogger } from './common'
import type { Logger, MaterialLibraryResolver, SourceLocation } from './common'
import { IndexedArrayConstants } from './constants'
import { parseDirectives, parseFaceCorners, parseFloats } from './directives'
import type { CornerReference, Directive } from './directives'
import {
  AttributeIndexOutOfRangeError,
  MalformedDirectiveError,
  MissingActiveMaterialError
} from './errors'
import type { AttributeKind } from './errors'
import { IndexedArrayBuilder } from './indexed-array'

/**
 * Builders and material data collected from one OBJ source
 */
export interface AssembledMesh {
  /**
   * One arity-8 builder per material, in first activation order
   */
  materials: Map<string, IndexedArrayBuilder>

  /**
   * Position-only builder across every face
   */
  collision: IndexedArrayBuilder

  /**
   * Diffuse texture per material, from the material libraries
   */
  textures: Map<string, string>

  /**
   * Material libraries referenced by `mtllib`, in file order
   */
  libraries: string[]
}

export interface AssembleOptions {
  /**
   * Name of the OBJ source, used in error locations
   * @default '<obj>'
   */
  file?: string

  /**
   * Returns the source of a library named by `mtllib`. Libraries are skipped when absent.
   */
  resolveMaterialLibrary?: MaterialLibraryResolver

  logger?: Logger
}

interface AttributeTables {
  positions: number[][]
  uvs: number[][]
  normals: number[][]
}

/**
 * Normalize backslash separators in a texture path
 */
export function normalizeTexturePath(path: string): string {
  return path.replace(/\\+/g, '/')
}

/**
 * Parse an MTL source into a map of material name to diffuse texture
 *
 * @param source MTL file contents
 * @param file Name used in error locations
 */
export function parseMaterialLibrary(source: string, file: string): Map<string, string> {
  const textures = new Map<string, string>()
  let current: string | undefined

  for (const directive of parseDirectives(source, file)) {
    if (directive.command === 'newmtl') {
      current = requireName(directive)
    } else if (directive.command === 'map_Kd') {
      if (current === undefined) {
        throw new MalformedDirectiveError('"map_Kd" before any "newmtl"', directive.location)
      }
      textures.set(current, normalizeTexturePath(requireName(directive)))
    }
  }

  return textures
}

/**
 * Route every face corner of an OBJ source to the active material's builder
 * and to the shared collision builder.
 *
 * Faces with more than three corners are fan-triangulated.
 *
 * @param source OBJ file contents
 * @param options Source name, material library resolver and logger
 */
export function assembleMesh(source: string, options: AssembleOptions = {}): AssembledMesh {
  const file = options.file ?? '<obj>'
  const logger = options.logger ?? silentLogger

  const tables: AttributeTables = { positions: [], uvs: [], normals: [] }
  const result: AssembledMesh = {
    materials: new Map(),
    collision: new IndexedArrayBuilder(IndexedArrayConstants.COLLISION_ARITY),
    textures: new Map(),
    libraries: []
  }

  let active: IndexedArrayBuilder | undefined

  for (const directive of parseDirectives(source, file)) {
    switch (directive.command) {
      case 'v':
        tables.positions.push(parseFloats(directive, 3))
        break
      case 'vt':
        tables.uvs.push(parseFloats(directive, 2))
        break
      case 'vn':
        tables.normals.push(parseFloats(directive, 3))
        break
      case 'mtllib':
        loadMaterialLibrary(directive, result, options.resolveMaterialLibrary, logger)
        break
      case 'usemtl':
        active = activateMaterial(requireName(directive), result.materials, logger, directive.location)
        break
      case 'f':
        submitFace(directive, active, tables, result.collision)
        break
      default:
        // Groups, objects, smoothing and other directives carry nothing we export
        break
    }
  }

  return result
}

function loadMaterialLibrary(
  directive: Directive,
  result: AssembledMesh,
  resolve: MaterialLibraryResolver | undefined,
  logger: Logger
): void {
  const name = requireName(directive)
  result.libraries.push(name)

  if (!resolve) {
    logger.warn(`Skipping material library "${name}": no resolver`)
    return
  }

  for (const [material, texture] of parseMaterialLibrary(resolve(name), name)) {
    result.textures.set(material, texture)
  }
}

function activateMaterial(
  name: string,
  materials: Map<string, IndexedArrayBuilder>,
  logger: Logger,
  location: SourceLocation
): IndexedArrayBuilder {
  // The name becomes an artifact file name inside the data directory
  if (/[/\\]/.test(name) || name === '.' || name === '..') {
    throw new MalformedDirectiveError(`Material name "${name}" cannot be used as a file name`, location)
  }

  let builder = materials.get(name)
  if (!builder) {
    builder = new IndexedArrayBuilder(IndexedArrayConstants.MATERIAL_ARITY)
    materials.set(name, builder)
  }
  logger.info(`Compiling material "${name}"`)
  return builder
}

function submitFace(
  directive: Directive,
  active: IndexedArrayBuilder | undefined,
  tables: AttributeTables,
  collision: IndexedArrayBuilder
): void {
  if (!active) {
    throw new MissingActiveMaterialError(directive.location)
  }

  // Resolve every corner before submitting so a bad corner leaves the builders untouched
  const corners = parseFaceCorners(directive).map((corner) =>
    resolveCorner(corner, tables, directive.location)
  )

  for (let i = 1; i < corners.length - 1; i++) {
    for (const corner of [corners[0], corners[i], corners[i + 1]]) {
      active.submit(corner.material)
      collision.submit(corner.collision)
    }
  }
}

interface ResolvedCorner {
  material: AttributeTuple
  collision: AttributeTuple
}

function resolveCorner(
  [positionIndex, uvIndex, normalIndex]: CornerReference,
  tables: AttributeTables,
  location: SourceLocation
): ResolvedCorner {
  const position = lookup('position', positionIndex, tables.positions, location)
  const uv = lookup('uv', uvIndex, tables.uvs, location)
  const normal = lookup('normal', normalIndex, tables.normals, location)

  return {
    material: new AttributeTuple([...position, ...uv, ...normal]),
    collision: new AttributeTuple(position)
  }
}

function lookup(
  attribute: AttributeKind,
  index: number,
  table: number[][],
  location: SourceLocation
): number[] {
  if (index < 1 || index > table.length) {
    throw new AttributeIndexOutOfRangeError(attribute, index, table.length, location)
  }
  return table[index - 1]
}

function requireName(directive: Directive): string {
  if (!directive.rest) {
    throw new MalformedDirectiveError(`"${directive.command}" needs a name`, directive.location)
  }
  return directive.rest
}
