import * as fs from 'fs'
import * as path from 'path'
import { assembleMesh } from './assembly'
import { consoleLogger } from './common'
import type { Logger } from './common'
import { ExportConstants } from './constants'
import { formatDescriptor, mergeDescriptor, parseDescriptor } from './descriptor'
import type { ModelDescriptor } from './descriptor'
import { ArtifactUnwritableError, SourceUnreadableError } from './errors'
import { buildArtifacts, describeArray } from './model'
import type { ModelArtifact } from './model'
import { ZipUtils } from './utils/zipUtils'

/**
 * Configuration for exportModel
 */
export interface ExportOptions {
  /**
   * Directory receiving the descriptor and the model's data directory
   * @default process.cwd()
   */
  outputDir?: string

  /**
   * Also write `<model>.zip` containing the descriptor and every artifact
   * @default false
   */
  bundle?: boolean

  /**
   * @default consoleLogger
   */
  logger?: Logger
}

/**
 * Files written by an export
 */
export interface ExportResult {
  modelName: string
  dataDir: string
  descriptorPath: string
  bundlePath?: string
  descriptor: ModelDescriptor
  artifacts: ModelArtifact[]
}

const DEFAULT_OPTIONS: Required<Omit<ExportOptions, 'outputDir'>> = {
  bundle: false,
  logger: consoleLogger
}

/**
 * Convert an OBJ file (and the material libraries it references) into
 * indexed-array artifacts plus a merged model descriptor.
 *
 * Nothing is written until the whole source has been assembled, so input
 * errors leave the output directory untouched.
 *
 * @param objPath Path to the OBJ file
 * @param options Output directory, bundling and logging
 */
export async function exportModel(objPath: string, options: ExportOptions = {}): Promise<ExportResult> {
  const opts = { ...DEFAULT_OPTIONS, ...options }
  const logger = opts.logger
  const outputDir = path.resolve(options.outputDir ?? process.cwd())

  const sourceDir = path.dirname(path.resolve(objPath))
  const modelName = path.parse(objPath).name
  const dataDir = path.join(outputDir, modelName)
  const descriptorPath = path.join(outputDir, `${modelName}${ExportConstants.DESCRIPTOR_EXT}`)

  logPath(logger, 'Source file:', objPath)
  logPath(logger, 'Source directory:', sourceDir)
  logPath(logger, 'Export directory:', outputDir)
  logPath(logger, 'Data directory:', dataDir)
  logger.info('')

  const mesh = assembleMesh(readSource(objPath), {
    file: objPath,
    logger,
    resolveMaterialLibrary: (name) => {
      const libraryPath = path.join(sourceDir, name)
      logPath(logger, 'MtlLib', libraryPath)
      return readSource(libraryPath)
    }
  })

  const artifacts = buildArtifacts(mesh, modelName)
  const descriptor = mergeDescriptor(
    parseDescriptor(readOptional(descriptorPath), descriptorPath),
    { modelName, materials: mesh.materials.keys(), textures: mesh.textures }
  )

  logger.info('\nExporting...\n')

  try {
    await fs.promises.mkdir(dataDir, { recursive: true })
  } catch (error) {
    throw new ArtifactUnwritableError(dataDir, error)
  }

  for (const artifact of artifacts) {
    logPath(logger, artifact.material === undefined ? 'Collision:' : 'Export:', path.join(outputDir, artifact.path))
    logger.info(`${describeArray(artifact.array)}\n`)
  }

  // Artifacts are independent once encoded
  await Promise.all(
    artifacts.map((artifact) => writeOutput(path.join(outputDir, artifact.path), artifact.data))
  )

  logger.info('Exporting TMDL...\n')
  await writeOutput(descriptorPath, formatDescriptor(descriptor))

  let bundlePath: string | undefined
  if (opts.bundle) {
    bundlePath = path.join(outputDir, `${modelName}${ExportConstants.BUNDLE_EXT}`)
    logPath(logger, 'Bundle:', bundlePath)
    await writeOutput(bundlePath, await ZipUtils.saveModelToZip(modelName, descriptor, artifacts))
  }

  logger.info('\nCompleted.\n')

  return { modelName, dataDir, descriptorPath, bundlePath, descriptor, artifacts }
}

function logPath(logger: Logger, label: string, target: string): void {
  logger.info(`${label.padEnd(20)} "${target}"`)
}

function readSource(file: string): string {
  try {
    return fs.readFileSync(file, 'utf-8')
  } catch (error) {
    throw new SourceUnreadableError(file, error)
  }
}

function readOptional(file: string): string | undefined {
  if (!fs.existsSync(file)) return undefined
  return readSource(file)
}

async function writeOutput(file: string, data: Uint8Array | string): Promise<void> {
  try {
    await fs.promises.writeFile(file, data)
  } catch (error) {
    throw new ArtifactUnwritableError(file, error)
  }
}
