/**
 * Zip bundles of an exported model: the descriptor plus every artifact it
 * references, stored under their export-relative paths.
 */

import JSZip from "jszip"
import { IndexedArrayUtils } from "../array"
import { ExportConstants } from "../constants"
import { formatDescriptor, parseDescriptor } from "../descriptor"
import type { ModelDescriptor } from "../descriptor"
import { MalformedArtifactError } from "../errors"
import type { ModelArtifact } from "../model"
import type { IndexedArray } from "../types"

/**
 * Contents of a loaded bundle
 */
export interface LoadedModel {
  modelName: string
  descriptor: ModelDescriptor

  /**
   * Decoded arrays keyed by their export-relative path
   */
  arrays: Record<string, IndexedArray>
}

/**
 * Static utility methods for model bundles.
 */
export class ZipUtils {
  /**
   * Pack a descriptor and its artifacts into a zip file.
   *
   * @param modelName - Model name; the descriptor is stored as `<modelName>.tmdl`
   * @param descriptor - Merged descriptor
   * @param artifacts - Encoded artifacts
   * @returns Zip file bytes
   */
  static async saveModelToZip(
    modelName: string,
    descriptor: ModelDescriptor,
    artifacts: ModelArtifact[]
  ): Promise<Uint8Array> {
    const zip = new JSZip()

    zip.file(`${modelName}${ExportConstants.DESCRIPTOR_EXT}`, formatDescriptor(descriptor))
    for (const artifact of artifacts) {
      zip.file(artifact.path, artifact.data)
    }

    return zip.generateAsync({ type: "uint8array" })
  }

  /**
   * Load a bundle and decode every artifact its descriptor references.
   *
   * @param zipInput - Zip bytes or an already opened JSZip
   */
  static async loadModelFromZip(zipInput: JSZip | ArrayBuffer | Uint8Array): Promise<LoadedModel> {
    const zip = zipInput instanceof JSZip ? zipInput : await JSZip.loadAsync(zipInput)

    const descriptorNames = Object.keys(zip.files).filter(
      (name) => !name.includes("/") && name.endsWith(ExportConstants.DESCRIPTOR_EXT)
    )
    if (descriptorNames.length !== 1) {
      throw new MalformedArtifactError(
        `Expected one descriptor in zip file, found ${descriptorNames.length}`
      )
    }

    const [descriptorName] = descriptorNames
    const descriptorFile = zip.file(descriptorName)
    if (!descriptorFile) {
      throw new MalformedArtifactError(`${descriptorName} not found in zip file`)
    }
    const descriptor = parseDescriptor(await descriptorFile.async("text"), descriptorName)

    const paths = Object.values(descriptor.draw ?? {})
      .map((entry) => entry.mesh)
      .filter((mesh): mesh is string => mesh !== undefined)
    if (typeof descriptor.collision === "string") {
      paths.push(descriptor.collision)
    }

    const arrays: Record<string, IndexedArray> = {}
    for (const path of paths) {
      const file = zip.file(path)
      if (!file) {
        throw new MalformedArtifactError(`${path} not found in zip file`)
      }
      arrays[path] = IndexedArrayUtils.decode(await file.async("uint8array"))
    }

    return {
      modelName: descriptorName.slice(0, -ExportConstants.DESCRIPTOR_EXT.length),
      descriptor,
      arrays
    }
  }
}
