/**
 * Model descriptor (`<model>.tmdl`) handling.
 *
 * The descriptor is a JSON document owned partly by the converter (mesh,
 * texture and collision paths, default name and mass) and partly by other
 * tools. Merging only touches the converter's fields.
 */

import { z } from "zod"
import { ExportConstants } from "./constants"
import { MalformedDescriptorError } from "./errors"

const drawEntrySchema = z
    .object({
        mesh: z.string().optional(),
        texture: z.string().optional()
    })
    .passthrough()

export const modelDescriptorSchema = z
    .object({
        name: z.string().nullable().optional(),
        collision: z.string().nullable().optional(),
        mass: z.number().nullable().optional(),
        draw: z.record(drawEntrySchema).optional()
    })
    .passthrough()

export type ModelDescriptor = z.infer<typeof modelDescriptorSchema>
export type DrawEntry = z.infer<typeof drawEntrySchema>

/**
 * Converter-owned values to merge into a descriptor
 */
export interface DescriptorUpdate {
    modelName: string

    /**
     * Materials that produced an artifact, in export order
     */
    materials: Iterable<string>

    /**
     * Diffuse texture per material
     */
    textures: ReadonlyMap<string, string>
}

/**
 * Parse the text of an existing descriptor.
 *
 * @param text - File contents, or undefined when the file does not exist
 * @param path - Used in error messages
 */
export function parseDescriptor(text: string | undefined, path: string): ModelDescriptor {
    if (text === undefined) return {}

    let json: unknown
    try {
        json = JSON.parse(text)
    } catch (error) {
        throw new MalformedDescriptorError(path, "not valid JSON", error)
    }

    const result = modelDescriptorSchema.safeParse(json)
    if (!result.success) {
        const issue = result.error.issues[0]
        const where = issue.path.length > 0 ? issue.path.join(".") : "document"
        throw new MalformedDescriptorError(path, `${where}: ${issue.message}`, result.error)
    }
    return result.data
}

/**
 * Merge converter-owned fields into a descriptor without mutating it.
 *
 * Draw entries get their mesh path (and texture, when known) overwritten;
 * name, collision and mass are only filled in when absent (a present `null`
 * is kept). Every other field is carried over as it was.
 */
export function mergeDescriptor(existing: ModelDescriptor, update: DescriptorUpdate): ModelDescriptor {
    const { modelName, textures } = update
    // A Map keeps names such as "__proto__" as ordinary keys
    const draw = new Map<string, DrawEntry>(Object.entries(existing.draw ?? {}))

    for (const material of update.materials) {
        const entry: DrawEntry = {
            ...(draw.get(material) ?? {}),
            mesh: ExportConstants.materialPath(modelName, material)
        }
        const texture = textures.get(material)
        if (texture !== undefined) {
            entry.texture = texture
        }
        draw.set(material, entry)
    }

    return {
        ...existing,
        draw: Object.fromEntries(draw),
        name: existing.name !== undefined ? existing.name : modelName,
        collision: existing.collision !== undefined ? existing.collision : ExportConstants.collisionPath(modelName),
        mass: existing.mass !== undefined ? existing.mass : ExportConstants.DEFAULT_MASS
    }
}

/**
 * Serialize a descriptor with four-space indentation
 */
export function formatDescriptor(descriptor: ModelDescriptor): string {
    return `${JSON.stringify(descriptor, null, 4)}\n`
}
