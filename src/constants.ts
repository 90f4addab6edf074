/**
 * Constants for the indexed-array artifact format and the export layout.
 */

export const IndexedArrayConstants = {
    /** ASCII prefix of every artifact; the arity digit follows it */
    MAGIC_PREFIX: "IA",

    /** Magic (3) + terminator (1) + reserved (12) */
    HEADER_SIZE: 16,

    /** Offset of the first vertex_count field */
    VERTEX_COUNT_OFFSET: 16,

    /** uint32 vertex_count / index_count fields */
    COUNT_SIZE: 4,

    /** float32 components and uint32 indices */
    ELEMENT_SIZE: 4,

    /** Arity of per-material arrays: position[3] + uv[2] + normal[3] */
    MATERIAL_ARITY: 8,

    /** Arity of the collision array: position[3] */
    COLLISION_ARITY: 3,

    /**
     * File extension for an artifact of the given arity.
     * @param arity - Attribute arity
     * @returns Extension like ".ia8"
     */
    extension(arity: number): string {
        return `.ia${arity}`
    },

    /**
     * Size in bytes of an encoded artifact.
     */
    encodedSize(arity: number, vertexCount: number, indexCount: number): number {
        return this.HEADER_SIZE
            + this.COUNT_SIZE + vertexCount * arity * this.ELEMENT_SIZE
            + this.COUNT_SIZE + indexCount * this.ELEMENT_SIZE
    }
}

export const ExportConstants = {
    /** Artifact name of the collision mesh inside the data directory */
    COLLISION_NAME: "collision",

    /** Extension of the model descriptor */
    DESCRIPTOR_EXT: ".tmdl",

    /** Extension of the optional zip bundle */
    BUNDLE_EXT: ".zip",

    /** Mass written into a new descriptor */
    DEFAULT_MASS: 0,

    /**
     * Descriptor-relative path of a material artifact.
     * @returns Path like "crate/wood.ia8"
     */
    materialPath(modelName: string, material: string): string {
        return `${modelName}/${material}${IndexedArrayConstants.extension(IndexedArrayConstants.MATERIAL_ARITY)}`
    },

    /**
     * Descriptor-relative path of the collision artifact.
     * @returns Path like "crate/collision.ia3"
     */
    collisionPath(modelName: string): string {
        return `${modelName}/${this.COLLISION_NAME}${IndexedArrayConstants.extension(IndexedArrayConstants.COLLISION_ARITY)}`
    }
}
