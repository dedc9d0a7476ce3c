import { GenerationResult, MaterializedImage } from '../entities/GenerationResult';

/**
 * IResultMaterializer - Port for turning API descriptors into image bytes.
 * Implementations: ResultMaterializer
 */
export interface IResultMaterializer {
    /**
     * Downloads or decodes every descriptor. Never rejects for a single bad
     * item: failed items come back as failure markers in their slot.
     */
    materialize(result: GenerationResult): Promise<MaterializedImage[]>;

    /**
     * Writes each successful image and returns the written paths in order.
     */
    saveAll(images: readonly MaterializedImage[], outputPath: string): Promise<string[]>;
}
