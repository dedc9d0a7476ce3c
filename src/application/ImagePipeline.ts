import { GenerationOptions, createGenerationRequest } from '../domain/entities/GenerationRequest';
import { MaterializedImage } from '../domain/entities/GenerationResult';
import { ImageAsset, MaskAsset, ValidationMode, asMaskAsset } from '../domain/entities/ImageAsset';
import { ValidationError } from '../domain/errors';
import { IImageGenerationClient } from '../domain/ports/IImageGenerationClient';
import { IResultMaterializer } from '../domain/ports/IResultMaterializer';
import {
    ImageUpload,
    checkMaskDimensions,
    validateAsset,
    validateFile,
    validateReferenceCount,
    validateUpload,
} from '../domain/services/InputValidator';
import { RequestBuilder, validatePrompt } from './RequestBuilder';

/**
 * An image as a front end hands it over: a local path, an uploaded buffer,
 * or an asset the front end already validated.
 */
export type ImageInput = string | ImageUpload | ImageAsset;

interface BaseRunInput {
    prompt: string;
    credential: string;
    options?: GenerationOptions;
}

export interface EditInput extends BaseRunInput {
    image: ImageInput;
}

export interface MultiReferenceInput extends BaseRunInput {
    images: readonly ImageInput[];
}

export interface MaskedInput extends BaseRunInput {
    image: ImageInput;
    mask: ImageInput;
}

export interface PipelineOutcome {
    images: MaterializedImage[];
    warnings: string[];
    revisedPrompt?: string;
}

export interface PipelineDependencies {
    builder: RequestBuilder;
    client: IImageGenerationClient;
    materializer: IResultMaterializer;
}

function isImageAsset(input: ImageUpload | ImageAsset): input is ImageAsset {
    return 'role' in input && 'format' in input;
}

/**
 * Loads and validates one image for a mode, tagging errors with the field.
 */
export async function loadImage(input: ImageInput, mode: ValidationMode, field: string): Promise<ImageAsset> {
    try {
        if (typeof input === 'string') {
            return await validateFile(input, mode);
        }
        return isImageAsset(input) ? validateAsset(input, mode) : validateUpload(input, mode);
    } catch (error) {
        if (error instanceof ValidationError && !error.field) {
            throw error.withField(field);
        }
        throw error;
    }
}

/**
 * Validate -> Build -> Submit -> Materialize, once per call.
 * Shared by the CLI and the web front end; holds no per-request state.
 */
export class ImagePipeline {
    constructor(private readonly deps: PipelineDependencies) { }

    async runEdit(input: EditInput): Promise<PipelineOutcome> {
        validatePrompt(input.prompt);
        const image = await loadImage(input.image, 'edit', 'image');
        return this.execute('edit', input, [image]);
    }

    async runMultiReference(input: MultiReferenceInput): Promise<PipelineOutcome> {
        try {
            validateReferenceCount(input.images.length);
        } catch (error) {
            throw error instanceof ValidationError ? error.withField('images') : error;
        }
        validatePrompt(input.prompt);

        const images: ImageAsset[] = [];
        for (const [index, image] of input.images.entries()) {
            images.push(await loadImage(image, 'generate', `images[${index}]`));
        }
        return this.execute('generate', input, images);
    }

    async runMasked(input: MaskedInput): Promise<PipelineOutcome> {
        validatePrompt(input.prompt);
        const image = await loadImage(input.image, 'mask', 'image');
        const mask = asMaskAsset(await loadImage(input.mask, 'mask', 'mask'));

        const warnings = checkMaskDimensions(image, mask);
        for (const warning of warnings) {
            console.warn(`[ImagePipeline] ${warning}`);
        }
        return this.execute('mask', input, [image], mask, warnings);
    }

    private async execute(
        mode: ValidationMode,
        input: BaseRunInput,
        images: ImageAsset[],
        mask?: MaskAsset,
        warnings: string[] = []
    ): Promise<PipelineOutcome> {
        const request = createGenerationRequest({
            mode,
            prompt: input.prompt,
            images,
            mask,
            options: input.options,
        });
        const payload = this.deps.builder.build(request);

        console.log(`[ImagePipeline] ${mode}: ${images.length} image(s)${mask ? ' + mask' : ''}`);
        const result = await this.deps.client.submit(payload, input.credential);
        const materialized = await this.deps.materializer.materialize(result);

        return {
            images: materialized,
            warnings,
            revisedPrompt: result.revisedPrompt,
        };
    }
}
