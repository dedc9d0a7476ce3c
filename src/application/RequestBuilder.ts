import FormData from 'form-data';
import { GenerationRequest, QualityTier, allImages } from '../domain/entities/GenerationRequest';
import { ImageAsset, mimeTypeFor, toDataUrl } from '../domain/entities/ImageAsset';
import {
    EditPayload,
    GenerationPayload,
    ImageGenerationTool,
    VisionContentPart,
    VisionPayload,
} from '../domain/entities/GenerationPayload';
import { ValidationError } from '../domain/errors';

export const MAX_PROMPT_LENGTH = 4000;

export interface RequestBuilderOptions {
    editModel: string;
    visionModel: string;
}

const VISION_QUALITY: Record<QualityTier, ImageGenerationTool['quality']> = {
    standard: 'medium',
    high: 'high',
};

/**
 * Checks the prompt and returns it trimmed.
 */
export function validatePrompt(prompt: string): string {
    const trimmed = prompt.trim();
    if (!trimmed) {
        throw new ValidationError('PromptRequired', 'Please enter a prompt', 'prompt');
    }
    if (trimmed.length > MAX_PROMPT_LENGTH) {
        throw new ValidationError(
            'PromptTooLong',
            `Prompt is ${trimmed.length} characters; the limit is ${MAX_PROMPT_LENGTH}`,
            'prompt'
        );
    }
    return trimmed;
}

/**
 * Turns a validated GenerationRequest into an API-ready payload.
 * Pure transformation: no network access, no file access.
 */
export class RequestBuilder {
    constructor(private readonly options: RequestBuilderOptions) { }

    build(request: GenerationRequest): GenerationPayload {
        const prompt = validatePrompt(request.prompt);
        return request.endpointKind === 'edit'
            ? this.buildEdit(request, prompt)
            : this.buildVision(request, prompt);
    }

    private buildEdit(request: GenerationRequest, prompt: string): EditPayload {
        const form = new FormData();
        appendImage(form, 'image', request.image);
        if (request.mask) {
            appendImage(form, 'mask', request.mask);
        }
        form.append('prompt', prompt);
        form.append('model', this.options.editModel);
        form.append('n', String(request.count));
        form.append('size', request.size);
        // dall-e models default to URLs that expire; ask for them explicitly
        if (this.options.editModel.startsWith('dall-e')) {
            form.append('response_format', 'url');
        } else {
            form.append('quality', VISION_QUALITY[request.quality]);
        }

        return {
            endpointKind: 'edit',
            form,
            summary: `edit ${request.image.name}${request.mask ? ' + mask' : ''}, n=${request.count}, size=${request.size}`,
        };
    }

    private buildVision(request: GenerationRequest, prompt: string): VisionPayload {
        const images = allImages(request);
        const content: VisionContentPart[] = [
            { type: 'input_text', text: prompt },
            ...images.map((image): VisionContentPart => ({ type: 'input_image', image_url: toDataUrl(image) })),
        ];

        const tool: ImageGenerationTool = {
            type: 'image_generation',
            size: request.size,
            quality: VISION_QUALITY[request.quality],
        };
        if (request.mask) {
            tool.input_image_mask = { image_url: toDataUrl(request.mask) };
        }

        return {
            endpointKind: 'vision',
            body: {
                model: this.options.visionModel,
                input: [{ role: 'user', content }],
                tools: [tool],
            },
            summary: `vision ${images.length} image(s)${request.mask ? ' + mask' : ''}, size=${request.size}, quality=${tool.quality}`,
        };
    }
}

function appendImage(form: FormData, field: string, asset: ImageAsset): void {
    form.append(field, asset.bytes, {
        filename: asset.name,
        contentType: mimeTypeFor(asset.format),
    });
}
