import { ImageAsset, MaskAsset, ValidationMode } from './ImageAsset';

/**
 * Which remote operation a request targets.
 * - edit: the images/edits endpoint (multipart)
 * - vision: the responses endpoint with the image_generation tool
 */
export type EndpointKind = 'edit' | 'vision';

export type ImageSize = '256x256' | '512x512' | '1024x1024' | '1024x1536' | '1536x1024' | 'auto';

export const IMAGE_SIZES: readonly ImageSize[] = ['256x256', '512x512', '1024x1024', '1024x1536', '1536x1024', 'auto'];

export type QualityTier = 'standard' | 'high';

export const QUALITY_TIERS: readonly QualityTier[] = ['standard', 'high'];

export const MIN_OUTPUT_COUNT = 1;
export const MAX_OUTPUT_COUNT = 10;

/**
 * A single submission to the image API. Built fresh per request and frozen.
 */
export interface GenerationRequest {
    readonly mode: ValidationMode;
    readonly endpointKind: EndpointKind;
    readonly prompt: string;
    /** Primary image: the edited image, the masked base, or the first reference */
    readonly image: ImageAsset;
    /** Additional reference images (generate mode only) */
    readonly references: readonly ImageAsset[];
    readonly mask?: MaskAsset;
    readonly count: number;
    readonly size: ImageSize;
    readonly quality: QualityTier;
}

export interface GenerationOptions {
    count?: number;
    size?: ImageSize;
    quality?: QualityTier;
}

const ENDPOINT_BY_MODE: Record<ValidationMode, EndpointKind> = {
    edit: 'edit',
    generate: 'vision',
    mask: 'vision',
};

const DEFAULT_QUALITY: Record<ValidationMode, QualityTier> = {
    edit: 'standard',
    generate: 'standard',
    mask: 'high',
};

export function endpointKindFor(mode: ValidationMode): EndpointKind {
    return ENDPOINT_BY_MODE[mode];
}

export function isImageSize(value: string): value is ImageSize {
    return IMAGE_SIZES.some((size) => size === value);
}

export function isQualityTier(value: string): value is QualityTier {
    return QUALITY_TIERS.some((tier) => tier === value);
}

/**
 * Creates a frozen GenerationRequest, filling defaults for unset options.
 * The count is clamped into [1, 10]; the vision endpoint always yields one image.
 */
export function createGenerationRequest(params: {
    mode: ValidationMode;
    prompt: string;
    images: readonly ImageAsset[];
    mask?: MaskAsset;
    options?: GenerationOptions;
}): GenerationRequest {
    const { mode, prompt, images, mask, options = {} } = params;
    const [image, ...references] = images;
    if (!image) {
        throw new Error('At least one image is required to build a generation request');
    }

    const endpointKind = endpointKindFor(mode);
    const requestedCount = Math.trunc(options.count ?? MIN_OUTPUT_COUNT);
    const count = endpointKind === 'vision'
        ? 1
        : Math.min(Math.max(requestedCount, MIN_OUTPUT_COUNT), MAX_OUTPUT_COUNT);

    return Object.freeze({
        mode,
        endpointKind,
        prompt,
        image,
        references: Object.freeze([...references]),
        mask,
        count,
        size: options.size ?? '1024x1024',
        quality: options.quality ?? DEFAULT_QUALITY[mode],
    });
}

/**
 * All images of the request in submission order (primary first).
 */
export function allImages(request: GenerationRequest): ImageAsset[] {
    return [request.image, ...request.references];
}
