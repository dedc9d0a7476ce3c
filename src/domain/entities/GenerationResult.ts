/**
 * GenerationResult Domain Entity
 *
 * What the image API returned, before anything is downloaded or decoded.
 */

export type ImageDescriptor =
    | { kind: 'url'; url: string }
    | { kind: 'base64'; data: string };

export interface GenerationResult {
    /** Descriptors in the order the API returned them */
    readonly images: readonly ImageDescriptor[];
    /** Revised prompt if the API rewrote it */
    readonly revisedPrompt?: string;
}

export type MaterializeFailureCode = 'DownloadFailed' | 'DecodeFailed';

/**
 * One output image after materialization. Failed items keep their slot so
 * the caller can report which position failed.
 */
export type MaterializedImage =
    | { index: number; ok: true; bytes: Buffer; source: ImageDescriptor['kind'] }
    | { index: number; ok: false; error: { code: MaterializeFailureCode; message: string } };

export type MaterializedSuccess = Extract<MaterializedImage, { ok: true }>;

export function successfulImages(images: readonly MaterializedImage[]): MaterializedSuccess[] {
    return images.filter((image): image is MaterializedSuccess => image.ok);
}

export function describeDescriptor(descriptor: ImageDescriptor): string {
    return descriptor.kind === 'url'
        ? descriptor.url
        : `inline image (${descriptor.data.length} base64 chars)`;
}
