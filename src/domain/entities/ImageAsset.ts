/**
 * ImageAsset Domain Entity
 *
 * A validated local image (or mask) ready to be sent to the image API.
 * Assets are frozen once created; nothing downstream may mutate the bytes.
 */

/**
 * Image formats the remote API accepts as input.
 */
export type ImageFormat = 'png' | 'jpg' | 'jpeg' | 'gif' | 'webp';

export const ALL_IMAGE_FORMATS: readonly ImageFormat[] = ['png', 'jpg', 'jpeg', 'gif', 'webp'];

/**
 * Usage mode, which decides the validation rules and the endpoint kind.
 * - edit: single PNG edited in place
 * - generate: 1-4 reference images guiding a new image
 * - mask: base image plus a mask selecting the region to regenerate
 */
export type ValidationMode = 'edit' | 'generate' | 'mask';

export type AssetRole = 'image' | 'mask';

export interface ImageAsset {
    /** File name (basename for local files, declared name for uploads) */
    readonly name: string;
    readonly format: ImageFormat;
    readonly bytes: Buffer;
    readonly byteLength: number;
    readonly role: AssetRole;
}

/**
 * A mask is an ImageAsset read as a region selector: transparent (or white)
 * pixels are regenerated, opaque pixels are preserved.
 */
export interface MaskAsset extends ImageAsset {
    readonly role: 'mask';
}

const MIME_TYPES: Record<ImageFormat, string> = {
    png: 'image/png',
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    gif: 'image/gif',
    webp: 'image/webp',
};

export function mimeTypeFor(format: ImageFormat): string {
    return MIME_TYPES[format];
}

export function isImageFormat(value: string): value is ImageFormat {
    return ALL_IMAGE_FORMATS.some((format) => format === value);
}

/**
 * Maps a MIME type such as "image/jpeg" to its format, if supported.
 */
export function formatFromMimeType(mimeType: string): ImageFormat | undefined {
    const subtype = mimeType.toLowerCase().trim().replace(/^image\//, '');
    return isImageFormat(subtype) ? subtype : undefined;
}

export function createImageAsset(name: string, format: ImageFormat, bytes: Buffer): ImageAsset {
    return Object.freeze({
        name,
        format,
        bytes,
        byteLength: bytes.length,
        role: 'image' as const,
    });
}

export function asMaskAsset(asset: ImageAsset): MaskAsset {
    return Object.freeze({ ...asset, role: 'mask' as const });
}

/**
 * Encodes the asset as a data URL for JSON request bodies.
 */
export function toDataUrl(asset: ImageAsset): string {
    return `data:${mimeTypeFor(asset.format)};base64,${asset.bytes.toString('base64')}`;
}
