import { promises as fs } from 'fs';
import * as path from 'path';
import {
    ALL_IMAGE_FORMATS,
    ImageAsset,
    ImageFormat,
    ValidationMode,
    createImageAsset,
    formatFromMimeType,
    isImageFormat,
} from '../entities/ImageAsset';
import { ValidationError } from '../errors';
import { readDimensions } from './ImageHeader';

const MiB = 1024 * 1024;

export interface ModeRules {
    formats: readonly ImageFormat[];
    /** Exclusive upper bound in bytes */
    maxBytes: number;
}

export const MODE_RULES: Record<ValidationMode, ModeRules> = {
    edit: { formats: ['png'], maxBytes: 4 * MiB },
    generate: { formats: ALL_IMAGE_FORMATS, maxBytes: 20 * MiB },
    mask: { formats: ALL_IMAGE_FORMATS, maxBytes: 20 * MiB },
};

export const MIN_REFERENCE_IMAGES = 1;
export const MAX_REFERENCE_IMAGES = 4;

/**
 * An image received from a front end rather than read from disk.
 */
export interface ImageUpload {
    name: string;
    mimeType?: string;
    bytes: Buffer;
}

/**
 * Validates a local file for the given mode and reads it into an ImageAsset.
 * Checks run in order: existence, emptiness, format, size. The file is only
 * read once every check has passed.
 */
export async function validateFile(filePath: string, mode: ValidationMode): Promise<ImageAsset> {
    const name = path.basename(filePath);

    let size: number;
    try {
        const stats = await fs.stat(filePath);
        if (!stats.isFile()) {
            throw new ValidationError('NotFound', `Not a file: ${filePath}`);
        }
        size = stats.size;
    } catch (error) {
        if (error instanceof ValidationError) {
            throw error;
        }
        throw new ValidationError('NotFound', `File not found: ${filePath}`);
    }

    const format = checkFormatAndSize(name, formatFromName(name), size, mode);
    let bytes: Buffer;
    try {
        bytes = await fs.readFile(filePath);
    } catch {
        throw new ValidationError('NotFound', `Cannot read ${filePath}`);
    }
    return createImageAsset(name, format, bytes);
}

/**
 * Validates an uploaded buffer. The format comes from the declared file name;
 * the declared MIME type is only used for names without an extension.
 */
export function validateUpload(upload: ImageUpload, mode: ValidationMode): ImageAsset {
    const name = upload.name || 'upload';
    const format = path.extname(name) ? formatFromName(name) : formatFromMimeType(upload.mimeType ?? '');
    const checked = checkFormatAndSize(name, format, upload.bytes.length, mode, extensionLabel(name, upload.mimeType));
    return createImageAsset(name, checked, upload.bytes);
}

/**
 * Re-checks an already built asset against the rules of a mode.
 */
export function validateAsset(asset: ImageAsset, mode: ValidationMode): ImageAsset {
    checkFormatAndSize(asset.name, asset.format, asset.byteLength, mode);
    return asset;
}

/**
 * Multi-reference mode takes between 1 and 4 images.
 */
export function validateReferenceCount(count: number): void {
    if (count < MIN_REFERENCE_IMAGES || count > MAX_REFERENCE_IMAGES) {
        throw new ValidationError(
            'ReferenceCount',
            `Upload between ${MIN_REFERENCE_IMAGES} and ${MAX_REFERENCE_IMAGES} reference images (got ${count})`
        );
    }
}

/**
 * Compares base and mask pixel dimensions. A mismatch is only a warning:
 * the API decides whether it accepts the pair.
 */
export function checkMaskDimensions(base: ImageAsset, mask: ImageAsset): string[] {
    const baseSize = readDimensions(base.bytes);
    const maskSize = readDimensions(mask.bytes);

    if (!baseSize || !maskSize) {
        return [`Could not read the dimensions of ${baseSize ? mask.name : base.name}; the API will check the mask against the base image`];
    }
    if (baseSize.width !== maskSize.width || baseSize.height !== maskSize.height) {
        return [
            `Mask is ${maskSize.width}x${maskSize.height} but the base image is ${baseSize.width}x${baseSize.height}; they should match`,
        ];
    }
    return [];
}

function checkFormatAndSize(
    name: string,
    format: ImageFormat | undefined,
    size: number,
    mode: ValidationMode,
    typeLabel: string = extensionLabel(name)
): ImageFormat {
    const rules = MODE_RULES[mode];

    if (size === 0) {
        throw new ValidationError('Empty', `${name} is empty`);
    }
    if (!format || !rules.formats.includes(format)) {
        throw new ValidationError(
            'UnsupportedFormat',
            `File type ${typeLabel} is not supported in ${mode} mode. Use: ${formatList(rules.formats)}`
        );
    }
    if (size >= rules.maxBytes) {
        throw new ValidationError(
            'TooLarge',
            `${name} is ${toMiB(size)} MB; files must be smaller than ${toMiB(rules.maxBytes)} MB in ${mode} mode`
        );
    }
    return format;
}

function formatFromName(name: string): ImageFormat | undefined {
    const extension = path.extname(name).slice(1).toLowerCase();
    return isImageFormat(extension) ? extension : undefined;
}

function extensionLabel(name: string, mimeType?: string): string {
    const extension = path.extname(name).toLowerCase();
    if (extension) {
        return extension;
    }
    return mimeType || 'unknown';
}

function formatList(formats: readonly ImageFormat[]): string {
    return formats.map((format) => format.toUpperCase()).join(', ');
}

function toMiB(bytes: number): string {
    return (bytes / MiB).toFixed(1);
}
