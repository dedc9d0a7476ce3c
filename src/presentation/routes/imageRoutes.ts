import { Router, Request, Response } from 'express';
import * as path from 'path';
import { CredentialResolver } from '../../application/CredentialResolver';
import { ImagePipeline, PipelineOutcome } from '../../application/ImagePipeline';
import { MAX_PROMPT_LENGTH } from '../../application/RequestBuilder';
import {
    GenerationOptions,
    MAX_OUTPUT_COUNT,
    MIN_OUTPUT_COUNT,
    isImageSize,
    isQualityTier,
} from '../../domain/entities/GenerationRequest';
import { successfulImages } from '../../domain/entities/GenerationResult';
import { ImageFormat, isImageFormat, mimeTypeFor } from '../../domain/entities/ImageAsset';
import { ValidationError } from '../../domain/errors';
import { detectFormat } from '../../domain/services/ImageHeader';
import { ImageUpload, MAX_REFERENCE_IMAGES, MIN_REFERENCE_IMAGES, MODE_RULES } from '../../domain/services/InputValidator';
import { outputPathFor } from '../../infrastructure/storage/ResultMaterializer';
import { asyncHandler, BadRequestError } from '../middleware/errorHandler';

export interface ImageRouteDependencies {
    pipeline: ImagePipeline;
    credentials: CredentialResolver;
    /** Download name for edit and generate results */
    outputFilename: string;
    /** Download name for masked results */
    maskOutputFilename: string;
}

export type ImageResponseItem =
    | { index: number; ok: true; filename: string; mimeType: string; data: string }
    | { index: number; ok: false; error: { code: string; message: string } };

export interface GenerationResponse {
    images: ImageResponseItem[];
    warnings: string[];
    revisedPrompt?: string;
}

const DATA_URL = /^data:([^;,]+);base64,/;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads an upload sent as { name, type?, data } where data is base64 or a data URL.
 */
export function parseUpload(value: unknown, field: string, label: string): ImageUpload {
    if (value === undefined || value === null) {
        throw new ValidationError('NotFound', `Please upload ${label}`, field);
    }
    if (!isRecord(value) || typeof value.data !== 'string') {
        throw new BadRequestError(`${field} must be an object with "name" and base64 "data"`);
    }

    const match = DATA_URL.exec(value.data);
    const base64 = match ? value.data.slice(match[0].length) : value.data;
    const declaredType = typeof value.type === 'string' && value.type ? value.type : undefined;

    return {
        name: typeof value.name === 'string' ? path.basename(value.name) : '',
        mimeType: declaredType ?? match?.[1],
        bytes: Buffer.from(base64, 'base64'),
    };
}

function readString(body: Record<string, unknown>, key: string): string | undefined {
    const value = body[key];
    if (value === undefined || value === null || value === '') {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new BadRequestError(`${key} must be a string`);
    }
    return value;
}

export function parseOptions(body: Record<string, unknown>): GenerationOptions {
    const options: GenerationOptions = {};

    const quality = readString(body, 'quality');
    if (quality !== undefined) {
        if (!isQualityTier(quality)) {
            throw new BadRequestError('quality must be "standard" or "high"');
        }
        options.quality = quality;
    }

    const size = readString(body, 'size');
    if (size !== undefined) {
        if (!isImageSize(size)) {
            throw new BadRequestError(`size "${size}" is not supported`);
        }
        options.size = size;
    }

    if (body.count !== undefined) {
        const count = Number(body.count);
        if (!Number.isInteger(count) || count < MIN_OUTPUT_COUNT || count > MAX_OUTPUT_COUNT) {
            throw new BadRequestError(`count must be an integer between ${MIN_OUTPUT_COUNT} and ${MAX_OUTPUT_COUNT}`);
        }
        options.count = count;
    }

    return options;
}

/**
 * Swaps the extension of a download name for the one of the actual image
 * format. Names already carrying a matching extension are kept as they are.
 */
export function withFormatExtension(filename: string, format: ImageFormat): string {
    const extension = path.extname(filename);
    const current = extension.slice(1).toLowerCase();
    if (isImageFormat(current) && mimeTypeFor(current) === mimeTypeFor(format)) {
        return filename;
    }
    return `${filename.slice(0, filename.length - extension.length)}.${format}`;
}

/**
 * Shapes a pipeline outcome for the browser: base64 data plus a download name per image.
 */
export function toResponse(outcome: PipelineOutcome, outputFilename: string): GenerationResponse {
    const total = successfulImages(outcome.images).length;
    const images = outcome.images.map((image): ImageResponseItem => {
        if (!image.ok) {
            return { index: image.index, ok: false, error: image.error };
        }
        const format = detectFormat(image.bytes) ?? 'png';
        return {
            index: image.index,
            ok: true,
            filename: withFormatExtension(path.basename(outputPathFor(outputFilename, image.index, total)), format),
            mimeType: mimeTypeFor(format),
            data: image.bytes.toString('base64'),
        };
    });

    return { images, warnings: outcome.warnings, revisedPrompt: outcome.revisedPrompt };
}

/**
 * Creates image routes with dependency injection.
 */
export function createImageRoutes(deps: ImageRouteDependencies): Router {
    const router = Router();

    function requestContext(req: Request) {
        const body = isRecord(req.body) ? req.body : {};
        // A missing key is reported by the API client, after local validation
        const credential = deps.credentials.resolve(readString(body, 'apiKey')) ?? '';
        return {
            body,
            credential,
            prompt: readString(body, 'prompt') ?? '',
            options: parseOptions(body),
        };
    }

    function downloadName(body: Record<string, unknown>, fallback: string): string {
        const requested = readString(body, 'outputFilename');
        return requested ? path.basename(requested) : fallback;
    }

    /**
     * GET /modes
     *
     * Limits of each mode, so the form can check files before uploading.
     */
    router.get('/modes', (_req: Request, res: Response) => {
        res.json({
            modes: MODE_RULES,
            references: { min: MIN_REFERENCE_IMAGES, max: MAX_REFERENCE_IMAGES },
            maxPromptLength: MAX_PROMPT_LENGTH,
            credentialConfigured: deps.credentials.hasConfigured(),
        });
    });

    /**
     * POST /edit
     *
     * Edits a single PNG. Body: { prompt, image, apiKey?, count?, size?, quality?, outputFilename? }
     */
    router.post(
        '/edit',
        asyncHandler(async (req: Request, res: Response) => {
            const { body, credential, prompt, options } = requestContext(req);
            const image = parseUpload(body.image, 'image', 'an image to edit');

            const outcome = await deps.pipeline.runEdit({ image, prompt, credential, options });
            res.json(toResponse(outcome, downloadName(body, deps.outputFilename)));
        })
    );

    /**
     * POST /generate
     *
     * Generates from 1-4 reference images. Body: { prompt, images: [...], apiKey?, size?, quality? }
     */
    router.post(
        '/generate',
        asyncHandler(async (req: Request, res: Response) => {
            const { body, credential, prompt, options } = requestContext(req);
            if (body.images !== undefined && !Array.isArray(body.images)) {
                throw new BadRequestError('images must be an array');
            }
            const uploads: unknown[] = Array.isArray(body.images) ? body.images : [];
            const images = uploads.map((upload, index) => parseUpload(upload, `images[${index}]`, 'a reference image'));

            const outcome = await deps.pipeline.runMultiReference({ images, prompt, credential, options });
            res.json(toResponse(outcome, downloadName(body, deps.outputFilename)));
        })
    );

    /**
     * POST /mask
     *
     * Regenerates the masked region of a base image. Body: { prompt, image, mask, apiKey?, quality?, outputFilename? }
     */
    router.post(
        '/mask',
        asyncHandler(async (req: Request, res: Response) => {
            const { body, credential, prompt, options } = requestContext(req);
            const image = parseUpload(body.image, 'image', 'a base image');
            const mask = parseUpload(body.mask, 'mask', 'a mask image');

            const outcome = await deps.pipeline.runMasked({ image, mask, prompt, credential, options });
            res.json(toResponse(outcome, downloadName(body, deps.maskOutputFilename)));
        })
    );

    return router;
}
