import axios from 'axios';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
    GenerationResult,
    ImageDescriptor,
    MaterializedImage,
    describeDescriptor,
    successfulImages,
} from '../../domain/entities/GenerationResult';
import { MaterializeError, errorMessage } from '../../domain/errors';
import { IResultMaterializer } from '../../domain/ports/IResultMaterializer';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const DATA_URL_PATTERN = /^data:[^;,]+;base64,/;

/**
 * Output path for one image of a batch. A single image takes the path as-is;
 * batches get a 1-based suffix: generated_image.png -> generated_image_2.png
 */
export function outputPathFor(outputPath: string, index: number, total: number): string {
    if (total <= 1) {
        return outputPath;
    }
    const parsed = path.parse(outputPath);
    return path.join(parsed.dir, `${parsed.name}_${index + 1}${parsed.ext || '.png'}`);
}

/**
 * Decodes inline base64 image data (bare or as a data URL).
 */
export function decodeBase64Image(data: string): Buffer {
    const cleaned = data.replace(DATA_URL_PATTERN, '').replace(/\s+/g, '');
    if (!cleaned || cleaned.length % 4 === 1 || !BASE64_PATTERN.test(cleaned)) {
        throw new MaterializeError('DecodeFailed', 'Inline image data is not valid base64');
    }
    const bytes = Buffer.from(cleaned, 'base64');
    if (bytes.length === 0) {
        throw new MaterializeError('DecodeFailed', 'Inline image data decoded to zero bytes');
    }
    return bytes;
}

/**
 * Downloads or decodes the images of a GenerationResult.
 * Items are handled one after another; a failed item becomes a failure
 * marker and the rest of the batch is still returned.
 */
export class ResultMaterializer implements IResultMaterializer {
    constructor(private readonly downloadTimeoutMs: number = 60000) { }

    async materialize(result: GenerationResult): Promise<MaterializedImage[]> {
        const images: MaterializedImage[] = [];

        for (const [index, descriptor] of result.images.entries()) {
            try {
                const bytes = await this.fetchBytes(descriptor);
                images.push({ index, ok: true, bytes, source: descriptor.kind });
            } catch (error) {
                const failure = error instanceof MaterializeError
                    ? error
                    : new MaterializeError('DownloadFailed', errorMessage(error));
                console.warn(`[Materializer] Image ${index + 1} (${describeDescriptor(descriptor)}) failed: ${failure.message}`);
                images.push({ index, ok: false, error: { code: failure.code, message: failure.message } });
            }
        }

        const okCount = successfulImages(images).length;
        console.log(`[Materializer] ${okCount}/${images.length} image(s) ready`);
        return images;
    }

    async saveAll(images: readonly MaterializedImage[], outputPath: string): Promise<string[]> {
        const successes = successfulImages(images);
        const written: string[] = [];

        for (const image of successes) {
            const target = outputPathFor(outputPath, image.index, successes.length);
            const dir = path.dirname(target);
            if (dir && dir !== '.') {
                await fs.mkdir(dir, { recursive: true });
            }
            await fs.writeFile(target, image.bytes);
            written.push(target);
        }

        return written;
    }

    private async fetchBytes(descriptor: ImageDescriptor): Promise<Buffer> {
        if (descriptor.kind === 'base64') {
            return decodeBase64Image(descriptor.data);
        }
        if (DATA_URL_PATTERN.test(descriptor.url)) {
            return decodeBase64Image(descriptor.url);
        }
        return this.download(descriptor.url);
    }

    private async download(url: string): Promise<Buffer> {
        try {
            const response = await axios.get<ArrayBuffer>(url, {
                responseType: 'arraybuffer',
                timeout: this.downloadTimeoutMs,
            });
            const bytes = Buffer.from(response.data);
            if (bytes.length === 0) {
                throw new MaterializeError('DownloadFailed', `Downloaded image from ${url} is empty`);
            }
            return bytes;
        } catch (error) {
            if (error instanceof MaterializeError) {
                throw error;
            }
            if (axios.isAxiosError(error) && error.response) {
                throw new MaterializeError('DownloadFailed', `Download failed with status ${error.response.status}`);
            }
            throw new MaterializeError('DownloadFailed', `Download failed: ${errorMessage(error)}`);
        }
    }
}
