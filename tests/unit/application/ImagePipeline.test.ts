import { promises as fs } from 'fs';
import * as path from 'path';
import { ImagePipeline, loadImage } from '../../../src/application/ImagePipeline';
import { RequestBuilder } from '../../../src/application/RequestBuilder';
import { GenerationPayload } from '../../../src/domain/entities/GenerationPayload';
import { GenerationResult, MaterializedImage } from '../../../src/domain/entities/GenerationResult';
import { createImageAsset } from '../../../src/domain/entities/ImageAsset';
import { ApiError, ValidationError } from '../../../src/domain/errors';
import { IImageGenerationClient } from '../../../src/domain/ports/IImageGenerationClient';
import { IResultMaterializer } from '../../../src/domain/ports/IResultMaterializer';
import { MiB, makeTempDir, pngBytes, writeFixture } from '../../helpers/imageFixtures';

async function validationErrorOf(promise: Promise<unknown>): Promise<ValidationError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof ValidationError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected a ValidationError');
}

describe('ImagePipeline', () => {
    const credential = 'test-api-key';
    const materialized: MaterializedImage[] = [{ index: 0, ok: true, bytes: Buffer.from('png'), source: 'url' }];

    let dir: string;
    let client: jest.Mocked<IImageGenerationClient>;
    let materializer: jest.Mocked<IResultMaterializer>;
    let pipeline: ImagePipeline;

    beforeAll(async () => {
        dir = await makeTempDir();
    });

    afterAll(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });

        const result: GenerationResult = {
            images: [{ kind: 'url', url: 'https://cdn.test.local/a.png' }],
            revisedPrompt: 'revised',
        };
        client = { submit: jest.fn().mockResolvedValue(result) };
        materializer = {
            materialize: jest.fn().mockResolvedValue(materialized),
            saveAll: jest.fn().mockResolvedValue([]),
        };
        pipeline = new ImagePipeline({
            builder: new RequestBuilder({ editModel: 'dall-e-2', visionModel: 'gpt-4o' }),
            client,
            materializer,
        });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    function submittedPayload(): GenerationPayload {
        expect(client.submit).toHaveBeenCalledTimes(1);
        return client.submit.mock.calls[0][0];
    }

    describe('runEdit()', () => {
        it('should validate, submit and materialize a local PNG', async () => {
            const filePath = await writeFixture(dir, 'photo.png', pngBytes(32, 32));

            const outcome = await pipeline.runEdit({ image: filePath, prompt: 'Add a hat', credential });

            expect(outcome).toEqual({ images: materialized, warnings: [], revisedPrompt: 'revised' });
            expect(submittedPayload().endpointKind).toBe('edit');
            expect(client.submit.mock.calls[0][1]).toBe(credential);
            expect(materializer.materialize).toHaveBeenCalledWith({
                images: [{ kind: 'url', url: 'https://cdn.test.local/a.png' }],
                revisedPrompt: 'revised',
            });
        });

        it('should stop at TooLarge for a 4 MiB PNG without calling the API', async () => {
            const filePath = await writeFixture(dir, 'large.png', pngBytes(64, 64, 4 * MiB));

            const error = await validationErrorOf(pipeline.runEdit({ image: filePath, prompt: 'Add a hat', credential }));

            expect(error.code).toBe('TooLarge');
            expect(error.field).toBe('image');
            expect(client.submit).not.toHaveBeenCalled();
        });

        it('should require a prompt before reading the image', async () => {
            const error = await validationErrorOf(
                pipeline.runEdit({ image: path.join(dir, 'missing.png'), prompt: ' ', credential })
            );

            expect(error.code).toBe('PromptRequired');
            expect(error.field).toBe('prompt');
            expect(client.submit).not.toHaveBeenCalled();
        });

        it('should pass API errors through untouched', async () => {
            const rateLimited = new ApiError('RateLimited', 'Image API request failed (429): slow down', 429);
            client.submit.mockRejectedValue(rateLimited);

            await expect(pipeline.runEdit({
                image: { name: 'photo.png', bytes: pngBytes(8, 8) },
                prompt: 'Add a hat',
                credential,
            })).rejects.toBe(rateLimited);
            expect(materializer.materialize).not.toHaveBeenCalled();
        });
    });

    describe('runMultiReference()', () => {
        const reference = { name: 'ref.jpg', mimeType: 'image/jpeg', bytes: Buffer.from([0xff, 0xd8, 0xff]) };

        it.each([0, 5])('should reject %i references before any network call', async (count) => {
            const images = Array.from({ length: count }, () => reference);

            const error = await validationErrorOf(pipeline.runMultiReference({ images, prompt: 'Blend', credential }));

            expect(error.code).toBe('ReferenceCount');
            expect(error.field).toBe('images');
            expect(client.submit).not.toHaveBeenCalled();
        });

        it('should reject an unsupported format and name its slot', async () => {
            const images = [reference, { name: 'scan.bmp', bytes: Buffer.from('BM') }];

            const error = await validationErrorOf(pipeline.runMultiReference({ images, prompt: 'Blend', credential }));

            expect(error.code).toBe('UnsupportedFormat');
            expect(error.field).toBe('images[1]');
            expect(client.submit).not.toHaveBeenCalled();
        });

        it('should send every reference to the vision endpoint', async () => {
            const images = [reference, createImageAsset('other.gif', 'gif', Buffer.from('GIF89a')), reference];

            await pipeline.runMultiReference({ images, prompt: 'Blend', credential, options: { quality: 'high' } });

            const payload = submittedPayload();
            if (payload.endpointKind !== 'vision') {
                throw new Error('Expected a vision payload');
            }
            expect(payload.body.input[0].content).toHaveLength(4);
            expect(payload.body.tools[0].quality).toBe('high');
        });
    });

    describe('runMasked()', () => {
        it('should send the mask and carry dimension warnings', async () => {
            const outcome = await pipeline.runMasked({
                image: { name: 'base.png', bytes: pngBytes(512, 512) },
                mask: { name: 'mask.png', bytes: pngBytes(256, 256) },
                prompt: 'Fill with flowers',
                credential,
            });

            expect(outcome.warnings).toEqual(['Mask is 256x256 but the base image is 512x512; they should match']);
            const payload = submittedPayload();
            if (payload.endpointKind !== 'vision') {
                throw new Error('Expected a vision payload');
            }
            expect(payload.body.tools[0].input_image_mask?.image_url).toMatch(/^data:image\/png;base64,/);
        });

        it('should tag mask problems with the mask field', async () => {
            const error = await validationErrorOf(pipeline.runMasked({
                image: { name: 'base.png', bytes: pngBytes(8, 8) },
                mask: { name: 'mask.png', bytes: Buffer.alloc(0) },
                prompt: 'Fill',
                credential,
            }));

            expect(error.code).toBe('Empty');
            expect(error.field).toBe('mask');
        });
    });

    describe('loadImage()', () => {
        it('should report a missing path as NotFound on the given field', async () => {
            const missing = path.join(dir, 'nowhere.png');

            const error = await validationErrorOf(loadImage(missing, 'edit', 'image'));

            expect(error.code).toBe('NotFound');
            expect(error.message).toBe(`File not found: ${missing}`);
            expect(error.field).toBe('image');
        });
    });
});
