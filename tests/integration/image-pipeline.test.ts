import { promises as fs } from 'fs';
import * as path from 'path';
import nock from 'nock';
import request from 'supertest';
import { Config, loadConfig } from '../../src/config';
import { createDependencies } from '../../src/dependencies';
import { createApp } from '../../src/presentation/app';
import { ImageStudioCli, Prompter } from '../../src/presentation/cli/ImageStudioCli';
import { MiB, makeTempDir, pngBytes, writeFixture } from '../helpers/imageFixtures';

class ScriptedPrompter implements Prompter {
    constructor(private readonly answers: string[]) { }

    async ask(question: string): Promise<string> {
        const answer = this.answers.shift();
        if (answer === undefined) {
            throw new Error(`Unexpected question: ${question}`);
        }
        return answer;
    }

    close(): void { }
}

/**
 * Full request path: validation, multipart or JSON body, HTTP call, download
 * and save, with the image API and CDN stubbed by nock.
 */
describe('Image pipeline (integration)', () => {
    const apiBase = 'https://images.test.local';
    const cdn = 'https://cdn.test.local';
    const resultBytes = pngBytes(256, 256);

    let dir: string;
    let config: Config;

    beforeAll(() => {
        nock.disableNetConnect();
        nock.enableNetConnect('127.0.0.1');
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(async () => {
        nock.cleanAll();
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });

        dir = await makeTempDir();
        config = {
            ...loadConfig(),
            openaiApiKey: 'test-api-key',
            openaiBaseUrl: apiBase,
            requestTimeoutMs: 2000,
            maxRetries: 2,
            retryBackoffMs: 1,
            outputPath: path.join(dir, 'out', 'generated_image.png'),
            maskOutputPath: path.join(dir, 'out', 'masked_image.png'),
        };
    });

    afterEach(async () => {
        nock.cleanAll();
        jest.restoreAllMocks();
        await fs.rm(dir, { recursive: true, force: true });
    });

    describe('CLI', () => {
        it('should edit a 2 MiB PNG and write exactly one file', async () => {
            const photo = await writeFixture(dir, 'photo.png', pngBytes(512, 512, 2 * MiB));
            nock(apiBase)
                .post('/v1/images/edits')
                .matchHeader('authorization', 'Bearer test-api-key')
                .reply(200, { data: [{ url: `${cdn}/result.png` }] });
            nock(cdn).get('/result.png').reply(200, resultBytes);

            const deps = createDependencies(config);
            const cli = new ImageStudioCli({
                ...deps,
                prompter: new ScriptedPrompter([photo, 'Add a sunset background']),
                outputPath: config.outputPath,
                maskOutputPath: config.maskOutputPath,
                log: () => { },
            });

            const code = await cli.run('edit');

            expect(code).toBe(0);
            expect(await fs.readdir(path.join(dir, 'out'))).toEqual(['generated_image.png']);
            expect((await fs.readFile(config.outputPath)).equals(resultBytes)).toBe(true);
            expect(nock.isDone()).toBe(true);
        });

        it('should exit with 1 after three timeouts', async () => {
            const photo = await writeFixture(dir, 'photo.png', pngBytes(64, 64));
            nock(apiBase)
                .post('/v1/images/edits')
                .times(3)
                .replyWithError({ code: 'ETIMEDOUT', message: 'connect ETIMEDOUT' });
            nock(apiBase)
                .post('/v1/images/edits')
                .reply(200, { data: [{ url: `${cdn}/result.png` }] });

            const lines: string[] = [];
            const cli = new ImageStudioCli({
                ...createDependencies(config),
                prompter: new ScriptedPrompter([photo, 'Add a sunset background']),
                outputPath: config.outputPath,
                maskOutputPath: config.maskOutputPath,
                log: (line) => lines.push(line),
            });

            const code = await cli.run('edit');

            expect(code).toBe(1);
            expect(lines).toContain('❌ Image API request timed out after 2000ms');
            expect(nock.pendingMocks()).toHaveLength(1);
        });
    });

    describe('Web', () => {
        it('should retry a server error and return the generated image', async () => {
            let submittedTool: unknown;
            nock(apiBase)
                .post('/v1/responses')
                .reply(502, { error: { message: 'Bad gateway' } })
                .post('/v1/responses', (body: { tools: unknown[] }) => {
                    submittedTool = body.tools[0];
                    return true;
                })
                .reply(200, {
                    output: [{ type: 'image_generation_call', result: resultBytes.toString('base64') }],
                });

            const res = await request(createApp(config)).post('/api/generate').send({
                prompt: 'Combine both into a poster',
                quality: 'high',
                images: [
                    { name: 'a.png', data: pngBytes(64, 64).toString('base64') },
                    { name: 'b.png', data: pngBytes(64, 64).toString('base64') },
                ],
            });

            expect(res.status).toBe(200);
            expect(res.body.images).toEqual([{
                index: 0,
                ok: true,
                filename: 'generated_image.png',
                mimeType: 'image/png',
                data: resultBytes.toString('base64'),
            }]);
            expect(submittedTool).toEqual({ type: 'image_generation', size: '1024x1024', quality: 'high' });
            expect(nock.isDone()).toBe(true);
        });

        it('should reject an oversized edit without calling the API', async () => {
            const res = await request(createApp(config)).post('/api/edit').send({
                prompt: 'Add a sunset background',
                image: { name: 'large.png', data: pngBytes(64, 64, 4 * MiB).toString('base64') },
            });

            expect(res.status).toBe(400);
            expect(res.body.error).toEqual({
                message: 'large.png is 4.0 MB; files must be smaller than 4.0 MB in edit mode',
                code: 'TooLarge',
                field: 'image',
            });
            expect(nock.pendingMocks()).toEqual([]);
        });
    });
});
