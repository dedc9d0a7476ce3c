import * as readline from 'readline/promises';
import { CredentialResolver } from '../../application/CredentialResolver';
import { ImagePipeline, PipelineOutcome, loadImage } from '../../application/ImagePipeline';
import { validatePrompt } from '../../application/RequestBuilder';
import { ImageAsset, ValidationMode } from '../../domain/entities/ImageAsset';
import { ApiError, ValidationError } from '../../domain/errors';
import { IResultMaterializer } from '../../domain/ports/IResultMaterializer';
import { MAX_REFERENCE_IMAGES, validateReferenceCount } from '../../domain/services/InputValidator';

export type CliMode = ValidationMode;

export const CLI_MODES: readonly CliMode[] = ['edit', 'generate', 'mask'];

export function isCliMode(value: string): value is CliMode {
    return CLI_MODES.some((mode) => mode === value);
}

/**
 * Line-based question/answer channel. The terminal uses readline; tests script the answers.
 */
export interface Prompter {
    ask(question: string): Promise<string>;
    close(): void;
}

/**
 * Raised by a prompter whose input ended before the question was answered.
 */
export class InputClosedError extends Error {
    constructor() {
        super('Input closed before the session finished');
        this.name = 'InputClosedError';
    }
}

export class ReadlinePrompter implements Prompter {
    private readonly rl: readline.Interface;
    private readonly closed = new AbortController();

    constructor(input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
        this.rl = readline.createInterface({ input, output });
        // A pending question does not settle on its own when the input ends
        this.rl.once('close', () => this.closed.abort());
    }

    async ask(question: string): Promise<string> {
        if (this.closed.signal.aborted) {
            throw new InputClosedError();
        }
        try {
            return await this.rl.question(question, { signal: this.closed.signal });
        } catch (error) {
            if (this.closed.signal.aborted) {
                throw new InputClosedError();
            }
            throw error;
        }
    }

    close(): void {
        if (!this.closed.signal.aborted) {
            this.rl.close();
        }
    }
}

export interface CliDependencies {
    pipeline: ImagePipeline;
    materializer: IResultMaterializer;
    credentials: CredentialResolver;
    prompter: Prompter;
    outputPath: string;
    maskOutputPath: string;
    log?: (line: string) => void;
}

const IMAGE_QUESTIONS: Record<CliMode, string> = {
    edit: 'Path to the PNG image to edit: ',
    generate: 'Path to reference image 1: ',
    mask: 'Path to the base image: ',
};

/**
 * Terminals wrap dragged-in paths in quotes.
 */
function cleanPath(answer: string): string {
    return answer.trim().replace(/^(['"])(.*)\1$/, '$2');
}

/**
 * Interactive session for one generation. Local validation errors re-ask the
 * same question; API errors end the session with exit code 1.
 */
export class ImageStudioCli {
    private readonly log: (line: string) => void;

    constructor(private readonly deps: CliDependencies) {
        this.log = deps.log ?? ((line) => console.log(line));
    }

    async run(mode: CliMode): Promise<number> {
        this.log(`🎨 Prompt Image Studio (${mode} mode)`);

        try {
            const credential = await this.askCredential();
            const outcome = await this.collectAndRun(mode, credential);
            return await this.report(outcome, mode === 'mask' ? this.deps.maskOutputPath : this.deps.outputPath);
        } catch (error) {
            if (error instanceof ApiError) {
                this.log(`❌ ${error.message}`);
                this.log(`💡 ${error.hint}`);
                return 1;
            }
            if (error instanceof ValidationError || error instanceof InputClosedError) {
                this.log(`❌ ${error.message}`);
                return 1;
            }
            throw error;
        } finally {
            this.deps.prompter.close();
        }
    }

    private async collectAndRun(mode: CliMode, credential: string): Promise<PipelineOutcome> {
        const { pipeline } = this.deps;

        switch (mode) {
            case 'edit': {
                const image = await this.askImage(IMAGE_QUESTIONS.edit, 'edit', 'image');
                const prompt = await this.askPrompt('Describe the edit: ');
                return pipeline.runEdit({ image, prompt, credential });
            }
            case 'generate': {
                const images = await this.askReferences();
                const prompt = await this.askPrompt('Describe the image to generate: ');
                return pipeline.runMultiReference({ images, prompt, credential });
            }
            case 'mask': {
                const image = await this.askImage(IMAGE_QUESTIONS.mask, 'mask', 'image');
                const mask = await this.askImage('Path to the mask image: ', 'mask', 'mask');
                const prompt = await this.askPrompt('Describe what should fill the masked area: ');
                return pipeline.runMasked({ image, mask, prompt, credential });
            }
        }
    }

    private async askCredential(): Promise<string> {
        const configured = this.deps.credentials.resolve();
        if (configured) {
            return configured;
        }

        for (;;) {
            const answer = await this.deps.prompter.ask('Enter your OpenAI API key: ');
            const credential = this.deps.credentials.resolve(answer);
            if (credential) {
                return credential;
            }
            this.log('❌ An API key is required');
        }
    }

    private async askImage(question: string, mode: ValidationMode, field: string): Promise<ImageAsset> {
        for (;;) {
            const answer = cleanPath(await this.deps.prompter.ask(question));
            try {
                return await loadImage(answer, mode, field);
            } catch (error) {
                this.reportValidation(error);
            }
        }
    }

    private async askReferences(): Promise<ImageAsset[]> {
        const images: ImageAsset[] = [];

        while (images.length < MAX_REFERENCE_IMAGES) {
            const index = images.length;
            const question = index === 0
                ? IMAGE_QUESTIONS.generate
                : `Path to reference image ${index + 1} (leave empty to finish): `;
            const answer = cleanPath(await this.deps.prompter.ask(question));

            try {
                if (!answer) {
                    validateReferenceCount(images.length);
                    break;
                }
                images.push(await loadImage(answer, 'generate', `images[${index}]`));
            } catch (error) {
                this.reportValidation(error);
            }
        }

        return images;
    }

    private async askPrompt(question: string): Promise<string> {
        for (;;) {
            const answer = await this.deps.prompter.ask(question);
            try {
                return validatePrompt(answer);
            } catch (error) {
                this.reportValidation(error);
            }
        }
    }

    private reportValidation(error: unknown): void {
        if (!(error instanceof ValidationError)) {
            throw error;
        }
        this.log(`❌ ${error.message}`);
    }

    private async report(outcome: PipelineOutcome, outputPath: string): Promise<number> {
        for (const warning of outcome.warnings) {
            this.log(`⚠️  ${warning}`);
        }
        for (const image of outcome.images) {
            if (!image.ok) {
                this.log(`⚠️  Image ${image.index + 1} could not be retrieved: ${image.error.message}`);
            }
        }

        const written = await this.deps.materializer.saveAll(outcome.images, outputPath);
        if (written.length === 0) {
            this.log('❌ No image could be retrieved from the API response');
            return 1;
        }

        for (const file of written) {
            this.log(`✅ Generated image saved as ${file}`);
        }
        if (outcome.revisedPrompt) {
            this.log(`📝 Revised prompt: ${outcome.revisedPrompt}`);
        }
        return 0;
    }
}
