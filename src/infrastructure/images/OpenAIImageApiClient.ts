import axios from 'axios';
import { GenerationPayload } from '../../domain/entities/GenerationPayload';
import { GenerationResult, ImageDescriptor } from '../../domain/entities/GenerationResult';
import { ApiError, apiErrorCodeForStatus } from '../../domain/errors';
import { IImageGenerationClient } from '../../domain/ports/IImageGenerationClient';
import { withRetry } from '../http/RetryUtils';

export interface ImageApiClientOptions {
    baseUrl?: string;
    /** Per-attempt timeout (default: 60000) */
    timeoutMs?: number;
    /** Extra attempts after the first, for network and server errors only (default: 2) */
    maxRetries?: number;
    retryBackoffMs?: number;
}

interface PreparedRequest {
    url: string;
    data: Buffer | object;
    headers: Record<string, string>;
}

const ENDPOINT_PATHS: Record<GenerationPayload['endpointKind'], string> = {
    edit: '/v1/images/edits',
    vision: '/v1/responses',
};

/**
 * Client for the OpenAI image edit and vision-guided generation endpoints.
 */
export class OpenAIImageApiClient implements IImageGenerationClient {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly maxRetries: number;
    private readonly retryBackoffMs: number;

    constructor(options: ImageApiClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? 'https://api.openai.com').replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs ?? 60000;
        this.maxRetries = options.maxRetries ?? 2;
        this.retryBackoffMs = options.retryBackoffMs ?? 500;
    }

    async submit(payload: GenerationPayload, credential: string): Promise<GenerationResult> {
        if (!credential || !credential.trim()) {
            throw new ApiError('Unauthorized', 'An API key is required: enter one or set OPENAI_API_KEY');
        }

        const request = this.prepare(payload);
        console.log(`[ImageApi] Submitting ${payload.summary}`);

        return withRetry(
            async (attempt) => {
                const result = await this.send(request, payload.endpointKind, credential.trim());
                console.log(`[ImageApi] Received ${result.images.length} image(s) on attempt ${attempt}`);
                return result;
            },
            {
                maxAttempts: this.maxRetries + 1,
                initialBackoffMs: this.retryBackoffMs,
                isRetryable: (error) => error instanceof ApiError && error.isRetryable(),
                onRetry: (attempt, error, delay) => {
                    const reason = error instanceof ApiError ? error.code : 'error';
                    console.warn(`[ImageApi] Attempt ${attempt} failed (${reason}), retrying in ${Math.round(delay)}ms`);
                },
            }
        );
    }

    /**
     * Multipart bodies are buffered once so every retry sends the same bytes.
     */
    private prepare(payload: GenerationPayload): PreparedRequest {
        const url = `${this.baseUrl}${ENDPOINT_PATHS[payload.endpointKind]}`;

        if (payload.endpointKind === 'edit') {
            return {
                url,
                data: payload.form.getBuffer(),
                headers: payload.form.getHeaders(),
            };
        }
        return {
            url,
            data: payload.body,
            headers: { 'Content-Type': 'application/json' },
        };
    }

    private async send(
        request: PreparedRequest,
        endpointKind: GenerationPayload['endpointKind'],
        credential: string
    ): Promise<GenerationResult> {
        let body: unknown;
        try {
            const response = await axios.post<unknown>(request.url, request.data, {
                headers: {
                    ...request.headers,
                    Authorization: `Bearer ${credential}`,
                },
                timeout: this.timeoutMs,
                maxContentLength: Infinity,
                maxBodyLength: Infinity,
            });
            body = response.data;
        } catch (error) {
            throw this.classify(error);
        }

        const result = endpointKind === 'edit' ? parseEditResponse(body) : parseVisionResponse(body);
        if (result.images.length === 0) {
            throw new ApiError('EmptyResult', 'No images were generated');
        }
        return result;
    }

    private classify(error: unknown): unknown {
        if (!axios.isAxiosError(error)) {
            return error;
        }

        const status = error.response?.status;
        if (status !== undefined) {
            const apiMessage = extractApiMessage(error.response?.data) ?? error.message;
            return new ApiError(apiErrorCodeForStatus(status), `Image API request failed (${status}): ${apiMessage}`, status);
        }

        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
            return new ApiError('NetworkError', `Image API request timed out after ${this.timeoutMs}ms`);
        }
        return new ApiError('NetworkError', `Could not reach the image API: ${error.message}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractApiMessage(data: unknown): string | undefined {
    if (isRecord(data) && isRecord(data.error) && typeof data.error.message === 'string') {
        return data.error.message;
    }
    return undefined;
}

/**
 * images/edits: { data: [{ url } | { b64_json }], ... }
 */
export function parseEditResponse(body: unknown): GenerationResult {
    const items = isRecord(body) && Array.isArray(body.data) ? body.data : [];
    const images: ImageDescriptor[] = [];
    let revisedPrompt: string | undefined;

    for (const item of items) {
        if (!isRecord(item)) continue;
        const descriptor = toDescriptor(item.url, item.b64_json);
        if (descriptor) {
            images.push(descriptor);
        }
        if (!revisedPrompt && typeof item.revised_prompt === 'string') {
            revisedPrompt = item.revised_prompt;
        }
    }
    return { images, revisedPrompt };
}

/**
 * responses: { output: [{ type: 'image_generation_call', result: '<base64>' }, ...] }
 */
export function parseVisionResponse(body: unknown): GenerationResult {
    const outputs = isRecord(body) && Array.isArray(body.output) ? body.output : [];
    const images: ImageDescriptor[] = [];
    let revisedPrompt: string | undefined;

    for (const output of outputs) {
        if (!isRecord(output) || output.type !== 'image_generation_call') continue;
        const descriptor = toDescriptor(output.url, output.result);
        if (descriptor) {
            images.push(descriptor);
        }
        if (!revisedPrompt && typeof output.revised_prompt === 'string') {
            revisedPrompt = output.revised_prompt;
        }
    }
    return { images, revisedPrompt };
}

function toDescriptor(url: unknown, base64: unknown): ImageDescriptor | undefined {
    if (typeof url === 'string' && url) {
        return { kind: 'url', url };
    }
    if (typeof base64 === 'string' && base64) {
        return { kind: 'base64', data: base64 };
    }
    return undefined;
}
