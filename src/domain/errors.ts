import { MaterializeFailureCode } from './entities/GenerationResult';

/**
 * Local input problems. Raised before any network call.
 */
export type ValidationErrorCode =
    | 'NotFound'
    | 'UnsupportedFormat'
    | 'TooLarge'
    | 'Empty'
    | 'PromptRequired'
    | 'PromptTooLong'
    | 'ReferenceCount';

/**
 * Failures reported by (or on the way to) the remote image API.
 */
export type ApiErrorCode =
    | 'Unauthorized'
    | 'RateLimited'
    | 'BadRequest'
    | 'ServerError'
    | 'NetworkError'
    | 'EmptyResult';

export class ValidationError extends Error {
    constructor(
        public readonly code: ValidationErrorCode,
        message: string,
        /** Input field the error belongs to, e.g. "image", "mask", "prompt" */
        public readonly field?: string
    ) {
        super(message);
        this.name = 'ValidationError';
    }

    withField(field: string): ValidationError {
        return new ValidationError(this.code, this.message, field);
    }
}

const API_ERROR_HINTS: Record<ApiErrorCode, string> = {
    Unauthorized: 'Check that your API key is correct and still active.',
    RateLimited: 'The API is rate limiting requests. Wait a minute, then retry.',
    BadRequest: 'The API rejected the request. Check the prompt, the image format and the parameters.',
    ServerError: 'The image service had an internal error. Try again later.',
    NetworkError: 'Could not reach the image service. Check your connection and retry.',
    EmptyResult: 'No image came back. Try rephrasing the prompt.',
};

export class ApiError extends Error {
    public readonly hint: string;

    constructor(
        public readonly code: ApiErrorCode,
        message: string,
        public readonly statusCode?: number
    ) {
        super(message);
        this.name = 'ApiError';
        this.hint = API_ERROR_HINTS[code];
    }

    /**
     * Only transient failures are retried; auth, rate limit and request
     * errors go straight back to the caller.
     */
    isRetryable(): boolean {
        return this.code === 'NetworkError' || this.code === 'ServerError';
    }
}

export class MaterializeError extends Error {
    constructor(
        public readonly code: MaterializeFailureCode,
        message: string
    ) {
        super(message);
        this.name = 'MaterializeError';
    }
}

/**
 * Maps an HTTP status from the API to an error class.
 */
export function apiErrorCodeForStatus(status: number): ApiErrorCode {
    if (status === 401 || status === 403) return 'Unauthorized';
    if (status === 429) return 'RateLimited';
    if (status >= 500) return 'ServerError';
    return 'BadRequest';
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
