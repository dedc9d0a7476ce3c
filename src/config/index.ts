import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 * Loaded once at startup and treated as read-only afterwards.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    jsonBodyLimit: string;
    corsOrigins: string[];

    // Image API
    openaiApiKey: string; // May be empty: the CLI and web form can ask for it
    openaiBaseUrl: string;
    editModel: string;
    visionModel: string;
    requestTimeoutMs: number;
    maxRetries: number;
    retryBackoffMs: number;

    // Output
    outputPath: string;
    maskOutputPath: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string, defaultValue: string[]): string[] {
    const value = getEnvVar(key, '');
    if (!value) {
        return defaultValue;
    }
    return value.split(',').map((item) => item.trim()).filter(Boolean);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        jsonBodyLimit: getEnvVar('JSON_BODY_LIMIT', '100mb'),
        corsOrigins: getEnvVarList('CORS_ORIGINS', ['http://localhost:3000', 'http://localhost:8080']),

        // Image API
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com'),
        editModel: getEnvVar('EDIT_MODEL', 'dall-e-2'),
        visionModel: getEnvVar('VISION_MODEL', 'gpt-4o'),
        requestTimeoutMs: getEnvVarNumber('REQUEST_TIMEOUT_MS', 60000),
        maxRetries: getEnvVarNumber('MAX_RETRIES', 2),
        retryBackoffMs: getEnvVarNumber('RETRY_BACKOFF_MS', 500),

        // Output
        outputPath: getEnvVar('OUTPUT_PATH', 'generated_image.png'),
        maskOutputPath: getEnvVar('MASK_OUTPUT_PATH', 'masked_image.png'),
    };
}

/**
 * Validates configuration values. Returns one message per problem.
 * A missing API key is not an error: both front ends accept one interactively.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
        errors.push(`PORT must be an integer between 1 and 65535, got: ${config.port}`);
    }
    if (config.requestTimeoutMs <= 0) {
        errors.push('REQUEST_TIMEOUT_MS must be greater than 0');
    }
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
        errors.push('MAX_RETRIES must be a non-negative integer');
    }
    if (config.retryBackoffMs < 0) {
        errors.push('RETRY_BACKOFF_MS must not be negative');
    }
    try {
        new URL(config.openaiBaseUrl);
    } catch {
        errors.push(`OPENAI_BASE_URL must be a valid URL, got: ${config.openaiBaseUrl}`);
    }
    if (!config.outputPath) {
        errors.push('OUTPUT_PATH must not be empty');
    }
    if (!config.maskOutputPath) {
        errors.push('MASK_OUTPUT_PATH must not be empty');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = Object.freeze(loadConfig());
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
