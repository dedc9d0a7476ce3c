import { Config } from './config';
import { CredentialResolver } from './application/CredentialResolver';
import { ImagePipeline } from './application/ImagePipeline';
import { RequestBuilder } from './application/RequestBuilder';
import { OpenAIImageApiClient } from './infrastructure/images/OpenAIImageApiClient';
import { ResultMaterializer } from './infrastructure/storage/ResultMaterializer';

export interface AppDependencies {
    pipeline: ImagePipeline;
    materializer: ResultMaterializer;
    credentials: CredentialResolver;
}

/**
 * Creates all dependencies with proper wiring. Shared by the CLI and the server.
 */
export function createDependencies(config: Config): AppDependencies {
    const builder = new RequestBuilder({
        editModel: config.editModel,
        visionModel: config.visionModel,
    });
    const client = new OpenAIImageApiClient({
        baseUrl: config.openaiBaseUrl,
        timeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        retryBackoffMs: config.retryBackoffMs,
    });
    const materializer = new ResultMaterializer(config.requestTimeoutMs);
    const credentials = new CredentialResolver(config.openaiApiKey);

    console.log(`✅ Image API: ${config.openaiBaseUrl} (edit: ${config.editModel}, vision: ${config.visionModel})`);
    console.log(`🔑 API key: ${credentials.describe()}`);

    return {
        pipeline: new ImagePipeline({ builder, client, materializer }),
        materializer,
        credentials,
    };
}
