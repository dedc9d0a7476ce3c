import { GenerationPayload } from '../entities/GenerationPayload';
import { GenerationResult } from '../entities/GenerationResult';

/**
 * IImageGenerationClient - Port for the remote image API.
 * Implementations: OpenAIImageApiClient
 */
export interface IImageGenerationClient {
    /**
     * Sends the payload to the endpoint matching its endpoint kind.
     * @param credential API key sent as a bearer token, never logged
     * @throws ApiError classified by failure type
     */
    submit(payload: GenerationPayload, credential: string): Promise<GenerationResult>;
}
