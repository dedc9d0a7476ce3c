import FormData from 'form-data';

/**
 * API-ready request bodies, one shape per endpoint kind.
 */

export type VisionContentPart =
    | { type: 'input_text'; text: string }
    | { type: 'input_image'; image_url: string };

export interface ImageGenerationTool {
    type: 'image_generation';
    size: string;
    quality: 'medium' | 'high';
    input_image_mask?: { image_url: string };
}

export interface VisionRequestBody {
    model: string;
    input: Array<{ role: 'user'; content: VisionContentPart[] }>;
    tools: ImageGenerationTool[];
}

export interface EditPayload {
    endpointKind: 'edit';
    form: FormData;
    /** Short description for logs; never contains image bytes or credentials */
    summary: string;
}

export interface VisionPayload {
    endpointKind: 'vision';
    body: VisionRequestBody;
    summary: string;
}

export type GenerationPayload = EditPayload | VisionPayload;
