// src/services/llm/types.ts

export interface GenerationOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    /** Ask for a JSON object reply. Ignored by generators without JSON mode. */
    json?: boolean;
}

export interface GenerationResult {
    content: string;
    success: boolean;
    error?: string;
}

/**
 * Text-generation collaborator. Implementations resolve with
 * `success: false` instead of rejecting.
 */
export interface TextGenerator {
    readonly supportsJsonMode: boolean;
    generate(systemPrompt: string, userPrompt: string, options?: GenerationOptions): Promise<GenerationResult>;
}
