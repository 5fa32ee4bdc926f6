// src/services/llm/groq.service.ts

import Groq from 'groq-sdk';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { GenerationOptions, GenerationResult, TextGenerator } from './types';

export interface GroqTextGeneratorConfig extends ServiceConfig {
    apiKey: string;
    model: string;
    maxTokens: number;
    temperature?: number;
}

export class GroqTextGenerator extends BaseService implements TextGenerator {
    public readonly supportsJsonMode = true;
    private client: Groq;
    private model: string;
    private maxTokens: number;
    private temperature: number;

    constructor(config: GroqTextGeneratorConfig) {
        super(config);
        if (!config.apiKey) {
            throw new Error('GROQ_API_KEY environment variable is required');
        }
        this.client = new Groq({ apiKey: config.apiKey });
        this.model = config.model;
        this.maxTokens = config.maxTokens;
        this.temperature = config.temperature ?? 0.7;
    }

    public async generate(
        systemPrompt: string,
        userPrompt: string,
        options: GenerationOptions = {},
    ): Promise<GenerationResult> {
        const model = options.model ?? this.model;
        try {
            const response = await this.client.chat.completions.create({
                model,
                messages: [
                    { role: 'system', content: systemPrompt },
                    { role: 'user', content: userPrompt },
                ],
                temperature: options.temperature ?? this.temperature,
                max_tokens: options.maxTokens ?? this.maxTokens,
                stream: false,
                ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
            });

            const content = response.choices[0]?.message?.content ?? '';
            this.logger.debug('Groq completion received', { model, length: content.length });
            return { content, success: true };
        } catch (error) {
            const message = this.errorMessage(error);
            this.logger.error('Groq API error', { model, error: message });
            return { content: '', success: false, error: `Groq API error: ${message}` };
        }
    }
}

/** Stand-in used when no API key is configured; every call falls back. */
export class OfflineTextGenerator implements TextGenerator {
    public readonly supportsJsonMode = false;

    public async generate(): Promise<GenerationResult> {
        return { content: '', success: false, error: 'Text generation is not configured' };
    }
}
