// src/services/collector/FieldTargetDetector.ts

import { z } from 'zod';
import { FieldDefinition } from '../../models/collection.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { TextGenerator } from '../llm/types';
import { CollectionConfig } from './CollectionConfig';
import { describeFields } from './prompts/collectionPrompts';
import { FIELD_TARGET_PROMPT_TEMPLATE } from './prompts/fieldTargetPrompt';
import { fillTemplate } from './prompts/template';

const targetResponseSchema = z.object({
    field: z.string().nullable(),
});

export interface FieldTargetDetectorConfig extends ServiceConfig {
    generator: TextGenerator;
    model?: string;
}

/** Works out which field an "I want to change …" message is about. */
export class FieldTargetDetector extends BaseService {
    private generator: TextGenerator;
    private model?: string;

    constructor(config: FieldTargetDetectorConfig) {
        super(config);
        this.generator = config.generator;
        this.model = config.model;
    }

    public async detect(message: string, config: CollectionConfig): Promise<FieldDefinition | null> {
        const systemPrompt = fillTemplate(FIELD_TARGET_PROMPT_TEMPLATE, {
            FIELD_LIST: describeFields(config.fields),
        });

        const result = await this.generator.generate(systemPrompt, message, {
            model: this.model,
            temperature: 0.1,
            maxTokens: 100,
            json: this.generator.supportsJsonMode,
        });

        if (result.success) {
            const named = this.parse(result.content);
            const field = named ? config.getField(named) : undefined;
            if (field) return field;
        } else {
            this.logger.warn('Field target detection failed, using keyword match', { error: result.error });
        }

        return this.matchByKeyword(message, config);
    }

    /** The field whose name, spaced name or description appears in the message; longest match wins. */
    public matchByKeyword(message: string, config: CollectionConfig): FieldDefinition | null {
        const text = message.toLowerCase();
        let best: { field: FieldDefinition; length: number } | null = null;

        for (const field of config.fields) {
            const candidates = [field.name, field.name.replace(/_/g, ' '), field.description]
                .map(candidate => candidate.trim().toLowerCase())
                .filter(candidate => candidate.length > 0);

            for (const candidate of candidates) {
                if (text.includes(candidate) && (!best || candidate.length > best.length)) {
                    best = { field, length: candidate.length };
                }
            }
        }

        return best?.field ?? null;
    }

    private parse(content: string): string | null {
        const match = content.match(/\{[\s\S]*\}/);
        if (!match) return null;

        try {
            const parsed = targetResponseSchema.safeParse(JSON.parse(match[0]));
            return parsed.success ? parsed.data.field : null;
        } catch (error) {
            this.logger.debug('Field target reply is not JSON', { error: this.errorMessage(error) });
            return null;
        }
    }
}
