// src/services/collector/ContentExtractor.ts

import { z } from 'zod';
import { FieldDefinition } from '../../models/collection.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { TextGenerator } from '../llm/types';
import { CollectionConfig } from './CollectionConfig';
import { CONTENT_EXTRACTION_PROMPT_TEMPLATE } from './prompts/contentExtractionPrompt';
import { describeFields } from './prompts/collectionPrompts';
import { fillTemplate } from './prompts/template';

const extractedValuesSchema = z.record(z.unknown());

// Long documents are cut to keep the request within the model's context.
const MAX_CONTENT_LENGTH = 12000;

export interface ContentExtractorConfig extends ServiceConfig {
    generator: TextGenerator;
}

/** Bulk-fills collector fields from a pasted or uploaded document. */
export class ContentExtractor extends BaseService {
    private generator: TextGenerator;

    constructor(config: ContentExtractorConfig) {
        super(config);
        this.generator = config.generator;
    }

    /** Values found for known fields, as trimmed strings. Failures yield an empty record. */
    public async extract(
        config: CollectionConfig,
        content: string,
        fields: readonly FieldDefinition[] = config.fields,
    ): Promise<Record<string, string>> {
        const systemPrompt = fillTemplate(CONTENT_EXTRACTION_PROMPT_TEMPLATE, {
            FIELD_LIST: describeFields(fields),
        });

        const result = await this.generator.generate(systemPrompt, content.slice(0, MAX_CONTENT_LENGTH), {
            temperature: 0.1,
            json: this.generator.supportsJsonMode,
        });
        if (!result.success) {
            this.logger.warn('Content extraction failed', { collector: config.name, error: result.error });
            return {};
        }

        const match = result.content.match(/\{[\s\S]*\}/);
        if (!match) return {};

        let raw: unknown;
        try {
            raw = JSON.parse(match[0]);
        } catch (error) {
            this.logger.warn('Content extraction reply is not JSON', {
                collector: config.name,
                error: this.errorMessage(error),
            });
            return {};
        }

        const parsed = extractedValuesSchema.safeParse(raw);
        if (!parsed.success) return {};

        const wanted = new Set(fields.map(field => field.name));
        const values: Record<string, string> = {};
        for (const [name, value] of Object.entries(parsed.data)) {
            if (!wanted.has(name)) continue;
            if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') continue;

            const text = String(value).trim();
            if (text) values[name] = text;
        }

        this.logger.info('Extracted values from content', { collector: config.name, fields: Object.keys(values) });
        return values;
    }
}
