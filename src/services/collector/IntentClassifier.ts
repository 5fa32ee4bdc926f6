// src/services/collector/IntentClassifier.ts

import { z } from 'zod';
import { CollectedData, FieldDefinition, fieldLabel } from '../../models/collection.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { TextGenerator } from '../llm/types';
import { CANCEL_PHRASES, COMPLETION_PHRASES, CONFIRM_WORDS, REJECT_WORDS } from './i18n';
import { INTENT_CLASSIFICATION_PROMPT_TEMPLATE } from './prompts/intentClassificationPrompt';
import { fillTemplate } from './prompts/template';

export const FIELD_INTENTS = ['provide_value', 'question', 'suggest', 'skip', 'unclear'] as const;
export type FieldIntent = (typeof FIELD_INTENTS)[number];

export interface IntentAnalysis {
    intent: FieldIntent;
    confidence: number;
    extractedValue: string | null;
    reasoning: string;
}

const intentResponseSchema = z.object({
    intent: z.enum(FIELD_INTENTS),
    confidence: z.coerce.number().min(0).max(1).catch(0.5),
    extracted_value: z
        .union([z.string(), z.number(), z.boolean()])
        .nullable()
        .optional()
        .transform(value => {
            if (value === null || value === undefined) return null;
            const text = String(value).trim();
            return text === '' || text.toLowerCase() === 'null' ? null : text;
        }),
    reasoning: z.string().optional().default(''),
});

// Request-to-change phrasings, matched against the normalized message. Each
// must open the message so that answers merely containing them still count.
const REJECTION_PATTERNS: readonly RegExp[] = [
    /^(i\s+)?(want|would like|wanna|need)\s+to\s+(change|modify|edit|correct|update|fix)\b/,
    /^(can|could)\s+(i|we|you)\s+(change|modify|edit|correct|update|fix)\b/,
    /^let\s+me\s+(change|modify|edit|correct|update|fix)\b/,
    /^(that'?s|that\s+is|it'?s|this\s+is)\s+(wrong|incorrect|not\s+right)\b/,
    /^(let'?s\s+|can\s+we\s+|please\s+)?go\s+back(\s+please|\s+to\s+the\s+(previous|last)\s+(question|answer|step))?$/,
    /^(أريد|اريد|أود|اود|ممكن)\s*(تغيير|تعديل|تصحيح)/,
];

const TRAILING_PUNCTUATION = /[\s.!,;:؟?،]+$/;

function normalize(message: string): string {
    return message.trim().toLowerCase().replace(TRAILING_PUNCTUATION, '').replace(/\s+/g, ' ');
}

function matchesPhrase(message: string, phrases: readonly string[]): boolean {
    const text = normalize(message);
    return phrases.some(phrase => text === phrase);
}

function startsWithPhrase(message: string, phrases: readonly string[]): boolean {
    const text = normalize(message);
    return phrases.some(phrase => text === phrase || text.startsWith(`${phrase} `));
}

export interface IntentClassifierConfig extends ServiceConfig {
    generator: TextGenerator;
    /** Model override for classification calls. */
    model?: string;
}

/**
 * Decides what a user's message means for the field being collected, plus the
 * deterministic phrase checks the state machine relies on between model calls.
 */
export class IntentClassifier extends BaseService {
    private generator: TextGenerator;
    private model?: string;

    constructor(config: IntentClassifierConfig) {
        super(config);
        this.generator = config.generator;
        this.model = config.model;
    }

    public async classify(
        message: string,
        currentField: string,
        field: FieldDefinition,
        collectedData: CollectedData,
    ): Promise<IntentAnalysis> {
        const fallback: IntentAnalysis = {
            intent: 'provide_value',
            confidence: 0.5,
            extractedValue: message.trim(),
            reasoning: 'Classification unavailable; treating the message as the answer.',
        };

        const details: string[] = [];
        if (field.options.length > 0) details.push(`Options: ${field.options.join(', ')}`);
        if (field.examples.length > 0) details.push(`Examples: ${field.examples.join(', ')}`);
        if (field.validation) details.push(`Validation: ${field.validation}`);

        const collected = Object.keys(collectedData).filter(name => name !== currentField);
        const systemPrompt = fillTemplate(INTENT_CLASSIFICATION_PROMPT_TEMPLATE, {
            FIELD_NAME: currentField,
            FIELD_DESCRIPTION: fieldLabel(field),
            FIELD_TYPE: field.type,
            FIELD_DETAILS: details.join('\n'),
            COLLECTED_FIELDS: collected.length > 0 ? collected.join(', ') : 'none',
        });

        const result = await this.generator.generate(systemPrompt, message, {
            model: this.model,
            temperature: 0.1,
            maxTokens: 300,
            json: this.generator.supportsJsonMode,
        });

        if (!result.success) {
            this.logger.warn('Intent classification failed, using fallback', { field: currentField, error: result.error });
            return fallback;
        }

        const analysis = this.parse(result.content);
        if (!analysis) {
            this.logger.warn('Unparsable intent classification, using fallback', { field: currentField });
            return fallback;
        }

        this.logger.debug('Intent classified', { field: currentField, intent: analysis.intent, confidence: analysis.confidence });
        return analysis;
    }

    private parse(content: string): IntentAnalysis | null {
        const match = content.match(/\{[\s\S]*\}/);
        if (!match) return null;

        let raw: unknown;
        try {
            raw = JSON.parse(match[0]);
        } catch (error) {
            this.logger.debug('Intent reply is not JSON', { error: this.errorMessage(error) });
            return null;
        }

        const parsed = intentResponseSchema.safeParse(raw);
        if (!parsed.success) return null;

        return {
            intent: parsed.data.intent,
            confidence: parsed.data.confidence,
            extractedValue: parsed.data.extracted_value,
            reasoning: parsed.data.reasoning,
        };
    }

    /** "I want to change …", "that's wrong", or a bare rejection word. */
    public detectRejectionIntent(message: string): boolean {
        if (this.isRejection(message)) return true;
        const text = normalize(message);
        return REJECTION_PATTERNS.some(pattern => pattern.test(text));
    }

    /** "done", "finished", "that's all", "no more changes" and their Arabic forms. */
    public detectCompletionIntent(message: string): boolean {
        return startsWithPhrase(message, COMPLETION_PHRASES);
    }

    public isConfirmation(message: string): boolean {
        return matchesPhrase(message, CONFIRM_WORDS);
    }

    public isRejection(message: string): boolean {
        return matchesPhrase(message, REJECT_WORDS);
    }

    /** Exact cancel phrase, or the phrase followed by more words ("stop please"). */
    public isCancellation(message: string): boolean {
        return startsWithPhrase(message, CANCEL_PHRASES);
    }
}
