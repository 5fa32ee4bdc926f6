// src/services/collector/SuggestionService.ts

import { CollectedData, FieldDefinition, fieldLabel } from '../../models/collection.model';
import { SessionState } from '../../models/session.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { TextGenerator } from '../llm/types';
import { CollectionConfig } from './CollectionConfig';
import { describeValues, languageSection } from './prompts/collectionPrompts';
import { SUGGESTION_PROMPT_TEMPLATE } from './prompts/suggestionPrompt';
import { fillTemplate } from './prompts/template';

export interface SuggestionResult {
    suggestions: string[];
    /** True when the list came from the field's examples rather than the model. */
    fromExamples: boolean;
}

const NUMBERED_LINE = /^\s*(\d+)[.):-]\s*(.+)$/;
const MAX_SUGGESTIONS = 5;

function toAsciiDigits(text: string): string {
    return text.replace(/[\u0660-\u0669]/g, digit => String(digit.charCodeAt(0) - 0x0660));
}

export interface SuggestionServiceConfig extends ServiceConfig {
    generator: TextGenerator;
}

export class SuggestionService extends BaseService {
    private generator: TextGenerator;

    constructor(config: SuggestionServiceConfig) {
        super(config);
        this.generator = config.generator;
    }

    /** Model suggestions for a field, else its examples, else null. */
    public async suggest(
        config: CollectionConfig,
        field: FieldDefinition,
        data: CollectedData,
        locale: string,
    ): Promise<SuggestionResult | null> {
        const details: string[] = [];
        if (field.options.length > 0) details.push(`Allowed options: ${field.options.join(', ')}`);
        if (field.examples.length > 0) details.push(`Examples: ${field.examples.join(', ')}`);
        if (field.validation) details.push(`Validation: ${field.validation}`);

        const prompt = fillTemplate(SUGGESTION_PROMPT_TEMPLATE, {
            FIELD_NAME: field.name,
            TITLE: config.title,
            FIELD_DESCRIPTION: fieldLabel(field),
            FIELD_DETAILS: details.join('\n'),
            CONTEXT: describeValues(config.fields, data),
            LANGUAGE_SECTION: languageSection(locale),
        });

        const result = await this.generator.generate(config.getSystemPrompt(locale), prompt, { temperature: 0.8 });
        if (result.success) {
            const suggestions = this.parseSuggestions(result.content);
            if (suggestions.length > 0) return { suggestions, fromExamples: false };
            this.logger.warn('Suggestion reply had no usable lines', { field: field.name });
        } else {
            this.logger.warn('Suggestion generation failed', { field: field.name, error: result.error });
        }

        if (field.examples.length > 0) {
            return { suggestions: field.examples.slice(0, MAX_SUGGESTIONS), fromExamples: true };
        }
        return null;
    }

    /** Numbered lines when present, otherwise every non-empty line. */
    public parseSuggestions(content: string): string[] {
        const lines = content
            .split('\n')
            .map(line => line.trim())
            .filter(line => line.length > 0);

        const numbered = lines
            .map(line => NUMBERED_LINE.exec(line))
            .filter((match): match is RegExpExecArray => match !== null)
            .map(match => match[2].replace(/^\*\*(.+)\*\*$/, '$1').trim())
            .filter(line => line.length > 0);

        const picked = numbered.length > 0 ? numbered : lines.map(line => line.replace(/^[-*•]\s*/, ''));
        return picked.slice(0, MAX_SUGGESTIONS);
    }

    /**
     * A bare number ("2", "2.", "٢") picks from the suggestions last shown for
     * the field being asked. Anything else returns null.
     */
    public selectByNumber(message: string, state: SessionState): string | null {
        const cache = state.lastSuggestions;
        if (!cache || cache.field !== state.currentField) return null;

        const match = /^(\d+)[.)]?$/.exec(toAsciiDigits(message.trim()));
        if (!match) return null;

        const index = Number(match[1]) - 1;
        return index >= 0 && index < cache.suggestions.length ? cache.suggestions[index] : null;
    }

    public formatList(suggestions: string[]): string {
        return suggestions.map((suggestion, index) => `${index + 1}. ${suggestion}`).join('\n');
    }
}
