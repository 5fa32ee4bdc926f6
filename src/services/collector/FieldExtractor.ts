// src/services/collector/FieldExtractor.ts

import { CollectedData, FieldDefinition } from '../../models/collection.model';
import { isFilled } from '../../models/session.model';
import { BaseService } from '../base/BaseService';
import { CollectionConfig } from './CollectionConfig';
import { isNumericField } from './FieldValidator';
import { IntentAnalysis } from './IntentClassifier';

export const COMPLETE_SIGNAL = 'DATA_COLLECTION_COMPLETE';
export const CANCEL_SIGNAL = 'DATA_COLLECTION_CANCELLED';

export type ExtractionSource = 'marker' | 'summary' | 'intent' | 'direct';

export interface ExtractionResult {
    fields: Record<string, string>;
    source: ExtractionSource | null;
}

export interface ExtractionInput {
    message: string;
    response: string;
    analysis: IntentAnalysis;
    currentField: FieldDefinition;
    config: CollectionConfig;
    collectedData: CollectedData;
}

const MARKER_PATTERN = /FIELD_COLLECTED:(\w+)=(.+?)(?=\n|FIELD_COLLECTED:|$)/g;
const LABELLED_PATTERN = /\*\*([^*:\n]+):?\*\*:?[ \t]*(.+)/g;
const NUMBER_PATTERN = /(\d+(?:\.\d+)?)/;

const LABEL_SYNONYMS: Record<string, string[]> = {
    name: ['course name', 'title', 'name'],
    level: ['difficulty', 'difficulty level', 'level'],
    lessons_count: ['lessons', 'number of lessons', 'lesson count', 'lessons count'],
};

const NO_RESULT: ExtractionResult = { fields: {}, source: null };

/**
 * Pulls a value for the current field out of a turn. Strategies run in a
 * fixed order and the first one that yields something wins.
 */
export class FieldExtractor extends BaseService {
    public extract(input: ExtractionInput): ExtractionResult {
        const { currentField, collectedData } = input;
        const keep = (fields: Record<string, string>) =>
            this.filterToCurrentField(fields, currentField.name, collectedData);

        const markers = this.parseMarkers(input.response);
        const fromMarkers = keep(markers);
        if (Object.keys(fromMarkers).length > 0) return { fields: fromMarkers, source: 'marker' };

        if (Object.keys(markers).length > 0) {
            const fromSummary = keep(this.parseLabelledSummary(input.response, input.config));
            if (Object.keys(fromSummary).length > 0) return { fields: fromSummary, source: 'summary' };
        }

        if (input.analysis.intent === 'provide_value' && input.analysis.extractedValue) {
            const fromIntent = keep({ [currentField.name]: input.analysis.extractedValue });
            if (Object.keys(fromIntent).length > 0) return { fields: fromIntent, source: 'intent' };
        }

        const direct = this.extractFromMessage(input.message, currentField);
        if (direct !== null) {
            const fromMessage = keep({ [currentField.name]: direct });
            if (Object.keys(fromMessage).length > 0) return { fields: fromMessage, source: 'direct' };
        }

        return NO_RESULT;
    }

    /** Every `FIELD_COLLECTED:name=value` marker; a later marker for a name wins. */
    public parseMarkers(response: string): Record<string, string> {
        const fields: Record<string, string> = {};
        for (const match of response.matchAll(MARKER_PATTERN)) {
            const value = match[2].trim();
            if (value) fields[match[1]] = value;
        }
        return fields;
    }

    public parseLabelledSummary(response: string, config: CollectionConfig): Record<string, string> {
        const fields: Record<string, string> = {};

        for (const match of response.matchAll(LABELLED_PATTERN)) {
            const field = this.resolveLabel(match[1], config);
            if (!field || fields[field.name]) continue;

            const value = this.cleanLabelledValue(match[2], field);
            if (value) fields[field.name] = value;
        }

        return fields;
    }

    /**
     * Heuristic read of the raw message: an option for select fields, the
     * first number for numeric fields, otherwise the whole message unless it
     * is a single character or a question.
     */
    public extractFromMessage(message: string, field: FieldDefinition): string | null {
        const text = message.trim();
        const lower = text.toLowerCase();

        if (field.type === 'select' && field.options.length > 0) {
            const option = field.options.find(candidate => lower.includes(candidate.toLowerCase()));
            if (option) return option;
        }

        if (isNumericField(field)) {
            const number = NUMBER_PATTERN.exec(text);
            if (number) return number[1];
        }

        if (text.length >= 2 && !text.endsWith('?') && !text.endsWith('؟')) return text;
        return null;
    }

    /** Drops other fields, and any field that already holds a value. */
    public filterToCurrentField(
        fields: Record<string, string>,
        currentField: string,
        collectedData: CollectedData,
    ): Record<string, string> {
        const dropped = Object.keys(fields).filter(name => name !== currentField);
        if (dropped.length > 0) {
            this.logger.debug('Ignoring extracted values for other fields', { currentField, dropped });
        }

        const value = fields[currentField];
        if (value === undefined || isFilled(collectedData[currentField])) return {};
        return { [currentField]: value };
    }

    /** Strips markers and control signals from a model reply before it is shown. */
    public cleanResponse(response: string): string {
        return response
            .replace(MARKER_PATTERN, '')
            .replace(new RegExp(`${COMPLETE_SIGNAL}|${CANCEL_SIGNAL}`, 'g'), '')
            .replace(/\n{3,}/g, '\n\n')
            .trim();
    }

    public hasCompletionSignal(response: string): boolean {
        return response.includes(COMPLETE_SIGNAL);
    }

    public hasCancellationSignal(response: string): boolean {
        return response.includes(CANCEL_SIGNAL);
    }

    private resolveLabel(label: string, config: CollectionConfig): FieldDefinition | undefined {
        const wanted = label.trim().toLowerCase();

        for (const field of config.fields) {
            const names = [
                field.name.toLowerCase(),
                field.name.replace(/_/g, ' ').toLowerCase(),
                field.description.trim().toLowerCase(),
                ...(LABEL_SYNONYMS[field.name] ?? []),
            ];
            if (names.includes(wanted)) return field;
        }

        return config.getField(wanted.replace(/\s+/g, '_'));
    }

    private cleanLabelledValue(raw: string, field: FieldDefinition): string {
        const value = raw
            .replace(/\s*\([^)]*\)\s*$/, '')
            .replace(/[.,;:]+$/, '')
            .trim();

        if (isNumericField(field)) {
            const number = NUMBER_PATTERN.exec(value);
            return number ? number[1] : value;
        }

        if (field.type === 'select') {
            const lower = value.toLowerCase();
            return field.options.find(option => lower.includes(option.toLowerCase())) ?? value;
        }

        return value;
    }
}
