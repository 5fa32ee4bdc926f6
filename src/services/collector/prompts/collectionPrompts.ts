// src/services/collector/prompts/collectionPrompts.ts

import { CollectedData, CollectionDefinition, FieldDefinition, fieldLabel } from '../../../models/collection.model';
import { HistoryMessage } from '../../../models/session.model';
import { DEFAULT_LOCALE, localeName } from '../i18n';
import { fillTemplate } from './template';

export const COLLECTION_SYSTEM_PROMPT_TEMPLATE = `{{INTRO}}

Fields to collect:
{{FIELD_LIST}}

*** RULES - FOLLOW EXACTLY ***
1. Ask for one field at a time, in the order listed.
2. When the user gives a value for the field you are asking about, acknowledge it in one short sentence and add a line of the form:
FIELD_COLLECTED:<field_name>=<value>
3. Only emit FIELD_COLLECTED for the field you are currently asking about. Never emit it for fields that already have a value.
4. Never invent values the user did not give. If the answer is unclear, ask again.
5. If the user clearly wants to stop, add the line DATA_COLLECTION_CANCELLED.
6. When every required field has a value, add the line DATA_COLLECTION_COMPLETE.
{{LANGUAGE_SECTION}}`;

export const ENHANCEMENT_SYSTEM_PROMPT_TEMPLATE = `The user is reviewing information they already provided for "{{TITLE}}" and wants to change something.

Current values:
{{CURRENT_VALUES}}

Fields:
{{FIELD_LIST}}

For every value the user wants to change, output one line:
FIELD_COLLECTED:<field_name>=<new value>
Use the exact field names above. Do not repeat unchanged values. If the request does not name a new value, reply with a short question asking for it and no FIELD_COLLECTED lines.
{{LANGUAGE_SECTION}}`;

function describeField(field: FieldDefinition): string {
    const parts = [`- ${field.name} (${field.required ? 'required' : 'optional'}): ${fieldLabel(field)}`];
    if (field.type !== 'text') parts.push(`type: ${field.type}`);
    if (field.options.length > 0) parts.push(`options: ${field.options.join(', ')}`);
    if (field.examples.length > 0) parts.push(`examples: ${field.examples.join(', ')}`);
    if (field.validation) parts.push(`validation: ${field.validation}`);
    return parts.join(' | ');
}

export function describeFields(fields: readonly FieldDefinition[]): string {
    return fields.map(describeField).join('\n');
}

export function describeValues(fields: readonly FieldDefinition[], data: CollectedData): string {
    const lines = fields.filter(field => field.name in data).map(field => `- ${field.name}: ${String(data[field.name])}`);
    return lines.length > 0 ? lines.join('\n') : '(nothing yet)';
}

export function languageSection(locale: string): string {
    if (locale === DEFAULT_LOCALE) return '';
    return `\nLANGUAGE: Respond in ${localeName(locale)} (${locale}). Keep FIELD_COLLECTED lines and field names exactly as specified, in English.`;
}

export function buildCollectionSystemPrompt(definition: CollectionDefinition, locale: string): string {
    const intro =
        definition.systemPrompt ??
        `You are a helpful assistant collecting information for "${definition.title || definition.name}".${
            definition.description ? `\n${definition.description}` : ''
        }`;

    return fillTemplate(COLLECTION_SYSTEM_PROMPT_TEMPLATE, {
        INTRO: intro,
        FIELD_LIST: describeFields(definition.fields),
        LANGUAGE_SECTION: languageSection(locale),
    });
}

export function buildEnhancementSystemPrompt(
    definition: CollectionDefinition,
    data: CollectedData,
    locale: string,
): string {
    return fillTemplate(ENHANCEMENT_SYSTEM_PROMPT_TEMPLATE, {
        TITLE: definition.title || definition.name,
        CURRENT_VALUES: describeValues(definition.fields, data),
        FIELD_LIST: describeFields(definition.fields),
        LANGUAGE_SECTION: languageSection(locale),
    });
}

export interface ContextPromptInput {
    fields: readonly FieldDefinition[];
    collectedData: CollectedData;
    currentField: FieldDefinition | null;
    history: HistoryMessage[];
    message: string;
}

const HISTORY_WINDOW = 6;

/** Per-turn user prompt: what is known, what is being asked, and the recent exchange. */
export function buildContextPrompt(input: ContextPromptInput): string {
    const sections = [`Collected so far:\n${describeValues(input.fields, input.collectedData)}`];

    if (input.currentField) {
        sections.push(`Current field to collect: ${describeField(input.currentField).slice(2)}`);
    }

    // the latest user message is already the last history entry
    const recent = input.history.slice(-HISTORY_WINDOW - 1, -1);
    if (recent.length > 0) {
        const transcript = recent
            .map(entry => `${entry.role === 'user' ? 'User' : 'Assistant'}: ${entry.content}`)
            .join('\n');
        sections.push(`Recent conversation:\n${transcript}`);
    }

    sections.push(`User: ${input.message}`);
    return sections.join('\n\n');
}
