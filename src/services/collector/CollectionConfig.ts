// src/services/collector/CollectionConfig.ts

import { v4 as uuidv4 } from 'uuid';
import {
    CollectedData,
    collectionDefinitionSchema,
    CollectionDefinition,
    collectionInputSchema,
    FieldDefinition,
    fieldLabel,
    FieldType,
    FieldValue,
    ParsedCollectionInput,
    ParsedFieldInput,
} from '../../models/collection.model';
import { isFilled } from '../../models/session.model';
import { CollectorConfigError } from './errors';
import { parseRules, validationHints } from './FieldValidator';
import { translate } from './i18n';
import { buildCollectionSystemPrompt } from './prompts/collectionPrompts';
import { fillFieldPlaceholders } from './prompts/template';

function normalizeFieldType(type: string | undefined, hasOptions: boolean): FieldType {
    switch (type) {
        case 'number':
            return 'number';
        case 'select':
            return 'select';
        case 'text':
        case 'string':
            return 'text';
        default:
            return hasOptions ? 'select' : 'text';
    }
}

function splitList(value: string): string[] {
    return value
        .split(',')
        .map(item => item.trim())
        .filter(item => item.length > 0);
}

/**
 * Parses the compact form `"description | required | min:3 | type:number | examples:a,b"`.
 * Parts that are not field attributes are kept as validation rules.
 */
export function parseCompactField(name: string, spec: string, order: number): FieldDefinition {
    const [description = '', ...parts] = spec.split('|').map(part => part.trim());
    const rules: string[] = [];
    let required = true;
    let type: string | undefined;
    let examples: string[] = [];
    let options: string[] = [];
    let defaultValue: FieldValue | undefined;

    for (const part of parts) {
        if (!part) continue;
        const colon = part.indexOf(':');
        const key = colon === -1 ? part : part.slice(0, colon);
        const value = colon === -1 ? '' : part.slice(colon + 1).trim();

        if (part === 'optional' || part === 'required:false') {
            required = false;
        } else if (key === 'type') {
            type = value;
        } else if (key === 'examples') {
            examples = splitList(value);
        } else if (key === 'options') {
            options = splitList(value);
        } else if (key === 'default') {
            defaultValue = value;
        } else {
            rules.push(part);
        }
    }

    return {
        name,
        type: normalizeFieldType(type, options.length > 0),
        description,
        validation: rules.join('|'),
        required,
        examples,
        options,
        ...(defaultValue !== undefined ? { default: defaultValue } : {}),
        order,
    };
}

function fromFieldObject(name: string, input: ParsedFieldInput, index: number): FieldDefinition {
    const options = input.options ?? [];
    return {
        name,
        type: normalizeFieldType(input.type, options.length > 0),
        description: input.description ?? '',
        validation: input.validation ?? '',
        required: input.required ?? true,
        examples: input.examples ?? [],
        options,
        ...(input.default !== undefined ? { default: input.default } : {}),
        ...(input.prompt !== undefined ? { prompt: input.prompt } : {}),
        order: input.order ?? index,
    };
}

function normalizeFields(fields: ParsedCollectionInput['fields']): FieldDefinition[] {
    const normalized = Array.isArray(fields)
        ? fields.map((field, index) => fromFieldObject(field.name, field, index))
        : Object.entries(fields).map(([name, field], index) =>
              typeof field === 'string' ? parseCompactField(name, field, index) : fromFieldObject(name, field, index),
          );

    return normalized
        .map(field => ({
            ...field,
            required: field.required || field.validation.split('|').some(rule => rule.trim() === 'required'),
        }))
        .sort((a, b) => a.order - b.order);
}

function collectIssues(definition: CollectionDefinition): string[] {
    const issues: string[] = [];
    if (definition.fields.length === 0) issues.push('at least one field is required');

    const seen = new Set<string>();
    for (const field of definition.fields) {
        if (seen.has(field.name)) issues.push(`duplicate field "${field.name}"`);
        seen.add(field.name);

        if (field.type === 'select' && field.options.length === 0) {
            issues.push(`select field "${field.name}" has no options`);
        }

        try {
            parseRules(field.validation);
        } catch (error) {
            issues.push(`field "${field.name}": ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    return issues;
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

function humanize(name: string): string {
    const spaced = name.replace(/_/g, ' ');
    return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

/**
 * Immutable collector definition plus the field bookkeeping the
 * conversation needs: ordering, completeness and the static prompts.
 */
export class CollectionConfig {
    /** Frozen; `toDefinition()` gives a mutable copy. */
    public readonly definition: CollectionDefinition;
    private readonly fieldIndex: Map<string, FieldDefinition>;

    private constructor(definition: CollectionDefinition) {
        this.definition = deepFreeze(structuredClone(definition));
        this.fieldIndex = new Map(this.definition.fields.map(field => [field.name, field]));
    }

    /** Builds a collector from author input (compact or object field forms). */
    public static create(input: unknown): CollectionConfig {
        const parsed = collectionInputSchema.safeParse(input);
        if (!parsed.success) {
            throw new CollectorConfigError(
                'Invalid collector definition',
                parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
            );
        }

        const { name, fields, ...rest } = parsed.data;
        return CollectionConfig.fromDefinition({
            ...rest,
            name: name ?? `dc_${uuidv4()}`,
            fields: normalizeFields(fields),
        });
    }

    /** Rebuilds a collector from its serialized form, e.g. one embedded in a session. */
    public static fromDefinition(input: unknown): CollectionConfig {
        const parsed = collectionDefinitionSchema.safeParse(input);
        if (!parsed.success) {
            throw new CollectorConfigError(
                'Invalid collector definition',
                parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
            );
        }

        const issues = collectIssues(parsed.data);
        if (issues.length > 0) {
            throw new CollectorConfigError(`Invalid collector "${parsed.data.name}": ${issues.join('; ')}`, issues);
        }

        return new CollectionConfig(parsed.data);
    }

    get name(): string {
        return this.definition.name;
    }

    get title(): string {
        return this.definition.title || this.definition.name;
    }

    get fields(): readonly FieldDefinition[] {
        return this.definition.fields;
    }

    get confirmBeforeComplete(): boolean {
        return this.definition.confirmBeforeComplete;
    }

    get allowEnhancement(): boolean {
        return this.definition.allowEnhancement;
    }

    get allowSkipOptional(): boolean {
        return this.definition.allowSkipOptional;
    }

    get redetectLocale(): boolean {
        return this.definition.redetectLocale;
    }

    get locale(): string | undefined {
        return this.definition.locale;
    }

    get initialData(): Readonly<CollectedData> {
        return this.definition.initialData;
    }

    get outputModificationKeywords(): readonly string[] {
        return this.definition.outputModificationKeywords ?? Object.keys(this.definition.outputSchema ?? {});
    }

    public getField(name: string): FieldDefinition | undefined {
        return this.fieldIndex.get(name);
    }

    public getMissingRequiredFields(data: CollectedData): FieldDefinition[] {
        return this.fields.filter(field => field.required && !isFilled(data[field.name]));
    }

    public getUncollectedFields(data: CollectedData): FieldDefinition[] {
        return this.fields.filter(field => !isFilled(data[field.name]));
    }

    /**
     * Required fields must hold values. Optional fields count only when
     * `allowSkipOptional` is off, and then a skipped field is settled too.
     */
    public isComplete(data: CollectedData, skipped: readonly string[] = []): boolean {
        if (this.getMissingRequiredFields(data).length > 0) return false;
        if (this.allowSkipOptional) return true;
        return this.fields.every(field => field.required || isFilled(data[field.name]) || skipped.includes(field.name));
    }

    public nextField(data: CollectedData, skipped: readonly string[] = []): FieldDefinition | null {
        const required = this.getMissingRequiredFields(data)[0];
        if (required) return required;
        if (this.allowSkipOptional) return null;
        return (
            this.fields.find(field => !field.required && !isFilled(data[field.name]) && !skipped.includes(field.name)) ??
            null
        );
    }

    public getCollectionPrompt(field: FieldDefinition, locale: string): string {
        if (field.prompt) return field.prompt;

        const lines = [translate(locale, 'collectPrompt', { label: fieldLabel(field) })];
        if (field.options.length > 0) {
            lines.push(translate(locale, 'availableOptions', { options: field.options.join(', ') }));
        }
        if (field.examples.length > 0) {
            lines.push(translate(locale, 'examplesLine', { examples: field.examples.join(', ') }));
        }
        const hints = validationHints(field, locale);
        if (hints.length > 0) {
            lines.push(translate(locale, 'requirements', { hints: hints.join(', ') }));
        }
        return lines.join('\n');
    }

    public getSystemPrompt(locale: string): string {
        return buildCollectionSystemPrompt(this.definition, locale);
    }

    public generateSummary(data: CollectedData, locale: string): string {
        const lines = [translate(locale, 'summaryHeading', { title: this.title }), ''];

        for (const field of this.fields) {
            const value = data[field.name];
            if (!isFilled(value) && !field.required) continue;

            const tag = field.required ? '' : ` ${translate(locale, 'optionalTag')}`;
            const shown = isFilled(value) ? String(value) : translate(locale, 'notProvided');
            lines.push(`**${humanize(field.name)}**${tag}: ${shown}`);
        }

        return lines.join('\n');
    }

    public generateActionSummary(data: CollectedData, locale: string): string {
        if (this.definition.actionSummary) {
            return fillFieldPlaceholders(this.definition.actionSummary, data);
        }
        return translate(locale, 'defaultActionSummary', { title: this.title });
    }

    public getConfirmationPrompt(actionSummary: string, locale: string): string {
        return [
            translate(locale, 'whatWillHappen'),
            actionSummary,
            '',
            translate(locale, 'pleaseConfirm'),
            translate(locale, 'confirmYes'),
            translate(locale, 'confirmNo'),
            translate(locale, 'confirmCancel'),
        ].join('\n');
    }

    /** Plain copy for embedding in a session record. */
    public toDefinition(): CollectionDefinition {
        return structuredClone(this.definition);
    }
}
