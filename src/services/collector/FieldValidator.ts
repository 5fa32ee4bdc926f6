// src/services/collector/FieldValidator.ts

import { CollectedData, FieldDefinition, FieldValue } from '../../models/collection.model';
import { isFilled, ValidationErrorDescriptor, ValidationErrors } from '../../models/session.model';
import { CollectorConfigError } from './errors';
import { DEFAULT_LOCALE, MessageKey, translate } from './i18n';

export type RuleName = 'required' | 'string' | 'min' | 'max' | 'numeric' | 'integer' | 'email' | 'url' | 'in';

export interface ParsedRule {
    name: RuleName;
    value?: number;
    list?: string[];
}

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const BOUND_PATTERN = /^(min|max):(\d+(?:\.\d+)?)$/;

/**
 * Parses a `|`-separated rule string. Throws on anything it does not know,
 * so a bad rule surfaces when the collector is defined rather than mid-conversation.
 */
export function parseRules(validation: string): ParsedRule[] {
    const rules: ParsedRule[] = [];

    for (const raw of validation.split('|')) {
        const rule = raw.trim();
        if (!rule) continue;

        const bound = BOUND_PATTERN.exec(rule);
        if (bound) {
            rules.push({ name: bound[1] === 'min' ? 'min' : 'max', value: Number(bound[2]) });
            continue;
        }

        if (rule.startsWith('in:')) {
            const list = rule
                .slice(3)
                .split(',')
                .map(item => item.trim())
                .filter(item => item.length > 0);
            if (list.length === 0) {
                throw new CollectorConfigError(`Malformed validation rule "${rule}"`, [rule]);
            }
            rules.push({ name: 'in', list });
            continue;
        }

        switch (rule) {
            case 'required':
            case 'string':
            case 'numeric':
            case 'integer':
            case 'email':
            case 'url':
                rules.push({ name: rule });
                break;
            default:
                throw new CollectorConfigError(`Unknown validation rule "${rule}"`, [rule]);
        }
    }

    return rules;
}

export function isNumericValue(value: FieldValue): boolean {
    if (typeof value === 'number') return Number.isFinite(value);
    if (typeof value === 'boolean') return false;
    return NUMERIC_PATTERN.test(value.trim());
}

function isIntegerValue(value: FieldValue): boolean {
    if (typeof value === 'number') return Number.isInteger(value);
    if (typeof value === 'boolean') return false;
    return INTEGER_PATTERN.test(value.trim());
}

function isUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol.length > 1 && url.host.length > 0;
    } catch {
        return false;
    }
}

/** True when min/max compare magnitude instead of length for this field. */
export function isNumericField(field: FieldDefinition, rules: ParsedRule[] = parseRules(field.validation)): boolean {
    return field.type === 'number' || rules.some(rule => rule.name === 'numeric' || rule.name === 'integer');
}

export function isRequired(field: FieldDefinition, rules: ParsedRule[] = parseRules(field.validation)): boolean {
    return field.required || rules.some(rule => rule.name === 'required');
}

/**
 * Checks one value against the field's rules and reports every violation.
 * An empty value yields only the `required` error, or nothing when optional.
 */
export function validateField(
    field: FieldDefinition,
    value: FieldValue | undefined | null,
    locale: string = DEFAULT_LOCALE,
): ValidationErrorDescriptor[] {
    const rules = parseRules(field.validation);
    const label = field.name.replace(/_/g, ' ');
    const error = (rule: string, key: MessageKey, params: Record<string, string | number> = {}) => ({
        field: field.name,
        rule,
        message: translate(locale, key, { field: label, ...params }),
    });

    if (value === undefined || value === null || !isFilled(value)) {
        return isRequired(field, rules) ? [error('required', 'ruleRequired')] : [];
    }

    const errors: ValidationErrorDescriptor[] = [];
    const text = String(value).trim();
    const numericContext = isNumericField(field, rules);
    const numeric = isNumericValue(value);

    for (const rule of rules) {
        switch (rule.name) {
            case 'numeric':
                if (!numeric) errors.push(error('numeric', 'ruleNumeric'));
                break;
            case 'integer':
                if (!isIntegerValue(value)) errors.push(error('integer', 'ruleInteger'));
                break;
            case 'email':
                if (!EMAIL_PATTERN.test(text)) errors.push(error('email', 'ruleEmail'));
                break;
            case 'url':
                if (!isUrl(text)) errors.push(error('url', 'ruleUrl'));
                break;
            case 'in':
                if (rule.list && !rule.list.includes(text)) {
                    errors.push(error('in', 'ruleIn', { options: rule.list.join(', ') }));
                }
                break;
            case 'min':
            case 'max': {
                const limit = rule.value ?? 0;
                if (numericContext) {
                    // non-numeric input is already reported by the type check
                    if (!numeric) break;
                    const magnitude = Number(value);
                    if (rule.name === 'min' && magnitude < limit) errors.push(error('min', 'ruleMin', { n: limit }));
                    if (rule.name === 'max' && magnitude > limit) errors.push(error('max', 'ruleMax', { n: limit }));
                } else {
                    const length = [...text].length;
                    if (rule.name === 'min' && length < limit) errors.push(error('min', 'ruleMinLength', { n: limit }));
                    if (rule.name === 'max' && length > limit) errors.push(error('max', 'ruleMaxLength', { n: limit }));
                }
                break;
            }
            case 'required':
            case 'string':
                break;
        }
    }

    if (field.type === 'number' && !numeric && !rules.some(rule => rule.name === 'numeric')) {
        errors.push(error('numeric', 'ruleNumeric'));
    }

    if (field.type === 'select' && field.options.length > 0 && !field.options.includes(text)) {
        errors.push(error('options', 'ruleIn', { options: field.options.join(', ') }));
    }

    return errors;
}

/** Validates every field of a collector; only fields with errors appear in the result. */
export function validateAll(
    fields: readonly FieldDefinition[],
    data: CollectedData,
    locale: string = DEFAULT_LOCALE,
): ValidationErrors {
    const result: ValidationErrors = {};
    for (const field of fields) {
        const errors = validateField(field, data[field.name], locale);
        if (errors.length > 0) result[field.name] = errors;
    }
    return result;
}

/** Short human-readable requirement hints used in prompts. */
export function validationHints(field: FieldDefinition, locale: string = DEFAULT_LOCALE): string[] {
    const rules = parseRules(field.validation);
    const numericContext = isNumericField(field, rules);
    const hints: string[] = [];

    for (const rule of rules) {
        const n = rule.value ?? 0;
        switch (rule.name) {
            case 'min':
                hints.push(translate(locale, numericContext ? 'hintMin' : 'hintMinLength', { n }));
                break;
            case 'max':
                hints.push(translate(locale, numericContext ? 'hintMax' : 'hintMaxLength', { n }));
                break;
            case 'numeric':
                hints.push(translate(locale, 'hintNumeric'));
                break;
            case 'integer':
                hints.push(translate(locale, 'hintInteger'));
                break;
            case 'email':
                hints.push(translate(locale, 'hintEmail'));
                break;
            case 'url':
                hints.push(translate(locale, 'hintUrl'));
                break;
            default:
                break;
        }
    }

    return hints;
}
