// src/services/collector/prompts/template.ts

/** Replaces every `{{KEY}}` in a prompt template. Unknown keys are left untouched. */
export function fillTemplate(template: string, values: Record<string, string>): string {
    return template.replace(/\{\{([A-Z_]+)\}\}/g, (placeholder: string, key: string) =>
        key in values ? values[key] : placeholder,
    );
}

/** Replaces `{field}` placeholders in author-written prompts with collected values. */
export function fillFieldPlaceholders(text: string, data: Record<string, string | number | boolean>): string {
    return text.replace(/\{(\w+)\}/g, (placeholder: string, key: string) =>
        key in data ? String(data[key]) : placeholder,
    );
}
