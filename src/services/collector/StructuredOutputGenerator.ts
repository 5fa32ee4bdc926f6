// src/services/collector/StructuredOutputGenerator.ts

import Ajv, { ValidateFunction } from 'ajv';
import { z } from 'zod';
import { OutputFieldSpec, OutputSchema } from '../../models/collection.model';
import { SessionState } from '../../models/session.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { TextGenerator } from '../llm/types';
import { CollectionConfig } from './CollectionConfig';
import { describeValues, languageSection } from './prompts/collectionPrompts';
import {
    CONFIRMED_SUMMARY_SECTION_TEMPLATE,
    MODIFICATIONS_SECTION_TEMPLATE,
    STRUCTURED_OUTPUT_SYSTEM_PROMPT,
    STRUCTURED_OUTPUT_USER_PROMPT_TEMPLATE,
} from './prompts/structuredOutputPrompt';
import { fillFieldPlaceholders, fillTemplate } from './prompts/template';

export type GeneratedOutput = Record<string, unknown>;

type JsonSchema = {
    type?: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    minItems?: number;
    maxItems?: number;
};

const TYPE_ALIASES: Record<string, JsonSchema['type']> = {
    string: 'string',
    text: 'string',
    number: 'number',
    float: 'number',
    integer: 'integer',
    int: 'integer',
    boolean: 'boolean',
    bool: 'boolean',
    array: 'array',
    object: 'object',
};

const generatedOutputSchema = z.record(z.unknown());

function isFieldSpec(node: OutputFieldSpec | OutputSchema): node is OutputFieldSpec {
    return typeof node.type === 'string';
}

function typeSchema(type: string): JsonSchema {
    const mapped = TYPE_ALIASES[type.trim().toLowerCase()];
    return mapped ? { type: mapped } : {};
}

/** JSON Schema equivalent of an output schema; free-text leaf descriptions accept any value. */
export function toJsonSchema(schema: OutputSchema): JsonSchema {
    const properties: Record<string, JsonSchema> = {};

    for (const [key, node] of Object.entries(schema)) {
        if (typeof node === 'string') {
            properties[key] = typeSchema(node);
        } else if (isFieldSpec(node)) {
            const base = typeSchema(node.type);
            if (node.items) {
                properties[key] = {
                    type: 'array',
                    items: toJsonSchema(node.items),
                    ...(node.count ? { minItems: node.count, maxItems: node.count } : {}),
                };
            } else {
                properties[key] = base;
            }
        } else {
            properties[key] = toJsonSchema(node);
        }
    }

    return { type: 'object', properties, required: Object.keys(schema) };
}

/**
 * Plain-language rendering of an output schema for the generation prompt:
 *
 *   "lessons": array of objects (generate 5 items)
 *     Each item has:
 *     {
 *       "title": string // lesson title
 *     }
 */
export function buildSchemaDescription(schema: OutputSchema, indent = 0): string {
    const pad = ' '.repeat(indent);
    const lines = [`${pad}{`];

    for (const [key, node] of Object.entries(schema)) {
        const prefix = `${pad}  "${key}": `;

        if (typeof node === 'string') {
            lines.push(`${prefix}${node}`);
        } else if (isFieldSpec(node)) {
            const comment = node.description ? ` // ${node.description}` : '';
            if (node.items) {
                const count = node.count ? `generate ${node.count} items` : 'generate as many items as fit';
                lines.push(`${prefix}array of objects (${count})${comment}`);
                lines.push(`${pad}    Each item has:`);
                lines.push(buildSchemaDescription(node.items, indent + 4));
            } else {
                lines.push(`${prefix}${node.type}${comment}`);
            }
        } else {
            lines.push(`${prefix}object with:`);
            lines.push(buildSchemaDescription(node, indent + 4));
        }
    }

    lines.push(`${pad}}`);
    return lines.join('\n');
}

/** Removes a surrounding markdown code fence and any prose around the JSON object. */
export function stripCodeFences(content: string): string {
    const unfenced = content
        .trim()
        .replace(/^```[a-zA-Z]*\s*/, '')
        .replace(/\s*```$/, '')
        .trim();
    if (unfenced.startsWith('{')) return unfenced;

    const match = unfenced.match(/\{[\s\S]*\}/);
    return match ? match[0] : unfenced;
}

export interface StructuredOutputGeneratorConfig extends ServiceConfig {
    generator: TextGenerator;
    maxTokens?: number;
}

export class StructuredOutputGenerator extends BaseService {
    private generator: TextGenerator;
    private maxTokens?: number;
    private ajv: InstanceType<typeof Ajv>;
    private validators = new WeakMap<OutputSchema, ValidateFunction>();

    constructor(config: StructuredOutputGeneratorConfig) {
        super(config);
        this.generator = config.generator;
        this.maxTokens = config.maxTokens;
        this.ajv = new Ajv({ allErrors: true, strict: false });
    }

    /**
     * Expands collected data into the collector's output schema. Returns null
     * when there is no schema, the call fails or the reply is not a JSON object.
     */
    public async generate(config: CollectionConfig, state: SessionState, locale: string): Promise<GeneratedOutput | null> {
        const schema = config.definition.outputSchema;
        if (!schema) return null;

        const data = state.collectedData;
        const instructions = config.definition.outputPrompt
            ? fillFieldPlaceholders(config.definition.outputPrompt, data)
            : `Create the final result for "${config.title}" from the collected information.`;

        const modifications = state.metadata.outputModifications ?? [];
        let sourceSection = '';
        if (state.confirmedActionSummary) {
            sourceSection = fillTemplate(CONFIRMED_SUMMARY_SECTION_TEMPLATE, { SUMMARY: state.confirmedActionSummary });
        } else if (modifications.length > 0) {
            sourceSection = fillTemplate(MODIFICATIONS_SECTION_TEMPLATE, {
                MODIFICATIONS: modifications.map(item => `- ${item}`).join('\n'),
            });
        }

        const userPrompt = fillTemplate(STRUCTURED_OUTPUT_USER_PROMPT_TEMPLATE, {
            INSTRUCTIONS: instructions,
            DATA: describeValues(config.fields, data),
            SOURCE_SECTION: sourceSection,
            SCHEMA: buildSchemaDescription(schema),
            LANGUAGE_SECTION: languageSection(locale),
        });

        const result = await this.generator.generate(STRUCTURED_OUTPUT_SYSTEM_PROMPT, userPrompt, {
            temperature: 0.3,
            maxTokens: this.maxTokens,
            json: this.generator.supportsJsonMode,
        });

        if (!result.success) {
            this.logger.error('Structured output generation failed', { collector: config.name, error: result.error });
            return null;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(stripCodeFences(result.content));
        } catch (error) {
            this.logger.error('Structured output is not valid JSON', {
                collector: config.name,
                error: this.errorMessage(error),
            });
            return null;
        }

        const output = generatedOutputSchema.safeParse(parsed);
        if (!output.success) {
            this.logger.error('Structured output is not a JSON object', { collector: config.name });
            return null;
        }

        this.checkAgainstSchema(config.name, schema, output.data);
        return output.data;
    }

    private checkAgainstSchema(collector: string, schema: OutputSchema, output: GeneratedOutput): void {
        let validate = this.validators.get(schema);
        if (!validate) {
            validate = this.ajv.compile(toJsonSchema(schema));
            this.validators.set(schema, validate);
        }

        if (!validate(output)) {
            const errors = validate.errors?.map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()) ?? [];
            this.logger.warn('Structured output does not match its schema', { collector, errors });
        }
    }
}
