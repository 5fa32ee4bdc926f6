// src/models/collection.model.ts

import { z } from 'zod';

export type FieldType = 'text' | 'number' | 'select';
export type FieldValue = string | number | boolean;
export type CollectedData = Record<string, FieldValue>;

/**
 * Describes the nested structure synthesized after completion. A node is
 * either a plain description string, a typed spec (optionally an array of
 * objects with an item count), or a nested object of further nodes.
 */
export interface OutputFieldSpec {
    type: string;
    description?: string;
    count?: number;
    items?: OutputSchema;
}

export type OutputSchemaNode = string | OutputFieldSpec | OutputSchema;

export interface OutputSchema {
    [key: string]: OutputSchemaNode;
}

export interface FieldDefinition {
    name: string;
    type: FieldType;
    description: string;
    validation: string;
    required: boolean;
    examples: string[];
    default?: FieldValue;
    options: string[];
    prompt?: string;
    order: number;
}

/** Serializable form of a collector; embedded in every session it starts. */
export interface CollectionDefinition {
    name: string;
    title: string;
    description: string;
    fields: FieldDefinition[];
    confirmBeforeComplete: boolean;
    allowEnhancement: boolean;
    allowSkipOptional: boolean;
    successMessage?: string;
    cancelMessage?: string;
    systemPrompt?: string;
    summaryPrompt?: string;
    actionSummary?: string;
    actionSummaryPrompt?: string;
    outputSchema?: OutputSchema;
    outputPrompt?: string;
    outputModificationKeywords?: string[];
    locale?: string;
    redetectLocale: boolean;
    initialData: CollectedData;
    metadata: Record<string, unknown>;
}

/** Human-facing name of a field: its description, else its name with spaces. */
export function fieldLabel(field: Pick<FieldDefinition, 'name' | 'description'>): string {
    return field.description.trim() || field.name.replace(/_/g, ' ');
}

export const fieldValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const outputSchemaSchema: z.ZodType<OutputSchema, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.record(outputSchemaNodeSchema),
);

const outputFieldSpecSchema: z.ZodType<OutputFieldSpec, z.ZodTypeDef, unknown> = z.object({
    type: z.string(),
    description: z.string().optional(),
    count: z.number().int().positive().optional(),
    items: z.lazy(() => outputSchemaSchema).optional(),
});

const outputSchemaNodeSchema: z.ZodType<OutputSchemaNode, z.ZodTypeDef, unknown> = z.union([
    z.string(),
    outputFieldSpecSchema,
    outputSchemaSchema,
]);

export const fieldDefinitionSchema: z.ZodType<FieldDefinition, z.ZodTypeDef, unknown> = z.object({
    name: z.string().min(1),
    type: z.enum(['text', 'number', 'select']),
    description: z.string(),
    validation: z.string(),
    required: z.boolean(),
    examples: z.array(z.string()),
    default: fieldValueSchema.optional(),
    options: z.array(z.string()),
    prompt: z.string().optional(),
    order: z.number().int(),
});

export const collectionDefinitionSchema: z.ZodType<CollectionDefinition, z.ZodTypeDef, unknown> = z.object({
    name: z.string().min(1),
    title: z.string(),
    description: z.string(),
    fields: z.array(fieldDefinitionSchema),
    confirmBeforeComplete: z.boolean(),
    allowEnhancement: z.boolean(),
    allowSkipOptional: z.boolean(),
    successMessage: z.string().optional(),
    cancelMessage: z.string().optional(),
    systemPrompt: z.string().optional(),
    summaryPrompt: z.string().optional(),
    actionSummary: z.string().optional(),
    actionSummaryPrompt: z.string().optional(),
    outputSchema: outputSchemaSchema.optional(),
    outputPrompt: z.string().optional(),
    outputModificationKeywords: z.array(z.string()).optional(),
    locale: z.string().optional(),
    redetectLocale: z.boolean(),
    initialData: z.record(fieldValueSchema),
    metadata: z.record(z.unknown()),
});

// --- Author-facing input ---
// Fields may be given as an ordered record (object or compact string form)
// or as an array of objects carrying their own name.

const fieldInputObjectSchema = z.object({
    type: z.enum(['text', 'string', 'number', 'select']).optional(),
    description: z.string().optional(),
    validation: z.string().optional(),
    required: z.boolean().optional(),
    examples: z.array(z.string()).optional(),
    default: fieldValueSchema.optional(),
    options: z.array(z.string()).optional(),
    prompt: z.string().optional(),
    order: z.number().int().optional(),
});

export const collectionInputSchema = z.object({
    name: z.string().min(1).optional(),
    title: z.string().default(''),
    description: z.string().default(''),
    fields: z.union([
        z.record(z.union([z.string(), fieldInputObjectSchema])),
        z.array(fieldInputObjectSchema.extend({ name: z.string().min(1) })),
    ]),
    confirmBeforeComplete: z.boolean().default(true),
    allowEnhancement: z.boolean().default(true),
    allowSkipOptional: z.boolean().default(true),
    successMessage: z.string().optional(),
    cancelMessage: z.string().optional(),
    systemPrompt: z.string().optional(),
    summaryPrompt: z.string().optional(),
    actionSummary: z.string().optional(),
    actionSummaryPrompt: z.string().optional(),
    outputSchema: outputSchemaSchema.optional(),
    outputPrompt: z.string().optional(),
    outputModificationKeywords: z.array(z.string()).optional(),
    locale: z.string().optional(),
    redetectLocale: z.boolean().default(false),
    initialData: z.record(fieldValueSchema).default({}),
    metadata: z.record(z.unknown()).default({}),
});

export type FieldInput = z.input<typeof fieldInputObjectSchema>;
export type ParsedFieldInput = z.output<typeof fieldInputObjectSchema>;
export type CollectionInput = z.input<typeof collectionInputSchema>;
export type ParsedCollectionInput = z.output<typeof collectionInputSchema>;
