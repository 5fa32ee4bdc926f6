// src/models/session.model.ts

import { z } from 'zod';
import {
    CollectedData,
    CollectionDefinition,
    collectionDefinitionSchema,
    fieldValueSchema,
} from './collection.model';

export const COLLECTOR_STATUSES = ['collecting', 'confirming', 'enhancing', 'completed', 'cancelled'] as const;
export type CollectorStatus = (typeof COLLECTOR_STATUSES)[number];

export const TERMINAL_STATUSES: readonly CollectorStatus[] = ['completed', 'cancelled'];

export interface ValidationErrorDescriptor {
    field: string;
    rule: string;
    message: string;
}

export type ValidationErrors = Record<string, ValidationErrorDescriptor[]>;

export type MessageRole = 'user' | 'assistant';

export interface HistoryMessage {
    role: MessageRole;
    content: string;
    timestamp: string;
}

export interface SuggestionCache {
    field: string;
    suggestions: string[];
}

/**
 * Auxiliary per-session bag. The key set is closed: stored records carrying
 * any other key are rejected on load.
 */
export interface SessionMetadata {
    /** Field the user asked to change during enhancement; the next message is its new value. */
    pendingField?: string;
    /** Free-text requests to reshape the generated output preview. */
    outputModifications?: string[];
    /** Optional fields the user chose to skip. */
    skippedFields?: string[];
}

export interface SessionState {
    sessionId: string;
    configName: string;
    status: CollectorStatus;
    collectedData: CollectedData;
    currentField: string | null;
    validationErrors: ValidationErrors;
    messageHistory: HistoryMessage[];
    detectedLocale?: string;
    lastSuggestions?: SuggestionCache;
    confirmedActionSummary?: string;
    metadata: SessionMetadata;
    embeddedConfig?: CollectionDefinition;
    lastResponse?: string;
    startedAt: string;
    completedAt?: string;
    result?: unknown;
}

const validationErrorSchema = z.object({
    field: z.string(),
    rule: z.string(),
    message: z.string(),
});

export const sessionMetadataSchema = z
    .object({
        pendingField: z.string().optional(),
        outputModifications: z.array(z.string()).optional(),
        skippedFields: z.array(z.string()).optional(),
    })
    .strict();

export const sessionStateSchema: z.ZodType<SessionState, z.ZodTypeDef, unknown> = z.object({
    sessionId: z.string().min(1),
    configName: z.string().min(1),
    status: z.enum(COLLECTOR_STATUSES),
    collectedData: z.record(fieldValueSchema),
    currentField: z.string().nullable(),
    validationErrors: z.record(z.array(validationErrorSchema)),
    messageHistory: z.array(
        z.object({
            role: z.enum(['user', 'assistant']),
            content: z.string(),
            timestamp: z.string(),
        }),
    ),
    detectedLocale: z.string().optional(),
    lastSuggestions: z
        .object({
            field: z.string(),
            suggestions: z.array(z.string()),
        })
        .optional(),
    confirmedActionSummary: z.string().optional(),
    metadata: sessionMetadataSchema,
    embeddedConfig: collectionDefinitionSchema.optional(),
    lastResponse: z.string().optional(),
    startedAt: z.string(),
    completedAt: z.string().optional(),
    result: z.unknown().optional(),
});

export function isTerminal(status: CollectorStatus): boolean {
    return TERMINAL_STATUSES.includes(status);
}

export function isFilled(value: CollectedData[string] | undefined | null): boolean {
    return value !== undefined && value !== null && value !== '';
}
