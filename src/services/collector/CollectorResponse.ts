// src/services/collector/CollectorResponse.ts

import { CollectedData } from '../../models/collection.model';
import { CollectorStatus, isFilled, SessionState, ValidationErrors } from '../../models/session.model';
import { CollectionConfig } from './CollectionConfig';
import { GeneratedOutput } from './StructuredOutputGenerator';

export interface CollectorResponseInit {
    success: boolean;
    message: string;
    state?: SessionState | null;
    config?: CollectionConfig | null;
    validationErrors?: ValidationErrors;
    requiresConfirmation?: boolean;
    allowsEnhancement?: boolean;
    isComplete?: boolean;
    isCancelled?: boolean;
    summary?: string | null;
    actionSummary?: string | null;
    result?: unknown;
    generatedOutput?: GeneratedOutput | null;
}

export interface CollectorResponseJSON {
    success: boolean;
    message: string;
    status: CollectorStatus | null;
    currentField: string | null;
    collectedFields: string[];
    remainingFields: string[];
    validationErrors: ValidationErrors;
    requiresConfirmation: boolean;
    allowsEnhancement: boolean;
    isComplete: boolean;
    isCancelled: boolean;
    summary: string | null;
    actionSummary: string | null;
    result: unknown;
    generatedOutput: GeneratedOutput | null;
    progress: number;
    data: CollectedData;
}

/** Outcome of one turn, snapshotted from the session at construction. */
export class CollectorResponse {
    public readonly success: boolean;
    public readonly message: string;
    public readonly status: CollectorStatus | null;
    public readonly currentField: string | null;
    public readonly data: CollectedData;
    public readonly collectedFields: string[];
    public readonly remainingFields: string[];
    public readonly validationErrors: ValidationErrors;
    public readonly requiresConfirmation: boolean;
    public readonly allowsEnhancement: boolean;
    public readonly isComplete: boolean;
    public readonly isCancelled: boolean;
    public readonly summary: string | null;
    public readonly actionSummary: string | null;
    public readonly result: unknown;
    public readonly generatedOutput: GeneratedOutput | null;
    private readonly totalFields: number;

    constructor(init: CollectorResponseInit) {
        const state = init.state ?? null;
        const config = init.config ?? null;

        this.success = init.success;
        this.message = init.message;
        this.status = state?.status ?? null;
        this.currentField = state?.currentField ?? null;
        this.data = { ...(state?.collectedData ?? {}) };
        this.collectedFields = Object.keys(this.data).filter(name => isFilled(this.data[name]));
        this.remainingFields = config ? config.getUncollectedFields(this.data).map(field => field.name) : [];
        this.totalFields = config ? config.fields.length : this.collectedFields.length;
        this.validationErrors = init.validationErrors ?? {};
        this.requiresConfirmation = init.requiresConfirmation ?? false;
        this.allowsEnhancement = init.allowsEnhancement ?? false;
        this.isComplete = init.isComplete ?? false;
        this.isCancelled = init.isCancelled ?? false;
        this.summary = init.summary ?? null;
        this.actionSummary = init.actionSummary ?? null;
        this.result = init.result;
        this.generatedOutput = init.generatedOutput ?? null;
    }

    public static failure(message: string, state?: SessionState | null, config?: CollectionConfig | null): CollectorResponse {
        return new CollectorResponse({ success: false, message, state, config });
    }

    /** Percentage of the collector's fields holding a value, rounded down. */
    get progress(): number {
        if (this.totalFields === 0) return 0;
        const collected = this.collectedFields.length;
        return Math.min(100, Math.floor((collected / this.totalFields) * 100));
    }

    get isFinished(): boolean {
        return this.isComplete || this.isCancelled;
    }

    public toJSON(): CollectorResponseJSON {
        return {
            success: this.success,
            message: this.message,
            status: this.status,
            currentField: this.currentField,
            collectedFields: this.collectedFields,
            remainingFields: this.remainingFields,
            validationErrors: this.validationErrors,
            requiresConfirmation: this.requiresConfirmation,
            allowsEnhancement: this.allowsEnhancement,
            isComplete: this.isComplete,
            isCancelled: this.isCancelled,
            summary: this.summary,
            actionSummary: this.actionSummary,
            result: this.result,
            generatedOutput: this.generatedOutput,
            progress: this.progress,
            data: this.data,
        };
    }
}
