// src/services/collector/CollectorService.ts

import { CollectedData, FieldDefinition, fieldLabel, FieldValue } from '../../models/collection.model';
import {
    isFilled,
    isTerminal,
    MessageRole,
    SessionState,
    ValidationErrorDescriptor,
    ValidationErrors,
} from '../../models/session.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { TextGenerator } from '../llm/types';
import { SessionStore } from '../store/SessionStore';
import { CollectionConfig } from './CollectionConfig';
import { CollectorResponse, CollectorResponseInit } from './CollectorResponse';
import { CompletionHandler, ConfigRegistry } from './ConfigRegistry';
import { ContentExtractor } from './ContentExtractor';
import { CollectorConfigError } from './errors';
import { ExtractionSource, FieldExtractor } from './FieldExtractor';
import { FieldTargetDetector } from './FieldTargetDetector';
import { isNumericValue, validateAll, validateField } from './FieldValidator';
import { DEFAULT_LOCALE, translate } from './i18n';
import { IntentClassifier } from './IntentClassifier';
import { effectiveLocale, nextSessionLocale } from './LocaleDetector';
import { buildContextPrompt, buildEnhancementSystemPrompt } from './prompts/collectionPrompts';
import { StructuredOutputGenerator } from './StructuredOutputGenerator';
import { SuggestionService } from './SuggestionService';
import { SummaryGenerator } from './SummaryGenerator';

export interface CollectorServiceConfig extends ServiceConfig {
    generator: TextGenerator;
    sessionStore: SessionStore;
    registry: ConfigRegistry;
    /** Model used for intent and field-target classification. */
    intentModel?: string;
    outputMaxTokens?: number;
    now?: () => Date;
}

export interface ContentExtractionResult {
    success: boolean;
    values: Record<string, string>;
    message?: string;
}

interface TurnContext {
    state: SessionState;
    config: CollectionConfig;
    locale: string;
    message: string;
}

interface StoredValue {
    field: FieldDefinition;
    value: FieldValue;
}

interface StoreFailure {
    field: FieldDefinition;
    errors: ValidationErrorDescriptor[];
}

interface StoreOutcome {
    stored: StoredValue[];
    /** In candidate order; empty when every value was stored. */
    failures: StoreFailure[];
}

type ValueSource = ExtractionSource | 'suggestion';

/**
 * Runs collector conversations. Each call to `processMessage` is one turn:
 * load the session, move it through the state machine, persist it and
 * return what to show the user.
 */
export class CollectorService extends BaseService {
    private generator: TextGenerator;
    private sessionStore: SessionStore;
    private registry: ConfigRegistry;
    private intentClassifier: IntentClassifier;
    private extractor: FieldExtractor;
    private suggestions: SuggestionService;
    private summaries: SummaryGenerator;
    private targetDetector: FieldTargetDetector;
    private outputGenerator: StructuredOutputGenerator;
    private contentExtractor: ContentExtractor;
    private now: () => Date;

    constructor(config: CollectorServiceConfig) {
        super(config);
        const { logger, generator } = config;

        this.generator = generator;
        this.sessionStore = config.sessionStore;
        this.registry = config.registry;
        this.now = config.now ?? (() => new Date());

        this.intentClassifier = new IntentClassifier({ logger, generator, model: config.intentModel });
        this.extractor = new FieldExtractor({ logger });
        this.suggestions = new SuggestionService({ logger, generator });
        this.summaries = new SummaryGenerator({ logger, generator });
        this.targetDetector = new FieldTargetDetector({ logger, generator, model: config.intentModel });
        this.outputGenerator = new StructuredOutputGenerator({ logger, generator, maxTokens: config.outputMaxTokens });
        this.contentExtractor = new ContentExtractor({ logger, generator });
    }

    // --- Collectors and sessions ---

    /** Accepts a built collector or raw author input, which is parsed first. */
    public async registerCollector(
        definition: CollectionConfig | unknown,
        onComplete?: CompletionHandler,
    ): Promise<CollectionConfig> {
        const config = definition instanceof CollectionConfig ? definition : CollectionConfig.create(definition);
        await this.registry.register(config, onComplete);
        return config;
    }

    public async startSession(
        sessionId: string,
        collector: CollectionConfig | string,
        initialData: CollectedData = {},
    ): Promise<SessionState> {
        const config = typeof collector === 'string' ? await this.registry.get(collector) : collector;
        if (!config) {
            throw new CollectorConfigError(`Collector "${String(collector)}" is not registered`);
        }

        const seeded: CollectedData = {};
        for (const [name, value] of Object.entries({ ...config.initialData, ...initialData })) {
            if (config.getField(name) && isFilled(value)) seeded[name] = value;
        }

        const next = config.isComplete(seeded) ? null : config.nextField(seeded);
        const state: SessionState = {
            sessionId,
            configName: config.name,
            status: 'collecting',
            collectedData: seeded,
            currentField: next ? next.name : null,
            validationErrors: {},
            messageHistory: [],
            metadata: {},
            embeddedConfig: config.toDefinition(),
            startedAt: this.now().toISOString(),
        };

        await this.sessionStore.save(state);
        this.logger.info('Collector session started', {
            sessionId,
            collector: config.name,
            seededFields: Object.keys(seeded),
        });
        return state;
    }

    /** Opening message: what is already known and the first question. */
    public getGreeting(config: CollectionConfig, state?: SessionState): string {
        const locale = effectiveLocale(config.locale, state?.detectedLocale);
        const data = state?.collectedData ?? config.initialData;
        const sections = [translate(locale, 'greeting')];

        const known = config.fields.filter(field => isFilled(data[field.name]));
        if (known.length > 0) {
            const lines = known.map(field => `- **${fieldLabel(field)}**: ${String(data[field.name])}`);
            sections.push(`${translate(locale, 'alreadyHave')}\n${lines.join('\n')}`);
        }

        let field: FieldDefinition | undefined;
        if (state) {
            field = state.currentField ? config.getField(state.currentField) : undefined;
        } else {
            field = config.nextField(data) ?? undefined;
        }
        if (field) sections.push(config.getCollectionPrompt(field, locale));

        return sections.join('\n\n');
    }

    public async getState(sessionId: string): Promise<SessionState | null> {
        return this.sessionStore.load(sessionId);
    }

    public async hasSession(sessionId: string): Promise<boolean> {
        return this.sessionStore.exists(sessionId);
    }

    public async deleteSession(sessionId: string): Promise<void> {
        await this.sessionStore.delete(sessionId);
        this.logger.info('Collector session deleted', { sessionId });
    }

    // --- Turns ---

    public async processMessage(sessionId: string, message: string): Promise<CollectorResponse> {
        const state = await this.sessionStore.load(sessionId);
        if (!state) {
            return CollectorResponse.failure(translate(DEFAULT_LOCALE, 'noSession'));
        }

        const config = await this.registry.resolveForSession(state);
        if (!config) {
            const locale = effectiveLocale(state.embeddedConfig?.locale, state.detectedLocale);
            return CollectorResponse.failure(translate(locale, 'configNotFound'), state);
        }

        const status = state.status;
        if (status === 'completed' || status === 'cancelled') {
            const locale = effectiveLocale(config.locale, state.detectedLocale);
            return CollectorResponse.failure(translate(locale, 'inactiveSession'), state, config);
        }

        if (this.intentClassifier.isCancellation(message)) {
            const response = this.cancel(state, config, effectiveLocale(config.locale, state.detectedLocale));
            await this.sessionStore.save(state);
            return response;
        }

        const detected = nextSessionLocale(state.detectedLocale, message, config.redetectLocale);
        if (detected) {
            state.detectedLocale = detected;
        } else {
            delete state.detectedLocale;
        }
        this.appendHistory(state, 'user', message);

        const ctx: TurnContext = {
            state,
            config,
            locale: effectiveLocale(config.locale, state.detectedLocale),
            message,
        };

        let response: CollectorResponse;
        if (status === 'collecting') {
            response = await this.handleCollecting(ctx);
        } else if (status === 'confirming') {
            response = await this.handleConfirming(ctx);
        } else {
            response = await this.handleEnhancing(ctx);
        }

        this.appendHistory(state, 'assistant', response.message);
        state.lastResponse = response.message;
        await this.sessionStore.save(state);

        this.logger.debug('Turn processed', {
            sessionId,
            from: status,
            to: state.status,
            currentField: state.currentField,
        });
        return response;
    }

    private cancel(state: SessionState, config: CollectionConfig, locale: string): CollectorResponse {
        const message = config.definition.cancelMessage ?? translate(locale, 'cancelled');
        state.status = 'cancelled';
        state.currentField = null;
        state.completedAt = this.now().toISOString();
        state.lastResponse = message;
        this.logger.info('Collector session cancelled', { sessionId: state.sessionId, collector: config.name });
        return new CollectorResponse({ success: true, message, state, config, isCancelled: true });
    }

    // --- collecting ---

    private async handleCollecting(ctx: TurnContext): Promise<CollectorResponse> {
        const { state, config, locale, message } = ctx;
        const field = state.currentField ? config.getField(state.currentField) : undefined;
        if (!field) {
            state.currentField = null;
            return this.advance(ctx, '');
        }

        const selected = this.suggestions.selectByNumber(message, state);
        if (selected !== null) {
            return this.storeCurrentValue(ctx, field, selected, 'suggestion', '');
        }

        const answered = config.fields.some(other => isFilled(state.collectedData[other.name]));
        if (answered && this.intentClassifier.detectRejectionIntent(message)) {
            const reply = [translate(locale, 'modificationDeferred'), config.getCollectionPrompt(field, locale)].join('\n\n');
            return new CollectorResponse({ success: true, message: reply, state, config });
        }

        const generation = await this.generator.generate(
            config.getSystemPrompt(locale),
            buildContextPrompt({
                fields: config.fields,
                collectedData: state.collectedData,
                currentField: field,
                history: state.messageHistory,
                message,
            }),
        );
        if (!generation.success) {
            this.logger.warn('Conversational reply unavailable', { sessionId: state.sessionId, error: generation.error });
        }
        const reply = generation.success ? generation.content : '';

        const analysis = await this.intentClassifier.classify(message, field.name, field, state.collectedData);
        switch (analysis.intent) {
            case 'suggest':
                return this.handleSuggestionRequest(ctx, field);
            case 'skip':
                return this.handleSkip(ctx, field);
            case 'question':
            case 'unclear':
                return this.reprompt(ctx, field, reply);
            case 'provide_value':
                break;
        }

        if (this.extractor.hasCancellationSignal(reply)) {
            return this.cancel(state, config, locale);
        }

        const extraction = this.extractor.extract({
            message,
            response: reply,
            analysis,
            currentField: field,
            config,
            collectedData: state.collectedData,
        });
        const value = extraction.fields[field.name];
        if (extraction.source === null || value === undefined) {
            return this.reprompt(ctx, field, reply);
        }

        if (this.extractor.hasCompletionSignal(reply)) {
            this.logger.debug('Completion signal received', { sessionId: state.sessionId, field: field.name });
        }
        return this.storeCurrentValue(ctx, field, value, extraction.source, reply);
    }

    private async storeCurrentValue(
        ctx: TurnContext,
        field: FieldDefinition,
        raw: string,
        source: ValueSource,
        reply: string,
    ): Promise<CollectorResponse> {
        const { state, locale } = ctx;
        const [failure] = this.validateAndStore(ctx, { [field.name]: raw }).failures;
        if (failure) {
            return this.validationFailure(ctx, failure.field, failure.errors);
        }

        if (state.lastSuggestions?.field === field.name) delete state.lastSuggestions;

        const value = state.collectedData[field.name];
        this.logger.info('Field collected', { sessionId: state.sessionId, field: field.name, source });

        const cleaned = this.extractor.cleanResponse(reply);
        const useReply =
            cleaned.length > 0 &&
            source !== 'direct' &&
            source !== 'suggestion' &&
            !this.mentionsOtherField(cleaned, ctx.config, field);
        const acknowledgement = useReply
            ? cleaned
            : translate(locale, 'recorded', { description: fieldLabel(field), value: String(value).slice(0, 100) });

        return this.advance(ctx, acknowledgement);
    }

    /** Next question, or confirmation/completion once the collector is complete. */
    private async advance(
        ctx: TurnContext,
        lead: string,
        overrides: Partial<CollectorResponseInit> = {},
    ): Promise<CollectorResponse> {
        const { state, config, locale } = ctx;
        const skipped = state.metadata.skippedFields ?? [];

        if (config.isComplete(state.collectedData, skipped)) {
            state.currentField = null;
            return config.confirmBeforeComplete
                ? this.enterConfirmation(ctx, lead, overrides)
                : this.complete(ctx, lead);
        }

        const next = config.nextField(state.collectedData, skipped);
        state.currentField = next ? next.name : null;
        const message = [lead, next ? config.getCollectionPrompt(next, locale) : '']
            .filter(part => part.length > 0)
            .join('\n\n');
        return new CollectorResponse({ success: true, message, state, config, ...overrides });
    }

    private reprompt(ctx: TurnContext, field: FieldDefinition, reply: string): CollectorResponse {
        const { state, config, locale } = ctx;
        const message = [this.extractor.cleanResponse(reply), config.getCollectionPrompt(field, locale)]
            .filter(part => part.length > 0)
            .join('\n\n');
        return new CollectorResponse({ success: true, message, state, config });
    }

    private async handleSuggestionRequest(ctx: TurnContext, field: FieldDefinition): Promise<CollectorResponse> {
        const { state, config, locale } = ctx;
        const label = fieldLabel(field);
        const result = await this.suggestions.suggest(config, field, state.collectedData, locale);

        if (!result) {
            return new CollectorResponse({
                success: false,
                message: translate(locale, 'suggestionsFailed', { description: label }),
                state,
                config,
            });
        }

        state.lastSuggestions = { field: field.name, suggestions: result.suggestions };
        const message = [
            translate(locale, result.fromExamples ? 'examplesIntro' : 'suggestionsIntro', { description: label }),
            this.suggestions.formatList(result.suggestions),
            translate(locale, 'suggestionsOutro'),
        ].join('\n\n');
        return new CollectorResponse({ success: true, message, state, config });
    }

    private async handleSkip(ctx: TurnContext, field: FieldDefinition): Promise<CollectorResponse> {
        const { state, config, locale } = ctx;
        const label = fieldLabel(field);

        if (field.required) {
            const message = [
                translate(locale, 'cannotSkip', { description: label }),
                config.getCollectionPrompt(field, locale),
            ].join('\n\n');
            return new CollectorResponse({ success: true, message, state, config });
        }

        const skipped = (state.metadata.skippedFields ?? []).filter(name => name !== field.name);
        state.metadata.skippedFields = [...skipped, field.name];
        delete state.validationErrors[field.name];
        this.logger.info('Optional field skipped', { sessionId: state.sessionId, field: field.name });

        return this.advance(ctx, translate(locale, 'skipped', { description: label }));
    }

    // --- confirming ---

    private async enterConfirmation(
        ctx: TurnContext,
        lead: string,
        overrides: Partial<CollectorResponseInit> = {},
    ): Promise<CollectorResponse> {
        const { state, config, locale } = ctx;
        state.status = 'confirming';
        state.currentField = null;

        const summary = await this.summaries.dataSummary(config, state.collectedData, locale);
        const actionSummary = await this.summaries.actionSummary(
            config,
            state.collectedData,
            locale,
            state.metadata.outputModifications,
        );

        const message = [lead, summary, '---', config.getConfirmationPrompt(actionSummary, locale)]
            .filter(part => part.length > 0)
            .join('\n\n');
        return new CollectorResponse({
            success: true,
            message,
            state,
            config,
            requiresConfirmation: true,
            allowsEnhancement: config.allowEnhancement,
            summary,
            actionSummary,
            ...overrides,
        });
    }

    private async handleConfirming(ctx: TurnContext): Promise<CollectorResponse> {
        const { state, config, locale, message } = ctx;

        if (this.intentClassifier.isConfirmation(message)) {
            if (config.definition.actionSummaryPrompt) {
                state.confirmedActionSummary = await this.summaries.actionSummary(
                    config,
                    state.collectedData,
                    locale,
                    state.metadata.outputModifications,
                );
            }
            return this.complete(ctx, '');
        }

        if (this.intentClassifier.isRejection(message) || this.intentClassifier.detectRejectionIntent(message)) {
            if (config.allowEnhancement) {
                state.status = 'enhancing';
                return this.askForChange(ctx);
            }
            return this.restart(ctx);
        }

        return new CollectorResponse({
            success: true,
            message: translate(locale, 'clarifyConfirmation'),
            state,
            config,
            requiresConfirmation: true,
            allowsEnhancement: config.allowEnhancement,
        });
    }

    private restart(ctx: TurnContext): CollectorResponse {
        const { state, config, locale } = ctx;
        const first = config.nextField({}) ?? config.fields[0];

        state.status = 'collecting';
        state.collectedData = {};
        state.validationErrors = {};
        state.metadata = {};
        state.currentField = first.name;
        delete state.confirmedActionSummary;
        delete state.lastSuggestions;
        this.logger.info('Collector session restarted', { sessionId: state.sessionId });

        const message = translate(locale, 'restart', { prompt: config.getCollectionPrompt(first, locale) });
        return new CollectorResponse({ success: true, message, state, config });
    }

    // --- enhancing ---

    /** Sets the pending target from the message, when it names one. */
    private async askForChange(ctx: TurnContext): Promise<CollectorResponse> {
        const { state, config, locale, message } = ctx;

        // a bare "no" carries nothing to classify
        const target = this.intentClassifier.isRejection(message)
            ? null
            : await this.targetDetector.detect(message, config);

        let reply: string;
        if (target) {
            state.metadata.pendingField = target.name;
            reply = translate(locale, 'askNewValue', { description: fieldLabel(target) });
        } else {
            delete state.metadata.pendingField;
            reply = translate(locale, 'askWhatToChange');
        }

        return new CollectorResponse({ success: true, message: reply, state, config, allowsEnhancement: true });
    }

    private async handleEnhancing(ctx: TurnContext): Promise<CollectorResponse> {
        const { state, config, locale, message } = ctx;

        if (this.intentClassifier.detectCompletionIntent(message) || this.intentClassifier.isConfirmation(message)) {
            delete state.metadata.pendingField;
            return this.leaveEnhancement(ctx);
        }

        if (config.definition.actionSummaryPrompt && this.isOutputModification(message, config)) {
            return this.modifyOutput(ctx);
        }

        if (this.intentClassifier.detectRejectionIntent(message)) {
            return this.askForChange(ctx);
        }

        const pendingName = state.metadata.pendingField;
        const pending = pendingName ? config.getField(pendingName) : undefined;
        if (pending) {
            const value = this.extractor.extractFromMessage(message, pending);
            if (value === null) {
                return new CollectorResponse({
                    success: true,
                    message: translate(locale, 'askNewValue', { description: fieldLabel(pending) }),
                    state,
                    config,
                    allowsEnhancement: true,
                });
            }

            const outcome = this.validateAndStore(ctx, { [pending.name]: value });
            const [failure] = outcome.failures;
            if (failure) return this.validationFailure(ctx, failure.field, failure.errors);

            delete state.metadata.pendingField;
            return this.afterEnhancement(ctx, outcome.stored);
        }

        const generation = await this.generator.generate(
            buildEnhancementSystemPrompt(config.definition, state.collectedData, locale),
            message,
        );
        const markers = generation.success ? this.extractor.parseMarkers(generation.content) : {};
        const known = Object.fromEntries(Object.entries(markers).filter(([name]) => config.getField(name)));

        if (Object.keys(known).length === 0) {
            const cleaned = generation.success ? this.extractor.cleanResponse(generation.content) : '';
            const reply =
                cleaned ||
                translate(locale, 'noChangeDetected', { fields: config.fields.map(field => field.name).join(', ') });
            return new CollectorResponse({ success: true, message: reply, state, config, allowsEnhancement: true });
        }

        const outcome = this.validateAndStore(ctx, known);
        const [failure] = outcome.failures;
        if (failure) return this.validationFailure(ctx, failure.field, failure.errors);
        return this.afterEnhancement(ctx, outcome.stored);
    }

    private async afterEnhancement(ctx: TurnContext, stored: StoredValue[]): Promise<CollectorResponse> {
        const { state, config, locale } = ctx;
        const updates = stored
            .map(({ field, value }) =>
                translate(locale, 'fieldUpdated', { description: fieldLabel(field), value: String(value) }),
            )
            .join('\n');
        this.logger.info('Fields updated during review', {
            sessionId: state.sessionId,
            fields: stored.map(({ field }) => field.name),
        });

        if (!config.isComplete(state.collectedData, state.metadata.skippedFields)) {
            state.status = 'collecting';
            return this.advance(ctx, updates);
        }

        const summary = await this.summaries.dataSummary(config, state.collectedData, locale);
        const message = [updates, translate(locale, 'updatedInfo'), summary, translate(locale, 'anyOtherChanges')].join(
            '\n\n',
        );
        return new CollectorResponse({ success: true, message, state, config, allowsEnhancement: true, summary });
    }

    private async leaveEnhancement(ctx: TurnContext): Promise<CollectorResponse> {
        const { state, config, locale } = ctx;
        if (!config.isComplete(state.collectedData, state.metadata.skippedFields)) {
            state.status = 'collecting';
            return this.advance(ctx, '');
        }
        return this.enterConfirmation(ctx, translate(locale, 'updatedInfo'));
    }

    /** Keyword hit for the generated output that does not also name a field. */
    private isOutputModification(message: string, config: CollectionConfig): boolean {
        const text = message.toLowerCase();
        const hit = config.outputModificationKeywords.some(keyword => text.includes(keyword.toLowerCase()));
        return hit && this.targetDetector.matchByKeyword(message, config) === null;
    }

    private async modifyOutput(ctx: TurnContext): Promise<CollectorResponse> {
        const { state, config, locale, message } = ctx;
        const modifications = [...(state.metadata.outputModifications ?? []), message.trim()];
        state.metadata.outputModifications = modifications;

        const actionSummary = await this.summaries.actionSummary(config, state.collectedData, locale, modifications);
        const reply = [translate(locale, 'outputUpdated'), actionSummary, translate(locale, 'outputAnyOther')].join(
            '\n\n',
        );
        return new CollectorResponse({ success: true, message: reply, state, config, allowsEnhancement: true, actionSummary });
    }

    // --- completion ---

    private async complete(ctx: TurnContext, lead: string): Promise<CollectorResponse> {
        const { state, config, locale } = ctx;

        const errors = validateAll(config.fields, state.collectedData, locale);
        const invalid = config.fields.find(field => errors[field.name]);
        if (invalid) {
            // the extractor only fills empty fields
            for (const name of Object.keys(errors)) delete state.collectedData[name];
            state.validationErrors = errors;
            state.status = 'collecting';
            state.currentField = invalid.name;
            const lines = Object.values(errors)
                .flat()
                .map(error => `- ${error.message}`);
            const message = [translate(locale, 'finalValidationFailed'), ...lines, '', translate(locale, 'provideCorrect')].join(
                '\n',
            );
            return new CollectorResponse({ success: false, message, state, config, validationErrors: errors });
        }

        const generatedOutput = await this.outputGenerator.generate(config, state, locale);
        const handler = this.registry.handlerFor(config.name);

        let result: unknown;
        try {
            result = handler ? await handler({ ...state.collectedData }, generatedOutput) : { ...state.collectedData };
        } catch (error) {
            const reason = this.errorMessage(error);
            this.logger.error('Completion handler failed', {
                sessionId: state.sessionId,
                collector: config.name,
                error: reason,
            });
            return new CollectorResponse({
                success: false,
                message: translate(locale, 'completionError', { error: reason }),
                state,
                config,
            });
        }

        state.status = 'completed';
        state.currentField = null;
        state.completedAt = this.now().toISOString();
        state.result = result;
        state.validationErrors = {};
        delete state.lastSuggestions;
        this.logger.info('Collector session completed', { sessionId: state.sessionId, collector: config.name });

        const message = [lead, config.definition.successMessage ?? translate(locale, 'success')]
            .filter(part => part.length > 0)
            .join('\n\n');
        return new CollectorResponse({
            success: true,
            message,
            state,
            config,
            isComplete: true,
            summary: config.generateSummary(state.collectedData, locale),
            actionSummary: state.confirmedActionSummary ?? null,
            result,
            generatedOutput,
        });
    }

    // --- document fill ---

    public async extractFromContent(sessionId: string, content: string): Promise<ContentExtractionResult> {
        const state = await this.sessionStore.load(sessionId);
        if (!state) return { success: false, values: {}, message: translate(DEFAULT_LOCALE, 'noSession') };

        const config = await this.registry.resolveForSession(state);
        if (!config) return { success: false, values: {}, message: translate(DEFAULT_LOCALE, 'configNotFound') };

        const values = await this.contentExtractor.extract(config, content);
        return { success: Object.keys(values).length > 0, values };
    }

    /**
     * Applies bulk values (e.g. from `extractFromContent`). Valid values are
     * stored; invalid ones are listed in the message and the response's
     * `validationErrors`, and the response is unsuccessful. The session then
     * moves to confirmation or on to the first field still missing.
     */
    public async applyExtractedData(sessionId: string, values: Record<string, FieldValue>): Promise<CollectorResponse> {
        const state = await this.sessionStore.load(sessionId);
        if (!state) return CollectorResponse.failure(translate(DEFAULT_LOCALE, 'noSession'));

        const config = await this.registry.resolveForSession(state);
        if (!config) return CollectorResponse.failure(translate(DEFAULT_LOCALE, 'configNotFound'), state);

        const locale = effectiveLocale(config.locale, state.detectedLocale);
        if (isTerminal(state.status)) {
            return CollectorResponse.failure(translate(locale, 'inactiveSession'), state, config);
        }

        const ctx: TurnContext = { state, config, locale, message: '' };
        const candidates: Record<string, FieldValue> = {};
        for (const [name, value] of Object.entries(values)) {
            if (isFilled(value)) candidates[name] = value;
        }
        const { failures } = this.validateAndStore(ctx, candidates);
        delete state.metadata.pendingField;

        const rejected: ValidationErrors = {};
        for (const { field, errors } of failures) rejected[field.name] = errors;
        const lead = [translate(locale, 'extractedApplied')];
        if (failures.length > 0) {
            this.logger.info('Document values rejected', {
                sessionId,
                fields: failures.map(({ field }) => field.name),
            });
            const lines = failures.flatMap(({ errors }) => errors.map(error => `- ${error.message}`));
            lead.push([translate(locale, 'extractedRejected'), ...lines].join('\n'));
        }
        const outcome: Partial<CollectorResponseInit> =
            failures.length > 0 ? { success: false, validationErrors: rejected } : {};

        let response: CollectorResponse;
        if (config.isComplete(state.collectedData, state.metadata.skippedFields)) {
            response = await this.enterConfirmation(ctx, lead.join('\n\n'), outcome);
        } else {
            state.status = 'collecting';
            response = await this.advance(ctx, lead.join('\n\n'), outcome);
        }

        this.appendHistory(state, 'assistant', response.message);
        state.lastResponse = response.message;
        await this.sessionStore.save(state);
        return response;
    }

    // --- shared ---

    /**
     * The single write path for field values. Each candidate is normalized
     * and validated; valid values are stored and clear that field's errors,
     * invalid ones leave their errors on the state.
     */
    private validateAndStore(ctx: TurnContext, candidates: Record<string, FieldValue>): StoreOutcome {
        const { state, config, locale } = ctx;
        const stored: StoredValue[] = [];
        const failures: StoreFailure[] = [];

        for (const [name, raw] of Object.entries(candidates)) {
            const field = config.getField(name);
            if (!field) {
                this.logger.debug('Ignoring value for unknown field', { sessionId: state.sessionId, field: name });
                continue;
            }

            const value = this.normalizeValue(field, raw);
            const errors = validateField(field, value, locale);
            if (errors.length > 0) {
                state.validationErrors[name] = errors;
                failures.push({ field, errors });
                continue;
            }

            state.collectedData[name] = value;
            delete state.validationErrors[name];
            stored.push({ field, value });
        }

        return { stored, failures };
    }

    private normalizeValue(field: FieldDefinition, raw: FieldValue): FieldValue {
        if (typeof raw !== 'string') return raw;
        const value = raw.trim();

        if (field.type === 'select') {
            const option = field.options.find(candidate => candidate.toLowerCase() === value.toLowerCase());
            return option ?? value;
        }
        if (field.type === 'number' && isNumericValue(value)) {
            return Number(value);
        }
        return value;
    }

    private validationFailure(
        ctx: TurnContext,
        field: FieldDefinition,
        errors: ValidationErrorDescriptor[],
    ): CollectorResponse {
        const { state, config, locale } = ctx;
        const examples =
            field.examples.length > 0
                ? translate(locale, 'examplesHint', { examples: field.examples.slice(0, 3).join(', ') })
                : '';

        const message = [
            translate(locale, 'validationIntro'),
            '',
            translate(locale, 'errorsHeading'),
            ...errors.map(error => `- ${error.message}`),
            '',
            `${translate(locale, 'provideValid', { description: fieldLabel(field) })}${examples}`,
        ].join('\n');

        return new CollectorResponse({
            success: false,
            message,
            state,
            config,
            validationErrors: { [field.name]: errors },
            allowsEnhancement: state.status === 'enhancing',
        });
    }

    /** True when the reply talks about a field other than the one just collected. */
    private mentionsOtherField(reply: string, config: CollectionConfig, field: FieldDefinition): boolean {
        const text = reply.toLowerCase();
        return config.fields.some(other => {
            if (other.name === field.name) return false;
            const names = [other.name, other.name.replace(/_/g, ' '), other.description.trim()]
                .map(name => name.toLowerCase())
                .filter(name => name.length > 2);
            return names.some(name => text.includes(name));
        });
    }

    private appendHistory(state: SessionState, role: MessageRole, content: string): void {
        state.messageHistory.push({ role, content, timestamp: this.now().toISOString() });
    }
}
