// src/services/collector/SummaryGenerator.ts

import { CollectedData } from '../../models/collection.model';
import { BaseService } from '../base/BaseService';
import { ServiceConfig } from '../base/types';
import { TextGenerator } from '../llm/types';
import { CollectionConfig } from './CollectionConfig';
import { describeValues, languageSection } from './prompts/collectionPrompts';
import {
    ACTION_SUMMARY_SYSTEM_PROMPT,
    DATA_SUMMARY_SYSTEM_PROMPT,
    SUMMARY_USER_PROMPT_TEMPLATE,
} from './prompts/summaryPrompts';
import { fillFieldPlaceholders, fillTemplate } from './prompts/template';

export interface SummaryGeneratorConfig extends ServiceConfig {
    generator: TextGenerator;
}

/**
 * Data summary and "what will happen" preview shown before confirmation.
 * Model-backed when the collector sets the matching prompt, static otherwise.
 */
export class SummaryGenerator extends BaseService {
    private generator: TextGenerator;

    constructor(config: SummaryGeneratorConfig) {
        super(config);
        this.generator = config.generator;
    }

    public async dataSummary(config: CollectionConfig, data: CollectedData, locale: string): Promise<string> {
        const staticSummary = config.generateSummary(data, locale);
        const instructions = config.definition.summaryPrompt;
        if (!instructions) return staticSummary;

        const generated = await this.run(DATA_SUMMARY_SYSTEM_PROMPT, instructions, config, data, [], locale);
        return generated ?? staticSummary;
    }

    public async actionSummary(
        config: CollectionConfig,
        data: CollectedData,
        locale: string,
        modifications: readonly string[] = [],
    ): Promise<string> {
        const staticSummary = config.generateActionSummary(data, locale);
        const instructions = config.definition.actionSummaryPrompt;
        if (!instructions) return staticSummary;

        const generated = await this.run(ACTION_SUMMARY_SYSTEM_PROMPT, instructions, config, data, modifications, locale);
        return generated ?? staticSummary;
    }

    private async run(
        systemPrompt: string,
        instructions: string,
        config: CollectionConfig,
        data: CollectedData,
        modifications: readonly string[],
        locale: string,
    ): Promise<string | null> {
        const userPrompt = fillTemplate(SUMMARY_USER_PROMPT_TEMPLATE, {
            INSTRUCTIONS: fillFieldPlaceholders(instructions, data),
            DATA: describeValues(config.fields, data),
            MODIFICATIONS:
                modifications.length > 0
                    ? `\nApply these requested changes:\n${modifications.map(item => `- ${item}`).join('\n')}\n`
                    : '',
            LANGUAGE_SECTION: languageSection(locale),
        });

        const result = await this.generator.generate(systemPrompt, userPrompt, { temperature: 0.5 });
        const content = result.content.trim();
        if (!result.success || !content) {
            this.logger.warn('Summary generation failed, using static summary', {
                collector: config.name,
                error: result.error,
            });
            return null;
        }
        return content;
    }
}
