/**
 * Collector Service Tests
 *
 * Whole conversations through processMessage: collection, validation,
 * confirmation, review, cancellation and completion. Unscripted model calls
 * fail, so most turns run on the deterministic fallbacks.
 */

import { ScriptedTextGenerator } from '../../../testing/ScriptedTextGenerator';
import {
    courseInput,
    createHarness,
    FIXED_NOW,
    intentReply,
    isCollectionCall,
    isIntentCall,
} from '../../../testing/harness';
import { createLogger } from '../../../utils/logger';
import { ConfigStore } from '../../store/ConfigStore';
import { MemoryKeyValueStore } from '../../store/MemoryKeyValueStore';
import { ConfigRegistry } from '../ConfigRegistry';
import { CollectorService } from '../CollectorService';
import { CollectorConfigError } from '../errors';

const NAME_PROMPT = 'Please provide the Course name.\nRequirements: minimum 3 characters';
const LEVEL_PROMPT = 'Please provide the Difficulty level.\nAvailable options: beginner, intermediate, advanced';
const LESSONS_PROMPT = 'Please provide the Number of lessons.\nRequirements: must be a number, at least 1';

const summaryFor = (name: string, lessons = '8') =>
    ['## Summary: Create a Course', '', `**Name**: ${name}`, '**Level**: beginner', `**Lessons count**: ${lessons}`].join(
        '\n',
    );

const confirmationFor = (actionSummary: string) =>
    [
        '## What will happen:',
        actionSummary,
        '',
        '**Please confirm:**',
        "- Say **'yes'** or **'confirm'** to proceed",
        "- Say **'no'** or **'change'** to modify any information",
        "- Say **'cancel'** to abort the process",
    ].join('\n');

const DEFAULT_ACTION = "This will complete the 'Create a Course' process with the information you provided.";
const SUCCESS = 'Thank you! Your information has been successfully collected and processed.';

async function collectAll(service: CollectorService, sessionId: string) {
    await service.processMessage(sessionId, 'Intro to Python');
    await service.processMessage(sessionId, 'beginner');
    return service.processMessage(sessionId, '8');
}

describe('sessions', () => {
    test('starting a session asks for the first field', async () => {
        const { service } = await createHarness();
        const state = await service.startSession('s1', 'course');

        expect(state).toMatchObject({
            sessionId: 's1',
            configName: 'course',
            status: 'collecting',
            currentField: 'name',
            collectedData: {},
            startedAt: FIXED_NOW.toISOString(),
        });
        expect(state.embeddedConfig?.name).toBe('course');
        expect(await service.hasSession('s1')).toBe(true);
    });

    test('greeting lists what is already known', async () => {
        const { service, config } = await createHarness();
        const state = await service.startSession('s1', 'course', { name: 'Intro to Python', level: '', unknown: 'x' });

        expect(state.collectedData).toEqual({ name: 'Intro to Python' });
        expect(state.currentField).toBe('level');
        expect(service.getGreeting(config, state)).toBe(
            [
                "Hello! I'll help you collect the required information. Let's get started!",
                "I already have some information:\n- **Course name**: Intro to Python",
                LEVEL_PROMPT,
            ].join('\n\n'),
        );
    });

    test('unknown collectors are rejected', async () => {
        const { service } = await createHarness();
        await expect(service.startSession('s1', 'missing')).rejects.toThrow(CollectorConfigError);
    });

    test('messages for unknown sessions fail without creating one', async () => {
        const { service, sessionStore } = await createHarness();
        const response = await service.processMessage('missing', 'hi');

        expect(response.success).toBe(false);
        expect(response.message).toBe('No active data collection session found.');
        expect(response.status).toBeNull();
        expect(await sessionStore.exists('missing')).toBe(false);
    });

    test('deleteSession removes the record', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await service.deleteSession('s1');
        expect(await service.getState('s1')).toBeNull();
    });
});

describe('collecting', () => {
    test('full conversation through confirmation to completion', async () => {
        const onComplete = jest.fn(() => ({ id: 'course-1' }));
        const { service } = await createHarness({ onComplete });
        await service.startSession('s1', 'course');

        const first = await service.processMessage('s1', 'Intro to Python');
        expect(first.success).toBe(true);
        expect(first.message).toBe(`Great! I've recorded Course name: Intro to Python\n\n${LEVEL_PROMPT}`);
        expect(first.currentField).toBe('level');
        expect(first.collectedFields).toEqual(['name']);
        expect(first.remainingFields).toEqual(['level', 'lessons_count']);
        expect(first.progress).toBe(33);

        const second = await service.processMessage('s1', 'Beginner');
        expect(second.message).toBe(`Great! I've recorded Difficulty level: beginner\n\n${LESSONS_PROMPT}`);

        const third = await service.processMessage('s1', '8');
        expect(third.status).toBe('confirming');
        expect(third.requiresConfirmation).toBe(true);
        expect(third.allowsEnhancement).toBe(true);
        expect(third.summary).toBe(summaryFor('Intro to Python'));
        expect(third.actionSummary).toBe(DEFAULT_ACTION);
        expect(third.message).toBe(
            [
                "Great! I've recorded Number of lessons: 8",
                summaryFor('Intro to Python'),
                '---',
                confirmationFor(DEFAULT_ACTION),
            ].join('\n\n'),
        );

        const done = await service.processMessage('s1', 'yes');
        expect(done.isComplete).toBe(true);
        expect(done.isFinished).toBe(true);
        expect(done.message).toBe(SUCCESS);
        expect(done.result).toEqual({ id: 'course-1' });
        expect(done.generatedOutput).toBeNull();
        expect(done.progress).toBe(100);
        expect(onComplete).toHaveBeenCalledWith({ name: 'Intro to Python', level: 'beginner', lessons_count: '8' }, null);

        const state = await service.getState('s1');
        expect(state?.status).toBe('completed');
        expect(state?.completedAt).toBe(FIXED_NOW.toISOString());
        expect(state?.result).toEqual({ id: 'course-1' });
        expect(state?.messageHistory).toHaveLength(8);
        expect(state?.lastResponse).toBe(SUCCESS);
    });

    test('the conversational prompt carries progress and recent turns', async () => {
        const { service, generator } = await createHarness();
        await service.startSession('s1', 'course');
        await service.processMessage('s1', 'Intro to Python');
        await service.processMessage('s1', 'beginner');

        const calls = generator.callsMatching(isCollectionCall);
        expect(calls).toHaveLength(2);
        expect(calls[0].userPrompt).toBe(
            [
                'Collected so far:\n(nothing yet)',
                'Current field to collect: name (required): Course name | validation: required|min:3',
                'User: Intro to Python',
            ].join('\n\n'),
        );
        expect(calls[1].userPrompt).toContain('Collected so far:\n- name: Intro to Python');
        expect(calls[1].userPrompt).toContain('Recent conversation:\nUser: Intro to Python\nAssistant: Great!');
    });

    test('invalid values are reported and the field is asked again', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course', { name: 'Intro to Python', level: 'beginner' });

        const response = await service.processMessage('s1', 'zero');
        expect(response.success).toBe(false);
        expect(response.message).toBe(
            [
                'Sorry, the value you provided is not valid:',
                '',
                '**Errors:**',
                '- The lessons count must be a number.',
                '',
                'Please provide a valid Number of lessons',
            ].join('\n'),
        );
        expect(response.currentField).toBe('lessons_count');
        expect(response.data).toEqual({ name: 'Intro to Python', level: 'beginner' });

        const stored = await service.getState('s1');
        expect(stored?.validationErrors.lessons_count.map(error => error.rule)).toEqual(['numeric']);

        const retry = await service.processMessage('s1', '5');
        expect(retry.status).toBe('confirming');
        expect((await service.getState('s1'))?.validationErrors).toEqual({});
    });

    test('validation failures mention the examples', async () => {
        const { service } = await createHarness({
            input: courseInput({ fields: { name: 'Course name | min:3 | examples:Intro to Python,Web Basics' } }),
        });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'Go');
        expect(response.message.split('\n').pop()).toBe(
            'Please provide a valid Course name (e.g., Intro to Python, Web Basics)',
        );
    });

    test('only the current field is taken from model markers', async () => {
        const generator = new ScriptedTextGenerator().when(
            isCollectionCall,
            'Nice choice!\nFIELD_COLLECTED:name=Intro to Python\nFIELD_COLLECTED:level=advanced',
        );
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', "It's called Intro to Python, for advanced students");
        expect(response.data).toEqual({ name: 'Intro to Python' });
        expect(response.message).toBe(`Nice choice!\n\n${LEVEL_PROMPT}`);
    });

    test('a model acknowledgement that talks about another field is replaced', async () => {
        const generator = new ScriptedTextGenerator().when(
            isCollectionCall,
            'Got it! What difficulty level is it?\nFIELD_COLLECTED:name=Intro to Python',
        );
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'Intro to Python');
        expect(response.message).toBe(`Great! I've recorded Course name: Intro to Python\n\n${LEVEL_PROMPT}`);
    });

    test('questions get the model answer and the prompt again', async () => {
        const generator = new ScriptedTextGenerator()
            .when(isCollectionCall, 'It is the title students will see.')
            .when((system, user) => isIntentCall(system) && user === 'what is this for?', intentReply('question'));
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'what is this for?');
        expect(response.message).toBe(`It is the title students will see.\n\n${NAME_PROMPT}`);
        expect(response.currentField).toBe('name');
        expect(response.data).toEqual({});
    });

    test('asking to change an earlier answer is deferred to the review', async () => {
        const { service, generator } = await createHarness();
        await service.startSession('s1', 'course', { name: 'Intro to Python' });

        const response = await service.processMessage('s1', 'I want to change the name');
        expect(response.message).toBe(
            `Noted. You'll be able to review and change earlier answers before confirming.\n\n${LEVEL_PROMPT}`,
        );
        expect(response.data).toEqual({ name: 'Intro to Python' });
        expect(generator.calls).toHaveLength(0);
    });

    test('answers that only contain a change phrase are collected', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'Go Back to Basics');
        expect(response.data).toEqual({ name: 'Go Back to Basics' });
        expect(response.message).toBe(`Great! I've recorded Course name: Go Back to Basics\n\n${LEVEL_PROMPT}`);
    });

    test('a change phrase inside a later answer is not deferred', async () => {
        const { service } = await createHarness({
            input: courseInput({ fields: { name: 'Course name | min:3', audience: 'Target audience' } }),
        });
        await service.startSession('s1', 'course', { name: 'Intro to Python' });

        const response = await service.processMessage('s1', 'for people who need to fix their posture');
        expect(response.data.audience).toBe('for people who need to fix their posture');
        expect(response.status).toBe('confirming');
    });

    test('the classified value is stored instead of the raw message', async () => {
        const generator = new ScriptedTextGenerator()
            .when(isCollectionCall, 'Beginner is a great place to start!')
            .when(isIntentCall, intentReply('provide_value', 'beginner'));
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course', { name: 'Intro to Python' });

        const response = await service.processMessage('s1', "I'm new to this");
        expect(response.data).toEqual({ name: 'Intro to Python', level: 'beginner' });
        expect(response.currentField).toBe('lessons_count');
        expect(response.message).toBe(`Beginner is a great place to start!\n\n${LESSONS_PROMPT}`);
    });

    test('Arabic messages switch replies to Arabic and the locale sticks', async () => {
        const { service, generator } = await createHarness();
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'مقدمة في البرمجة');
        expect(response.message).toBe(
            'رائع! تم تسجيل Course name: مقدمة في البرمجة\n\nيرجى إدخال Difficulty level.\nالخيارات المتاحة: beginner, intermediate, advanced',
        );
        expect(generator.callsMatching(isCollectionCall)[0].systemPrompt).toContain('LANGUAGE: Respond in Arabic (ar).');

        await service.processMessage('s1', 'beginner');
        expect((await service.getState('s1'))?.detectedLocale).toBe('ar');
    });

    test('a configured locale overrides detection', async () => {
        const { service } = await createHarness({ input: courseInput({ locale: 'ar' }) });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'Intro to Python');
        expect(response.message.startsWith('رائع! تم تسجيل Course name: Intro to Python')).toBe(true);
    });
});

describe('suggestions and skipping', () => {
    test('suggestions can be picked by number', async () => {
        const generator = new ScriptedTextGenerator()
            .when('Generate 3-5 helpful suggestions', '1. Intro to Python\n2. Data Science 101\n3. Web Basics')
            .when((system, user) => isIntentCall(system) && user === 'any ideas?', intentReply('suggest'));
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');

        const listed = await service.processMessage('s1', 'any ideas?');
        expect(listed.message).toBe(
            [
                'Here are some suggestions for Course name:',
                '1. Intro to Python\n2. Data Science 101\n3. Web Basics',
                'You can pick one by its number (e.g., 1) or provide your own value.',
            ].join('\n\n'),
        );
        expect((await service.getState('s1'))?.lastSuggestions).toEqual({
            field: 'name',
            suggestions: ['Intro to Python', 'Data Science 101', 'Web Basics'],
        });

        const callsBefore = generator.calls.length;
        const picked = await service.processMessage('s1', '2');
        expect(picked.message).toBe(`Great! I've recorded Course name: Data Science 101\n\n${LEVEL_PROMPT}`);
        expect(generator.calls).toHaveLength(callsBefore);
        expect((await service.getState('s1'))?.lastSuggestions).toBeUndefined();
    });

    test('without suggestions the request is answered with a failure', async () => {
        const generator = new ScriptedTextGenerator().when(isIntentCall, intentReply('suggest'));
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'help me choose');
        expect(response.success).toBe(false);
        expect(response.message).toBe("Sorry, I couldn't come up with suggestions. Please provide Course name.");
    });

    test('optional fields can be skipped', async () => {
        const generator = new ScriptedTextGenerator().when(
            (system, user) => isIntentCall(system) && user === 'skip it',
            intentReply('skip'),
        );
        const { service } = await createHarness({
            generator,
            input: {
                name: 'signup',
                fields: { name: 'Name', notes: 'Notes | optional' },
                allowSkipOptional: false,
                confirmBeforeComplete: false,
            },
        });
        await service.startSession('s1', 'signup');

        const first = await service.processMessage('s1', 'Ada');
        expect(first.message).toBe("Great! I've recorded Name: Ada\n\nPlease provide the Notes.");

        const skipped = await service.processMessage('s1', 'skip it');
        expect(skipped.isComplete).toBe(true);
        expect(skipped.message).toBe(`Okay, skipping Notes.\n\n${SUCCESS}`);
        expect(skipped.result).toEqual({ name: 'Ada' });
        expect((await service.getState('s1'))?.metadata.skippedFields).toEqual(['notes']);
    });

    test('required fields cannot be skipped', async () => {
        const generator = new ScriptedTextGenerator().when(isIntentCall, intentReply('skip'));
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'skip this one');
        expect(response.message).toBe(`Course name is required and can't be skipped.\n\n${NAME_PROMPT}`);
        expect(response.currentField).toBe('name');
    });
});

describe('confirmation and review', () => {
    test('changing a field through a named target', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');

        const rejected = await service.processMessage('s1', 'no');
        expect(rejected.status).toBe('enhancing');
        expect(rejected.allowsEnhancement).toBe(true);
        expect(rejected.message).toBe(
            "No problem! What would you like to change? You can name the field and the new value, or describe what you'd like to modify.",
        );

        const target = await service.processMessage('s1', 'I want to change the name');
        expect(target.message).toBe('Sure. What should the new Course name be?');
        expect((await service.getState('s1'))?.metadata.pendingField).toBe('name');

        const invalid = await service.processMessage('s1', 'AB');
        expect(invalid.success).toBe(false);
        expect(invalid.message).toContain('- The name must be at least 3 characters.');
        expect((await service.getState('s1'))?.metadata.pendingField).toBe('name');

        const updated = await service.processMessage('s1', 'Advanced Python');
        expect(updated.status).toBe('enhancing');
        expect(updated.message).toBe(
            [
                'Updated Course name to: Advanced Python',
                "Here's your updated information:",
                summaryFor('Advanced Python'),
                "Would you like to make any other changes? Say 'done' when you're finished.",
            ].join('\n\n'),
        );
        expect((await service.getState('s1'))?.metadata.pendingField).toBeUndefined();

        const back = await service.processMessage('s1', 'done');
        expect(back.status).toBe('confirming');
        expect(back.message).toBe(
            [
                "Here's your updated information:",
                summaryFor('Advanced Python'),
                '---',
                confirmationFor(DEFAULT_ACTION),
            ].join('\n\n'),
        );

        const done = await service.processMessage('s1', 'confirm');
        expect(done.isComplete).toBe(true);
        expect(done.data.name).toBe('Advanced Python');
    });

    test('the model can name the field to change', async () => {
        const generator = new ScriptedTextGenerator().when('Identify which form field', '{"field":"level"}');
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');

        const target = await service.processMessage('s1', 'I would like to change something');
        expect(target.status).toBe('enhancing');
        expect(target.message).toBe('Sure. What should the new Difficulty level be?');

        const updated = await service.processMessage('s1', 'make it Advanced');
        expect(updated.data.level).toBe('advanced');
        expect(updated.message.startsWith('Updated Difficulty level to: advanced')).toBe(true);
    });

    test('free-form changes are read from the review reply', async () => {
        const generator = new ScriptedTextGenerator().when('wants to change something', 'FIELD_COLLECTED:lessons_count=10');
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');
        await service.processMessage('s1', 'no');

        const updated = await service.processMessage('s1', 'Make it 10 lessons please');
        expect(updated.message).toBe(
            [
                'Updated Number of lessons to: 10',
                "Here's your updated information:",
                summaryFor('Intro to Python', '10'),
                "Would you like to make any other changes? Say 'done' when you're finished.",
            ].join('\n\n'),
        );
        expect(generator.callsMatching('wants to change something')[0].userPrompt).toBe('Make it 10 lessons please');
    });

    test('unrecognized review requests ask for a field', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');
        await service.processMessage('s1', 'no');

        const response = await service.processMessage('s1', 'hmm');
        expect(response.status).toBe('enhancing');
        expect(response.message).toBe(
            "I couldn't tell which information you want to change. Please name the field, for example: name, level, lessons_count.",
        );
    });

    test('other replies at confirmation ask for a clear answer', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');

        const response = await service.processMessage('s1', 'maybe later');
        expect(response.status).toBe('confirming');
        expect(response.requiresConfirmation).toBe(true);
        expect(response.message).toBe(
            "Please confirm if the information is correct by saying 'yes' or 'no'. If you'd like to make changes, say 'no' or tell me what you'd like to modify.",
        );
    });

    test('rejection restarts collection when review is disabled', async () => {
        const { service } = await createHarness({ input: courseInput({ allowEnhancement: false }) });
        await service.startSession('s1', 'course');
        const confirming = await collectAll(service, 's1');
        expect(confirming.allowsEnhancement).toBe(false);

        const response = await service.processMessage('s1', 'no');
        expect(response.status).toBe('collecting');
        expect(response.currentField).toBe('name');
        expect(response.data).toEqual({});
        expect(response.message).toBe(`Let's start over. ${NAME_PROMPT}`);
    });

    test('completion without confirmation', async () => {
        const { service } = await createHarness({ input: courseInput({ confirmBeforeComplete: false }) });
        await service.startSession('s1', 'course', { name: 'Intro to Python', level: 'beginner' });

        const response = await service.processMessage('s1', '8');
        expect(response.isComplete).toBe(true);
        expect(response.message).toBe(`Great! I've recorded Number of lessons: 8\n\n${SUCCESS}`);
        expect(response.result).toEqual({ name: 'Intro to Python', level: 'beginner', lessons_count: '8' });
    });

    test('final validation sends the user back to the first invalid field', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course', { name: 'AB', level: 'beginner', lessons_count: '3' });

        const confirming = await service.processMessage('s1', 'ready');
        expect(confirming.status).toBe('confirming');

        const response = await service.processMessage('s1', 'yes');
        expect(response.success).toBe(false);
        expect(response.status).toBe('collecting');
        expect(response.currentField).toBe('name');
        expect(response.message).toBe(
            'There are some validation errors:\n- The name must be at least 3 characters.\n\nPlease provide the correct values.',
        );
        expect(response.data).toEqual({ level: 'beginner', lessons_count: '3' });
        expect((await service.getState('s1'))?.validationErrors.name.map(error => error.rule)).toEqual(['min']);

        const fixed = await service.processMessage('s1', 'Intro to Python');
        expect(fixed.status).toBe('confirming');
        expect(fixed.data).toEqual({ name: 'Intro to Python', level: 'beginner', lessons_count: '3' });
        expect((await service.getState('s1'))?.validationErrors).toEqual({});
    });
});

describe('output preview and generation', () => {
    test('preview changes reach the structured output', async () => {
        const onComplete = jest.fn(() => 'saved');
        const generator = new ScriptedTextGenerator()
            .when('You describe, in a few short sentences', (_system, user) =>
                user.includes('Apply these requested changes') ? 'Preview v2' : 'Preview v1',
            )
            .when('Generate structured JSON output', '{"lessons":[{"title":"Loops"}]}');
        const { service } = await createHarness({
            generator,
            onComplete,
            input: courseInput({
                actionSummaryPrompt: 'Outline the {name} course.',
                outputSchema: { lessons: { type: 'array', items: { title: 'string' } } },
            }),
        });
        await service.startSession('s1', 'course');

        const confirming = await collectAll(service, 's1');
        expect(confirming.actionSummary).toBe('Preview v1');

        await service.processMessage('s1', 'no');
        const modified = await service.processMessage('s1', 'add more practical exercises to the lessons');
        expect(modified.message).toBe(
            [
                "I've updated the preview based on your feedback:",
                'Preview v2',
                'Would you like any other changes, or shall we proceed with this?',
            ].join('\n\n'),
        );
        expect((await service.getState('s1'))?.metadata.outputModifications).toEqual([
            'add more practical exercises to the lessons',
        ]);

        const back = await service.processMessage('s1', 'done');
        expect(back.actionSummary).toBe('Preview v2');

        const done = await service.processMessage('s1', 'yes');
        expect(done.actionSummary).toBe('Preview v2');
        expect(done.generatedOutput).toEqual({ lessons: [{ title: 'Loops' }] });
        expect(done.result).toBe('saved');
        expect(onComplete).toHaveBeenCalledWith(
            { name: 'Intro to Python', level: 'beginner', lessons_count: '8' },
            { lessons: [{ title: 'Loops' }] },
        );
        expect(generator.callsMatching('Generate structured JSON output')[0].userPrompt).toContain(
            'It is the authoritative source',
        );
    });
});

describe('termination', () => {
    test('cancellation ends the session and keeps the data out of history', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await service.processMessage('s1', 'Intro to Python');

        const response = await service.processMessage('s1', 'cancel');
        expect(response.isCancelled).toBe(true);
        expect(response.status).toBe('cancelled');
        expect(response.message).toBe('Data collection has been cancelled. Your information has not been saved.');

        const state = await service.getState('s1');
        expect(state?.messageHistory).toHaveLength(2);
        expect(state?.collectedData).toEqual({ name: 'Intro to Python' });
    });

    test('cancelling at confirmation keeps the collected data as it was', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');

        const response = await service.processMessage('s1', 'cancel');
        expect(response.status).toBe('cancelled');
        expect(response.isCancelled).toBe(true);

        const state = await service.getState('s1');
        expect(state?.status).toBe('cancelled');
        expect(state?.collectedData).toEqual({ name: 'Intro to Python', level: 'beginner', lessons_count: '8' });
    });

    test('cancelling during review keeps the collected data as it was', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');
        await service.processMessage('s1', 'no');
        await service.processMessage('s1', 'I want to change the name');

        const response = await service.processMessage('s1', 'stop');
        expect(response.status).toBe('cancelled');
        expect(response.message).toBe('Data collection has been cancelled. Your information has not been saved.');

        const state = await service.getState('s1');
        expect(state?.status).toBe('cancelled');
        expect(state?.currentField).toBeNull();
        expect(state?.collectedData).toEqual({ name: 'Intro to Python', level: 'beginner', lessons_count: '8' });
    });

    test('a cancel signal in the model reply cancels', async () => {
        const generator = new ScriptedTextGenerator().when(isCollectionCall, 'Okay, stopping here.\nDATA_COLLECTION_CANCELLED');
        const { service } = await createHarness({ generator, input: courseInput({ cancelMessage: 'Stopped.' }) });
        await service.startSession('s1', 'course');

        const response = await service.processMessage('s1', 'I have to go now');
        expect(response.status).toBe('cancelled');
        expect(response.message).toBe('Stopped.');
    });

    test('finished sessions reject further messages and stay unchanged', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');
        await service.processMessage('s1', 'cancel');
        const before = await service.getState('s1');

        const response = await service.processMessage('s1', 'hello again');
        expect(response.success).toBe(false);
        expect(response.status).toBe('cancelled');
        expect(response.message).toBe('Session is not in an active state.');
        expect(await service.getState('s1')).toEqual(before);
    });

    test('a failing completion handler keeps the session open', async () => {
        const onComplete = jest
            .fn()
            .mockImplementationOnce(() => {
                throw new Error('database unavailable');
            })
            .mockReturnValue({ ok: true });
        const { service } = await createHarness({ onComplete });
        await service.startSession('s1', 'course');
        await collectAll(service, 's1');

        const failed = await service.processMessage('s1', 'yes');
        expect(failed.success).toBe(false);
        expect(failed.status).toBe('confirming');
        expect(failed.message).toBe('There was an error processing your data: database unavailable');

        const retried = await service.processMessage('s1', 'yes');
        expect(retried.isComplete).toBe(true);
        expect(retried.result).toEqual({ ok: true });
    });
});

describe('collector resolution', () => {
    const logger = createLogger('test');

    test('sessions keep working from the definition they embed', async () => {
        const { service, sessionStore } = await createHarness();
        await service.startSession('s1', 'course');

        const elsewhere = new CollectorService({
            logger,
            generator: new ScriptedTextGenerator(),
            sessionStore,
            registry: new ConfigRegistry({ logger, store: new ConfigStore(new MemoryKeyValueStore()) }),
        });
        const response = await elsewhere.processMessage('s1', 'Intro to Python');
        expect(response.success).toBe(true);
        expect(response.currentField).toBe('level');
    });

    test('the durable registry record is used after the cache is cleared', async () => {
        const { service, registry } = await createHarness();
        await service.startSession('s1', 'course');
        registry.clearCache();

        expect((await registry.get('course'))?.name).toBe('course');
        expect((await service.processMessage('s1', 'Intro to Python')).success).toBe(true);
    });

    test('without any definition the turn fails', async () => {
        const { service, sessionStore } = await createHarness();
        const state = await service.startSession('s1', 'course');
        delete state.embeddedConfig;
        await sessionStore.save(state);

        const elsewhere = new CollectorService({
            logger,
            generator: new ScriptedTextGenerator(),
            sessionStore,
            registry: new ConfigRegistry({ logger, store: new ConfigStore(new MemoryKeyValueStore()) }),
        });
        const response = await elsewhere.processMessage('s1', 'Intro to Python');
        expect(response.success).toBe(false);
        expect(response.message).toBe('Configuration not found.');
    });
});

describe('document fill', () => {
    test('extracted values are applied and invalid ones reported', async () => {
        const generator = new ScriptedTextGenerator().when(
            'Extract values for the following fields',
            '{"name":"Intro to Python","lessons_count":"0"}',
        );
        const { service } = await createHarness({ generator });
        await service.startSession('s1', 'course');

        const extracted = await service.extractFromContent('s1', 'Course: Intro to Python. Lessons: none yet.');
        expect(extracted).toEqual({ success: true, values: { name: 'Intro to Python', lessons_count: '0' } });

        const applied = await service.applyExtractedData('s1', extracted.values);
        expect(applied.success).toBe(false);
        expect(applied.message).toBe(
            [
                "I've filled in what I found in the document. Please review the following information:",
                'Some values from the document could not be used:\n- The lessons count must be at least 1.',
                LEVEL_PROMPT,
            ].join('\n\n'),
        );
        expect(applied.validationErrors).toEqual({
            lessons_count: [{ field: 'lessons_count', rule: 'min', message: 'The lessons count must be at least 1.' }],
        });
        expect(applied.currentField).toBe('level');
        expect(applied.data).toEqual({ name: 'Intro to Python' });

        const state = await service.getState('s1');
        expect(state?.validationErrors.lessons_count[0].message).toBe('The lessons count must be at least 1.');
        expect(state?.messageHistory.map(entry => entry.role)).toEqual(['assistant']);
    });

    test('complete documents go straight to confirmation', async () => {
        const { service } = await createHarness();
        await service.startSession('s1', 'course');

        const applied = await service.applyExtractedData('s1', { name: 'Intro to Python', level: 'Beginner', lessons_count: 8 });
        expect(applied.success).toBe(true);
        expect(applied.validationErrors).toEqual({});
        expect(applied.status).toBe('confirming');
        expect(applied.data).toEqual({ name: 'Intro to Python', level: 'beginner', lessons_count: 8 });
    });

    test('missing sessions', async () => {
        const { service } = await createHarness();
        expect(await service.extractFromContent('missing', 'doc')).toEqual({
            success: false,
            values: {},
            message: 'No active data collection session found.',
        });
    });
});
