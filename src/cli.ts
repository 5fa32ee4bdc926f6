#!/usr/bin/env node

import readline from 'readline';
import { v4 as uuidv4 } from 'uuid';
import { createRuntime } from './bootstrap';

// Plain-text chat against the configured collector, in process.
async function main(): Promise<void> {
    const runtime = await createRuntime({ allowOffline: true });
    const { collector, defaultCollector } = runtime;
    const sessionId = `cli-session-${uuidv4()}`;

    const state = await collector.startSession(sessionId, defaultCollector);

    console.log(`Collector     : ${defaultCollector.title}`);
    console.log(`Session ID    : ${sessionId}`);
    console.log('------------------------------------------');
    console.log('Type your answer and press Enter. Type "/exit" to quit.');
    console.log('------------------------------------------');
    console.log(`\nASSISTANT> ${collector.getGreeting(defaultCollector, state)}\n`);

    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
        prompt: 'YOU> ',
    });

    const finish = async () => {
        rl.close();
        await collector.deleteSession(sessionId);
        await runtime.close();
    };

    rl.prompt();
    for await (const line of rl) {
        const message = line.trim();
        if (message === '/exit') break;
        if (!message) {
            rl.prompt();
            continue;
        }

        const response = await collector.processMessage(sessionId, message);
        console.log(`\nASSISTANT> ${response.message}\n`);

        if (response.isComplete) {
            console.log(JSON.stringify({ data: response.data, output: response.generatedOutput }, null, 2));
        }
        if (response.isFinished) break;

        console.log(`[${response.progress}% collected]`);
        rl.prompt();
    }

    await finish();
}

main().catch(error => {
    console.error(`\nFATAL: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
});
