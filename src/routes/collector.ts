// src/routes/collector.ts

import express, { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { fieldValueSchema } from '../models/collection.model';
import { CollectorConfigError } from '../services/collector/errors';
import { CollectorService } from '../services/collector/CollectorService';
import { ConfigRegistry } from '../services/collector/ConfigRegistry';
import { createLogger } from '../utils/logger';

const logger = createLogger('collector-routes');

const startSessionBody = z.object({
    collector: z.string().min(1),
    sessionId: z.string().min(1).optional(),
    initialData: z.record(fieldValueSchema).optional(),
});

const messageBody = z.object({ message: z.string() });
const contentBody = z.object({ content: z.string().min(1) });
const applyBody = z.object({ data: z.record(fieldValueSchema) });

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

export function createCollectorRouter(collector: CollectorService, registry: ConfigRegistry): express.Router {
    const router = express.Router();

    router.post('/sessions', async (req: Request, res: Response) => {
        const body = startSessionBody.safeParse(req.body);
        if (!body.success) {
            res.status(400).json({ error: 'collector is required', issues: body.error.issues });
            return;
        }

        try {
            const { collector: name, initialData } = body.data;
            const sessionId = body.data.sessionId ?? uuidv4();
            if (await collector.hasSession(sessionId)) {
                res.status(409).json({ error: `Session ${sessionId} already exists` });
                return;
            }

            const state = await collector.startSession(sessionId, name, initialData);
            const config = await registry.resolveForSession(state);
            res.status(201).json({
                sessionId,
                status: state.status,
                currentField: state.currentField,
                greeting: config ? collector.getGreeting(config, state) : '',
            });
        } catch (error) {
            if (error instanceof CollectorConfigError) {
                res.status(404).json({ error: error.message });
                return;
            }
            logger.error('Failed to start collector session', { error: errorMessage(error) });
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.post('/sessions/:sessionId/messages', async (req: Request, res: Response) => {
        const body = messageBody.safeParse(req.body);
        if (!body.success) {
            res.status(400).json({ error: 'message is required' });
            return;
        }

        try {
            const response = await collector.processMessage(req.params.sessionId, body.data.message);
            res.status(response.status === null ? 404 : 200).json(response.toJSON());
        } catch (error) {
            logger.error('Failed to process message', { sessionId: req.params.sessionId, error: errorMessage(error) });
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.post('/sessions/:sessionId/extract', async (req: Request, res: Response) => {
        const body = contentBody.safeParse(req.body);
        if (!body.success) {
            res.status(400).json({ error: 'content is required' });
            return;
        }

        try {
            res.json(await collector.extractFromContent(req.params.sessionId, body.data.content));
        } catch (error) {
            logger.error('Failed to extract content', { sessionId: req.params.sessionId, error: errorMessage(error) });
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.post('/sessions/:sessionId/apply', async (req: Request, res: Response) => {
        const body = applyBody.safeParse(req.body);
        if (!body.success) {
            res.status(400).json({ error: 'data is required' });
            return;
        }

        try {
            const response = await collector.applyExtractedData(req.params.sessionId, body.data.data);
            res.status(response.status === null ? 404 : 200).json(response.toJSON());
        } catch (error) {
            logger.error('Failed to apply data', { sessionId: req.params.sessionId, error: errorMessage(error) });
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.get('/sessions/:sessionId', async (req: Request, res: Response) => {
        try {
            const state = await collector.getState(req.params.sessionId);
            if (!state) {
                res.status(404).json({ error: 'Session not found' });
                return;
            }
            res.json(state);
        } catch (error) {
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    router.delete('/sessions/:sessionId', async (req: Request, res: Response) => {
        try {
            await collector.deleteSession(req.params.sessionId);
            res.json({ success: true });
        } catch (error) {
            res.status(500).json({ error: errorMessage(error) });
        }
    });

    return router;
}
