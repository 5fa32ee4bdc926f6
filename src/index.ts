// src/index.ts

import express from 'express';
import { createServer } from 'http';
import { createRuntime } from './bootstrap';
import { CONFIG } from './config';
import { createCollectorRouter } from './routes/collector';
import { createLogger } from './utils/logger';

const logger = createLogger('server');

async function main(): Promise<void> {
    const runtime = await createRuntime();

    const app = express();
    app.use(express.json({ limit: '5mb' }));
    app.use('/collectors', createCollectorRouter(runtime.collector, runtime.registry));
    app.get('/health', (_req, res) => {
        res.json({ status: 'ok', collector: runtime.defaultCollector.name });
    });

    const server = createServer(app);

    const shutdown = (signal: string) => {
        logger.info('Shutting down', { signal });
        server.close(() => {
            runtime
                .close()
                .then(() => process.exit(0))
                .catch(error => {
                    logger.error('Error during shutdown', { error: error instanceof Error ? error.message : String(error) });
                    process.exit(1);
                });
        });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    server.listen(CONFIG.PORT, () => logger.info(`Server is listening on port ${CONFIG.PORT}`));
}

main().catch(error => {
    logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
