import 'dotenv/config';
import path from 'node:path';
import { createApp } from './app';
import { loadConfig } from './config';
import { createLogger, logError } from './logger';
import { InMemoryPointsRepository } from './repositories/InMemoryPointsRepository';

export function startServer() {
    const config = loadConfig(process.env);
    const logger = createLogger(config);
    const repo = new InMemoryPointsRepository();
    const app = createApp(repo, { logger, bodyLimit: config.bodyLimit });

    const server = app.listen(config.port, config.host, () => {
        logger.info({ host: config.host, port: config.port }, `Server is running on port ${config.port}`);
    });

    server.on('error', (err) => {
        logError(logger, err, { event: 'server_error' });
        process.exitCode = 1;
    });

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Shutting down');
        server.close((err) => {
            if (err) {
                logError(logger, err, { event: 'shutdown_error' });
                process.exitCode = 1;
            }
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    return server;
}

const entry = process.argv[1] ?? '';
const entryBase = path.basename(entry);
if (entryBase === 'index.ts' || entryBase === 'index.js') startServer();
