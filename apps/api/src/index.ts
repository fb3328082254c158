import 'dotenv/config';
import { App } from './app';
import { Core } from './infrastructure/Core';
import { loadAppConfig } from './application/config/appConfig';
import logger from './infrastructure/logger';

const core = new Core(loadAppConfig());
const server = new App(core).listen();

const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
        core.close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                logger.error('Error while closing storage', { error: error instanceof Error ? error.message : String(error) });
                process.exit(1);
            });
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
