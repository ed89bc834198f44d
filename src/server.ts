import express, { Express, Request, Response } from 'express';
import { loadConfig, TrackerConfig } from './config/config';
import { logger, setLogLevel } from './helpers/logger';
import { createTrackerEndpoint, runTracker, RunSummary } from './scraper';

export function healthCheck(_req: Request, res: Response): void {
    res.status(200).json({ status: 'ok' });
}

export function createServer(
    config: TrackerConfig,
    run: (config: TrackerConfig) => Promise<RunSummary> = runTracker,
): Express {
    const app = express();

    app.get('/health', healthCheck);
    app.get('/scrape', createTrackerEndpoint(config, run));

    return app;
}

if (require.main === module) {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    createServer(config).listen(config.port, () => {
        logger.info(`Server is running on port ${config.port}`);
    });
}
