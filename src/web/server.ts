import express, { Express, NextFunction, Request, Response } from 'express';
import compression from 'compression';
import cors from 'cors';
import { createServer, Server } from 'http';
import { logger } from '../logger.js';
import { isBridgeError } from '../errors.js';
import { SensorThingsService, TimeseriesRequest } from '../sensorthings/converter.js';

function queryString(req: Request, name: string): string | undefined {
    const value = req.query[name];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Build the Express app. The service is injected so tests can supply a fake.
 */
export function createApp(service: SensorThingsService): Express {
    const app = express();

    app.use(compression());
    app.use(cors());

    app.get('/', (req: Request, res: Response) => {
        res.type('text/plain').send('SensorThings API Wrapper is running!');
    });

    // GET /latest - most recent reading of every station
    app.get('/latest', async (req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await service.convertLatest());
        } catch (error) {
            next(error);
        }
    });

    // GET /timeseries?stationId=&timeFrom=&timeTo=&observedProperty=
    app.get('/timeseries', async (req: Request, res: Response, next: NextFunction) => {
        const request: TimeseriesRequest = {
            stationId: queryString(req, 'stationId'),
            timeFrom: queryString(req, 'timeFrom'),
            timeTo: queryString(req, 'timeTo'),
            observedProperty: queryString(req, 'observedProperty'),
        };
        try {
            res.json(await service.convertTimeseries(request));
        } catch (error) {
            next(error);
        }
    });

    app.use((req: Request, res: Response) => {
        res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
    });

    // Express recognises error handlers by their four parameters
    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (isBridgeError(error)) {
            logger.warn(`${req.method} ${req.path} failed: ${error.message}`, { status: error.status });
            res.status(error.status).json({ error: error.message });
            return;
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`${req.method} ${req.path} failed`, { error: message });
        res.status(500).json({ error: message });
    });

    return app;
}

/**
 * Listen on `port` and close the server on SIGINT/SIGTERM. A failed listen is logged and sets exit code 1.
 */
export function startServer(service: SensorThingsService, port: number): Server {
    const server = createServer(createApp(service));

    server.on('error', (error: NodeJS.ErrnoException) => {
        logger.error(`SensorThings endpoint failed on port ${port}`, { code: error.code, error: error.message });
        process.exitCode = 1;
    });

    const shutdown = (signal: string) => {
        logger.info(`Received ${signal}, shutting down server...`);
        server.close(() => process.exit(0));
    };

    server.listen(port, () => {
        logger.info(`SensorThings endpoint running on port ${port}`);
        logger.info(`Latest: http://localhost:${port}/latest`);
        process.on('SIGINT', () => shutdown('SIGINT'));
        process.on('SIGTERM', () => shutdown('SIGTERM'));
    });

    return server;
}
