import path from 'path';
import express, { Express, NextFunction, Request, Response } from 'express';
import { ILogger } from '../../domain/interfaces';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { TrackerMonitor } from '../../application/TrackerMonitor';
import { SettingsController } from './controllers/SettingsController';
import { TrackerController } from './controllers/TrackerController';
import { createApiRoutes } from './routes/api.routes';

// Resolves to <root>/public from both src/presentation/http and dist/presentation/http
export const PUBLIC_DIR = path.resolve(__dirname, '../../../public');

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(
    monitor: TrackerMonitor,
    logger?: ILogger
): Express {
    const appLogger = logger || new ConsoleLogger();

    // Initialize controllers
    const settingsController = new SettingsController(monitor);
    const trackerController = new TrackerController(monitor);

    // Initialize Express app
    const app: Express = express();
    app.use(express.json());

    // Setup routes
    app.get('/', (_req, res) => res.sendFile(path.join(PUBLIC_DIR, 'index.html')));
    app.use('/api', createApiRoutes(settingsController, trackerController));

    // Body-parser and unexpected errors
    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: 'Invalid JSON body' });
            return;
        }
        appLogger.error('Unhandled request error:', error);
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}
