import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import * as fs from 'fs';
import * as path from 'path';
import { Config } from '../config';
import { AppDependencies, createDependencies } from '../dependencies';
import { createImageRoutes } from './routes/imageRoutes';
import { errorHandler, NotFoundError } from './middleware/errorHandler';

// public/ sits at the project root, both from src/ and from the compiled dist/src/
export const PUBLIC_DIR = [
    path.resolve(__dirname, '../../public'),
    path.resolve(__dirname, '../../../public'),
].find((dir) => fs.existsSync(dir)) ?? path.resolve('public');

/**
 * Creates and configures the Express application.
 * Tests pass their own dependencies; the server builds them from config.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors({ origin: config.corsOrigins }));
    app.use(express.json({ limit: config.jsonBodyLimit }));

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    // Form page
    app.use(express.static(PUBLIC_DIR));

    // Routes
    app.use('/api', createImageRoutes({
        pipeline: deps.pipeline,
        credentials: deps.credentials,
        outputFilename: path.basename(config.outputPath),
        maskOutputFilename: path.basename(config.maskOutputPath),
    }));

    app.use((req: Request, _res: Response, next) => {
        next(new NotFoundError(`No route for ${req.method} ${req.path}`));
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}
