import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { config } from './config/env.config';
import { createRoutes } from './routes';
import { CameraRegistry } from './services/cameraRegistry.service';
import { invalidRequest, sendError } from './utils/errorResponse';

export const createApp = (registry: CameraRegistry): Application => {
  const app: Application = express();

  // Middleware
  app.use(cors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));
  app.use(express.json({ limit: config.bodyLimit }));

  app.get('/', (req: Request, res: Response) => {
    res.status(200).json({ message: 'Camera registry service is running!' });
  });

  app.get('/health', (req: Request, res: Response) => {
    res.status(200).json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  // Routes
  app.use(createRoutes(registry));

  // Body parser failures arrive here with the JSON error already decided
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError && 'body' in error) {
      res.status(400).json(invalidRequest('Malformed JSON body'));
      return;
    }
    if (error instanceof Error && 'status' in error && error.status === 413) {
      res.status(413).json(invalidRequest('Request body too large'));
      return;
    }
    sendError(req, res, error, 'handling request');
  });

  return app;
};
