/**
 * Express application
 *
 * Builds the app with all middleware and routes. Listening and database
 * startup live in index.ts so tests can mount the app on their own port.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import routes from './routes';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { logDebug } from './utils/logger.utils';

export function createApp(): express.Express {
  const app = express();

  // ======================
  // SECURITY MIDDLEWARE
  // ======================

  // CORS must come before Helmet
  app.use(
    cors({
      origin:
        process.env.NODE_ENV === 'production'
          ? process.env.FRONTEND_URL
          : ['http://localhost:5173', 'http://localhost:3000'],
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    })
  );

  // ======================
  // BODY PARSING
  // ======================

  // Room for long visit notes
  app.use(express.json({ limit: '1mb' }));

  // ======================
  // REQUEST LOGGING (Development)
  // ======================

  if (process.env.NODE_ENV === 'development') {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      res.on('finish', () => {
        logDebug('http.request', `${req.method} ${req.path}`, undefined, {
          status: res.statusCode,
          duration: `${Date.now() - start}ms`,
        });
      });
      next();
    });
  }

  app.set('trust proxy', 1);

  // ======================
  // API ROUTES
  // ======================

  app.use('/api', routes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
