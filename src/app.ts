import express from 'express';
import cors from 'cors';
import { getSettings, type Settings } from './config/settings';
import type { DB } from './db/database';
import { createAuthMiddleware } from './middleware/auth.middleware';
import { errorMiddleware, notFoundMiddleware } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { createServices } from './services';
import { logger } from './utils/logger';

export const createApp = (db: DB, config: Settings = getSettings()) => {
  const app = express();
  const services = createServices(db, {
    sessionSecret: config.sessionSecret,
    sessionTtlSeconds: config.sessionTtlSeconds,
    bcryptRounds: config.bcryptRounds,
  });

  app.use(cors({ origin: config.corsOrigins, allowedHeaders: ['Content-Type', 'Authorization'] }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: `${Date.now() - start}ms`,
      });
    });
    next();
  });

  app.use(createAuthMiddleware(services.identity));
  app.use(createRoutes(services));
  app.use(notFoundMiddleware);
  app.use(errorMiddleware);

  return app;
};
