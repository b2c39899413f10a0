import express from 'express';
import cors, { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import { Queryable } from './connections/db/repositories/types';
import { Services } from './container';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';

// CORS Configuration
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (mobile app, curl)
    if (!origin) {
      return callback(null, true);
    }

    if (appConfig.corsOrigins.includes(origin)) {
      return callback(null, true);
    }

    // In development, allow all origins if CORS_ORIGINS is not set
    if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      return callback(null, true);
    }

    callback(new Error('Not allowed by CORS'));
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
  maxAge: 86400, // 24 hours
  optionsSuccessStatus: 200,
};

export const createApp = (services: Services, db?: Queryable) => {
  const app = express();

  app.use(cors(corsOptions));
  app.use(express.json({ limit: '5mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    if (!db) {
      return res.json({ status: 'ok' });
    }
    try {
      await db.query('SELECT 1');
      return res.json({ status: 'ok', database: 'connected' });
    } catch {
      return res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  app.use('/api', createRoutes(services));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
