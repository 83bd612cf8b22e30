import compression from 'compression';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express, RequestHandler } from 'express';
import { requestContext } from '../api/middleware/request-context.js';
import { errorHandler } from '../api/middleware/error-handler.js';
import { systemRouter } from '../api/routes/system.router.js';
import type { ModuleManager } from '../services/module-manager/index.js';
import { env } from '../config/env.js';

export interface IExpressAppOptions {
  manager: ModuleManager;
  /** Guard for `requiresAuth` module routes. */
  authenticate: RequestHandler;
}

/**
 * Build the HTTP application around a running module manager.
 *
 * Module routes are collected once, here; the manager must already be
 * `running`.
 */
export function createExpressApp({ manager, authenticate }: IExpressAppOptions): Express {
  const app = express();

  app.set('trust proxy', true);
  app.use(requestContext);
  app.use(helmet({ crossOriginResourcePolicy: { policy: 'cross-origin' } }));

  const allowedOrigins = env.CORS_ORIGINS;

  app.use(cors({
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, mobile apps) are not subject to CORS
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('CORS policy: Origin not allowed'));
      }
    },
    credentials: true
  }));

  app.use(compression());
  app.use(cookieParser());
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (env.NODE_ENV !== 'test') {
    app.use(morgan(env.NODE_ENV === 'production' ? 'combined' : 'dev'));
  }

  // Uploaded media and profile pictures live under STATIC_ROOT
  app.use('/static', express.static(env.STATIC_ROOT));

  app.get('/', (_req, res) => {
    res.json({
      status: 'success',
      message: 'Welcome to the Everly API',
      apiPrefix: env.API_PREFIX
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', environment: env.NODE_ENV, timestamp: Date.now() });
  });

  app.use(`${env.API_PREFIX}/system`, systemRouter(manager));
  app.use(env.API_PREFIX, manager.createRouter({ authenticate }));

  app.use(errorHandler);
  return app;
}
