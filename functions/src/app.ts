import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import * as functions from 'firebase-functions';
import { corsConfig } from './config';
import { errorHandler } from './middlewares/errorHandler';
import { requireHttps } from './middlewares/httpsOnly';
import { apiLimiter } from './middlewares/rateLimit';
import { createSessionsRouter } from './routes/sessions';
import type { SessionRegistry } from './services/sessionRegistry';
import { setupSentryErrorHandler } from './utils/sentry';

export interface CreateAppOptions {
  registry: SessionRegistry;
}

function resolveAllowedOrigins(): string[] {
  const allowedOrigins = corsConfig.allowedOrigins
    ? corsConfig.allowedOrigins.split(',').map((origin) => origin.trim()).filter(Boolean)
    : [];

  // In development, allow localhost and common development ports
  const devOrigins = corsConfig.isDevelopment
    ? ['http://localhost:3000', 'http://localhost:5173', 'http://localhost:8501']
    : [];

  return [...allowedOrigins, ...devOrigins];
}

export function createApp(options: CreateAppOptions): Express {
  const app = express();

  // Trust proxy - required for rate limiting behind Cloud Functions/Load Balancer
  app.set('trust proxy', true);

  const allAllowedOrigins = resolveAllowedOrigins();
  if (allAllowedOrigins.length === 0) {
    functions.logger.warn(
      '[cors] No ALLOWED_ORIGINS configured. API will reject all CORS requests from browsers.',
    );
  }

  app.use(requireHttps());

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (server-to-server, curl)
      if (!origin || allAllowedOrigins.includes(origin)) {
        callback(null, true);
        return;
      }

      functions.logger.warn(`[cors] Rejected request from unauthorized origin: ${origin}`);
      callback(new Error(`Origin ${origin} not allowed by CORS policy`));
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000, // 1 year in seconds
      includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  // Document images arrive base64-encoded in the JSON body
  app.use(express.json({ limit: '10mb' }));
  app.use(apiLimiter);

  app.use('/v1/sessions', createSessionsRouter(options.registry));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Sentry error handler - must come before custom error handler
  setupSentryErrorHandler(app);

  app.use(errorHandler);

  return app;
}
