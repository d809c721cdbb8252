import express, { ErrorRequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import cookieParser from 'cookie-parser';
import { createRequireAuth } from './middleware/authMiddleware';
import { createChatController } from './controllers/chatController';
import { createFilesController } from './controllers/filesController';
import { createChatRoutes } from './routes/chatRoutes';
import { createFilesRoutes } from './routes/filesRoutes';
import { createAuthRoutes } from './routes/authRoutes';
import { IdentityResolver } from './services/identityResolver';
import { BlobStore } from './services/blobStore';
import { ConnectionRegistry } from './realtime/connectionRegistry';
import { DeliveryNotifier } from './realtime/deliveryNotifier';
import { checkDBHealth } from './db';
import { respondWithError } from './utils/chatErrors';

export interface AppDependencies {
  resolveIdentity: IdentityResolver;
  registry: ConnectionRegistry;
  notifier: DeliveryNotifier;
  blobStore: BlobStore;
  healthCheck?: () => Promise<boolean>;
}

export const parseAllowedOrigins = (value: string | undefined): string[] =>
  (value || 'http://localhost:4200')
    .split(',')
    .map(origin => origin.trim().replace(/\/$/, ''))
    .filter(Boolean);

const readProperty = (error: unknown, key: string): unknown =>
  typeof error === 'object' && error !== null && key in error
    ? new Map(Object.entries(error)).get(key)
    : undefined;

const clientErrorStatus = (error: unknown): number | undefined => {
  const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

const CLIENT_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Request body is not valid JSON',
  'entity.too.large': 'Request body is too large',
  'encoding.unsupported': 'Unsupported request body encoding',
};

// Errors raised by middleware before a controller runs, such as body parsing
export const handleMiddlewareError: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    return next(err);
  }

  const status = clientErrorStatus(err);
  if (status === undefined) {
    respondWithError(res, err, 'Internal server error');
    return;
  }

  const type = readProperty(err, 'type');
  const message = typeof type === 'string' && CLIENT_ERROR_MESSAGES[type]
    ? CLIENT_ERROR_MESSAGES[type]
    : 'Request could not be processed';
  res.status(status).json({ success: false, error: 'Invalid request', message });
};

export const createApp = (deps: AppDependencies) => {
  const app = express();
  const allowedOrigins = parseAllowedOrigins(process.env.CORS_ORIGINS);

  app.set('trust proxy', 1);

  const corsOptions: cors.CorsOptions = {
    origin: (origin, cb) => {
      // allow non-browser tools (no origin)
      if (!origin) return cb(null, true);
      if (allowedOrigins.includes(origin.replace(/\/$/, ''))) {
        return cb(null, true);
      }
      console.error("❌ Blocked by CORS:", origin);
      return cb(null, false);
    },
    credentials: true,
    methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "X-Requested-With", "Accept", "Origin"],
    optionsSuccessStatus: 204,
  };

  // Apply CORS before ANY other middleware
  app.use(cors(corsOptions));
  app.options(/.*/, cors(corsOptions));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  app.use(helmet({
    crossOriginResourcePolicy: { policy: "cross-origin" },
  }));
  app.use(compression());
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan(process.env.NODE_ENV === 'production' ? 'combined' : 'dev'));
  }

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: 1000, // Limit each IP to 1000 requests per windowMs
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  app.use(cookieParser());

  const requireAuth = createRequireAuth(deps.resolveIdentity);
  const chatController = createChatController({ notifier: deps.notifier });
  const filesController = createFilesController({ blobStore: deps.blobStore });

  app.use('/api/auth', createAuthRoutes(requireAuth));
  app.use('/api/chat', createChatRoutes(requireAuth, chatController));
  app.use('/api/files', createFilesRoutes(requireAuth, filesController));

  app.get('/health', async (_req, res) => {
    const healthCheck = deps.healthCheck || checkDBHealth;
    const database = await healthCheck().catch(() => false);
    res.status(database ? 200 : 503).json({
      status: database ? 'ok' : 'degraded',
      database,
      connections: deps.registry.connectionCount,
      adminConnections: deps.registry.adminCount,
      timestamp: new Date().toISOString(),
    });
  });

  app.use((req, res) => {
    res.status(404).json({ success: false, error: 'Not found', message: `No route for ${req.method} ${req.path}` });
  });

  app.use(handleMiddlewareError);

  return app;
};
