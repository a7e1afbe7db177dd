import 'dotenv/config';
import express, { NextFunction, Request, Response } from 'express';
import Logger from 'bunyan';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { swaggerSpec } from './swagger/config';
import { loadConfig } from './config/env';
import { TRACKED_POOL } from './config/contracts';
import { FeeCache } from './cache/feeCache';
import { EtherscanClient } from './services/EtherscanClient';
import { BinancePriceClient } from './services/BinancePriceClient';
import { FeeReconciliationService } from './services/FeeReconciliationService';
import { TransactionFeeService } from './services/TransactionFeeService';
import { createTransactionFeeHandler } from './endpoints/transactionFee';
import { createFeeLimiter } from './middleware/rateLimiter';
import { errorDetails } from './utils/errors';
import packageJson from '../package.json';

const SERVICE_NAME = 'pool-fee-tracker';

async function bootstrap() {
  const config = loadConfig();

  const logger = Logger.createLogger({
    name: SERVICE_NAME,
    level: config.logLevel,
    serializers: Logger.stdSerializers,
  });

  logger.info({ pool: TRACKED_POOL }, 'Starting pool fee tracker...');

  // Upstream clients
  const blockchainClient = new EtherscanClient(logger, {
    url: config.etherscan.url,
    apiKey: config.etherscan.apiKey,
    pageSize: config.etherscan.pageSize,
    timeoutMs: config.httpTimeoutMs,
  });
  const priceClient = new BinancePriceClient(logger, {
    url: config.prices.url,
    symbol: config.prices.symbol,
    timeoutMs: config.httpTimeoutMs,
  });

  // Fee state, its writer and its reader
  const feeCache = new FeeCache();
  const reconciliation = new FeeReconciliationService(
    blockchainClient,
    priceClient,
    feeCache,
    logger,
    {
      backfillStartMs: config.backfillStartMs,
      pollIntervalMs: config.pollIntervalMs,
      backfillBatchDelayMs: config.backfillBatchDelayMs,
    },
  );
  const feeService = new TransactionFeeService(feeCache, reconciliation);

  const app = express();

  // Trust proxy for rate limiting
  app.set('trust proxy', true);

  app.use(helmet({
    contentSecurityPolicy: false, // Disable CSP for API
    crossOriginEmbedderPolicy: false, // Allow embedding (for Swagger UI)
  }));

  // Request logging middleware
  app.use((req, res, next) => {
    const header = req.headers['x-request-id'];
    const requestId = typeof header === 'string' ? header : `${req.method}-${Date.now()}`;
    req.headers['x-request-id'] = requestId;
    const startTime = Date.now();

    logger.debug({
      requestId,
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.headers['user-agent'],
    }, 'Incoming request');

    res.on('finish', () => {
      logger.debug({
        requestId,
        statusCode: res.statusCode,
        responseTime: Date.now() - startTime,
      }, 'Request completed');
    });

    next();
  });

  const feeLimiter = createFeeLimiter({
    nodeEnv: config.nodeEnv,
    maxPerMinute: config.rateLimitPerMinute,
    logger,
  });
  const handleTransactionFee = createTransactionFeeHandler(feeService, logger);

  app.get('/transaction_fee', feeLimiter, handleTransactionFee);

  // API Documentation (Swagger UI)
  app.use('/swagger', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Pool Fee Tracker API Documentation',
  }));

  // Health check endpoints
  app.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).send('ok');
  });

  // Ready once the startup backfill has finished
  app.get('/readyz', (_req: Request, res: Response) => {
    if (reconciliation.isReady()) {
      res.status(200).send('ready');
    } else {
      res.status(503).send('not ready');
    }
  });

  app.get('/v1/status', (_req: Request, res: Response) => {
    res.json({
      pool: TRACKED_POOL,
      ...reconciliation.getStatus(),
    });
  });

  app.get('/version', (_req: Request, res: Response) => {
    res.json({
      name: packageJson.name,
      version: packageJson.version,
      node: process.version,
      environment: config.nodeEnv,
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    logger.warn({ path: req.path, method: req.method }, 'Route not found');
    res.status(404).json({
      error: 'Not found',
      detail: `The endpoint ${req.method} ${req.path} does not exist`,
    });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error({ error: errorDetails(err), path: req.path }, 'Unhandled error');
    res.status(500).json({
      error: 'Internal server error',
      detail: config.nodeEnv === 'development' ? errorDetails(err).message : 'An error occurred',
    });
  });

  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info({ port: config.port }, `Pool fee tracker listening on port ${config.port}`);
    logger.info(`Environment: ${config.nodeEnv}`);
  });

  // Backfill runs behind the listening server; /readyz reports progress
  reconciliation.start().catch((error) => {
    logger.fatal({ error: errorDetails(error) }, 'Fee reconciliation failed to start');
    process.exit(1);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    reconciliation.stop();

    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Start the application
bootstrap().catch((error) => {
  const logger = Logger.createLogger({ name: SERVICE_NAME });
  logger.fatal({ error: errorDetails(error) }, 'Failed to start application');
  process.exit(1);
});
