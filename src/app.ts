import express, { Express } from 'express';
import http from 'http';
import config, { AppConfig } from './config';
import { connectDB, disconnectDB } from './config/database';
import { createServices, Services } from './container';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createChatRouter } from './routes/chat';
import { createPaymentRouter } from './routes/payment';
import { errorMessage, logger } from './utils/logger';
import { WebSocketManager } from './websocket/WebSocketManager';

export const createApp = (services: Services, appConfig: AppConfig = config): Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use((req, res, next) => {
    const origin = appConfig.corsOrigins.includes('*') ? '*' : req.headers.origin;
    if (origin && (origin === '*' || appConfig.corsOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    }
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.get('/', (_req, res) => {
    res.json({
      message: 'Term insurance sales agent backend',
      chatEndpoint: '/api/chat/message',
      health: '/health',
    });
  });
  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', environment: appConfig.env, sessions: services.store.size });
  });

  app.use(
    '/api/chat',
    createChatRouter({ conversationManager: services.conversationManager, provider: services.provider })
  );
  app.use(
    '/api/payment',
    createPaymentRouter({
      conversationManager: services.conversationManager,
      paymentService: services.paymentService,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
};

export const bootstrap = async (appConfig: AppConfig = config): Promise<http.Server> => {
  if (appConfig.storage.driver === 'mongo') {
    await connectDB(appConfig.storage.mongoUri);
  }

  const services = createServices(appConfig);
  const app = createApp(services, appConfig);
  const server = http.createServer(app);
  const sockets = new WebSocketManager(server, services.conversationManager, appConfig.corsOrigins);

  const stop = (signal: string) => {
    logger.info('Shutting down', { signal });
    services.shutdown();
    sockets.close();
    server.close(() => {
      if (appConfig.storage.driver !== 'mongo') {
        process.exit(0);
      }
      disconnectDB()
        .catch((error: unknown) => logger.error('Failed to disconnect MongoDB', { error: errorMessage(error) }))
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGINT', () => stop('SIGINT'));
  process.once('SIGTERM', () => stop('SIGTERM'));

  server.listen(appConfig.port, () => {
    logger.info('Server running', { port: appConfig.port, storage: appConfig.storage.driver });
  });
  return server;
};

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  });
}
