import express from 'express';
import { ENVIRONMENT, WHATSAPP_WEBHOOK_VERIFY_TOKEN } from './config/environment';
import { ServiceContainer } from './core/container';
import { createErrorHandler } from './middleware/errorHandler';
import { createChatRouter } from './routes/chat';
import { createMemoryRouter } from './routes/memories';
import { createWhatsAppWebhook } from './routes/webhook';
import { Logger, logger as defaultLogger } from './utils/logger';

export interface AppOptions {
  enableWebhook?: boolean;
  defaultAgentId?: string;
  verifyToken?: string;
  logger?: Logger;
}

export function createApp(container: ServiceContainer, options: AppOptions = {}): express.Express {
  const logger = options.logger ?? defaultLogger;
  const app = express();

  // Middleware
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({ status: 'ok', storage: container.storage, timestamp: new Date().toISOString() });
  });

  app.use('/api/v1/chat', createChatRouter(container.chatService));
  app.use('/api/v1', createMemoryRouter(container.memoryService));

  // WhatsApp webhook routes (only registered in PRODUCTION unless asked for)
  if (options.enableWebhook ?? ENVIRONMENT === 'PRODUCTION') {
    app.use('/webhook', createWhatsAppWebhook({
      chatService: container.chatService,
      sender: container.sender,
      messageIdCache: container.messageIdCache,
      defaultAgentId: options.defaultAgentId ?? container.defaultAgentId,
      verifyToken: options.verifyToken ?? WHATSAPP_WEBHOOK_VERIFY_TOKEN,
      logger
    }));
    logger.info('✅ WhatsApp webhook routes registered');
  } else {
    logger.info('⚠️  WhatsApp webhook routes skipped (DEBUG mode)');
  }

  app.use((req, res) => {
    res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
  });

  // Error handling middleware
  app.use(createErrorHandler(logger));

  return app;
}
