import { testConnection } from './config/database';
import { ENVIRONMENT, PORT } from './config/environment';
import { createApp } from './app';
import { createContainer } from './core/container';
import { SchedulerService } from './services/scheduler/SchedulerService';
import { logger } from './utils/logger';

// Start server with database connection test
async function startServer(): Promise<void> {
  try {
    const container = createContainer();

    if (container.storage === 'postgres') {
      const dbConnected = await testConnection();
      if (dbConnected) {
        logger.info('✅ Database connected successfully');
      } else {
        logger.warn('⚠️  Database connection failed - requests will fail until it is reachable');
      }
    } else {
      logger.warn('⚠️  DB_HOST not set - memories and conversations are kept in process only');
    }

    const schedulerService = new SchedulerService(container.memoryService, {
      messageIdCache: container.messageIdCache
    });
    schedulerService.start();

    const app = createApp(container);

    app.listen(PORT, () => {
      logger.info(`🚀 Server running on port ${PORT} (${ENVIRONMENT})`);
      logger.info(`📱 Webhook URL: http://localhost:${PORT}/webhook/whatsapp`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
