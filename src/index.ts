import { createApp } from './app.js';
import { config } from './lib/config.js';
import { logger } from './lib/logger.js';
import { connectMongo, disconnectMongo } from './lib/mongo.js';
import { MongoStore } from './repositories/mongoStore.js';

const app = createApp({ store: new MongoStore() });

// Listen first so health checks pass while MongoDB is still connecting
const server = app.listen(config.port, () => {
  logger.info(`Server listening on port ${config.port}`);
  logger.info('Health check available at /health');
});

connectMongo(config.mongoUri)
  .then(() => {
    logger.info('MongoDB connected successfully');
  })
  .catch((err: unknown) => {
    logger.error({ err }, 'Failed to connect to MongoDB - some features may not work');
  });

process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down');
  server.close(() => {
    disconnectMongo()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Error while closing MongoDB connection');
        process.exit(1);
      });
  });
});

export default app;
