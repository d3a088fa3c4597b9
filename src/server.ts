import { createApp } from './app';
import { loadConfigFromDotenv } from './config/env';
import { createContext } from './context';
import { startAnomalyDetectionJob } from './jobs/anomalyDetectionJob';
import { connectDatabase } from './utils/database';
import { errorMessage } from './utils/errors';
import logger, { setLogLevel } from './utils/logger';

const startServer = async () => {
  try {
    const config = loadConfigFromDotenv();
    setLogLevel(config.logLevel);

    await connectDatabase(config.mongoUri);

    const app = createApp(createContext(config));
    startAnomalyDetectionJob(config);

    app.listen(config.port, () => {
      logger.info(`Server running on port ${config.port}`);
    });
  } catch (error) {
    logger.error(`Failed to start server: ${errorMessage(error)}`, error);
    process.exit(1);
  }
};

void startServer();
