import mongoose from 'mongoose';
import logger from './logger';

export const connectDatabase = async (uri: string): Promise<typeof mongoose> => {
  const connection = await mongoose.connect(uri);
  logger.info(`MongoDB connected: ${connection.connection.host}/${connection.connection.name}`);

  mongoose.connection.on('error', (error) => {
    logger.error('MongoDB connection error', error);
  });
  mongoose.connection.on('disconnected', () => {
    logger.warn('MongoDB disconnected');
  });

  return connection;
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.disconnect();
};
