import mongoose from 'mongoose';
import { errorMessage, logger } from '../utils/logger';

export const connectDB = async (uri: string): Promise<typeof mongoose> => {
  try {
    const connection = await mongoose.connect(uri);
    logger.info('MongoDB connected', { host: connection.connection.host });
    return connection;
  } catch (error) {
    logger.error('MongoDB connection error', { error: errorMessage(error) });
    throw error;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.disconnect();
  logger.info('MongoDB disconnected');
};
