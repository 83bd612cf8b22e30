import mongoose from 'mongoose';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

const dbLogger = logger.child({ component: 'mongodb' });

mongoose.connection.on('connected', () => dbLogger.info({ database: mongoose.connection.name }, 'MongoDB connected'));
mongoose.connection.on('error', error => dbLogger.error({ error }, 'MongoDB connection error'));
mongoose.connection.on('disconnected', () => dbLogger.warn('MongoDB disconnected'));

/**
 * Open the process's single MongoDB connection.
 *
 * Every module reaches the database through `DatabaseService`, which reads
 * `mongoose.connection`, so this must resolve before the module manager
 * starts.
 *
 * @param uri - Connection string, defaults to `MONGODB_URI`
 */
export async function connectDatabase(uri: string = env.MONGODB_URI): Promise<void> {
  await mongoose.connect(uri, {
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000
  });
}

export async function disconnectDatabase(): Promise<void> {
  await mongoose.disconnect();
}
