/**
 * MongoDB connection (Mongoose)
 */

import mongoose from 'mongoose';

export { mongoose };

export async function connectMongo(url: string, dbName: string): Promise<typeof mongoose> {
  if (mongoose.connection.readyState === 1) {
    return mongoose;
  }

  console.log(`[DB] Connecting to ${dbName}...`);
  await mongoose.connect(url, {
    dbName,
    serverSelectionTimeoutMS: 10000,
  });
  console.log(`[DB] Connected to ${dbName}`);
  return mongoose;
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected');
}
