/**
 * MongoDB connection (optional profile store backend)
 */

import mongoose from 'mongoose';

export async function connectMongo(url: string): Promise<void> {
  if (mongoose.connection.readyState === 1) return;

  console.log('[DB] Connecting to MongoDB...');
  await mongoose.connect(url, {
    serverSelectionTimeoutMS: 5000,
  });
  console.log('[DB] Connected');
}

export async function disconnectMongo(): Promise<void> {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  console.log('[DB] Disconnected');
}
