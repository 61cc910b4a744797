import mongoose from 'mongoose';
import { env } from '../config/env.js';

export async function initMongo() {
  mongoose.set('strictQuery', true);
  console.log('Connecting to MongoDB...');
  await mongoose.connect(env.MONGO_URI, {
    dbName: env.MONGO_DB_NAME,
  });
  console.log('Connected to MongoDB');
}
