import dotenv from 'dotenv';
dotenv.config();

const flag = (value: string | undefined, fallback: boolean) =>
  value === undefined || value === '' ? fallback : value.toLowerCase() === 'true';

const nodeEnv = process.env.NODE_ENV || 'development';

export const config = {
  nodeEnv,
  port: Number(process.env.PORT) || 5000,
  mongoUri: process.env.MONGODB_URI || 'mongodb://localhost:27017/storefront',
  jwtSecret: process.env.JWT_SECRET || 'your_jwt_secret_key',
  // Segundos de validez del token (24h por defecto)
  jwtExpiresIn: Number(process.env.JWT_EXPIRES_IN) || 24 * 60 * 60,
  adminPassword: process.env.ADMIN_PASSWORD || 'adminpass',
  userPassword: process.env.USER_PASSWORD || 'userpass',
  seedOnStartup: flag(process.env.SEED_ON_STARTUP, true),
  // Las transacciones requieren un replica set (Atlas o mongod --replSet)
  useTransactions: flag(process.env.MONGO_TRANSACTIONS, true),
  logToFile: flag(process.env.LOG_TO_FILE, nodeEnv !== 'test'),
};
