import dotenv from 'dotenv';

dotenv.config();

const readNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value !== undefined && value.trim() !== '' && Number.isFinite(parsed) ? parsed : fallback;
};

export const config = {
  port: readNumber(process.env.PORT, 8800),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: process.env.LOG_LEVEL || 'info',
  corsOrigin: process.env.CORS_ORIGIN || '*',
  bodyLimit: process.env.BODY_LIMIT || '1mb',
  // Seconds since the last heartbeat before a camera counts as offline
  heartbeatTimeoutSeconds: readNumber(process.env.HEARTBEAT_TIMEOUT, 60),
};
