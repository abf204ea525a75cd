export default () => ({
  port: parseInt(process.env.PORT ?? '', 10) || 4000,
  node_env: process.env.NODE_ENV || 'development',
  MONGO_URL: process.env.MONGO_URL,
  JWT_SECRET: process.env.JWT_SECRET || '',
  JWT_EXPIRES_IN: process.env.JWT_EXPIRES_IN || '1d',
  PLATFORM_API_KEY: process.env.PLATFORM_API_KEY || '',
  // % a partir del cual una lección se considera completada
  COMPLETION_THRESHOLD: parseInt(process.env.COMPLETION_THRESHOLD ?? '', 10) || DEFAULT_COMPLETION_THRESHOLD,
});
export const PORT = 'port';
export const NODE_ENV = 'node_env';
export const MONGO_URL = 'MONGO_URL';
export const JWT_SECRET = 'JWT_SECRET';
export const JWT_EXPIRES_IN = 'JWT_EXPIRES_IN';
export const PLATFORM_API_KEY = 'PLATFORM_API_KEY';
export const COMPLETION_THRESHOLD = 'COMPLETION_THRESHOLD';

export const DEFAULT_COMPLETION_THRESHOLD = 95;
