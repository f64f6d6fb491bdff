import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

interface EnvConfig {
  NODE_ENV: string;
  PORT: number;
  MONGODB_URI: string;
  ACCESS_TOKEN_SECRET: string;
  PUBLIC_BASE_URL: string;
  PROVIDER_TIMEOUT_MS: number;
  WORKER_CONCURRENCY: number;
  WORKER_POLL_INTERVAL_MS: number;
  OVERDUE_SWEEP_INTERVAL_MS: number;
}

function parseInteger(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;

  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    throw new Error(`Invalid numeric environment variable: ${key}`);
  }
  return value;
}

function validateEnv(): EnvConfig {
  const required = ['MONGODB_URI', 'ACCESS_TOKEN_SECRET', 'PUBLIC_BASE_URL'];

  for (const key of required) {
    if (!process.env[key]) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  }

  const MONGODB_URI = process.env.MONGODB_URI;
  const ACCESS_TOKEN_SECRET = process.env.ACCESS_TOKEN_SECRET;
  const PUBLIC_BASE_URL = process.env.PUBLIC_BASE_URL;

  if (!MONGODB_URI || !ACCESS_TOKEN_SECRET || !PUBLIC_BASE_URL) {
    throw new Error('Environment validation failed');
  }

  return {
    NODE_ENV: process.env.NODE_ENV || 'development',
    PORT: parseInteger('PORT', 5000),
    MONGODB_URI,
    ACCESS_TOKEN_SECRET,
    // Callback URLs are built from this, so a trailing slash would double up
    PUBLIC_BASE_URL: PUBLIC_BASE_URL.replace(/\/+$/, ''),
    PROVIDER_TIMEOUT_MS: parseInteger('PROVIDER_TIMEOUT_MS', 30000),
    WORKER_CONCURRENCY: parseInteger('WORKER_CONCURRENCY', 4),
    WORKER_POLL_INTERVAL_MS: parseInteger('WORKER_POLL_INTERVAL_MS', 2000),
    OVERDUE_SWEEP_INTERVAL_MS: parseInteger('OVERDUE_SWEEP_INTERVAL_MS', 3600000),
  };
}

export const env = validateEnv();
