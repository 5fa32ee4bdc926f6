// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';

// .env lives at the project root, two levels above src/config (and dist/config).
const projectRootEnvPath = path.resolve(__dirname, '../../.env');
const dotenvResult = dotenv.config({ path: projectRootEnvPath });

if (dotenvResult.error && nodeEnv !== 'test') {
  console.warn(`[config/index.ts] No .env file loaded from ${projectRootEnvPath}; using the process environment.`);
}

// Helper function to get environment variables with defaults and critical checks
export const getEnvVar = (key: string, defaultValue?: string, isCritical: boolean = false): string => {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    if (isCritical) {
      const errorMessage = `[config/index.ts] CRITICAL ERROR: Environment variable ${key} is missing or empty and has no default. This is required.`;
      console.error(errorMessage);
      throw new Error(errorMessage);
    }
    return '';
  }
  return value;
};

const getIntVar = (key: string, defaultValue: number): number => {
  const parsed = parseInt(getEnvVar(key, String(defaultValue)), 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`[config/index.ts] Environment variable ${key} must be a positive integer.`);
  }
  return parsed;
};

export const CONFIG = {
  GROQ_API_KEY: getEnvVar('GROQ_API_KEY'),
  MODEL_NAME: getEnvVar('MODEL_NAME', 'llama-3.3-70b-versatile'),
  INTENT_MODEL_NAME: getEnvVar('INTENT_MODEL_NAME', 'llama-3.1-8b-instant'),
  MAX_TOKENS: getIntVar('MAX_TOKENS', 1000),
  OUTPUT_MAX_TOKENS: getIntVar('OUTPUT_MAX_TOKENS', 4000),
  REDIS_URL: getEnvVar('REDIS_URL'),
  SESSION_TTL_SECONDS: getIntVar('SESSION_TTL_SECONDS', 3600),
  PORT: getIntVar('PORT', 8080),
  COLLECTOR_CONFIG_PATH: getEnvVar('COLLECTOR_CONFIG_PATH', path.resolve(__dirname, 'collectors/course-builder.json')),
  NODE_ENV: nodeEnv,
};
