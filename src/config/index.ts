// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';
import { ConfigurationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('config');

// src/config and dist/config both sit two levels below the project root.
const projectRootEnvPath = path.resolve(__dirname, '../../.env');
const dotenvResult = dotenv.config({ path: projectRootEnvPath });

if (dotenvResult.error) {
  logger.debug('No .env file loaded, relying on the process environment', { path: projectRootEnvPath });
}

export interface AppConfig {
  OPENAI_API_KEY: string;
  GROQ_API_KEY: string;
  OPENAI_MODEL: string;
  GROQ_MODEL: string;
  MAX_TOKENS: number;
  OUTPUT_DIR: string;
  WORK_DIR: string;
  PROGRAMS_DIR: string;
  REQUEST_TIMEOUT_MS: number;
  SANDBOX_COMPILE_TIMEOUT_MS: number;
  SANDBOX_EXECUTE_TIMEOUT_MS: number;
  REFERENCE_TIMEOUT_MS: number;
  PORT: number;
  LOG_LEVEL: string;
}

type Env = Record<string, string | undefined>;

const getEnvVar = (env: Env, key: string, defaultValue?: string, isCritical: boolean = false): string => {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    if (isCritical) {
      throw new ConfigurationError(`Environment variable ${key} is missing or empty and has no default. This is required.`);
    }
    return '';
  }
  return value.trim();
};

const getPositiveInt = (env: Env, key: string, defaultValue: number): number => {
  const raw = getEnvVar(env, key, String(defaultValue));
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Environment variable ${key} must be a positive integer, got '${raw}'`);
  }
  return parsed;
};

/**
 * Reads the harness configuration. Both backend credentials are required:
 * a missing one is a startup failure, raised before any backend is contacted.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const workDir = path.resolve(getEnvVar(env, 'WORK_DIR', process.cwd()));

  return {
    OPENAI_API_KEY: getEnvVar(env, 'OPENAI_API_KEY', undefined, true),
    GROQ_API_KEY: getEnvVar(env, 'GROQ_API_KEY', undefined, true),
    OPENAI_MODEL: getEnvVar(env, 'OPENAI_MODEL', 'gpt-4o'),
    GROQ_MODEL: getEnvVar(env, 'GROQ_MODEL', 'llama-3.3-70b-versatile'),
    MAX_TOKENS: getPositiveInt(env, 'MAX_TOKENS', 2000),
    OUTPUT_DIR: path.resolve(workDir, getEnvVar(env, 'OUTPUT_DIR', 'output')),
    WORK_DIR: workDir,
    PROGRAMS_DIR: path.resolve(getEnvVar(env, 'PROGRAMS_DIR', path.resolve(__dirname, '../../programs'))),
    REQUEST_TIMEOUT_MS: getPositiveInt(env, 'REQUEST_TIMEOUT_MS', 120_000),
    SANDBOX_COMPILE_TIMEOUT_MS: getPositiveInt(env, 'SANDBOX_COMPILE_TIMEOUT_MS', 60_000),
    SANDBOX_EXECUTE_TIMEOUT_MS: getPositiveInt(env, 'SANDBOX_EXECUTE_TIMEOUT_MS', 30_000),
    REFERENCE_TIMEOUT_MS: getPositiveInt(env, 'REFERENCE_TIMEOUT_MS', 10_000),
    PORT: getPositiveInt(env, 'PORT', 7860),
    LOG_LEVEL: getEnvVar(env, 'LOG_LEVEL', 'info'),
  };
}
