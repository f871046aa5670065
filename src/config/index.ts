/**
 * Configuration management for the knowledge drill
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { DIFFICULTIES, SELECTION_STRATEGIES } from '../types/index.js';
import type { Config, Difficulty, SelectionStrategy } from '../types/index.js';
import { DEFAULT_DRILL_CONFIG, resolveDrillConfig, type DrillConfig } from './drill.js';

// Load .env file
const __dirname = dirname(fileURLToPath(import.meta.url));
dotenvConfig({ path: resolve(__dirname, '../../.env') });

function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue: number, min?: number, max?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable ${key}: ${value}`);
  }
  if (min !== undefined && parsed < min) {
    throw new Error(`Environment variable ${key} must be at least ${min}, got ${parsed}`);
  }
  if (max !== undefined && parsed > max) {
    throw new Error(`Environment variable ${key} must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable ${key}: ${value}`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const match = choices.find(choice => choice === value.toLowerCase());
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${choices.join(', ')}, got ${value}`);
  }
  return match;
}

function loadDrillConfig(): DrillConfig {
  const d = DEFAULT_DRILL_CONFIG;
  return resolveDrillConfig({
    defaultDifficulty: getEnvChoice<Difficulty>('DRILL_DEFAULT_DIFFICULTY', DIFFICULTIES, d.defaultDifficulty),
    defaultStrategy: getEnvChoice<SelectionStrategy>('DRILL_DEFAULT_STRATEGY', SELECTION_STRATEGIES, d.defaultStrategy),
    questionTemperature: getEnvFloat('DRILL_QUESTION_TEMPERATURE', d.questionTemperature),
    evaluationTemperature: getEnvFloat('DRILL_EVALUATION_TEMPERATURE', d.evaluationTemperature),
    maxContextLength: getEnvNumber('DRILL_MAX_CONTEXT_LENGTH', d.maxContextLength),
    maxRetries: getEnvNumber('DRILL_MAX_RETRIES', d.maxRetries),
    modelTimeoutMs: getEnvNumber('DRILL_MODEL_TIMEOUT_MS', d.modelTimeoutMs),
    retrievalTimeoutMs: getEnvNumber('DRILL_RETRIEVAL_TIMEOUT_MS', d.retrievalTimeoutMs),
    retryDelayMs: getEnvNumber('DRILL_RETRY_DELAY_MS', d.retryDelayMs),
    correctThreshold: getEnvFloat('DRILL_CORRECT_THRESHOLD', d.correctThreshold),
    duplicateSimilarity: getEnvFloat('DRILL_DUPLICATE_SIMILARITY', d.duplicateSimilarity),
    evaluationTopK: getEnvNumber('DRILL_EVALUATION_TOP_K', d.evaluationTopK),
  });
}

export const config: Config = {
  qdrant: {
    url: getEnv('QDRANT_URL', 'http://localhost:6333'),
    collectionName: getEnv('QDRANT_COLLECTION', 'drill_fragments'),
    vectorSize: getEnvNumber('VECTOR_SIZE', 1024, 64, 4096),
  },
  litellm: {
    apiKey: getEnv('LITELLM_API_KEY'),
    baseUrl: getEnv('LITELLM_BASE_URL', 'http://localhost:4000/v1'),
    embeddingModel: getEnv('EMBEDDING_MODEL', 'BAAI/bge-m3'),
    timeout: getEnvNumber('LITELLM_TIMEOUT', 30000, 1000, 300000),
  },
  sqlite: {
    path: getEnv('SQLITE_PATH', './data/sqlite/drill.db'),
  },
  chunking: {
    defaultSize: getEnvNumber('CHUNK_SIZE', 512, 50, 10000),
    defaultOverlap: getEnvNumber('CHUNK_OVERLAP', 50, 0, 1000),
    // Short Chinese paragraphs still make usable fragments
    minChunkSize: getEnvNumber('MIN_CHUNK_SIZE', 20, 1, 1000),
  },
  search: {
    defaultLimit: getEnvNumber('SEARCH_LIMIT', 10, 1, 100),
    defaultThreshold: getEnvFloat('SEARCH_THRESHOLD', 0.3),
  },
  llm: {
    model: getEnv('LLM_MODEL', 'qwen2.5:7b'),
    extractInsights: getEnvBoolean('INSIGHTS_ENABLED', false),
  },
  drill: loadDrillConfig(),
};

export default config;
