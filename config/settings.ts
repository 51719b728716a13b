import dotenv from 'dotenv';
import { RetryPolicy } from '../utils/retry';

export const SUPPORTED_FORMATS = ['pdf', 'docx', 'txt', 'md'] as const;
export type DocumentFormat = (typeof SUPPORTED_FORMATS)[number];

export interface Settings {
  port: number;
  geminiApiKey?: string;
  embeddingModel: string;
  embeddingDimension: number;
  embeddingMaxConcurrent: number;
  llmModel: string;
  llmTemperature: number;
  pineconeApiKey?: string;
  pineconeIndexName: string;
  mongodbUri?: string;
  mongodbDbName: string;
  chunkSize: number;
  chunkOverlap: number;
  retrievalTopK: number;
  contextCharBudget: number;
  maxFileSize: number;
  allowedFormats: string[];
  rateLimitPerMinute: number;
  workerConcurrency: number;
  embeddingTimeoutMs: number;
  llmTimeoutMs: number;
  extractionTimeoutMs: number;
  retryPolicy: RetryPolicy;
  gcsBucket?: string;
  googleCloudProjectId?: string;
  /** Browser origins allowed besides localhost. */
  corsOrigins: string[];
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readFloat(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseFloat(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

function readOptional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

function readList(env: NodeJS.ProcessEnv, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return raw.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const chunkSize = readInt(env, 'CHUNK_SIZE', 1000, 1);
  const chunkOverlap = readInt(env, 'CHUNK_OVERLAP', 200);
  if (chunkOverlap * 2 >= chunkSize) {
    throw new Error(`CHUNK_OVERLAP (${chunkOverlap}) must be less than half of CHUNK_SIZE (${chunkSize})`);
  }

  const contextCharBudget = readInt(env, 'CONTEXT_CHAR_BUDGET', 6000, 1);
  if (contextCharBudget < chunkSize) {
    throw new Error(`CONTEXT_CHAR_BUDGET (${contextCharBudget}) must be at least CHUNK_SIZE (${chunkSize})`);
  }

  const allowedFormats = readList(env, 'ALLOWED_FORMATS', [...SUPPORTED_FORMATS]).map(format => format.toLowerCase());

  return {
    port: readInt(env, 'PORT', 5000),
    geminiApiKey: readOptional(env, 'GEMINI_API_KEY'),
    embeddingModel: env.EMBEDDING_MODEL || 'text-embedding-004',
    embeddingDimension: readInt(env, 'EMBEDDING_DIMENSION', 768, 1),
    embeddingMaxConcurrent: readInt(env, 'EMBEDDING_MAX_CONCURRENT', 10, 1),
    llmModel: env.LLM_MODEL || 'gemini-2.5-flash',
    llmTemperature: readFloat(env, 'LLM_TEMPERATURE', 0.1),
    pineconeApiKey: readOptional(env, 'PINECONE_API_KEY'),
    pineconeIndexName: env.PINECONE_INDEX_NAME || 'docqa-index',
    mongodbUri: readOptional(env, 'MONGODB_URI'),
    mongodbDbName: env.MONGODB_DB_NAME || 'docqa',
    chunkSize,
    chunkOverlap,
    retrievalTopK: readInt(env, 'RETRIEVAL_TOP_K', 5, 1),
    contextCharBudget,
    maxFileSize: readInt(env, 'MAX_FILE_SIZE', 10 * 1024 * 1024, 1),
    allowedFormats,
    rateLimitPerMinute: readInt(env, 'RATE_LIMIT_PER_MINUTE', 60, 1),
    workerConcurrency: readInt(env, 'WORKER_CONCURRENCY', 8, 1),
    embeddingTimeoutMs: readInt(env, 'EMBEDDING_TIMEOUT_MS', 15000),
    llmTimeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 60000),
    extractionTimeoutMs: readInt(env, 'EXTRACTION_TIMEOUT_MS', 30000),
    retryPolicy: {
      maxAttempts: readInt(env, 'RETRY_MAX_ATTEMPTS', 3, 1),
      baseDelayMs: readInt(env, 'RETRY_BASE_DELAY_MS', 1000),
      maxDelayMs: readInt(env, 'RETRY_MAX_DELAY_MS', 8000),
      jitter: 0.2
    },
    gcsBucket: readOptional(env, 'GCS_BUCKET'),
    googleCloudProjectId: readOptional(env, 'GOOGLE_CLOUD_PROJECT_ID'),
    corsOrigins: readList(env, 'CORS_ORIGINS', [])
  };
}

/**
 * Reads `.env` into `process.env` (existing variables win) and parses it.
 */
export function loadSettingsFromEnvironment(): Settings {
  dotenv.config();
  return loadSettings(process.env);
}
