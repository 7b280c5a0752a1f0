import path from 'path';
import { readFileSync } from 'fs';
import { RetryPolicy, defaultRetryPolicy } from '@contractflow/shared';

export const WORKFLOW_CONFIG = Symbol('WORKFLOW_CONFIG');

export interface WorkflowConfig {
  serviceName: string;
  port: number;
  storeDriver: 'postgres' | 'memory';
  database: {
    host: string;
    port: number;
    username: string;
    password: string;
    database: string;
    synchronize: boolean;
  };
  retry: {
    generation: RetryPolicy;
    signature: RetryPolicy;
    index: RetryPolicy;
  };
  storeUpdateMaxAttempts: number;
  /** A step claim older than this may be taken over by another caller. */
  stepClaimTtlMs: number;
  statusPoll: {
    intervalMs: number;
    concurrency: number;
    batchSize: number;
  };
  llm: {
    provider: 'gemini' | 'deepseek';
    googleApiKey?: string;
    geminiModel: string;
    geminiEmbeddingModel: string;
    deepseekBaseUrl: string;
    deepseekApiKey?: string;
    deepseekModel: string;
  };
  docusign: {
    clientId?: string;
    impersonatedUserId?: string;
    privateKey?: string;
    authServer: string;
    returnUrl: string;
    signingUrlTtlSeconds: number;
  };
  storageDir: string;
  referencePlansFile: string;
  kafka?: {
    brokers: string[];
    clientId: string;
  };
}

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function ratioVar(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${name} must be between 0 and 1, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find((a) => a === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

function policy(env: Env, prefix: string, attempts: number, baseDelayMs: number): RetryPolicy {
  return {
    ...defaultRetryPolicy,
    maxAttempts: intVar(env, `${prefix}_MAX_ATTEMPTS`, attempts, 1),
    baseDelayMs: intVar(env, `${prefix}_BASE_DELAY_MS`, baseDelayMs),
    maxDelayMs: intVar(env, 'RETRY_MAX_DELAY_MS', defaultRetryPolicy.maxDelayMs),
    jitter: ratioVar(env, 'RETRY_JITTER', defaultRetryPolicy.jitter),
  };
}

function privateKey(env: Env): string | undefined {
  if (env.DS_PRIVATE_KEY) return env.DS_PRIVATE_KEY.replace(/\\n/g, '\n');
  if (env.DS_PRIVATE_KEY_FILE) return readFileSync(path.resolve(env.DS_PRIVATE_KEY_FILE), 'utf-8');
  return undefined;
}

export function loadConfig(env: Env = process.env): WorkflowConfig {
  const brokers = env.KAFKA_BROKERS;

  return {
    serviceName: 'contract-workflow-service',
    port: intVar(env, 'PORT', 3020, 1),
    storeDriver: oneOf(env, 'STORE_DRIVER', ['postgres', 'memory'] as const, 'postgres'),
    database: {
      host: env.DB_HOST || 'localhost',
      port: intVar(env, 'DB_PORT', 5432, 1),
      username: env.DB_USER || 'postgres',
      password: env.DB_PASSWORD || 'postgres',
      database: env.DB_NAME || 'postgres',
      synchronize: env.DB_SYNC === 'true',
    },
    retry: {
      generation: policy(env, 'GENERATION', 3, 500),
      signature: policy(env, 'SIGNATURE', 4, 1000),
      index: policy(env, 'INDEX', 3, 250),
    },
    storeUpdateMaxAttempts: intVar(env, 'STORE_UPDATE_MAX_ATTEMPTS', 3, 1),
    stepClaimTtlMs: intVar(env, 'STEP_CLAIM_TTL_MS', 10 * 60 * 1000),
    statusPoll: {
      intervalMs: intVar(env, 'STATUS_POLL_INTERVAL_MS', 15000),
      concurrency: intVar(env, 'STATUS_POLL_CONCURRENCY', 4, 1),
      batchSize: intVar(env, 'STATUS_POLL_BATCH', 50, 1),
    },
    llm: {
      provider: oneOf(env, 'LLM_PROVIDER', ['gemini', 'deepseek'] as const, 'gemini'),
      googleApiKey: env.GOOGLE_API_KEY,
      geminiModel: env.GEMINI_MODEL || 'gemini-1.5-pro',
      geminiEmbeddingModel: env.GEMINI_EMBEDDING_MODEL || 'text-embedding-004',
      deepseekBaseUrl: env.DEEPSEEK_BASE_URL || 'https://api.deepseek.com',
      deepseekApiKey: env.DEEPSEEK_API_KEY,
      deepseekModel: env.DEEPSEEK_MODEL || 'deepseek-chat',
    },
    docusign: {
      clientId: env.DS_CLIENT_ID,
      impersonatedUserId: env.DS_IMPERSONATED_USER_ID,
      privateKey: privateKey(env),
      authServer: env.DS_AUTH_SERVER || 'account-d.docusign.com',
      returnUrl: env.DS_RETURN_URL || 'http://localhost:3020/signature/return',
      signingUrlTtlSeconds: intVar(env, 'DS_SIGNING_URL_TTL_SECONDS', 300, 1),
    },
    storageDir: env.DOCUMENT_STORAGE_DIR || path.join(process.cwd(), 'data', 'documents'),
    referencePlansFile: env.REFERENCE_PLANS_FILE || path.join(__dirname, '..', 'data', 'reference-plans.json'),
    kafka: brokers
      ? { brokers: brokers.split(','), clientId: env.KAFKA_CLIENT_ID || 'contract-workflow-service' }
      : undefined,
  };
}
