/**
 * Environment configuration for the controller and the worker.
 * Declared as convict schemas (env name, default, format) and read once at startup;
 * missing required variables are fatal.
 */

import convict from 'convict';
import { ValidationError, errorMessage } from './errors.js';
import { parseCredits, tickCost, type Cents } from './lib/money.js';
import type { BackoffPolicy } from './lib/backoff.js';
import type { ResourceConfig } from './types/jobs.js';

type Env = Record<string, string | undefined>;

export interface BillingConfig {
  ratePerMinute: Cents;
  tickSeconds: number;
  heartbeatGraceSeconds: number;
  killAckTimeoutSeconds: number;
  prepareTimeoutSeconds: number;
  /** Ticks pre-authorized at submission. */
  minReserveTicks: number;
}

export interface ControllerConfig {
  port: number;
  host: string;
  jwtSecret: string;
  workerSecret: string;
  storageBackend: 'supabase' | 'memory';
  blobBackend: 'supabase' | 'fs';
  supabaseUrl: string | null;
  supabaseServiceKey: string | null;
  blobRoot: string;
  blobBucket: string;
  billing: BillingConfig;
  defaultResources: ResourceConfig;
  defaultImage: string;
  defaultEntrypoint: string;
  maxTimeoutSeconds: number;
  logBufferLines: number;
  logRetentionSeconds: number;
  subscriberQueueLimit: number;
  dispatchRetry: BackoffPolicy;
  dispatchVisibilityMs: number;
}

export interface WorkerConfig {
  controllerUrl: string;
  workerSecret: string;
  workerId: string;
  workDir: string;
  dockerSocket: string;
  killGraceSeconds: number;
  pollIntervalMs: number;
  commandPollMs: number;
  logFlushMs: number;
  requestRetry: BackoffPolicy;
}

export class ConfigError extends ValidationError {
  constructor(missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`, { missing });
    this.name = 'ConfigError';
  }
}

convict.addFormat({
  name: 'positive-int',
  validate(value: unknown) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new Error('must be a positive integer');
    }
  },
  coerce: (value: string) => Number(value),
});

convict.addFormat({
  name: 'gpu-count',
  validate(value: unknown) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < -1) {
      throw new Error('must be -1 (all), 0 or a device count');
    }
  },
  coerce: (value: string) => Number(value),
});

interface ControllerEnv {
  port: number;
  host: string;
  jwtSecret: string;
  workerSecret: string;
  storageBackend: 'supabase' | 'memory';
  blobBackend: 'supabase' | 'fs';
  supabaseUrl: string;
  supabaseServiceKey: string;
  blobRoot: string;
  blobBucket: string;
  billing: {
    ratePerMinute: string;
    tickSeconds: number;
    heartbeatGraceSeconds: number;
    killAckTimeoutSeconds: number;
    prepareTimeoutSeconds: number;
    minReserveTicks: number;
  };
  defaultResources: ResourceConfig;
  defaultImage: string;
  defaultEntrypoint: string;
  maxTimeoutSeconds: number;
  logBufferLines: number;
  logRetentionSeconds: number;
  subscriberQueueLimit: number;
  dispatchRetry: BackoffPolicy;
  dispatchVisibilityMs: number;
}

const controllerSchema: convict.Schema<ControllerEnv> = {
  port: { doc: 'HTTP port', format: 'port', default: 3001, env: 'PORT' },
  host: { doc: 'bind address', format: String, default: '0.0.0.0', env: 'HOST' },
  jwtSecret: { doc: 'user token secret', format: String, default: '', env: 'JWT_SECRET', sensitive: true },
  workerSecret: { doc: 'shared worker secret', format: String, default: '', env: 'WORKER_SECRET', sensitive: true },
  storageBackend: { format: ['supabase', 'memory'], default: 'memory', env: 'STORAGE_BACKEND' },
  blobBackend: { format: ['supabase', 'fs'], default: 'fs', env: 'BLOB_BACKEND' },
  supabaseUrl: { format: String, default: '', env: 'SUPABASE_URL' },
  supabaseServiceKey: { format: String, default: '', env: 'SUPABASE_SERVICE_KEY', sensitive: true },
  blobRoot: { doc: 'root of the shared-filesystem blob layout', format: String, default: './data/blobs', env: 'BLOB_ROOT' },
  blobBucket: { doc: 'Supabase Storage bucket', format: String, default: 'jobs', env: 'BLOB_BUCKET' },
  billing: {
    ratePerMinute: { doc: 'credits per minute, decimal', format: String, default: '1.00', env: 'RATE_PER_MINUTE' },
    tickSeconds: { format: 'positive-int', default: 60, env: 'TICK_SECONDS' },
    heartbeatGraceSeconds: { format: 'nat', default: 15, env: 'HEARTBEAT_GRACE_SECONDS' },
    killAckTimeoutSeconds: {
      doc: '0 = three ticks',
      format: 'nat',
      default: 0,
      env: 'KILL_ACK_TIMEOUT_SECONDS',
    },
    prepareTimeoutSeconds: { format: 'nat', default: 600, env: 'PREPARE_TIMEOUT_SECONDS' },
    minReserveTicks: { doc: 'ticks pre-authorized at submission', format: 'nat', default: 1, env: 'MIN_RESERVE_TICKS' },
  },
  defaultResources: {
    memoryLimit: { format: String, default: '8g', env: 'DEFAULT_MEMORY_LIMIT' },
    cpuCount: { format: 'nat', default: 4, env: 'DEFAULT_CPU_COUNT' },
    gpuCount: { format: 'gpu-count', default: -1, env: 'DEFAULT_GPU_COUNT' },
    timeoutSeconds: { format: 'nat', default: 3600, env: 'DEFAULT_TIMEOUT_SECONDS' },
  },
  defaultImage: { format: String, default: 'pytorch/pytorch:2.1.0-cuda12.1-cudnn8-runtime', env: 'DEFAULT_IMAGE' },
  defaultEntrypoint: { format: String, default: 'main.py', env: 'DEFAULT_ENTRYPOINT' },
  maxTimeoutSeconds: { format: 'nat', default: 14_400, env: 'MAX_TIMEOUT_SECONDS' },
  logBufferLines: { format: 'nat', default: 1000, env: 'LOG_BUFFER_LINES' },
  logRetentionSeconds: { format: 'nat', default: 300, env: 'LOG_RETENTION_SECONDS' },
  subscriberQueueLimit: { format: 'nat', default: 500, env: 'SUBSCRIBER_QUEUE_LIMIT' },
  dispatchRetry: {
    baseMs: { format: 'nat', default: 200, env: 'DISPATCH_RETRY_BASE_MS' },
    maxMs: { format: 'nat', default: 5000, env: 'DISPATCH_RETRY_MAX_MS' },
    maxAttempts: { format: 'nat', default: 5, env: 'DISPATCH_RETRY_ATTEMPTS' },
  },
  dispatchVisibilityMs: { format: 'nat', default: 60_000, env: 'DISPATCH_VISIBILITY_MS' },
};

const workerSchema: convict.Schema<WorkerConfig> = {
  controllerUrl: { doc: 'controller base URL', format: String, default: '', env: 'CONTROLLER_URL' },
  workerSecret: { format: String, default: '', env: 'WORKER_SECRET', sensitive: true },
  workerId: { format: String, default: 'worker-1', env: 'WORKER_ID' },
  workDir: { doc: 'per-job workspaces', format: String, default: '/tmp/gpumeter', env: 'WORK_DIR' },
  dockerSocket: { format: String, default: '/var/run/docker.sock', env: 'DOCKER_SOCKET' },
  killGraceSeconds: { doc: 'SIGTERM to SIGKILL', format: 'nat', default: 10, env: 'KILL_GRACE_SECONDS' },
  pollIntervalMs: { format: 'nat', default: 2000, env: 'POLL_INTERVAL_MS' },
  commandPollMs: { format: 'nat', default: 1000, env: 'COMMAND_POLL_MS' },
  logFlushMs: { format: 'nat', default: 500, env: 'LOG_FLUSH_MS' },
  requestRetry: {
    baseMs: { format: 'nat', default: 200, env: 'REQUEST_RETRY_BASE_MS' },
    maxMs: { format: 'nat', default: 5000, env: 'REQUEST_RETRY_MAX_MS' },
    maxAttempts: { format: 'nat', default: 5, env: 'REQUEST_RETRY_ATTEMPTS' },
  },
};

// An empty variable means "unset", as with an unexported one.
function presentVars(env: Env): Env {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
}

function load<T>(schema: convict.Schema<T>, env: Env): T {
  const config = convict(schema, { env: presentVars(env), args: [] });
  try {
    config.validate({ allowed: 'strict' });
  } catch (err) {
    throw new ValidationError(errorMessage(err));
  }
  return config.getProperties();
}

function requireVars(vars: Record<string, string>): void {
  const missing = Object.keys(vars).filter((key) => vars[key] === '');
  if (missing.length > 0) throw new ConfigError(missing);
}

export function loadControllerConfig(env: Env = process.env): ControllerConfig {
  const raw = load(controllerSchema, env);
  requireVars({ JWT_SECRET: raw.jwtSecret, WORKER_SECRET: raw.workerSecret });
  if (raw.storageBackend === 'supabase' || raw.blobBackend === 'supabase') {
    requireVars({ SUPABASE_URL: raw.supabaseUrl, SUPABASE_SERVICE_KEY: raw.supabaseServiceKey });
  }

  const { tickSeconds } = raw.billing;
  const ratePerMinute = parseCredits(raw.billing.ratePerMinute);
  // Fails fast on a rate that does not divide into whole cents per tick.
  tickCost(ratePerMinute, tickSeconds);

  return {
    ...raw,
    supabaseUrl: raw.supabaseUrl || null,
    supabaseServiceKey: raw.supabaseServiceKey || null,
    billing: {
      ...raw.billing,
      ratePerMinute,
      killAckTimeoutSeconds: raw.billing.killAckTimeoutSeconds || 3 * tickSeconds,
    },
  };
}

export function loadWorkerConfig(env: Env = process.env): WorkerConfig {
  const raw = load(workerSchema, env);
  requireVars({ CONTROLLER_URL: raw.controllerUrl, WORKER_SECRET: raw.workerSecret });
  return { ...raw, controllerUrl: raw.controllerUrl.replace(/\/+$/, '') };
}
