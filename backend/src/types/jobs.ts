/**
 * Job lifecycle, heartbeat and worker-protocol types.
 */

import type { Cents } from '../lib/money.js';

// ── Job state machine ──

export const JOB_STATUSES = [
  'pending',
  'preparing',
  'running',
  'completed',
  'failed',
  'cancelled',
  'killed_no_credits',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalStatus = Extract<JobStatus, 'completed' | 'failed' | 'cancelled' | 'killed_no_credits'>;

export type ActiveStatus = Exclude<JobStatus, TerminalStatus>;

export type ExitReason =
  | 'exit_success'
  | 'non_zero_exit'
  | 'oom_killed'
  | 'setup_error'
  | 'sandbox_error'
  | 'timeout'
  | 'user_cancelled'
  | 'insufficient_credits'
  | 'heartbeat_timeout'
  | 'prepare_timeout'
  | 'dispatch_failed'
  | 'billing_halted';

export type TerminationKind = 'cancel' | 'insufficient_credits' | 'timeout' | 'billing_halted';

/** Pending kill decision. The first one durably recorded wins. */
export interface TerminationRequest {
  kind: TerminationKind;
  /** Job version at which the request was written; the controller's total order. */
  seq: number;
  requestedAt: string;
  commandId: string;
}

export interface ResourceConfig {
  /** Docker-style memory limit, e.g. "8g", "512m". */
  memoryLimit: string;
  cpuCount: number;
  /** -1 for all GPUs, 0 for none, n for n devices. */
  gpuCount: number;
  timeoutSeconds: number;
}

export interface JobRecord {
  id: string;
  ownerId: string;
  status: JobStatus;
  dockerImage: string;
  entrypoint: string;
  resourceConfig: ResourceConfig;
  inputPaths: string[];
  ratePerMinute: Cents;
  tickSeconds: number;
  reservationId: string | null;
  createdAt: string;
  startedAt: string | null;
  endedAt: string | null;
  runtimeSeconds: number;
  ticksBilled: number;
  totalCost: Cents;
  exitReason: ExitReason | null;
  exitCode: number | null;
  errorMessage: string | null;
  sandboxId: string | null;
  workerId: string | null;
  termination: TerminationRequest | null;
  version: number;
}

// ── Submission ──

export interface JobInput {
  path: string;
  content: Buffer;
}

export interface SubmitJobRequest {
  ownerId: string;
  dockerImage?: string;
  entrypoint?: string;
  resourceConfig?: Partial<ResourceConfig>;
  inputs: JobInput[];
}

export interface CancelResult {
  jobId: string;
  accepted: true;
  /** Status the job will end in once the worker acknowledges (or already ended in). */
  outcome: TerminalStatus;
  status: JobStatus;
}

// ── Worker protocol ──

export interface DispatchMessage {
  id: string;
  jobId: string;
  deliveryCount: number;
  enqueuedAt: string;
}

/** What the worker needs to run a job; sent once the dispatch is accepted. */
export interface JobSpec {
  jobId: string;
  dockerImage: string;
  entrypoint: string;
  resourceConfig: ResourceConfig;
  inputPaths: string[];
  tickSeconds: number;
}

export type AcceptReply =
  | { accepted: true; spec: JobSpec }
  | { accepted: false; reason: string };

export interface ControlReply {
  /** False means: stop the sandbox now. */
  continue: boolean;
}

export interface Heartbeat {
  jobId: string;
  /** 1-based billing tick this heartbeat closes. */
  tickSeq: number;
  workerTimestamp: string;
  elapsedSecondsSinceLastHeartbeat: number;
  sandboxAlive: boolean;
}

export type HeartbeatStatus =
  | 'billed'
  | 'duplicate'
  | 'out_of_order'
  | 'ahead_of_clock'
  | 'insufficient_funds'
  | 'dropped';

export interface HeartbeatReply {
  status: HeartbeatStatus;
  /** Next tick the controller will bill. */
  expectedSeq: number;
  continue: boolean;
  balance?: Cents;
  totalCost?: Cents;
}

export interface KillCommand {
  commandId: string;
  jobId: string;
  kind: TerminationKind | 'best_effort';
  issuedAt: string;
}

export interface KillAck {
  jobId: string;
  commandId: string;
  exitCode: number | null;
}

export type WorkerExitReason = 'exited' | 'timeout' | 'oom_killed' | 'setup_error' | 'sandbox_error';

export interface ExitReport {
  jobId: string;
  exitCode: number | null;
  reason: WorkerExitReason;
  error?: string;
}

// ── Log relay ──

export type RelayEvent =
  | { type: 'log'; jobId: string; seq: number; line: string; at: string }
  | { type: 'status'; jobId: string; seq: number; status: JobStatus; final: boolean; exitReason: ExitReason | null; at: string }
  | { type: 'gap'; jobId: string; seq: number; dropped: number; at: string };
