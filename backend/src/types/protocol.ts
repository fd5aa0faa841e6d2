/**
 * Wire schemas for the controller HTTP surface and the worker protocol.
 * Request bodies are parsed with these on the server; the worker's HTTP client parses
 * controller replies with the same schemas.
 */

import { z } from 'zod';
import { JOB_STATUSES } from './jobs.js';
import type {
  AcceptReply,
  ControlReply,
  DispatchMessage,
  ExitReport,
  Heartbeat,
  HeartbeatReply,
  KillAck,
  KillCommand,
  RelayEvent,
  ResourceConfig,
} from './jobs.js';

const jobId = z.string().min(1).max(64);

// ── Controller API ──

export const ResourceConfigSchema = z.object({
  memoryLimit: z.string().regex(/^\d+[bkmgBKMG]?$/),
  cpuCount: z.number().int().positive(),
  gpuCount: z.number().int().min(-1),
  timeoutSeconds: z.number().int().positive(),
}) satisfies z.ZodType<ResourceConfig>;

export const SubmitJobBodySchema = z.object({
  dockerImage: z.string().min(1).max(256).optional(),
  entrypoint: z.string().min(1).max(256).optional(),
  resourceConfig: ResourceConfigSchema.partial().optional(),
  inputs: z
    .array(
      z.object({
        path: z.string().min(1).max(256),
        /** base64 */
        content: z.string(),
      }),
    )
    .min(1)
    .max(100),
});

export type SubmitJobBody = z.infer<typeof SubmitJobBodySchema>;

export const ListJobsQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

export const TransactionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
  before: z.coerce.number().int().positive().optional(),
});

export const AuditQuerySchema = z.object({
  actor: z.string().max(128).optional(),
  action: z.string().max(128).optional(),
  resourceId: z.string().max(128).optional(),
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  page: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
});

export const StreamQuerySchema = z.object({
  token: z.string().min(1).optional(),
  after: z.coerce.number().int().min(0).optional(),
});

/** Credits as a decimal string ("5.00") or a number. */
const creditAmount = z.union([z.string().min(1).max(32), z.number().nonnegative()]);

export const CreditBodySchema = z.object({
  amount: creditAmount,
  externalRef: z.string().min(1).max(128),
  description: z.string().max(256).optional(),
});

export const RefundBodySchema = z.object({
  amount: creditAmount,
  externalRef: z.string().min(1).max(128),
  jobId: jobId.optional(),
  reason: z.string().min(1).max(256),
});

// ── Worker protocol ──

export const DispatchMessageSchema = z.object({
  id: z.string(),
  jobId,
  deliveryCount: z.number().int().nonnegative(),
  enqueuedAt: z.string(),
}) satisfies z.ZodType<DispatchMessage>;

export const ClaimReplySchema = z.object({ message: DispatchMessageSchema.nullable() });

export const ReleaseBodySchema = z.object({ delayMs: z.number().int().nonnegative().max(3_600_000) });

export const AcceptBodySchema = z.object({ workerId: z.string().min(1).max(128) });

export const AcceptReplySchema: z.ZodType<AcceptReply> = z.discriminatedUnion('accepted', [
  z.object({
    accepted: z.literal(true),
    spec: z.object({
      jobId,
      dockerImage: z.string(),
      entrypoint: z.string(),
      resourceConfig: ResourceConfigSchema,
      inputPaths: z.array(z.string()),
      tickSeconds: z.number().int().positive(),
    }),
  }),
  z.object({ accepted: z.literal(false), reason: z.string() }),
]);

export const StartedBodySchema = z.object({ sandboxId: z.string().min(1).max(128) });

export const ControlReplySchema = z.object({ continue: z.boolean() }) satisfies z.ZodType<ControlReply>;

export const HeartbeatSchema = z.object({
  jobId,
  tickSeq: z.number().int().positive(),
  workerTimestamp: z.string(),
  elapsedSecondsSinceLastHeartbeat: z.number().nonnegative(),
  sandboxAlive: z.boolean(),
}) satisfies z.ZodType<Heartbeat>;

export const HeartbeatReplySchema = z.object({
  status: z.enum(['billed', 'duplicate', 'out_of_order', 'ahead_of_clock', 'insufficient_funds', 'dropped']),
  expectedSeq: z.number().int().positive(),
  continue: z.boolean(),
  balance: z.number().int().optional(),
  totalCost: z.number().int().optional(),
}) satisfies z.ZodType<HeartbeatReply>;

export const KillCommandSchema = z.object({
  commandId: z.string(),
  jobId,
  kind: z.enum(['cancel', 'insufficient_credits', 'timeout', 'billing_halted', 'best_effort']),
  issuedAt: z.string(),
}) satisfies z.ZodType<KillCommand>;

export const CommandsReplySchema = z.object({ commands: z.array(KillCommandSchema) });

export const KillAckSchema = z.object({
  jobId,
  commandId: z.string().min(1),
  exitCode: z.number().int().nullable(),
}) satisfies z.ZodType<KillAck>;

export const ExitReportSchema = z.object({
  jobId,
  exitCode: z.number().int().nullable(),
  reason: z.enum(['exited', 'timeout', 'oom_killed', 'setup_error', 'sandbox_error']),
  error: z.string().max(4096).optional(),
}) satisfies z.ZodType<ExitReport>;

export const LogsBodySchema = z.object({ lines: z.array(z.string().max(16_384)).max(5000) });

export const BlobBodySchema = z.object({
  path: z.string().min(1).max(512),
  /** base64 */
  content: z.string(),
});

export const BlobReplySchema = z.object({ content: z.string() });

// ── Log stream ──

const at = z.string();

export const RelayEventSchema: z.ZodType<RelayEvent> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('log'), jobId: z.string(), seq: z.number().int(), line: z.string(), at }),
  z.object({
    type: z.literal('status'),
    jobId: z.string(),
    seq: z.number().int(),
    status: z.enum(JOB_STATUSES),
    final: z.boolean(),
    exitReason: z
      .enum([
        'exit_success',
        'non_zero_exit',
        'oom_killed',
        'setup_error',
        'sandbox_error',
        'timeout',
        'user_cancelled',
        'insufficient_credits',
        'heartbeat_timeout',
        'prepare_timeout',
        'dispatch_failed',
        'billing_halted',
      ])
      .nullable(),
    at,
  }),
  z.object({ type: z.literal('gap'), jobId: z.string(), seq: z.number().int(), dropped: z.number().int(), at }),
]);
