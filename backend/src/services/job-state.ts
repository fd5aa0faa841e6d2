/**
 * Job state machine: legal transitions and outcome mapping.
 */

import { InvalidTransitionError } from '../errors.js';
import type {
  ActiveStatus,
  ExitReason,
  JobStatus,
  TerminalStatus,
  TerminationKind,
  WorkerExitReason,
} from '../types/jobs.js';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['preparing', 'failed', 'cancelled'],
  preparing: ['running', 'failed', 'cancelled'],
  running: ['completed', 'failed', 'cancelled', 'killed_no_credits'],
  completed: [],
  failed: [],
  cancelled: [],
  killed_no_credits: [],
};

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return TRANSITIONS[status].length === 0;
}

export function isActive(status: JobStatus): status is ActiveStatus {
  return !isTerminal(status);
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(jobId, from, to);
}

/** Final status once a termination request of this kind resolves. */
export function outcomeOf(kind: TerminationKind): TerminalStatus {
  switch (kind) {
    case 'cancel':
      return 'cancelled';
    case 'insufficient_credits':
      return 'killed_no_credits';
    case 'timeout':
    case 'billing_halted':
      return 'failed';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

export function exitReasonOf(kind: TerminationKind): ExitReason {
  switch (kind) {
    case 'cancel':
      return 'user_cancelled';
    case 'insufficient_credits':
      return 'insufficient_credits';
    case 'timeout':
      return 'timeout';
    case 'billing_halted':
      return 'billing_halted';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

/** Outcome of a natural exit reported by the worker (no termination pending). */
export function exitOutcome(
  reason: WorkerExitReason,
  exitCode: number | null,
): { status: TerminalStatus; exitReason: ExitReason } {
  switch (reason) {
    case 'exited':
      return exitCode === 0
        ? { status: 'completed', exitReason: 'exit_success' }
        : { status: 'failed', exitReason: 'non_zero_exit' };
    case 'timeout':
      return { status: 'failed', exitReason: 'timeout' };
    case 'oom_killed':
      return { status: 'failed', exitReason: 'oom_killed' };
    case 'setup_error':
      return { status: 'failed', exitReason: 'setup_error' };
    case 'sandbox_error':
      return { status: 'failed', exitReason: 'sandbox_error' };
    default: {
      const unreachable: never = reason;
      return unreachable;
    }
  }
}
