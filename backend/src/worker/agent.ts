/**
 * Dispatch agent. Claims one message at a time and hands it to the supervisor;
 * a message claimed while the slot is busy goes straight back to the queue.
 */

import { WorkerBusyError, errorMessage } from '../errors.js';
import { backoffDelay, type BackoffPolicy } from '../lib/backoff.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { DispatchMessage } from '../types/jobs.js';
import type { ControllerClient } from './controller-client.js';
import type { ExecutionSupervisor } from './supervisor.js';

export interface AgentOptions {
  workerId: string;
  client: ControllerClient;
  supervisor: ExecutionSupervisor;
  pollIntervalMs: number;
  /** Delay before a bounced message becomes visible again. */
  requeueBackoff: BackoffPolicy;
  logger?: Logger;
}

export type PollResult = 'idle' | 'busy' | 'launched' | 'rejected' | 'released';

export class DispatchAgent {
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private polling: Promise<PollResult> | null = null;
  private running = false;

  constructor(private readonly options: AgentOptions) {
    this.log = options.logger ?? componentLogger('agent');
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.log.info({ workerId: this.options.workerId }, 'dispatch agent started');
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.polling) await this.polling;
  }

  /** One claim attempt. Exposed for tests and for the first poll after startup. */
  async pollOnce(): Promise<PollResult> {
    const { client, supervisor, workerId } = this.options;
    if (supervisor.busy) return 'busy';

    const message = await client.claimDispatch(workerId);
    if (!message) return 'idle';

    if (supervisor.busy) {
      await this.bounce(message, 'slot taken after claim');
      return 'released';
    }

    const reply = await client.acceptDispatch(message.jobId, workerId);
    await client.ackDispatch(message.id);
    if (!reply.accepted) {
      this.log.info({ jobId: message.jobId, reason: reply.reason }, 'dispatch not accepted by controller');
      return 'rejected';
    }

    try {
      await supervisor.launch(reply.spec);
    } catch (err: unknown) {
      if (err instanceof WorkerBusyError) {
        // The job is already preparing on the controller; its prepare watchdog fails it.
        this.log.warn({ jobId: message.jobId }, 'slot taken during accept');
        return 'released';
      }
      // Setup failures have already been reported as the job's exit.
      this.log.warn({ jobId: message.jobId, err: errorMessage(err) }, 'launch failed');
    }
    return 'launched';
  }

  private async bounce(message: DispatchMessage, why: string): Promise<void> {
    const delayMs = backoffDelay(message.deliveryCount, this.options.requeueBackoff);
    this.log.info({ jobId: message.jobId, delayMs, why }, 'releasing dispatch');
    await this.options.client.releaseDispatch(message.id, delayMs);
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.polling = this.pollOnce()
        .catch((err: unknown): PollResult => {
          this.log.error({ err: errorMessage(err) }, 'dispatch poll failed');
          return 'idle';
        })
        .finally(() => {
          this.polling = null;
          this.schedule(this.options.pollIntervalMs);
        });
    }, delayMs);
  }
}
