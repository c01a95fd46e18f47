/**
 * Inbound Worker
 * BullMQ worker that consumes the inbound-message queue
 *
 * Features:
 * - Validates job data before processing
 * - One conversation turn per job, reply enqueued on message-send
 * - Unavailable turns are retried by BullMQ; the last attempt apologizes
 */
import { Worker } from 'bullmq';
import type { ConnectionOptions, Job } from 'bullmq';
import { InboundMessagePayloadSchema, QUEUES } from '@pedibot/shared';
import type { InboundMessagePayload, MessageSendPayload } from '@pedibot/shared';
import { ServiceUnavailableError, createChildLogger } from '@pedibot/core';
import type { HandlingOutcome, HandlingOutcomeKind, InboundMessage } from '../types/index.js';

const log = createChildLogger({ component: 'inbound-worker' });

export type InboundJob = Pick<Job<InboundMessagePayload>, 'id' | 'data' | 'attemptsMade'>;

export type InboundJobResult =
  | { status: 'replied'; outcome: HandlingOutcomeKind }
  | { status: 'silent'; outcome: HandlingOutcomeKind }
  | { status: 'invalid'; reason: string };

export interface InboundProcessorDeps {
  handleInbound: (message: InboundMessage) => Promise<HandlingOutcome>;
  send: (payload: MessageSendPayload) => Promise<void>;
  /** Ledger entry for an apology that was actually sent */
  recordApology: (message: InboundMessage, text: string) => Promise<boolean>;
  maxAttempts?: number;
}

/**
 * Job handler, kept apart from the Worker so it can run without Redis
 */
export function createInboundProcessor(deps: InboundProcessorDeps): (job: InboundJob) => Promise<InboundJobResult> {
  const maxAttempts = deps.maxAttempts ?? QUEUES.INBOUND_MESSAGE.attempts;

  return async (job) => {
    const parsed = InboundMessagePayloadSchema.safeParse(job.data);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      log.warn({ jobId: job.id, reason }, 'Discarding invalid inbound job');
      return { status: 'invalid', reason };
    }

    const payload = parsed.data;
    const message: InboundMessage = {
      phone: payload.phone,
      channel: payload.channel,
      body: payload.body,
      mediaRef: payload.mediaRef,
      externalId: payload.externalId,
      now: new Date(payload.receivedAt),
    };
    const outcome = await deps.handleInbound(message);

    const reply = (text: string): Promise<void> =>
      deps.send({ to: payload.phone, channel: payload.channel, text, replyToExternalId: payload.externalId });

    switch (outcome.kind) {
      case 'human_mode_silent':
        return { status: 'silent', outcome: outcome.kind };

      case 'unavailable':
        if (job.attemptsMade + 1 < maxAttempts) {
          throw new ServiceUnavailableError(outcome.reason);
        }
        log.error({ jobId: job.id, reason: outcome.reason }, 'Inbound job out of attempts, sending apology');
        await reply(outcome.text);
        if (!(await deps.recordApology(message, outcome.text))) {
          log.warn({ jobId: job.id }, 'Apology sent but not recorded');
        }
        return { status: 'replied', outcome: outcome.kind };

      case 'automated_reply':
      case 'handoff_notice':
      case 'session_limit_reached':
        if (!outcome.text) {
          return { status: 'silent', outcome: outcome.kind };
        }
        await reply(outcome.text);
        return { status: 'replied', outcome: outcome.kind };
    }
  };
}

export interface InboundWorkerConfig {
  connection: ConnectionOptions;
  concurrency?: number;
}

export class InboundWorker {
  private worker: Worker<InboundMessagePayload, InboundJobResult> | null = null;

  constructor(
    private processor: (job: InboundJob) => Promise<InboundJobResult>,
    private config: InboundWorkerConfig
  ) {}

  /**
   * Start the worker
   */
  start(): void {
    this.worker = new Worker<InboundMessagePayload, InboundJobResult>(
      QUEUES.INBOUND_MESSAGE.name,
      (job) => this.processor(job),
      {
        connection: this.config.connection,
        concurrency: this.config.concurrency ?? QUEUES.INBOUND_MESSAGE.concurrency,
      }
    );

    // Event handlers
    this.worker.on('completed', (job, result) => {
      log.info({ jobId: job.id, status: result.status }, 'Job completed');
    });

    this.worker.on('failed', (job, error) => {
      log.error(
        { jobId: job?.id, attempt: job?.attemptsMade, maxAttempts: QUEUES.INBOUND_MESSAGE.attempts, err: error },
        'Job failed'
      );
    });

    this.worker.on('error', (error) => {
      log.error({ err: error }, 'Worker error');
    });

    log.info({ queue: QUEUES.INBOUND_MESSAGE.name }, 'Inbound worker started');
  }

  /**
   * Stop the worker, letting running jobs finish
   */
  async stop(): Promise<void> {
    await this.worker?.close();
    this.worker = null;
    log.info('Inbound worker stopped');
  }
}
