/**
 * Handoff State Machine (FSM)
 * Decides whether the automated agent or a human operator answers a user.
 *
 * The state is never stored: it is derived on every read from the newest
 * handoff-flagged message and the newest end-of-intervention entry. Ordinary
 * agent replies never release a handoff.
 */
import { CONVERSATION_WINDOWS, HANDOFF_TRIGGERS } from '@pedibot/shared';
import { createChildLogger, withDeadline } from '@pedibot/core';
import { HandoffState, MessageRole } from '../types/index.js';
import type { HandoffStateType, MessageLedger, UserDirectory, UserRecord } from '../types/index.js';
import { HANDOFF_NOTICE, INTERVENTION_ENDED_MESSAGE, formatOperatorAlert } from '../prompts/customer-messages.js';

const log = createChildLogger({ component: 'handoff' });

type TransitionTrigger = 'handoff_request' | 'escalate' | 'end_intervention' | 'window_expired';

interface Transition {
  from: HandoffStateType;
  to: HandoffStateType;
  trigger: TransitionTrigger;
}

// Valid state transitions
const TRANSITIONS: Transition[] = [
  { from: HandoffState.AUTOMATED, to: HandoffState.HUMAN_ACTIVE, trigger: 'handoff_request' },
  { from: HandoffState.AUTOMATED, to: HandoffState.HUMAN_ACTIVE, trigger: 'escalate' },

  // Only an operator or the window can release
  { from: HandoffState.HUMAN_ACTIVE, to: HandoffState.AUTOMATED, trigger: 'end_intervention' },
  { from: HandoffState.HUMAN_ACTIVE, to: HandoffState.AUTOMATED, trigger: 'window_expired' },
];

export function canTransition(from: HandoffStateType, trigger: TransitionTrigger): boolean {
  return TRANSITIONS.some((t) => t.from === from && t.trigger === trigger);
}

/**
 * HUMAN_ACTIVE iff a flagged message lies within the window and no release
 * is newer than it.
 */
export function deriveHandoffState(
  latestFlaggedAt: Date | null,
  latestReleaseAt: Date | null,
  now: Date,
  windowMs: number = CONVERSATION_WINDOWS.HANDOFF_WINDOW_MS
): HandoffStateType {
  if (!latestFlaggedAt) return HandoffState.AUTOMATED;
  if (now.getTime() - latestFlaggedAt.getTime() > windowMs) return HandoffState.AUTOMATED;
  if (latestReleaseAt && latestReleaseAt.getTime() > latestFlaggedAt.getTime()) {
    return HandoffState.AUTOMATED;
  }
  return HandoffState.HUMAN_ACTIVE;
}

/**
 * Whether an inbound body asks for a human operator
 */
export function isHandoffRequest(body: string): boolean {
  const normalized = body.trim().toLowerCase();
  if (!normalized) return false;
  return (
    HANDOFF_TRIGGERS.EXACT.some((phrase) => phrase === normalized) ||
    normalized.includes(HANDOFF_TRIGGERS.SUBSTRING)
  );
}

export interface EscalateOptions {
  trigger: 'handoff_request' | 'escalate';
  /** State read before the trigger message was recorded; read afresh when absent */
  observedState?: HandoffStateType;
  signal?: AbortSignal;
}

export interface HandoffStateMachineOptions {
  ioTimeoutMs: number;
  windowMs?: number;
}

export class HandoffStateMachine {
  private windowMs: number;

  constructor(
    private ledger: MessageLedger,
    private users: UserDirectory,
    private options: HandoffStateMachineOptions
  ) {
    this.windowMs = options.windowMs ?? CONVERSATION_WINDOWS.HANDOFF_WINDOW_MS;
  }

  /**
   * Current state; unreadable history reads as AUTOMATED
   */
  async currentState(userId: string, now: Date, signal?: AbortSignal): Promise<HandoffStateType> {
    const since = new Date(now.getTime() - this.windowMs);
    try {
      const [flaggedAt, releasedAt] = await withDeadline(
        'ledger.handoffMarkers',
        () => Promise.all([this.ledger.latestFlaggedAt(userId, since), this.ledger.latestReleaseAt(userId, since)]),
        { timeoutMs: this.options.ioTimeoutMs, signal }
      );
      return deriveHandoffState(flaggedAt, releasedAt, now, this.windowMs);
    } catch (error) {
      log.warn({ userId, err: error }, 'Could not read handoff history, assuming automated');
      return HandoffState.AUTOMATED;
    }
  }

  async isInHumanMode(userId: string, now: Date, signal?: AbortSignal): Promise<boolean> {
    return (await this.currentState(userId, now, signal)) === HandoffState.HUMAN_ACTIVE;
  }

  /**
   * Whether any flagged message exists inside the window, released or not
   */
  async hasRecentFlaggedMessage(userId: string, now: Date, signal?: AbortSignal): Promise<boolean> {
    const since = new Date(now.getTime() - this.windowMs);
    try {
      const flaggedAt = await withDeadline(
        'ledger.latestFlaggedAt',
        () => this.ledger.latestFlaggedAt(userId, since),
        { timeoutMs: this.options.ioTimeoutMs, signal }
      );
      return flaggedAt !== null;
    } catch (error) {
      log.warn({ userId, err: error }, 'Could not read flagged messages');
      return false;
    }
  }

  /**
   * AUTOMATED → HUMAN_ACTIVE. Appends the customer notice and the operator
   * alert, both flagged. Returns false when already with a human or when
   * the ledger write fails.
   */
  async escalate(user: UserRecord, sessionId: string, now: Date, options: EscalateOptions): Promise<boolean> {
    const { trigger, signal } = options;
    const state = options.observedState ?? (await this.currentState(user.id, now, signal));
    if (!canTransition(state, trigger)) {
      log.info({ userId: user.id, state, trigger }, 'Escalation ignored');
      return false;
    }

    try {
      await withDeadline(
        'handoff.escalate',
        async () => {
          const address = await this.users.lastKnownAddress(user.id).catch((error: unknown) => {
            log.warn({ userId: user.id, err: error }, 'Could not read last known address');
            return null;
          });
          const base = { userId: user.id, channel: user.channel, sessionId, createdAt: now, handoff: true };
          await this.ledger.append({ ...base, role: MessageRole.SYSTEM, body: HANDOFF_NOTICE });
          await this.ledger.append({
            ...base,
            role: MessageRole.SYSTEM,
            body: formatOperatorAlert({ name: user.name, phone: user.phone, address, channel: user.channel }),
          });
        },
        { timeoutMs: this.options.ioTimeoutMs, signal }
      );
    } catch (error) {
      log.error({ userId: user.id, err: error }, 'Failed to record handoff');
      return false;
    }

    log.info({ userId: user.id, trigger }, `Transition: ${HandoffState.AUTOMATED} -> ${HandoffState.HUMAN_ACTIVE}`);
    return true;
  }

  /**
   * HUMAN_ACTIVE → AUTOMATED by appending the release entry.
   * Returns false when not with a human or when the write fails.
   */
  async endIntervention(user: UserRecord, sessionId: string, now: Date, signal?: AbortSignal): Promise<boolean> {
    const state = await this.currentState(user.id, now, signal);
    if (!canTransition(state, 'end_intervention')) {
      return false;
    }

    try {
      await withDeadline(
        'handoff.endIntervention',
        () =>
          this.ledger.append({
            userId: user.id,
            role: MessageRole.AGENT,
            body: INTERVENTION_ENDED_MESSAGE,
            createdAt: now,
            channel: user.channel,
            sessionId,
            handoff: false,
            releasesHandoff: true,
          }),
        { timeoutMs: this.options.ioTimeoutMs, signal }
      );
    } catch (error) {
      log.error({ userId: user.id, err: error }, 'Failed to end intervention');
      return false;
    }

    log.info({ userId: user.id }, `Transition: ${HandoffState.HUMAN_ACTIVE} -> ${HandoffState.AUTOMATED}`);
    return true;
  }
}
