/**
 * Conversation Orchestrator
 * Main entry point for inbound messages and operator actions.
 * Handles: sessions, handoff, reply generation, order commit, ledger writes
 */
import { CONVERSATION_LIMITS, ProfileUpdateSchema } from '@pedibot/shared';
import type { Channel } from '@pedibot/shared';
import { KeyedMutex, createChildLogger, errorMessage, withDeadline } from '@pedibot/core';
import { HandoffState, MessageRole } from '../types/index.js';
import type {
  CatalogProvider,
  HandlingOutcome,
  InboundMessage,
  MessageLedger,
  NewLedgerMessage,
  OperationOptions,
  OrderCommitResult,
  OrderStore,
  ReplyGenerator,
  UserDirectory,
  UserKey,
  UserRecord,
} from '../types/index.js';
import { RefreshingCatalog } from '../catalog/catalog-snapshot.js';
import { SessionTracker } from './session-tracker.js';
import { HandoffStateMachine, isHandoffRequest } from './handoff-state-machine.js';
import { AgentCache } from './agent-cache.js';
import { ConversationAgent } from './conversation-agent.js';
import { OrderCommitPipeline } from '../orders/order-commit.js';
import {
  GENERIC_APOLOGY,
  HANDOFF_NOTICE,
  MEDIA_PLACEHOLDER,
  SESSION_LIMIT_MESSAGE,
} from '../prompts/customer-messages.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export interface OrchestratorConfig {
  /** Deadline for each catalog, ledger, directory and order-store call */
  ioTimeoutMs?: number;
  replyTimeoutMs?: number;
  sessionMessageCap?: number;
  defaultLocationName?: string | null;
  catalogTtlMs?: number;
  transcriptTurns?: number;
}

const DEFAULT_CONFIG = {
  ioTimeoutMs: 10_000,
  replyTimeoutMs: 30_000,
  sessionMessageCap: CONVERSATION_LIMITS.DEFAULT_SESSION_MESSAGE_CAP,
  transcriptTurns: CONVERSATION_LIMITS.AGENT_TRANSCRIPT_TURNS,
};

export interface OrchestratorDeps {
  ledger: MessageLedger;
  users: UserDirectory;
  orders: OrderStore;
  catalog: CatalogProvider;
  replies: ReplyGenerator;
  clock?: () => Date;
}

function userLockKey(user: UserKey): string {
  return `${user.channel}:${user.phone}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSATION ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════════════════════

export class ConversationOrchestrator {
  private log = createChildLogger({ component: 'orchestrator' });
  private locks = new KeyedMutex();
  private clock: () => Date;
  private ioTimeoutMs: number;
  private sessionMessageCap: number;

  readonly catalog: RefreshingCatalog;
  readonly sessions: SessionTracker;
  readonly handoff: HandoffStateMachine;
  readonly agents: AgentCache<ConversationAgent, UserRecord>;
  readonly orders: OrderCommitPipeline;

  constructor(
    private deps: OrchestratorDeps,
    config: OrchestratorConfig = {}
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.ioTimeoutMs = config.ioTimeoutMs ?? DEFAULT_CONFIG.ioTimeoutMs;
    this.sessionMessageCap = config.sessionMessageCap ?? DEFAULT_CONFIG.sessionMessageCap;
    const replyTimeoutMs = config.replyTimeoutMs ?? DEFAULT_CONFIG.replyTimeoutMs;
    const transcriptTurns = config.transcriptTurns ?? DEFAULT_CONFIG.transcriptTurns;

    this.catalog = new RefreshingCatalog(deps.catalog, { ttlMs: config.catalogTtlMs, timeoutMs: this.ioTimeoutMs });
    this.sessions = new SessionTracker(deps.ledger, { ioTimeoutMs: this.ioTimeoutMs });
    this.handoff = new HandoffStateMachine(deps.ledger, deps.users, { ioTimeoutMs: this.ioTimeoutMs });
    this.orders = new OrderCommitPipeline(this.catalog, deps.users, deps.orders, {
      ioTimeoutMs: this.ioTimeoutMs,
      defaultLocationName: config.defaultLocationName ?? null,
    });
    this.agents = new AgentCache<ConversationAgent, UserRecord>(async (userId, now, user, signal) => {
      const snapshot = await this.catalog.current(now, signal);
      const address = await this.readLastKnownAddress(userId, signal);
      return new ConversationAgent(
        userId,
        user.channel,
        { name: user.name, email: user.email, address },
        snapshot,
        deps.replies,
        { replyTimeoutMs, maxTurns: transcriptTurns }
      );
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INBOUND
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Process one inbound message. Holds the user's lock for the whole turn
   * and never throws.
   */
  async handleInbound(message: InboundMessage): Promise<HandlingOutcome> {
    const now = message.now ?? this.clock();
    try {
      return await this.locks.runExclusive(userLockKey(message), () => this.processTurn(message, now));
    } catch (error) {
      this.log.error({ channel: message.channel, err: error }, 'Inbound turn failed');
      return { kind: 'unavailable', text: GENERIC_APOLOGY, reason: errorMessage(error) };
    } finally {
      this.agents.sweep(now);
    }
  }

  private async processTurn(message: InboundMessage, now: Date): Promise<HandlingOutcome> {
    const { signal } = message;
    const { user } = await withDeadline(
      'users.ensureUser',
      () => this.deps.users.ensureUser({ phone: message.phone, channel: message.channel }, now),
      { timeoutMs: this.ioTimeoutMs, signal }
    );
    const log = this.log.child({ userId: user.id, channel: user.channel });

    // Decided before recording so the message carries the flag of the state it arrived in
    const state = await this.handoff.currentState(user.id, now, signal);
    const inHumanMode = state === HandoffState.HUMAN_ACTIVE;
    const body = !message.body.trim() && message.mediaRef ? MEDIA_PLACEHOLDER : message.body;
    const wantsHuman = !inHumanMode && isHandoffRequest(message.body);

    const sessionId = await this.recordInbound(user, message, body, now, inHumanMode || wantsHuman);

    if (inHumanMode) {
      this.agents.touch(user.id, now);
      log.info({ sessionId }, 'Human operator active, automated reply skipped');
      return { kind: 'human_mode_silent', sessionId };
    }

    if (wantsHuman) {
      const escalated = await this.handoff.escalate(user, sessionId, now, {
        trigger: 'handoff_request',
        observedState: state,
        signal,
      });
      if (!escalated) {
        return { kind: 'unavailable', text: GENERIC_APOLOGY, reason: 'Handoff could not be recorded' };
      }
      return { kind: 'handoff_notice', text: HANDOFF_NOTICE, sessionId };
    }

    // Record-then-check: the message above is already part of the count
    const { count } = await this.sessions.countInCurrentSession(user.id, now, signal);
    if (count > this.sessionMessageCap) {
      log.warn({ sessionId, count, cap: this.sessionMessageCap }, 'Session message cap reached');
      await this.recordReply(user, sessionId, SESSION_LIMIT_MESSAGE, now, { signal });
      return { kind: 'session_limit_reached', text: SESSION_LIMIT_MESSAGE, sessionId };
    }

    const agent = await this.agents.getOrCreate(user.id, now, user, signal);
    const snapshot = await this.catalog.current(now, signal);
    const reply = await agent.reply(body, snapshot, { mediaRef: message.mediaRef, signal });

    if (reply.profileUpdate !== undefined) {
      await this.applyProfileUpdate(user, agent, reply.profileUpdate, signal);
    }

    let order: OrderCommitResult | undefined;
    if (reply.orderPayload !== undefined) {
      order = await this.orders.commit({
        payload: reply.orderPayload,
        user: { phone: user.phone, channel: user.channel },
        now,
        signal,
      });
      agent.noteAssistantMessage(order.confirmationText);
    }

    const text = [reply.displayText, order?.confirmationText].filter((part) => Boolean(part)).join('\n\n');
    await this.recordReply(user, sessionId, text, now, {
      signal,
      orderId: order?.status === 'committed' ? order.orderId : null,
      tokens: reply.tokensUsed ?? null,
    });

    log.info({ sessionId, order: order?.status ?? 'none', tokens: reply.tokensUsed }, 'Automated reply ready');
    return order ? { kind: 'automated_reply', text, sessionId, order } : { kind: 'automated_reply', text, sessionId };
  }

  /**
   * Append the user message once per channel event. A redelivered event
   * reuses the recorded message and its session.
   */
  private async recordInbound(
    user: UserRecord,
    message: InboundMessage,
    body: string,
    now: Date,
    flagged: boolean
  ): Promise<string> {
    const { externalId, signal } = message;
    if (externalId) {
      const recorded = await withDeadline(
        'ledger.findByExternalId',
        () => this.deps.ledger.findByExternalId(user.id, externalId),
        { timeoutMs: this.ioTimeoutMs, signal }
      );
      if (recorded) {
        this.log.info({ userId: user.id, externalId }, 'Redelivered message, reusing recorded entry');
        return recorded.sessionId;
      }
    }

    const { sessionId } = await this.sessions.stamp(
      user.id,
      now,
      (session) =>
        this.append(
          {
            userId: user.id,
            role: MessageRole.USER,
            body,
            createdAt: now,
            channel: user.channel,
            sessionId: session,
            handoff: flagged,
            externalId: externalId ?? null,
            mediaRef: message.mediaRef ?? null,
          },
          signal
        ),
      signal
    );
    return sessionId;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  /**
   * Commit an order outside a conversation turn, serialized with the user's turns
   */
  async commitOrder(payload: unknown, phone: string, channel: Channel, options: OperationOptions = {}): Promise<OrderCommitResult> {
    const now = options.now ?? this.clock();
    const user = { phone, channel };
    return this.locks.runExclusive(userLockKey(user), () =>
      this.orders.commit({ payload, user, now, signal: options.signal })
    );
  }

  /**
   * Operator hands the conversation back to the agent
   */
  async endIntervention(phone: string, channel: Channel, options: OperationOptions = {}): Promise<boolean> {
    return this.withKnownUser('endIntervention', { phone, channel }, options, (user, sessionId, now) =>
      this.handoff.endIntervention(user, sessionId, now, options.signal)
    );
  }

  /**
   * Escalate to a human from outside the conversation (e.g. a failing job)
   */
  async escalate(phone: string, channel: Channel, options: OperationOptions = {}): Promise<boolean> {
    return this.withKnownUser('escalate', { phone, channel }, options, (user, sessionId, now) =>
      this.handoff.escalate(user, sessionId, now, { trigger: 'escalate', signal: options.signal })
    );
  }

  /**
   * Record the apology a caller delivered after giving up on a turn
   */
  async recordApology(phone: string, channel: Channel, text: string, options: OperationOptions = {}): Promise<boolean> {
    return this.withKnownUser('recordApology', { phone, channel }, options, async (user, sessionId, now) => {
      await this.append(
        { userId: user.id, role: MessageRole.AGENT, body: text, createdAt: now, channel, sessionId, handoff: false },
        options.signal
      );
      return true;
    });
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  private async withKnownUser(
    operation: string,
    key: UserKey,
    options: OperationOptions,
    action: (user: UserRecord, sessionId: string, now: Date) => Promise<boolean>
  ): Promise<boolean> {
    const now = options.now ?? this.clock();
    try {
      return await this.locks.runExclusive(userLockKey(key), async () => {
        const user = await withDeadline('users.findUser', () => this.deps.users.findUser(key), {
          timeoutMs: this.ioTimeoutMs,
          signal: options.signal,
        });
        if (!user) {
          this.log.warn({ operation, channel: key.channel }, 'Unknown user');
          return false;
        }
        const sessionId = await this.sessions.resolveSession(user.id, now, options.signal);
        return action(user, sessionId, now);
      });
    } catch (error) {
      this.log.error({ operation, channel: key.channel, err: error }, 'Operation failed');
      return false;
    }
  }

  private async applyProfileUpdate(
    user: UserRecord,
    agent: ConversationAgent,
    raw: unknown,
    signal?: AbortSignal
  ): Promise<void> {
    const parsed = ProfileUpdateSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ userId: user.id, issues: parsed.error.issues.length }, 'Ignoring invalid profile update');
      return;
    }

    const update = parsed.data;
    if (update.nombre !== undefined || update.email !== undefined) {
      try {
        await withDeadline(
          'users.updateProfile',
          () => this.deps.users.updateProfile(user.id, { name: update.nombre, email: update.email }),
          { timeoutMs: this.ioTimeoutMs, signal }
        );
      } catch (error) {
        this.log.error({ userId: user.id, err: error }, 'Profile update failed');
        return;
      }
    }
    agent.applyProfileUpdate(update);
  }

  private async readLastKnownAddress(userId: string, signal?: AbortSignal): Promise<string | null> {
    try {
      return await withDeadline('users.lastKnownAddress', () => this.deps.users.lastKnownAddress(userId), {
        timeoutMs: this.ioTimeoutMs,
        signal,
      });
    } catch (error) {
      this.log.warn({ userId, err: error }, 'Could not read last known address');
      return null;
    }
  }

  private async recordReply(
    user: UserRecord,
    sessionId: string,
    body: string,
    now: Date,
    extra: { signal?: AbortSignal; orderId?: string | null; tokens?: number | null }
  ): Promise<void> {
    try {
      await this.append(
        {
          userId: user.id,
          role: MessageRole.AGENT,
          body,
          createdAt: now,
          channel: user.channel,
          sessionId,
          handoff: false,
          orderId: extra.orderId ?? null,
          tokens: extra.tokens ?? null,
        },
        extra.signal
      );
    } catch (error) {
      // The reply is still delivered; only its ledger entry is missing
      this.log.error({ userId: user.id, sessionId, err: error }, 'Failed to record agent reply');
    }
  }

  private append(message: NewLedgerMessage, signal?: AbortSignal): Promise<string> {
    return withDeadline('ledger.append', () => this.deps.ledger.append(message), {
      timeoutMs: this.ioTimeoutMs,
      signal,
    });
  }
}
