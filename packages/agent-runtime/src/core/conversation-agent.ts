/**
 * Conversation Agent
 * Per-user conversational state handed to the reply generator
 */
import { CONVERSATION_LIMITS } from '@pedibot/shared';
import type { Channel, ProfileUpdate } from '@pedibot/shared';
import { withDeadline } from '@pedibot/core';
import type { CatalogSnapshot } from '../catalog/catalog-snapshot.js';
import type { AgentProfile, ConversationTurn, ReplyGenerator, ReplyResult } from '../types/index.js';

export interface ConversationAgentOptions {
  replyTimeoutMs: number;
  maxTurns?: number;
}

export class ConversationAgent {
  private transcript: ConversationTurn[] = [];
  private maxTurns: number;

  constructor(
    readonly userId: string,
    readonly channel: Channel,
    private profile: AgentProfile,
    private catalog: CatalogSnapshot,
    private generator: ReplyGenerator,
    private options: ConversationAgentOptions
  ) {
    this.maxTurns = options.maxTurns ?? CONVERSATION_LIMITS.AGENT_TRANSCRIPT_TURNS;
  }

  getProfile(): AgentProfile {
    return { ...this.profile };
  }

  getTranscript(): ConversationTurn[] {
    return [...this.transcript];
  }

  /**
   * Generate the reply to `message`. The exchange joins the transcript only
   * when generation succeeds.
   */
  async reply(
    message: string,
    catalog: CatalogSnapshot,
    options: { mediaRef?: string; signal?: AbortSignal } = {}
  ): Promise<ReplyResult> {
    this.catalog = catalog;
    const result = await withDeadline(
      'reply.generate',
      (signal) =>
        this.generator.generate(
          {
            userId: this.userId,
            channel: this.channel,
            profile: this.getProfile(),
            catalog: this.catalog,
            transcript: this.getTranscript(),
            message,
            mediaRef: options.mediaRef,
          },
          signal
        ),
      { timeoutMs: this.options.replyTimeoutMs, signal: options.signal }
    );

    this.remember({ role: 'user', content: message });
    if (result.displayText) {
      this.remember({ role: 'assistant', content: result.displayText });
    }
    return result;
  }

  /**
   * Apply a stored profile update. The address is kept as a hint for the
   * next order; it is not a user attribute.
   */
  applyProfileUpdate(update: ProfileUpdate): void {
    this.profile = {
      name: update.nombre ?? this.profile.name,
      email: update.email ?? this.profile.email,
      address: update.direccion ?? this.profile.address,
    };
  }

  /**
   * Record a text the customer saw that did not come from the generator
   */
  noteAssistantMessage(content: string): void {
    this.remember({ role: 'assistant', content });
  }

  private remember(turn: ConversationTurn): void {
    this.transcript.push(turn);
    if (this.transcript.length > this.maxTurns) {
      this.transcript = this.transcript.slice(-this.maxTurns);
    }
    // The transcript must open with a user turn
    while (this.transcript.length > 0 && this.transcript[0]?.role === 'assistant') {
      this.transcript.shift();
    }
  }
}
