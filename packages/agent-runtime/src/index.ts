/**
 * Agent Runtime Package
 * Conversational ordering: sessions, human handoff, agents, order commit
 */

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export * from './types/index.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export { ConversationOrchestrator } from './core/orchestrator.js';
export type { OrchestratorConfig, OrchestratorDeps } from './core/orchestrator.js';

export { SessionTracker } from './core/session-tracker.js';
export type { SessionCount, SessionTrackerOptions } from './core/session-tracker.js';

export {
  HandoffStateMachine,
  canTransition,
  deriveHandoffState,
  isHandoffRequest,
} from './core/handoff-state-machine.js';
export type { EscalateOptions } from './core/handoff-state-machine.js';

export { AgentCache } from './core/agent-cache.js';
export type { AgentFactory } from './core/agent-cache.js';

export { ConversationAgent } from './core/conversation-agent.js';

export { CatalogSnapshot, RefreshingCatalog } from './catalog/catalog-snapshot.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ORDERS
// ═══════════════════════════════════════════════════════════════════════════════

export { OrderCommitPipeline, orderIdempotencyKey } from './orders/order-commit.js';
export type { CommitRequest, OrderCommitOptions } from './orders/order-commit.js';
export { formatAmount, formatOrderConfirmation } from './orders/confirmation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTENCE
// ═══════════════════════════════════════════════════════════════════════════════

export { DrizzleMessageLedger } from './persistence/drizzle-message-ledger.js';
export { DrizzleOrderStore } from './persistence/drizzle-order-store.js';
export { DrizzleUserDirectory } from './persistence/drizzle-user-directory.js';
export { DrizzleCatalogProvider } from './persistence/drizzle-catalog-provider.js';

// ═══════════════════════════════════════════════════════════════════════════════
// REPLY GENERATION
// ═══════════════════════════════════════════════════════════════════════════════

export { AnthropicReplyGenerator, REPLY_TOOLS } from './llm/anthropic-reply-generator.js';
export type { AnthropicReplyGeneratorConfig } from './llm/anthropic-reply-generator.js';
export { extractMarkers } from './llm/reply-markers.js';
export { buildOrderingSystemPrompt } from './prompts/ordering-system.js';

// ═══════════════════════════════════════════════════════════════════════════════
// WORKER
// ═══════════════════════════════════════════════════════════════════════════════

export { InboundWorker, createInboundProcessor } from './worker/inbound-worker.js';
export type {
  InboundJob,
  InboundJobResult,
  InboundProcessorDeps,
  InboundWorkerConfig,
} from './worker/inbound-worker.js';
