/**
 * Reply generator on the Anthropic Messages API
 *
 * One request per turn. Orders and profile data come back as tool calls;
 * replies that still use the `#ORDER:` / `#USER_DATA:` text markers are
 * handled the same way.
 */
import Anthropic from '@anthropic-ai/sdk';
import { ServiceUnavailableError, createChildLogger, errorMessage } from '@pedibot/core';
import type { ReplyContext, ReplyGenerator, ReplyResult } from '../types/index.js';
import { buildOrderingSystemPrompt } from '../prompts/ordering-system.js';
import { extractMarkers } from './reply-markers.js';

const log = createChildLogger({ component: 'reply-generator' });

export interface AnthropicReplyGeneratorConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  storeName?: string;
  defaultLocationName?: string | null;
}

const DEFAULT_CONFIG = {
  model: 'claude-3-5-sonnet-20240620',
  maxTokens: 1024,
  temperature: 0.7,
  storeName: 'nuestro restaurante',
};

export const SUBMIT_ORDER_TOOL = 'submit_order';
export const UPDATE_PROFILE_TOOL = 'update_profile';

export const REPLY_TOOLS: Anthropic.Tool[] = [
  {
    name: SUBMIT_ORDER_TOOL,
    description:
      'Registra el pedido confirmado por el cliente. Usar solo cuando productos, modo de entrega y medio de pago están confirmados.',
    input_schema: {
      type: 'object',
      properties: {
        items: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              product: { type: 'string', description: 'Nombre exacto del producto en el menú' },
              quantity: { type: 'integer', minimum: 1 },
              precio_unitario: { type: 'integer', description: 'Precio del menú' },
              subtotal: { type: 'integer', description: 'precio_unitario × quantity' },
            },
            required: ['product', 'quantity', 'precio_unitario', 'subtotal'],
          },
        },
        is_takeaway: { type: 'boolean', description: 'true si retira en el local' },
        medio_pago: { type: 'string', enum: ['efectivo', 'mercadopago'] },
        observaciones: { type: 'string', description: 'Notas del cliente; vacío si no hay' },
        direccion: { type: 'string', description: 'Dirección de entrega (obligatoria si no retira)' },
        horario_entrega: { type: 'string', description: 'Horario pedido; omitir si es inmediato' },
        local: { type: 'string', description: 'Local del pedido' },
      },
      required: ['items', 'is_takeaway', 'medio_pago', 'observaciones'],
    },
  },
  {
    name: UPDATE_PROFILE_TOOL,
    description: 'Guarda los datos personales que el cliente compartió.',
    input_schema: {
      type: 'object',
      properties: {
        nombre: { type: 'string' },
        email: { type: 'string' },
        direccion: { type: 'string' },
      },
    },
  },
];

export class AnthropicReplyGenerator implements ReplyGenerator {
  private client: Anthropic;
  private config: Required<Omit<AnthropicReplyGeneratorConfig, 'apiKey' | 'defaultLocationName'>> & {
    defaultLocationName: string | null;
  };

  constructor(config: AnthropicReplyGeneratorConfig) {
    this.client = new Anthropic({ apiKey: config.apiKey });
    this.config = {
      model: config.model ?? DEFAULT_CONFIG.model,
      maxTokens: config.maxTokens ?? DEFAULT_CONFIG.maxTokens,
      temperature: config.temperature ?? DEFAULT_CONFIG.temperature,
      storeName: config.storeName ?? DEFAULT_CONFIG.storeName,
      defaultLocationName: config.defaultLocationName ?? null,
    };
  }

  async generate(context: ReplyContext, signal: AbortSignal): Promise<ReplyResult> {
    const messages: Anthropic.MessageParam[] = [
      ...context.transcript.map((turn) => ({ role: turn.role, content: turn.content })),
      { role: 'user', content: context.message },
    ];

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          temperature: this.config.temperature,
          system: buildOrderingSystemPrompt({
            storeName: this.config.storeName,
            profile: context.profile,
            catalog: context.catalog,
            defaultLocationName: this.config.defaultLocationName,
          }),
          tools: REPLY_TOOLS,
          messages,
        },
        { signal }
      );
    } catch (error) {
      log.error({ userId: context.userId, err: error }, 'Reply generation failed');
      throw new ServiceUnavailableError(`Reply generation failed: ${errorMessage(error)}`, 'SERVICE_UNAVAILABLE', error);
    }

    const texts: string[] = [];
    let orderPayload: unknown;
    let profileUpdate: unknown;
    for (const block of response.content) {
      if (block.type === 'text') {
        texts.push(block.text);
      } else if (block.type === 'tool_use') {
        if (block.name === SUBMIT_ORDER_TOOL) orderPayload = block.input;
        else if (block.name === UPDATE_PROFILE_TOOL) profileUpdate = block.input;
        else log.warn({ tool: block.name }, 'Unknown tool requested');
      }
    }

    const markers = extractMarkers(texts.join('\n'));
    const result: ReplyResult = {
      displayText: markers.displayText,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
    };
    const order = orderPayload ?? markers.orderPayload;
    const profile = profileUpdate ?? markers.profileUpdate;
    if (order !== undefined) result.orderPayload = order;
    if (profile !== undefined) result.profileUpdate = profile;

    log.debug(
      { userId: context.userId, stopReason: response.stop_reason, tokens: result.tokensUsed, order: order !== undefined },
      'Reply generated'
    );
    return result;
  }
}
