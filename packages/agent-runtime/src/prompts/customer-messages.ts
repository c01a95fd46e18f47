/**
 * Fixed customer- and operator-facing texts
 */
import type { Channel } from '@pedibot/shared';

export const HANDOFF_NOTICE =
  '🔄 Esta conversación ha sido derivada a un operador humano. ' +
  'En breve un miembro de nuestro equipo se pondrá en contacto contigo. ' +
  'La asistencia humana estará disponible durante las próximas 2 horas. ' +
  'Gracias por tu paciencia.';

export const INTERVENTION_ENDED_MESSAGE =
  '✅ La conversación ha vuelto al modo automático. ¿En qué más puedo ayudarte?';

export const SESSION_LIMIT_MESSAGE =
  'Alcanzaste el límite de mensajes de esta conversación. ' +
  'Si necesitás ayuda, escribí "operador" y una persona de nuestro equipo te va a atender.';

export const GENERIC_APOLOGY =
  'Lo siento, estamos teniendo problemas técnicos en este momento. Por favor, intentá de nuevo en unos minutos.';

export const ORDER_FAILED_MESSAGE =
  'No pudimos registrar tu pedido. Por favor, intentá de nuevo en unos minutos.';

export const DUPLICATE_ORDER_MESSAGE =
  'Ya registramos este pedido hace unos minutos. Si querés hacer otro pedido, avisanos.';

export const MEDIA_PLACEHOLDER = '[Imagen]';

export interface OperatorAlertInput {
  name: string | null;
  phone: string;
  address: string | null;
  channel: Channel;
}

export function formatOperatorAlert(input: OperatorAlertInput): string {
  return [
    '⚠️ ATENCIÓN REQUERIDA',
    `Usuario: ${input.name || 'Sin nombre'}`,
    `Teléfono: ${input.phone}`,
    `Dirección: ${input.address || 'No registrada'}`,
    `Canal: ${input.channel}`,
    'Por favor, continúe la conversación desde el panel de operadores.',
  ].join('\n');
}

export function formatValidationReply(message: string, product?: string): string {
  const subject = product ? ` (${product})` : '';
  return `No pude confirmar el pedido${subject}: ${message}. ¿Lo revisamos juntos?`;
}
