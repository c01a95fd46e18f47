/**
 * Order confirmation text
 */
import { DEFAULT_DELIVERY_TIME } from '@pedibot/shared';
import type { OrderDraft, OrderDraftLine } from '@pedibot/shared';

/**
 * Whole amount with dot thousands separators: 2400 → "$2.400"
 */
export function formatAmount(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  const digits = String(Math.abs(Math.trunc(amount)));
  return `${sign}$${digits.replace(/\B(?=(\d{3})+(?!\d))/g, '.')}`;
}

const PAYMENT_EMOJI: Record<string, string> = {
  efectivo: '💵',
  mercadopago: '💳',
};

function capitalize(value: string): string {
  if (!value) return value;
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export interface ConfirmationInput {
  draft: OrderDraft;
  /** Lines as persisted, including the delivery fee */
  lines: OrderDraftLine[];
  total: number;
}

export function formatOrderConfirmation({ draft, lines, total }: ConfirmationInput): string {
  const message = ['¡Pedido confirmado! 🎉', '\n📝 Detalles del pedido:'];

  for (const line of lines) {
    message.push(`${line.quantity}x ${line.productName} - ${formatAmount(line.subtotal)}`);
  }
  message.push(`💰 Total: ${formatAmount(total)}`);

  const isDelivery = draft.fulfillment === 'delivery';
  message.push(`\n🚗 Modo de entrega: ${isDelivery ? 'Delivery' : 'Retiro en local'}`);

  if (isDelivery && draft.deliveryAddress) {
    message.push(`\n🏠 Dirección de entrega: ${draft.deliveryAddress}`);
  }

  if (draft.deliveryTime !== DEFAULT_DELIVERY_TIME) {
    message.push(`\n🕐 Horario de entrega: ${draft.deliveryTime}`);
  }

  const method = draft.paymentMethod.toLowerCase();
  const emoji = PAYMENT_EMOJI[method] ?? '❓';
  message.push(`\n${emoji} Medio de pago: ${capitalize(draft.paymentMethod)}`);

  return message.join('\n');
}
