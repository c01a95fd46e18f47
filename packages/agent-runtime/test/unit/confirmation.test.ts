/**
 * Tests for Order Confirmation
 */
import { describe, it, expect } from 'vitest';
import type { OrderDraft } from '@pedibot/shared';
import { formatAmount, formatOrderConfirmation } from '../../src/orders/confirmation.js';

function draft(overrides: Partial<OrderDraft> = {}): OrderDraft {
  return {
    items: [{ productName: 'California Roll', quantity: 2, unitPrice: 1200, subtotal: 2400 }],
    fulfillment: 'pickup',
    paymentMethod: 'efectivo',
    notes: '',
    deliveryAddress: null,
    deliveryTime: 'immediate',
    locationName: null,
    ...overrides,
  };
}

describe('formatAmount', () => {
  it.each([
    [0, '$0'],
    [500, '$500'],
    [2400, '$2.400'],
    [15750, '$15.750'],
    [1234567, '$1.234.567'],
  ])('should format %d as %s', (amount, expected) => {
    expect(formatAmount(amount)).toBe(expected);
  });
});

describe('formatOrderConfirmation', () => {
  it('should render a pickup order paid in cash', () => {
    const order = draft();

    expect(formatOrderConfirmation({ draft: order, lines: order.items, total: 2400 })).toBe(
      '¡Pedido confirmado! 🎉\n' +
        '\n📝 Detalles del pedido:\n' +
        '2x California Roll - $2.400\n' +
        '💰 Total: $2.400\n' +
        '\n🚗 Modo de entrega: Retiro en local\n' +
        '\n💵 Medio de pago: Efectivo'
    );
  });

  it('should include the address and the delivery time for delivery orders', () => {
    const order = draft({
      fulfillment: 'delivery',
      deliveryAddress: 'Av. Libertador 1000',
      deliveryTime: '21:30',
      paymentMethod: 'MercadoPago',
    });
    const lines = [...order.items, { productName: 'Delivery', quantity: 1, unitPrice: 500, subtotal: 500 }];

    const text = formatOrderConfirmation({ draft: order, lines, total: 2900 });

    expect(text.split('\n')).toEqual([
      '¡Pedido confirmado! 🎉',
      '',
      '📝 Detalles del pedido:',
      '2x California Roll - $2.400',
      '1x Delivery - $500',
      '💰 Total: $2.900',
      '',
      '🚗 Modo de entrega: Delivery',
      '',
      '🏠 Dirección de entrega: Av. Libertador 1000',
      '',
      '🕐 Horario de entrega: 21:30',
      '',
      '💳 Medio de pago: Mercadopago',
    ]);
  });

  it('should mark an unknown payment method', () => {
    const order = draft({ paymentMethod: 'pendiente' });

    const text = formatOrderConfirmation({ draft: order, lines: order.items, total: 2400 });

    expect(text.endsWith('\n❓ Medio de pago: Pendiente')).toBe(true);
  });
});
