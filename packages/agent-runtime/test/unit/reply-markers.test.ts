/**
 * Tests for reply text markers
 */
import { describe, it, expect } from 'vitest';
import { extractMarkers } from '../../src/llm/reply-markers.js';

describe('extractMarkers', () => {
  it('should return plain text untouched', () => {
    expect(extractMarkers('  ¿Retirás o te lo mandamos?  ')).toEqual({ displayText: '¿Retirás o te lo mandamos?' });
  });

  it('should cut the order payload out of the text', () => {
    const text =
      'Perfecto, confirmo tu pedido.\n#ORDER:{"items":[{"product":"California Roll","quantity":2,' +
      '"precio_unitario":1200,"subtotal":2400}],"is_takeaway":true,"medio_pago":"efectivo","observaciones":""}';

    const result = extractMarkers(text);

    expect(result.displayText).toBe('Perfecto, confirmo tu pedido.');
    expect(result.orderPayload).toEqual({
      items: [{ product: 'California Roll', quantity: 2, precio_unitario: 1200, subtotal: 2400 }],
      is_takeaway: true,
      medio_pago: 'efectivo',
      observaciones: '',
    });
    expect(result.profileUpdate).toBeUndefined();
  });

  it('should read both markers and keep the text around them', () => {
    const text = 'Gracias Ana.\n\n#USER_DATA:{"nombre":"Ana"}\n\n\nTe espero. #ORDER:{"observaciones":"sin {sésamo}"}';

    expect(extractMarkers(text)).toEqual({
      displayText: 'Gracias Ana.\n\nTe espero.',
      orderPayload: { observaciones: 'sin {sésamo}' },
      profileUpdate: { nombre: 'Ana' },
    });
  });

  it('should hide an unterminated payload and submit nothing', () => {
    expect(extractMarkers('Listo #ORDER:{"items":[')).toEqual({ displayText: 'Listo' });
  });

  it('should drop a payload that is not valid JSON', () => {
    expect(extractMarkers('Listo #ORDER:{items: 2}')).toEqual({ displayText: 'Listo' });
  });
});
