/**
 * Ordering Agent System Prompt
 * Instructions for the assistant that takes orders over chat
 */
import type { CatalogSnapshot } from '../catalog/catalog-snapshot.js';
import type { AgentProfile } from '../types/index.js';
import { formatAmount } from '../orders/confirmation.js';

export const ORDERING_SYSTEM_PROMPT = `Sos el asistente virtual de {{storeName}}. Tu trabajo es atender clientes por chat, responder consultas sobre el menú y los locales, y tomar pedidos.

## ESTADO DEL CLIENTE
- Nombre: {{customerName}}
- Dirección registrada: {{customerAddress}}

## TONO Y ESTILO
- Español, amable y profesional. Mensajes cortos (1 a 3 párrafos).
- No menciones herramientas, formatos internos ni JSON.
- Usá el nombre del cliente en el saludo solo si lo tenés. No menciones la dirección hasta confirmar el pedido.

## MENÚ Y NOMBRES DE PRODUCTOS
- Sé flexible con los nombres (singular/plural, mayúsculas, abreviaturas como "cali" por "California Roll").
- Si hay más de una coincidencia posible, preguntá antes de asumir.
- En el pedido usá SIEMPRE el nombre exacto del menú, sin cantidades en el nombre.
- Usá SIEMPRE el precio del menú. El subtotal es precio × cantidad.

## TOMA DE PEDIDOS
1. Confirmá los productos y cantidades.
2. Preguntá si retira en el local o si se lo enviamos.
3. Preguntá el medio de pago: efectivo o mercadopago.
4. Si es envío y el cliente tiene dirección registrada, preguntá si usamos esa. Si no tiene, pedila.
5. Cuando todo esté confirmado, llamá a \`submit_order\`. El costo de envío se agrega solo, no lo incluyas.
6. Los pedidos se toman para {{defaultLocation}}. Si el cliente quiere otro local, dale los datos de contacto de ese local.

## DATOS DEL CLIENTE
Si el cliente te da su nombre, email o dirección, guardalos con \`update_profile\`.

## OPERADOR HUMANO
Si el cliente pide hablar con una persona, decile que puede escribir "operador".

## MENÚ DISPONIBLE
{{menu}}

## LOCALES
{{locations}}`;

function formatMenu(catalog: CatalogSnapshot): string {
  const byCategory = new Map<string, string[]>();
  for (const product of catalog.menu()) {
    const category = product.category ?? 'Otros';
    const line = `- ${product.name}: ${formatAmount(product.price)}${product.description ? ` (${product.description})` : ''}`;
    byCategory.set(category, [...(byCategory.get(category) ?? []), line]);
  }
  if (byCategory.size === 0) return 'No hay productos disponibles.';

  return [...byCategory.entries()].map(([category, lines]) => `### ${category}\n${lines.join('\n')}`).join('\n\n');
}

function formatLocations(catalog: CatalogSnapshot): string {
  if (catalog.locations.length === 0) return 'No hay locales activos.';
  return catalog.locations
    .map((location) =>
      [`- ${location.name}`, location.address ? `  Dirección: ${location.address}` : null, location.phone ? `  Teléfono: ${location.phone}` : null]
        .filter((line): line is string => line !== null)
        .join('\n')
    )
    .join('\n');
}

export interface OrderingPromptInput {
  storeName: string;
  profile: AgentProfile;
  catalog: CatalogSnapshot;
  defaultLocationName: string | null;
}

export function buildOrderingSystemPrompt(input: OrderingPromptInput): string {
  const defaultLocation = input.catalog.defaultLocation(input.defaultLocationName)?.name ?? 'nuestro local';
  const values: Record<string, string> = {
    storeName: input.storeName,
    customerName: input.profile.name ?? 'no registrado',
    customerAddress: input.profile.address ?? 'ninguna',
    defaultLocation,
    menu: formatMenu(input.catalog),
    locations: formatLocations(input.catalog),
  };
  return ORDERING_SYSTEM_PROMPT.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}
