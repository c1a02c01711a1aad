/**
 * Null normalization for orders without payments, items or reviews
 */

import type { ComposedOrder, OrderAnalyticsRecord } from './types';

export type NormalizedAggregates = Pick<
  OrderAnalyticsRecord,
  'valor_total_pagamento' | 'valor_total_produtos' | 'valor_total_frete' | 'metodos_pagamento' | 'review_score'
>;

/**
 * Missing monetary summaries read as 0. A missing review score stays null:
 * no review is not a score of zero.
 */
export function normalizeAggregates(composed: Pick<ComposedOrder, 'payments' | 'items' | 'reviews'>): NormalizedAggregates {
  return {
    valor_total_pagamento: composed.payments?.valor_total_pagamento ?? 0,
    valor_total_produtos: composed.items?.valor_total_produtos ?? 0,
    valor_total_frete: composed.items?.valor_total_frete ?? 0,
    metodos_pagamento: composed.payments?.metodos_pagamento ?? null,
    review_score: composed.reviews?.review_score ?? null,
  };
}
