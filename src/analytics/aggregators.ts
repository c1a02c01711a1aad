/**
 * Per-entity aggregators
 *
 * Each child table is reduced to at most one summary row per order_id
 * BEFORE it meets the order relation. Joining the raw 1:N rows first would
 * repeat the order once per child row and multiply every monetary sum.
 */

import { ZSet } from '../relational/zset';
import { averageOf, distinctOf, groupBy, sumOf } from '../relational/operators';
import type { ItemSummary, OrderItem, Payment, PaymentSummary, Review, ReviewSummary } from './types';

export const DEFAULT_PAYMENT_METHOD_SEPARATOR = ', ';

export function summarizePayments(
  orderId: string,
  rows: ZSet<Payment>,
  separator: string = DEFAULT_PAYMENT_METHOD_SEPARATOR
): PaymentSummary {
  return {
    order_id: orderId,
    valor_total_pagamento: sumOf(rows, (p) => p.payment_value),
    metodos_pagamento: distinctOf(rows, (p) => p.payment_type).join(separator),
  };
}

export function summarizeItems(orderId: string, rows: ZSet<OrderItem>): ItemSummary {
  return {
    order_id: orderId,
    valor_total_produtos: sumOf(rows, (i) => i.price),
    valor_total_frete: sumOf(rows, (i) => i.freight_value),
  };
}

export function summarizeReviews(orderId: string, rows: ZSet<Review>): ReviewSummary {
  return {
    order_id: orderId,
    review_score: averageOf(rows, (r) => r.review_score),
  };
}

function aggregateBy<T extends { order_id: string }, R>(
  rows: T[],
  reduce: (orderId: string, group: ZSet<T>) => R
): R[] {
  return groupBy(ZSet.fromValues(rows), (row) => row.order_id).map(({ key, rows: group }) => reduce(key, group));
}

export function aggregatePayments(
  payments: Payment[],
  separator: string = DEFAULT_PAYMENT_METHOD_SEPARATOR
): PaymentSummary[] {
  return aggregateBy(payments, (orderId, group) => summarizePayments(orderId, group, separator));
}

export function aggregateItems(items: OrderItem[]): ItemSummary[] {
  return aggregateBy(items, summarizeItems);
}

export function aggregateReviews(reviews: Review[]): ReviewSummary[] {
  return aggregateBy(reviews, summarizeReviews);
}
