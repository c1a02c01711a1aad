/**
 * Per-entity aggregator tests
 *
 * Every aggregator must emit at most one row per order_id, and none for an
 * order without child rows.
 */

import { describe, it, expect } from 'vitest';
import { aggregateItems, aggregatePayments, aggregateReviews } from './aggregators';
import type { Payment } from './types';

describe('aggregatePayments', () => {
  const payments: Payment[] = [
    { order_id: 'A1', payment_value: 30, payment_type: 'credit_card' },
    { order_id: 'A1', payment_value: 10, payment_type: 'voucher' },
    { order_id: 'A1', payment_value: 5, payment_type: 'credit_card' },
    { order_id: 'B1', payment_value: 7.5, payment_type: 'boleto' },
  ];

  it('should emit one summary per order', () => {
    const summaries = aggregatePayments(payments);

    expect(summaries).toEqual([
      { order_id: 'A1', valor_total_pagamento: 45, metodos_pagamento: 'credit_card, voucher' },
      { order_id: 'B1', valor_total_pagamento: 7.5, metodos_pagamento: 'boleto' },
    ]);
  });

  it('should list each method once whatever the row order', () => {
    const reversed = aggregatePayments([...payments].reverse());
    const a1 = reversed.find((s) => s.order_id === 'A1');

    expect(a1?.metodos_pagamento).toBe('credit_card, voucher');
  });

  it('should count identical payment rows separately', () => {
    const summaries = aggregatePayments([
      { order_id: 'A2', payment_value: 10, payment_type: 'voucher' },
      { order_id: 'A2', payment_value: 10, payment_type: 'voucher' },
    ]);

    expect(summaries).toEqual([{ order_id: 'A2', valor_total_pagamento: 20, metodos_pagamento: 'voucher' }]);
  });

  it('should keep sub-cent precision in the total', () => {
    const summaries = aggregatePayments([
      { order_id: 'A3', payment_value: 0.004, payment_type: 'voucher' },
      { order_id: 'A3', payment_value: 0.004, payment_type: 'voucher' },
    ]);

    expect(summaries[0].valor_total_pagamento).toBe(0.008);
  });

  it('should join methods with a custom separator', () => {
    const summaries = aggregatePayments(payments, ' | ');
    expect(summaries[0].metodos_pagamento).toBe('credit_card | voucher');
  });

  it('should emit nothing without payments', () => {
    expect(aggregatePayments([])).toEqual([]);
  });
});

describe('aggregateItems', () => {
  it('should sum price and freight per order', () => {
    const summaries = aggregateItems([
      { order_id: 'A1', price: 20, freight_value: 3 },
      { order_id: 'A1', price: 15, freight_value: 2 },
      { order_id: 'B1', price: 100, freight_value: 12.5 },
    ]);

    expect(summaries).toEqual([
      { order_id: 'A1', valor_total_produtos: 35, valor_total_frete: 5 },
      { order_id: 'B1', valor_total_produtos: 100, valor_total_frete: 12.5 },
    ]);
  });
});

describe('aggregateReviews', () => {
  it('should average scores per order', () => {
    const summaries = aggregateReviews([
      { order_id: 'A1', review_score: 4 },
      { order_id: 'A1', review_score: 5 },
      { order_id: 'B1', review_score: 1 },
    ]);

    expect(summaries).toEqual([
      { order_id: 'A1', review_score: 4.5 },
      { order_id: 'B1', review_score: 1 },
    ]);
  });

  it('should weight repeated identical reviews', () => {
    const summaries = aggregateReviews([
      { order_id: 'A1', review_score: 5 },
      { order_id: 'A1', review_score: 5 },
      { order_id: 'A1', review_score: 2 },
    ]);

    expect(summaries).toEqual([{ order_id: 'A1', review_score: 4 }]);
  });

  it('should emit no row, not a zero score, without reviews', () => {
    expect(aggregateReviews([])).toEqual([]);
  });
});
