/**
 * Order Composer
 *
 * Base relation: orders ⋈ customers (inner, on customer_id). Each summary
 * stream is then left-joined on order_id. Summaries hold at most one row per
 * order, so every left join keeps the base cardinality.
 */

import type { StreamHandle } from '../relational/circuit';
import type {
  ComposedOrder,
  Customer,
  DeliveredOrder,
  ItemSummary,
  PaymentSummary,
  ReviewSummary,
} from './types';

export interface ComposerInputs {
  orders: StreamHandle<DeliveredOrder>;
  customers: StreamHandle<Customer>;
  payments: StreamHandle<PaymentSummary>;
  items: StreamHandle<ItemSummary>;
  reviews: StreamHandle<ReviewSummary>;
}

const orderIdOf = (composed: ComposedOrder) => composed.order.order_id;

export function composeOrders(inputs: ComposerInputs): StreamHandle<ComposedOrder> {
  const base = inputs.orders
    .join(inputs.customers, (o) => o.customer_id, (c) => c.customer_id, 'orders_with_customer')
    .map(
      ([order, customer]): ComposedOrder => ({ order, customer, payments: null, items: null, reviews: null }),
      undefined,
      'compose_base'
    );

  return base
    .leftJoin(inputs.payments, orderIdOf, (p) => p.order_id, 'left_join_payments')
    .map(([composed, payments]): ComposedOrder => ({ ...composed, payments }), undefined, 'compose_payments')
    .leftJoin(inputs.items, orderIdOf, (i) => i.order_id, 'left_join_items')
    .map(([composed, items]): ComposedOrder => ({ ...composed, items }), undefined, 'compose_items')
    .leftJoin(inputs.reviews, orderIdOf, (r) => r.order_id, 'left_join_reviews')
    .map(([composed, reviews]): ComposedOrder => ({ ...composed, reviews }), undefined, 'compose_reviews');
}

/** Orders whose customer_id matches no customer row */
export function ordersWithoutCustomer(
  orders: StreamHandle<DeliveredOrder>,
  customers: StreamHandle<Customer>
): StreamHandle<DeliveredOrder> {
  return orders.antiJoin(customers, (o) => o.customer_id, (c) => c.customer_id, 'orders_without_customer');
}
