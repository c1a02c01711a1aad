/**
 * Qualification filter for the report
 */

import type { DeliveredOrder, Order } from './types';

export const QUALIFYING_STATUS = 'delivered';

/**
 * An order qualifies for the report once it is delivered and carries its
 * actual delivery date. Only base-order fields are read, so the predicate
 * can run before composition without changing the result.
 */
export function isQualifyingOrder(order: Order): order is DeliveredOrder {
  return order.order_status === QUALIFYING_STATUS && order.order_delivered_customer_date != null;
}
