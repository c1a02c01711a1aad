/**
 * Order analytics pipeline
 *
 *   payments ─ aggregate ─┐
 *   items ──── aggregate ─┤
 *   reviews ── aggregate ─┤
 *   orders ─ qualify ─ ⋈ customers ─ ⟕ summaries ─ derive ─ records
 *
 * The three aggregations are independent of each other. The circuit runs
 * each of them to completion before the composer reads it.
 */

import { Circuit, type InputHandle, type StreamHandle } from '../relational/circuit';
import type { Config } from '../config';
import { MissingCustomerError } from '../errors';
import { getLogger, type Logger } from '../logger';
import { DEFAULT_PAYMENT_METHOD_SEPARATOR, summarizeItems, summarizePayments, summarizeReviews } from './aggregators';
import { composeOrders, ordersWithoutCustomer } from './composer';
import { isQualifyingOrder } from './qualification';
import { toAnalyticsRecord } from './record';
import type {
  Customer,
  DeliveredOrder,
  Order,
  OrderAnalyticsRecord,
  OrderItem,
  Payment,
  Review,
  SourceSnapshot,
} from './types';

export type MissingCustomerPolicy = 'exclude' | 'fail';

export interface PipelineOptions {
  /** Joins the distinct payment method labels (default ", ") */
  paymentMethodSeparator?: string;
  /** What to do with qualifying orders that have no customer (default "exclude") */
  missingCustomerPolicy?: MissingCustomerPolicy;
  /** Log each operator's output size */
  debug?: boolean;
  logger?: Logger;
}

export interface OrderAnalyticsCircuit {
  circuit: Circuit;
  inputs: {
    orders: InputHandle<Order>;
    customers: InputHandle<Customer>;
    payments: InputHandle<Payment>;
    items: InputHandle<OrderItem>;
    reviews: InputHandle<Review>;
  };
  qualified: StreamHandle<DeliveredOrder>;
  withoutCustomer: StreamHandle<DeliveredOrder>;
  records: StreamHandle<OrderAnalyticsRecord>;
}

export function buildOrderAnalyticsCircuit(options: PipelineOptions = {}): OrderAnalyticsCircuit {
  const separator = options.paymentMethodSeparator ?? DEFAULT_PAYMENT_METHOD_SEPARATOR;
  const policy = options.missingCustomerPolicy ?? 'exclude';
  const circuit = new Circuit({ debug: options.debug, logger: options.logger ?? getLogger() });

  const inputs = {
    orders: circuit.input<Order>('orders'),
    customers: circuit.input<Customer>('customers'),
    payments: circuit.input<Payment>('payments'),
    items: circuit.input<OrderItem>('items'),
    reviews: circuit.input<Review>('reviews'),
  };

  const paymentSummaries = inputs.payments.aggregate(
    (p) => p.order_id,
    (orderId, rows) => summarizePayments(orderId, rows, separator),
    'aggregate_payments'
  );
  const itemSummaries = inputs.items.aggregate((i) => i.order_id, summarizeItems, 'aggregate_items');
  const reviewSummaries = inputs.reviews.aggregate((r) => r.order_id, summarizeReviews, 'aggregate_reviews');

  const qualified = inputs.orders.narrow(isQualifyingOrder, 'qualify_orders');
  const withoutCustomer = ordersWithoutCustomer(qualified, inputs.customers);

  if (policy === 'fail') {
    withoutCustomer.output((orphans) => {
      if (orphans.isZero()) return;
      const orderIds = orphans.values().map((o) => o.order_id).sort();
      throw new MissingCustomerError(orderIds);
    });
  }

  const composed = composeOrders({
    orders: qualified,
    customers: inputs.customers,
    payments: paymentSummaries,
    items: itemSummaries,
    reviews: reviewSummaries,
  });

  const records = composed.map(toAnalyticsRecord, undefined, 'derive_records');

  return { circuit, inputs, qualified, withoutCustomer, records };
}

function byOrderId(a: OrderAnalyticsRecord, b: OrderAnalyticsRecord): number {
  if (a.order_id < b.order_id) return -1;
  if (a.order_id > b.order_id) return 1;
  return 0;
}

/**
 * Run the pipeline once over a snapshot. Returns one record per qualifying
 * order, sorted by order_id.
 */
export function runOrderAnalytics(snapshot: SourceSnapshot, options: PipelineOptions = {}): OrderAnalyticsRecord[] {
  const logger = options.logger ?? getLogger();
  const { circuit, inputs, qualified, withoutCustomer, records } = buildOrderAnalyticsCircuit({ ...options, logger });

  let output: OrderAnalyticsRecord[] = [];
  let qualifiedCount = 0;
  let excludedCount = 0;
  records.output((rows) => {
    output = rows.toArray();
  });
  qualified.output((rows) => {
    qualifiedCount = rows.count();
  });
  withoutCustomer.output((rows) => {
    excludedCount = rows.count();
  });

  inputs.orders.feed(snapshot.orders);
  inputs.customers.feed(snapshot.customers);
  inputs.payments.feed(snapshot.payments);
  inputs.items.feed(snapshot.items);
  inputs.reviews.feed(snapshot.reviews);
  circuit.step();

  if (excludedCount > 0) {
    logger.debug({ excluded: excludedCount }, 'orders without customer excluded');
  }
  logger.info(
    {
      orders: snapshot.orders.length,
      customers: snapshot.customers.length,
      payments: snapshot.payments.length,
      items: snapshot.items.length,
      reviews: snapshot.reviews.length,
      qualified: qualifiedCount,
      excluded: excludedCount,
      records: output.length,
    },
    'order analytics run finished'
  );

  return output.sort(byOrderId);
}

export function pipelineOptionsFromConfig(config: Config, logger?: Logger): PipelineOptions {
  return {
    paymentMethodSeparator: config.PAYMENT_METHOD_SEPARATOR,
    missingCustomerPolicy: config.MISSING_CUSTOMER_POLICY,
    debug: config.ANALYTICS_DEBUG,
    logger,
  };
}
