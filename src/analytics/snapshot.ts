/**
 * Source snapshot parsing
 *
 * Only the columns the pipeline reads are checked; any other column is
 * stripped. Numeric columns accept numbers or numeric text, since exported
 * tables often carry amounts as strings.
 */

import { z } from 'zod';
import { SnapshotValidationError } from '../errors';
import { parseTimestamp } from './delivery-kpi';
import type { SourceSnapshot } from './types';

const id = z.string().min(1);

const numeric = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

const timestamp = z
  .string()
  .refine((value) => parseTimestamp(value) !== null, { message: 'Expected a YYYY-MM-DD[ HH:MM[:SS]] timestamp' });

const optionalTimestamp = z.union([timestamp, z.literal(''), z.null(), z.undefined()]).transform((value) => value || null);

const orderSchema = z.object({
  order_id: id,
  customer_id: id,
  order_status: z.string(),
  order_purchase_timestamp: timestamp,
  order_estimated_delivery_date: optionalTimestamp,
  order_delivered_customer_date: optionalTimestamp,
});

const customerSchema = z.object({
  customer_id: id,
  customer_unique_id: id,
  customer_city: z.string(),
  customer_state: z.string().nullable().default(null),
});

const paymentSchema = z.object({
  order_id: id,
  payment_value: numeric,
  payment_type: z.string(),
});

const orderItemSchema = z.object({
  order_id: id,
  price: numeric,
  freight_value: numeric,
});

const reviewSchema = z.object({
  order_id: id,
  review_score: numeric,
});

export const snapshotSchema = z.object({
  orders: z.array(orderSchema),
  customers: z.array(customerSchema),
  payments: z.array(paymentSchema).default([]),
  items: z.array(orderItemSchema).default([]),
  reviews: z.array(reviewSchema).default([]),
});

export function parseSnapshot(input: unknown): SourceSnapshot {
  const parsed = snapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new SnapshotValidationError(parsed.error.issues);
  }
  return parsed.data;
}
