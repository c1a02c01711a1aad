import { describe, it, expect } from 'vitest';
import { SnapshotValidationError } from '../errors';
import { parseSnapshot } from './snapshot';

const order = {
  order_id: 'A1',
  customer_id: 'C1',
  order_status: 'delivered',
  order_purchase_timestamp: '2024-01-01 10:15:00',
  order_estimated_delivery_date: '2024-01-08 00:00:00',
  order_delivered_customer_date: '2024-01-10 16:40:00',
};

const customer = {
  customer_id: 'C1',
  customer_unique_id: 'U1',
  customer_city: 'porto alegre',
  customer_state: 'RS',
};

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('parseSnapshot', () => {
  it('should keep only the columns the pipeline reads', () => {
    const snapshot = parseSnapshot({
      orders: [{ ...order, order_approved_at: '2024-01-01 11:00:00' }],
      customers: [{ ...customer, customer_zip_code_prefix: '90000' }],
    });

    expect(snapshot.orders).toEqual([order]);
    expect(snapshot.customers).toEqual([customer]);
  });

  it('should default missing child tables to empty', () => {
    const snapshot = parseSnapshot({ orders: [order], customers: [customer] });

    expect(snapshot.payments).toEqual([]);
    expect(snapshot.items).toEqual([]);
    expect(snapshot.reviews).toEqual([]);
  });

  it('should read numeric text as numbers', () => {
    const snapshot = parseSnapshot({
      orders: [],
      customers: [],
      payments: [{ order_id: 'A1', payment_value: '30.50', payment_type: 'credit_card' }],
      items: [{ order_id: 'A1', price: '35', freight_value: 5 }],
      reviews: [{ order_id: 'A1', review_score: '4' }],
    });

    expect(snapshot.payments).toEqual([{ order_id: 'A1', payment_value: 30.5, payment_type: 'credit_card' }]);
    expect(snapshot.items).toEqual([{ order_id: 'A1', price: 35, freight_value: 5 }]);
    expect(snapshot.reviews).toEqual([{ order_id: 'A1', review_score: 4 }]);
  });

  it('should read blank or missing dates as absent', () => {
    const snapshot = parseSnapshot({
      orders: [{ ...order, order_delivered_customer_date: '', order_estimated_delivery_date: undefined }],
      customers: [],
    });

    expect(snapshot.orders[0].order_delivered_customer_date).toBeNull();
    expect(snapshot.orders[0].order_estimated_delivery_date).toBeNull();
  });

  it('should reject a non-numeric score', () => {
    const error = catchError(() =>
      parseSnapshot({ orders: [], customers: [], reviews: [{ order_id: 'A1', review_score: 'great' }] })
    );

    expect(error).toBeInstanceOf(SnapshotValidationError);
    expect(error).toMatchObject({ code: 'SNAPSHOT_INVALID' });
    expect(error instanceof SnapshotValidationError && error.issues[0].path).toEqual(['reviews', 0, 'review_score']);
  });

  it('should reject an impossible timestamp', () => {
    const error = catchError(() =>
      parseSnapshot({ orders: [{ ...order, order_purchase_timestamp: '2024-13-01 00:00:00' }], customers: [] })
    );

    expect(error instanceof SnapshotValidationError && error.issues[0]).toMatchObject({
      path: ['orders', 0, 'order_purchase_timestamp'],
      message: 'Expected a YYYY-MM-DD[ HH:MM[:SS]] timestamp',
    });
  });
});
