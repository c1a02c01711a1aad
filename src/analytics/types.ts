/**
 * Order analytics row types
 *
 * Source rows keep the column names of the transactional tables; output rows
 * keep the column names the reporting layer imports.
 */

/** Text timestamp, `YYYY-MM-DD[ HH:MM[:SS]]` */
export type Timestamp = string;

export interface Order {
  order_id: string;
  customer_id: string;
  order_status: string;
  order_purchase_timestamp: Timestamp;
  order_estimated_delivery_date: Timestamp | null;
  order_delivered_customer_date: Timestamp | null;
}

/** An order that passed the qualification filter */
export interface DeliveredOrder extends Order {
  order_status: 'delivered';
  order_delivered_customer_date: Timestamp;
}

export interface Customer {
  customer_id: string;
  customer_unique_id: string;
  customer_city: string;
  customer_state: string | null;
}

export interface Payment {
  order_id: string;
  payment_value: number;
  payment_type: string;
}

export interface OrderItem {
  order_id: string;
  price: number;
  freight_value: number;
}

export interface Review {
  order_id: string;
  review_score: number;
}

/** Read-only snapshot of the five source tables for one run */
export interface SourceSnapshot {
  orders: Order[];
  customers: Customer[];
  payments: Payment[];
  items: OrderItem[];
  reviews: Review[];
}

// ============ AGGREGATOR OUTPUTS (one row per order_id) ============

export interface PaymentSummary {
  order_id: string;
  valor_total_pagamento: number;
  metodos_pagamento: string;
}

export interface ItemSummary {
  order_id: string;
  valor_total_produtos: number;
  valor_total_frete: number;
}

export interface ReviewSummary {
  order_id: string;
  review_score: number | null;
}

/**
 * One base order with its left-joined summaries. A null summary means the
 * order had no rows in that child table.
 */
export interface ComposedOrder {
  order: DeliveredOrder;
  customer: Customer;
  payments: PaymentSummary | null;
  items: ItemSummary | null;
  reviews: ReviewSummary | null;
}

export type RegionLabel = 'Southeast' | 'South' | 'Northeast' | 'Midwest' | 'North' | 'Other';

export type DeliveryStatus = 'Delayed' | 'On Time';

export interface DeliveryKpis {
  dias_para_entrega: number | null;
  dias_ate_promessa: number | null;
  status_entrega: DeliveryStatus;
}

export interface OrderAnalyticsRecord {
  order_id: string;
  customer_unique_id: string;
  order_status: string;
  customer_city: string;
  customer_state: string | null;
  regiao_cliente: RegionLabel;
  dt_compra: Timestamp;
  dt_entrega: Timestamp;
  dt_prometida: Timestamp | null;
  dias_para_entrega: number | null;
  dias_ate_promessa: number | null;
  status_entrega: DeliveryStatus;
  valor_total_pagamento: number;
  valor_total_produtos: number;
  valor_total_frete: number;
  metodos_pagamento: string | null;
  review_score: number | null;
}

/** Output columns in report order */
export const OUTPUT_COLUMNS = [
  'order_id',
  'customer_unique_id',
  'order_status',
  'customer_city',
  'customer_state',
  'regiao_cliente',
  'dt_compra',
  'dt_entrega',
  'dt_prometida',
  'dias_para_entrega',
  'dias_ate_promessa',
  'status_entrega',
  'valor_total_pagamento',
  'valor_total_produtos',
  'valor_total_frete',
  'metodos_pagamento',
  'review_score',
] as const satisfies readonly (keyof OrderAnalyticsRecord)[];
