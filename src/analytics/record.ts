/**
 * Report row derivation
 */

import { computeDeliveryKpis } from './delivery-kpi';
import { normalizeAggregates } from './normalize';
import { classifyRegion } from './region';
import type { ComposedOrder, OrderAnalyticsRecord } from './types';

/** Flatten a composed order into its report row */
export function toAnalyticsRecord(composed: ComposedOrder): OrderAnalyticsRecord {
  const { order, customer } = composed;
  const kpis = computeDeliveryKpis(order);
  const aggregates = normalizeAggregates(composed);

  return {
    order_id: order.order_id,
    customer_unique_id: customer.customer_unique_id,
    order_status: order.order_status,
    customer_city: customer.customer_city,
    customer_state: customer.customer_state,
    regiao_cliente: classifyRegion(customer.customer_state),
    dt_compra: order.order_purchase_timestamp,
    dt_entrega: order.order_delivered_customer_date,
    dt_prometida: order.order_estimated_delivery_date,
    dias_para_entrega: kpis.dias_para_entrega,
    dias_ate_promessa: kpis.dias_ate_promessa,
    status_entrega: kpis.status_entrega,
    valor_total_pagamento: aggregates.valor_total_pagamento,
    valor_total_produtos: aggregates.valor_total_produtos,
    valor_total_frete: aggregates.valor_total_frete,
    metodos_pagamento: aggregates.metodos_pagamento,
    review_score: aggregates.review_score,
  };
}
