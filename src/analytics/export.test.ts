import { describe, it, expect } from 'vitest';
import { csvOptionsFromConfig, toCsv } from './export';
import type { OrderAnalyticsRecord } from './types';

const record: OrderAnalyticsRecord = {
  order_id: 'A1',
  customer_unique_id: 'U1',
  order_status: 'delivered',
  customer_city: 'porto alegre',
  customer_state: 'RS',
  regiao_cliente: 'South',
  dt_compra: '2024-01-01 10:15:00',
  dt_entrega: '2024-01-10 16:40:00',
  dt_prometida: '2024-01-08 00:00:00',
  dias_para_entrega: 9,
  dias_ate_promessa: 7,
  status_entrega: 'Delayed',
  valor_total_pagamento: 40,
  valor_total_produtos: 35,
  valor_total_frete: 5,
  metodos_pagamento: 'credit_card, voucher',
  review_score: 4.5,
};

const HEADER =
  '"order_id","customer_unique_id","order_status","customer_city","customer_state","regiao_cliente",' +
  '"dt_compra","dt_entrega","dt_prometida","dias_para_entrega","dias_ate_promessa","status_entrega",' +
  '"valor_total_pagamento","valor_total_produtos","valor_total_frete","metodos_pagamento","review_score"';

describe('toCsv', () => {
  it('should write a header and one line per record', () => {
    const lines = toCsv([record]).split('\n');

    expect(lines).toEqual([
      HEADER,
      'A1,U1,delivered,porto alegre,RS,South,2024-01-01 10:15:00,2024-01-10 16:40:00,2024-01-08 00:00:00,' +
        '9,7,Delayed,40,35,5,"credit_card, voucher",4.5',
    ]);
  });

  it('should write nulls as empty fields', () => {
    const csv = toCsv([{ ...record, metodos_pagamento: null, review_score: null, valor_total_pagamento: 0 }]);
    expect(csv.split('\n')[1].endsWith(',0,35,5,,')).toBe(true);
  });

  it('should escape quotes in values', () => {
    const csv = toCsv([{ ...record, customer_city: 'vila "nova"' }]);
    expect(csv.split('\n')[1]).toContain(',"vila ""nova""",');
  });

  it('should only quote values containing the configured delimiter', () => {
    const csv = toCsv([record], { delimiter: ';' });
    expect(csv.split('\n')[1].endsWith(';credit_card, voucher;4.5')).toBe(true);
  });

  it('should take the delimiter from configuration', () => {
    const csv = toCsv([record], csvOptionsFromConfig({ CSV_DELIMITER: '\t' }));
    expect(csv.split('\n')[0].startsWith('"order_id"\t"customer_unique_id"')).toBe(true);
  });

  it('should write only the header without records', () => {
    expect(toCsv([])).toBe(HEADER);
  });
});
