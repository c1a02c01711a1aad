/**
 * Delivery KPIs: lead times in calendar days and the delay status
 *
 * Timestamps are wall-clock text without a zone, so they are read as UTC
 * fields; no local offset or DST shift can move a date across midnight.
 */

import type { DeliveredOrder, DeliveryKpis, DeliveryStatus, Timestamp } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?)?$/;

export interface ParsedTimestamp {
  /** Milliseconds since the epoch, reading the fields as UTC */
  instant: number;
  /** Days since the epoch of the date part alone */
  day: number;
}

/** Epoch millis of a UTC date; setUTCFullYear keeps years 0-99 literal */
function utcDate(year: number, monthIndex: number, day: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date.getTime();
}

function daysInMonth(year: number, month: number): number {
  return new Date(utcDate(year, month, 0)).getUTCDate();
}

/** Parse a source timestamp; null when absent or not a real date/time */
export function parseTimestamp(value: Timestamp | null | undefined): ParsedTimestamp | null {
  if (value == null) return null;
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '0'] = match;
  const year = Number(y);
  const month = Number(mo);
  const dayOfMonth = Number(d);
  const hours = Number(h);
  const minutes = Number(mi);
  const seconds = Number(s);

  if (month < 1 || month > 12) return null;
  if (dayOfMonth < 1 || dayOfMonth > daysInMonth(year, month)) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  const millis = Math.floor(Number(`0.${frac}`) * 1000);
  const dayStart = utcDate(year, month - 1, dayOfMonth);
  return {
    instant: dayStart + ((hours * 60 + minutes) * 60 + seconds) * 1000 + millis,
    day: Math.round(dayStart / DAY_MS),
  };
}

/**
 * Calendar-day difference `later - earlier`. Time of day is dropped before
 * subtracting, so 23:59 to 00:01 the next day is 1 day. Null when either
 * side is absent or unparseable.
 */
export function calendarDaysBetween(
  later: Timestamp | null | undefined,
  earlier: Timestamp | null | undefined
): number | null {
  const a = parseTimestamp(later);
  const b = parseTimestamp(earlier);
  if (!a || !b) return null;
  return a.day - b.day;
}

/** "Delayed" iff delivered strictly after the estimate; no estimate is "On Time" */
export function deliveryStatus(
  delivered: Timestamp | null | undefined,
  estimated: Timestamp | null | undefined
): DeliveryStatus {
  const actual = parseTimestamp(delivered);
  const promised = parseTimestamp(estimated);
  if (!actual || !promised) return 'On Time';
  return actual.instant > promised.instant ? 'Delayed' : 'On Time';
}

export function computeDeliveryKpis(order: DeliveredOrder): DeliveryKpis {
  return {
    dias_para_entrega: calendarDaysBetween(order.order_delivered_customer_date, order.order_purchase_timestamp),
    dias_ate_promessa: calendarDaysBetween(order.order_estimated_delivery_date, order.order_purchase_timestamp),
    status_entrega: deliveryStatus(order.order_delivered_customer_date, order.order_estimated_delivery_date),
  };
}
