/**
 * Region classifier: maps a customer state code to a macro-region label
 */

import type { RegionLabel } from './types';

export interface RegionRule {
  label: Exclude<RegionLabel, 'Other'>;
  states: ReadonlySet<string>;
}

/** Evaluated in order, first match wins */
export const REGION_RULES: readonly RegionRule[] = [
  { label: 'Southeast', states: new Set(['SP', 'RJ', 'MG', 'ES']) },
  { label: 'South', states: new Set(['PR', 'SC', 'RS']) },
  { label: 'Northeast', states: new Set(['BA', 'SE', 'AL', 'PE', 'PB', 'RN', 'CE', 'PI', 'MA']) },
  { label: 'Midwest', states: new Set(['MT', 'MS', 'GO', 'DF']) },
  { label: 'North', states: new Set(['AM', 'RR', 'AP', 'PA', 'TO', 'RO', 'AC']) },
];

export const FALLBACK_REGION: RegionLabel = 'Other';

/**
 * Map a customer state code to its region. Codes are matched exactly;
 * null and unknown codes fall back to "Other".
 */
export function classifyRegion(
  state: string | null | undefined,
  rules: readonly RegionRule[] = REGION_RULES
): RegionLabel {
  if (state == null) return FALLBACK_REGION;
  return rules.find((rule) => rule.states.has(state))?.label ?? FALLBACK_REGION;
}
