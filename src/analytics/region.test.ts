import { describe, it, expect } from 'vitest';
import { classifyRegion, REGION_RULES, type RegionRule } from './region';

describe('classifyRegion', () => {
  it.each([
    ['SP', 'Southeast'],
    ['RJ', 'Southeast'],
    ['MG', 'Southeast'],
    ['ES', 'Southeast'],
    ['PR', 'South'],
    ['SC', 'South'],
    ['RS', 'South'],
    ['BA', 'Northeast'],
    ['MA', 'Northeast'],
    ['CE', 'Northeast'],
    ['MT', 'Midwest'],
    ['DF', 'Midwest'],
    ['AM', 'North'],
    ['AC', 'North'],
    ['TO', 'North'],
  ])('should map %s to %s', (state, region) => {
    expect(classifyRegion(state)).toBe(region);
  });

  it('should cover all 27 federative units', () => {
    const states = REGION_RULES.flatMap((rule) => [...rule.states]);
    expect(new Set(states).size).toBe(27);
  });

  it('should fall back to Other for unknown, blank and absent codes', () => {
    expect(classifyRegion('XX')).toBe('Other');
    expect(classifyRegion('')).toBe('Other');
    expect(classifyRegion(null)).toBe('Other');
    expect(classifyRegion(undefined)).toBe('Other');
  });

  it('should match codes exactly', () => {
    expect(classifyRegion('sp')).toBe('Other');
    expect(classifyRegion(' SP')).toBe('Other');
  });

  it('should take the first matching rule', () => {
    const rules: RegionRule[] = [
      { label: 'North', states: new Set(['SP']) },
      { label: 'Southeast', states: new Set(['SP']) },
    ];
    expect(classifyRegion('SP', rules)).toBe('North');
  });
});
