import { describe, expect, it } from 'vitest';
import { computeThreshold, DEFAULT_THRESHOLD_CONFIG, filterWeight } from '../src/search/threshold';
import { FilterSet } from '../src/types';

const almaty = { value: 'Алматы', category: 'city', normalized: true } as const;
const silver = { value: 'silver', category: 'color', normalized: true } as const;

describe('filterWeight', () => {
  it('counts each narrowing filter once', () => {
    expect(filterWeight({})).toBe(0);
    expect(filterWeight({ model: 'Toyota Camry', city: almaty, price: { max: 5_000_000 } })).toBe(3);
    expect(filterWeight({ mileage: { min: 0, max: 50_000 } })).toBe(1);
  });

  it('ignores a year preference and empty ranges', () => {
    expect(filterWeight({ year: { kind: 'preference', value: 'newest' }, price: {} })).toBe(0);
    expect(filterWeight({ year: { kind: 'exact', value: 2018 } })).toBe(1);
  });
});

describe('computeThreshold', () => {
  it('uses the base cutoff without filters', () => {
    expect(computeThreshold({})).toBe(0.4);
  });

  it('lowers the cutoff by one step per filter', () => {
    expect(computeThreshold({ model: 'Toyota Camry' })).toBe(0.35);
    expect(computeThreshold({ model: 'Toyota Camry', city: almaty, price: { max: 5_000_000 } })).toBe(0.25);
  });

  it('never goes below the floor', () => {
    const four: FilterSet = { model: 'Toyota Camry', city: almaty, color: silver, price: { max: 5_000_000 } };
    const seven: FilterSet = {
      ...four,
      mileage: { max: 100_000 },
      engine: '2.5 (бензин)',
      year: { kind: 'exact', value: 2018 },
    };
    expect(computeThreshold(four)).toBe(0.2);
    expect(computeThreshold(seven)).toBe(0.2);
  });

  it('never rises when a filter is added', () => {
    const steps: FilterSet[] = [
      {},
      { model: 'Toyota Camry' },
      { model: 'Toyota Camry', city: almaty },
      { model: 'Toyota Camry', city: almaty, color: silver },
      { model: 'Toyota Camry', city: almaty, color: silver, engine: '2.5 (бензин)' },
      { model: 'Toyota Camry', city: almaty, color: silver, engine: '2.5 (бензин)', mileage: { max: 1 } },
    ];
    const thresholds = steps.map(filters => computeThreshold(filters));
    for (let i = 1; i < thresholds.length; i++) {
      expect(thresholds[i]).toBeLessThanOrEqual(thresholds[i - 1]);
    }
  });

  it('stays strictly between 0 and 1 for any configuration', () => {
    const configs = [
      DEFAULT_THRESHOLD_CONFIG,
      { base: 5, step: 1, floor: -3 },
      { base: 0.1, step: 0.5, floor: 0 },
    ];
    for (const config of configs) {
      for (const filters of [{}, { model: 'x', city: almaty, color: silver }]) {
        const value = computeThreshold(filters, config);
        expect(value).toBeGreaterThan(0);
        expect(value).toBeLessThan(1);
      }
    }
  });

  it('honours a custom configuration', () => {
    expect(computeThreshold({ model: 'Lexus RX' }, { base: 0.5, step: 0.1, floor: 0.3 })).toBe(0.4);
  });
});
