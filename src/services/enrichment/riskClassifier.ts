import type { RiskCategory, RiskPolicy } from './types.js';

export const RISK_ORDER: readonly RiskCategory[] = ['MINIMAL', 'LOW', 'MODERATE', 'HIGH', 'EXTREME'];

type Threshold = { category: Exclude<RiskCategory, 'MINIMAL'>; min: number; inclusive: boolean };

const THRESHOLDS: Record<RiskPolicy, Threshold[]> = {
  bounded10: [
    { category: 'EXTREME', min: 8, inclusive: true },
    { category: 'HIGH', min: 6, inclusive: true },
    { category: 'MODERATE', min: 4, inclusive: true },
    { category: 'LOW', min: 2, inclusive: true }
  ],
  zscore: [
    { category: 'EXTREME', min: 3, inclusive: false },
    { category: 'HIGH', min: 2, inclusive: false },
    { category: 'MODERATE', min: 1, inclusive: false },
    { category: 'LOW', min: 0.5, inclusive: false }
  ]
};

export function categorizeRisk(score: number, policy: RiskPolicy): RiskCategory {
  for (const threshold of THRESHOLDS[policy]) {
    const hit = threshold.inclusive ? score >= threshold.min : score > threshold.min;
    if (hit) {
      return threshold.category;
    }
  }
  return 'MINIMAL';
}

export function compareRisk(a: RiskCategory, b: RiskCategory) {
  return RISK_ORDER.indexOf(a) - RISK_ORDER.indexOf(b);
}
