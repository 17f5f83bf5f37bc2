import { test } from 'node:test';
import assert from 'node:assert/strict';
import { categorizeRisk, compareRisk, RISK_ORDER } from '../src/services/enrichment/riskClassifier.js';

test('Risk classification', async (t) => {
  await t.test('bounded10 thresholds are inclusive', () => {
    assert.equal(categorizeRisk(10, 'bounded10'), 'EXTREME');
    assert.equal(categorizeRisk(8, 'bounded10'), 'EXTREME');
    assert.equal(categorizeRisk(6, 'bounded10'), 'HIGH');
    assert.equal(categorizeRisk(5.9, 'bounded10'), 'MODERATE');
    assert.equal(categorizeRisk(2, 'bounded10'), 'LOW');
    assert.equal(categorizeRisk(1.9, 'bounded10'), 'MINIMAL');
  });

  await t.test('zscore thresholds are exclusive', () => {
    assert.equal(categorizeRisk(3.01, 'zscore'), 'EXTREME');
    assert.equal(categorizeRisk(3, 'zscore'), 'HIGH');
    assert.equal(categorizeRisk(1.5, 'zscore'), 'MODERATE');
    assert.equal(categorizeRisk(0.6, 'zscore'), 'LOW');
    assert.equal(categorizeRisk(0.5, 'zscore'), 'MINIMAL');
    assert.equal(categorizeRisk(0, 'zscore'), 'MINIMAL');
  });

  await t.test('categories are ordered', () => {
    assert.deepEqual(RISK_ORDER, ['MINIMAL', 'LOW', 'MODERATE', 'HIGH', 'EXTREME']);
    assert.ok(compareRisk('HIGH', 'LOW') > 0);
    assert.ok(compareRisk('LOW', 'EXTREME') < 0);
    assert.equal(compareRisk('MODERATE', 'MODERATE'), 0);
  });

  await t.test('a higher score never lowers the category', () => {
    for (const policy of ['bounded10', 'zscore'] as const) {
      let previous = categorizeRisk(-1, policy);
      for (let step = 0; step <= 120; step += 1) {
        const score = step / 10;
        const category = categorizeRisk(score, policy);
        assert.ok(compareRisk(category, previous) >= 0, `${policy}: ${score} -> ${category} after ${previous}`);
        previous = category;
      }
      assert.equal(previous, 'EXTREME');
    }
  });
});
