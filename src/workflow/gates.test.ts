import { describe, expect, it } from 'vitest';
import { checkGates } from './gates.js';

describe('checkGates', () => {
  const metrics = { cost_usd: 0.12, total_calls: 4 };

  it('passes gates within their bounds', () => {
    expect(checkGates(metrics, [{ metric: 'cost_usd', max: 0.5 }])).toEqual([
      { metric: 'cost_usd', passed: true, actual: 0.12, threshold: 0.5, message: 'Passed' },
    ]);
  });

  it('fails a maximum or a minimum breach', () => {
    const [overMax, underMin] = checkGates(metrics, [
      { metric: 'cost_usd', max: 0.1 },
      { metric: 'total_calls', min: 5 },
    ]);

    expect(overMax?.message).toBe('Value 0.12 exceeds maximum 0.1');
    expect(underMin?.message).toBe('Value 4 below minimum 5');
    expect([overMax?.passed, underMin?.passed]).toEqual([false, false]);
  });

  it('fails a gate on a metric the run did not produce', () => {
    expect(checkGates(metrics, [{ metric: 'accuracy', min: 0.9 }])[0]).toEqual({
      metric: 'accuracy',
      passed: false,
      actual: null,
      threshold: 0.9,
      message: "Metric 'accuracy' not found in execution metrics",
    });
  });
});
