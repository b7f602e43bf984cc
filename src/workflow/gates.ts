import type { GateDeclaration } from './schema.js';

export type GateMetrics = Record<string, number>;

export interface GateResult {
  metric: string;
  passed: boolean;
  actual: number | null;
  threshold: number | null;
  message: string;
}

/**
 * Check each gate against the run metrics. A gate on a metric the run did not
 * produce counts as failed.
 */
export function checkGates(metrics: GateMetrics, gates: GateDeclaration[]): GateResult[] {
  return gates.map((gate) => {
    const actual = metrics[gate.metric];
    if (actual === undefined) {
      return {
        metric: gate.metric,
        passed: false,
        actual: null,
        threshold: gate.max ?? gate.min ?? null,
        message: `Metric '${gate.metric}' not found in execution metrics`,
      };
    }
    if (gate.max !== undefined && actual > gate.max) {
      return {
        metric: gate.metric,
        passed: false,
        actual,
        threshold: gate.max,
        message: `Value ${actual} exceeds maximum ${gate.max}`,
      };
    }
    if (gate.min !== undefined && actual < gate.min) {
      return {
        metric: gate.metric,
        passed: false,
        actual,
        threshold: gate.min,
        message: `Value ${actual} below minimum ${gate.min}`,
      };
    }
    return { metric: gate.metric, passed: true, actual, threshold: gate.max ?? gate.min ?? null, message: 'Passed' };
  });
}
