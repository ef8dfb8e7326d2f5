/**
 * Threshold evaluation.
 *
 * @module alerting/thresholdEvaluator
 */

/**
 * True iff `value` is at or over `threshold`. Total over finite numbers;
 * out-of-range inputs are evaluated as given; range checks happen when
 * configuration is loaded.
 */
export function exceeds(value: number, threshold: number): boolean {
  return value >= threshold;
}
