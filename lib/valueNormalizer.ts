import type { MetricCatalog } from "./metricCatalog";
import { evaluateFormula, FormulaEvaluationError, type FormulaContext } from "./formulaEvaluator";
import type { Logger } from "./logger";

export type NormalizedValue = {
  value: number;
  /** True when the derivation formula produced the value. */
  calculated: boolean;
};

export type ValueNormalizer = {
  normalize(rawValue: number, canonicalName: string, context: FormulaContext): NormalizedValue;
};

/**
 * Applies a metric's derivation formula when it has one. Formula failures
 * (missing input, zero denominator, malformed text) fall back to the raw value.
 */
export function createValueNormalizer(catalog: MetricCatalog, logger: Logger): ValueNormalizer {
  return {
    normalize(rawValue, canonicalName, context) {
      const formula = catalog.get(canonicalName)?.derivationFormula;
      if (!formula) return { value: rawValue, calculated: false };
      try {
        return { value: evaluateFormula(formula, context), calculated: true };
      } catch (err) {
        if (!(err instanceof FormulaEvaluationError)) throw err;
        logger.warn("formula fallback to raw value", {
          metric: canonicalName,
          reason: err.reason,
          message: err.message,
        });
        return { value: rawValue, calculated: false };
      }
    },
  };
}
