import type {
  CapRateLabel,
  CashFlowLabel,
  CashOnCashLabel,
  DealHeuristics,
  DealMetrics,
  Money,
  OnePercentRuleLabel,
  Percent,
} from "./dto";

export const CAP_RATE_STRONG_PCT = 8;
export const CAP_RATE_MODERATE_PCT = 6;
export const CASH_ON_CASH_EXCELLENT_PCT = 10;
export const CASH_ON_CASH_MODERATE_PCT = 6;
export const ONE_PERCENT_RULE_RATIO = 0.01;

export function classifyCashFlow(monthlyCashFlow: Money): CashFlowLabel {
  if (monthlyCashFlow > 0) return "positive";
  if (monthlyCashFlow === 0) return "break_even";
  return "negative";
}

export function classifyCapRate(capRatePct: Percent): CapRateLabel {
  if (capRatePct >= CAP_RATE_STRONG_PCT) return "strong";
  if (capRatePct >= CAP_RATE_MODERATE_PCT) return "moderate";
  return "low";
}

export function classifyCashOnCash(cashOnCashPct: Percent): CashOnCashLabel {
  if (cashOnCashPct >= CASH_ON_CASH_EXCELLENT_PCT) return "excellent";
  if (cashOnCashPct >= CASH_ON_CASH_MODERATE_PCT) return "moderate";
  return "low";
}

export function classifyOnePercentRule(
  monthlyRent: Money,
  purchasePrice: Money
): OnePercentRuleLabel {
  return monthlyRent >= purchasePrice * ONE_PERCENT_RULE_RATIO
    ? "meets"
    : "below";
}

/**
 * Label every metric of a computed deal
 * @param metrics Computed deal metrics
 * @param monthlyRent Monthly gross rent used for the 1% rule
 * @param purchasePrice Purchase price used for the 1% rule
 */
export function classifyDeal(
  metrics: Pick<DealMetrics, "monthlyCashFlow" | "capRatePct" | "cashOnCashPct">,
  monthlyRent: Money,
  purchasePrice: Money
): DealHeuristics {
  return {
    cashFlow: classifyCashFlow(metrics.monthlyCashFlow),
    capRate: classifyCapRate(metrics.capRatePct),
    cashOnCash: classifyCashOnCash(metrics.cashOnCashPct),
    onePercentRule: classifyOnePercentRule(monthlyRent, purchasePrice),
  };
}

type HeuristicLabel =
  | CashFlowLabel
  | CapRateLabel
  | CashOnCashLabel
  | OnePercentRuleLabel;

const DISPLAY_LABELS: Record<HeuristicLabel, string> = {
  positive: "Positive",
  break_even: "Break-even",
  negative: "Negative",
  strong: "Strong",
  moderate: "Moderate",
  low: "Low",
  excellent: "Excellent",
  meets: "Meets",
  below: "Below",
};

export function displayLabel(label: HeuristicLabel): string {
  return DISPLAY_LABELS[label];
}
