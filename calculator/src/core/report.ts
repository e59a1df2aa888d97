import type {
  CalculationModel,
  DealAnalysis,
  DealInputs,
  ISO,
} from "./dto";
import { formatCurrency, formatPercent, formatRatio } from "./format";
import { displayLabel } from "./heuristics";
import type { ReportRendererPort } from "./ports";

export interface ReportRow {
  label: string;
  value: string;
}

export interface DealReport {
  title: string;
  generatedAt: ISO;
  model: CalculationModel;
  propertyDetails: ReportRow[];
  financialAnalysis: ReportRow[];
  heuristics: ReportRow[];
  notes?: string;
}

export interface DealReportInput {
  title?: string;
  inputs: DealInputs;
  analysis: DealAnalysis;
  notes?: string;
  generatedAt?: Date;
}

export type ReportResult =
  | { ok: true; bytes: Uint8Array; filename: string; report: DealReport }
  | { ok: false; error: string };

export const DEFAULT_REPORT_TITLE = "Deal Analysis Report";

const MODEL_NAMES: Record<CalculationModel, string> = {
  house_hack: "House-Hack",
  whole_unit: "Whole Unit",
};

export function modelDisplayName(model: CalculationModel): string {
  return MODEL_NAMES[model];
}

/**
 * Check that every number feeding the report is finite
 * @returns The first offending field path, or null when the payload is sound
 */
export function findMalformedField(input: DealReportInput): string | null {
  const groups: Array<[string, object]> = [
    ["financing", input.inputs.financing],
    ["operations", input.inputs.operations],
    ["metrics", input.analysis.metrics],
    ["ratios", input.analysis.ratios],
  ];
  if (input.analysis.houseHack) {
    groups.push(["houseHack", input.analysis.houseHack]);
  }

  for (const [group, values] of groups) {
    for (const [key, value] of Object.entries(values)) {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return `${group}.${key}`;
      }
    }
  }
  return null;
}

/**
 * Lay out the fixed report tables from the inputs and computed analysis
 */
export function buildDealReport(input: DealReportInput): DealReport {
  const { financing, operations } = input.inputs;
  const { metrics, ratios, heuristics, houseHack } = input.analysis;

  const propertyDetails: ReportRow[] = [
    { label: "Calculation Model", value: modelDisplayName(input.inputs.model) },
    { label: "Purchase Price", value: formatCurrency(financing.purchasePrice) },
    { label: "Down Payment (%)", value: formatPercent(financing.downPaymentPct) },
    { label: "Down Payment", value: formatCurrency(metrics.downPayment) },
    { label: "Loan Amount", value: formatCurrency(metrics.loanAmount) },
    { label: "Interest Rate", value: formatPercent(financing.interestRatePct) },
    { label: "Loan Term", value: `${financing.loanTermYears} years` },
    { label: "Annual Property Tax", value: formatCurrency(financing.annualPropertyTax) },
    { label: "Annual Insurance", value: formatCurrency(financing.annualInsurance) },
    { label: "Monthly HOA", value: formatCurrency(financing.monthlyHoa) },
    { label: "Closing Costs", value: formatCurrency(financing.closingCosts) },
    { label: "Monthly Gross Rent", value: formatCurrency(operations.monthlyGrossRent) },
    { label: "Vacancy Rate", value: formatPercent(operations.vacancyRatePct) },
    { label: "Maintenance", value: formatPercent(operations.maintenancePct) },
    { label: "CapEx", value: formatPercent(operations.capexPct) },
    { label: "Property Management", value: formatPercent(operations.propertyManagementPct) },
    { label: "Monthly Utilities", value: formatCurrency(operations.monthlyUtilities) },
  ];

  const financialAnalysis: ReportRow[] = [
    { label: "Monthly P&I Payment", value: formatCurrency(metrics.monthlyPrincipalAndInterest) },
    { label: "Monthly PITI", value: formatCurrency(metrics.monthlyPiti) },
    { label: "Monthly PITI + HOA", value: formatCurrency(metrics.monthlyHousingPayment) },
    { label: "Effective Gross Income", value: formatCurrency(metrics.effectiveGrossIncome) },
    { label: "Operating Expenses", value: formatCurrency(metrics.operatingExpenses) },
    { label: "Net Operating Income", value: formatCurrency(metrics.netOperatingIncome) },
    { label: "Monthly Cash Flow", value: formatCurrency(metrics.monthlyCashFlow) },
    { label: "Annual Cash Flow", value: formatCurrency(metrics.annualCashFlow) },
    { label: "Total Cash Invested", value: formatCurrency(metrics.totalCashInvested) },
    { label: "Cap Rate", value: formatPercent(metrics.capRatePct) },
    { label: "Cash-on-Cash Return", value: formatPercent(metrics.cashOnCashPct) },
    { label: "Loan-to-Value", value: formatPercent(ratios.loanToValuePct) },
    { label: "Debt Service Coverage", value: formatRatio(ratios.debtServiceCoverage) },
    { label: "Gross Rent Multiplier", value: formatRatio(ratios.grossRentMultiplier) },
    { label: "Rent-to-Price", value: formatPercent(ratios.rentToPricePct) },
  ];

  if (houseHack) {
    financialAnalysis.push(
      { label: "Net Housing Cost", value: formatCurrency(houseHack.netHousingCost) },
      {
        label: "Housing Cost Reduction",
        value: formatPercent(houseHack.housingCostReductionPct),
      }
    );
  }

  const heuristicRows: ReportRow[] = [
    { label: "Cash Flow", value: displayLabel(heuristics.cashFlow) },
    { label: "Cap Rate", value: displayLabel(heuristics.capRate) },
    { label: "Cash-on-Cash Return", value: displayLabel(heuristics.cashOnCash) },
    { label: "1% Rule", value: displayLabel(heuristics.onePercentRule) },
  ];

  const notes = input.notes?.trim();

  return {
    title: input.title?.trim() || DEFAULT_REPORT_TITLE,
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    model: input.inputs.model,
    propertyDetails,
    financialAnalysis,
    heuristics: heuristicRows,
    ...(notes ? { notes } : {}),
  };
}

export function reportFilename(report: DealReport): string {
  const slug = report.title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${slug || "deal-report"}-${report.generatedAt.slice(0, 10)}.pdf`;
}

/**
 * Build and render a report. Failures come back as { ok: false } and are never thrown.
 */
export async function generateReport(
  input: DealReportInput,
  renderer: ReportRendererPort
): Promise<ReportResult> {
  const malformed = findMalformedField(input);
  if (malformed) {
    return { ok: false, error: `Malformed report data: ${malformed} is not a finite number` };
  }

  const report = buildDealReport(input);

  try {
    const bytes = await renderer.render(report);
    return { ok: true, bytes, filename: reportFilename(report), report };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `Report rendering failed: ${reason}` };
  }
}
