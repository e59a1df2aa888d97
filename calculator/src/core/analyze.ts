import type {
  CalculationModel,
  DealAnalysis,
  DealMetrics,
  DealRatios,
  HouseHackMetrics,
  PropertyFinancing,
  RentalOperations,
} from "./dto";
import {
  LOAN_TERM_YEARS,
  MONTHS_PER_YEAR,
  capRate,
  cashFlow,
  cashOnCashReturn,
  debtServiceCoverageRatio,
  downPaymentAmount,
  effectiveGrossIncome,
  grossRentMultiplier,
  housingCostReduction,
  loanAmount,
  loanToValue,
  monthlyMortgagePayment,
  netHousingCost,
  netOperatingIncome,
  operatingExpenses,
  piti,
  rentToPriceRatio,
  totalCashInvested,
} from "./finance";
import { classifyDeal } from "./heuristics";

export const DEFAULT_MODEL: CalculationModel = "house_hack";

export function defaultFinancing(): PropertyFinancing {
  return {
    purchasePrice: 500000,
    downPaymentPct: 20,
    interestRatePct: 6.5,
    loanTermYears: LOAN_TERM_YEARS,
    annualPropertyTax: 6000,
    annualInsurance: 1800,
    monthlyHoa: 0,
    closingCosts: 15000,
  };
}

export function defaultOperations(): RentalOperations {
  return {
    monthlyGrossRent: 3000,
    vacancyRatePct: 5,
    maintenancePct: 5,
    capexPct: 5,
    propertyManagementPct: 8,
    monthlyUtilities: 0,
  };
}

/**
 * Compute the full metrics snapshot for one property and financing scenario
 * Inputs are used as given; out-of-range values flow through the arithmetic.
 */
export function computeDealMetrics(
  financing: PropertyFinancing,
  operations: RentalOperations
): DealMetrics {
  const { purchasePrice, downPaymentPct, interestRatePct, loanTermYears } =
    financing;

  const downPayment = downPaymentAmount(purchasePrice, downPaymentPct);
  const loan = loanAmount(purchasePrice, downPaymentPct);

  const monthlyPrincipalAndInterest = monthlyMortgagePayment(
    loan,
    interestRatePct,
    loanTermYears
  );
  const monthlyPiti = piti(
    loan,
    interestRatePct,
    loanTermYears,
    financing.annualPropertyTax,
    financing.annualInsurance
  );
  const monthlyHousingPayment = monthlyPiti + financing.monthlyHoa;

  const annualGrossRent = operations.monthlyGrossRent * MONTHS_PER_YEAR;
  const egi = effectiveGrossIncome(annualGrossRent, operations.vacancyRatePct);
  const opex = operatingExpenses(
    egi,
    operations.maintenancePct,
    operations.capexPct,
    operations.propertyManagementPct,
    operations.monthlyUtilities * MONTHS_PER_YEAR
  );
  const noi = netOperatingIncome(egi, opex);

  const monthlyCashFlow = cashFlow(noi, monthlyHousingPayment);
  const annualCashFlow = monthlyCashFlow * MONTHS_PER_YEAR;
  const cashInvested = totalCashInvested(downPayment, financing.closingCosts);

  return {
    downPayment,
    loanAmount: loan,
    monthlyPrincipalAndInterest,
    monthlyPiti,
    monthlyHousingPayment,
    annualGrossRent,
    effectiveGrossIncome: egi,
    operatingExpenses: opex,
    netOperatingIncome: noi,
    monthlyCashFlow,
    annualCashFlow,
    totalCashInvested: cashInvested,
    capRatePct: capRate(noi, purchasePrice),
    cashOnCashPct: cashOnCashReturn(annualCashFlow, cashInvested),
  };
}

export function computeDealRatios(
  financing: PropertyFinancing,
  metrics: DealMetrics
): DealRatios {
  return {
    loanToValuePct: loanToValue(metrics.loanAmount, financing.purchasePrice),
    debtServiceCoverage: debtServiceCoverageRatio(
      metrics.netOperatingIncome,
      metrics.monthlyPrincipalAndInterest * MONTHS_PER_YEAR
    ),
    grossRentMultiplier: grossRentMultiplier(
      financing.purchasePrice,
      metrics.annualGrossRent
    ),
    rentToPricePct: rentToPriceRatio(
      metrics.annualGrossRent / MONTHS_PER_YEAR,
      financing.purchasePrice
    ),
  };
}

/**
 * Owner occupies one unit; rent from the remaining units offsets the housing payment
 */
export function computeHouseHackMetrics(
  operations: RentalOperations,
  metrics: DealMetrics
): HouseHackMetrics {
  return {
    netHousingCost: netHousingCost(
      metrics.monthlyHousingPayment,
      operations.monthlyGrossRent
    ),
    housingCostReductionPct: housingCostReduction(
      operations.monthlyGrossRent,
      metrics.monthlyHousingPayment
    ),
  };
}

/**
 * Analyze a deal end to end. The result is frozen and rebuilt on every call.
 */
export function analyzeDeal(
  financing: PropertyFinancing,
  operations: RentalOperations,
  model: CalculationModel = DEFAULT_MODEL
): DealAnalysis {
  const metrics = Object.freeze(computeDealMetrics(financing, operations));
  const ratios = Object.freeze(computeDealRatios(financing, metrics));
  const heuristics = Object.freeze(
    classifyDeal(metrics, operations.monthlyGrossRent, financing.purchasePrice)
  );

  const analysis: DealAnalysis = { model, metrics, ratios, heuristics };
  if (model === "house_hack") {
    analysis.houseHack = Object.freeze(
      computeHouseHackMetrics(operations, metrics)
    );
  }

  return Object.freeze(analysis);
}
