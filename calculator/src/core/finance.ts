import type { Money, Percent } from "./dto";

export const LOAN_TERM_YEARS = 30;
export const MONTHS_PER_YEAR = 12;

/**
 * Calculate the monthly principal and interest payment of a fixed-rate loan
 * M = P * r(1+r)^n / ((1+r)^n - 1) where r is the monthly rate, n the number of months
 * @param principal Loan amount
 * @param annualRatePercent Annual interest rate in percent (6.5 = 6.5%)
 * @param years Amortization period in years
 * @returns Monthly P&I payment, unrounded
 */
export function monthlyMortgagePayment(
  principal: Money,
  annualRatePercent: Percent,
  years: number
): Money {
  const numPayments = years * MONTHS_PER_YEAR;

  if (annualRatePercent === 0) {
    return principal / numPayments; // Straight-line at 0%
  }

  const monthlyRate = annualRatePercent / 100 / MONTHS_PER_YEAR;
  // (1+r)^n - 1 via log1p/expm1 so tiny rates keep their precision
  const growth = Math.expm1(numPayments * Math.log1p(monthlyRate));

  return (principal * monthlyRate * (growth + 1)) / growth;
}

/**
 * Monthly principal, interest, taxes and insurance. HOA is added by the caller.
 */
export function piti(
  principal: Money,
  annualRatePercent: Percent,
  years: number,
  annualTaxes: Money,
  annualInsurance: Money
): Money {
  return (
    monthlyMortgagePayment(principal, annualRatePercent, years) +
    annualTaxes / MONTHS_PER_YEAR +
    annualInsurance / MONTHS_PER_YEAR
  );
}

/**
 * Gross rent after vacancy. The rate is not clamped.
 */
export function effectiveGrossIncome(
  annualGrossRent: Money,
  vacancyRatePercent: Percent
): Money {
  return annualGrossRent * (1 - vacancyRatePercent / 100);
}

/**
 * Annual operating expenses: percentage reserves taken against EGI plus owner-paid utilities
 */
export function operatingExpenses(
  egi: Money,
  maintenancePct: Percent,
  capexPct: Percent,
  propMgmtPct: Percent,
  annualUtilities: Money
): Money {
  return (
    egi * (maintenancePct / 100) +
    egi * (capexPct / 100) +
    egi * (propMgmtPct / 100) +
    annualUtilities
  );
}

export function netOperatingIncome(egi: Money, opex: Money): Money {
  return egi - opex;
}

/**
 * Monthly cash flow after debt service
 * @param noi Annual net operating income
 * @param monthlyPiti Monthly housing payment
 */
export function cashFlow(noi: Money, monthlyPiti: Money): Money {
  return noi / MONTHS_PER_YEAR - monthlyPiti;
}

/**
 * Capitalization rate in percent, 0 when the price is 0
 */
export function capRate(noi: Money, purchasePrice: Money): Percent {
  if (purchasePrice === 0) return 0;
  return (noi / purchasePrice) * 100;
}

/**
 * Cash-on-cash return in percent, 0 when nothing was invested
 */
export function cashOnCashReturn(
  annualCashFlow: Money,
  totalCashInvested: Money
): Percent {
  if (totalCashInvested === 0) return 0;
  return (annualCashFlow / totalCashInvested) * 100;
}

export function downPaymentAmount(
  purchasePrice: Money,
  downPaymentPct: Percent
): Money {
  return purchasePrice * (downPaymentPct / 100);
}

export function loanAmount(
  purchasePrice: Money,
  downPaymentPct: Percent
): Money {
  return purchasePrice - downPaymentAmount(purchasePrice, downPaymentPct);
}

export function totalCashInvested(
  downPayment: Money,
  closingCosts: Money
): Money {
  return downPayment + closingCosts;
}

// ===== Supplementary ratios =====

export function loanToValue(loan: Money, propertyValue: Money): Percent {
  if (propertyValue === 0) return 0;
  return (loan / propertyValue) * 100;
}

/**
 * Debt service coverage ratio, 0 when there is no debt service
 * @param noi Annual net operating income
 * @param annualDebtService Twelve months of P&I
 */
export function debtServiceCoverageRatio(
  noi: Money,
  annualDebtService: Money
): number {
  if (annualDebtService === 0) return 0;
  return noi / annualDebtService;
}

export function grossRentMultiplier(
  purchasePrice: Money,
  annualGrossRent: Money
): number {
  if (annualGrossRent === 0) return 0;
  return purchasePrice / annualGrossRent;
}

/**
 * Monthly rent as a percentage of price (the 1% rule figure)
 */
export function rentToPriceRatio(
  monthlyRent: Money,
  purchasePrice: Money
): Percent {
  if (purchasePrice === 0) return 0;
  return (monthlyRent / purchasePrice) * 100;
}

/**
 * What the owner-occupant still pays each month once the other units are rented
 */
export function netHousingCost(
  monthlyHousingPayment: Money,
  rentalIncome: Money
): Money {
  return monthlyHousingPayment - rentalIncome;
}

export function housingCostReduction(
  rentalIncome: Money,
  monthlyHousingPayment: Money
): Percent {
  if (monthlyHousingPayment === 0) return 0;
  return (rentalIncome / monthlyHousingPayment) * 100;
}
