export type ISO = string;
export type Money = number;
export type Percent = number;           // 6.5 means 6.5%

export type CalculationModel = "house_hack" | "whole_unit";

export interface PropertyFinancing {
  purchasePrice: Money;
  downPaymentPct: Percent;        // 0..100
  interestRatePct: Percent;       // annual, >= 0
  loanTermYears: number;          // fixed at 30
  annualPropertyTax: Money;
  annualInsurance: Money;
  monthlyHoa: Money;
  closingCosts: Money;
}

export interface RentalOperations {
  monthlyGrossRent: Money;
  vacancyRatePct: Percent;        // 0..100
  maintenancePct: Percent;        // of EGI
  capexPct: Percent;              // of EGI
  propertyManagementPct: Percent; // of EGI
  monthlyUtilities: Money;        // paid by owner
}

export interface DealMetrics {
  downPayment: Money;
  loanAmount: Money;
  monthlyPrincipalAndInterest: Money;
  monthlyPiti: Money;
  monthlyHousingPayment: Money;   // PITI + HOA
  annualGrossRent: Money;
  effectiveGrossIncome: Money;    // annual
  operatingExpenses: Money;       // annual
  netOperatingIncome: Money;      // annual
  monthlyCashFlow: Money;
  annualCashFlow: Money;
  totalCashInvested: Money;
  capRatePct: Percent;
  cashOnCashPct: Percent;
}

export interface DealRatios {
  loanToValuePct: Percent;
  debtServiceCoverage: number;    // NOI / annual P&I
  grossRentMultiplier: number;
  rentToPricePct: Percent;
}

export interface HouseHackMetrics {
  netHousingCost: Money;          // monthly, after rent from the other units
  housingCostReductionPct: Percent;
}

export type CashFlowLabel = "positive" | "break_even" | "negative";
export type CapRateLabel = "strong" | "moderate" | "low";
export type CashOnCashLabel = "excellent" | "moderate" | "low";
export type OnePercentRuleLabel = "meets" | "below";

export interface DealHeuristics {
  cashFlow: CashFlowLabel;
  capRate: CapRateLabel;
  cashOnCash: CashOnCashLabel;
  onePercentRule: OnePercentRuleLabel;
}

export interface DealAnalysis {
  model: CalculationModel;
  metrics: DealMetrics;
  ratios: DealRatios;
  heuristics: DealHeuristics;
  houseHack?: HouseHackMetrics;
}

export interface DealInputs {
  model: CalculationModel;
  financing: PropertyFinancing;
  operations: RentalOperations;
}

export interface SavedConfiguration extends DealInputs {
  id: string;
  name: string;
  createdAt: ISO;
}

export type SavedConfigurationDraft = Omit<SavedConfiguration, "id" | "createdAt">;

export interface SampleDeal extends DealInputs {
  id: string;
  name: string;
  description: string;
}

export interface APIResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  details?: unknown;
  timestamp: ISO;
}
