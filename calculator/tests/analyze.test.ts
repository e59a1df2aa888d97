import { describe, expect, it } from "vitest";
import {
  analyzeDeal,
  computeDealMetrics,
  defaultFinancing,
  defaultOperations,
} from "../src/core/analyze";
import type { PropertyFinancing, RentalOperations } from "../src/core/dto";
import { monthlyMortgagePayment } from "../src/core/finance";

describe("Deal analysis", () => {
  const financing: PropertyFinancing = defaultFinancing();
  const operations: RentalOperations = defaultOperations();

  describe("computeDealMetrics", () => {
    it("should split the purchase price and count cash invested", () => {
      const metrics = computeDealMetrics(financing, operations);

      expect(metrics.downPayment).toBeCloseTo(100000, 6);
      expect(metrics.loanAmount).toBeCloseTo(400000, 6);
      expect(metrics.totalCashInvested).toBeCloseTo(115000, 6);
    });

    it("should compute the housing payment from the loan", () => {
      const metrics = computeDealMetrics(financing, operations);
      const pi = monthlyMortgagePayment(metrics.loanAmount, 6.5, 30);

      expect(metrics.monthlyPrincipalAndInterest).toBe(pi);
      expect(metrics.monthlyPrincipalAndInterest).toBeCloseTo(2528.27, 1);
      expect(metrics.monthlyPiti).toBeCloseTo(pi + 500 + 150, 9);
      expect(metrics.monthlyHousingPayment).toBe(metrics.monthlyPiti);
    });

    it("should compute income, expenses and NOI", () => {
      const metrics = computeDealMetrics(financing, operations);

      expect(metrics.annualGrossRent).toBe(36000);
      expect(metrics.effectiveGrossIncome).toBeCloseTo(34200, 6);
      expect(metrics.operatingExpenses).toBeCloseTo(6156, 6); // 18% of EGI
      expect(metrics.netOperatingIncome).toBeCloseTo(28044, 6);
    });

    it("should compute cash flow and returns", () => {
      const metrics = computeDealMetrics(financing, operations);
      const expectedMonthly = 28044 / 12 - metrics.monthlyHousingPayment;

      expect(metrics.monthlyCashFlow).toBeCloseTo(expectedMonthly, 6);
      expect(metrics.monthlyCashFlow).toBeCloseTo(-841.27, 1);
      expect(metrics.annualCashFlow).toBeCloseTo(expectedMonthly * 12, 6);
      expect(metrics.capRatePct).toBeCloseTo(5.6088, 6);
      expect(metrics.cashOnCashPct).toBeCloseTo(
        ((expectedMonthly * 12) / 115000) * 100,
        6
      );
    });

    it("should include HOA in the housing payment", () => {
      const metrics = computeDealMetrics(
        { ...financing, monthlyHoa: 250 },
        operations
      );

      expect(metrics.monthlyHousingPayment).toBeCloseTo(
        metrics.monthlyPiti + 250,
        9
      );
    });

    it("should charge owner-paid utilities annually", () => {
      const base = computeDealMetrics(financing, operations);
      const withUtilities = computeDealMetrics(financing, {
        ...operations,
        monthlyUtilities: 100,
      });

      expect(withUtilities.operatingExpenses - base.operatingExpenses).toBeCloseTo(1200, 6);
    });

    it("should stay total for a zero price and zero cash invested", () => {
      const metrics = computeDealMetrics(
        { ...financing, purchasePrice: 0, closingCosts: 0 },
        operations
      );

      expect(metrics.monthlyPrincipalAndInterest).toBe(0);
      expect(metrics.capRatePct).toBe(0);
      expect(metrics.cashOnCashPct).toBe(0);
    });

    it("should pass out-of-range inputs straight through", () => {
      const metrics = computeDealMetrics(financing, {
        ...operations,
        vacancyRatePct: 150,
      });

      expect(metrics.effectiveGrossIncome).toBeCloseTo(-18000, 6);
      expect(metrics.netOperatingIncome).toBeLessThan(0);
    });
  });

  describe("analyzeDeal", () => {
    it("should classify the default deal", () => {
      const analysis = analyzeDeal(financing, operations);

      expect(analysis.model).toBe("house_hack");
      expect(analysis.heuristics).toEqual({
        cashFlow: "negative",
        capRate: "low",
        cashOnCash: "low",
        onePercentRule: "below",
      });
    });

    it("should compute supplementary ratios", () => {
      const { metrics, ratios } = analyzeDeal(financing, operations);

      expect(ratios.loanToValuePct).toBeCloseTo(80, 9);
      expect(ratios.debtServiceCoverage).toBeCloseTo(
        metrics.netOperatingIncome / (metrics.monthlyPrincipalAndInterest * 12),
        9
      );
      expect(ratios.grossRentMultiplier).toBeCloseTo(13.889, 3);
      expect(ratios.rentToPricePct).toBeCloseTo(0.6, 9);
    });

    it("should add house-hack metrics only for the house-hack model", () => {
      const houseHack = analyzeDeal(financing, operations, "house_hack");
      const wholeUnit = analyzeDeal(financing, operations, "whole_unit");

      expect(houseHack.houseHack?.netHousingCost).toBeCloseTo(
        houseHack.metrics.monthlyHousingPayment - 3000,
        9
      );
      expect(houseHack.houseHack?.housingCostReductionPct).toBeCloseTo(
        (3000 / houseHack.metrics.monthlyHousingPayment) * 100,
        9
      );
      expect(wholeUnit.houseHack).toBeUndefined();
      expect(wholeUnit.metrics).toEqual(houseHack.metrics);
    });

    it("should label a strong whole-unit rental", () => {
      const analysis = analyzeDeal(
        {
          ...financing,
          purchasePrice: 200000,
          downPaymentPct: 25,
          interestRatePct: 5,
          closingCosts: 5000,
        },
        { ...operations, monthlyGrossRent: 2400 },
        "whole_unit"
      );

      expect(analysis.metrics.capRatePct).toBeGreaterThanOrEqual(8);
      expect(analysis.heuristics.capRate).toBe("strong");
      expect(analysis.heuristics.cashFlow).toBe("positive");
      expect(analysis.heuristics.onePercentRule).toBe("meets");
    });

    it("should return a frozen result", () => {
      const analysis = analyzeDeal(financing, operations);

      expect(Object.isFrozen(analysis)).toBe(true);
      expect(Object.isFrozen(analysis.metrics)).toBe(true);
      expect(Object.isFrozen(analysis.heuristics)).toBe(true);
    });

    it("should be deterministic", () => {
      expect(analyzeDeal(financing, operations)).toEqual(
        analyzeDeal(financing, operations)
      );
    });
  });
});
