import { describe, expect, it } from "vitest";
import {
  LOAN_TERM_YEARS,
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
} from "../src/core/finance";

describe("Finance Calculations", () => {
  describe("monthlyMortgagePayment", () => {
    it("should calculate P&I for a 6% 30-year loan of 400k", () => {
      const payment = monthlyMortgagePayment(400000, 6.0, 30);
      expect(Math.abs(payment - 2398.2)).toBeLessThan(1);
      expect(payment).toBeCloseTo(2398.2, 1);
    });

    it("should spread principal evenly at 0% interest", () => {
      expect(monthlyMortgagePayment(300000, 0, 30)).toBe(300000 / 360);
    });

    it("should return 0 for a zero principal", () => {
      expect(monthlyMortgagePayment(0, 6.5, LOAN_TERM_YEARS)).toBe(0);
    });

    it("should be non-negative and strictly increasing in principal", () => {
      for (const rate of [0, 3.25, 6.5, 10]) {
        let previous = -1;
        for (const principal of [0, 1, 1000, 250000, 400000, 1000000]) {
          const payment = monthlyMortgagePayment(principal, rate, 30);
          expect(payment).toBeGreaterThanOrEqual(0);
          expect(payment).toBeGreaterThan(previous);
          previous = payment;
        }
      }
    });

    it("should stay finite and at or above straight-line for tiny rates", () => {
      const straightLine = 400000 / 360;
      for (const rate of [1e-14, 1e-12, 1e-9, 1e-6]) {
        const payment = monthlyMortgagePayment(400000, rate, 30);
        expect(Number.isFinite(payment)).toBe(true);
        expect(payment).toBeGreaterThanOrEqual(straightLine);
        expect(payment).toBeCloseTo(straightLine, 2);
      }
    });

    it("should cost more than straight-line when the rate is positive", () => {
      expect(monthlyMortgagePayment(300000, 4, 30)).toBeGreaterThan(
        300000 / 360
      );
    });
  });

  describe("piti", () => {
    it("should add monthly taxes and insurance to P&I", () => {
      const pi = monthlyMortgagePayment(400000, 6, 30);
      expect(piti(400000, 6, 30, 6000, 1800)).toBeCloseTo(pi + 650, 9);
    });

    it("should equal P&I when there are no taxes or insurance", () => {
      expect(piti(400000, 6, 30, 0, 0)).toBe(
        monthlyMortgagePayment(400000, 6, 30)
      );
    });
  });

  describe("effectiveGrossIncome", () => {
    it("should discount annual rent by vacancy", () => {
      expect(effectiveGrossIncome(3000 * 12, 5)).toBeCloseTo(34200, 6);
    });

    it("should not clamp a vacancy rate above 100%", () => {
      expect(effectiveGrossIncome(12000, 150)).toBeCloseTo(-6000, 6);
    });
  });

  describe("operatingExpenses", () => {
    it("should apply each percentage to EGI and add utilities", () => {
      // 1500 + 1500 + 3000 + 1200
      expect(operatingExpenses(30000, 5, 5, 10, 1200)).toBeCloseTo(7200, 6);
    });

    it("should be just utilities when all percentages are 0", () => {
      expect(operatingExpenses(30000, 0, 0, 0, 2400)).toBe(2400);
    });
  });

  describe("netOperatingIncome and cashFlow", () => {
    it("should subtract operating expenses from income", () => {
      expect(netOperatingIncome(36000, 8000)).toBe(28000);
    });

    it("should allow a negative NOI", () => {
      expect(netOperatingIncome(5000, 8000)).toBe(-3000);
    });

    it("should produce monthly cash flow after the housing payment", () => {
      expect(cashFlow(24000, 1500)).toBe(500);
      expect(cashFlow(12000, 1500)).toBe(-500);
    });
  });

  describe("capRate", () => {
    it("should express NOI over price as a percentage", () => {
      expect(capRate(24000, 400000)).toBeCloseTo(6.0, 10);
    });

    it("should be 0 when the price is 0", () => {
      expect(capRate(24000, 0)).toBe(0);
    });
  });

  describe("cashOnCashReturn", () => {
    it("should express annual cash flow over cash invested", () => {
      expect(cashOnCashReturn(6000, 100000)).toBeCloseTo(6.0, 10);
    });

    it("should be 0 when nothing was invested", () => {
      expect(cashOnCashReturn(6000, 0)).toBe(0);
    });

    it("should go negative with negative cash flow", () => {
      expect(cashOnCashReturn(-5000, 100000)).toBeCloseTo(-5, 10);
    });
  });

  describe("financing split", () => {
    it("should split price into down payment and loan", () => {
      const down = downPaymentAmount(500000, 20);
      expect(down).toBeCloseTo(100000, 6);
      expect(loanAmount(500000, 20)).toBeCloseTo(400000, 6);
      expect(totalCashInvested(down, 15000)).toBeCloseTo(115000, 6);
    });

    it("should add back to the purchase price", () => {
      for (const pct of [0, 3.5, 7.25, 20, 33.33, 50, 100]) {
        const price = 437500.5;
        expect(
          downPaymentAmount(price, pct) + loanAmount(price, pct)
        ).toBeCloseTo(price, 6);
      }
    });

    it("should give a full loan at 0% down and none at 100%", () => {
      expect(loanAmount(250000, 0)).toBe(250000);
      expect(loanAmount(250000, 100)).toBe(0);
    });
  });

  describe("supplementary ratios", () => {
    it("should compute loan-to-value", () => {
      expect(loanToValue(400000, 500000)).toBe(80);
      expect(loanToValue(400000, 0)).toBe(0);
    });

    it("should compute debt service coverage", () => {
      expect(debtServiceCoverageRatio(36000, 30000)).toBe(1.2);
      expect(debtServiceCoverageRatio(36000, 0)).toBe(0);
    });

    it("should compute the gross rent multiplier", () => {
      expect(grossRentMultiplier(400000, 30000)).toBeCloseTo(13.333, 3);
      expect(grossRentMultiplier(400000, 0)).toBe(0);
    });

    it("should compute rent as a percentage of price", () => {
      expect(rentToPriceRatio(3000, 300000)).toBe(1);
      expect(rentToPriceRatio(3000, 0)).toBe(0);
    });

    it("should compute house-hack housing cost and reduction", () => {
      expect(netHousingCost(2800, 1500)).toBe(1300);
      expect(housingCostReduction(1800, 2500)).toBe(72);
      expect(housingCostReduction(1800, 0)).toBe(0);
    });
  });
});
