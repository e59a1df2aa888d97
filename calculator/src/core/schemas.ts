/**
 * Input schemas for the presentation boundary
 *
 * The engine itself never validates; these bounds mirror the form controls
 * and are applied only where user input enters the system.
 */

import { z } from "zod";
import { LOAN_TERM_YEARS } from "./finance";

export const INPUT_BOUNDS = {
  downPaymentPct: { min: 0, max: 50 },
  interestRatePct: { min: 0, max: 10 },
  vacancyRatePct: { min: 0, max: 20 },
  expensePct: { min: 0, max: 15 },
} as const;

const money = z.number().finite().min(0);

export const calculationModelSchema = z.enum(["house_hack", "whole_unit"]);

export const financingSchema = z.object({
  purchasePrice: money,
  downPaymentPct: z
    .number()
    .min(INPUT_BOUNDS.downPaymentPct.min)
    .max(INPUT_BOUNDS.downPaymentPct.max),
  interestRatePct: z
    .number()
    .min(INPUT_BOUNDS.interestRatePct.min)
    .max(INPUT_BOUNDS.interestRatePct.max),
  loanTermYears: z.literal(LOAN_TERM_YEARS).default(LOAN_TERM_YEARS),
  annualPropertyTax: money.default(0),
  annualInsurance: money.default(0),
  monthlyHoa: money.default(0),
  closingCosts: money.default(0),
});

const expensePct = z
  .number()
  .min(INPUT_BOUNDS.expensePct.min)
  .max(INPUT_BOUNDS.expensePct.max);

export const operationsSchema = z.object({
  monthlyGrossRent: money,
  vacancyRatePct: z
    .number()
    .min(INPUT_BOUNDS.vacancyRatePct.min)
    .max(INPUT_BOUNDS.vacancyRatePct.max)
    .default(0),
  maintenancePct: expensePct.default(0),
  capexPct: expensePct.default(0),
  propertyManagementPct: expensePct.default(0),
  monthlyUtilities: money.default(0),
});

export const dealInputsSchema = z.object({
  model: calculationModelSchema.default("house_hack"),
  financing: financingSchema,
  operations: operationsSchema,
});

export const reportRequestSchema = dealInputsSchema.extend({
  title: z.string().max(120).optional(),
  notes: z.string().max(4000).optional(),
});

export const configurationCreateSchema = dealInputsSchema.extend({
  name: z.string().trim().min(1).max(100),
});

export const sampleDealSchema = dealInputsSchema.extend({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
});

export type DealInputsRequest = z.infer<typeof dealInputsSchema>;
export type ReportRequest = z.infer<typeof reportRequestSchema>;
export type ConfigurationCreateRequest = z.infer<typeof configurationCreateSchema>;
