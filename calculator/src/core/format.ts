import type { Money, Percent } from "./dto";

const currencyFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Round half away from zero at the given number of decimals
 * Works on the decimal representation so 1.005 rounds to 1.01.
 */
export function roundHalfUp(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;

  const sign = value < 0 ? -1 : 1;
  const abs = Math.abs(value);
  const text = String(abs);

  const rounded = text.includes("e")
    ? Math.round(abs * 10 ** decimals) / 10 ** decimals
    : Number(`${Math.round(Number(`${text}e${decimals}`))}e-${decimals}`);

  const result = sign * rounded;
  return result === 0 ? 0 : result; // no -0
}

export function roundCurrency(value: Money): Money {
  return roundHalfUp(value, 2);
}

export function formatCurrency(value: Money): string {
  return currencyFormatter.format(roundCurrency(value));
}

export function formatPercent(value: Percent, decimals = 2): string {
  return `${roundHalfUp(value, decimals).toFixed(decimals)}%`;
}

export function formatRatio(value: number, decimals = 2): string {
  return `${roundHalfUp(value, decimals).toFixed(decimals)}x`;
}
