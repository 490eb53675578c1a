// src/lib/format.ts

const int = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });
const usd0 = new Intl.NumberFormat("en-US", { style: "currency", currency: "USD", maximumFractionDigits: 0 });
const usd2 = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});
const upTo1 = new Intl.NumberFormat("en-US", { maximumFractionDigits: 1 });

export const formatInt = (n: number) => int.format(n);
export const formatUsd = (n: number) => usd0.format(n);
export const formatUsdCents = (n: number) => usd2.format(n);
export const formatBillions = (n: number) => `$${upTo1.format(n)}B`;
