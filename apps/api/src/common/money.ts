import Decimal from "decimal.js";

export type MoneyValue = Decimal.Value;

export const zero = () => new Decimal(0);

export function dec(value: MoneyValue = 0) {
  return value instanceof Decimal ? value : new Decimal(value);
}

export function add(a: MoneyValue, b: MoneyValue) {
  return dec(a).add(dec(b));
}

export function sub(a: MoneyValue, b: MoneyValue) {
  return dec(a).sub(dec(b));
}

export function sum(values: MoneyValue[]) {
  return values.reduce<Decimal>((total, value) => total.add(dec(value)), zero());
}

export function round2(value: MoneyValue) {
  return dec(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function eq(a: MoneyValue, b: MoneyValue) {
  return dec(a).equals(dec(b));
}

export function gt(a: MoneyValue, b: MoneyValue) {
  return dec(a).greaterThan(dec(b));
}

export function lte(a: MoneyValue, b: MoneyValue) {
  return dec(a).lessThanOrEqualTo(dec(b));
}

export function max(a: MoneyValue, b: MoneyValue) {
  return Decimal.max(dec(a), dec(b));
}

/** True when the value needs no rounding to be stored as numeric(12,2). */
export function hasMoneyPrecision(value: MoneyValue) {
  return dec(value).decimalPlaces() <= 2;
}

/** Largest magnitude a numeric(12,2) column holds. */
export const MONEY_COLUMN_LIMIT = new Decimal("9999999999.99");

export function fitsMoneyColumn(value: MoneyValue) {
  return dec(value).abs().lessThanOrEqualTo(MONEY_COLUMN_LIMIT);
}

/**
 * Parses client input into a Decimal, returning null for anything that is not
 * a finite decimal number.
 */
export function parseMoney(value: unknown) {
  if (value instanceof Decimal) {
    return value.isFinite() ? value : null;
  }
  if (typeof value !== "string" && typeof value !== "number") {
    return null;
  }
  if (typeof value === "string" && !/^-?\d+(\.\d+)?$/.test(value.trim())) {
    return null;
  }
  const parsed = new Decimal(typeof value === "string" ? value.trim() : value);
  return parsed.isFinite() ? parsed : null;
}

export function toString2(value: MoneyValue) {
  return round2(value).toFixed(2);
}
