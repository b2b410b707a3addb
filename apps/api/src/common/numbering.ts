import { randomInt } from "crypto";

export type SequentialNumberingKind = "receipt" | "invoice";
export type NumberingKind = SequentialNumberingKind | "payment";

export const NUMBER_PREFIXES: Record<SequentialNumberingKind, string> = {
  receipt: "RCP",
  invoice: "INV",
};

export const AUTO_REFERENCE_PREFIX = "AUTO";
const AUTO_REFERENCE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const AUTO_REFERENCE_SUFFIX_LENGTH = 6;
const SEQUENCE_WIDTH = 4;

const pad = (value: number, width: number) => String(value).padStart(width, "0");

/** UTC year-month token that scopes sequential numbering, e.g. "202610". */
export const periodKeyFor = (at: Date) => `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1, 2)}`;

export const formatSequentialNumber = (kind: SequentialNumberingKind, periodKey: string, sequence: number) => {
  if (!Number.isInteger(sequence) || sequence < 1) {
    throw new RangeError(`Sequence must be a positive integer, received ${sequence}`);
  }
  return `${NUMBER_PREFIXES[kind]}-${periodKey}-${pad(sequence, SEQUENCE_WIDTH)}`;
};

const compactTimestamp = (at: Date) =>
  [
    at.getUTCFullYear(),
    pad(at.getUTCMonth() + 1, 2),
    pad(at.getUTCDate(), 2),
    pad(at.getUTCHours(), 2),
    pad(at.getUTCMinutes(), 2),
    pad(at.getUTCSeconds(), 2),
    pad(at.getUTCMilliseconds(), 3),
  ].join("");

export type RandomIndex = (exclusiveMax: number) => number;

export const buildAutoReference = (at: Date, randomIndex: RandomIndex = randomInt) => {
  let suffix = "";
  for (let i = 0; i < AUTO_REFERENCE_SUFFIX_LENGTH; i += 1) {
    suffix += AUTO_REFERENCE_ALPHABET[randomIndex(AUTO_REFERENCE_ALPHABET.length)];
  }
  return `${AUTO_REFERENCE_PREFIX}-${compactTimestamp(at)}-${suffix}`;
};
