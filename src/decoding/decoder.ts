import Decimal from "decimal.js";
import { MalformedPayloadError } from "../errors";
import type { RegisterDescriptor } from "../registers/definitions";

export interface DecodedValue {
  key: string;
  value: number | string;
  /** Integer after sign handling, before scaling or label lookup. */
  raw: number;
  unit: string | null;
  /** Value rendered with the decimal places its scale implies, e.g. "100.00". */
  display: string;
  timestamp: string;
  stale: boolean;
  lastError?: string;
}

export interface DecodeResult extends DecodedValue {
  /** Set when a status code had no label in the vendor table. */
  unknownStatusCode?: number;
}

export function toUnsigned16(word: number): number {
  return word & 0xffff;
}

export function toSigned16(word: number): number {
  const value = word & 0xffff;
  return value >= 0x8000 ? value - 0x10000 : value;
}

/** High word first; the sign belongs to the composed 32-bit value. */
export function toSigned32(high: number, low: number): number {
  return (((high & 0xffff) << 16) | (low & 0xffff)) | 0;
}

export function unknownStatusLabel(code: number): string {
  return `unknown (code ${code})`;
}

function rawInteger(descriptor: RegisterDescriptor, words: readonly number[]): number {
  switch (descriptor.rule) {
    case "unsigned16":
    case "enumerated-status":
      return toUnsigned16(words[0] ?? 0);
    case "signed16":
      return toSigned16(words[0] ?? 0);
    case "signed32":
      return toSigned32(words[0] ?? 0, words[1] ?? 0);
  }
}

export function decode(
  descriptor: RegisterDescriptor,
  words: readonly number[],
  decodedAt: Date = new Date(),
): DecodeResult {
  if (words.length !== descriptor.wordCount) {
    throw new MalformedPayloadError(descriptor.key, descriptor.wordCount, words.length);
  }

  const raw = rawInteger(descriptor, words);
  const base = {
    key: descriptor.key,
    raw,
    unit: descriptor.unit,
    timestamp: decodedAt.toISOString(),
    stale: false,
  };

  if (descriptor.rule === "enumerated-status") {
    const label = descriptor.statusLabels?.get(raw);
    if (label === undefined) {
      const placeholder = unknownStatusLabel(raw);
      return { ...base, value: placeholder, display: placeholder, unknownStatusCode: raw };
    }
    return { ...base, value: label, display: label };
  }

  const scaled = new Decimal(raw).times(descriptor.scale);
  return {
    ...base,
    value: scaled.toNumber(),
    display: scaled.toFixed(descriptor.scale.decimalPlaces()),
  };
}
