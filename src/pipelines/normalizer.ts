import { z } from "zod";
import { InvalidFilterError, MalformedRecordError } from "../domain/errors.js";
import { Transaction, TransactionDocument, TransactionFilter } from "../domain/types.js";

export interface NormalizerOptions {
  volumeUnit: string;
  currencySymbol: string;
  /** Numbers use a decimal comma, so every dot groups thousands ("1.012" is 1012). */
  decimalComma?: boolean;
}

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = {
  volumeUnit: "L",
  currencySymbol: "$",
  decimalComma: false,
};

const FIELD_SEPARATOR = " | ";

const requiredText = z
  .union([z.string(), z.number()])
  .transform((value) => collapseWhitespace(String(value)))
  .pipe(z.string().min(1, "must not be empty"));

const optionalText = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => {
    if (value === null || value === undefined) {
      return null;
    }
    const text = collapseWhitespace(String(value));
    return text.length > 0 ? text : null;
  });

function amount(decimalComma: boolean) {
  return z.union([z.number(), z.string()]).transform((value, ctx) => {
    const parsed = typeof value === "number" ? value : parseLocaleNumber(value, decimalComma);
    if (parsed === null || !Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a number" });
      return z.NEVER;
    }
    if (parsed < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must not be negative" });
      return z.NEVER;
    }
    return parsed;
  });
}

const timestamp = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const parsed = value instanceof Date ? value : parseTimestamp(value);
  if (!parsed || Number.isNaN(parsed.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a valid date and time" });
    return z.NEVER;
  }
  return parsed.toISOString();
});

function buildTransactionSchema(decimalComma: boolean) {
  return z.object({
    id: requiredText,
    timestamp,
    fuelType: requiredText,
    quantity: amount(decimalComma),
    unitPrice: amount(decimalComma),
    totalAmount: amount(decimalComma),
    stationId: requiredText,
    pumpId: optionalText,
    paymentMethod: optionalText,
  });
}

const pointSchema = buildTransactionSchema(false);
const commaSchema = buildTransactionSchema(true);

/**
 * Validates a raw record against the transaction schema. Every missing or
 * ill-typed field is reported in the thrown `MalformedRecordError`.
 */
export function parseTransaction(
  raw: unknown,
  options: Pick<NormalizerOptions, "decimalComma"> = DEFAULT_NORMALIZER_OPTIONS,
): Transaction {
  const schema = options.decimalComma ? commaSchema : pointSchema;
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join(".") || "record";
      return `${field}: ${issue.message}`;
    });
    throw new MalformedRecordError(`Malformed transaction record (${issues.join("; ")})`, issues);
  }
  return result.data;
}

/**
 * Renders a transaction as embeddable text. Fields always appear in the same order
 * and with the same precision, so equal transactions give byte-identical text.
 */
export function normalizeTransaction(
  transaction: Transaction,
  options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS,
): TransactionDocument {
  const fields = [
    `Date: ${formatTimestamp(transaction.timestamp)}`,
    `Station: ${transaction.stationId}`,
  ];
  if (transaction.pumpId) {
    fields.push(`Pump: ${transaction.pumpId}`);
  }
  fields.push(
    `Fuel: ${transaction.fuelType}`,
    `Quantity: ${transaction.quantity.toFixed(2)} ${options.volumeUnit}`,
    `Unit price: ${options.currencySymbol}${transaction.unitPrice.toFixed(3)}`,
    `Total: ${options.currencySymbol}${transaction.totalAmount.toFixed(2)}`,
  );
  if (transaction.paymentMethod) {
    fields.push(`Payment: ${transaction.paymentMethod}`);
  }

  return {
    id: transaction.id,
    text: fields.join(FIELD_SEPARATOR),
    transaction,
  };
}

export function normalizeTransactionFilter(
  filter: TransactionFilter | undefined,
): TransactionFilter | undefined {
  if (!filter) {
    return undefined;
  }

  const normalized: TransactionFilter = {};
  const fuelTypes = normalizeValues(filter.fuelTypes);
  const stationIds = normalizeValues(filter.stationIds);
  const paymentMethods = normalizeValues(filter.paymentMethods);
  if (fuelTypes) {
    normalized.fuelTypes = fuelTypes;
  }
  if (stationIds) {
    normalized.stationIds = stationIds;
  }
  if (paymentMethods) {
    normalized.paymentMethods = paymentMethods;
  }

  if (filter.from) {
    normalized.from = resolveBound(filter.from, "from");
  }
  if (filter.to) {
    normalized.to = resolveBound(filter.to, "to");
  }
  if (normalized.from && normalized.to && normalized.from > normalized.to) {
    throw new InvalidFilterError("Filter 'from' must not be later than 'to'.");
  }

  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

/**
 * Accepts `1234.5`, `1,234.50`, `1.234,50`, `1234,5` and an optional currency
 * symbol. When both separators appear the last one is the decimal mark; a single
 * comma is a decimal comma; a separator repeated more than once groups thousands.
 *
 * With `decimalComma` the dot is always a thousands separator and the comma the
 * decimal mark, so `1.012` reads as 1012.
 */
export function parseLocaleNumber(value: string, decimalComma = false): number | null {
  const cleaned = value.replace(/[\s$€£]/g, "");
  if (!/^-?[\d.,]+$/.test(cleaned) || !/\d/.test(cleaned)) {
    return null;
  }

  if (decimalComma) {
    const parsed = Number(cleaned.replace(/\./g, "").replace(",", "."));
    return Number.isFinite(parsed) ? parsed : null;
  }

  const lastComma = cleaned.lastIndexOf(",");
  const lastDot = cleaned.lastIndexOf(".");
  let canonical: string;

  if (lastComma >= 0 && lastDot >= 0) {
    canonical =
      lastComma > lastDot
        ? cleaned.replace(/\./g, "").replace(",", ".")
        : cleaned.replace(/,/g, "");
  } else if (lastComma >= 0) {
    const parts = cleaned.split(",");
    canonical = parts.length > 2 ? parts.join("") : parts.join(".");
  } else {
    const parts = cleaned.split(".");
    canonical = parts.length > 2 ? parts.join("") : cleaned;
  }

  const parsed = Number(canonical);
  return Number.isFinite(parsed) ? parsed : null;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3})\d*)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const DAY_FIRST_PATTERN =
  /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/** Timestamps without an explicit zone are read as UTC. */
export function parseTimestamp(value: string): Date | null {
  const trimmed = value.trim();

  const iso = ISO_PATTERN.exec(trimmed);
  if (iso) {
    const [, year, month, day, hour, minute, second, millis, zone] = iso;
    return buildDate({
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour ?? 0),
      minute: Number(minute ?? 0),
      second: Number(second ?? 0),
      millis: Number((millis ?? "0").padEnd(3, "0")),
      offsetMinutes: parseZoneOffset(zone),
    });
  }

  const dayFirst = DAY_FIRST_PATTERN.exec(trimmed);
  if (dayFirst) {
    const [, day, month, year, hour, minute, second] = dayFirst;
    return buildDate({
      year: Number(year),
      month: Number(month),
      day: Number(day),
      hour: Number(hour ?? 0),
      minute: Number(minute ?? 0),
      second: Number(second ?? 0),
      millis: 0,
      offsetMinutes: 0,
    });
  }

  return null;
}

export function isDateOnly(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value.trim()) || /^\d{1,2}\/\d{1,2}\/\d{4}$/.test(value.trim());
}

function buildDate(parts: {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millis: number;
  offsetMinutes: number;
}): Date | null {
  if (
    parts.month < 1 ||
    parts.month > 12 ||
    parts.day < 1 ||
    parts.day > 31 ||
    parts.hour > 23 ||
    parts.minute > 59 ||
    parts.second > 59
  ) {
    return null;
  }

  const utc = Date.UTC(
    parts.year,
    parts.month - 1,
    parts.day,
    parts.hour,
    parts.minute,
    parts.second,
    parts.millis,
  );
  const date = new Date(utc - parts.offsetMinutes * 60_000);

  // Reject rollovers such as 31/02.
  const check = new Date(utc);
  if (check.getUTCDate() !== parts.day || check.getUTCMonth() !== parts.month - 1) {
    return null;
  }
  return date;
}

function parseZoneOffset(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") {
    return 0;
  }
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

function formatTimestamp(iso: string): string {
  // `YYYY-MM-DDTHH:mm:ss.sssZ` -> `YYYY-MM-DD HH:mm`
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

function resolveBound(value: string, bound: "from" | "to"): string {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new InvalidFilterError(`Filter '${bound}' is not a valid date: ${value}`);
  }
  if (bound === "to" && isDateOnly(value)) {
    return new Date(parsed.getTime() + 24 * 60 * 60 * 1000 - 1).toISOString();
  }
  return parsed.toISOString();
}

function normalizeValues(values: string[] | undefined): string[] | undefined {
  if (!values) {
    return undefined;
  }
  const cleaned = [...new Set(values.map(collapseWhitespace).filter(Boolean))];
  return cleaned.length > 0 ? cleaned : undefined;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}
