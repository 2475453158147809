import { describe, expect, it } from "vitest";
import { InvalidFilterError, MalformedRecordError } from "../src/domain/errors.js";
import {
  normalizeTransaction,
  normalizeTransactionFilter,
  parseLocaleNumber,
  parseTimestamp,
  parseTransaction,
} from "../src/pipelines/normalizer.js";
import { makeTransaction } from "./helpers/transactions.js";

describe("normalizeTransaction", () => {
  it("renders fields in a fixed order with fixed precision", () => {
    const doc = normalizeTransaction(makeTransaction());
    expect(doc.id).toBe("T1");
    expect(doc.text).toBe(
      "Date: 2024-01-01 08:00 | Station: A | Fuel: diesel | Quantity: 50.00 L | Unit price: $1.500 | Total: $75.00",
    );
  });

  it("includes pump and payment only when present", () => {
    const doc = normalizeTransaction(makeTransaction({ pumpId: "3", paymentMethod: "card" }));
    expect(doc.text).toBe(
      "Date: 2024-01-01 08:00 | Station: A | Pump: 3 | Fuel: diesel | Quantity: 50.00 L | Unit price: $1.500 | Total: $75.00 | Payment: card",
    );
  });

  it("uses the configured unit and currency", () => {
    const doc = normalizeTransaction(makeTransaction(), { volumeUnit: "gal", currencySymbol: "€" });
    expect(doc.text).toContain("Quantity: 50.00 gal | Unit price: €1.500 | Total: €75.00");
  });

  it("yields byte-identical text for the same transaction", () => {
    const raw = {
      id: "T9",
      timestamp: "2024-05-02 07:15",
      fuelType: "diesel",
      quantity: "12,5",
      unitPrice: 1.61,
      totalAmount: "20,13",
      stationId: "North",
    };
    const first = normalizeTransaction(parseTransaction(raw)).text;
    const second = normalizeTransaction(parseTransaction({ ...raw })).text;
    expect(second).toBe(first);
  });
});

describe("parseTransaction", () => {
  it("coerces locale numbers, day-first dates and whitespace", () => {
    const tx = parseTransaction({
      id: 7,
      timestamp: "15/03/2024 14:30",
      fuelType: "  Super   95 ",
      quantity: "1.234,56",
      unitPrice: "1,299",
      totalAmount: "$1,603.69",
      stationId: "Norte",
    });

    expect(tx).toEqual({
      id: "7",
      timestamp: "2024-03-15T14:30:00.000Z",
      fuelType: "Super 95",
      quantity: 1234.56,
      unitPrice: 1.299,
      totalAmount: 1603.69,
      stationId: "Norte",
      pumpId: null,
      paymentMethod: null,
    });
  });

  it("reports every invalid field", () => {
    let caught: unknown;
    try {
      parseTransaction({
        id: "X",
        timestamp: "not a date",
        quantity: -1,
        unitPrice: 1,
        totalAmount: 1,
        stationId: "A",
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedRecordError);
    const issues = caught instanceof MalformedRecordError ? caught.issues : [];
    expect(issues).toContain("timestamp: must be a valid date and time");
    expect(issues).toContain("quantity: must not be negative");
    expect(issues.some((issue) => issue.startsWith("fuelType:"))).toBe(true);
  });

  it("treats empty optional fields as absent", () => {
    const tx = parseTransaction({ ...makeTransaction(), pumpId: "  ", paymentMethod: "" });
    expect(tx.pumpId).toBeNull();
    expect(tx.paymentMethod).toBeNull();
  });
});

describe("parseLocaleNumber", () => {
  it.each([
    ["1234.5", 1234.5],
    ["1,234.50", 1234.5],
    ["1.234,50", 1234.5],
    ["1234,5", 1234.5],
    ["1.234.567", 1234567],
    ["$ 75", 75],
  ])("parses %s", (input, expected) => {
    expect(parseLocaleNumber(input)).toBe(expected);
  });

  it("rejects text", () => {
    expect(parseLocaleNumber("abc")).toBeNull();
    expect(parseLocaleNumber("")).toBeNull();
  });

  it("reads a lone dot as a decimal point by default", () => {
    expect(parseLocaleNumber("1.012")).toBe(1.012);
  });

  it.each([
    ["1.012", 1012],
    ["1.012,5", 1012.5],
    ["40,50", 40.5],
    ["75", 75],
  ])("reads %s with a decimal comma", (input, expected) => {
    expect(parseLocaleNumber(input, true)).toBe(expected);
  });

  it("rejects several commas with a decimal comma", () => {
    expect(parseLocaleNumber("1,2,3", true)).toBeNull();
  });

  it("threads the decimal comma through parseTransaction", () => {
    const raw = { ...makeTransaction(), quantity: "1.012", totalAmount: "1.518" };
    expect(parseTransaction(raw, { decimalComma: true })).toMatchObject({ quantity: 1012, totalAmount: 1518 });
    expect(parseTransaction(raw)).toMatchObject({ quantity: 1.012, totalAmount: 1.518 });
  });
});

describe("parseTimestamp", () => {
  it("applies explicit offsets and reads zoneless times as UTC", () => {
    expect(parseTimestamp("2024-01-01T10:00:00+02:00")?.toISOString()).toBe("2024-01-01T08:00:00.000Z");
    expect(parseTimestamp("2024-01-01 10:00")?.toISOString()).toBe("2024-01-01T10:00:00.000Z");
  });

  it("rejects impossible calendar dates", () => {
    expect(parseTimestamp("2024-02-31")).toBeNull();
    expect(parseTimestamp("31/02/2024")).toBeNull();
  });
});

describe("normalizeTransactionFilter", () => {
  it("makes a date-only upper bound cover the whole day", () => {
    expect(normalizeTransactionFilter({ from: "2024-01-01", to: "2024-01-31" })).toEqual({
      from: "2024-01-01T00:00:00.000Z",
      to: "2024-01-31T23:59:59.999Z",
    });
  });

  it("dedupes values and drops empty filters", () => {
    expect(normalizeTransactionFilter({ fuelTypes: [" diesel ", "diesel"] })).toEqual({
      fuelTypes: ["diesel"],
    });
    expect(normalizeTransactionFilter({ stationIds: [] })).toBeUndefined();
  });

  it("rejects invalid and inverted ranges", () => {
    expect(() => normalizeTransactionFilter({ from: "yesterday" })).toThrow(InvalidFilterError);
    expect(() => normalizeTransactionFilter({ from: "2024-02-01", to: "2024-01-01" })).toThrow(
      InvalidFilterError,
    );
  });
});
