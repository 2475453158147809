import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

export type DatasetFormat = "csv" | "json" | "jsonl";

export interface DatasetRow {
  /** 1-based line (CSV, JSON Lines) or array position (JSON). */
  line: number;
  record: unknown;
  /** Why the row could not be read. The record then holds the raw text, if any. */
  error?: string;
}

export interface DatasetLoadOptions {
  defaultStationId?: string | null;
}

const EXTENSION_FORMATS: Record<string, DatasetFormat> = {
  ".csv": "csv",
  ".json": "json",
  ".jsonl": "jsonl",
  ".ndjson": "jsonl",
};

// Keys are header names lowercased with accents and non-alphanumerics removed.
const COLUMN_ALIASES: Record<string, string> = {
  id: "id",
  transactionid: "id",
  txid: "id",
  idtransaccion: "id",
  despacho: "id",
  timestamp: "timestamp",
  datetime: "timestamp",
  date: "timestamp",
  createdat: "timestamp",
  fecha: "timestamp",
  fechayhora: "timestamp",
  fechahora: "timestamp",
  fueltype: "fuelType",
  fuel: "fuelType",
  product: "fuelType",
  producto: "fuelType",
  combustible: "fuelType",
  quantity: "quantity",
  volume: "quantity",
  volumen: "quantity",
  litros: "quantity",
  galones: "quantity",
  unitprice: "unitPrice",
  price: "unitPrice",
  ppu: "unitPrice",
  precio: "unitPrice",
  totalamount: "totalAmount",
  total: "totalAmount",
  amount: "totalAmount",
  importe: "totalAmount",
  monto: "totalAmount",
  stationid: "stationId",
  station: "stationId",
  estacion: "stationId",
  pumpid: "pumpId",
  pump: "pumpId",
  pico: "pumpId",
  surtidor: "pumpId",
  paymentmethod: "paymentMethod",
  payment: "paymentMethod",
  formadepago: "paymentMethod",
  mediodepago: "paymentMethod",
};

const csvRowsSchema = z.array(
  z.object({
    record: z.record(z.string()),
    info: z.object({ lines: z.number().int() }),
  }),
);

export function getSupportedDatasetExtensions(): string[] {
  return Object.keys(EXTENSION_FORMATS);
}

export function detectDatasetFormat(filePath: string): DatasetFormat {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXTENSION_FORMATS[ext];
  if (!format) {
    throw new Error(
      `Unsupported extension: ${ext || "(none)"}. Allowed: ${getSupportedDatasetExtensions().join(", ")}`,
    );
  }
  return format;
}

export async function loadDataset(
  filePath: string,
  options: DatasetLoadOptions = {},
): Promise<DatasetRow[]> {
  const format = detectDatasetFormat(filePath);
  const content = await fs.readFile(filePath, "utf-8");
  return parseDataset(content, format, options);
}

export function parseDataset(
  content: string,
  format: DatasetFormat,
  options: DatasetLoadOptions = {},
): DatasetRow[] {
  const rows =
    format === "csv" ? parseCsv(content) : format === "json" ? parseJsonArray(content) : parseJsonLines(content);
  return rows.map((row) => completeRow(row, options));
}

/** Applies column aliases and defaults to records passed in directly. */
export function prepareRecords(records: unknown[], options: DatasetLoadOptions = {}): DatasetRow[] {
  return records.map((record, index) =>
    completeRow({ line: index + 1, record: canonicalizeKeys(record) }, options),
  );
}

export function canonicalColumnName(header: string): string {
  const key = header
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "");
  return COLUMN_ALIASES[key] ?? header.trim();
}

/**
 * Rows the parser rejects (extra fields, broken quoting) come back with `error`
 * set so one bad line does not discard the file. Short rows are kept.
 */
function parseCsv(content: string): DatasetRow[] {
  const firstLine = content.replace(/^\uFEFF/, "").split(/\r?\n/, 1)[0] ?? "";
  const delimiter = firstLine.includes(";") && !firstLine.includes(",") ? ";" : ",";
  const rejected: DatasetRow[] = [];

  const parsed = csvRowsSchema.parse(
    parse(content, {
      bom: true,
      delimiter,
      columns: (header: string[]) => header.map(canonicalColumnName),
      skip_empty_lines: true,
      trim: true,
      relax_column_count_less: true,
      skip_records_with_error: true,
      on_skip: (error: unknown, raw: string | undefined) => {
        const line = readErrorLine(error);
        rejected.push({
          line: line ?? 0,
          record: raw ?? null,
          error: `Unreadable CSV row${line !== null ? ` on line ${line}` : ""}: ${
            error instanceof Error ? error.message : "parse error"
          }`,
        });
      },
      info: true,
    }),
  );

  return [...parsed.map(({ record, info }) => ({ line: info.lines, record })), ...rejected].sort(
    (left, right) => left.line - right.line,
  );
}

function parseJsonArray(content: string): DatasetRow[] {
  const parsed: unknown = JSON.parse(content);
  if (!Array.isArray(parsed)) {
    throw new Error("JSON datasets must contain an array of transaction records.");
  }
  return parsed.map((item: unknown, index) => ({
    line: index + 1,
    record: canonicalizeKeys(item),
  }));
}

function parseJsonLines(content: string): DatasetRow[] {
  const rows: DatasetRow[] = [];
  content.split(/\r?\n/).forEach((raw, index) => {
    const text = raw.trim();
    if (!text) {
      return;
    }
    let record: unknown;
    try {
      record = JSON.parse(text);
    } catch (error) {
      rows.push({
        line: index + 1,
        record: text,
        error: `Invalid JSON on line ${index + 1}: ${error instanceof Error ? error.message : "parse error"}`,
      });
      return;
    }
    rows.push({ line: index + 1, record: canonicalizeKeys(record) });
  });
  return rows;
}

function canonicalizeKeys(value: unknown): unknown {
  if (!isPlainRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    result[canonicalColumnName(key)] = field;
  }
  return result;
}

function completeRow(row: DatasetRow, options: DatasetLoadOptions): DatasetRow {
  if (row.error !== undefined || !isPlainRecord(row.record)) {
    return row;
  }

  const record: Record<string, unknown> = { ...row.record };
  if (isBlank(record.id)) {
    record.id = `row-${row.line}`;
  }
  if (isBlank(record.stationId) && options.defaultStationId) {
    record.stationId = options.defaultStationId;
  }
  return { line: row.line, record };
}

function readErrorLine(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "lines" in error && typeof error.lines === "number") {
    return error.lines;
  }
  return null;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && !value.trim());
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
