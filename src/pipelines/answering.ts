import { RetrievalHit, Transaction } from "../domain/types.js";
import { GroundedPrompt } from "../infra/ai/types.js";
import { DEFAULT_NORMALIZER_OPTIONS, NormalizerOptions } from "./normalizer.js";

export const NO_RELEVANT_DATA_MESSAGE =
  "No relevant transactions were found for this question. Try naming a fuel type, station or date range that exists in the indexed data.";

const SNIPPET_LENGTH = 280;
const ENTRY_SEPARATOR = "\n\n";

export interface ContextEntry {
  /** 1-based position used for `[n]` citations. */
  rank: number;
  id: string;
  score: number;
  text: string;
  transaction: Transaction;
}

export interface AssembledContext {
  entries: ContextEntry[];
  block: string;
}

export interface Evidence {
  transaction_id: string;
  score: number;
  snippet: string;
}

/**
 * Packs hits in rank order into at most `budgetChars` characters. Entries that no
 * longer fit are dropped from the low-ranked end; a top entry larger than the whole
 * budget is truncated rather than dropped.
 */
export function assembleContext(hits: RetrievalHit[], budgetChars: number): AssembledContext {
  const entries: ContextEntry[] = [];
  const blocks: string[] = [];
  let used = 0;

  for (const hit of hits) {
    const rank = entries.length + 1;
    const header = `[${rank}] transaction_id=${hit.entry.id} score=${formatScore(hit.score)}`;
    const rendered = `${header}\n${hit.entry.payload.text}`;
    const cost = rendered.length + (blocks.length > 0 ? ENTRY_SEPARATOR.length : 0);

    if (used + cost > budgetChars) {
      if (blocks.length === 0) {
        blocks.push(rendered.slice(0, Math.max(0, budgetChars)));
        entries.push(toEntry(hit, rank));
      }
      break;
    }

    blocks.push(rendered);
    entries.push(toEntry(hit, rank));
    used += cost;
  }

  return { entries, block: blocks.join(ENTRY_SEPARATOR) };
}

export function buildGroundedPrompt(question: string, context: AssembledContext): GroundedPrompt {
  const language = detectPreferredLanguage(question);
  return {
    system: [
      "You are a data analyst for a network of fuel stations.",
      "Answer only from the transactions listed in the context.",
      "When asked for totals, averages or counts, compute exact figures from the listed transactions and show the figures you used.",
      "If the context is insufficient to answer, say it clearly.",
      "Cite the transactions you rely on as [1], [2].",
      `Respond only in ${language.label}.`,
    ].join(" "),
    user: `Question:\n${question}\n\nContext:\n${context.block}\n\nOutput rules:\n1) Use only ${language.label}.\n2) Cite evidence as [1], [2].\n3) If unsure, explicitly say you do not have enough context.`,
  };
}

/** Maps `[n]` and `[n, m]` markers to transaction ids, in order of first mention. */
export function parseCitedTransactionIds(answer: string, entries: ContextEntry[]): string[] {
  const cited: string[] = [];
  for (const match of answer.matchAll(/\[(\d+(?:\s*,\s*\d+)*)\]/g)) {
    for (const raw of match[1].split(",")) {
      const entry = entries[Number(raw.trim()) - 1];
      if (entry && !cited.includes(entry.id)) {
        cited.push(entry.id);
      }
    }
  }
  return cited;
}

export function toEvidence(entries: ContextEntry[]): Evidence[] {
  return entries.map((entry) => ({
    transaction_id: entry.id,
    score: Number(entry.score.toFixed(4)),
    snippet: entry.text.slice(0, SNIPPET_LENGTH),
  }));
}

/**
 * Deterministic answer used when no generator is configured: lists the evidence
 * and totals what it lists.
 */
export function buildExtractiveAnswer(
  question: string,
  entries: ContextEntry[],
  options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS,
): string {
  const lines = [`Question: ${question}`, "Matching transactions:"];
  for (const entry of entries) {
    lines.push(`[${entry.rank}] ${entry.text}`);
  }

  const quantity = entries.reduce((sum, entry) => sum + entry.transaction.quantity, 0);
  const amount = entries.reduce((sum, entry) => sum + entry.transaction.totalAmount, 0);
  lines.push(
    `Listed transactions: ${entries.length}; quantity ${quantity.toFixed(2)} ${options.volumeUnit}; total ${options.currencySymbol}${amount.toFixed(2)}.`,
  );
  return lines.join("\n");
}

export function detectPreferredLanguage(question: string): { code: string; label: string } {
  if (/[\u3131-\u318E\uAC00-\uD7A3]/.test(question)) {
    return { code: "ko", label: "Korean" };
  }
  if (/[\u3040-\u309F\u30A0-\u30FF]/.test(question)) {
    return { code: "ja", label: "Japanese" };
  }
  if (/[\u4E00-\u9FFF]/.test(question)) {
    return { code: "zh", label: "Chinese" };
  }
  if (
    /[\u00BF\u00A1\u00E1\u00E9\u00ED\u00F3\u00FA\u00F1\u00FC]/i.test(question) ||
    /\b(cuanto|cuantos|cual|ventas|vendio|combustible|estacion|litros)\b/i.test(question)
  ) {
    return { code: "es", label: "Spanish" };
  }
  return { code: "en", label: "English" };
}

function toEntry(hit: RetrievalHit, rank: number): ContextEntry {
  return {
    rank,
    id: hit.entry.id,
    score: hit.score,
    text: hit.entry.payload.text,
    transaction: hit.entry.payload.transaction,
  };
}

function formatScore(score: number): string {
  return score.toFixed(4);
}
