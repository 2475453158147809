import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createProgram } from "../src/cli/program.js";
import { createTestService } from "./helpers/service.js";
import { SCENARIO_RECORDS } from "./helpers/transactions.js";

const FIXTURE = fileURLToPath(new URL("./fixtures/despachos.csv", import.meta.url));

function setup() {
  const { service } = createTestService();
  const close = vi.fn(async () => {});
  const stdout: string[] = [];
  const stderr: string[] = [];
  const program = createProgram({
    createRuntime: async () => ({ service, close }),
    io: {
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
    },
  });
  const run = (...args: string[]) => program.parseAsync(args, { from: "user" });
  return { service, close, stdout, stderr, run };
}

function lastJson(lines: string[]): unknown {
  const last = lines.at(-1);
  if (last === undefined) {
    throw new Error("no output");
  }
  return JSON.parse(last);
}

afterEach(() => {
  process.exitCode = undefined;
});

describe("fuel-sales-qa CLI", () => {
  it("ingests dataset files and prints the report", async () => {
    const { close, stdout, run } = setup();

    await run("ingest", FIXTURE);

    expect(lastJson(stdout)).toMatchObject({ ingested_count: 2, files: [FIXTURE] });
    expect(close).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBeUndefined();
  });

  it("answers questions with filters and top-k", async () => {
    const { service, stdout, run } = setup();
    await service.ingestRecords(SCENARIO_RECORDS);

    await run("ask", "how much diesel was sold at station A", "--station", "B", "-k", "2");

    expect(lastJson(stdout)).toMatchObject({
      status: "answered",
      evidence: [{ transaction_id: "T3", score: 0.5 }],
    });
  });

  it("searches, deletes and reports stats", async () => {
    const { service, stdout, run } = setup();
    await service.ingestRecords(SCENARIO_RECORDS);

    await run("search", "gasoline", "--fuel", "gasoline");
    expect(lastJson(stdout)).toMatchObject({ query: "gasoline", hits: [{ transaction_id: "T2" }] });

    await run("delete", "T2");
    expect(lastJson(stdout)).toEqual({ id: "T2", deleted: true });

    await run("stats");
    expect(lastJson(stdout)).toMatchObject({ entry_count: 2, embedding_model: "fake:keywords" });
  });

  it("prints failures as JSON on stderr and sets the exit code", async () => {
    const { close, stderr, run } = setup();

    await run("ask", "   ");

    expect(lastJson(stderr)).toEqual({
      kind: "invalid_request",
      code: "INVALID_QUESTION",
      message: "The request could not be processed: Question must not be empty.",
    });
    expect(process.exitCode).toBe(1);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("requires confirmation before a reset", async () => {
    const { service, close, run } = setup();
    await service.ingestRecords(SCENARIO_RECORDS);

    await expect(run("reset")).rejects.toMatchObject({ code: "commander.missingMandatoryOptionValue" });
    expect(close).not.toHaveBeenCalled();

    await run("reset", "--yes");
    expect((await service.describeIndex()).entry_count).toBe(0);
  });

  it("rejects an out-of-range top-k", async () => {
    const { run } = setup();

    await expect(run("ask", "diesel", "-k", "99")).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
  });
});
