import { Command, InvalidArgumentError } from "commander";
import { Runtime } from "../bootstrap.js";
import { describeFailure } from "../domain/errors.js";
import { TransactionFilter } from "../domain/types.js";
import { MAX_TOP_K } from "../pipelines/query.js";
import { FuelSalesQaService } from "../services/fuelSalesQaService.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface ProgramDependencies {
  createRuntime: () => Promise<Runtime>;
  io?: CliIo;
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

interface FilterOptions {
  fuel?: string[];
  station?: string[];
  payment?: string[];
  from?: string;
  to?: string;
}

export function createProgram(deps: ProgramDependencies): Command {
  const io = deps.io ?? defaultIo;
  const program = new Command();

  const run = async (task: (service: FuelSalesQaService) => Promise<unknown>) => {
    let runtime: Runtime | null = null;
    try {
      runtime = await deps.createRuntime();
      io.stdout(JSON.stringify(await task(runtime.service), null, 2));
    } catch (error) {
      io.stderr(JSON.stringify(describeFailure(error), null, 2));
      process.exitCode = 1;
    } finally {
      await runtime?.close();
    }
  };

  program
    .name("fuel-sales-qa")
    .description("Operator commands for the fuel sales question-answering index")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    });

  program
    .command("ingest")
    .description("Parse datasets (.csv, .json, .jsonl) and upsert their transactions")
    .argument("<files...>", "dataset files")
    .action(async (files: string[]) => {
      await run((service) => service.ingestFiles(files));
    });

  program
    .command("stats")
    .description("Show entry count, embedding model and a sample entry")
    .action(async () => {
      await run((service) => service.describeIndex());
    });

  addFilterOptions(
    program
      .command("ask")
      .description("Answer a question from the indexed transactions")
      .argument("<question>", "question text")
      .option("-k, --top-k <n>", "transactions to retrieve", parseTopK),
  ).action(async (question: string, options: FilterOptions & { topK?: number }) => {
    await run((service) =>
      service.ask({ question, topK: options.topK, filter: toFilter(options) }),
    );
  });

  addFilterOptions(
    program
      .command("search")
      .description("List the transactions most similar to a query")
      .argument("<query>", "query text")
      .option("-k, --top-k <n>", "transactions to retrieve", parseTopK),
  ).action(async (query: string, options: FilterOptions & { topK?: number }) => {
    await run((service) =>
      service.searchTransactions({ query, topK: options.topK, filter: toFilter(options) }),
    );
  });

  program
    .command("delete")
    .description("Remove one transaction from the index")
    .argument("<id>", "transaction id")
    .action(async (id: string) => {
      await run((service) => service.deleteTransaction(id));
    });

  program
    .command("reset")
    .description("Delete every entry and the embedding model binding")
    .requiredOption("--yes", "confirm the reset")
    .action(async () => {
      await run((service) => service.resetIndex());
    });

  return program;
}

function addFilterOptions(command: Command): Command {
  return command
    .option("--fuel <types...>", "fuel types to keep")
    .option("--station <ids...>", "station ids to keep")
    .option("--payment <methods...>", "payment methods to keep")
    .option("--from <date>", "earliest transaction time")
    .option("--to <date>", "latest transaction time");
}

function toFilter(options: FilterOptions): TransactionFilter {
  return {
    fuelTypes: options.fuel,
    stationIds: options.station,
    paymentMethods: options.payment,
    from: options.from,
    to: options.to,
  };
}

function parseTopK(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_TOP_K) {
    throw new InvalidArgumentError(`must be an integer between 1 and ${MAX_TOP_K}`);
  }
  return parsed;
}
