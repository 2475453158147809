import { AppConfig } from "./config/env.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { AiClient } from "./infra/ai/types.js";
import { createVectorIndex } from "./infra/store/createVectorIndex.js";
import { FuelSalesQaOptions, FuelSalesQaService } from "./services/fuelSalesQaService.js";
import { setLogLevel } from "./utils/logger.js";

export interface Runtime {
  service: FuelSalesQaService;
  close: () => Promise<void>;
}

export function buildServiceOptions(config: AppConfig): FuelSalesQaOptions {
  const normalizer = {
    volumeUnit: config.volumeUnit,
    currencySymbol: config.currencySymbol,
    decimalComma: config.decimalComma,
  };
  return {
    ingestion: {
      batchSize: config.ingestBatchSize,
      concurrency: config.ingestConcurrency,
      skipUnchanged: config.ingestSkipUnchanged,
      retry: config.retry,
      normalizer,
    },
    query: {
      topK: config.topK,
      minScore: config.minScore,
      contextCharBudget: config.contextCharBudget,
      retry: config.retry,
      normalizer,
    },
    defaultStationId: config.defaultStationId,
  };
}

export async function createRuntime(
  config: AppConfig,
  aiClient: AiClient = new DefaultAiClient(config),
): Promise<Runtime> {
  setLogLevel(config.logLevel);
  const { vectorIndex, close } = await createVectorIndex(config);
  const service = new FuelSalesQaService(vectorIndex, aiClient, buildServiceOptions(config));
  return {
    service,
    close: async () => {
      service.stop();
      await close();
    },
  };
}
