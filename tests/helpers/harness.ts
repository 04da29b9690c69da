import { CheckpointStore } from "../../src/checkpoints.js";
import { openDatabase, type Db } from "../../src/db.js";
import { HarvestStore } from "../../src/persistence.js";
import { ExtractionPipeline, type PipelineOptions } from "../../src/pipeline.js";
import { RetryController } from "../../src/retry.js";
import { RequestGate } from "../../src/throttle.js";
import { BASE_URL, type FakeSite } from "./fake-site.js";

export const noSleep = async () => {};

export function buildPipeline(site: FakeSite, options: Partial<PipelineOptions> = {}, db: Db = openDatabase(":memory:")) {
  const checkpoints = new CheckpointStore(db);
  const store = new HarvestStore(db);
  const pipeline = new ExtractionPipeline(
    {
      openContext: async () => site,
      checkpoints,
      store,
      retry: new RetryController({ maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100 }, { sleep: noSleep, random: () => 0 }),
      gate: new RequestGate({ minDelayMs: 0, maxDelayMs: 0, sleep: noSleep })
    },
    {
      listingUrl: `${BASE_URL}/completed/`,
      completionPolicy: "strict",
      nameFilter: null,
      concurrency: 1,
      maxScore: 5,
      discover: "auto",
      materializer: { maxLoadCycles: 5, settleTimeoutMs: 0, pageTimeoutMs: 1000 },
      ...options
    }
  );
  return { db, checkpoints, store, pipeline };
}
