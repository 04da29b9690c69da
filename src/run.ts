import { format } from "date-fns";
import { PlaywrightAuthenticator } from "./auth.js";
import { playwrightContextFactory, type BrowsingContextFactory } from "./browser.js";
import { CheckpointStore, type CheckpointRecord, type CheckpointStatus } from "./checkpoints.js";
import { resolveUrls, type HarvestConfig } from "./config.js";
import { backupDatabase, openDatabase, type Db } from "./db.js";
import { CancelledError, describeError } from "./errors.js";
import { HarvestStore } from "./persistence.js";
import { ExtractionPipeline, type RunSummary } from "./pipeline.js";
import { RetryController } from "./retry.js";
import { SessionStore, ensureSession, type Authenticator } from "./session.js";
import { RequestGate, type Sleep } from "./throttle.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 2;
export const EXIT_PARTIAL = 3;
export const EXIT_CANCELLED = 130;

/** Seams for everything that touches a browser, the clock or the process. */
export interface CommandDeps {
  authenticator?: Authenticator;
  openContext?: BrowsingContextFactory;
  signal?: AbortSignal;
  now?: () => Date;
  sleep?: Sleep;
  random?: () => number;
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.cancelled) return EXIT_CANCELLED;
  if (summary.failures.length > 0 || summary.collectionsFailed > 0) return EXIT_PARTIAL;
  return EXIT_OK;
}

/** Runs a command body and maps whatever escapes it onto an exit code. */
async function guard(body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (err) {
    if (err instanceof CancelledError) {
      console.warn("🛑 Cancelled.");
      return EXIT_CANCELLED;
    }
    console.error(`❌ ${describeError(err)}`);
    return EXIT_FATAL;
  }
}

function defaultAuthenticator(config: HarvestConfig): Authenticator {
  const urls = resolveUrls(config.baseUrl);
  return new PlaywrightAuthenticator({
    loginUrl: urls.login,
    landingUrl: urls.completed,
    authTimeoutMs: config.authTimeoutMs,
    probeTimeoutMs: config.pageTimeoutMs
  });
}

async function withDatabase<T>(config: HarvestConfig, body: (db: Db) => Promise<T>): Promise<T> {
  const db = openDatabase(config.databasePath);
  try {
    return await body(db);
  } finally {
    db.close();
  }
}

export function loginCommand(config: HarvestConfig, { force = false }: { force?: boolean }, deps: CommandDeps = {}) {
  return guard(async () => {
    const store = new SessionStore(config.sessionPath);
    if (force) {
      store.clear();
      console.log("🧹 Discarded the saved session.");
    }
    await ensureSession({
      store,
      authenticator: deps.authenticator ?? defaultAuthenticator(config),
      maxAgeHours: config.sessionMaxAgeHours,
      now: deps.now
    });
    return EXIT_OK;
  });
}

/**
 * `run` resumes from checkpoints and only reads the listing on an empty store;
 * `update` always re-reads it so new leagues are picked up.
 */
export function extractCommand(
  config: HarvestConfig,
  { discover }: { discover: "auto" | "always" },
  deps: CommandDeps = {}
) {
  return guard(() =>
    withDatabase(config, async (db) => {
      const now = deps.now ?? (() => new Date());
      const checkpoints = new CheckpointStore(db, now);
      const recovered = checkpoints.recoverInterrupted();
      if (recovered > 0) console.log(`♻️  ${recovered} interrupted unit(s) put back to pending`);

      const session = await ensureSession({
        store: new SessionStore(config.sessionPath),
        authenticator: deps.authenticator ?? defaultAuthenticator(config),
        maxAgeHours: config.sessionMaxAgeHours,
        now
      });

      const pipeline = new ExtractionPipeline(
        {
          openContext: deps.openContext ?? playwrightContextFactory({ headless: config.headless }),
          checkpoints,
          store: new HarvestStore(db),
          retry: new RetryController(
            {
              maxAttempts: config.maxAttempts,
              baseDelayMs: config.backoffBaseMs,
              maxDelayMs: config.backoffCapMs,
              attemptTimeoutMs: config.attemptTimeoutMs
            },
            { sleep: deps.sleep, random: deps.random }
          ),
          gate: new RequestGate({
            minDelayMs: config.delayMinMs,
            maxDelayMs: config.delayMaxMs,
            sleep: deps.sleep,
            random: deps.random
          })
        },
        {
          listingUrl: resolveUrls(config.baseUrl).completed,
          completionPolicy: config.completionPolicy,
          nameFilter: config.nameFilter,
          concurrency: config.concurrency,
          maxScore: config.maxScore,
          discover,
          materializer: {
            maxLoadCycles: config.maxLoadCycles,
            settleTimeoutMs: config.settleTimeoutMs,
            pageTimeoutMs: config.pageTimeoutMs
          },
          signal: deps.signal
        }
      );

      return exitCodeFor(await pipeline.run(session));
    })
  );
}

export function resetCommand(
  config: HarvestConfig,
  { collectionId, backup = false }: { collectionId?: string; backup?: boolean },
  deps: CommandDeps = {}
) {
  return guard(() =>
    withDatabase(config, async (db) => {
      const now = deps.now ?? (() => new Date());
      if (backup) {
        const target = await backupDatabase(db, config.databasePath, format(now(), "yyyyMMdd-HHmmss"));
        console.log(`🗄  Backup written → ${target}`);
      }
      const removed = new CheckpointStore(db, now).reset({ collectionId });
      console.log(`🧹 Cleared ${removed} checkpoint(s)${collectionId ? ` for ${collectionId}` : ""}`);
      return EXIT_OK;
    })
  );
}

export interface CollectionStatus {
  collectionId: string;
  title: string | null;
  status: CheckpointStatus;
  rounds: Record<CheckpointStatus, number>;
}

/** Groups checkpoint rows by league: the league's own status plus a tally of its rounds. */
export function summarizeCheckpoints(
  records: readonly CheckpointRecord[],
  titleOf: (collectionId: string) => string | null
): CollectionStatus[] {
  const byCollection = new Map<string, CollectionStatus>();
  const entry = (collectionId: string) => {
    let found = byCollection.get(collectionId);
    if (!found) {
      found = {
        collectionId,
        title: titleOf(collectionId),
        status: "pending",
        rounds: { pending: 0, in_progress: 0, complete: 0, failed: 0 }
      };
      byCollection.set(collectionId, found);
    }
    return found;
  };

  for (const record of records) {
    const current = entry(record.collectionId);
    if (record.subCollectionId === null) {
      current.status = record.status;
    } else {
      current.rounds[record.status] += 1;
    }
  }
  return [...byCollection.values()];
}

export function statusCommand(config: HarvestConfig) {
  return guard(() =>
    withDatabase(config, async (db) => {
      const store = new HarvestStore(db);
      const leagues = summarizeCheckpoints(new CheckpointStore(db).list(), (id) => store.getCollection(id)?.title ?? null);
      const counts = store.counts();

      console.log(`🗃  ${config.databasePath}`);
      console.log(
        `   ${counts.collections} leagues, ${counts.subCollections} rounds, ${counts.items} songs, ` +
          `${counts.leafRecords} votes, ${counts.actors} members`
      );
      if (leagues.length === 0) {
        console.log("   No checkpoints yet. Run `league-harvest run` to start.");
        return EXIT_OK;
      }
      for (const league of leagues) {
        const { pending, in_progress, complete, failed } = league.rounds;
        console.log(
          `   [${league.status}] ${league.title ?? league.collectionId}: ` +
            `rounds ${complete} complete, ${failed} failed, ${pending + in_progress} pending`
        );
      }
      return EXIT_OK;
    })
  );
}
