import pLimit from "p-limit";
import { Duration } from "luxon";
import { CancelledError, FatalError, describeError } from "./errors.js";
import { ContentMaterializer, type MaterializeOutcome, type MaterializerOptions } from "./materializer.js";
import { detailReader, listingReader, resultReader, type PageReader, type PageView } from "./readers.js";
import { actorHandle } from "./names.js";
import { describeKey, type CheckpointKey, type CheckpointStore } from "./checkpoints.js";
import type { BrowsingContextFactory } from "./browser.js";
import type { CompletionPolicy } from "./config.js";
import type { HarvestStore } from "./persistence.js";
import type { RetryController } from "./retry.js";
import type { RequestGate } from "./throttle.js";
import type { Session } from "./session.js";
import type {
  ActorRow,
  CollectionRow,
  ExtractedItem,
  ItemRow,
  LeafRecordRow,
  SubCollectionBatch,
  SubCollectionRef
} from "./types.js";

export interface PipelineOptions {
  listingUrl: string;
  completionPolicy: CompletionPolicy;
  nameFilter: string | null;
  concurrency: number;
  maxScore: number;
  /** "always" re-reads the listing; "auto" only when no league is known yet. */
  discover: "auto" | "always";
  materializer: MaterializerOptions;
  signal?: AbortSignal;
}

export interface UnitFailure {
  key: string;
  error: string;
}

export interface RunSummary {
  collectionsSeen: number;
  collectionsComplete: number;
  collectionsFailed: number;
  subCollectionsComplete: number;
  subCollectionsFailed: number;
  subCollectionsEmpty: number;
  itemsWritten: number;
  leafRecordsWritten: number;
  rejectedLeafRecords: number;
  skippedItems: number;
  failures: UnitFailure[];
  cancelled: boolean;
  elapsedMs: number;
}

export interface Anomaly {
  /** What was dropped: a whole song or a single vote. */
  kind: "item" | "leafRecord";
  itemId: string;
  actor: string;
  reason: string;
}

export function emptySummary(): RunSummary {
  return {
    collectionsSeen: 0,
    collectionsComplete: 0,
    collectionsFailed: 0,
    subCollectionsComplete: 0,
    subCollectionsFailed: 0,
    subCollectionsEmpty: 0,
    itemsWritten: 0,
    leafRecordsWritten: 0,
    rejectedLeafRecords: 0,
    skippedItems: 0,
    failures: [],
    cancelled: false,
    elapsedMs: 0
  };
}

export function matchesFilter(title: string, filter: string | null): boolean {
  if (!filter) return true;
  return title.toLowerCase().includes(filter.toLowerCase());
}

/**
 * Turns one results page into persistable rows. Votes outside 0..maxScore or
 * with unreadable points are rejected and reported, never clamped.
 */
export function buildBatch(
  ref: SubCollectionRef,
  items: readonly ExtractedItem[],
  maxScore: number
): { batch: SubCollectionBatch; anomalies: Anomaly[] } {
  const actors = new Map<string, ActorRow>();
  const anomalies: Anomaly[] = [];
  const leafRecords: LeafRecordRow[] = [];
  const seenItems = new Set<string>();

  const actorFor = (displayName: string) => {
    const handle = actorHandle(displayName);
    if (!actors.has(handle)) actors.set(handle, { handle, displayName });
    return handle;
  };

  const rows: ItemRow[] = [];
  for (const item of items) {
    if (seenItems.has(item.id)) {
      anomalies.push({ kind: "item", itemId: item.id, actor: "-", reason: "duplicate song on page" });
      continue;
    }
    seenItems.add(item.id);

    rows.push({
      id: item.id,
      subCollectionId: ref.id,
      title: item.title,
      primaryAttribute: item.primaryAttribute,
      secondaryAttribute: item.secondaryAttribute,
      submitter: item.submitter ? actorFor(item.submitter) : null,
      submissionNote: item.submissionNote,
      aggregateScore: item.aggregateScore,
      awardedScore: item.awardedScore,
      voterCount: item.voterCount,
      position: item.position,
      sourceUrl: item.sourceUrl
    });

    const voters = new Set<string>();
    for (const record of item.leafRecords) {
      const reject = (reason: string) => anomalies.push({ kind: "leafRecord", itemId: item.id, actor: record.actor, reason });
      if (record.unreadableValue != null) {
        reject(`unreadable score "${record.unreadableValue}"`);
        continue;
      }
      if (record.value != null && (record.value < 0 || record.value > maxScore)) {
        reject(`score ${record.value} outside 0..${maxScore}`);
        continue;
      }
      const actor = actorFor(record.actor);
      if (voters.has(actor)) {
        reject("second vote by the same member");
        continue;
      }
      voters.add(actor);
      leafRecords.push({ subCollectionId: ref.id, itemId: item.id, actor, value: record.value, note: record.note });
    }
  }

  return {
    batch: {
      subCollection: {
        id: ref.id,
        collectionId: ref.collectionId,
        sequenceNumber: ref.sequenceNumber,
        title: ref.title,
        description: ref.description,
        sourceUrl: ref.url
      },
      actors: [...actors.values()],
      items: rows,
      leafRecords
    },
    anomalies
  };
}

export class ExtractionPipeline {
  private halted = false;

  constructor(
    private readonly deps: {
      openContext: BrowsingContextFactory;
      checkpoints: CheckpointStore;
      store: HarvestStore;
      retry: RetryController;
      gate: RequestGate;
    },
    private readonly options: PipelineOptions
  ) {}

  async run(session: Session): Promise<RunSummary> {
    const started = Date.now();
    const summary = emptySummary();
    const context = await this.deps.openContext(session);
    const materializer = new ContentMaterializer(context, this.options.materializer);

    try {
      const collections = await this.collectionsToProcess(materializer);
      summary.collectionsSeen = collections.length;

      for (const collection of collections) {
        if (this.stopRequested()) break;
        await this.processCollection(materializer, collection, summary);
      }
    } catch (err) {
      // a cancelled unit keeps its in_progress checkpoint; the next start puts it back to pending
      if (!(err instanceof CancelledError)) throw err;
    } finally {
      summary.cancelled = this.options.signal?.aborted ?? false;
      summary.elapsedMs = Date.now() - started;
      await context.close();
    }

    logSummary(summary);
    return summary;
  }

  private stopRequested() {
    return this.halted || (this.options.signal?.aborted ?? false);
  }

  private read<V extends PageView<unknown>>(
    materializer: ContentMaterializer,
    url: string,
    reader: PageReader<V>,
    label: string
  ): Promise<MaterializeOutcome<V>> {
    return this.deps.retry.execute(
      async (_attempt, attemptSignal) => {
        await this.deps.gate.wait();
        return materializer.materialize(url, reader, { signal: this.options.signal, attemptSignal });
      },
      undefined,
      label
    );
  }

  private async collectionsToProcess(materializer: ContentMaterializer): Promise<CollectionRow[]> {
    const { checkpoints, store } = this.deps;
    const { nameFilter } = this.options;

    if (this.options.discover === "always" || !checkpoints.hasCollections()) {
      console.log(`📚 Reading league listing ${this.options.listingUrl} …`);
      let listed: CollectionRow[];
      try {
        const listing = await this.read(materializer, this.options.listingUrl, listingReader, "league listing");
        listed = listing.view.items.map((ref) => ({ id: ref.id, title: ref.title, sourceUrl: ref.url }));
      } catch (err) {
        if (err instanceof FatalError || err instanceof CancelledError) throw err;
        throw new FatalError(`Could not read the league listing: ${describeError(err)}`, { cause: err });
      }

      const matching = listed.filter((row) => matchesFilter(row.title, nameFilter));
      const skipped = listed.length - matching.length;
      console.log(
        `📚 ${listed.length} league(s) listed, ${matching.length} selected` +
          (skipped ? ` (${skipped} filtered out by "${nameFilter}")` : "")
      );
      for (const row of matching) store.upsertCollection(row);
      checkpoints.register(
        null,
        matching.map((row) => ({ collectionId: row.id, subCollectionId: null }))
      );
    }

    const rows: CollectionRow[] = [];
    for (const key of checkpoints.pendingKeys(null)) {
      const row = store.getCollection(key.collectionId);
      if (!row) {
        console.warn(`⚠️  Checkpoint for unknown league ${key.collectionId}; skipping`);
        continue;
      }
      if (!matchesFilter(row.title, nameFilter)) continue;
      rows.push(row);
    }
    return rows;
  }

  private async processCollection(materializer: ContentMaterializer, collection: CollectionRow, summary: RunSummary) {
    const { checkpoints, store } = this.deps;
    const key: CheckpointKey = { collectionId: collection.id, subCollectionId: null };

    console.log(`🏟  League "${collection.title}" (${collection.id})`);
    checkpoints.markInProgress(key);

    let rounds: SubCollectionRef[];
    try {
      const detail = await this.read(
        materializer,
        collection.sourceUrl,
        detailReader(collection.id),
        `league ${collection.id}`
      );
      if (detail.view.title) store.confirmCollectionTitle(collection.id, detail.view.title);
      rounds = detail.view.items;
      if (detail.kind === "empty") console.log(`ℹ️  League "${collection.title}" has no finished rounds.`);
    } catch (err) {
      if (err instanceof CancelledError) return;
      if (this.isRunFatal(err)) throw err;
      this.recordFailure(key, err, summary);
      summary.collectionsFailed += 1;
      return;
    }

    checkpoints.register(
      collection.id,
      rounds.map((round) => ({ collectionId: collection.id, subCollectionId: round.id }))
    );
    const byId = new Map(rounds.map((round) => [round.id, round]));
    const pending: SubCollectionRef[] = [];
    for (const pendingKey of checkpoints.pendingKeys(collection.id)) {
      const round = pendingKey.subCollectionId ? byId.get(pendingKey.subCollectionId) : undefined;
      if (round) pending.push(round);
    }

    const skipped = rounds.length - pending.length;
    if (skipped > 0) console.log(`⏭  ${skipped} round(s) already complete`);

    const limit = pLimit(this.options.concurrency);
    await Promise.all(pending.map((round) => limit(() => this.processSubCollection(materializer, round, summary))));

    if (this.stopRequested()) return;

    const tally = checkpoints.tally(
      collection.id,
      rounds.map((round) => round.id)
    );
    if (tally.failed > 0 && this.options.completionPolicy === "strict") {
      checkpoints.markFailed(key, `${tally.failed} round(s) failed`);
      summary.collectionsFailed += 1;
      console.warn(`⚠️  League "${collection.title}" left failed: ${tally.failed} round(s) failed (strict policy)`);
      return;
    }
    checkpoints.markComplete(key);
    summary.collectionsComplete += 1;
    console.log(`✅ League "${collection.title}" complete`);
  }

  private async processSubCollection(materializer: ContentMaterializer, round: SubCollectionRef, summary: RunSummary) {
    if (this.stopRequested()) return;
    const { checkpoints, store } = this.deps;
    const key: CheckpointKey = { collectionId: round.collectionId, subCollectionId: round.id };

    checkpoints.markInProgress(key);
    console.log(`🎵 Round ${round.sequenceNumber}: "${round.title}"`);

    let items: ExtractedItem[];
    try {
      const outcome = await this.read(materializer, round.url, resultReader, `round ${round.id}`);
      items = outcome.view.items;
      if (outcome.kind === "empty") {
        summary.subCollectionsEmpty += 1;
        console.log(`ℹ️  Round "${round.title}" has no songs.`);
      }
    } catch (err) {
      if (err instanceof CancelledError) return;
      if (this.isRunFatal(err)) throw err;
      this.recordFailure(key, err, summary);
      summary.subCollectionsFailed += 1;
      return;
    }

    const { batch, anomalies } = buildBatch(round, items, this.options.maxScore);
    for (const anomaly of anomalies) {
      if (anomaly.kind === "item") {
        console.warn(`⚠️  Round ${round.id}, song ${anomaly.itemId}: ${anomaly.reason}; song skipped`);
        summary.skippedItems += 1;
      } else {
        console.warn(`⚠️  Round ${round.id}, song ${anomaly.itemId}, ${anomaly.actor}: ${anomaly.reason}; vote rejected`);
        summary.rejectedLeafRecords += 1;
      }
    }

    try {
      store.commitSubCollection(batch, () => checkpoints.markComplete(key));
    } catch (err) {
      if (this.isRunFatal(err)) throw err;
      this.recordFailure(key, err, summary);
      summary.subCollectionsFailed += 1;
      return;
    }

    summary.subCollectionsComplete += 1;
    summary.itemsWritten += batch.items.length;
    summary.leafRecordsWritten += batch.leafRecords.length;
    console.log(`💾 Saved ${batch.items.length} songs, ${batch.leafRecords.length} votes for "${round.title}"`);
  }

  private isRunFatal(err: unknown): boolean {
    if (err instanceof FatalError) {
      this.halted = true;
      return true;
    }
    return false;
  }

  private recordFailure(key: CheckpointKey, err: unknown, summary: RunSummary) {
    const error = describeError(err);
    this.deps.checkpoints.markFailed(key, error);
    summary.failures.push({ key: describeKey(key), error });
    console.error(`   ⚠ ${describeKey(key)} failed: ${error}`);
  }
}

export function logSummary(summary: RunSummary) {
  const elapsed = Duration.fromMillis(summary.elapsedMs).shiftTo("minutes", "seconds").toHuman({ maximumFractionDigits: 0 });
  console.log(
    [
      summary.cancelled ? "🛑 Run cancelled." : "🏁 Run finished.",
      `   leagues: ${summary.collectionsComplete} complete, ${summary.collectionsFailed} failed (of ${summary.collectionsSeen})`,
      `   rounds: ${summary.subCollectionsComplete} complete, ${summary.subCollectionsFailed} failed, ${summary.subCollectionsEmpty} empty`,
      `   rows: ${summary.itemsWritten} songs, ${summary.leafRecordsWritten} votes`,
      `   anomalies: ${summary.rejectedLeafRecords} vote(s) rejected, ${summary.skippedItems} duplicate song(s) skipped`,
      `   elapsed: ${elapsed}`
    ].join("\n")
  );
}
