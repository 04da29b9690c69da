import type { Db } from "./db.js";
import type {
  ActorRow,
  CollectionRow,
  ItemRow,
  LeafRecordRow,
  SubCollectionBatch,
  SubCollectionRow
} from "./types.js";

export interface StoreCounts {
  collections: number;
  subCollections: number;
  items: number;
  leafRecords: number;
  actors: number;
}

/**
 * Idempotent writes keyed by natural identifiers. Re-applying a batch leaves
 * one row per key with the latest values.
 */
export class HarvestStore {
  constructor(private readonly db: Db) {}

  /** First sighting wins; later listings never rewrite a known league. */
  upsertCollection(row: CollectionRow): void {
    this.db
      .prepare(
        `INSERT INTO collections (id, title, source_url) VALUES (@id, @title, @sourceUrl)
         ON CONFLICT (id) DO NOTHING`
      )
      .run(row);
  }

  /** Replaces the listing title with the league page's own, once. */
  confirmCollectionTitle(id: string, title: string): void {
    this.db
      .prepare(
        `UPDATE collections SET title = ?, title_confirmed = 1, updated_at = CURRENT_TIMESTAMP
         WHERE id = ? AND title_confirmed = 0`
      )
      .run(title, id);
  }

  getCollection(id: string): CollectionRow | null {
    const row = this.db
      .prepare<[string], CollectionRow>("SELECT id, title, source_url AS sourceUrl FROM collections WHERE id = ?")
      .get(id);
    return row ?? null;
  }

  upsertSubCollection(row: SubCollectionRow): void {
    this.db
      .prepare(
        `INSERT INTO subcollections (id, collection_id, sequence_number, title, description, source_url)
         VALUES (@id, @collectionId, @sequenceNumber, @title, @description, @sourceUrl)
         ON CONFLICT (id) DO UPDATE SET
           sequence_number = excluded.sequence_number,
           title = excluded.title,
           description = excluded.description,
           source_url = excluded.source_url,
           updated_at = CURRENT_TIMESTAMP`
      )
      .run(row);
  }

  upsertActors(rows: readonly ActorRow[]): void {
    const stmt = this.db.prepare(
      `INSERT INTO actors (handle, display_name) VALUES (@handle, @displayName)
       ON CONFLICT (handle) DO UPDATE SET display_name = excluded.display_name`
    );
    this.db.transaction(() => {
      for (const row of rows) stmt.run(row);
    })();
  }

  upsertItems(batch: readonly ItemRow[]): void {
    const stmt = this.db.prepare(
      `INSERT INTO items (id, subcollection_id, title, primary_attribute, secondary_attribute, submitter,
                          submission_note, aggregate_score, awarded_score, voter_count, position, source_url)
       VALUES (@id, @subCollectionId, @title, @primaryAttribute, @secondaryAttribute, @submitter,
               @submissionNote, @aggregateScore, @awardedScore, @voterCount, @position, @sourceUrl)
       ON CONFLICT (subcollection_id, id) DO UPDATE SET
         title = excluded.title,
         primary_attribute = excluded.primary_attribute,
         secondary_attribute = excluded.secondary_attribute,
         submitter = excluded.submitter,
         submission_note = excluded.submission_note,
         aggregate_score = excluded.aggregate_score,
         awarded_score = excluded.awarded_score,
         voter_count = excluded.voter_count,
         position = excluded.position,
         source_url = excluded.source_url,
         updated_at = CURRENT_TIMESTAMP`
    );
    this.db.transaction(() => {
      for (const row of batch) stmt.run(row);
    })();
  }

  upsertLeafRecords(batch: readonly LeafRecordRow[]): void {
    const stmt = this.db.prepare(
      `INSERT INTO leaf_records (subcollection_id, item_id, actor, value, note)
       VALUES (@subCollectionId, @itemId, @actor, @value, @note)
       ON CONFLICT (subcollection_id, item_id, actor) DO UPDATE SET
         value = excluded.value,
         note = excluded.note`
    );
    this.db.transaction(() => {
      for (const row of batch) stmt.run(row);
    })();
  }

  /**
   * Writes a round with its members, songs and votes in one transaction and runs
   * `onCommitted` inside it, so the checkpoint flips together with the rows.
   * Any error rolls the whole unit back.
   */
  commitSubCollection(batch: SubCollectionBatch, onCommitted?: () => void): void {
    this.db.transaction(() => {
      this.upsertSubCollection(batch.subCollection);
      this.upsertActors(batch.actors);
      this.upsertItems(batch.items);
      this.upsertLeafRecords(batch.leafRecords);
      onCommitted?.();
    })();
  }

  counts(): StoreCounts {
    const count = (table: string) =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
    return {
      collections: count("collections"),
      subCollections: count("subcollections"),
      items: count("items"),
      leafRecords: count("leaf_records"),
      actors: count("actors")
    };
  }

  countItems(subCollectionId: string): number {
    return (
      this.db
        .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM items WHERE subcollection_id = ?")
        .get(subCollectionId)?.n ?? 0
    );
  }
}
