import { InvalidTransitionError } from "./errors.js";
import type { Db } from "./db.js";

export type CheckpointStatus = "pending" | "in_progress" | "complete" | "failed";

export interface CheckpointKey {
  collectionId: string;
  /** null addresses the collection-level checkpoint. */
  subCollectionId: string | null;
}

export interface CheckpointRecord extends CheckpointKey {
  status: CheckpointStatus;
  attemptCount: number;
  lastAttemptAt: string | null;
  errorDetail: string | null;
}

interface CheckpointRow {
  collection_id: string;
  subcollection_id: string;
  status: CheckpointStatus;
  attempt_count: number;
  last_attempt_at: string | null;
  error_detail: string | null;
}

const COLLECTION_LEVEL = "";

function toRecord(row: CheckpointRow): CheckpointRecord {
  return {
    collectionId: row.collection_id,
    subCollectionId: row.subcollection_id === COLLECTION_LEVEL ? null : row.subcollection_id,
    status: row.status,
    attemptCount: row.attempt_count,
    lastAttemptAt: row.last_attempt_at,
    errorDetail: row.error_detail
  };
}

export function describeKey(key: CheckpointKey) {
  return key.subCollectionId ? `${key.collectionId}/${key.subCollectionId}` : key.collectionId;
}

/**
 * Durable progress per collection and per round:
 * pending → in_progress → complete | failed, failed → in_progress.
 * complete is terminal until reset.
 */
export class CheckpointStore {
  constructor(
    private readonly db: Db,
    private readonly now: () => Date = () => new Date()
  ) {}

  get(key: CheckpointKey): CheckpointRecord | null {
    const row = this.db
      .prepare<[string, string], CheckpointRow>(
        "SELECT * FROM checkpoints WHERE collection_id = ? AND subcollection_id = ?"
      )
      .get(key.collectionId, key.subCollectionId ?? COLLECTION_LEVEL);
    return row ? toRecord(row) : null;
  }

  status(key: CheckpointKey): CheckpointStatus {
    return this.get(key)?.status ?? "pending";
  }

  /** Records discovered keys as pending, in source order; existing statuses are kept. */
  register(parent: string | null, keys: CheckpointKey[]): void {
    const upsert = this.db.prepare(
      `INSERT INTO checkpoints (collection_id, subcollection_id, status, position)
       VALUES (@collectionId, @subCollectionId, 'pending', @position)
       ON CONFLICT (collection_id, subcollection_id) DO UPDATE SET position = excluded.position`
    );
    this.db.transaction(() => {
      keys.forEach((key, position) => {
        if (parent !== null && key.collectionId !== parent) {
          throw new InvalidTransitionError(`${describeKey(key)} does not belong to ${parent}`);
        }
        upsert.run({
          collectionId: key.collectionId,
          subCollectionId: key.subCollectionId ?? COLLECTION_LEVEL,
          position
        });
      });
    })();
  }

  markInProgress(key: CheckpointKey): void {
    const current = this.status(key);
    if (current === "complete" || current === "in_progress") {
      throw new InvalidTransitionError(`${describeKey(key)} is ${current}; cannot start it`);
    }
    this.db
      .prepare(
        `INSERT INTO checkpoints (collection_id, subcollection_id, status, attempt_count, last_attempt_at)
         VALUES (@collectionId, @subCollectionId, 'in_progress', 1, @at)
         ON CONFLICT (collection_id, subcollection_id) DO UPDATE SET
           status = 'in_progress',
           attempt_count = attempt_count + 1,
           last_attempt_at = excluded.last_attempt_at`
      )
      .run({
        collectionId: key.collectionId,
        subCollectionId: key.subCollectionId ?? COLLECTION_LEVEL,
        at: this.now().toISOString()
      });
  }

  markComplete(key: CheckpointKey): void {
    this.finish(key, "complete", null);
  }

  markFailed(key: CheckpointKey, error: string): void {
    this.finish(key, "failed", error);
  }

  /** Non-complete keys under `parent` (null = collections), in registration order. */
  pendingKeys(parent: string | null): CheckpointKey[] {
    const rows =
      parent === null
        ? this.db
            .prepare<[string], CheckpointRow>(
              `SELECT * FROM checkpoints WHERE subcollection_id = ? AND status != 'complete'
               ORDER BY position, rowid`
            )
            .all(COLLECTION_LEVEL)
        : this.db
            .prepare<[string, string], CheckpointRow>(
              `SELECT * FROM checkpoints WHERE collection_id = ? AND subcollection_id != ? AND status != 'complete'
               ORDER BY position, rowid`
            )
            .all(parent, COLLECTION_LEVEL);
    return rows.map((row) => {
      const { collectionId, subCollectionId } = toRecord(row);
      return { collectionId, subCollectionId };
    });
  }

  hasCollections(): boolean {
    const row = this.db
      .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM checkpoints WHERE subcollection_id = ?")
      .get(COLLECTION_LEVEL);
    return (row?.n ?? 0) > 0;
  }

  /** Status counts of the rounds under one collection, optionally limited to the given round ids. */
  tally(collectionId: string, subCollectionIds?: readonly string[]): Record<CheckpointStatus, number> {
    const counts: Record<CheckpointStatus, number> = { pending: 0, in_progress: 0, complete: 0, failed: 0 };
    const wanted = subCollectionIds ? new Set(subCollectionIds) : null;
    const rows = this.db
      .prepare<[string, string], CheckpointRow>(
        "SELECT * FROM checkpoints WHERE collection_id = ? AND subcollection_id != ?"
      )
      .all(collectionId, COLLECTION_LEVEL);
    for (const row of rows) {
      if (wanted && !wanted.has(row.subcollection_id)) continue;
      counts[row.status] += 1;
    }
    return counts;
  }

  list(): CheckpointRecord[] {
    return this.db
      .prepare<[], CheckpointRow>("SELECT * FROM checkpoints ORDER BY collection_id, subcollection_id = '' DESC, position")
      .all()
      .map(toRecord);
  }

  /**
   * Forgets progress for everything, or for one collection: its rounds are dropped and
   * the collection goes back to pending so the next run reads it again. Returns rows touched.
   */
  reset(scope: { collectionId?: string } = {}): number {
    const { collectionId } = scope;
    if (!collectionId) {
      return this.db.prepare("DELETE FROM checkpoints").run().changes;
    }
    return this.db.transaction(() => {
      const rounds = this.db
        .prepare("DELETE FROM checkpoints WHERE collection_id = ? AND subcollection_id != ?")
        .run(collectionId, COLLECTION_LEVEL).changes;
      const collection = this.db
        .prepare(
          `UPDATE checkpoints SET status = 'pending', attempt_count = 0, last_attempt_at = NULL, error_detail = NULL
           WHERE collection_id = ? AND subcollection_id = ?`
        )
        .run(collectionId, COLLECTION_LEVEL).changes;
      return rounds + collection;
    })();
  }

  /** Puts units left in_progress by a killed run back to pending. Call once before extracting. */
  recoverInterrupted(): number {
    return this.db.prepare("UPDATE checkpoints SET status = 'pending' WHERE status = 'in_progress'").run().changes;
  }

  private finish(key: CheckpointKey, status: "complete" | "failed", error: string | null): void {
    const current = this.status(key);
    if (current !== "in_progress") {
      throw new InvalidTransitionError(`${describeKey(key)} is ${current}; cannot mark it ${status}`);
    }
    this.db
      .prepare(
        `UPDATE checkpoints SET status = ?, error_detail = ?
         WHERE collection_id = ? AND subcollection_id = ?`
      )
      .run(status, error, key.collectionId, key.subCollectionId ?? COLLECTION_LEVEL);
  }
}
