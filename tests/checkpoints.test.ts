import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CheckpointStore, describeKey, type CheckpointKey } from "../src/checkpoints.js";
import { openDatabase, type Db } from "../src/db.js";
import { InvalidTransitionError } from "../src/errors.js";

const league = (collectionId: string): CheckpointKey => ({ collectionId, subCollectionId: null });
const round = (collectionId: string, subCollectionId: string): CheckpointKey => ({ collectionId, subCollectionId });

describe("CheckpointStore", () => {
  let db: Db;
  let checkpoints: CheckpointStore;

  beforeEach(() => {
    db = openDatabase(":memory:");
    checkpoints = new CheckpointStore(db, () => new Date("2026-02-01T12:00:00.000Z"));
  });

  afterEach(() => {
    db.close();
  });

  it("reports unknown keys as pending", () => {
    expect(checkpoints.status(league("a"))).toBe("pending");
    expect(checkpoints.get(league("a"))).toBeNull();
  });

  it("walks a unit through in_progress to complete", () => {
    checkpoints.markInProgress(round("a", "r1"));
    checkpoints.markComplete(round("a", "r1"));

    expect(checkpoints.get(round("a", "r1"))).toEqual({
      collectionId: "a",
      subCollectionId: "r1",
      status: "complete",
      attemptCount: 1,
      lastAttemptAt: "2026-02-01T12:00:00.000Z",
      errorDetail: null
    });
  });

  it("records the error and lets a failed unit start again", () => {
    checkpoints.markInProgress(round("a", "r1"));
    checkpoints.markFailed(round("a", "r1"), "HTTP 503");
    expect(checkpoints.get(round("a", "r1"))?.errorDetail).toBe("HTTP 503");

    checkpoints.markInProgress(round("a", "r1"));
    checkpoints.markComplete(round("a", "r1"));

    expect(checkpoints.get(round("a", "r1"))).toMatchObject({ status: "complete", attemptCount: 2, errorDetail: null });
  });

  it("refuses to restart a complete unit", () => {
    checkpoints.markInProgress(league("a"));
    checkpoints.markComplete(league("a"));

    expect(() => checkpoints.markInProgress(league("a"))).toThrow(InvalidTransitionError);
  });

  it("refuses to start a unit twice", () => {
    checkpoints.markInProgress(league("a"));

    expect(() => checkpoints.markInProgress(league("a"))).toThrow("a is in_progress; cannot start it");
  });

  it("refuses to finish a unit that never started", () => {
    expect(() => checkpoints.markComplete(round("a", "r1"))).toThrow("a/r1 is pending; cannot mark it complete");
    expect(() => checkpoints.markFailed(league("a"), "boom")).toThrow(InvalidTransitionError);
  });

  it("registers keys in source order and keeps existing statuses", () => {
    checkpoints.register("a", [round("a", "r2"), round("a", "r1")]);
    checkpoints.markInProgress(round("a", "r2"));
    checkpoints.markComplete(round("a", "r2"));

    checkpoints.register("a", [round("a", "r1"), round("a", "r2"), round("a", "r3")]);

    expect(checkpoints.status(round("a", "r2"))).toBe("complete");
    expect(checkpoints.pendingKeys("a")).toEqual([round("a", "r1"), round("a", "r3")]);
  });

  it("rejects a round registered under another league", () => {
    expect(() => checkpoints.register("a", [round("b", "r1")])).toThrow(InvalidTransitionError);
    expect(checkpoints.list()).toEqual([]);
  });

  it("keeps league and round keys apart", () => {
    checkpoints.register(null, [league("a"), league("b")]);
    checkpoints.register("a", [round("a", "r1")]);

    expect(checkpoints.pendingKeys(null)).toEqual([league("a"), league("b")]);
    expect(checkpoints.pendingKeys("a")).toEqual([round("a", "r1")]);
    expect(checkpoints.hasCollections()).toBe(true);
  });

  it("lists failed units among the pending ones", () => {
    checkpoints.register(null, [league("a"), league("b")]);
    checkpoints.markInProgress(league("a"));
    checkpoints.markFailed(league("a"), "boom");
    checkpoints.markInProgress(league("b"));
    checkpoints.markComplete(league("b"));

    expect(checkpoints.pendingKeys(null)).toEqual([league("a")]);
  });

  it("tallies round statuses, optionally for selected rounds", () => {
    checkpoints.register("a", [round("a", "r1"), round("a", "r2"), round("a", "r3")]);
    checkpoints.markInProgress(round("a", "r1"));
    checkpoints.markComplete(round("a", "r1"));
    checkpoints.markInProgress(round("a", "r2"));
    checkpoints.markFailed(round("a", "r2"), "boom");

    expect(checkpoints.tally("a")).toEqual({ pending: 1, in_progress: 0, complete: 1, failed: 1 });
    expect(checkpoints.tally("a", ["r1", "r2"])).toEqual({ pending: 0, in_progress: 0, complete: 1, failed: 1 });
  });

  it("puts interrupted units back to pending", () => {
    checkpoints.markInProgress(league("a"));
    checkpoints.markInProgress(round("a", "r1"));

    expect(checkpoints.recoverInterrupted()).toBe(2);
    expect(checkpoints.status(league("a"))).toBe("pending");
    expect(checkpoints.status(round("a", "r1"))).toBe("pending");
  });

  it("resets one league back to pending and forgets its rounds", () => {
    checkpoints.register(null, [league("a"), league("b")]);
    checkpoints.markInProgress(league("a"));
    checkpoints.markComplete(league("a"));
    checkpoints.register("a", [round("a", "r1"), round("a", "r2")]);
    checkpoints.markInProgress(league("b"));
    checkpoints.markComplete(league("b"));

    expect(checkpoints.reset({ collectionId: "a" })).toBe(3);
    expect(checkpoints.get(league("a"))).toMatchObject({ status: "pending", attemptCount: 0, lastAttemptAt: null });
    expect(checkpoints.pendingKeys("a")).toEqual([]);
    expect(checkpoints.status(league("b"))).toBe("complete");
  });

  it("resets everything", () => {
    checkpoints.register(null, [league("a"), league("b")]);

    expect(checkpoints.reset()).toBe(2);
    expect(checkpoints.hasCollections()).toBe(false);
  });
});

describe("describeKey", () => {
  it("joins league and round ids", () => {
    expect(describeKey(round("a", "r1"))).toBe("a/r1");
    expect(describeKey(league("a"))).toBe("a");
  });
});
