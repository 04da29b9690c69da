import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, type HarvestConfig } from "../src/config.js";
import { AuthenticationError } from "../src/errors.js";
import { emptySummary } from "../src/pipeline.js";
import {
  EXIT_CANCELLED,
  EXIT_FATAL,
  EXIT_OK,
  EXIT_PARTIAL,
  exitCodeFor,
  extractCommand,
  loginCommand,
  resetCommand,
  statusCommand,
  summarizeCheckpoints
} from "../src/run.js";
import { SessionStore } from "../src/session.js";
import { BASE_URL, FakeAuthenticator, FakeSite, buildLeagues, testSession } from "./helpers/fake-site.js";
import { noSleep } from "./helpers/harness.js";

describe("exitCodeFor", () => {
  it("is 0 for a clean run", () => {
    expect(exitCodeFor(emptySummary())).toBe(EXIT_OK);
  });

  it("is 3 when a unit failed", () => {
    expect(exitCodeFor({ ...emptySummary(), failures: [{ key: "a/r1", error: "HTTP 503" }] })).toBe(EXIT_PARTIAL);
    expect(exitCodeFor({ ...emptySummary(), collectionsFailed: 1 })).toBe(EXIT_PARTIAL);
  });

  it("is 130 when the run was cancelled", () => {
    expect(exitCodeFor({ ...emptySummary(), cancelled: true, collectionsFailed: 1 })).toBe(EXIT_CANCELLED);
  });
});

describe("summarizeCheckpoints", () => {
  it("groups rounds under their league", () => {
    const base = { attemptCount: 1, lastAttemptAt: null, errorDetail: null };
    const statuses = summarizeCheckpoints(
      [
        { ...base, collectionId: "a", subCollectionId: null, status: "failed" },
        { ...base, collectionId: "a", subCollectionId: "r1", status: "complete" },
        { ...base, collectionId: "a", subCollectionId: "r2", status: "failed" },
        { ...base, collectionId: "b", subCollectionId: "r1", status: "pending" }
      ],
      (id) => (id === "a" ? "League A" : null)
    );

    expect(statuses).toEqual([
      {
        collectionId: "a",
        title: "League A",
        status: "failed",
        rounds: { pending: 0, in_progress: 0, complete: 1, failed: 1 }
      },
      {
        collectionId: "b",
        title: null,
        status: "pending",
        rounds: { pending: 1, in_progress: 0, complete: 0, failed: 0 }
      }
    ]);
  });
});

describe("commands", () => {
  let testDir: string;
  let config: HarvestConfig;
  const now = () => new Date(2026, 2, 1, 10, 15, 0);

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(tmpdir(), "league-harvest-run-"));
    config = loadConfig({
      LH_BASE_URL: BASE_URL,
      LH_DATA_DIR: testDir,
      LH_DELAY_MIN_MS: "0",
      LH_DELAY_MAX_MS: "0",
      LH_BACKOFF_BASE_MS: "0",
      LH_MAX_LOAD_CYCLES: "3"
    });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe("login", () => {
    it("saves a session from the authenticator", async () => {
      const authenticator = new FakeAuthenticator();

      await expect(loginCommand(config, {}, { authenticator, now })).resolves.toBe(EXIT_OK);

      expect(authenticator.logins).toBe(1);
      expect(new SessionStore(config.sessionPath).load()).toEqual(testSession);
    });

    it("discards a valid session when forced", async () => {
      new SessionStore(config.sessionPath).save(testSession);
      const authenticator = new FakeAuthenticator(true);

      await loginCommand(config, { force: true }, { authenticator, now });

      expect(authenticator.probes).toBe(0);
      expect(authenticator.logins).toBe(1);
    });

    it("exits with 2 when sign-in fails", async () => {
      const authenticator = new FakeAuthenticator();
      vi.spyOn(authenticator, "login").mockRejectedValue(new AuthenticationError("Sign-in did not reach the landing page"));

      await expect(loginCommand(config, {}, { authenticator, now })).resolves.toBe(EXIT_FATAL);
      expect(console.error).toHaveBeenCalledWith("❌ Sign-in did not reach the landing page");
    });
  });

  describe("run and update", () => {
    it("extracts everything and exits with 0", async () => {
      const site = new FakeSite().serve(buildLeagues({ leagues: 1, rounds: 2, songs: 2, votes: 2 }));
      const deps = { authenticator: new FakeAuthenticator(), openContext: async () => site, sleep: noSleep, now };

      await expect(extractCommand(config, { discover: "auto" }, deps)).resolves.toBe(EXIT_OK);
      expect(site.opened).toHaveLength(4);

      await expect(extractCommand(config, { discover: "auto" }, deps)).resolves.toBe(EXIT_OK);
      expect(site.opened).toHaveLength(4);

      await expect(extractCommand(config, { discover: "always" }, deps)).resolves.toBe(EXIT_OK);
      expect(site.opened).toHaveLength(5);
    });

    it("exits with 3 when a round keeps failing", async () => {
      const [league] = buildLeagues({ leagues: 1, rounds: 2, songs: 1, votes: 1 });
      const site = new FakeSite().serve([league]).failRound(league.id, league.rounds[0].id, 3);

      const code = await extractCommand(
        config,
        { discover: "auto" },
        { authenticator: new FakeAuthenticator(), openContext: async () => site, sleep: noSleep, now }
      );

      expect(code).toBe(EXIT_PARTIAL);
    });

    it("exits with 2 when the listing cannot be read", async () => {
      const site = new FakeSite().route("/completed/", "<html></html>", { failures: 3 });

      const code = await extractCommand(
        config,
        { discover: "auto" },
        { authenticator: new FakeAuthenticator(), openContext: async () => site, sleep: noSleep, now }
      );

      expect(code).toBe(EXIT_FATAL);
    });

    it("exits with 2 without opening the site when sign-in fails", async () => {
      const site = new FakeSite();
      const authenticator = new FakeAuthenticator();
      vi.spyOn(authenticator, "login").mockRejectedValue(new AuthenticationError("Sign-in timed out"));

      const code = await extractCommand(
        config,
        { discover: "auto" },
        { authenticator, openContext: async () => site, sleep: noSleep, now }
      );

      expect(code).toBe(EXIT_FATAL);
      expect(site.opened).toEqual([]);
    });

    it("exits with 130 when cancelled", async () => {
      const site = new FakeSite().serve(buildLeagues({ leagues: 1, rounds: 1, songs: 1, votes: 1 }));
      const controller = new AbortController();
      controller.abort();

      const code = await extractCommand(
        config,
        { discover: "auto" },
        {
          authenticator: new FakeAuthenticator(),
          openContext: async () => site,
          sleep: noSleep,
          now,
          signal: controller.signal
        }
      );

      expect(code).toBe(EXIT_CANCELLED);
    });
  });

  describe("reset and status", () => {
    it("backs up, clears one league and reports progress", async () => {
      const leagues = buildLeagues({ leagues: 1, rounds: 2, songs: 1, votes: 1 });
      const site = new FakeSite().serve(leagues);
      await extractCommand(
        config,
        { discover: "auto" },
        { authenticator: new FakeAuthenticator(), openContext: async () => site, sleep: noSleep, now }
      );

      await expect(statusCommand(config)).resolves.toBe(EXIT_OK);
      expect(console.log).toHaveBeenCalledWith("   1 leagues, 2 rounds, 2 songs, 2 votes, 2 members");
      expect(console.log).toHaveBeenCalledWith("   [complete] League 1: rounds 2 complete, 0 failed, 0 pending");

      await expect(resetCommand(config, { collectionId: leagues[0].id, backup: true }, { now })).resolves.toBe(EXIT_OK);
      expect(fs.existsSync(path.join(testDir, "league-harvest.backup-20260301-101500.db"))).toBe(true);
      expect(console.log).toHaveBeenCalledWith(`🧹 Cleared 3 checkpoint(s) for ${leagues[0].id}`);

      await statusCommand(config);
      expect(console.log).toHaveBeenCalledWith("   [pending] League 1: rounds 0 complete, 0 failed, 0 pending");
    });

    it("reports an empty store", async () => {
      await expect(statusCommand(config)).resolves.toBe(EXIT_OK);
      expect(console.log).toHaveBeenCalledWith("   No checkpoints yet. Run `league-harvest run` to start.");
    });
  });
});
