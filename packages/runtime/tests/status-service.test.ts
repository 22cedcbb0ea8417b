/**
 * StatusService tests
 *
 * Exercises the emit pipeline, the read paths and the write paths against
 * a JSONL log in a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { appendFileSync, existsSync, mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import type { StatusEvent } from "@lanekeeper/types";
import { JsonlStatusLog, readSnapshotFile } from "@lanekeeper/event-store";
import type {
  AppendResult,
  AppendWithResult,
  EventBuilder,
  ReadResult,
  StatusLog,
  WriteMergedResult,
} from "@lanekeeper/event-store";
import type { RepoScan } from "@lanekeeper/reconciler";
import { StatusService } from "../src/status-service.js";
import type { EmitRequest } from "../src/status-service.js";
import { TransitionError } from "../src/errors.js";
import {
  APPROVED_EVIDENCE,
  FEATURE,
  eventId,
  fixedNow,
  makeTempRoot,
  removeTempRoot,
  silentLogger,
} from "./helpers.js";

const aggregateId = { feature: FEATURE, wp: "WP01" };

function claimAs(actor: string): EmitRequest {
  return { eventType: "Claimed", aggregateId, actor, payload: { assignee: actor } };
}

const claimRequest = claimAs("agent-1");

const startRequest: EmitRequest = {
  eventType: "StateEntered",
  aggregateId,
  actor: "agent-1",
  payload: { lane: "in_progress", workspaceRef: "wt/WP01" },
};

/**
 * Runs another writer's emit right before the wrapped log's first
 * read-then-append.
 */
class InterleavingLog implements StatusLog {
  private _fired = false;

  constructor(
    private readonly _inner: StatusLog,
    private readonly _rival: () => void,
  ) {}

  append(event: unknown): AppendResult {
    return this._inner.append(event);
  }

  appendWith(feature: string, build: EventBuilder): AppendWithResult {
    if (!this._fired) {
      this._fired = true;
      this._rival();
    }
    return this._inner.appendWith(feature, build);
  }

  readAll(feature: string): ReadResult {
    return this._inner.readAll(feature);
  }

  writeMerged(feature: string, events: readonly StatusEvent[]): WriteMergedResult {
    return this._inner.writeMerged(feature, events);
  }
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe("StatusService", () => {
  let rootDir: string;
  let service: StatusService;

  beforeEach(() => {
    rootDir = makeTempRoot();
    service = new StatusService({ rootDir, logger: silentLogger(), now: fixedNow });
  });

  afterEach(() => {
    removeTempRoot(rootDir);
  });

  // ─── Emit ──────────────────────────────────────────────────────────

  describe("emit", () => {
    it("derives the lane and clock, appends, and writes the snapshot", () => {
      const { event, snapshot } = service.emit(claimRequest);

      expect(event.fromLane).toBe("planned");
      expect(event.lamportClock).toBe(1);
      expect(event.at).toBe("2026-01-05T10:00:00.000Z");
      expect(snapshot.workPackages.WP01?.lane).toBe("claimed");
      expect(service.log.readAll(FEATURE).events.map((e) => e.eventId)).toEqual([event.eventId]);
      expect(readSnapshotFile(service.featureDir(FEATURE))?.workPackages.WP01?.lane).toBe(
        "claimed",
      );
    });

    it("continues from the current lane and highest clock", () => {
      service.emit(claimRequest);
      const { event, snapshot } = service.emit(startRequest);

      expect(event.fromLane).toBe("claimed");
      expect(event.lamportClock).toBe(2);
      expect(snapshot.workPackages.WP01?.lane).toBe("in_progress");
    });

    it("refuses an illegal transition without writing", () => {
      const err = captureError(() =>
        service.emit({
          eventType: "Completed",
          aggregateId,
          actor: "reviewer-1",
          payload: { evidence: APPROVED_EVIDENCE },
        }),
      );

      expect(err).toBeInstanceOf(TransitionError);
      if (!(err instanceof TransitionError)) return;
      expect(err.code).toBe("GUARD_VIOLATION");
      expect(err.message).toBe("illegal transition planned -> done");
      expect(err.violation?.attemptedEventType).toBe("Completed");
      expect(existsSync(join(rootDir, FEATURE, "status.events.jsonl"))).toBe(false);
    });

    it("refuses a second claim while one is active", () => {
      service.emit(claimRequest);
      const err = captureError(() => service.emit(claimAs("agent-2")));

      expect(err).toBeInstanceOf(TransitionError);
      if (!(err instanceof TransitionError)) return;
      expect(err.message).toBe("conflicting active claim: already claimed by agent-1");
      expect(service.log.readAll(FEATURE).events).toHaveLength(1);
    });

    it("uses the default actor when the request names none", () => {
      const withActor = new StatusService({
        rootDir,
        logger: silentLogger(),
        defaultActor: "agent-9",
        now: fixedNow,
      });
      const { event } = withActor.emit({
        eventType: "Claimed",
        aggregateId,
        payload: { assignee: "agent-9" },
      });
      expect(event.actor).toBe("agent-9");
    });

    it("requires an actor from somewhere", () => {
      const err = captureError(() =>
        service.emit({ eventType: "Claimed", aggregateId, payload: { assignee: "agent-1" } }),
      );
      expect(err).toBeInstanceOf(TransitionError);
      if (!(err instanceof TransitionError)) return;
      expect(err.code).toBe("ACTOR_REQUIRED");
    });

    it("accepts lane aliases and stores the canonical lane", () => {
      service.emit(claimRequest);
      const { event, snapshot } = service.emit({
        eventType: "ForcedTransition",
        aggregateId,
        actor: "lead",
        reason: "agent restarted mid-task",
        payload: { toLane: "doing" },
      });

      expect(event.eventType === "ForcedTransition" && event.payload.toLane).toBe("in_progress");
      expect(snapshot.workPackages.WP01?.lane).toBe("in_progress");
      expect(new JsonlStatusLog({ rootDir }).readRaw(FEATURE)).toContain('"toLane":"in_progress"');
    });

    it("accepts the alias for a started lane", () => {
      service.emit(claimRequest);
      const { event } = service.emit({
        eventType: "StateEntered",
        aggregateId,
        actor: "agent-1",
        payload: { lane: "doing", workspaceRef: "wt/WP01" },
      });
      expect(event.eventType === "StateEntered" && event.payload.lane).toBe("in_progress");
    });

    it("keeps the appended event when the snapshot cannot be written", () => {
      const logger = silentLogger();
      const warn = vi.spyOn(logger, "warn");
      const blocked = new StatusService({ rootDir, logger, now: fixedNow });
      mkdirSync(join(rootDir, FEATURE, "status.json"), { recursive: true });

      const { event } = blocked.emit(claimRequest);

      expect(blocked.log.readAll(FEATURE).events.map((e) => e.eventId)).toEqual([event.eventId]);
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ feature: FEATURE }),
        "Snapshot write failed; the event log is unaffected",
      );
    });
  });

  // ─── Concurrent writers ────────────────────────────────────────────

  describe("concurrent writers", () => {
    it("derives from another writer's event appended after the caller started", () => {
      const rival = new StatusService({ rootDir, logger: silentLogger(), now: fixedNow });
      const racing = new StatusService({
        rootDir,
        logger: silentLogger(),
        now: fixedNow,
        log: new InterleavingLog(new JsonlStatusLog({ rootDir }), () => {
          rival.emit(claimAs("agent-2"));
        }),
      });

      const err = captureError(() => racing.emit(claimRequest));

      expect(err).toBeInstanceOf(TransitionError);
      if (!(err instanceof TransitionError)) return;
      expect(err.code).toBe("GUARD_VIOLATION");
      expect(err.message).toBe("conflicting active claim: already claimed by agent-2");
      const events = racing.log.readAll(FEATURE).events;
      expect(events.map((e) => [e.actor, e.lamportClock])).toEqual([["agent-2", 1]]);
    });

    it("takes the next clock after another writer's event", () => {
      const rival = new StatusService({ rootDir, logger: silentLogger(), now: fixedNow });
      const racing = new StatusService({
        rootDir,
        logger: silentLogger(),
        now: fixedNow,
        log: new InterleavingLog(new JsonlStatusLog({ rootDir }), () => {
          rival.emit({
            eventType: "Annotated",
            aggregateId,
            actor: "agent-2",
            payload: { note: "picking this up after lunch" },
          });
        }),
      });

      const { event, snapshot } = racing.emit(claimRequest);

      expect(event.lamportClock).toBe(2);
      expect(snapshot.eventCount).toBe(2);
      expect(snapshot.workPackages.WP01?.claimant).toBe("agent-1");
      expect(racing.log.readAll(FEATURE).events.map((e) => e.lamportClock)).toEqual([1, 2]);
    });
  });

  // ─── Read paths ────────────────────────────────────────────────────

  describe("validate", () => {
    it("passes a log written through emit", () => {
      service.emit(claimRequest);
      service.emit(startRequest);
      const report = service.validate(FEATURE);
      expect(report.passed).toBe(true);
      expect(report.eventCount).toBe(2);
    });

    it("fails on an unreadable line", () => {
      service.emit(claimRequest);
      appendFileSync(join(rootDir, FEATURE, "status.events.jsonl"), "not json\n");

      const report = service.validate(FEATURE);
      expect(report.passed).toBe(false);
      expect(report.eventCount).toBe(1);
      expect(report.schemaErrors.map((e) => e.line)).toEqual([2]);
    });
  });

  describe("doctor", () => {
    it("is healthy right after an emit", () => {
      service.emit(claimRequest);
      expect(service.doctor(FEATURE).healthy).toBe(true);
    });

    it("reports a missing snapshot file", () => {
      service.emit(claimRequest);
      rmSync(join(rootDir, FEATURE, "status.json"));

      const result = service.doctor(FEATURE);
      expect(result.findings.map((f) => f.category)).toEqual(["materialization_drift"]);
      expect(result.hasErrors).toBe(false);
    });

    it("flags a stale claim", () => {
      service.emit(claimRequest);
      const later = new StatusService({
        rootDir,
        logger: silentLogger(),
        staleClaimedDays: 2,
        now: () => new Date("2026-01-09T10:00:00.000Z"),
      });
      expect(later.doctor(FEATURE).findings.map((f) => f.message)).toEqual([
        "WP01 has been in 'claimed' for 4 days (threshold: 2 days). Actor: agent-1",
      ]);
    });
  });

  describe("listFeatures", () => {
    it("lists directories that hold an event log", () => {
      service.emit(claimRequest);
      mkdirSync(join(rootDir, "empty-feature"));
      expect(service.listFeatures()).toEqual([FEATURE]);
    });

    it("is empty when the root does not exist", () => {
      const missing = new StatusService({ rootDir: join(rootDir, "nope"), logger: silentLogger() });
      expect(missing.listFeatures()).toEqual([]);
    });
  });

  // ─── Write paths ───────────────────────────────────────────────────

  describe("merge", () => {
    it("rewrites the log with the union of both branches", () => {
      const { event: claimed } = service.emit(claimRequest);
      const started: StatusEvent = {
        eventId: eventId(2),
        eventType: "StateEntered",
        aggregateId,
        fromLane: "claimed",
        lamportClock: 2,
        at: "2026-01-05T10:05:00.000Z",
        actor: "agent-1",
        payload: { lane: "in_progress", workspaceRef: "wt/WP01" },
      };

      const result = service.merge(FEATURE, [claimed, started]);

      expect(result.events.map((e) => e.eventId)).toEqual([claimed.eventId, eventId(2)]);
      expect(service.log.readAll(FEATURE).events.map((e) => e.eventId)).toEqual([
        claimed.eventId,
        eventId(2),
      ]);
      expect(readSnapshotFile(service.featureDir(FEATURE))?.workPackages.WP01?.lane).toBe(
        "in_progress",
      );
    });
  });

  describe("reconcile", () => {
    const mergedBranch: RepoScan = {
      repo: "app",
      branches: [
        {
          name: `${FEATURE}-WP01`,
          head: {
            sha: "abc1234",
            message: `${FEATURE} WP01: implement`,
            author: "agent-1",
            date: "2026-01-05T09:00:00Z",
          },
          merged: true,
        },
      ],
      commits: [],
    };

    it("leaves the log byte-for-byte unchanged on a dry run with no evidence", () => {
      service.emit(claimRequest);
      const fileLog = new JsonlStatusLog({ rootDir });
      const before = fileLog.readRaw(FEATURE);

      const result = service.reconcile(FEATURE, [{ repo: "app", branches: [], commits: [] }]);

      expect(result.details).toEqual(["No WP-linked commits found in target repos"]);
      expect(fileLog.readRaw(FEATURE)).toBe(before);
    });

    it("applies proposals after the highest clock in the log", () => {
      service.emit(claimRequest);

      const result = service.reconcile(FEATURE, [mergedBranch], { dryRun: false });

      expect(result.applied).toBe(2);
      expect(result.proposedEvents.map((e) => e.lamportClock)).toEqual([2, 3]);
      expect(service.log.readAll(FEATURE).events).toHaveLength(3);
      expect(readSnapshotFile(service.featureDir(FEATURE))?.workPackages.WP01?.lane).toBe(
        "for_review",
      );
    });
  });
});
