/**
 * StatusService — Composition root for the status packages.
 *
 * Callers (CLI commands, CI jobs, agents) go through this service; they
 * never write to a log or a snapshot file directly.
 *
 * Emit pipeline:
 *   [lock: read → derive (current lane, next Lamport clock) → build
 *   → validate → append] → materialize
 *
 * Rules:
 * - Derivation and append share the feature's lock, so two writers never
 *   emit from the same observed state
 * - Nothing is written when a transition fails validation
 * - The append is the commit point; a failed snapshot write is logged, not thrown
 * - Every read goes through materialize, so the snapshot is always recomputable
 */

import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import type { StatusEvent, StatusEventType, StatusSnapshot } from "@lanekeeper/types";
import {
  EVENTS_FILENAME,
  JsonlStatusLog,
  LamportClock,
  createStatusEvent,
  maxLamportClock,
  readSnapshotFile,
  writeSnapshotFile,
} from "@lanekeeper/event-store";
import type {
  FileLockOptions,
  ReadResult,
  StatusEventInput,
  StatusLog,
} from "@lanekeeper/event-store";
import { validateTransition } from "@lanekeeper/lifecycle";
import { materialize, mergeLogs } from "@lanekeeper/merge";
import type { MergeResult } from "@lanekeeper/merge";
import { reconcile } from "@lanekeeper/reconciler";
import type { ReconcileResult, RepoScan } from "@lanekeeper/reconciler";
import { buildValidationReport, runDoctor } from "@lanekeeper/verify";
import type { DoctorResult, ValidationReport } from "@lanekeeper/verify";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";
import { TransitionError } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export interface StatusServiceOptions {
  /** Directory holding one subdirectory per feature */
  readonly rootDir: string;
  readonly logger: Logger;
  /** Defaults to a JsonlStatusLog under rootDir */
  readonly log?: StatusLog;
  readonly lock?: FileLockOptions;
  /** Actor used when a request names none */
  readonly defaultActor?: string;
  readonly staleClaimedDays?: number;
  readonly staleInProgressDays?: number;
  readonly now?: () => Date;
}

/**
 * What a caller supplies to emit: the lane and the clock are derived.
 * Lane names in the payload may be aliases ("doing").
 */
export type EmitRequest = {
  [K in StatusEventType]: Omit<
    StatusEventInput<K>,
    "eventId" | "at" | "fromLane" | "lamportClock" | "actor"
  > & {
    readonly actor?: string;
  };
}[StatusEventType];

export interface EmitResult {
  readonly event: StatusEvent;
  readonly snapshot: StatusSnapshot;
}

/** Service options taken from loaded configuration. */
export function serviceOptionsFromConfig(
  config: AppConfig,
  logger: Logger,
): StatusServiceOptions {
  return {
    rootDir: config.STATUS_ROOT,
    logger,
    lock: {
      staleAfterMs: config.LOCK_STALE_MS,
      retryDelayMs: config.LOCK_RETRY_DELAY_MS,
      maxRetries: config.LOCK_MAX_RETRIES,
    },
    ...(config.ACTOR !== undefined ? { defaultActor: config.ACTOR } : {}),
    staleClaimedDays: config.STALE_CLAIMED_DAYS,
    staleInProgressDays: config.STALE_IN_PROGRESS_DAYS,
  };
}

// =============================================================================
// Service
// =============================================================================

export class StatusService {
  readonly log: StatusLog;

  private readonly _rootDir: string;
  private readonly _logger: Logger;
  private readonly _defaultActor: string | undefined;
  private readonly _staleClaimedDays: number;
  private readonly _staleInProgressDays: number;
  private readonly _now: () => Date;

  constructor(options: StatusServiceOptions) {
    this._rootDir = options.rootDir;
    this._logger = options.logger;
    this.log =
      options.log ??
      new JsonlStatusLog({
        rootDir: options.rootDir,
        ...(options.lock !== undefined ? { lock: options.lock } : {}),
      });
    this._defaultActor = options.defaultActor;
    this._staleClaimedDays = options.staleClaimedDays ?? 7;
    this._staleInProgressDays = options.staleInProgressDays ?? 14;
    this._now = options.now ?? (() => new Date());
  }

  featureDir(feature: string): string {
    return join(this._rootDir, feature);
  }

  /** Features under the root that have an event log. */
  listFeatures(): string[] {
    if (!existsSync(this._rootDir)) return [];
    return readdirSync(this._rootDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .filter((name) => existsSync(join(this._rootDir, name, EVENTS_FILENAME)))
      .sort();
  }

  // ─── Emit ──────────────────────────────────────────────────────────

  /**
   * Record a lifecycle event for a work package.
   *
   * @throws TransitionError GUARD_VIOLATION when the transition is refused
   * @throws TransitionError ACTOR_REQUIRED when no actor is known
   * @throws SchemaError / AppendError from the log (LOCK_TIMEOUT when
   *   another writer holds the feature's lock too long)
   */
  emit(request: EmitRequest): EmitResult {
    const { feature, wp } = request.aggregateId;
    const actor = request.actor ?? this._defaultActor;
    if (actor === undefined) {
      throw new TransitionError("ACTOR_REQUIRED", `No actor given for ${feature}/${wp}`);
    }

    const { event, previous } = this.log.appendWith(feature, (current) => {
      this._warnUnreadable(feature, current);

      // Derive
      const state = materialize(current.events, { feature }).snapshot.workPackages[wp];
      const fromLane = state?.lane ?? "planned";
      const lamportClock = new LamportClock(maxLamportClock(current.events)).tick();

      // Build
      const draft = createStatusEvent(
        { ...request, actor, fromLane, lamportClock },
        { now: this._now },
      );

      // Validate
      const check = validateTransition(
        fromLane,
        draft,
        state?.claimant !== undefined ? { claimant: state.claimant } : {},
      );
      if (!check.ok) {
        this._logger.warn(
          { feature, wp, eventType: draft.eventType, reason: check.violation.reason },
          "Transition refused",
        );
        throw new TransitionError("GUARD_VIOLATION", check.violation.reason, check.violation);
      }
      return draft;
    });

    // Materialize
    const next = materialize([...previous.events, event], { feature });
    this._logger.info(
      {
        eventId: event.eventId,
        feature,
        wp,
        eventType: event.eventType,
        lane: next.snapshot.workPackages[wp]?.lane,
      },
      "Status event appended",
    );
    this._writeSnapshot(feature, next.snapshot);

    return { event, snapshot: next.snapshot };
  }

  // ─── Read paths ────────────────────────────────────────────────────

  /** Replay the log and refresh status.json. */
  materialize(feature: string): MergeResult {
    const result = materialize(this._read(feature).events, { feature });
    this._writeSnapshot(feature, result.snapshot);
    return result;
  }

  validate(feature: string): ValidationReport {
    const read = this._read(feature);
    const report = buildValidationReport({
      feature,
      read,
      merged: materialize(read.events, { feature }),
    });
    this._logger.debug(
      {
        feature,
        passed: report.passed,
        violations: report.violations.length,
        ambiguities: report.ambiguities.length,
        schemaErrors: report.schemaErrors.length,
      },
      "Validation complete",
    );
    return report;
  }

  doctor(feature: string): DoctorResult {
    const read = this._read(feature);
    const recomputed = materialize(read.events, { feature }).snapshot;
    return runDoctor({
      feature,
      snapshotOnDisk: readSnapshotFile(this.featureDir(feature)),
      recomputed,
      schemaErrors: read.errors,
      stale: {
        now: this._now(),
        claimedDays: this._staleClaimedDays,
        inProgressDays: this._staleInProgressDays,
      },
    });
  }

  // ─── Write paths ───────────────────────────────────────────────────

  /**
   * Reconcile against target-repo scans. Dry run unless `dryRun` is false.
   */
  reconcile(
    feature: string,
    scans: readonly RepoScan[],
    options: { readonly dryRun?: boolean } = {},
  ): ReconcileResult {
    const read = this._read(feature);
    const plan = materialize(read.events, { feature }).snapshot;
    const result = reconcile(plan, scans, {
      dryRun: options.dryRun ?? true,
      log: this.log,
      lamportFloor: maxLamportClock(read.events),
      now: this._now,
    });

    this._logger.info(
      {
        feature,
        proposed: result.proposedEvents.length,
        applied: result.applied,
        reposScanned: result.reposScanned,
        errors: result.errors.length,
      },
      result.applied > 0 ? "Reconciliation applied" : "Reconciliation planned",
    );

    if (result.applied > 0) {
      this.materialize(feature);
    }
    return result;
  }

  /**
   * Merge another branch's events into this feature's log and rewrite it
   * in canonical order.
   */
  merge(feature: string, incoming: readonly StatusEvent[]): MergeResult {
    const read = this._read(feature);
    const result = mergeLogs(read.events, incoming, { feature });
    this.log.writeMerged(feature, result.events);
    this._logger.info(
      {
        feature,
        eventCount: result.events.length,
        superseded: result.superseded.length,
        violations: result.violations.length,
        ambiguities: result.ambiguities.length,
      },
      "Logs merged",
    );
    this._writeSnapshot(feature, result.snapshot);
    return result;
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private _read(feature: string): ReadResult {
    const read = this.log.readAll(feature);
    this._warnUnreadable(feature, read);
    return read;
  }

  private _warnUnreadable(feature: string, read: ReadResult): void {
    if (read.errors.length > 0) {
      this._logger.warn(
        { feature, lines: read.errors.map((e) => e.line) },
        "Status log has unreadable lines; they are excluded from replay",
      );
    }
  }

  private _writeSnapshot(feature: string, snapshot: StatusSnapshot): void {
    try {
      writeSnapshotFile(this.featureDir(feature), snapshot);
    } catch (err) {
      this._logger.warn({ err, feature }, "Snapshot write failed; the event log is unaffected");
    }
  }
}
