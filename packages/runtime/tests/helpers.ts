/**
 * Shared fixtures for runtime tests.
 */

import { mkdirSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import type { Evidence } from "@lanekeeper/types";

export const FEATURE = "034-parallel";

export const fixedNow = (): Date => new Date("2026-01-05T10:00:00.000Z");

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

export function makeTempRoot(): string {
  const dir = join(
    tmpdir(),
    `lanekeeper-runtime-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
  );
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTempRoot(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function eventId(n: number): string {
  return `01J${String(n).padStart(23, "0")}`;
}

export const APPROVED_EVIDENCE: Evidence = {
  repos: [],
  verification: [],
  review: { reviewer: "reviewer-1", verdict: "approved", reference: "PR#7" },
};
