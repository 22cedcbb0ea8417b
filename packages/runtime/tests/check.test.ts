/**
 * CI check tests
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import { JsonlStatusLog } from "@lanekeeper/event-store";
import { StatusService } from "../src/status-service.js";
import { runCheck } from "../src/check.js";
import {
  APPROVED_EVIDENCE,
  FEATURE,
  eventId,
  fixedNow,
  makeTempRoot,
  removeTempRoot,
  silentLogger,
} from "./helpers.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("runCheck", () => {
  let rootDir: string;
  let service: StatusService;
  let output: string[];

  beforeEach(() => {
    rootDir = makeTempRoot();
    service = new StatusService({ rootDir, logger: silentLogger(), now: fixedNow });
    output = [];
    service.emit({
      eventType: "Claimed",
      aggregateId: { feature: FEATURE, wp: "WP01" },
      actor: "agent-1",
      payload: { assignee: "agent-1" },
    });
  });

  afterEach(() => {
    removeTempRoot(rootDir);
  });

  it("passes when every feature is clean", () => {
    const code = runCheck({ service, write: (text) => output.push(text) });
    expect(code).toBe(0);
    expect(output).toEqual(["✓ 034-parallel: 1 event(s)"]);
  });

  it("fails and names the offending event", () => {
    // Written below the service so the guard is not applied
    new JsonlStatusLog({ rootDir }).append({
      eventId: eventId(1),
      eventType: "Completed",
      aggregateId: { feature: "035-other", wp: "WP01" },
      fromLane: "planned",
      lamportClock: 1,
      at: "2026-01-05T10:00:00.000Z",
      actor: "reviewer-1",
      payload: { evidence: APPROVED_EVIDENCE },
    });

    const code = runCheck({ service, write: (text) => output.push(text) });

    expect(code).toBe(1);
    expect(output).toEqual([
      "✓ 034-parallel: 1 event(s)",
      `✗ 035-other: 1 event(s)\n  violation  ${eventId(1)} WP01 Completed planned -> done by reviewer-1: illegal transition planned -> done`,
    ]);
  });

  it("checks only the named features", () => {
    const code = runCheck({ service, features: [FEATURE], write: (text) => output.push(text) });
    expect(code).toBe(0);
    expect(output).toHaveLength(1);
  });
});
