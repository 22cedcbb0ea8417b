import { describe, it, expect } from "vitest";
import { InMemoryStatusLog } from "../src/in-memory-log.js";
import { serializeEvent } from "../src/codec.js";
import { AppendError, SchemaError } from "../src/types.js";
import { annotated, claimed, FEATURE } from "./helpers.js";

describe("InMemoryStatusLog", () => {
  it("stores canonical lines per feature", () => {
    const log = new InMemoryStatusLog();
    log.append(claimed(1));
    expect(log.readRaw(FEATURE)).toBe(`${serializeEvent(claimed(1))}\n`);
    expect(log.features()).toEqual([FEATURE]);
  });

  it("rejects malformed events", () => {
    const log = new InMemoryStatusLog();
    expect(() => log.append({ eventType: "Claimed" })).toThrow(SchemaError);
    expect(log.readRaw(FEATURE)).toBeUndefined();
  });

  it("reports raw lines that fail to parse", () => {
    const log = new InMemoryStatusLog();
    log.append(claimed(1));
    log.appendRaw(FEATURE, "{torn");
    const result = log.readAll(FEATURE);
    expect(result.events).toHaveLength(1);
    expect(result.errors.map((e) => e.line)).toEqual([2]);
  });

  it("passes the current log to appendWith and appends the result", () => {
    const log = new InMemoryStatusLog();
    log.append(claimed(1));

    const result = log.appendWith(FEATURE, (current) =>
      current.events.length === 1 ? annotated(2) : claimed(2),
    );

    expect(result.event.eventType).toBe("Annotated");
    expect(result.previous.events.map((e) => e.eventId)).toEqual([claimed(1).eventId]);
    expect(log.readAll(FEATURE).events).toHaveLength(2);
  });

  it("enforces the superset rule on merged rewrites", () => {
    const log = new InMemoryStatusLog();
    log.append(claimed(1));
    expect(() => log.writeMerged(FEATURE, [annotated(2)])).toThrow(AppendError);
    log.writeMerged(FEATURE, [claimed(1), annotated(2)]);
    expect(log.readAll(FEATURE).events).toHaveLength(2);
  });
});
