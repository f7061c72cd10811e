import { DateTime } from "luxon";
import { describe, expect, it } from "vitest";
import { TogglPreconditionError } from "../errors";
import type { TimeEntry } from "../models";
import {
  addTag,
  copyTimeEntry,
  hasTag,
  isRunning,
  removeTag,
  setDuration,
  setStartTime,
  setStopTime,
} from "../time_entry";

const utc = (iso: string) => DateTime.fromISO(iso, { zone: "utc" });

const makeEntry = (overrides: Partial<TimeEntry> = {}): TimeEntry => ({
  workspace_id: 7,
  id: 42,
  project_id: null,
  task_id: null,
  description: "writing docs",
  start: utc("2024-03-05T09:00:00Z"),
  stop: utc("2024-03-05T10:00:00Z"),
  tags: ["a", "b"],
  duration: 3600,
  duronly: false,
  billable: false,
  ...overrides,
});

describe("isRunning", () => {
  it("depends on the sign of duration only", () => {
    expect(isRunning(makeEntry({ duration: -1 }))).toBe(true);
    expect(isRunning(makeEntry({ duration: -1709629200, stop: null }))).toBe(true);
    expect(isRunning(makeEntry({ duration: 0, stop: null }))).toBe(false);
    expect(isRunning(makeEntry())).toBe(false);
  });
});

describe("tags", () => {
  it("adds a tag once", () => {
    const entry = makeEntry();
    addTag(entry, "c");
    addTag(entry, "c");
    addTag(entry, "a");
    expect(entry.tags).toEqual(["a", "b", "c"]);
    expect(hasTag(entry, "c")).toBe(true);
  });

  it("ignores removal of an absent tag", () => {
    const entry = makeEntry();
    removeTag(entry, "zzz");
    expect(entry.tags).toEqual(["a", "b"]);
  });

  it("removes one occurrence and keeps order", () => {
    const entry = makeEntry({ tags: ["a", "b", "a", "c"] });
    removeTag(entry, "a");
    expect(entry.tags).toEqual(["b", "a", "c"]);
    expect(hasTag(entry, "a")).toBe(true);
  });
});

describe("copyTimeEntry", () => {
  it("returns a value whose mutation leaves the original alone", () => {
    const original = makeEntry();
    const copy = copyTimeEntry(original);

    addTag(copy, "c");
    setStartTime(copy, utc("2024-03-05T08:00:00Z"), true);
    setStopTime(copy, utc("2024-03-05T11:00:00Z"));

    expect(original.tags).toEqual(["a", "b"]);
    expect(original.start?.toMillis()).toBe(utc("2024-03-05T09:00:00Z").toMillis());
    expect(original.stop?.toMillis()).toBe(utc("2024-03-05T10:00:00Z").toMillis());
    expect(original.duration).toBe(3600);
    expect(copy.duration).toBe(3 * 3600);
  });
});

describe("setters", () => {
  it("refuses to set duration or stop on a running entry", () => {
    const entry = makeEntry({ duration: -1, stop: null });
    const before = copyTimeEntry(entry);

    expect(() => setDuration(entry, 60)).toThrow(TogglPreconditionError);
    expect(() => setStopTime(entry, utc("2024-03-05T12:00:00Z"))).toThrow("TimeEntry must be stopped");
    expect(entry).toEqual(before);
  });

  it("moves stop when setting duration", () => {
    const entry = makeEntry();
    setDuration(entry, 1800);
    expect(entry.duration).toBe(1800);
    expect(entry.stop?.toMillis()).toBe(utc("2024-03-05T09:30:00Z").toMillis());
  });

  it("recomputes stop from duration when updateEnd is true", () => {
    const entry = makeEntry();
    setStartTime(entry, utc("2024-03-05T08:00:00Z"), true);
    expect(entry.duration).toBe(3600);
    expect(entry.stop?.toMillis()).toBe(utc("2024-03-05T09:00:00Z").toMillis());
  });

  it("recomputes duration from stop when updateEnd is false", () => {
    const entry = makeEntry();
    setStartTime(entry, utc("2024-03-05T08:00:00Z"), false);
    expect(entry.duration).toBe(7200);
    expect(entry.stop?.toMillis()).toBe(utc("2024-03-05T10:00:00Z").toMillis());
  });

  it("only moves start on a running entry", () => {
    const entry = makeEntry({ duration: -1, stop: null });
    setStartTime(entry, utc("2024-03-05T08:00:00Z"), false);
    expect(entry.start?.toMillis()).toBe(utc("2024-03-05T08:00:00Z").toMillis());
    expect(entry.duration).toBe(-1);
    expect(entry.stop).toBeNull();
  });

  it("recomputes duration in whole seconds when setting stop", () => {
    const entry = makeEntry();
    setStopTime(entry, utc("2024-03-05T10:30:45.900Z"));
    expect(entry.duration).toBe(5445);
  });

  it("refuses to recompute duration without a stop time", () => {
    const entry = makeEntry({ stop: null });
    expect(() => setStartTime(entry, utc("2024-03-05T08:00:00Z"), false)).toThrow("TimeEntry has no stop time");
    expect(entry.start?.toMillis()).toBe(utc("2024-03-05T09:00:00Z").toMillis());
  });
});
