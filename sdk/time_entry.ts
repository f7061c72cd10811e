import type { DateTime } from "luxon";
import { TogglPreconditionError } from "./errors";
import type { TimeEntry } from "./models";

/**
 * Local helpers for time entries. None of these touch the network; they mutate the entry in place
 * so the result can be sent with `TogglSession.updateTimeEntry()`.
 *
 * Duration and stop time are derived from each other, so the setters refuse to run on a running
 * entry and leave it untouched when they throw.
 *
 * @module time_entry
 */

/** True iff `duration` is negative. A missing stop time does not count. */
export const isRunning = (entry: TimeEntry): boolean => entry.duration < 0;

export const hasTag = (entry: TimeEntry, tag: string): boolean => entry.tags.includes(tag);

/** Appends `tag` unless the entry already has it. */
export function addTag(entry: TimeEntry, tag: string): void {
  if (!hasTag(entry, tag)) entry.tags.push(tag);
}

/** Removes the first occurrence of `tag`, keeping the order of the others. */
export function removeTag(entry: TimeEntry, tag: string): void {
  const index = entry.tags.indexOf(tag);
  if (index !== -1) entry.tags.splice(index, 1);
}

/**
 * Returns an independent copy. Timestamps are immutable `DateTime` values and are shared.
 */
export const copyTimeEntry = (entry: TimeEntry): TimeEntry => ({ ...entry, tags: [...entry.tags] });

const wholeSecondsBetween = (start: DateTime, stop: DateTime): number =>
  Math.trunc((stop.toMillis() - start.toMillis()) / 1000);

const requireStopped = (entry: TimeEntry): void => {
  if (isRunning(entry)) throw new TogglPreconditionError("TimeEntry must be stopped");
};

const requireStart = (entry: TimeEntry): DateTime => {
  if (!entry.start) throw new TogglPreconditionError("TimeEntry has no start time");
  return entry.start;
};

/**
 * Sets the duration in seconds and moves the stop time to match.
 *
 * @throws {TogglPreconditionError} if the entry is running or has no start time
 */
export function setDuration(entry: TimeEntry, seconds: number): void {
  requireStopped(entry);
  const start = requireStart(entry);
  entry.duration = seconds;
  entry.stop = start.plus({ seconds });
}

/**
 * Sets the start time. On a stopped entry, `updateEnd` keeps the duration and moves the stop
 * time; otherwise the stop time stays and the duration is recomputed.
 *
 * @throws {TogglPreconditionError} if `updateEnd` is false on a stopped entry without a stop time
 */
export function setStartTime(entry: TimeEntry, start: DateTime, updateEnd: boolean): void {
  if (isRunning(entry)) {
    entry.start = start;
    return;
  }
  if (updateEnd) {
    entry.start = start;
    entry.stop = start.plus({ seconds: entry.duration });
    return;
  }
  if (!entry.stop) throw new TogglPreconditionError("TimeEntry has no stop time");
  entry.duration = wholeSecondsBetween(start, entry.stop);
  entry.start = start;
}

/**
 * Sets the stop time and recomputes the duration in whole seconds.
 *
 * @throws {TogglPreconditionError} if the entry is running or has no start time
 */
export function setStopTime(entry: TimeEntry, stop: DateTime): void {
  requireStopped(entry);
  const start = requireStart(entry);
  entry.stop = stop;
  entry.duration = wholeSecondsBetween(start, stop);
}
