import { DateTime } from "luxon";

/** Run dates and file names are in Sofia local time. */
export const TIME_ZONE = "Europe/Sofia";

export interface Clock {
  now(): DateTime;
}

export const systemClock: Clock = {
  now: () => DateTime.now().setZone(TIME_ZONE),
};

/** A clock pinned to one instant, for tests and replays. */
export function fixedClock(iso: string): Clock {
  const instant = DateTime.fromISO(iso, { zone: TIME_ZONE });
  return { now: () => instant };
}

/** `yyyy-MM-dd` in Sofia time, used for raw file names. */
export function runDate(clock: Clock): string {
  return clock.now().setZone(TIME_ZONE).toFormat("yyyy-MM-dd");
}

/** `yyyy-MM-dd_HH-mm-ss` in Sofia time, used for reprocess and fetch outputs. */
export function runTimestamp(clock: Clock): string {
  return clock.now().setZone(TIME_ZONE).toFormat("yyyy-MM-dd_HH-mm-ss");
}

/** ISO-8601 timestamp with offset. */
export function isoTimestamp(clock: Clock): string {
  return clock.now().setZone(TIME_ZONE).toISO() ?? clock.now().toJSDate().toISOString();
}
