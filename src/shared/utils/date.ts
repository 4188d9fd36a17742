/**
 * Timezone-Aware Date Utilities
 *
 * Query parameters are interpreted by the portal in its own time zone,
 * so "yesterday" is computed there rather than on the host clock.
 */
import moment from "moment-timezone";
import { PORTAL } from "../../config/constants";

/** Current time in the given zone */
export function nowIn(timezone: string): moment.Moment {
  return moment().tz(timezone);
}

/**
 * Yesterday at midnight as the portal's date editor expects it,
 * e.g. "17/10/26 00:00".
 */
export function yesterdayAtMidnight(timezone: string, now: moment.Moment = nowIn(timezone)): string {
  const yesterday = now.clone().tz(timezone).subtract(1, "day").startOf("day");
  return `${yesterday.format(PORTAL.DATE_FORMAT)} 00:00`;
}

/** Seconds elapsed since `startMs`, one decimal, for log messages */
export function secondsSince(startMs: number): string {
  return ((Date.now() - startMs) / 1000).toFixed(1);
}
