/**
 * xs:dayTimeDuration lexical form: [-]P[nD][T[nH][nM][nS]]
 */

import { EvaluationError } from "../errors";

const DURATION_PATTERN =
  /^(-)?P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

export const MICROS_PER_DAY = 86_400_000_000n;
export const MICROS_PER_HOUR = 3_600_000_000n;
export const MICROS_PER_MINUTE = 60_000_000n;
export const MICROS_PER_SECOND = 1_000_000n;

/**
 * Scale a non-negative decimal component by a microsecond unit, truncating
 * anything below one microsecond
 */
function scaleComponent(text: string, unitMicros: bigint): bigint {
  const [whole, fraction = ""] = text.split(".");
  const scale = 10n ** BigInt(fraction.length);
  const scaled = BigInt(whole + fraction);
  return (scaled * unitMicros) / scale;
}

export function parseDayTimeDurationLexical(text: string): bigint {
  const trimmed = text.trim();
  const match = DURATION_PATTERN.exec(trimmed);
  // "P", "PT" and a dangling "T" are not durations
  if (!match || trimmed.endsWith("P") || trimmed.endsWith("T")) {
    throw new EvaluationError(`Invalid xs:dayTimeDuration literal "${text}"`, "FORG0001");
  }

  const [, sign, days, hours, minutes, seconds] = match;
  let total = 0n;
  if (days) total += scaleComponent(days, MICROS_PER_DAY);
  if (hours) total += scaleComponent(hours, MICROS_PER_HOUR);
  if (minutes) total += scaleComponent(minutes, MICROS_PER_MINUTE);
  if (seconds) total += scaleComponent(seconds, MICROS_PER_SECOND);

  return sign === "-" ? -total : total;
}

/**
 * Canonical lexical form of a microsecond count
 */
export function formatDayTimeDuration(micros: bigint): string {
  if (micros === 0n) {
    return "PT0S";
  }
  const negative = micros < 0n;
  let rest = negative ? -micros : micros;

  const days = rest / MICROS_PER_DAY;
  rest %= MICROS_PER_DAY;
  const hours = rest / MICROS_PER_HOUR;
  rest %= MICROS_PER_HOUR;
  const minutes = rest / MICROS_PER_MINUTE;
  rest %= MICROS_PER_MINUTE;
  const wholeSeconds = rest / MICROS_PER_SECOND;
  const fraction = rest % MICROS_PER_SECOND;

  let out = negative ? "-P" : "P";
  if (days > 0n) out += `${days}D`;
  if (hours > 0n || minutes > 0n || wholeSeconds > 0n || fraction > 0n) {
    out += "T";
    if (hours > 0n) out += `${hours}H`;
    if (minutes > 0n) out += `${minutes}M`;
    if (wholeSeconds > 0n || fraction > 0n) {
      const fractionText = fraction > 0n ? "." + fraction.toString().padStart(6, "0").replace(/0+$/, "") : "";
      out += `${wholeSeconds}${fractionText}S`;
    }
  }
  return out;
}
