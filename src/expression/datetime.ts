/**
 * xs:dateTime value object: lexical parsing, validation and epoch conversion
 */

import { EvaluationError } from "../errors";

export interface DateTimeValue {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  microsecond: number;
  /** Signed offset in minutes, or null when the literal carries no timezone */
  tzOffsetMinutes: number | null;
}

const MICROS_PER_SECOND = 1_000_000n;
const MICROS_PER_MINUTE = 60n * MICROS_PER_SECOND;
const MICROS_PER_DAY = 86_400n * MICROS_PER_SECOND;

const DATETIME_PATTERN =
  /^(-?\d{4,})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})?$/;

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2:
      return isLeapYear(year) ? 29 : 28;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

/**
 * Days since 1970-01-01 for a proleptic Gregorian date
 */
export function daysFromCivil(year: number, month: number, day: number): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yearOfEra = y - era * 400;
  const dayOfYear = Math.floor((153 * (month + (month > 2 ? -3 : 9)) + 2) / 5) + day - 1;
  const dayOfEra = yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear;
  return era * 146097 + dayOfEra - 719468;
}

export function civilFromDays(days: number): { year: number; month: number; day: number } {
  const z = days + 719468;
  const era = Math.floor(z / 146097);
  const dayOfEra = z - era * 146097;
  const yearOfEra = Math.floor(
    (dayOfEra - Math.floor(dayOfEra / 1460) + Math.floor(dayOfEra / 36524) - Math.floor(dayOfEra / 146096)) / 365
  );
  const dayOfYear = dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100));
  const mp = Math.floor((5 * dayOfYear + 2) / 153);
  const day = dayOfYear - Math.floor((153 * mp + 2) / 5) + 1;
  const month = mp < 10 ? mp + 3 : mp - 9;
  const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

/**
 * Parse an xs:dateTime lexical form. `24:00:00` is normalized to midnight of
 * the following day.
 */
export function parseDateTimeLexical(text: string): DateTimeValue {
  const match = DATETIME_PATTERN.exec(text.trim());
  if (!match) {
    throw new EvaluationError(`Invalid xs:dateTime literal "${text}"`, "FORG0001");
  }

  let year = Number(match[1]);
  let month = Number(match[2]);
  let day = Number(match[3]);
  let hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);
  const fraction = match[7] ?? "";
  const microsecond = Number(fraction.padEnd(6, "0").slice(0, 6));

  if (match[1].length > 4 && match[1].startsWith("0")) {
    throw new EvaluationError(`Year "${match[1]}" has leading zeros`, "FORG0001");
  }
  if (year === 0) {
    throw new EvaluationError("Year 0000 is not allowed", "FORG0001");
  }
  if (month < 1 || month > 12) {
    throw new EvaluationError(`Month ${month} is out of range`, "FORG0001");
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new EvaluationError(`Day ${day} is out of range`, "FORG0001");
  }
  if (minute > 59 || second > 59) {
    throw new EvaluationError(`Time ${match[4]}:${match[5]}:${match[6]} is out of range`, "FORG0001");
  }
  if (hour === 24) {
    if (minute !== 0 || second !== 0 || microsecond !== 0) {
      throw new EvaluationError("Hour 24 is only allowed as 24:00:00", "FORG0001");
    }
    const next = civilFromDays(daysFromCivil(year, month, day) + 1);
    year = next.year;
    month = next.month;
    day = next.day;
    hour = 0;
  } else if (hour > 23) {
    throw new EvaluationError(`Hour ${hour} is out of range`, "FORG0001");
  }

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    microsecond,
    tzOffsetMinutes: parseTimezone(match[8]),
  };
}

function parseTimezone(raw: string | undefined): number | null {
  if (raw === undefined) {
    return null;
  }
  if (raw === "Z") {
    return 0;
  }
  const sign = raw.startsWith("-") ? -1 : 1;
  const hours = Number(raw.slice(1, 3));
  const minutes = Number(raw.slice(4, 6));
  if (minutes > 59 || hours * 60 + minutes > 14 * 60) {
    throw new EvaluationError(`Timezone "${raw}" is out of range`, "FORG0001");
  }
  return sign * (hours * 60 + minutes);
}

/**
 * UTC microseconds since the epoch. A value without a timezone is read as UTC.
 */
export function toEpochMicros(value: DateTimeValue): bigint {
  const days = BigInt(daysFromCivil(value.year, value.month, value.day));
  const seconds = BigInt(value.hour * 3600 + value.minute * 60 + value.second);
  const local = days * MICROS_PER_DAY + seconds * MICROS_PER_SECOND + BigInt(value.microsecond);
  return local - BigInt(value.tzOffsetMinutes ?? 0) * MICROS_PER_MINUTE;
}

/**
 * Inverse of {@link toEpochMicros}: recompose local fields from a UTC instant
 * and the offset retained alongside it
 */
export function fromEpochMicros(utcMicros: bigint, tzOffsetMinutes: number): DateTimeValue {
  const local = utcMicros + BigInt(tzOffsetMinutes) * MICROS_PER_MINUTE;
  let days = local / MICROS_PER_DAY;
  let remainder = local % MICROS_PER_DAY;
  if (remainder < 0n) {
    days -= 1n;
    remainder += MICROS_PER_DAY;
  }
  const { year, month, day } = civilFromDays(Number(days));
  const secondsOfDay = Number(remainder / MICROS_PER_SECOND);
  return {
    year,
    month,
    day,
    hour: Math.floor(secondsOfDay / 3600),
    minute: Math.floor((secondsOfDay % 3600) / 60),
    second: secondsOfDay % 60,
    microsecond: Number(remainder % MICROS_PER_SECOND),
    tzOffsetMinutes,
  };
}
