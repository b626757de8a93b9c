import { describe, it, expect } from "@jest/globals";
import {
  civilFromDays,
  daysFromCivil,
  daysInMonth,
  fromEpochMicros,
  isLeapYear,
  parseDateTimeLexical,
  toEpochMicros,
} from "../src/expression/datetime";
import { formatDayTimeDuration, parseDayTimeDurationLexical } from "../src/expression/duration";

describe("calendar arithmetic", () => {
  it("should apply the Gregorian leap year rules", () => {
    expect(isLeapYear(2000)).toBe(true);
    expect(isLeapYear(1900)).toBe(false);
    expect(isLeapYear(2024)).toBe(true);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2024, 4)).toBe(30);
  });

  it("should count days from the epoch", () => {
    expect(daysFromCivil(1970, 1, 1)).toBe(0);
    expect(daysFromCivil(2000, 1, 1)).toBe(10957);
    expect(daysFromCivil(1969, 12, 31)).toBe(-1);
  });

  it("should invert the day count", () => {
    expect(civilFromDays(10957)).toEqual({ year: 2000, month: 1, day: 1 });
    expect(civilFromDays(-1)).toEqual({ year: 1969, month: 12, day: 31 });
  });
});

describe("parseDateTimeLexical", () => {
  it("should split the fields and the offset", () => {
    expect(parseDateTimeLexical("2002-03-07T10:05:30.1234567-05:30")).toEqual({
      year: 2002,
      month: 3,
      day: 7,
      hour: 10,
      minute: 5,
      second: 30,
      microsecond: 123456,
      tzOffsetMinutes: -330,
    });
  });

  it("should leave the offset null without a timezone", () => {
    expect(parseDateTimeLexical("2002-03-07T10:00:00").tzOffsetMinutes).toBeNull();
  });

  it("should normalize 24:00:00 to the next midnight", () => {
    expect(parseDateTimeLexical("2000-02-29T24:00:00Z")).toMatchObject({ year: 2000, month: 3, day: 1, hour: 0 });
  });

  it("should reject out-of-range fields", () => {
    expect(() => parseDateTimeLexical("2002-13-01T00:00:00")).toThrow("Month 13 is out of range");
    expect(() => parseDateTimeLexical("0000-01-01T00:00:00")).toThrow("Year 0000 is not allowed");
    expect(() => parseDateTimeLexical("02002-01-01T00:00:00")).toThrow('Year "02002" has leading zeros');
    expect(() => parseDateTimeLexical("2002-01-01T24:00:01")).toThrow("Hour 24 is only allowed as 24:00:00");
    expect(() => parseDateTimeLexical("2002-01-01T10:00:00+15:00")).toThrow('Timezone "+15:00" is out of range');
  });
});

describe("epoch conversion", () => {
  it("should subtract the offset", () => {
    expect(toEpochMicros(parseDateTimeLexical("1970-01-01T01:00:00+01:00"))).toBe(0n);
    expect(toEpochMicros(parseDateTimeLexical("2000-01-01T00:00:00"))).toBe(946684800000000n);
  });

  it("should recompose local time before the epoch", () => {
    expect(fromEpochMicros(-1n, 0)).toEqual({
      year: 1969,
      month: 12,
      day: 31,
      hour: 23,
      minute: 59,
      second: 59,
      microsecond: 999999,
      tzOffsetMinutes: 0,
    });
  });

  it("should restore the local fields of an offset instant", () => {
    const value = parseDateTimeLexical("2024-02-29T12:30:45.25+02:00");

    expect(fromEpochMicros(toEpochMicros(value), 120)).toEqual({ ...value, microsecond: 250000 });
  });
});

describe("dayTimeDuration", () => {
  it("should parse every component", () => {
    expect(parseDayTimeDurationLexical("P1DT2H3M4.5S")).toBe(93784500000n);
    expect(parseDayTimeDurationLexical("-P2D")).toBe(-172800000000n);
  });

  it("should reject malformed durations", () => {
    expect(() => parseDayTimeDurationLexical("P1Y")).toThrow('Invalid xs:dayTimeDuration literal "P1Y"');
    expect(() => parseDayTimeDurationLexical("PT")).toThrow('Invalid xs:dayTimeDuration literal "PT"');
  });

  it("should format canonical forms", () => {
    expect(formatDayTimeDuration(0n)).toBe("PT0S");
    expect(formatDayTimeDuration(86400000000n)).toBe("P1D");
    expect(formatDayTimeDuration(93784500000n)).toBe("P1DT2H3M4.5S");
    expect(formatDayTimeDuration(-1500000n)).toBe("-PT1.5S");
    expect(formatDayTimeDuration(1n)).toBe("PT0.000001S");
  });
});
