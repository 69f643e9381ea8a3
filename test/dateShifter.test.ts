import { describe, it, expect } from "vitest";
import { differenceInCalendarDays } from "date-fns";
import {
  computeShiftDays,
  dateYear,
  MIN_SHIFT_DAYS,
  parseDate,
  shiftDate,
  SHIFT_RANGE,
} from "../services/dateShifter";
import { TEST_PHI, TEST_SALT } from "../services/testConstants";

/**
 * DATE SHIFTING TESTS
 *
 * A shifted date keeps its written format and every interval between a
 * subject's dates stays exactly the same.
 */

describe("shiftDate", () => {
  it("shifts US numeric dates in place", () => {
    expect(shiftDate("01/15/1980", 30)).toBe("02/14/1980");
    expect(shiftDate("03/12/1958", 30)).toBe("04/11/1958");
  });

  it("keeps unpadded fields unpadded", () => {
    expect(shiftDate("3/5/2020", 10)).toBe("3/15/2020");
  });

  it("crosses a leap day in ISO dates", () => {
    expect(shiftDate("2020-02-28", 2)).toBe("2020-03-01");
  });

  it("keeps ISO timestamps", () => {
    expect(shiftDate("2021-06-01T08:30:00", 31)).toBe("2021-07-02T08:30:00");
  });

  it("keeps month names", () => {
    expect(shiftDate("March 5, 2020", 3)).toBe("March 8, 2020");
    expect(shiftDate("Jan 5, 2020", 3)).toBe("Jan 8, 2020");
  });

  it("keeps the casing of month names", () => {
    expect(shiftDate("MARCH 12, 1958", 30)).toBe("APRIL 11, 1958");
    expect(shiftDate("march 5, 2020", 3)).toBe("march 8, 2020");
  });

  it("keeps surrounding whitespace", () => {
    expect(shiftDate(" 01/15/1980 ", 30)).toBe(" 02/14/1980 ");
  });

  it("returns undefined for text that is not a date", () => {
    expect(shiftDate("last Tuesday", 30)).toBeUndefined();
    expect(shiftDate("13/45/2020", 30)).toBeUndefined();
    expect(shiftDate("", 30)).toBeUndefined();
  });
});

describe("parseDate", () => {
  it("reads ambiguous numeric dates month first", () => {
    const parsed = parseDate("03/04/2020");

    expect(parsed?.format).toBe("MM/dd/yyyy");
    expect(parsed?.date.getMonth()).toBe(2);
  });

  it("falls back to day first when the month would be invalid", () => {
    const parsed = parseDate("25/04/2020");

    expect(parsed?.format).toBe("dd/MM/yyyy");
    expect(parsed?.date.getDate()).toBe(25);
  });
});

describe("dateYear", () => {
  it("returns the year of a recognized date", () => {
    expect(dateYear("03/12/1958")).toBe("1958");
    expect(dateYear("not a date")).toBeUndefined();
  });
});

describe("computeShiftDays", () => {
  it("is deterministic per salt and subject", () => {
    expect(computeShiftDays(TEST_SALT, TEST_PHI.SUBJECT_A)).toBe(
      computeShiftDays(TEST_SALT, TEST_PHI.SUBJECT_A)
    );
  });

  it("stays within 30 to 90 days", () => {
    for (let i = 0; i < 200; i++) {
      const days = computeShiftDays(TEST_SALT, `subject-${i}`);
      expect(days).toBeGreaterThanOrEqual(MIN_SHIFT_DAYS);
      expect(days).toBeLessThanOrEqual(MIN_SHIFT_DAYS + SHIFT_RANGE - 1);
    }
  });

  it("preserves the interval between two dates of one subject", () => {
    const days = computeShiftDays(TEST_SALT, TEST_PHI.SUBJECT_A);
    const admit = shiftDate("01/10/2020", days);
    const discharge = shiftDate("01/15/2020", days);

    const admitDate = parseDate(admit ?? "")?.date;
    const dischargeDate = parseDate(discharge ?? "")?.date;
    expect(admitDate).toBeDefined();
    expect(dischargeDate).toBeDefined();
    if (admitDate && dischargeDate) {
      expect(differenceInCalendarDays(dischargeDate, admitDate)).toBe(5);
    }
  });
});
