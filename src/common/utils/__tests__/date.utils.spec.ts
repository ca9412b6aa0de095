import {
  dayWindow,
  eligibleDaysOfMonth,
  monthsInRange,
  parseDateKey,
  parseMonthKey,
  toDateKey,
  toMonthKey,
} from "../date.utils";

describe("Date Utils", () => {
  describe("parseDateKey", () => {
    it("should parse a calendar date in local time", () => {
      const parsed = parseDateKey("2024-03-09");
      expect(parsed?.getFullYear()).toBe(2024);
      expect(parsed?.getMonth()).toBe(2);
      expect(parsed?.getDate()).toBe(9);
      expect(parsed?.getHours()).toBe(0);
    });

    it("should reject impossible and differently formatted dates", () => {
      expect(parseDateKey("2023-02-29")).toBeUndefined();
      expect(parseDateKey("2024-13-01")).toBeUndefined();
      expect(parseDateKey("2024-3-9")).toBeUndefined();
      expect(parseDateKey("09/03/2024")).toBeUndefined();
      expect(parseDateKey("")).toBeUndefined();
    });

    it("should accept a leap day", () => {
      expect(parseDateKey("2024-02-29")).toBeDefined();
    });
  });

  describe("parseMonthKey", () => {
    it("should parse a month and reject a date", () => {
      expect(parseMonthKey("2024-11")?.getMonth()).toBe(10);
      expect(parseMonthKey("2024-11-01")).toBeUndefined();
      expect(parseMonthKey("2024-00")).toBeUndefined();
    });
  });

  describe("toDateKey / toMonthKey", () => {
    it("should format local calendar keys", () => {
      const date = new Date(2024, 0, 5, 23, 59);
      expect(toDateKey(date)).toBe("2024-01-05");
      expect(toMonthKey(date)).toBe("2024-01");
    });
  });

  describe("monthsInRange", () => {
    it("should list every month touched by the range", () => {
      expect(monthsInRange("2023-11-15", "2024-02-03")).toEqual(["2023-11", "2023-12", "2024-01", "2024-02"]);
    });

    it("should return a single month for a range inside it", () => {
      expect(monthsInRange("2024-05-10", "2024-05-12")).toEqual(["2024-05"]);
    });

    it("should return nothing for an inverted range", () => {
      expect(monthsInRange("2024-05-10", "2024-05-01")).toEqual([]);
    });

    it("should throw on an invalid date", () => {
      expect(() => monthsInRange("2024-02-30", "2024-03-01")).toThrow("Invalid calendar key: 2024-02-30");
    });
  });

  describe("eligibleDaysOfMonth", () => {
    const farFuture = new Date(2100, 0, 1);

    it("should return every day of a past month inside the range", () => {
      const days = eligibleDaysOfMonth("2023-02", "2023-01-01", "2023-12-31", farFuture);
      expect(days).toHaveLength(28);
      expect(days[0]).toBe("2023-02-01");
      expect(days[27]).toBe("2023-02-28");
    });

    it("should clamp to the configured range", () => {
      expect(eligibleDaysOfMonth("2024-03", "2024-03-30", "2024-04-15", farFuture)).toEqual(["2024-03-30", "2024-03-31"]);
      expect(eligibleDaysOfMonth("2024-04", "2024-03-30", "2024-04-02", farFuture)).toEqual(["2024-04-01", "2024-04-02"]);
    });

    it("should exclude today and later days", () => {
      const now = new Date(2024, 5, 4, 13, 30);
      expect(eligibleDaysOfMonth("2024-06", "2024-01-01", "2024-12-31", now)).toEqual([
        "2024-06-01",
        "2024-06-02",
        "2024-06-03",
      ]);
    });

    it("should exclude a day even at the first instant of the next day boundary", () => {
      const now = new Date(2024, 5, 2, 0, 0, 0, 0);
      expect(eligibleDaysOfMonth("2024-06", "2024-01-01", "2024-12-31", now)).toEqual(["2024-06-01"]);
    });

    it("should return nothing for a month outside the range", () => {
      expect(eligibleDaysOfMonth("2025-01", "2024-01-01", "2024-12-31", farFuture)).toEqual([]);
    });
  });

  describe("dayWindow", () => {
    it("should span the local calendar day as a half-open interval", () => {
      expect(dayWindow("2023-02-28")).toEqual({
        start: new Date(2023, 1, 28).getTime(),
        end: new Date(2023, 2, 1).getTime(),
      });
    });

    it("should reject an invalid date key", () => {
      expect(() => dayWindow("2023-02-30")).toThrow("Invalid calendar key: 2023-02-30");
    });
  });
});
