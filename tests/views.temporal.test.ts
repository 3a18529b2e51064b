import { closingSoon, recentlySeen } from "../src/views/temporal.js";
import { normalizeAll } from "../src/transform/normalize.js";
import type { NormalizedOpportunity } from "../src/transform/schema.js";

const today = "2025-03-10";

function ids(rows: NormalizedOpportunity[]): Array<string | null> {
  return rows.map((row) => row.id);
}

describe("Temporal views", () => {
  describe("recentlySeen", () => {
    const records = normalizeAll(
      [
        { id: "week-ago", last_seen: "2025-03-03" },
        { id: "eight-days", last_seen: "2025-03-02" },
        { id: "tomorrow", last_seen: "2025-03-11" },
        { id: "timestamp", last_seen: "2025-03-08T09:30:00Z" },
        { id: "today", last_seen: "2025-03-10" },
        { id: "never", last_seen: null },
        { id: "garbage", last_seen: "last week" },
        { id: "today-2", last_seen: "2025-03-10" },
      ],
      { today }
    );

    it("should keep the trailing window, newest first", () => {
      expect(ids(recentlySeen(records, { today, days: 7 }))).toEqual(["today", "today-2", "timestamp", "week-ago"]);
    });

    it("should default to seven days", () => {
      expect(ids(recentlySeen(records, { today }))).toEqual(["today", "today-2", "timestamp", "week-ago"]);
    });

    it("should only keep today for a zero-day window", () => {
      expect(ids(recentlySeen(records, { today, days: 0 }))).toEqual(["today", "today-2"]);
    });
  });

  describe("closingSoon", () => {
    const records = normalizeAll(
      [
        { id: "c14", close_date: "2025-03-24" },
        { id: "c15", close_date: "2025-03-25" },
        { id: "c0", close_date: "2025-03-10" },
        { id: "closed", close_date: "2025-03-09" },
        { id: "c5", close_date: "2025-03-15" },
        { id: "none", close_date: null },
        { id: "garbage", close_date: "soon" },
      ],
      { today }
    );

    it("should keep records closing within the window, soonest first", () => {
      expect(ids(closingSoon(records, { days: 14 }))).toEqual(["c0", "c5", "c14"]);
    });

    it("should keep records closing today for a zero-day window", () => {
      expect(ids(closingSoon(records, { days: 0 }))).toEqual(["c0"]);
    });
  });
});
