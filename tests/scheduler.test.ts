import { describe, expect, it } from "vitest";

import { currentDateParts, dueSlots, pruneCompleted } from "../src/scheduler.js";

const times = [
  { label: "09:00", hour: 9, minute: 0 },
  { label: "18:30", hour: 18, minute: 30 },
];

describe("currentDateParts", () => {
  it("reads the wall clock in the configured timezone", () => {
    const instant = new Date("2024-03-01T23:30:00Z");

    expect(currentDateParts("UTC", instant)).toEqual({
      dateKey: "2024-03-01",
      hour: 23,
      minute: 30,
    });
    expect(currentDateParts("Asia/Tokyo", instant)).toEqual({
      dateKey: "2024-03-02",
      hour: 8,
      minute: 30,
    });
  });

  it("reports midnight as hour zero", () => {
    expect(currentDateParts("UTC", new Date("2024-03-01T00:05:00Z")).hour).toBe(0);
  });
});

describe("dueSlots", () => {
  it("returns nothing before the first slot", () => {
    expect(dueSlots(times, { dateKey: "2024-03-01", hour: 8, minute: 59 }, new Set())).toEqual([]);
  });

  it("returns every slot that has passed today and is not done", () => {
    const now = { dateKey: "2024-03-01", hour: 18, minute: 30 };

    expect(dueSlots(times, now, new Set())).toEqual(["2024-03-01@09:00", "2024-03-01@18:30"]);
    expect(dueSlots(times, now, new Set(["2024-03-01@09:00"]))).toEqual(["2024-03-01@18:30"]);
  });

  it("starts over on a new day", () => {
    const done = new Set(["2024-03-01@09:00", "2024-03-01@18:30"]);

    expect(dueSlots(times, { dateKey: "2024-03-02", hour: 9, minute: 1 }, done)).toEqual([
      "2024-03-02@09:00",
    ]);
  });
});

describe("pruneCompleted", () => {
  it("keeps only the slots of the given day", () => {
    const done = new Set(["2024-03-01@09:00", "2024-03-01@18:30", "2024-03-02@09:00"]);

    pruneCompleted(done, "2024-03-02");

    expect([...done]).toEqual(["2024-03-02@09:00"]);
  });
});
