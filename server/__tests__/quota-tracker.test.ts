import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../errors";
import { CategoryCounter, QuotaTracker } from "../quota-tracker";
import { captureError } from "./helpers";

const categories = [
  { name: "reference", softTarget: 2, overflowMargin: 1 },
  { name: "guide", softTarget: 1, overflowMargin: 0 },
];

function admitAll(tracker: QuotaTracker, category: string, times: number): string[] {
  const decisions: string[] = [];
  for (let i = 0; i < times; i++) {
    const decision = tracker.shouldAdmit(category);
    decisions.push(decision);
    if (decision !== "reject") tracker.record(category);
  }
  return decisions;
}

describe("QuotaTracker", () => {
  it("admits, then flags over-quota, then rejects once the global target is spent", () => {
    const tracker = new QuotaTracker(categories, 3);
    expect(admitAll(tracker, "reference", 4)).toEqual(["admit", "admit", "admit_over_quota", "reject"]);
    expect(tracker.total).toBe(3);
  });

  it("keeps admitting past the margin while the global target has room", () => {
    const tracker = new QuotaTracker(categories, 10);
    expect(admitAll(tracker, "reference", 5)).toEqual([
      "admit",
      "admit",
      "admit_over_quota",
      "admit_over_quota",
      "admit_over_quota",
    ]);
    expect(tracker.counts()).toEqual({ reference: 5 });
  });

  it("rejects a category whose quota is spent once other categories filled the global target", () => {
    const tracker = new QuotaTracker(categories, 3);
    admitAll(tracker, "reference", 2);
    expect(tracker.shouldAdmit("guide")).toBe("admit");
    tracker.record("guide");
    expect(tracker.shouldAdmit("guide")).toBe("reject");
  });

  it("throws for a category with no quota", () => {
    const tracker = new QuotaTracker(categories, 3);
    const error = captureError(() => tracker.shouldAdmit("changelog"));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty("message", 'No quota configured for category "changelog"');
  });

  it("writes through a shared counter", () => {
    const counter = new CategoryCounter();
    const tracker = new QuotaTracker(categories, 3, counter);
    tracker.record("guide");
    tracker.record("reference");
    tracker.record("guide");

    expect(counter.count("guide")).toBe(2);
    expect(counter.total).toBe(3);
    expect(counter.toRecord()).toEqual({ guide: 2, reference: 1 });
  });
});
