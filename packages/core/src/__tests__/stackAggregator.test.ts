import type { StackSample } from "@perfscope/contracts";
import { describe, expect, it } from "vitest";
import { flatBucketCount, flatTop } from "../stackAggregator.js";

function sample(timeMs: number, metric: number, frames: string[]): StackSample {
  return { timeMs, metric, frames };
}

const defaults = { top: 10, groupBy: "method" as const, sortByInclusive: false, traceDurationMs: 100 };

describe("flatTop", () => {
  it("charges identical single-frame samples to one key", () => {
    const samples = [sample(0, 1, ["m!N.C.Foo()"]), sample(50, 1, ["m!N.C.Foo()"]), sample(90, 1, ["m!N.C.Foo()"])];
    const result = flatTop(samples, defaults);

    expect(result.totalSamples).toBe(3);
    expect(result.totalMetricMs).toBe(3);
    expect(result.bucketCount).toBe(20);
    expect(result.items).toHaveLength(1);
    const item = result.items[0];
    expect(item?.name).toBe("m!N.C.Foo()");
    expect(item?.exclusiveMs).toBe(3);
    expect(item?.inclusiveMs).toBe(3);
    expect(item?.exclusivePercent).toBe(100);
    expect(item?.sampleBuckets[0]).toBe(1);
    expect(item?.sampleBuckets[10]).toBe(1);
    expect(item?.sampleBuckets[18]).toBe(1);
    expect(item?.sampleBuckets.reduce((sum, count) => sum + count, 0)).toBe(3);
  });

  it("counts a recursive key once per sample for inclusive time", () => {
    const result = flatTop([sample(10, 2, ["m!A()", "m!B()", "m!A()"])], defaults);
    const byName = new Map(result.items.map((item) => [item.name, item]));
    expect(byName.get("m!A()")).toMatchObject({ exclusiveMs: 2, inclusiveMs: 2 });
    expect(byName.get("m!B()")).toMatchObject({ exclusiveMs: 0, inclusiveMs: 2 });
    expect(byName.get("m!A()")?.sampleBuckets[2]).toBe(1);
  });

  it("charges the first real frame when the stack starts with pseudo frames", () => {
    const result = flatTop(
      [sample(0, 1, ["UNMANAGED_CODE_TIME", "m!A()", "Thread (5)", "m!B()"])],
      defaults,
    );
    const byName = new Map(result.items.map((item) => [item.name, item]));
    expect(byName.get("m!A()")?.exclusiveMs).toBe(1);
    expect(byName.get("m!B()")?.exclusiveMs).toBe(0);
    expect(byName.get("m!B()")?.inclusiveMs).toBe(1);
    expect(byName.has("Thread (5)")).toBe(false);
  });

  it("keeps the exclusive total equal to the sample total", () => {
    const samples = [
      sample(1, 0.5, ["m!A()", "m!Main()"]),
      sample(2, 1.25, ["m!B()", "Thread (1)", "m!Main()"]),
      sample(3, 2, ["CPU_TIME", "m!Main()"]),
      sample(4, 0.25, ["m!A()", "m!B()", "m!A()"]),
    ];
    const result = flatTop(samples, { ...defaults, top: 100 });
    const exclusive = result.items.reduce((sum, item) => sum + item.exclusiveMs, 0);
    expect(exclusive).toBeCloseTo(4, 9);
    expect(result.totalMetricMs).toBe(4);
  });

  it("charges stacks without a real frame to the unknown group", () => {
    const samples = [
      sample(0, 1, ["Thread (1)", "Process (2)"]),
      sample(1, 2, []),
      sample(2, 3, ["m!A()"]),
    ];
    const result = flatTop(samples, defaults);
    expect(result.totalMetricMs).toBe(6);
    expect(result.items.map((item) => [item.name, item.exclusiveMs, item.inclusiveMs])).toEqual([
      ["[Unknown]", 3, 3],
      ["m!A()", 3, 3],
    ]);
    expect(result.items.reduce((sum, item) => sum + item.exclusiveMs, 0)).toBe(6);
  });

  it("drops samples outside the window and buckets relative to its start", () => {
    const samples = [sample(100, 1, ["m!A()"]), sample(450, 1, ["m!B()"]), sample(900, 1, ["m!C()"])];
    const result = flatTop(samples, { ...defaults, from: 400, to: 600, traceDurationMs: 1000 });
    expect(result.totalSamples).toBe(1);
    expect(result.totalMetricMs).toBe(1);
    expect(result.traceDurationMs).toBe(200);
    expect(result.bucketCount).toBe(20);
    expect(result.items.map((item) => item.name)).toEqual(["m!B()"]);
    expect(result.items[0]?.sampleBuckets[5]).toBe(1);
    expect(result.items[0]?.exclusivePercent).toBe(100);
  });

  it("applies an open-ended window", () => {
    const samples = [sample(100, 1, ["m!A()"]), sample(900, 1, ["m!C()"])];
    expect(flatTop(samples, { ...defaults, to: 500, traceDurationMs: 1000 }).items.map((item) => item.name)).toEqual([
      "m!A()",
    ]);
    expect(flatTop(samples, { ...defaults, from: 500, traceDurationMs: 1000 }).items.map((item) => item.name)).toEqual([
      "m!C()",
    ]);
  });

  it("reports zero percentages when the total metric is zero", () => {
    const result = flatTop([sample(0, 0, ["m!A()"])], defaults);
    expect(result.items[0]?.exclusivePercent).toBe(0);
  });

  it("puts every sample in bucket zero for a zero-length window", () => {
    const result = flatTop([sample(500, 1, ["m!A()"]), sample(500, 1, ["m!A()"])], {
      ...defaults,
      from: 500,
      to: 500,
    });
    expect(result.traceDurationMs).toBe(0);
    expect(result.items[0]?.sampleBuckets[0]).toBe(2);
  });

  it("groups by module and sorts by inclusive time when asked", () => {
    const samples = [
      sample(0, 3, ["a!N.C.F()", "b!N.C.Main()"]),
      sample(1, 1, ["b!N.C.Other()", "b!N.C.Main()"]),
    ];
    const byExclusive = flatTop(samples, { ...defaults, groupBy: "module" });
    expect(byExclusive.groupedBy).toBe("module");
    expect(byExclusive.items.map((item) => item.name)).toEqual(["a", "b"]);

    const byInclusive = flatTop(samples, { ...defaults, groupBy: "module", sortByInclusive: true, top: 1 });
    expect(byInclusive.items).toEqual([
      { name: "b", exclusiveMs: 1, inclusiveMs: 4, exclusivePercent: 25, sampleBuckets: expect.any(Array) },
    ]);
  });
});

describe("flatBucketCount", () => {
  it("stays between 20 and 100 buckets", () => {
    expect(flatBucketCount(0)).toBe(20);
    expect(flatBucketCount(5_000)).toBe(50);
    expect(flatBucketCount(1_000_000)).toBe(100);
  });
});
