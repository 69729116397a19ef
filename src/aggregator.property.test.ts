// Property-Based Tests for the aggregator

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import {
  buildErrorHistogram,
  percentageMetrics,
  perObservationMae,
  perUnitAverageMae,
  standardDeviation,
} from "./aggregator.js";
import type { ResultRow } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

/** Rows for 1–8 units, each with the same number of frames. */
function arbitraryBalancedRows(): fc.Arbitrary<ResultRow[]> {
  return fc.integer({ min: 1, max: 6 }).chain((frames) =>
    fc
      .array(
        fc.tuple(
          fc.integer({ min: 0, max: 90 }),
          fc.array(fc.integer({ min: -30, max: 120 }), { minLength: frames, maxLength: frames }),
        ),
        { minLength: 1, maxLength: 8 },
      )
      .map((units) =>
        units.flatMap(([groundTruth, predictions], u) =>
          predictions.map((prediction, f) => ({
            unitId: `unit_${u}`,
            frameName: `frame_000${f + 1}`,
            variant: "shoulder_wrist" as const,
            prediction,
            groundTruth,
          })),
        ),
      ),
  );
}

function arbitraryThresholds(): fc.Arbitrary<{ tight: number; loose: number }> {
  return fc
    .tuple(fc.integer({ min: 1, max: 20 }), fc.integer({ min: 0, max: 20 }))
    .map(([tight, extra]) => ({ tight, loose: tight + extra }));
}

// ─── Properties ─────────────────────────────────────────────────────────────────

describe("aggregator properties", () => {
  it("averaging per unit never increases the error when units have equal frame counts", () => {
    fc.assert(
      fc.property(arbitraryBalancedRows(), (rows) => {
        const perUnit = perUnitAverageMae(rows) ?? Number.NaN;
        const perObservation = perObservationMae(rows) ?? Number.NaN;
        expect(perUnit).toBeLessThanOrEqual(perObservation + 1e-9);
      }),
      { numRuns: 200 },
    );
  });

  it("keeps every percentage between 0 and 100, tight within loose", () => {
    fc.assert(
      fc.property(arbitraryBalancedRows(), arbitraryThresholds(), (rows, thresholds) => {
        const pct = percentageMetrics(rows, thresholds);
        expect(pct).not.toBeNull();
        if (!pct) return;
        expect(pct.pctWithinTight).toBeLessThanOrEqual(pct.pctWithinLoose);
        expect(pct.pctAbove + pct.pctBelow).toBeLessThanOrEqual(100 + 1e-9);
        for (const value of Object.values(pct)) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(100);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("histogram bins account for every row", () => {
    fc.assert(
      fc.property(
        arbitraryBalancedRows(),
        fc.oneof(
          fc.integer({ min: 1, max: 30 }).map((count) => ({ kind: "count" as const, count })),
          fc.integer({ min: 1, max: 15 }).map((width) => ({ kind: "width" as const, width })),
        ),
        (rows, spec) => {
          const hist = buildErrorHistogram(rows, "shoulder_wrist", spec);
          const total = hist.bins.reduce((sum, bin) => sum + bin.count, 0);
          expect(total).toBe(rows.length);
        },
      ),
      { numRuns: 200 },
    );
  });

  it("standard deviation is zero for constant values and unchanged by a shift", () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: -100, max: 100 }), { minLength: 2, maxLength: 30 }),
        fc.integer({ min: -50, max: 50 }),
        (values, shift) => {
          const sd = standardDeviation(values) ?? Number.NaN;
          const shifted = standardDeviation(values.map((v) => v + shift)) ?? Number.NaN;
          expect(shifted).toBeCloseTo(sd, 6);
          expect(standardDeviation(values.map(() => values[0]))).toBe(0);
        },
      ),
      { numRuns: 200 },
    );
  });
});
