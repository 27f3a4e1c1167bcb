import { expect } from "vitest";
import { Tuple } from "../tuple";

// ─── Helper: component-wise tuple comparison ─────────────────────────
export function expectTuple(actual: Tuple, expected: Tuple, digits: number = 4): void {
    expect(actual.kind).toBe(expected.kind);
    expect(actual.x).toBeCloseTo(expected.x, digits);
    expect(actual.y).toBeCloseTo(expected.y, digits);
    expect(actual.z).toBeCloseTo(expected.z, digits);
}
