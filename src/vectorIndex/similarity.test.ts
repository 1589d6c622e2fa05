import { describe, it, expect } from "vitest";
import { cosineSimilarity } from "./similarity";

describe("cosineSimilarity", () => {
    it("scores identical vectors exactly 1", () => {
        expect(cosineSimilarity([0.3, 0.5, 0.2], [0.3, 0.5, 0.2])).toBe(1);
    });

    it("ignores magnitude", () => {
        expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBe(1);
    });

    it("scores orthogonal vectors 0 and opposite vectors -1", () => {
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
        expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    });

    it("scores a zero vector 0", () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it("computes intermediate angles", () => {
        expect(cosineSimilarity([1, 1], [1, 0])).toBeCloseTo(Math.SQRT1_2, 12);
    });

    it("stays exact for very large components", () => {
        const huge = [1e160, 2e160, 3e160];

        expect(cosineSimilarity(huge, huge)).toBe(1);
        expect(cosineSimilarity([1e300, 0], [0, 1e300])).toBe(0);
        expect(cosineSimilarity([1e300, 0], [-1e300, 0])).toBe(-1);
    });

    it("stays exact for very small components", () => {
        const tiny = [1e-170, 2e-170, 3e-170];

        expect(cosineSimilarity(tiny, tiny)).toBe(1);
        expect(cosineSimilarity([5e-324, 0], [5e-324, 0])).toBe(1);
    });

    it("compares vectors of very different magnitude", () => {
        expect(cosineSimilarity([1e200, 0], [1e-200, 0])).toBe(1);
        expect(cosineSimilarity([3e200, 4e200], [4e-200, 3e-200])).toBeCloseTo(0.96, 12);
    });

    it("rejects vectors of different dimension", () => {
        expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow("Cannot compare vectors of dimension 2 and 3.");
    });
});
