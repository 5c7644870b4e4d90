import { describe, it, expect } from "vitest";
import { formatAmount, formatSigned, round } from "../src/utils/formatting.js";
import { gaussian, pick, uniform } from "../src/utils/random.js";
import { SequenceRandom } from "./helpers/testDoubles.js";

describe("utils/formatting", () => {
    it("rounds to the requested digits", () => {
        expect(round(1.23456, 2)).toBe(1.23);
        expect(round(-2.5, 0)).toBe(-2);
        expect(round(40.04, 1)).toBe(40);
    });

    it("formats signed values", () => {
        expect(formatSigned(2, 1)).toBe("+2.0");
        expect(formatSigned(-2, 1)).toBe("-2.0");
        expect(formatSigned(0, 1)).toBe("+0.0");
        expect(formatSigned(-0.001, 2)).toBe("+0.00");
        expect(formatSigned(2.5, 2)).toBe("+2.50");
    });

    it("formats whole amounts with separators", () => {
        expect(formatAmount(320000)).toBe("320,000");
        expect(formatAmount(7058.4)).toBe("7,058");
        expect(formatAmount(999.5)).toBe("1,000");
    });
});

describe("utils/random", () => {
    it("maps draws onto a uniform range", () => {
        const rng = new SequenceRandom([0, 0.5, 0.75]);
        expect(uniform(rng, 50, 300)).toBe(50);
        expect(uniform(rng, 50, 300)).toBe(175);
        expect(uniform(rng, -0.5, 0.5)).toBe(0.25);
    });

    it("draws normal variates with Box-Muller", () => {
        // u1 = 1 - 0.5, u2 = 0.5 gives z = -sqrt(2 ln 2)
        const rng = new SequenceRandom([0.5, 0.5]);
        expect(gaussian(rng, 100, 10)).toBeCloseTo(100 - 10 * Math.sqrt(2 * Math.LN2), 10);
    });

    it("picks by index and rejects empty lists", () => {
        const rng = new SequenceRandom([0, 0.99, 0.5]);
        const items = ["a", "b", "c", "d"];
        expect(pick(rng, items)).toBe("a");
        expect(pick(rng, items)).toBe("d");
        expect(pick(rng, items)).toBe("c");
        expect(() => pick(rng, [])).toThrow(RangeError);
    });
});
