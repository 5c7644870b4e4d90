// test/helpers/testDoubles.ts
import { readFileSync } from "fs";
import { vi } from "vitest";
import { parseConfig, type AppConfig } from "../../src/core/config.js";
import type { ILogger } from "../../src/infrastructure/loggerInterface.js";
import type { RandomSource } from "../../src/utils/random.js";
import type { Clock } from "../../src/utils/time.js";

export const createMockLogger = () =>
    ({
        info: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        debug: vi.fn(),
        setCorrelationId: vi.fn(),
        removeCorrelationId: vi.fn(),
    }) satisfies ILogger;

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
    constructor(public current = 1_700_000_000) {}

    now(): number {
        return this.current;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}

/**
 * Replays `values` in order, wrapping around at the end.
 */
export class SequenceRandom implements RandomSource {
    private index = 0;

    constructor(private readonly values: number[]) {}

    next(): number {
        const value = this.values[this.index % this.values.length];
        this.index++;
        return value;
    }
}

/**
 * The checked-in config.json, validated with no environment overrides.
 */
export function loadTestConfig(): AppConfig {
    const raw: unknown = JSON.parse(
        readFileSync(new URL("../../config.json", import.meta.url), "utf-8")
    );
    return parseConfig(raw, {});
}
