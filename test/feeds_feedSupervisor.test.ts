import { describe, it, expect, vi, beforeEach } from "vitest";
import { FeedSupervisor, type FeedTask } from "../src/feeds/feedSupervisor.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { createMockLogger } from "./helpers/testDoubles.js";

function task(name: string, intervalMs: number, tick: () => void = () => undefined) {
    const spy = vi.fn(tick);
    const feed: FeedTask = {
        name,
        tick: spy,
        nextDelayMs: () => intervalMs,
    };
    return { feed, spy };
}

describe("feeds/FeedSupervisor", () => {
    let logger: ReturnType<typeof createMockLogger>;

    beforeEach(() => {
        vi.useFakeTimers();
        logger = createMockLogger();
    });

    it("ticks immediately and then on each interval", async () => {
        const supervisor = new FeedSupervisor(logger);
        const { feed, spy } = task("price", 1000);
        supervisor.register(feed);

        supervisor.start();
        expect(spy).toHaveBeenCalledTimes(1);

        await vi.advanceTimersByTimeAsync(3000);
        expect(spy).toHaveBeenCalledTimes(4);
        expect(supervisor.status()[0]).toMatchObject({ name: "price", running: true, ticks: 4 });

        await supervisor.stop();
    });

    it("isolates a failing feed and backs off exponentially", async () => {
        const metrics = new MetricsCollector();
        const supervisor = new FeedSupervisor(
            logger,
            { baseDelayMs: 1000, maxDelayMs: 4000, multiplier: 2 },
            metrics
        );
        const flaky = task("flaky", 100, () => {
            throw new Error("boom");
        });
        const healthy = task("healthy", 500);
        supervisor.register(flaky.feed);
        supervisor.register(healthy.feed);

        supervisor.start();
        // failures at 0, 1000, 3000 and 7000 (delays 1s, 2s, 4s, capped 4s)
        await vi.advanceTimersByTimeAsync(7000);

        expect(flaky.spy).toHaveBeenCalledTimes(4);
        expect(healthy.spy).toHaveBeenCalledTimes(15);

        const [flakyStatus, healthyStatus] = supervisor.status();
        expect(flakyStatus).toMatchObject({
            failures: 4,
            consecutiveFailures: 4,
            lastError: "boom",
            running: true,
        });
        expect(healthyStatus).toMatchObject({ failures: 0, ticks: 15 });
        expect(metrics.getCounterValue("feed_failures_total", { feed: "flaky" })).toBe(4);
        expect(logger.error).toHaveBeenCalledWith(
            "[FeedSupervisor] flaky tick failed",
            expect.objectContaining({ feed: "flaky", error: "boom", retryInMs: 1000 })
        );

        await supervisor.stop();
    });

    it("resets the backoff after a successful tick", async () => {
        const supervisor = new FeedSupervisor(logger, {
            baseDelayMs: 1000,
            maxDelayMs: 30000,
            multiplier: 2,
        });
        let calls = 0;
        const { feed, spy } = task("recovering", 5000, () => {
            calls++;
            if (calls <= 2) throw new Error(`fail ${calls}`);
        });
        supervisor.register(feed);

        supervisor.start();
        // fail at 0, fail at 1000, succeed at 3000
        await vi.advanceTimersByTimeAsync(3000);
        expect(spy).toHaveBeenCalledTimes(3);
        expect(supervisor.status()[0]).toMatchObject({
            failures: 2,
            consecutiveFailures: 0,
            ticks: 1,
        });

        await supervisor.stop();
    });

    it("computes capped exponential delays", () => {
        const supervisor = new FeedSupervisor(logger);
        expect(supervisor.backoffDelay(1)).toBe(1000);
        expect(supervisor.backoffDelay(2)).toBe(2000);
        expect(supervisor.backoffDelay(3)).toBe(4000);
        expect(supervisor.backoffDelay(5)).toBe(16000);
        expect(supervisor.backoffDelay(6)).toBe(30000);
    });

    it("stops every loop on shared cancellation", async () => {
        const supervisor = new FeedSupervisor(logger);
        const a = task("a", 1000);
        const b = task("b", 2000);
        supervisor.register(a.feed);
        supervisor.register(b.feed);

        supervisor.start();
        await vi.advanceTimersByTimeAsync(2000);
        await supervisor.stop();

        expect(supervisor.running).toBe(false);
        expect(supervisor.status().every((s) => !s.running)).toBe(true);

        const before = a.spy.mock.calls.length + b.spy.mock.calls.length;
        await vi.advanceTimersByTimeAsync(10000);
        expect(a.spy.mock.calls.length + b.spy.mock.calls.length).toBe(before);
    });

    it("passes the shared signal to async ticks", async () => {
        const supervisor = new FeedSupervisor(logger);
        const seen: AbortSignal[] = [];
        supervisor.register({
            name: "async",
            tick: async (signal) => {
                seen.push(signal);
                await Promise.resolve();
            },
            nextDelayMs: () => 1000,
        });

        supervisor.start();
        await vi.advanceTimersByTimeAsync(0);
        await supervisor.stop();

        expect(seen).toHaveLength(1);
        expect(seen[0].aborted).toBe(true);
    });

    it("refuses duplicate names and late registration", () => {
        const supervisor = new FeedSupervisor(logger);
        supervisor.register(task("price", 1000).feed);
        expect(() => supervisor.register(task("price", 1000).feed)).toThrow(
            "Feed price is already registered"
        );

        supervisor.start();
        expect(() => supervisor.register(task("news", 1000).feed)).toThrow(
            "Cannot register news while running"
        );
        return supervisor.stop();
    });
});
