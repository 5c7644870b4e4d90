import { describe, it, expect } from "vitest";
import { EventBroker } from "../src/infrastructure/eventBroker.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { createMockLogger } from "./helpers/testDoubles.js";

describe("infrastructure/EventBroker", () => {
    it("delivers buffered events in publish order", async () => {
        const broker = new EventBroker<number>({ channel: "market" });
        broker.publish(1);
        broker.publish(2);
        broker.publish(3);
        expect(await broker.drain()).toBe(1);
        expect(await broker.drain()).toBe(2);
        expect(await broker.drain()).toBe(3);
        expect(broker.size).toBe(0);
    });

    it("defaults to a capacity of 1000", () => {
        const broker = new EventBroker<number>({ channel: "market" });
        expect(broker.capacity).toBe(1000);
    });

    it("drops the oldest events when full", async () => {
        const metrics = new MetricsCollector();
        const logger = createMockLogger();
        const broker = new EventBroker<number>(
            { channel: "alerts", capacity: 3 },
            logger,
            metrics
        );
        for (let i = 1; i <= 5; i++) broker.publish(i);

        expect(broker.size).toBe(3);
        expect(broker.droppedCount).toBe(2);
        expect(
            metrics.getCounterValue("broker_dropped_total", { channel: "alerts" })
        ).toBe(2);
        expect(logger.debug).toHaveBeenCalledTimes(2);
        expect(await broker.drain()).toBe(3);
        expect(await broker.drain()).toBe(4);
        expect(await broker.drain()).toBe(5);
    });

    it("keeps exactly the last 1000 of 1500 published events", () => {
        const broker = new EventBroker<number>({ channel: "market", capacity: 1000 });
        for (let i = 0; i < 1500; i++) broker.publish(i);
        expect(broker.size).toBe(1000);
        expect(broker.tryDrain()).toBe(500);
    });

    it("wakes a waiting drain on publish", async () => {
        const broker = new EventBroker<string>({ channel: "market" });
        const pending = broker.drain();
        expect(broker.pendingDrains).toBe(1);
        broker.publish("tick");
        await expect(pending).resolves.toBe("tick");
        expect(broker.size).toBe(0);
        expect(broker.pendingDrains).toBe(0);
    });

    it("serves concurrent drains first come first served", async () => {
        const broker = new EventBroker<string>({ channel: "market" });
        const first = broker.drain();
        const second = broker.drain();
        broker.publish("a");
        broker.publish("b");
        await expect(first).resolves.toBe("a");
        await expect(second).resolves.toBe("b");
    });

    it("rejects a waiting drain when its signal aborts", async () => {
        const broker = new EventBroker<string>({ channel: "market" });
        const controller = new AbortController();
        const pending = broker.drain(controller.signal);
        controller.abort();
        await expect(pending).rejects.toMatchObject({ name: "AbortError" });
        expect(broker.pendingDrains).toBe(0);

        broker.publish("kept");
        expect(broker.size).toBe(1);
    });

    it("rejects immediately for an aborted signal with nothing buffered", async () => {
        const broker = new EventBroker<string>({ channel: "market" });
        const reason = new Error("shutting down");
        await expect(broker.drain(AbortSignal.abort(reason))).rejects.toBe(reason);
    });

    it("still hands out buffered events under an aborted signal", async () => {
        const broker = new EventBroker<string>({ channel: "market" });
        broker.publish("ready");
        await expect(broker.drain(AbortSignal.abort())).resolves.toBe("ready");
    });

    it("returns undefined from tryDrain when empty", () => {
        const broker = new EventBroker<string>({ channel: "market" });
        expect(broker.tryDrain()).toBeUndefined();
    });
});
