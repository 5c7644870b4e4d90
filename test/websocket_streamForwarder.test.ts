import { describe, it, expect, beforeEach, vi } from "vitest";
import { EventBroker } from "../src/infrastructure/eventBroker.js";
import { StreamForwarder } from "../src/websocket/streamForwarder.js";
import type { WireMessage } from "../src/websocket/wireFormat.js";
import { createMockLogger } from "./helpers/testDoubles.js";

interface Tick {
    symbol: string;
    price: number;
}

const encode = (tick: Tick): WireMessage => ({ symbol: tick.symbol, price: tick.price });

describe("websocket/StreamForwarder", () => {
    let broker: EventBroker<Tick>;
    let logger: ReturnType<typeof createMockLogger>;
    let delivered: WireMessage[];

    beforeEach(() => {
        broker = new EventBroker<Tick>({ channel: "test" });
        logger = createMockLogger();
        delivered = [];
    });

    const forwarder = (sink: (message: WireMessage) => void = (m) => delivered.push(m)) =>
        new StreamForwarder<Tick>(
            {
                name: "test",
                source: (signal) => broker.drain(signal),
                encode,
                sink,
            },
            logger
        );

    it("forwards buffered and live events in order", async () => {
        broker.publish({ symbol: "TSLA", price: 1 });
        const f = forwarder();
        f.start();
        broker.publish({ symbol: "AAPL", price: 2 });

        await vi.waitFor(() => {
            expect(delivered).toHaveLength(2);
        });
        expect(delivered).toEqual([
            { symbol: "TSLA", price: 1 },
            { symbol: "AAPL", price: 2 },
        ]);
        expect(f.forwardedCount).toBe(2);
        await f.stop();
    });

    it("stops a loop that is waiting for the next event", async () => {
        const f = forwarder();
        f.start();
        await vi.waitFor(() => {
            expect(broker.pendingDrains).toBe(1);
        });

        await f.stop();
        expect(broker.pendingDrains).toBe(0);
        expect(logger.error).not.toHaveBeenCalled();

        broker.publish({ symbol: "TSLA", price: 3 });
        expect(delivered).toEqual([]);
        expect(broker.size).toBe(1);
    });

    it("keeps going when the sink throws", async () => {
        let calls = 0;
        const f = forwarder((message) => {
            calls++;
            if (calls === 1) throw new Error("socket gone");
            delivered.push(message);
        });
        f.start();
        broker.publish({ symbol: "TSLA", price: 1 });
        broker.publish({ symbol: "TSLA", price: 2 });

        await vi.waitFor(() => {
            expect(delivered).toEqual([{ symbol: "TSLA", price: 2 }]);
        });
        expect(logger.error).toHaveBeenCalledWith("[StreamForwarder] test delivery failed", {
            error: "socket gone",
        });
        expect(f.forwardedCount).toBe(1);
        await f.stop();
    });

    it("logs and exits when the source fails", async () => {
        const f = new StreamForwarder<Tick>(
            {
                name: "broken",
                source: () => Promise.reject(new Error("broker closed")),
                encode,
                sink: (m) => delivered.push(m),
            },
            logger
        );
        f.start();
        await vi.waitFor(() => {
            expect(logger.error).toHaveBeenCalledWith("[StreamForwarder] broken stopped", {
                error: "broker closed",
            });
        });
        await f.stop();
        expect(delivered).toEqual([]);
    });

    it("ignores a second start", async () => {
        const f = forwarder();
        f.start();
        f.start();
        await vi.waitFor(() => {
            expect(broker.pendingDrains).toBe(1);
        });
        await f.stop();
    });
});
