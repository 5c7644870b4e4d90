import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { once } from "events";
import { createServer, type Server } from "http";
import { WebSocket } from "ws";
import { WebSocketManager } from "../src/websocket/websocketManager.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { createMockLogger } from "./helpers/testDoubles.js";

const MARKET = "/ws/market";
const ALERTS = "/ws/alerts";

const nextMessage = (socket: WebSocket): Promise<unknown> =>
    new Promise((resolve) => {
        socket.once("message", (data) => resolve(JSON.parse(String(data))));
    });

describe("websocket/WebSocketManager", () => {
    let server: Server;
    let manager: WebSocketManager;
    let metrics: MetricsCollector;
    let logger: ReturnType<typeof createMockLogger>;
    let port: number;
    const clients: WebSocket[] = [];

    const connect = async (path: string): Promise<WebSocket> => {
        const socket = new WebSocket(`ws://127.0.0.1:${port}${path}`);
        clients.push(socket);
        await once(socket, "open");
        return socket;
    };

    beforeEach(async () => {
        logger = createMockLogger();
        metrics = new MetricsCollector();
        server = createServer();
        manager = new WebSocketManager(server, [MARKET, ALERTS], logger, metrics);
        server.listen(0, "127.0.0.1");
        await once(server, "listening");
        const address = server.address();
        if (typeof address !== "object" || address === null) {
            throw new Error("server has no port");
        }
        port = address.port;
    });

    afterEach(async () => {
        for (const socket of clients.splice(0)) socket.terminate();
        manager.shutdown();
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    it("tracks connections per path", async () => {
        await connect(MARKET);
        await connect(MARKET);
        await connect(ALERTS);

        expect(manager.getConnectionCount(MARKET)).toBe(2);
        expect(manager.getConnectionCount(ALERTS)).toBe(1);
        expect(manager.getConnectionCount()).toBe(3);
        expect(logger.setCorrelationId).toHaveBeenCalledWith(expect.any(String), "ws /ws/alerts");
        expect(metrics.getGaugeValue("ws_connections_active", { path: MARKET })).toBe(2);
    });

    it("broadcasts only to the subscribers of a path", async () => {
        const market = await connect(MARKET);
        const alerts = await connect(ALERTS);
        const onAlert = vi.fn();
        alerts.on("message", onAlert);

        const received = nextMessage(market);
        expect(manager.broadcast(MARKET, { type: "price", symbol: "TSLA", price: 101.5 })).toBe(1);
        expect(await received).toEqual({ type: "price", symbol: "TSLA", price: 101.5 });
        expect(onAlert).not.toHaveBeenCalled();
        expect(metrics.getCounterValue("ws_messages_sent_total", { path: MARKET })).toBe(1);
    });

    it("returns zero for paths it does not serve", () => {
        expect(manager.broadcast("/ws/other", { type: "price" })).toBe(0);
        expect(manager.getConnectionCount("/ws/other")).toBe(0);
    });

    it("refuses upgrades on unknown paths", async () => {
        const socket = new WebSocket(`ws://127.0.0.1:${port}/ws/unknown`);
        const [error] = await once(socket, "error");
        expect(String(error)).toContain("Unexpected server response: 404");
    });

    it("forgets clients that disconnect", async () => {
        const socket = await connect(MARKET);
        socket.close();
        await vi.waitFor(() => {
            expect(manager.getConnectionCount(MARKET)).toBe(0);
        });
        expect(metrics.getGaugeValue("ws_connections_active", { path: MARKET })).toBe(0);
        expect(logger.info).toHaveBeenCalledWith(
            "Client disconnected",
            expect.objectContaining({ path: MARKET }),
            expect.any(String)
        );
        expect(logger.removeCorrelationId).toHaveBeenCalledTimes(1);
    });

    it("closes clients with 1001 on shutdown", async () => {
        const socket = await connect(ALERTS);
        const closed = once(socket, "close");
        manager.shutdown();

        const [code] = await closed;
        expect(code).toBe(1001);
        expect(manager.getConnectionCount()).toBe(0);
        expect(manager.broadcast(ALERTS, { kind: "added" })).toBe(0);
    });
});
