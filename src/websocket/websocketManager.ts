// src/websocket/websocketManager.ts

import { WebSocketServer, WebSocket } from "ws";
import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { randomUUID } from "crypto";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";

export interface ExtendedWebSocket extends WebSocket {
    clientId?: string;
    correlationId?: string;
}

/**
 * Push-only WebSocket endpoints sharing one HTTP server. Each path has its
 * own client set; upgrades for unknown paths are refused with 404.
 */
export class WebSocketManager {
    private readonly servers = new Map<string, WebSocketServer>();
    private readonly connections = new Map<string, Set<ExtendedWebSocket>>();
    private isShuttingDown = false;

    constructor(
        httpServer: Server,
        paths: readonly string[],
        private readonly logger: ILogger,
        private readonly metricsCollector: IMetricsCollector
    ) {
        for (const path of paths) {
            const wsServer = new WebSocketServer({ noServer: true });
            wsServer.on("connection", (ws: ExtendedWebSocket) =>
                this.handleConnection(path, ws)
            );
            this.servers.set(path, wsServer);
            this.connections.set(path, new Set());
        }
        httpServer.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) =>
            this.handleUpgrade(request, socket, head)
        );
    }

    private handleUpgrade(
        request: IncomingMessage,
        socket: Duplex,
        head: Buffer
    ): void {
        const { pathname } = new URL(request.url ?? "/", "http://localhost");
        const wsServer = this.servers.get(pathname);
        if (!wsServer || this.isShuttingDown) {
            socket.once("finish", () => socket.destroy());
            socket.end("HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n");
            return;
        }
        wsServer.handleUpgrade(request, socket, head, (ws) => {
            wsServer.emit("connection", ws, request);
        });
    }

    private handleConnection(path: string, ws: ExtendedWebSocket): void {
        const clients = this.connections.get(path);
        if (!clients) return;

        const clientId = randomUUID();
        const correlationId = randomUUID();
        ws.clientId = clientId;
        ws.correlationId = correlationId;
        clients.add(ws);
        this.updateConnectionGauge(path);
        this.logger.setCorrelationId(correlationId, `ws ${path}`);
        this.logger.info("Client connected", { clientId, path }, correlationId);

        const remove = (): void => {
            if (clients.delete(ws)) {
                this.updateConnectionGauge(path);
                this.logger.info("Client disconnected", { clientId, path }, correlationId);
                this.logger.removeCorrelationId(correlationId);
            }
        };

        ws.on("close", remove);
        ws.on("error", (error: Error) => {
            this.logger.error(
                "WebSocket error",
                { error: error.message, clientId, path },
                correlationId
            );
            remove();
        });
    }

    /**
     * Send `message` as JSON to every open client on `path`.
     * Returns the number of clients it was written to.
     */
    public broadcast(path: string, message: unknown): number {
        const clients = this.connections.get(path);
        if (this.isShuttingDown || !clients) return 0;

        const payload = JSON.stringify(message);
        let sent = 0;
        clients.forEach((client) => {
            if (client.readyState === WebSocket.OPEN) {
                try {
                    client.send(payload);
                    sent++;
                } catch (error) {
                    this.logger.error("Broadcast error", {
                        error: error instanceof Error ? error.message : String(error),
                        clientId: client.clientId,
                        path,
                    });
                }
            }
        });
        this.metricsCollector.incrementCounter("ws_messages_sent_total", sent, { path });
        return sent;
    }

    /**
     * Close every client with 1001 (going away) and stop accepting upgrades.
     */
    public shutdown(): void {
        this.isShuttingDown = true;

        for (const [path, clients] of this.connections) {
            clients.forEach((ws) => {
                if (ws.correlationId) this.logger.removeCorrelationId(ws.correlationId);
                try {
                    ws.close(1001, "Server shutting down");
                } catch (error) {
                    this.logger.error("Error closing WebSocket connection", {
                        error: error instanceof Error ? error.message : String(error),
                        path,
                    });
                }
            });
            clients.clear();
            this.updateConnectionGauge(path);
        }

        for (const wsServer of this.servers.values()) {
            wsServer.close();
        }
        this.logger.info("WebSocket endpoints closed");
    }

    public getConnectionCount(path?: string): number {
        if (path !== undefined) return this.connections.get(path)?.size ?? 0;
        let total = 0;
        for (const clients of this.connections.values()) total += clients.size;
        return total;
    }

    private updateConnectionGauge(path: string): void {
        this.metricsCollector.setGauge(
            "ws_connections_active",
            this.connections.get(path)?.size ?? 0,
            { path }
        );
    }
}
