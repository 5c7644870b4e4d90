// src/app.ts
import type { Dependencies } from "./core/dependencies.js";
import {
    ALERTS_WS_PATH,
    HttpServer,
    MARKET_WS_PATH,
} from "./core/httpServer.js";
import { StreamForwarder } from "./websocket/streamForwarder.js";
import { encodeAlertEvent, encodeMarketEvent } from "./websocket/wireFormat.js";
import { WebSocketManager } from "./websocket/websocketManager.js";
import type { AlertEvent, MarketEvent } from "./types/marketEvents.js";

/**
 * HTTP API, the two WebSocket streams and the simulated feeds, started and
 * stopped as one unit.
 */
export class MarketSentinelApp {
    private readonly httpServer: HttpServer;
    private readonly wsManager: WebSocketManager;
    private readonly forwarders: [
        StreamForwarder<MarketEvent>,
        StreamForwarder<AlertEvent>,
    ];

    constructor(private readonly deps: Dependencies) {
        this.httpServer = new HttpServer({
            ...deps,
            connectionCount: (path) => this.wsManager.getConnectionCount(path),
        });
        this.wsManager = new WebSocketManager(
            this.httpServer.server,
            [MARKET_WS_PATH, ALERTS_WS_PATH],
            deps.logger,
            deps.metricsCollector
        );
        this.forwarders = [
            new StreamForwarder<MarketEvent>(
                {
                    name: "market",
                    source: (signal) => deps.ingestion.drainMarketEvents(signal),
                    encode: encodeMarketEvent,
                    sink: (message) => {
                        this.wsManager.broadcast(MARKET_WS_PATH, message);
                    },
                },
                deps.logger
            ),
            new StreamForwarder<AlertEvent>(
                {
                    name: "alerts",
                    source: (signal) => deps.ingestion.drainAlertEvents(signal),
                    encode: encodeAlertEvent,
                    sink: (message) => {
                        this.wsManager.broadcast(ALERTS_WS_PATH, message);
                    },
                },
                deps.logger
            ),
        ];
    }

    /**
     * Resolves with the bound HTTP port once everything is running.
     */
    public async start(port: number = this.deps.config.httpPort): Promise<number> {
        const bound = await this.httpServer.start(port);
        for (const forwarder of this.forwarders) forwarder.start();
        if (this.deps.config.feeds.enabled) {
            this.deps.feeds.start();
        }
        this.deps.logger.info("Market sentinel started", {
            component: "MarketSentinelApp",
            port: bound,
            symbols: this.deps.config.symbols,
            feedsEnabled: this.deps.config.feeds.enabled,
        });
        return bound;
    }

    public async stop(): Promise<void> {
        await this.deps.feeds.stop();
        await Promise.all(this.forwarders.map((f) => f.stop()));
        this.wsManager.shutdown();
        await this.httpServer.stop();
        this.deps.logger.info("Market sentinel stopped", {
            component: "MarketSentinelApp",
        });
    }
}
