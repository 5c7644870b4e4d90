// src/core/httpServer.ts
import express, {
    type Express,
    type NextFunction,
    type Request,
    type Response,
} from "express";
import { createServer, type Server } from "node:http";
import { randomUUID, timingSafeEqual } from "crypto";
import { z } from "zod";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { pick } from "../utils/random.js";
import { encodeAlertEvent, encodeMarketEvent } from "../websocket/wireFormat.js";
import type { Dependencies } from "./dependencies.js";
import {
    AuthenticationError,
    ServiceError,
    ValidationError,
} from "./errors.js";
import { parseInput } from "./validation.js";

export const MARKET_WS_PATH = "/ws/market";
export const ALERTS_WS_PATH = "/ws/alerts";

export type HttpServerDeps = Pick<
    Dependencies,
    | "config"
    | "rng"
    | "clock"
    | "logger"
    | "metricsCollector"
    | "marketBroker"
    | "alertBroker"
    | "marketState"
    | "anomalyDetector"
    | "sanctions"
    | "ingestion"
    | "trading"
    | "feeds"
> & {
    /** Live subscriber count for a WebSocket path */
    connectionCount?: (path: string) => number;
};

const STATUS_BY_CODE: Record<ServiceError["code"], number> = {
    VALIDATION_FAILED: 400,
    UNAUTHORIZED: 401,
    TRADE_REJECTED: 400,
    CONFIGURATION_INVALID: 500,
};

const LimitQuerySchema = z.coerce.number().int().min(1).max(1000).optional();
const SecondsQuerySchema = z.coerce.number().positive().optional();

function tokensMatch(provided: string, expected: string): boolean {
    const a = Buffer.from(provided);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Webhook guard. Only enforced when a token is configured; accepted from
 * `?token=` or the `x-webhook-token` header.
 */
export function requireWebhookToken(expected: string) {
    return (req: Request, _res: Response, next: NextFunction): void => {
        if (!expected) {
            next();
            return;
        }
        const query = req.query["token"];
        const provided =
            typeof query === "string" ? query : req.header("x-webhook-token");
        if (provided === undefined || !tokensMatch(provided, expected)) {
            next(new AuthenticationError());
            return;
        }
        next();
    };
}

function httpStatusOf(error: unknown): number {
    if (error instanceof ServiceError) return STATUS_BY_CODE[error.code];
    // body-parser tags malformed JSON with a 4xx status
    if (
        typeof error === "object" &&
        error !== null &&
        "status" in error &&
        typeof error.status === "number" &&
        error.status >= 400 &&
        error.status < 500
    ) {
        return error.status;
    }
    return 500;
}

export function createHttpApp(deps: HttpServerDeps): Express {
    const app = express();
    const { logger, metricsCollector, ingestion, marketState } = deps;
    const webhook = requireWebhookToken(deps.config.webhookToken);

    app.use(express.json({ limit: "100kb" }));

    // ------------------------------------------------------------------
    // Webhook ingestion
    // ------------------------------------------------------------------

    app.post("/api/realtime/price", webhook, (req, res) => {
        const event = ingestion.ingestPrice(req.body);
        res.json({
            status: "ok",
            message: `Price data ingested for ${event.symbol}`,
            event: encodeMarketEvent(event),
        });
    });

    app.post("/api/realtime/news", webhook, (req, res) => {
        const { event, impactAlert } = ingestion.ingestNews(req.body);
        res.json({
            status: "ok",
            message: `News data ingested for ${event.symbol}`,
            sentiment: event.sentiment,
            impactAlert: impactAlert ? encodeAlertEvent(impactAlert) : null,
        });
    });

    app.post("/api/realtime/payment", webhook, (req, res) => {
        const { payment } = ingestion.ingestPayment(req.body);
        res.json({
            status: "ok",
            message: `Payment data processed for ${payment.customerId}`,
            isAnomaly: payment.isAnomaly,
            severity: payment.severity,
            ratio: payment.ratio,
            zscore: payment.zscore,
        });
    });

    app.get("/api/realtime/status", (_req, res) => {
        res.json({
            symbols: marketState.symbols,
            feedsEnabled: deps.config.feeds.enabled,
            feeds: deps.feeds.status(),
            brokers: {
                market: {
                    size: deps.marketBroker.size,
                    capacity: deps.marketBroker.capacity,
                    dropped: deps.marketBroker.droppedCount,
                },
                alerts: {
                    size: deps.alertBroker.size,
                    capacity: deps.alertBroker.capacity,
                    dropped: deps.alertBroker.droppedCount,
                },
            },
            connections: {
                market: deps.connectionCount?.(MARKET_WS_PATH) ?? 0,
                alerts: deps.connectionCount?.(ALERTS_WS_PATH) ?? 0,
            },
            webhookTokenSet: deps.config.webhookToken !== "",
        });
    });

    // ------------------------------------------------------------------
    // Queries
    // ------------------------------------------------------------------

    app.get("/api/prices", (_req, res) => {
        res.json({
            symbols: marketState.symbols,
            prices: marketState.currentPrices(),
        });
    });

    app.get("/api/prices/:symbol/history", (req, res) => {
        const symbol = req.params["symbol"].toUpperCase();
        const seconds = parseInput(SecondsQuerySchema, req.query["seconds"], "seconds");
        const points =
            seconds === undefined
                ? marketState.priceHistory(symbol)
                : marketState.recentPriceWindow(symbol, seconds);
        res.json({ symbol, points });
    });

    app.get("/api/news", (req, res) => {
        const limit = parseInput(LimitQuerySchema, req.query["limit"], "limit");
        res.json({ news: marketState.recentNews(limit) });
    });

    app.get("/api/payments", (req, res) => {
        const limit = parseInput(LimitQuerySchema, req.query["limit"], "limit");
        res.json({ payments: marketState.recentPayments(limit) });
    });

    app.get("/api/customers/:id/metrics", (req, res) => {
        const customerId = req.params["id"];
        const metrics = deps.anomalyDetector.metricsFor(customerId);
        if (!metrics) {
            res.status(404).json({ error: `Unknown customer ${customerId}` });
            return;
        }
        res.json({ customerId, ...metrics });
    });

    app.get("/api/sanctions/:name", (req, res) => {
        const name = req.params["name"];
        const addedAt = deps.sanctions.lookup(name);
        res.json({
            name,
            listed: addedAt !== undefined,
            addedAt: addedAt ?? null,
            secondsSince: deps.sanctions.secondsSince(name, deps.clock.now()) ?? null,
        });
    });

    // ------------------------------------------------------------------
    // Portfolio & trading
    // ------------------------------------------------------------------

    app.post("/api/portfolio", (req, res) => {
        const holdings = marketState.loadPortfolio(req.body);
        logger.info("Portfolio loaded", {
            component: "HttpServer",
            symbols: Object.keys(holdings),
        });
        res.json({ ok: true, holdings });
    });

    app.get("/api/portfolio", (_req, res) => {
        res.json(marketState.portfolio());
    });

    app.post("/api/trading/execute", (req, res) => {
        const result = deps.trading.execute(req.body);
        res.json({
            success: true,
            message: result.message,
            transactionId: result.transaction.transactionId,
            executedPrice: result.transaction.price,
            portfolioValue: result.portfolioValue,
        });
    });

    app.post("/api/demo/fake-news", (_req, res) => {
        const { symbol, headline } = pick(deps.rng, deps.config.demoHeadlines);
        const { event, impactAlert } = ingestion.ingestNews({
            symbol,
            headline,
            source: "demo",
        });
        res.json({
            ok: true,
            symbol: event.symbol,
            headline: event.headline,
            sentiment: event.sentiment,
            impactAlert: impactAlert !== undefined,
        });
    });

    // ------------------------------------------------------------------
    // Stats
    // ------------------------------------------------------------------

    app.get("/stats", (_req, res) => {
        const correlationId = randomUUID();
        res.json({
            metrics: metricsCollector.getMetrics(),
            feeds: deps.feeds.status(),
            correlationId,
        });
        logger.debug("Stats requested", { component: "HttpServer" }, correlationId);
    });

    app.use(
        (error: unknown, req: Request, res: Response, _next: NextFunction) => {
            handleError(error, req, res, logger, deps.metricsCollector);
        }
    );

    return app;
}

function handleError(
    error: unknown,
    req: Request,
    res: Response,
    logger: ILogger,
    metricsCollector: HttpServerDeps["metricsCollector"]
): void {
    const status = httpStatusOf(error);
    const correlationId =
        error instanceof ServiceError && error.correlationId
            ? error.correlationId
            : randomUUID();
    const message = error instanceof Error ? error.message : String(error);

    metricsCollector.incrementCounter("http_errors_total", 1, {
        status: String(status),
    });

    const context = {
        component: "HttpServer",
        method: req.method,
        path: req.path,
        status,
        errorName: error instanceof Error ? error.name : "UnknownError",
        ...(error instanceof Error && status >= 500 ? { stack: error.stack } : {}),
    };
    if (status >= 500) {
        logger.error(`[${req.path}] ${message}`, context, correlationId);
    } else {
        logger.warn(`[${req.path}] ${message}`, context, correlationId);
    }

    res.status(status).json({
        status: "error",
        error: status >= 500 ? "Internal server error" : message,
        ...(error instanceof ValidationError ? { issues: error.issues } : {}),
        correlationId,
    });
}

export class HttpServer {
    public readonly app: Express;
    public readonly server: Server;

    constructor(
        deps: HttpServerDeps,
        private readonly logger: ILogger = deps.logger
    ) {
        this.app = createHttpApp(deps);
        this.server = createServer(this.app);
    }

    /**
     * Listen on `port` (0 picks a free one) and resolve with the bound port.
     */
    public start(port: number): Promise<number> {
        return new Promise((resolve, reject) => {
            const onError = (error: Error): void => reject(error);
            this.server.once("error", onError);
            this.server.listen(port, () => {
                this.server.off("error", onError);
                const address = this.server.address();
                const bound =
                    typeof address === "object" && address !== null
                        ? address.port
                        : port;
                this.logger.info(`HTTP server running at http://localhost:${bound}`);
                resolve(bound);
            });
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server.listening) {
                resolve();
                return;
            }
            this.server.close((error) => (error ? reject(error) : resolve()));
            this.server.closeAllConnections();
        });
    }
}
