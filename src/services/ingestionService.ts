// src/services/ingestionService.ts
import { z } from "zod";
import {
    fraudAlert,
    newsImpactAlert,
    sanctionsAddedAlert,
    sanctionsMatchAlert,
} from "../alerts/alertFactory.js";
import { parseInput } from "../core/validation.js";
import type { EventBroker } from "../infrastructure/eventBroker.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type { MarketState } from "../market/marketState.js";
import type {
    AlertEvent,
    FraudAlert,
    MarketEvent,
    NewsEvent,
    NewsImpactAlert,
    PaymentEvent,
    PriceEvent,
    SanctionsAddedAlert,
    SanctionsMatchAlert,
} from "../types/marketEvents.js";
import type { Clock } from "../utils/time.js";
import type { AnomalyDetector } from "./anomalyDetector.js";
import type { SanctionsRegistry } from "./sanctionsRegistry.js";
import { classifySentiment, estimateNewsImpact } from "./sentiment.js";

export const SymbolSchema = z
    .string()
    .trim()
    .min(1)
    .max(16)
    .transform((s) => s.toUpperCase());

const TimestampSchema = z.number().finite().nonnegative();

export const PriceInputSchema = z.object({
    symbol: SymbolSchema,
    price: z.number().finite().positive(),
    timestamp: TimestampSchema.optional(),
});

export const NewsInputSchema = z.object({
    symbol: SymbolSchema,
    headline: z.string().trim().min(1).max(500),
    source: z.string().min(1).optional(),
    timestamp: TimestampSchema.optional(),
});

export const PaymentInputSchema = z.object({
    customerId: z.string().trim().min(1),
    amount: z.number().finite().positive(),
    recipient: z.string().trim().min(1),
    timestamp: TimestampSchema.optional(),
});

export type PriceInput = z.input<typeof PriceInputSchema>;
export type NewsInput = z.input<typeof NewsInputSchema>;
export type PaymentInput = z.input<typeof PaymentInputSchema>;

export interface NewsIngestResult {
    event: NewsEvent;
    impactAlert?: NewsImpactAlert;
}

export interface PaymentIngestResult {
    payment: PaymentEvent;
    fraudAlert?: FraudAlert;
    sanctionsAlert?: SanctionsMatchAlert;
}

export interface IngestionServiceDeps {
    marketState: MarketState;
    anomalyDetector: AnomalyDetector;
    sanctions: SanctionsRegistry;
    marketBroker: EventBroker<MarketEvent>;
    alertBroker: EventBroker<AlertEvent>;
    clock: Clock;
    logger: ILogger;
    metrics?: IMetricsCollector;
}

/**
 * Single entry point for externally pushed and simulated data. Each call
 * validates, mutates shared state, and publishes without yielding, so events
 * from one call reach the brokers in a fixed order.
 */
export class IngestionService {
    private readonly state: MarketState;
    private readonly detector: AnomalyDetector;
    private readonly sanctions: SanctionsRegistry;
    private readonly marketBroker: EventBroker<MarketEvent>;
    private readonly alertBroker: EventBroker<AlertEvent>;
    private readonly clock: Clock;
    private readonly logger: ILogger;
    private readonly metrics?: IMetricsCollector;

    constructor(deps: IngestionServiceDeps) {
        this.state = deps.marketState;
        this.detector = deps.anomalyDetector;
        this.sanctions = deps.sanctions;
        this.marketBroker = deps.marketBroker;
        this.alertBroker = deps.alertBroker;
        this.clock = deps.clock;
        this.logger = deps.logger;
        this.metrics = deps.metrics;
    }

    public ingestPrice(input: PriceInput): PriceEvent {
        const { symbol, price, timestamp } = this.validate(
            PriceInputSchema,
            input,
            "price"
        );
        const ts = timestamp ?? this.clock.now();
        this.state.trackSymbol(symbol);
        const previous = this.state.setPrice(symbol, price, ts);

        const event: PriceEvent =
            previous !== undefined
                ? {
                      type: "price",
                      symbol,
                      price,
                      change: price - previous,
                      changePercent: ((price - previous) / previous) * 100,
                      timestamp: ts,
                  }
                : { type: "price", symbol, price, timestamp: ts };

        this.marketBroker.publish(event);
        this.count("price");
        return event;
    }

    /**
     * Classify and store a headline. Holders of the symbol also get a
     * portfolio impact alert.
     */
    public ingestNews(input: NewsInput): NewsIngestResult {
        const { symbol, headline, source, timestamp } = this.validate(
            NewsInputSchema,
            input,
            "news"
        );
        const ts = timestamp ?? this.clock.now();
        const sentiment = classifySentiment(headline);

        this.state.appendNews({ timestamp: ts, symbol, headline, sentiment });
        const event: NewsEvent = {
            type: "news",
            symbol,
            headline,
            sentiment,
            timestamp: ts,
            ...(source !== undefined ? { source } : {}),
        };
        this.marketBroker.publish(event);
        this.count("news");

        if (!this.state.holdsSymbol(symbol)) {
            return { event };
        }

        const impactAlert = newsImpactAlert({
            symbol,
            headline,
            impactPct: estimateNewsImpact(sentiment),
            timestamp: ts,
        });
        this.alertBroker.publish(impactAlert);
        return { event, impactAlert };
    }

    /**
     * Score a payment, record it, and raise fraud and sanctions alerts.
     * The fraud alert, when present, is published first.
     */
    public ingestPayment(input: PaymentInput): PaymentIngestResult {
        const { customerId, amount, recipient, timestamp } = this.validate(
            PaymentInputSchema,
            input,
            "payment"
        );
        const ts = timestamp ?? this.clock.now();
        const evaluation = this.detector.evaluate(customerId, amount);

        const payment: PaymentEvent = {
            customerId,
            amount,
            recipient,
            timestamp: ts,
            ...evaluation,
        };
        this.state.recordPayment(payment);
        this.count("payment");

        const result: PaymentIngestResult = { payment };

        if (evaluation.severity !== "normal") {
            result.fraudAlert = fraudAlert({
                customer: customerId,
                amount,
                ratio: evaluation.ratio,
                zscore: evaluation.zscore,
                severity: evaluation.severity,
                timestamp: ts,
            });
            this.alertBroker.publish(result.fraudAlert);
        }

        const secondsSinceListed = this.sanctions.secondsSince(recipient, ts);
        if (secondsSinceListed !== undefined) {
            result.sanctionsAlert = sanctionsMatchAlert({
                customer: customerId,
                recipient,
                amount,
                secondsSinceListed,
                timestamp: ts,
            });
            this.alertBroker.publish(result.sanctionsAlert);
            this.metrics?.incrementCounter("sanctions_matches_total", 1);
            this.logger.warn("Payment to sanctioned recipient", {
                component: "IngestionService",
                customerId,
                recipient,
                amount,
                secondsSinceListed,
            });
        }

        return result;
    }

    public addSanction(name: string, timestamp?: number): SanctionsAddedAlert {
        const listed = this.validate(z.string().trim().min(1), name, "sanctions name");
        const ts = timestamp ?? this.clock.now();
        this.sanctions.add(listed, ts);
        const alert = sanctionsAddedAlert(listed, ts);
        this.alertBroker.publish(alert);
        this.count("sanction");
        return alert;
    }

    public drainMarketEvents(signal?: AbortSignal): Promise<MarketEvent> {
        return this.marketBroker.drain(signal);
    }

    public drainAlertEvents(signal?: AbortSignal): Promise<AlertEvent> {
        return this.alertBroker.drain(signal);
    }

    private validate<S extends z.ZodTypeAny>(
        schema: S,
        input: unknown,
        kind: string
    ): z.output<S> {
        try {
            return parseInput(schema, input, `${kind} input`);
        } catch (error) {
            this.metrics?.incrementCounter("ingestion_rejected_total", 1, {
                kind,
            });
            throw error;
        }
    }

    private count(kind: string): void {
        this.metrics?.incrementCounter("ingestion_accepted_total", 1, { kind });
    }
}
