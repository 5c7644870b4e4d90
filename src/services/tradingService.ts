// src/services/tradingService.ts
import { ulid } from "ulid";
import { z } from "zod";
import { tradingAlert } from "../alerts/alertFactory.js";
import { TradeRejectedError } from "../core/errors.js";
import { parseInput } from "../core/validation.js";
import type { EventBroker } from "../infrastructure/eventBroker.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type { MarketState } from "../market/marketState.js";
import type {
    AlertEvent,
    MarketEvent,
    TradeEvent,
    TradeTransaction,
    TradingAlert,
} from "../types/marketEvents.js";
import type { Clock } from "../utils/time.js";
import { SymbolSchema } from "./ingestionService.js";

export const TradeInputSchema = z.object({
    symbol: SymbolSchema,
    action: z.preprocess(
        (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
        z.enum(["buy", "sell"])
    ),
    quantity: z.number().finite().positive(),
    price: z.number().finite().positive().optional(),
});

export type TradeInput = z.input<typeof TradeInputSchema>;

export interface TradeResult {
    transaction: TradeTransaction;
    message: string;
    portfolioValue: number;
    event: TradeEvent;
    alert: TradingAlert;
}

export class TradingService {
    constructor(
        private readonly state: MarketState,
        private readonly marketBroker: EventBroker<MarketEvent>,
        private readonly alertBroker: EventBroker<AlertEvent>,
        private readonly clock: Clock,
        private readonly logger: ILogger,
        private readonly metrics?: IMetricsCollector
    ) {}

    /**
     * Execute a paper trade at the given price, or the last known price.
     *
     * @throws ValidationError on malformed input
     * @throws TradeRejectedError when no price is known or a sell exceeds holdings
     */
    public execute(input: TradeInput): TradeResult {
        const { symbol, action, quantity, price } = parseInput(
            TradeInputSchema,
            input,
            "trade"
        );

        const executionPrice = price ?? this.state.currentPrice(symbol);
        if (executionPrice === undefined) {
            throw this.reject(`No market price for ${symbol} yet`, symbol);
        }

        const held = this.state.quantityHeld(symbol);
        if (action === "sell" && held < quantity) {
            throw this.reject(
                `Insufficient shares. You have ${held} shares of ${symbol}`,
                symbol
            );
        }

        const timestamp = this.clock.now();
        const transaction: TradeTransaction = {
            transactionId: `${action}_${symbol}_${ulid()}`,
            timestamp,
            symbol,
            action,
            quantity,
            price: executionPrice,
            totalValue: quantity * executionPrice,
        };
        this.state.applyTrade(transaction);
        const portfolioValue = this.state.holdingsValue();

        const event: TradeEvent = {
            type: "trade",
            symbol,
            action,
            quantity,
            price: executionPrice,
            portfolioValue,
            timestamp,
        };
        const alert = tradingAlert({
            symbol,
            action,
            quantity,
            price: executionPrice,
            timestamp,
        });
        this.marketBroker.publish(event);
        this.alertBroker.publish(alert);

        this.metrics?.incrementCounter("trades_executed_total", 1, { action });
        this.logger.info(alert.message, {
            component: "TradingService",
            transactionId: transaction.transactionId,
            cashBalance: this.state.cashBalance,
        });

        return { transaction, message: alert.message, portfolioValue, event, alert };
    }

    private reject(message: string, symbol: string): TradeRejectedError {
        this.metrics?.incrementCounter("trades_rejected_total", 1);
        this.logger.warn("Trade rejected", {
            component: "TradingService",
            symbol,
            reason: message,
        });
        return new TradeRejectedError(message);
    }
}
