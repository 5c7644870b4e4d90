import { describe, it, expect, beforeEach } from "vitest";
import { TradingService } from "../src/services/tradingService.js";
import { MarketState } from "../src/market/marketState.js";
import { EventBroker } from "../src/infrastructure/eventBroker.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { TradeRejectedError, ValidationError } from "../src/core/errors.js";
import type { AlertEvent, MarketEvent } from "../src/types/marketEvents.js";
import { createMockLogger, ManualClock } from "./helpers/testDoubles.js";

describe("services/TradingService", () => {
    let state: MarketState;
    let marketBroker: EventBroker<MarketEvent>;
    let alertBroker: EventBroker<AlertEvent>;
    let metrics: MetricsCollector;
    let trading: TradingService;

    beforeEach(() => {
        const clock = new ManualClock(5000);
        state = new MarketState({ symbols: ["AAPL"], initialCashBalance: 10000 }, clock);
        marketBroker = new EventBroker<MarketEvent>({ channel: "market" });
        alertBroker = new EventBroker<AlertEvent>({ channel: "alerts" });
        metrics = new MetricsCollector();
        trading = new TradingService(
            state,
            marketBroker,
            alertBroker,
            clock,
            createMockLogger(),
            metrics
        );
    });

    it("buys at the last known price", () => {
        state.setPrice("AAPL", 150, 1);
        const result = trading.execute({ symbol: "aapl", action: "BUY", quantity: 10 });

        expect(result.message).toBe("Bought 10 shares of AAPL at $150.00");
        expect(result.transaction.transactionId).toMatch(/^buy_AAPL_[0-9A-HJKMNP-TV-Z]{26}$/);
        expect(result.transaction.totalValue).toBe(1500);
        expect(result.portfolioValue).toBe(1500);
        expect(state.quantityHeld("AAPL")).toBe(10);
        expect(state.cashBalance).toBe(8500);

        expect(marketBroker.tryDrain()).toEqual({
            type: "trade",
            symbol: "AAPL",
            action: "buy",
            quantity: 10,
            price: 150,
            portfolioValue: 1500,
            timestamp: 5000,
        });
        expect(alertBroker.tryDrain()).toMatchObject({
            channel: "trading",
            kind: "trade-executed",
            message: "Bought 10 shares of AAPL at $150.00",
        });
        expect(metrics.getCounterValue("trades_executed_total", { action: "buy" })).toBe(1);
    });

    it("prefers an explicit price", () => {
        state.setPrice("AAPL", 150, 1);
        const result = trading.execute({ symbol: "AAPL", action: "buy", quantity: 1, price: 149.5 });
        expect(result.transaction.price).toBe(149.5);
    });

    it("rejects a trade with no known price", () => {
        expect(() => trading.execute({ symbol: "NVDA", action: "buy", quantity: 1 })).toThrow(
            TradeRejectedError
        );
        expect(marketBroker.size).toBe(0);
    });

    it("rejects selling more than is held", () => {
        state.setPrice("AAPL", 150, 1);
        trading.execute({ symbol: "AAPL", action: "buy", quantity: 10 });
        expect(() => trading.execute({ symbol: "AAPL", action: "sell", quantity: 11 })).toThrow(
            "Insufficient shares. You have 10 shares of AAPL"
        );
        expect(state.quantityHeld("AAPL")).toBe(10);
        expect(metrics.getCounterValue("trades_rejected_total")).toBe(1);
    });

    it("removes a position sold down to zero", () => {
        state.setPrice("AAPL", 150, 1);
        trading.execute({ symbol: "AAPL", action: "buy", quantity: 10 });
        const result = trading.execute({ symbol: "AAPL", action: "sell", quantity: 10, price: 160 });

        expect(result.message).toBe("Sold 10 shares of AAPL at $160.00");
        expect(state.holdsSymbol("AAPL")).toBe(false);
        expect(state.cashBalance).toBe(10100);
        expect(result.portfolioValue).toBe(0);
    });

    it("validates action and quantity", () => {
        expect(() => trading.execute({ symbol: "AAPL", action: "hold", quantity: 1 })).toThrow(
            ValidationError
        );
        expect(() => trading.execute({ symbol: "AAPL", action: "buy", quantity: 0 })).toThrow(
            ValidationError
        );
    });
});
