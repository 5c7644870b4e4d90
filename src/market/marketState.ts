// src/market/marketState.ts
import { z } from "zod";
import { ValidationError } from "../core/errors.js";
import { formatZodIssues } from "../core/validation.js";
import type {
    NewsItem,
    PaymentEvent,
    PortfolioSnapshot,
    PricePoint,
    TradeTransaction,
} from "../types/marketEvents.js";
import { CircularBuffer } from "../utils/circularBuffer.js";
import { systemClock, type Clock } from "../utils/time.js";

export interface MarketStateOptions {
    /** Tracked instruments, upper-case */
    symbols: string[];
    /** Price points retained per symbol (default: 500) */
    priceHistoryCap?: number;
    /** News items retained (default: 200) */
    newsCap?: number;
    /** Payment events retained (default: 500) */
    paymentsCap?: number;
    /** Cash a fresh portfolio starts with (default: 10000) */
    initialCashBalance?: number;
}

const HoldingsSchema = z.record(z.coerce.number().finite().nonnegative());

const PortfolioUploadSchema = z.union([
    z.object({ holdings: HoldingsSchema }).transform((doc) => doc.holdings),
    HoldingsSchema,
]);

/**
 * Shared in-memory market view: last prices, bounded histories, recent news
 * and payments, and the single demo portfolio.
 *
 * All mutation happens from synchronous call paths, so no reader ever sees a
 * half-applied update.
 */
export class MarketState {
    private readonly trackedSymbols: string[];
    private readonly prices = new Map<string, number>();
    private readonly history = new Map<string, PricePoint[]>();
    private readonly news: CircularBuffer<NewsItem>;
    private readonly payments: CircularBuffer<PaymentEvent>;

    private readonly priceHistoryCap: number;
    private readonly initialCashBalance: number;

    private holdings = new Map<string, number>();
    private cash: number;
    private transactions: TradeTransaction[] = [];

    constructor(
        options: MarketStateOptions,
        private readonly clock: Clock = systemClock
    ) {
        this.trackedSymbols = options.symbols.map((s) => s.toUpperCase());
        this.priceHistoryCap = options.priceHistoryCap ?? 500;
        this.news = new CircularBuffer<NewsItem>(options.newsCap ?? 200);
        this.payments = new CircularBuffer<PaymentEvent>(
            options.paymentsCap ?? 500
        );
        this.initialCashBalance = options.initialCashBalance ?? 10000;
        this.cash = this.initialCashBalance;
    }

    public get symbols(): readonly string[] {
        return this.trackedSymbols;
    }

    public trackSymbol(symbol: string): void {
        if (!this.trackedSymbols.includes(symbol)) {
            this.trackedSymbols.push(symbol);
        }
    }

    // ------------------------------------------------------------------
    // Prices
    // ------------------------------------------------------------------

    /**
     * Record the latest price and append it to the symbol's history.
     * Returns the previous price, if any.
     */
    public setPrice(
        symbol: string,
        price: number,
        timestamp: number
    ): number | undefined {
        const previous = this.prices.get(symbol);
        this.prices.set(symbol, price);

        let points = this.history.get(symbol);
        if (!points) {
            points = [];
            this.history.set(symbol, points);
        }
        points.push({ timestamp, price });
        // Trim back to the cap in one batch
        if (points.length > this.priceHistoryCap) {
            points.splice(0, points.length - this.priceHistoryCap);
        }
        return previous;
    }

    public currentPrice(symbol: string): number | undefined {
        return this.prices.get(symbol);
    }

    public currentPrices(): Record<string, number> {
        return Object.fromEntries(this.prices);
    }

    public priceHistory(symbol: string): PricePoint[] {
        return [...(this.history.get(symbol) ?? [])];
    }

    /**
     * Points for `symbol` stamped within `[now - seconds, now]`, oldest first.
     */
    public recentPriceWindow(
        symbol: string,
        seconds: number,
        now: number = this.clock.now()
    ): PricePoint[] {
        const points = this.history.get(symbol);
        if (!points) return [];
        return points.filter((p) => p.timestamp <= now && now - p.timestamp <= seconds);
    }

    // ------------------------------------------------------------------
    // News and payments
    // ------------------------------------------------------------------

    public appendNews(item: NewsItem): void {
        this.news.push(item);
    }

    /** Most recent items, newest last */
    public recentNews(limit?: number): NewsItem[] {
        return limit === undefined ? this.news.toArray() : this.news.tail(limit);
    }

    public recordPayment(event: PaymentEvent): void {
        this.payments.push(event);
    }

    /** Most recent payments, newest last */
    public recentPayments(limit?: number): PaymentEvent[] {
        return limit === undefined
            ? this.payments.toArray()
            : this.payments.tail(limit);
    }

    // ------------------------------------------------------------------
    // Portfolio
    // ------------------------------------------------------------------

    /**
     * Replace the portfolio from an uploaded document, either a bare
     * `{ "AAPL": 10 }` map or `{ "holdings": { ... } }`. Cash and the
     * transaction log start over.
     */
    public loadPortfolio(document: unknown): Record<string, number> {
        const parsed = PortfolioUploadSchema.safeParse(document);
        if (!parsed.success) {
            throw new ValidationError(
                "Invalid portfolio document",
                formatZodIssues(parsed.error)
            );
        }
        const holdings = new Map<string, number>();
        for (const [symbol, quantity] of Object.entries(parsed.data)) {
            if (quantity <= 0) continue;
            holdings.set(symbol.trim().toUpperCase(), quantity);
        }

        this.holdings = holdings;
        this.cash = this.initialCashBalance;
        this.transactions = [];
        return Object.fromEntries(holdings);
    }

    public quantityHeld(symbol: string): number {
        return this.holdings.get(symbol) ?? 0;
    }

    public holdsSymbol(symbol: string): boolean {
        return this.holdings.has(symbol);
    }

    public heldSymbols(): string[] {
        return [...this.holdings.keys()];
    }

    public get cashBalance(): number {
        return this.cash;
    }

    /**
     * Apply an already-approved trade. Positions that reach zero are removed.
     */
    public applyTrade(transaction: TradeTransaction): void {
        const { symbol, action, quantity, totalValue } = transaction;
        const held = this.quantityHeld(symbol);
        const next = action === "buy" ? held + quantity : held - quantity;
        if (next > 0) {
            this.holdings.set(symbol, next);
        } else {
            this.holdings.delete(symbol);
        }
        this.cash += action === "buy" ? -totalValue : totalValue;
        this.transactions.push(transaction);
    }

    public holdingsValue(): number {
        let total = 0;
        for (const [symbol, quantity] of this.holdings) {
            total += quantity * (this.prices.get(symbol) ?? 0);
        }
        return total;
    }

    public portfolio(): PortfolioSnapshot {
        const holdingsValue = this.holdingsValue();
        return {
            holdings: Object.fromEntries(this.holdings),
            cashBalance: this.cash,
            holdingsValue,
            totalValue: holdingsValue + this.cash,
            transactions: [...this.transactions],
        };
    }
}
