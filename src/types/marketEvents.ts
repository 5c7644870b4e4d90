// src/types/marketEvents.ts

/**
 * Core data model and the closed set of events that travel through the
 * market and alert channels. All timestamps are Unix seconds (float).
 */

export type Sentiment = "positive" | "neutral" | "negative";

export type Severity = "normal" | "medium" | "high" | "critical";

export type AnomalySeverity = Exclude<Severity, "normal">;

export type TradeAction = "buy" | "sell";

export interface PricePoint {
    readonly timestamp: number;
    readonly price: number;
}

export interface NewsItem {
    readonly timestamp: number;
    readonly symbol?: string;
    readonly headline: string;
    readonly sentiment: Sentiment;
}

export interface Baseline {
    average: number;
    sampleCount: number;
}

export interface PaymentEvent {
    readonly customerId: string;
    readonly amount: number;
    readonly recipient: string;
    readonly timestamp: number;
    readonly ratio: number;
    /** null when fewer than the minimum samples or zero spread */
    readonly zscore: number | null;
    readonly isAnomaly: boolean;
    readonly severity: Severity;
}

// ---------------------------------------------------------------------------
// Market channel
// ---------------------------------------------------------------------------

export interface PriceEvent {
    type: "price";
    symbol: string;
    price: number;
    /** Change against the previous known price, when there was one */
    change?: number;
    changePercent?: number;
    timestamp: number;
}

export interface NewsEvent {
    type: "news";
    symbol: string;
    headline: string;
    sentiment: Sentiment;
    source?: string;
    timestamp: number;
}

export interface TradeEvent {
    type: "trade";
    symbol: string;
    action: TradeAction;
    quantity: number;
    price: number;
    portfolioValue: number;
    timestamp: number;
}

export type MarketEvent = PriceEvent | NewsEvent | TradeEvent;

// ---------------------------------------------------------------------------
// Alert channel
// ---------------------------------------------------------------------------

export type AlertChannel = "portfolio" | "fraud" | "sanctions" | "trading";

interface AlertBase {
    timestamp: number;
    message: string;
}

export interface FraudAlert extends AlertBase {
    channel: "fraud";
    kind: "anomaly";
    customer: string;
    amount: number;
    ratio: number;
    zscore: number | null;
    severity: AnomalySeverity;
}

export interface SanctionsAddedAlert extends AlertBase {
    channel: "sanctions";
    kind: "added";
    name: string;
}

export interface SanctionsMatchAlert extends AlertBase {
    channel: "sanctions";
    kind: "match";
    customer: string;
    recipient: string;
    amount: number;
    secondsSinceListed: number;
}

export type SanctionsAlert = SanctionsAddedAlert | SanctionsMatchAlert;

export interface NewsImpactAlert extends AlertBase {
    channel: "portfolio";
    kind: "news-impact";
    symbol: string;
    headline: string;
    impactPct: number;
}

export interface PriceMoveAlert extends AlertBase {
    channel: "portfolio";
    kind: "price-move";
    symbol: string;
    change: number;
    changePct: number;
    windowSeconds: number;
    quantityHeld: number;
}

export type PortfolioAlert = NewsImpactAlert | PriceMoveAlert;

export interface TradingAlert extends AlertBase {
    channel: "trading";
    kind: "trade-executed";
    symbol: string;
    action: TradeAction;
    quantity: number;
    price: number;
}

export type AlertEvent =
    | FraudAlert
    | SanctionsAlert
    | PortfolioAlert
    | TradingAlert;

// ---------------------------------------------------------------------------
// Portfolio
// ---------------------------------------------------------------------------

export interface TradeTransaction {
    transactionId: string;
    timestamp: number;
    symbol: string;
    action: TradeAction;
    quantity: number;
    price: number;
    totalValue: number;
}

export interface PortfolioSnapshot {
    holdings: Record<string, number>;
    cashBalance: number;
    /** Holdings marked at current prices; unpriced symbols count as 0 */
    holdingsValue: number;
    totalValue: number;
    transactions: TradeTransaction[];
}
