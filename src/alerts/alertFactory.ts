// src/alerts/alertFactory.ts
import type {
    AnomalySeverity,
    FraudAlert,
    NewsImpactAlert,
    PriceMoveAlert,
    SanctionsAddedAlert,
    SanctionsMatchAlert,
    TradeAction,
    TradingAlert,
} from "../types/marketEvents.js";
import { formatAmount, formatSigned } from "../utils/formatting.js";

export function fraudAlert(params: {
    customer: string;
    amount: number;
    ratio: number;
    zscore: number | null;
    severity: AnomalySeverity;
    timestamp: number;
}): FraudAlert {
    const { customer, amount, ratio, zscore, severity, timestamp } = params;
    const zPart = zscore !== null ? `, z=${zscore.toFixed(1)}` : "";
    return {
        channel: "fraud",
        kind: "anomaly",
        customer,
        amount,
        ratio,
        zscore,
        severity,
        timestamp,
        message: `${customer}: amount ${formatAmount(amount)} is ${ratio.toFixed(0)}× baseline${zPart} — suspicious (${severity})`,
    };
}

export function sanctionsAddedAlert(
    name: string,
    timestamp: number
): SanctionsAddedAlert {
    return {
        channel: "sanctions",
        kind: "added",
        name,
        timestamp,
        message: `Sanctions list updated: ${name} added just now.`,
    };
}

export function sanctionsMatchAlert(params: {
    customer: string;
    recipient: string;
    amount: number;
    secondsSinceListed: number;
    timestamp: number;
}): SanctionsMatchAlert {
    return {
        channel: "sanctions",
        kind: "match",
        ...params,
        message: `Transfer flagged. Recipient '${params.recipient}' was added ${params.secondsSinceListed} seconds ago.`,
    };
}

export function newsImpactAlert(params: {
    symbol: string;
    headline: string;
    impactPct: number;
    timestamp: number;
}): NewsImpactAlert {
    return {
        channel: "portfolio",
        kind: "news-impact",
        ...params,
        message: `${params.symbol}: ${params.headline} — estimated impact ${formatSigned(params.impactPct, 1)}%`,
    };
}

export function priceMoveAlert(params: {
    symbol: string;
    change: number;
    changePct: number;
    windowSeconds: number;
    quantityHeld: number;
    timestamp: number;
}): PriceMoveAlert {
    const { symbol, change, changePct, windowSeconds, quantityHeld } = params;
    return {
        channel: "portfolio",
        kind: "price-move",
        ...params,
        message: `${symbol} moved ${formatSigned(change, 2)} (${formatSigned(changePct, 1)}%) in last ${windowSeconds}s (${quantityHeld} shares held).`,
    };
}

export function tradingAlert(params: {
    symbol: string;
    action: TradeAction;
    quantity: number;
    price: number;
    timestamp: number;
}): TradingAlert {
    const { symbol, action, quantity, price } = params;
    const verb = action === "buy" ? "Bought" : "Sold";
    return {
        channel: "trading",
        kind: "trade-executed",
        ...params,
        message: `${verb} ${quantity} shares of ${symbol} at $${price.toFixed(2)}`,
    };
}
