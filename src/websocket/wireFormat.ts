// src/websocket/wireFormat.ts
import type { AlertEvent, MarketEvent } from "../types/marketEvents.js";
import { round } from "../utils/formatting.js";

export type WireValue = string | number | boolean | null;
export type WireMessage = Record<string, WireValue>;

function assertNever(value: never): never {
    throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}

/**
 * JSON shape pushed to `/ws/market` subscribers.
 */
export function encodeMarketEvent(event: MarketEvent): WireMessage {
    switch (event.type) {
        case "price": {
            const message: WireMessage = {
                type: "price",
                symbol: event.symbol,
                price: round(event.price, 2),
                ts: event.timestamp,
            };
            if (event.change !== undefined) message["change"] = round(event.change, 2);
            if (event.changePercent !== undefined) {
                message["change_percent"] = round(event.changePercent, 2);
            }
            return message;
        }
        case "news": {
            const message: WireMessage = {
                type: "news",
                symbol: event.symbol,
                headline: event.headline,
                sentiment: event.sentiment,
                ts: event.timestamp,
            };
            if (event.source !== undefined) message["source"] = event.source;
            return message;
        }
        case "trade":
            return {
                type: "trade",
                symbol: event.symbol,
                action: event.action,
                quantity: event.quantity,
                price: round(event.price, 2),
                portfolio_value: round(event.portfolioValue, 2),
                ts: event.timestamp,
            };
        default:
            return assertNever(event);
    }
}

/**
 * JSON shape pushed to `/ws/alerts` subscribers.
 */
export function encodeAlertEvent(alert: AlertEvent): WireMessage {
    const common = {
        channel: alert.channel,
        kind: alert.kind,
        ts: alert.timestamp,
        message: alert.message,
    };
    switch (alert.kind) {
        case "anomaly":
            return {
                ...common,
                customer: alert.customer,
                amount: round(alert.amount, 2),
                ratio: round(alert.ratio, 1),
                zscore: alert.zscore === null ? null : round(alert.zscore, 2),
                severity: alert.severity,
            };
        case "added":
            return { ...common, name: alert.name };
        case "match":
            return {
                ...common,
                customer: alert.customer,
                recipient: alert.recipient,
                amount: round(alert.amount, 2),
                seconds_since_listed: alert.secondsSinceListed,
            };
        case "news-impact":
            return {
                ...common,
                symbol: alert.symbol,
                headline: alert.headline,
                impact_pct: alert.impactPct,
            };
        case "price-move":
            return {
                ...common,
                symbol: alert.symbol,
                change: alert.change,
                change_pct: alert.changePct,
                window_seconds: alert.windowSeconds,
                quantity_held: alert.quantityHeld,
            };
        case "trade-executed":
            return {
                ...common,
                symbol: alert.symbol,
                action: alert.action,
                quantity: alert.quantity,
                price: round(alert.price, 2),
            };
        default:
            return assertNever(alert);
    }
}
