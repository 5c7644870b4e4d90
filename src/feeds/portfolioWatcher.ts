// src/feeds/portfolioWatcher.ts
import { priceMoveAlert } from "../alerts/alertFactory.js";
import type { FeedsConfig } from "../core/config.js";
import type { EventBroker } from "../infrastructure/eventBroker.js";
import type { MarketState } from "../market/marketState.js";
import type { AlertEvent, PriceMoveAlert } from "../types/marketEvents.js";
import { round } from "../utils/formatting.js";
import { mathRandom, uniform, type RandomSource } from "../utils/random.js";
import type { Clock } from "../utils/time.js";
import type { FeedTask } from "./feedSupervisor.js";

/**
 * Watches held symbols and raises a price-move alert when the recent window
 * shows an absolute or percentage move beyond the configured thresholds.
 */
export class PortfolioWatcher implements FeedTask {
    public readonly name = "portfolio";

    constructor(
        private readonly state: MarketState,
        private readonly alertBroker: EventBroker<AlertEvent>,
        private readonly options: FeedsConfig["portfolio"],
        private readonly clock: Clock,
        private readonly rng: RandomSource = mathRandom
    ) {}

    public tick(): void {
        for (const alert of this.scan(this.clock.now())) {
            this.alertBroker.publish(alert);
        }
    }

    public scan(now: number): PriceMoveAlert[] {
        const { windowSeconds, absoluteMoveThreshold, percentMoveThreshold } =
            this.options;
        const alerts: PriceMoveAlert[] = [];

        for (const symbol of this.state.heldSymbols()) {
            const window = this.state.recentPriceWindow(symbol, windowSeconds, now);
            if (window.length < 2) continue;

            const first = window[0].price;
            const last = window[window.length - 1].price;
            const change = last - first;
            const changePct = (change / first) * 100;
            if (
                Math.abs(change) <= absoluteMoveThreshold &&
                Math.abs(changePct) <= percentMoveThreshold
            ) {
                continue;
            }

            alerts.push(
                priceMoveAlert({
                    symbol,
                    change: round(change, 2),
                    changePct: round(changePct, 2),
                    windowSeconds,
                    quantityHeld: this.state.quantityHeld(symbol),
                    timestamp: now,
                })
            );
        }
        return alerts;
    }

    public nextDelayMs(): number {
        return uniform(this.rng, this.options.minIntervalMs, this.options.maxIntervalMs);
    }
}
