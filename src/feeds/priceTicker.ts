// src/feeds/priceTicker.ts
import type { FeedsConfig } from "../core/config.js";
import type { MarketState } from "../market/marketState.js";
import type { IngestionService } from "../services/ingestionService.js";
import { mathRandom, uniform, type RandomSource } from "../utils/random.js";
import type { FeedTask } from "./feedSupervisor.js";

/**
 * Random-walk price simulator. Each tick moves every tracked symbol by up to
 * `maxStep` in either direction, never below `floor`.
 */
export class PriceTicker implements FeedTask {
    public readonly name = "price";

    constructor(
        private readonly state: MarketState,
        private readonly ingestion: IngestionService,
        private readonly options: FeedsConfig["price"],
        private readonly rng: RandomSource = mathRandom
    ) {}

    public tick(): void {
        const { maxStep, floor, initialMin, initialMax } = this.options;
        for (const symbol of this.state.symbols) {
            const base =
                this.state.currentPrice(symbol) ??
                uniform(this.rng, initialMin, initialMax);
            const next = Math.max(floor, base + uniform(this.rng, -maxStep, maxStep));
            this.ingestion.ingestPrice({ symbol, price: next });
        }
    }

    public nextDelayMs(): number {
        return this.options.intervalMs;
    }
}
