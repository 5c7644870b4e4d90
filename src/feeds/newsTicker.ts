// src/feeds/newsTicker.ts
import type { FeedsConfig } from "../core/config.js";
import type { IngestionService } from "../services/ingestionService.js";
import { mathRandom, pick, uniform, type RandomSource } from "../utils/random.js";
import type { FeedTask } from "./feedSupervisor.js";

export class NewsTicker implements FeedTask {
    public readonly name = "news";

    constructor(
        private readonly ingestion: IngestionService,
        private readonly options: FeedsConfig["news"],
        private readonly rng: RandomSource = mathRandom
    ) {}

    public tick(): void {
        const { symbol, headline } = pick(this.rng, this.options.headlines);
        this.ingestion.ingestNews({ symbol, headline, source: "simulated" });
    }

    public nextDelayMs(): number {
        return uniform(this.rng, this.options.minIntervalMs, this.options.maxIntervalMs);
    }
}
