// src/feeds/sanctionsTicker.ts
import type { FeedsConfig } from "../core/config.js";
import type { IngestionService } from "../services/ingestionService.js";
import type { FeedTask } from "./feedSupervisor.js";

/**
 * Lists the configured names one per tick, cycling back to the first.
 */
export class SanctionsTicker implements FeedTask {
    public readonly name = "sanctions";
    private index = 0;

    constructor(
        private readonly ingestion: IngestionService,
        private readonly options: FeedsConfig["sanctions"]
    ) {}

    public tick(): void {
        const names = this.options.names;
        const name = names[this.index % names.length];
        this.index++;
        this.ingestion.addSanction(name);
    }

    public nextDelayMs(): number {
        return this.options.intervalMs;
    }
}
