// src/feeds/feedOrchestrator.ts
import type { FeedsConfig } from "../core/config.js";
import type { EventBroker } from "../infrastructure/eventBroker.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type { MarketState } from "../market/marketState.js";
import type { AnomalyDetector } from "../services/anomalyDetector.js";
import type { IngestionService } from "../services/ingestionService.js";
import type { AlertEvent } from "../types/marketEvents.js";
import { mathRandom, type RandomSource } from "../utils/random.js";
import type { Clock } from "../utils/time.js";
import { FeedSupervisor, type FeedStatus } from "./feedSupervisor.js";
import { NewsTicker } from "./newsTicker.js";
import { PaymentsTicker } from "./paymentsTicker.js";
import { PortfolioWatcher } from "./portfolioWatcher.js";
import { PriceTicker } from "./priceTicker.js";
import { SanctionsTicker } from "./sanctionsTicker.js";

export interface FeedOrchestratorDeps {
    feeds: FeedsConfig;
    marketState: MarketState;
    anomalyDetector: AnomalyDetector;
    ingestion: IngestionService;
    alertBroker: EventBroker<AlertEvent>;
    clock: Clock;
    logger: ILogger;
    metrics?: IMetricsCollector;
    rng?: RandomSource;
}

/**
 * The five simulated producers (price, news, sanctions, payments, portfolio
 * watcher) under one supervisor.
 */
export class FeedOrchestrator {
    private readonly supervisor: FeedSupervisor;

    constructor(deps: FeedOrchestratorDeps) {
        const rng = deps.rng ?? mathRandom;
        const { feeds } = deps;
        this.supervisor = new FeedSupervisor(deps.logger, feeds.backoff, deps.metrics);

        this.supervisor.register(
            new PriceTicker(deps.marketState, deps.ingestion, feeds.price, rng)
        );
        this.supervisor.register(new NewsTicker(deps.ingestion, feeds.news, rng));
        this.supervisor.register(new SanctionsTicker(deps.ingestion, feeds.sanctions));
        this.supervisor.register(
            new PaymentsTicker(deps.ingestion, deps.anomalyDetector, feeds.payments, rng)
        );
        this.supervisor.register(
            new PortfolioWatcher(
                deps.marketState,
                deps.alertBroker,
                feeds.portfolio,
                deps.clock,
                rng
            )
        );
    }

    public start(): void {
        this.supervisor.start();
    }

    public stop(): Promise<void> {
        return this.supervisor.stop();
    }

    public get running(): boolean {
        return this.supervisor.running;
    }

    public status(): FeedStatus[] {
        return this.supervisor.status();
    }
}
