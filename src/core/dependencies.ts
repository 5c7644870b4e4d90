// src/core/dependencies.ts

import { EventBroker } from "../infrastructure/eventBroker.js";
import { Logger } from "../infrastructure/logger.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { MetricsCollector } from "../infrastructure/metricsCollector.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import { MarketState } from "../market/marketState.js";
import { AnomalyDetector } from "../services/anomalyDetector.js";
import { IngestionService } from "../services/ingestionService.js";
import { SanctionsRegistry } from "../services/sanctionsRegistry.js";
import { TradingService } from "../services/tradingService.js";
import { FeedOrchestrator } from "../feeds/feedOrchestrator.js";
import type { AlertEvent, MarketEvent } from "../types/marketEvents.js";
import { mathRandom, type RandomSource } from "../utils/random.js";
import { systemClock, type Clock } from "../utils/time.js";
import { Config, type AppConfig } from "./config.js";

/**
 * Application dependencies interface
 */
export interface Dependencies {
    config: AppConfig;
    clock: Clock;
    rng: RandomSource;

    // Infrastructure
    logger: ILogger;
    metricsCollector: IMetricsCollector;
    marketBroker: EventBroker<MarketEvent>;
    alertBroker: EventBroker<AlertEvent>;

    // State & services
    marketState: MarketState;
    anomalyDetector: AnomalyDetector;
    sanctions: SanctionsRegistry;
    ingestion: IngestionService;
    trading: TradingService;
    feeds: FeedOrchestrator;
}

export interface DependencyOverrides {
    clock?: Clock;
    rng?: RandomSource;
    logger?: ILogger;
    metricsCollector?: IMetricsCollector;
}

/**
 * Factory function to create dependencies
 */
export function createDependencies(
    config: AppConfig = Config.ALL,
    overrides: DependencyOverrides = {}
): Dependencies {
    const clock = overrides.clock ?? systemClock;
    const rng = overrides.rng ?? mathRandom;
    const logger =
        overrides.logger ??
        new Logger({
            level: config.logging.level,
            pretty: config.logging.pretty,
        });
    const metricsCollector = overrides.metricsCollector ?? new MetricsCollector();

    const marketBroker = new EventBroker<MarketEvent>(
        { channel: "market", capacity: config.broker.capacity },
        logger,
        metricsCollector
    );
    const alertBroker = new EventBroker<AlertEvent>(
        { channel: "alerts", capacity: config.broker.capacity },
        logger,
        metricsCollector
    );

    const marketState = new MarketState(
        { symbols: config.symbols, ...config.marketState },
        clock
    );
    const anomalyDetector = new AnomalyDetector(
        config.anomaly,
        logger,
        metricsCollector
    );
    const sanctions = new SanctionsRegistry();

    const ingestion = new IngestionService({
        marketState,
        anomalyDetector,
        sanctions,
        marketBroker,
        alertBroker,
        clock,
        logger,
        metrics: metricsCollector,
    });
    const trading = new TradingService(
        marketState,
        marketBroker,
        alertBroker,
        clock,
        logger,
        metricsCollector
    );
    const feeds = new FeedOrchestrator({
        feeds: config.feeds,
        marketState,
        anomalyDetector,
        ingestion,
        alertBroker,
        clock,
        logger,
        metrics: metricsCollector,
        rng,
    });

    return {
        config,
        clock,
        rng,
        logger,
        metricsCollector,
        marketBroker,
        alertBroker,
        marketState,
        anomalyDetector,
        sanctions,
        ingestion,
        trading,
        feeds,
    };
}
