// src/feeds/paymentsTicker.ts
import type { FeedsConfig } from "../core/config.js";
import type { AnomalyDetector } from "../services/anomalyDetector.js";
import type { IngestionService } from "../services/ingestionService.js";
import { round } from "../utils/formatting.js";
import {
    gaussian,
    mathRandom,
    pick,
    uniform,
    type RandomSource,
} from "../utils/random.js";
import type { FeedTask } from "./feedSupervisor.js";

/**
 * Simulated customer payments drawn around each customer's current baseline,
 * with periodic spikes (e.g. 40x every 12th tick) to exercise fraud alerts.
 */
export class PaymentsTicker implements FeedTask {
    public readonly name = "payments";
    private tickCount = 0;

    constructor(
        private readonly ingestion: IngestionService,
        private readonly detector: AnomalyDetector,
        private readonly options: FeedsConfig["payments"],
        private readonly rng: RandomSource = mathRandom
    ) {}

    public tick(): void {
        this.tickCount++;
        if (this.tickCount === 1) this.seedBaselines();

        for (const customer of this.options.customers) {
            const base =
                this.detector.getBaseline(customer.id)?.average ??
                customer.baseline;
            let amount = Math.abs(
                gaussian(this.rng, base, base * this.options.volatility)
            );
            for (const spike of this.options.spikes) {
                if (
                    spike.customerId === customer.id &&
                    this.tickCount % spike.everyTicks === 0
                ) {
                    amount = base * spike.multiplier;
                }
            }
            this.ingestion.ingestPayment({
                customerId: customer.id,
                amount: round(amount, 2),
                recipient: pick(this.rng, this.options.recipients),
            });
        }
    }

    /**
     * Customers the detector has not seen yet start from their configured
     * baseline instead of the detector default.
     */
    private seedBaselines(): void {
        for (const customer of this.options.customers) {
            if (!this.detector.hasBaseline(customer.id)) {
                this.detector.seedBaseline(
                    customer.id,
                    customer.baseline,
                    customer.sampleCount
                );
            }
        }
    }

    public nextDelayMs(): number {
        return uniform(this.rng, this.options.minIntervalMs, this.options.maxIntervalMs);
    }
}
