// src/services/anomalyDetector.ts
/**********************************************************************
 * AnomalyDetector - Payment Behaviour Monitor
 * Classifies each payment against a per-customer running baseline
 * (ratio test) and a rolling window of recent amounts (z-score test).
 *********************************************************************/

import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type { Baseline, Severity } from "../types/marketEvents.js";
import { RollingWindow } from "../utils/rollingWindow.js";

export interface AnomalyDetectorOptions {
    /** Baseline average assumed for an unseen customer (default: 5000) */
    defaultBaseline?: number;
    /** Sample count the default baseline stands for (default: 1) */
    defaultSampleCount?: number;
    /** Recent amounts kept per customer for z-scores (default: 100) */
    historySize?: number;
    /** Samples required before a z-score is computed (default: 5) */
    minZScoreSamples?: number;
    /** amount / baseline at or above which a payment is flagged (default: 10) */
    ratioThreshold?: number;
    /** Ratio grading a flagged payment as high (default: 15) */
    highRatio?: number;
    /** Ratio grading a flagged payment as critical (default: 20) */
    criticalRatio?: number;
    /** z-score at or above which a payment is flagged (default: 4) */
    zScoreThreshold?: number;
    /** z-score grading a flagged payment as high (default: 6) */
    highZScore?: number;
    /** z-score grading a flagged payment as critical (default: 8) */
    criticalZScore?: number;
}

export interface AnomalyEvaluation {
    isAnomaly: boolean;
    /** 0 when the baseline average is not positive */
    ratio: number;
    zscore: number | null;
    severity: Severity;
}

export interface CustomerMetrics {
    baseline: Baseline;
    window: {
        count: number;
        min: number | undefined;
        max: number | undefined;
        mean: number;
    };
}

/**
 * Per-customer payment anomaly detector.
 *
 * @remarks
 * Only non-anomalous amounts are folded into the baseline, so a run of
 * spikes cannot drag the reference point upwards. The rolling history takes
 * every amount, flagged or not.
 */
export class AnomalyDetector {
    private readonly baselines = new Map<string, Baseline>();
    private readonly histories = new Map<string, RollingWindow>();

    private readonly defaultBaseline: number;
    private readonly defaultSampleCount: number;
    private readonly historySize: number;
    private readonly minZScoreSamples: number;
    private readonly ratioThreshold: number;
    private readonly highRatio: number;
    private readonly criticalRatio: number;
    private readonly zScoreThreshold: number;
    private readonly highZScore: number;
    private readonly criticalZScore: number;

    constructor(
        options: AnomalyDetectorOptions = {},
        private readonly logger: ILogger,
        private readonly metrics?: IMetricsCollector
    ) {
        this.defaultBaseline = options.defaultBaseline ?? 5000;
        this.defaultSampleCount = options.defaultSampleCount ?? 1;
        this.historySize = options.historySize ?? 100;
        this.minZScoreSamples = options.minZScoreSamples ?? 5;
        this.ratioThreshold = options.ratioThreshold ?? 10;
        this.highRatio = options.highRatio ?? 15;
        this.criticalRatio = options.criticalRatio ?? 20;
        this.zScoreThreshold = options.zScoreThreshold ?? 4;
        this.highZScore = options.highZScore ?? 6;
        this.criticalZScore = options.criticalZScore ?? 8;
    }

    /**
     * Classify `amount` for `customerId` and learn from it when it is normal.
     * The whole lookup/score/update sequence runs without yielding.
     */
    public evaluate(customerId: string, amount: number): AnomalyEvaluation {
        const baseline = this.baselineFor(customerId);
        const history = this.historyFor(customerId);
        history.push(amount);

        const ratioDefined = baseline.average > 0;
        const ratio = ratioDefined ? amount / baseline.average : 0;
        const ratioFlag = ratioDefined && ratio >= this.ratioThreshold;

        const zscore = this.zScore(history, amount);
        const zFlag = zscore !== null && zscore >= this.zScoreThreshold;

        const isAnomaly = ratioFlag || zFlag;
        const severity = isAnomaly ? this.grade(ratio, zscore) : "normal";

        if (isAnomaly) {
            this.metrics?.incrementCounter("anomalies_total", 1, { severity });
            this.logger.info("Payment anomaly detected", {
                component: "AnomalyDetector",
                customerId,
                amount,
                ratio,
                zscore,
                severity,
                baselineAverage: baseline.average,
            });
        } else {
            baseline.average =
                (baseline.average * baseline.sampleCount + amount) /
                (baseline.sampleCount + 1);
            baseline.sampleCount += 1;
        }

        return { isAnomaly, ratio, zscore, severity };
    }

    /**
     * Install a known baseline, replacing any learned one.
     */
    public seedBaseline(
        customerId: string,
        average: number,
        sampleCount: number
    ): void {
        if (!(average > 0) || !Number.isFinite(average)) {
            throw new RangeError(`Baseline average must be positive, got ${average}`);
        }
        if (!Number.isInteger(sampleCount) || sampleCount < 1) {
            throw new RangeError(
                `Baseline sample count must be a positive integer, got ${sampleCount}`
            );
        }
        this.baselines.set(customerId, { average, sampleCount });
    }

    public hasBaseline(customerId: string): boolean {
        return this.baselines.has(customerId);
    }

    public getBaseline(customerId: string): Baseline | undefined {
        const baseline = this.baselines.get(customerId);
        return baseline ? { ...baseline } : undefined;
    }

    /**
     * Baseline plus min/max/mean over the current history window.
     */
    public metricsFor(customerId: string): CustomerMetrics | undefined {
        const baseline = this.baselines.get(customerId);
        if (!baseline) return undefined;
        const history = this.histories.get(customerId);
        return {
            baseline: { ...baseline },
            window: {
                count: history?.count() ?? 0,
                min: history?.min(),
                max: history?.max(),
                mean: history?.mean() ?? 0,
            },
        };
    }

    public customers(): string[] {
        return [...this.baselines.keys()];
    }

    private zScore(history: RollingWindow, amount: number): number | null {
        if (history.count() < this.minZScoreSamples) return null;
        const stdDev = history.sampleStdDev();
        if (stdDev === 0) return null;
        return (amount - history.mean()) / stdDev;
    }

    private grade(ratio: number, zscore: number | null): Severity {
        if (
            ratio >= this.criticalRatio ||
            (zscore !== null && zscore >= this.criticalZScore)
        ) {
            return "critical";
        }
        if (
            ratio >= this.highRatio ||
            (zscore !== null && zscore >= this.highZScore)
        ) {
            return "high";
        }
        return "medium";
    }

    private baselineFor(customerId: string): Baseline {
        let baseline = this.baselines.get(customerId);
        if (!baseline) {
            baseline = {
                average: this.defaultBaseline,
                sampleCount: this.defaultSampleCount,
            };
            this.baselines.set(customerId, baseline);
        }
        return baseline;
    }

    private historyFor(customerId: string): RollingWindow {
        let history = this.histories.get(customerId);
        if (!history) {
            history = new RollingWindow(this.historySize);
            this.histories.set(customerId, history);
        }
        return history;
    }
}
