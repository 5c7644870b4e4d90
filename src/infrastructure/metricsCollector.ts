// src/infrastructure/metricsCollector.ts

import type {
    IMetricsCollector,
    MetricLabels,
    MetricsSnapshot,
} from "./metricsCollectorInterface.js";

/**
 * In-process counters and gauges, keyed by name plus sorted labels
 * (`name{channel="alerts"}`).
 */
export class MetricsCollector implements IMetricsCollector {
    private readonly counters = new Map<string, number>();
    private readonly gauges = new Map<string, number>();
    private startedAt = Date.now();

    public incrementCounter(
        name: string,
        increment = 1,
        labels?: MetricLabels
    ): void {
        const key = MetricsCollector.key(name, labels);
        this.counters.set(key, (this.counters.get(key) ?? 0) + increment);
    }

    public getCounterValue(name: string, labels?: MetricLabels): number {
        return this.counters.get(MetricsCollector.key(name, labels)) ?? 0;
    }

    public setGauge(name: string, value: number, labels?: MetricLabels): void {
        this.gauges.set(MetricsCollector.key(name, labels), value);
    }

    public getGaugeValue(
        name: string,
        labels?: MetricLabels
    ): number | undefined {
        return this.gauges.get(MetricsCollector.key(name, labels));
    }

    public getMetrics(): MetricsSnapshot {
        return {
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
            uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
        };
    }

    public reset(): void {
        this.counters.clear();
        this.gauges.clear();
        this.startedAt = Date.now();
    }

    private static key(name: string, labels?: MetricLabels): string {
        if (!labels) return name;
        const parts = Object.keys(labels)
            .sort()
            .map((k) => `${k}="${labels[k]}"`);
        return parts.length === 0 ? name : `${name}{${parts.join(",")}}`;
    }
}
