// src/infrastructure/metricsCollectorInterface.ts

export type MetricLabels = Record<string, string>;

export interface MetricsSnapshot {
    counters: Record<string, number>;
    gauges: Record<string, number>;
    uptimeSeconds: number;
}

/**
 * Interface for metrics collection
 * Provides abstraction for dependency injection and testing
 */
export interface IMetricsCollector {
    incrementCounter(
        name: string,
        increment?: number,
        labels?: MetricLabels
    ): void;
    getCounterValue(name: string, labels?: MetricLabels): number;

    setGauge(name: string, value: number, labels?: MetricLabels): void;
    getGaugeValue(name: string, labels?: MetricLabels): number | undefined;

    getMetrics(): MetricsSnapshot;
    reset(): void;
}
