import { describe, it, expect } from "vitest";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";

describe("infrastructure/metricsCollector", () => {
    it("increments counters per label set", () => {
        const m = new MetricsCollector();
        m.incrementCounter("anomalies_total", 1, { severity: "high" });
        m.incrementCounter("anomalies_total", 2, { severity: "high" });
        m.incrementCounter("anomalies_total", 1, { severity: "critical" });
        m.incrementCounter("trades_rejected_total");

        expect(m.getCounterValue("anomalies_total", { severity: "high" })).toBe(3);
        expect(m.getCounterValue("anomalies_total", { severity: "critical" })).toBe(1);
        expect(m.getCounterValue("anomalies_total")).toBe(0);
        expect(m.getCounterValue("trades_rejected_total")).toBe(1);
    });

    it("keys labels independently of their order", () => {
        const m = new MetricsCollector();
        m.incrementCounter("x", 1, { b: "2", a: "1" });
        m.incrementCounter("x", 1, { a: "1", b: "2" });
        expect(m.getMetrics().counters).toEqual({ 'x{a="1",b="2"}': 2 });
    });

    it("sets gauges and resets everything", () => {
        const m = new MetricsCollector();
        m.setGauge("broker_buffered", 4, { channel: "market" });
        m.setGauge("broker_buffered", 2, { channel: "market" });
        expect(m.getGaugeValue("broker_buffered", { channel: "market" })).toBe(2);
        expect(m.getGaugeValue("broker_buffered", { channel: "alerts" })).toBeUndefined();

        m.reset();
        const snapshot = m.getMetrics();
        expect(snapshot.counters).toEqual({});
        expect(snapshot.gauges).toEqual({});
        expect(snapshot.uptimeSeconds).toBe(0);
    });
});
