// src/infrastructure/eventBroker.ts

import { CircularBuffer } from "../utils/circularBuffer.js";
import type { ILogger } from "./loggerInterface.js";
import type { IMetricsCollector } from "./metricsCollectorInterface.js";

export interface EventBrokerOptions {
    /** Channel name used in logs and metric labels */
    channel: string;
    /** Buffered events kept before the oldest is evicted (default: 1000) */
    capacity?: number;
}

interface PendingDrain<T> {
    resolve: (event: T) => void;
    detach: () => void;
}

/**
 * Bounded event channel with drop-oldest backpressure.
 *
 * `publish` never blocks and never fails: when the buffer is full the oldest
 * undelivered event is discarded. `drain` waits for the next event; pending
 * drains are served in the order they were issued, and an event published
 * while a drain is waiting goes straight to that drain.
 */
export class EventBroker<T> {
    public readonly channel: string;
    private readonly buffer: CircularBuffer<T>;
    private readonly waiters: PendingDrain<T>[] = [];
    private dropped = 0;

    constructor(
        options: EventBrokerOptions,
        private readonly logger?: ILogger,
        private readonly metrics?: IMetricsCollector
    ) {
        this.channel = options.channel;
        this.buffer = new CircularBuffer<T>(options.capacity ?? 1000);
    }

    public publish(event: T): void {
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.detach();
            waiter.resolve(event);
            this.metrics?.incrementCounter("broker_published_total", 1, {
                channel: this.channel,
            });
            return;
        }

        const evicted = this.buffer.push(event);
        this.metrics?.incrementCounter("broker_published_total", 1, {
            channel: this.channel,
        });
        if (evicted !== undefined) {
            this.dropped++;
            this.metrics?.incrementCounter("broker_dropped_total", 1, {
                channel: this.channel,
            });
            this.logger?.debug("Buffer full, dropped oldest event", {
                component: "EventBroker",
                channel: this.channel,
                capacity: this.buffer.capacity,
                droppedTotal: this.dropped,
            });
        }
        this.metrics?.setGauge("broker_buffered", this.buffer.length, {
            channel: this.channel,
        });
    }

    /**
     * Resolve with the next event, waiting if none is buffered. Aborting
     * `signal` rejects the pending drain with the signal's reason.
     */
    public drain(signal?: AbortSignal): Promise<T> {
        const next = this.tryDrain();
        if (next !== undefined) return Promise.resolve(next);

        if (signal?.aborted) {
            return Promise.reject(abortReason(signal));
        }

        return new Promise<T>((resolve, reject) => {
            const onAbort = (): void => {
                const index = this.waiters.indexOf(waiter);
                if (index !== -1) this.waiters.splice(index, 1);
                reject(abortReason(signal));
            };
            const waiter: PendingDrain<T> = {
                resolve,
                detach: () => signal?.removeEventListener("abort", onAbort),
            };
            signal?.addEventListener("abort", onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    /**
     * Next buffered event without waiting.
     */
    public tryDrain(): T | undefined {
        const event = this.buffer.shift();
        if (event !== undefined) {
            this.metrics?.setGauge("broker_buffered", this.buffer.length, {
                channel: this.channel,
            });
        }
        return event;
    }

    public get size(): number {
        return this.buffer.length;
    }

    public get capacity(): number {
        return this.buffer.capacity;
    }

    public get droppedCount(): number {
        return this.dropped;
    }

    public get pendingDrains(): number {
        return this.waiters.length;
    }
}

function abortReason(signal: AbortSignal | undefined): unknown {
    if (signal?.reason !== undefined) return signal.reason;
    const error = new Error("Drain aborted");
    error.name = "AbortError";
    return error;
}
