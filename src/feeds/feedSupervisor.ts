// src/feeds/feedSupervisor.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import { sleep } from "../utils/time.js";

/**
 * One periodic producer. `tick` does a unit of work; the supervisor sleeps
 * `nextDelayMs()` after a successful tick and an exponential backoff after a
 * failed one.
 */
export interface FeedTask {
    readonly name: string;
    tick(signal: AbortSignal): void | Promise<void>;
    nextDelayMs(): number;
}

export interface BackoffOptions {
    baseDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
}

export interface FeedStatus {
    name: string;
    running: boolean;
    ticks: number;
    failures: number;
    consecutiveFailures: number;
    lastError?: string;
}

const DEFAULT_BACKOFF: BackoffOptions = {
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    multiplier: 2,
};

/**
 * Runs every registered task in its own loop under one shared cancellation
 * signal. A task that throws is logged and retried; it never takes the other
 * loops down with it.
 */
export class FeedSupervisor {
    private readonly tasks: FeedTask[] = [];
    private readonly statuses = new Map<string, FeedStatus>();
    private readonly backoff: BackoffOptions;
    private controller: AbortController | undefined;
    private loops: Promise<void>[] = [];

    constructor(
        private readonly logger: ILogger,
        backoff: Partial<BackoffOptions> = {},
        private readonly metrics?: IMetricsCollector
    ) {
        this.backoff = { ...DEFAULT_BACKOFF, ...backoff };
    }

    public register(task: FeedTask): void {
        if (this.controller) {
            throw new Error(`Cannot register ${task.name} while running`);
        }
        if (this.statuses.has(task.name)) {
            throw new Error(`Feed ${task.name} is already registered`);
        }
        this.tasks.push(task);
        this.statuses.set(task.name, {
            name: task.name,
            running: false,
            ticks: 0,
            failures: 0,
            consecutiveFailures: 0,
        });
    }

    public start(): void {
        if (this.controller) return;
        const controller = new AbortController();
        this.controller = controller;
        this.loops = this.tasks.map((task) =>
            this.runLoop(task, controller.signal)
        );
        this.logger.info("Feeds started", {
            component: "FeedSupervisor",
            feeds: this.tasks.map((t) => t.name),
        });
    }

    /**
     * Cancel every loop and wait until all of them have returned.
     */
    public async stop(): Promise<void> {
        const controller = this.controller;
        if (!controller) return;
        controller.abort();
        await Promise.all(this.loops);
        this.loops = [];
        this.controller = undefined;
        this.logger.info("Feeds stopped", { component: "FeedSupervisor" });
    }

    public get running(): boolean {
        return this.controller !== undefined;
    }

    public status(): FeedStatus[] {
        return [...this.statuses.values()].map((s) => ({ ...s }));
    }

    /**
     * Delay after the n-th consecutive failure (n >= 1).
     */
    public backoffDelay(consecutiveFailures: number): number {
        const { baseDelayMs, maxDelayMs, multiplier } = this.backoff;
        const exponent = Math.max(0, consecutiveFailures - 1);
        return Math.min(maxDelayMs, baseDelayMs * Math.pow(multiplier, exponent));
    }

    private async runLoop(task: FeedTask, signal: AbortSignal): Promise<void> {
        const status = this.statuses.get(task.name);
        if (!status) return;
        status.running = true;

        try {
            while (!signal.aborted) {
                let delayMs: number;
                try {
                    await task.tick(signal);
                    status.ticks++;
                    status.consecutiveFailures = 0;
                    delayMs = task.nextDelayMs();
                } catch (error) {
                    if (signal.aborted) break;
                    status.failures++;
                    status.consecutiveFailures++;
                    status.lastError =
                        error instanceof Error ? error.message : String(error);
                    delayMs = this.backoffDelay(status.consecutiveFailures);

                    this.metrics?.incrementCounter("feed_failures_total", 1, {
                        feed: task.name,
                    });
                    this.logger.error(`[FeedSupervisor] ${task.name} tick failed`, {
                        component: "FeedSupervisor",
                        feed: task.name,
                        error: status.lastError,
                        consecutiveFailures: status.consecutiveFailures,
                        retryInMs: delayMs,
                    });
                }
                await sleep(delayMs, signal);
            }
        } finally {
            status.running = false;
        }
    }
}
