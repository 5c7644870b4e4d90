// src/websocket/streamForwarder.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { WireMessage } from "./wireFormat.js";

export interface StreamForwarderOptions<T> {
    name: string;
    /** Resolves with the next event; rejects only when `signal` aborts */
    source: (signal: AbortSignal) => Promise<T>;
    encode: (event: T) => WireMessage;
    sink: (message: WireMessage) => void;
}

/**
 * Pumps one broker into one WebSocket path until stopped.
 */
export class StreamForwarder<T> {
    private controller: AbortController | undefined;
    private loop: Promise<void> | undefined;
    private forwarded = 0;

    constructor(
        private readonly options: StreamForwarderOptions<T>,
        private readonly logger: ILogger
    ) {}

    public start(): void {
        if (this.controller) return;
        const controller = new AbortController();
        this.controller = controller;
        this.loop = this.run(controller.signal).catch((error: unknown) => {
            this.logger.error(`[StreamForwarder] ${this.options.name} stopped`, {
                error: error instanceof Error ? error.message : String(error),
            });
        });
    }

    public async stop(): Promise<void> {
        this.controller?.abort();
        await this.loop;
        this.controller = undefined;
        this.loop = undefined;
    }

    public get forwardedCount(): number {
        return this.forwarded;
    }

    private async run(signal: AbortSignal): Promise<void> {
        const { source, encode, sink, name } = this.options;
        while (!signal.aborted) {
            let event: T;
            try {
                event = await source(signal);
            } catch (error) {
                if (signal.aborted) return;
                throw error;
            }
            try {
                sink(encode(event));
                this.forwarded++;
            } catch (error) {
                this.logger.error(`[StreamForwarder] ${name} delivery failed`, {
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }
    }
}
