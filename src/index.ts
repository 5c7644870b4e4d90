// src/index.ts
import { MarketSentinelApp } from "./app.js";
import { createDependencies } from "./core/dependencies.js";
import { ConfigurationError } from "./core/errors.js";

/**
 * Main entry point for the market sentinel service
 */
export async function main(): Promise<void> {
    try {
        const dependencies = createDependencies();
        const app = new MarketSentinelApp(dependencies);
        await app.start();

        const shutdown = async (): Promise<void> => {
            try {
                await app.stop();
                process.exit(0);
            } catch (error) {
                // Logger may already be flushed at this point
                console.error("❌ Error during shutdown:", error);
                process.exit(1);
            }
        };

        process.on("SIGINT", () => {
            void shutdown();
        });
        process.on("SIGTERM", () => {
            void shutdown();
        });
    } catch (error: unknown) {
        const err = error instanceof Error ? error : new Error(String(error));
        console.error("❌ CRITICAL STARTUP FAILURE:", err.message);
        if (err instanceof ConfigurationError) {
            for (const issue of err.issues) console.error(`   - ${issue}`);
        }
        process.exit(1);
    }
}

void main();
