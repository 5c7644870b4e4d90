// src/core/config.ts
import dotenv from "dotenv";
dotenv.config();
import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { formatZodIssues } from "./validation.js";

// ============================================================================
// FILE SCHEMAS - config.json is the single source of defaults
// ============================================================================

const JitteredIntervalSchema = z
    .object({
        minIntervalMs: z.number().int().positive(),
        maxIntervalMs: z.number().int().positive(),
    })
    .refine((v) => v.minIntervalMs <= v.maxIntervalMs, {
        message: "minIntervalMs must not exceed maxIntervalMs",
    });

const AnomalySchema = z
    .object({
        defaultBaseline: z.number().positive(),
        defaultSampleCount: z.number().int().min(1),
        historySize: z.number().int().min(2).max(10000),
        minZScoreSamples: z.number().int().min(2),
        ratioThreshold: z.number().positive(),
        highRatio: z.number().positive(),
        criticalRatio: z.number().positive(),
        zScoreThreshold: z.number().positive(),
        highZScore: z.number().positive(),
        criticalZScore: z.number().positive(),
    })
    .refine(
        (v) => v.ratioThreshold <= v.highRatio && v.highRatio <= v.criticalRatio,
        { message: "ratio tiers must satisfy ratioThreshold <= highRatio <= criticalRatio" }
    )
    .refine(
        (v) =>
            v.zScoreThreshold <= v.highZScore &&
            v.highZScore <= v.criticalZScore,
        { message: "z-score tiers must satisfy zScoreThreshold <= highZScore <= criticalZScore" }
    );

const MarketStateSchema = z.object({
    priceHistoryCap: z.number().int().positive(),
    newsCap: z.number().int().positive(),
    paymentsCap: z.number().int().positive(),
    initialCashBalance: z.number().nonnegative(),
});

const HeadlineSchema = z.object({
    symbol: z.string().min(1).transform((s) => s.toUpperCase()),
    headline: z.string().min(1),
});

const FeedsSchema = z.object({
    enabled: z.boolean(),
    backoff: z.object({
        baseDelayMs: z.number().int().positive(),
        maxDelayMs: z.number().int().positive(),
        multiplier: z.number().min(1),
    }),
    price: z.object({
        intervalMs: z.number().int().positive(),
        maxStep: z.number().positive(),
        floor: z.number().positive(),
        initialMin: z.number().positive(),
        initialMax: z.number().positive(),
    }),
    news: JitteredIntervalSchema.and(
        z.object({ headlines: z.array(HeadlineSchema).min(1) })
    ),
    sanctions: z.object({
        intervalMs: z.number().int().positive(),
        names: z.array(z.string().min(1)).min(1),
    }),
    payments: JitteredIntervalSchema.and(
        z.object({
            volatility: z.number().min(0).max(1),
            customers: z
                .array(
                    z.object({
                        id: z.string().min(1),
                        baseline: z.number().positive(),
                        sampleCount: z.number().int().min(1),
                    })
                )
                .min(1),
            spikes: z.array(
                z.object({
                    customerId: z.string().min(1),
                    everyTicks: z.number().int().positive(),
                    multiplier: z.number().positive(),
                })
            ),
            recipients: z.array(z.string().min(1)).min(1),
        })
    ),
    portfolio: JitteredIntervalSchema.and(
        z.object({
            windowSeconds: z.number().positive(),
            absoluteMoveThreshold: z.number().positive(),
            percentMoveThreshold: z.number().positive(),
        })
    ),
});

const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace"]);

export const ConfigSchema = z.object({
    nodeEnv: z.string(),
    httpPort: z.number().int().min(0).max(65535),
    symbols: z
        .array(z.string().min(1).transform((s) => s.trim().toUpperCase()))
        .min(1),
    webhookToken: z.string(),
    logging: z.object({
        level: LogLevelSchema,
        pretty: z.boolean(),
    }),
    broker: z.object({
        capacity: z.number().int().positive(),
    }),
    anomaly: AnomalySchema,
    marketState: MarketStateSchema,
    feeds: FeedsSchema,
    demoHeadlines: z.array(HeadlineSchema).min(1),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type FeedsConfig = z.infer<typeof FeedsSchema>;

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

const blankAsUndefined = (value: unknown): unknown =>
    typeof value === "string" && value.trim() === "" ? undefined : value;

const BooleanEnv = z
    .preprocess(
        (v) => (typeof v === "string" ? v.trim().toLowerCase() : v),
        z.enum(["1", "0", "true", "false"])
    )
    .transform((v) => v === "1" || v === "true");

const EnvSchema = z.object({
    NODE_ENV: z.preprocess(blankAsUndefined, z.string().optional()),
    HTTP_PORT: z.preprocess(
        blankAsUndefined,
        z.coerce.number().int().min(0).max(65535).optional()
    ),
    SYMBOLS: z.preprocess(blankAsUndefined, z.string().optional()),
    REALTIME_WEBHOOK_TOKEN: z.string().optional(),
    LOG_LEVEL: z.preprocess(
        (v) => (typeof v === "string" ? blankAsUndefined(v.toLowerCase()) : v),
        LogLevelSchema.optional()
    ),
    LOG_PRETTY: z.preprocess(blankAsUndefined, BooleanEnv.optional()),
    FEEDS_ENABLED: z.preprocess(blankAsUndefined, BooleanEnv.optional()),
});

function parseSymbols(list: string): string[] {
    return list
        .split(",")
        .map((s) => s.trim().toUpperCase())
        .filter(Boolean);
}

/**
 * Validate a raw config document and apply environment overrides.
 * Throws ConfigurationError listing every problem found.
 */
export function parseConfig(
    raw: unknown,
    env: Record<string, string | undefined> = process.env
): AppConfig {
    const file = ConfigSchema.safeParse(raw);
    if (!file.success) {
        throw new ConfigurationError(
            "config.json validation failed",
            formatZodIssues(file.error)
        );
    }

    const overrides = EnvSchema.safeParse(env);
    if (!overrides.success) {
        throw new ConfigurationError(
            "Environment validation failed",
            formatZodIssues(overrides.error)
        );
    }

    const cfg = file.data;
    const e = overrides.data;

    const symbols =
        e.SYMBOLS !== undefined ? parseSymbols(e.SYMBOLS) : cfg.symbols;
    if (symbols.length === 0) {
        throw new ConfigurationError("Environment validation failed", [
            "SYMBOLS: at least one symbol is required",
        ]);
    }

    return {
        ...cfg,
        nodeEnv: e.NODE_ENV ?? cfg.nodeEnv,
        httpPort: e.HTTP_PORT ?? cfg.httpPort,
        symbols,
        webhookToken: e.REALTIME_WEBHOOK_TOKEN ?? cfg.webhookToken,
        logging: {
            level: e.LOG_LEVEL ?? cfg.logging.level,
            pretty: e.LOG_PRETTY ?? cfg.logging.pretty,
        },
        feeds: {
            ...cfg.feeds,
            enabled: e.FEEDS_ENABLED ?? cfg.feeds.enabled,
        },
    };
}

/**
 * Read config.json (or CONFIG_PATH) from disk and validate it.
 */
export function loadConfig(
    path: string = process.env["CONFIG_PATH"] ??
        resolve(process.cwd(), "config.json")
): AppConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
        throw new ConfigurationError(`Cannot read ${path}`, [
            error instanceof Error ? error.message : String(error),
        ]);
    }
    return parseConfig(raw, process.env);
}

let cfg: AppConfig | undefined;

export class Config {
    private static get current(): AppConfig {
        if (!cfg) cfg = loadConfig();
        return cfg;
    }

    static get ALL(): AppConfig {
        return Config.current;
    }
}
