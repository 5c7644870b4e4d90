// src/services/sentiment.ts
import SentimentAnalyzer from "sentiment";
import type { Sentiment } from "../types/marketEvents.js";

/**
 * Headline vocabulary layered over the AFINN word list.
 */
const FINANCE_LEXICON: Record<string, number> = {
    beat: 2,
    beats: 2,
    surge: 2,
    surges: 2,
    record: 2,
    approval: 2,
    approves: 2,
    subsidy: 2,
    upgrade: 2,
    upgrades: 2,
    launch: 2,
    launches: 2,
    breakthrough: 2,
    delay: -2,
    delays: -2,
    delayed: -2,
    halt: -2,
    halts: -2,
    probe: -2,
    lawsuit: -2,
    cut: -2,
    cuts: -2,
    miss: -2,
    misses: -2,
    shortage: -2,
    breach: -2,
    recall: -2,
    recalls: -2,
    downgrade: -2,
    downgrades: -2,
};

const IMPACT_PCT: Record<Sentiment, number> = {
    positive: 2.0,
    neutral: 0.0,
    negative: -2.0,
};

const analyzer = new SentimentAnalyzer();

export function classifySentiment(headline: string): Sentiment {
    const { score } = analyzer.analyze(headline, { extras: FINANCE_LEXICON });
    if (score > 0) return "positive";
    if (score < 0) return "negative";
    return "neutral";
}

/**
 * Naive percent impact on a held position.
 */
export function estimateNewsImpact(sentiment: Sentiment): number {
    return IMPACT_PCT[sentiment];
}
