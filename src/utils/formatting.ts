// src/utils/formatting.ts

export function round(value: number, digits: number): number {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
}

/**
 * Fixed-point string with an explicit sign, e.g. "+2.0" or "-1.25".
 */
export function formatSigned(value: number, digits: number): string {
    const fixed = Math.abs(value).toFixed(digits);
    return `${value < 0 && Number(fixed) !== 0 ? "-" : "+"}${fixed}`;
}

/**
 * Whole-unit amount with thousands separators, e.g. "320,000".
 */
export function formatAmount(value: number): string {
    return value.toLocaleString("en-US", {
        maximumFractionDigits: 0,
        minimumFractionDigits: 0,
    });
}
