// src/core/validation.ts
import type { z } from "zod";
import { ValidationError } from "./errors.js";

export function formatZodIssues(error: z.ZodError): string[] {
    return error.errors.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
}

/**
 * Parse `value` against `schema`, throwing ValidationError with one line per
 * issue on failure.
 */
export function parseInput<S extends z.ZodTypeAny>(
    schema: S,
    value: unknown,
    what: string
): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValidationError(
            `Invalid ${what}`,
            formatZodIssues(result.error)
        );
    }
    return result.data;
}
