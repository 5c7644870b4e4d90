// src/services/sanctionsRegistry.ts

export interface SanctionsEntry {
    name: string;
    addedAt: number;
}

/**
 * Flagged names and the time (Unix seconds) each was listed.
 * Re-adding a name moves its timestamp; there is no removal.
 */
export class SanctionsRegistry {
    private readonly entries = new Map<string, number>();

    public add(name: string, timestamp: number): void {
        this.entries.set(name, timestamp);
    }

    public lookup(name: string): number | undefined {
        return this.entries.get(name);
    }

    public has(name: string): boolean {
        return this.entries.has(name);
    }

    /**
     * Whole seconds between listing and `now`, undefined for unlisted names.
     */
    public secondsSince(name: string, now: number): number | undefined {
        const addedAt = this.entries.get(name);
        if (addedAt === undefined) return undefined;
        return Math.trunc(now - addedAt);
    }

    public list(): SanctionsEntry[] {
        return [...this.entries].map(([name, addedAt]) => ({ name, addedAt }));
    }

    public get size(): number {
        return this.entries.size;
    }
}
