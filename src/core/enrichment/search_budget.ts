import { Mutex } from 'async-mutex';
import type { SearchProvider, SerpResult } from '../../types';
import { Logger } from '../../utils/logger';
import { toError } from '../../utils/errors';

/**
 * Per-run cap on search-API calls. `tryConsume` is the only way to spend a unit,
 * and it is checked before a call is issued.
 */
export class SearchBudget {
    private used = 0;

    constructor(readonly cap: number) { }

    tryConsume(): boolean {
        if (this.used >= this.cap) return false;
        this.used++;
        return true;
    }

    get spent(): number {
        return this.used;
    }

    get remaining(): number {
        return Math.max(0, this.cap - this.used);
    }

    get exhausted(): boolean {
        return this.used >= this.cap;
    }
}

/**
 * Fixed pause between consecutive search calls. Calls are serialised so the
 * spacing holds when enrichment runs with concurrency above one.
 */
export class SearchThrottle {
    private readonly mutex = new Mutex();
    private lastCall = 0;

    constructor(private readonly intervalMs: number) { }

    async run<T>(call: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(async () => {
            const elapsed = Date.now() - this.lastCall;
            if (this.lastCall > 0 && elapsed < this.intervalMs) {
                await new Promise((r) => setTimeout(r, this.intervalMs - elapsed));
            }
            try {
                return await call();
            } finally {
                this.lastCall = Date.now();
            }
        });
    }
}

export type SearchOutcome =
    | { status: 'ok'; results: SerpResult[] }
    | { status: 'budget' }
    | { status: 'failed'; error: Error };

/**
 * Search provider behind the budget and the throttle.
 */
export class BudgetedSearch {
    constructor(
        private readonly provider: SearchProvider,
        private readonly budget: SearchBudget,
        private readonly throttle: SearchThrottle,
        private readonly locale: string
    ) { }

    get remaining(): number {
        return this.budget.remaining;
    }

    async search(q: string): Promise<SearchOutcome> {
        if (!this.budget.tryConsume()) {
            return { status: 'budget' };
        }
        try {
            const results = await this.throttle.run(() => this.provider.query(q, this.locale));
            return { status: 'ok', results };
        } catch (err) {
            const error = toError(err);
            Logger.warn(`[Search] ${this.provider.name} query failed`, { query: q, error });
            return { status: 'failed', error };
        }
    }
}
