import Bottleneck from "bottleneck";
import pRetry from "p-retry";
import type { Logger } from "pino";

export interface ProviderRateLimits {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
    /** Delay before the first retry; later retries back off from it. */
    retryDelayMs?: number;
}

const REFILL_INTERVAL_MS = 60_000;

function perMinuteBudget(value: number | undefined): number | undefined {
    if (value === undefined || !Number.isFinite(value) || value < 1) {
        return undefined;
    }
    return Math.floor(value);
}

function createLimiter(maxConcurrent: number | null, budget: number | undefined): Bottleneck {
    if (budget === undefined) {
        return new Bottleneck({ maxConcurrent });
    }

    return new Bottleneck({
        maxConcurrent,
        reservoir: budget,
        reservoirRefreshAmount: budget,
        reservoirRefreshInterval: REFILL_INTERVAL_MS,
    });
}

/**
 * Admits provider calls under a per-minute request budget and an optional per-minute token budget, then
 * runs them with retries. The token budget only gates admission; parallelism is bounded by `concurrency`.
 */
export class ProviderScheduler {
    readonly concurrency: number;
    readonly retries: number;
    readonly retryDelayMs: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter: Bottleneck | undefined;
    private readonly tokenBudget: number | undefined;

    constructor(
        limits: ProviderRateLimits,
        private readonly label: string,
        private readonly logger?: Logger
    ) {
        this.concurrency = Math.max(1, limits.concurrency ?? 5);
        this.retries = Math.max(0, limits.retries ?? 5);
        this.retryDelayMs = Math.max(0, limits.retryDelayMs ?? 1000);
        this.requestLimiter = createLimiter(this.concurrency, perMinuteBudget(limits.maxRequestsPerMinute));

        this.tokenBudget = perMinuteBudget(limits.maxTokensPerMinute);
        this.tokenLimiter = this.tokenBudget === undefined ? undefined : createLimiter(null, this.tokenBudget);
    }

    async run<T>(estimatedTokens: number, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        await this.admitTokens(estimatedTokens);

        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                minTimeout: this.retryDelayMs,
                signal,
                onFailedAttempt: (error) => {
                    this.logger?.warn(
                        { attempt: error.attemptNumber, retriesLeft: error.retriesLeft, reason: error.message },
                        `${this.label} attempt failed.`
                    );
                },
            })
        );
    }

    private async admitTokens(estimatedTokens: number): Promise<void> {
        if (!this.tokenLimiter || this.tokenBudget === undefined || estimatedTokens <= 0) {
            return;
        }

        // A request larger than the whole budget would never be admitted; it waits for a full refill instead.
        const weight = Math.min(this.tokenBudget, Math.ceil(estimatedTokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}
