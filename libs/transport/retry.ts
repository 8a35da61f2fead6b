import { setTimeout as delay } from "timers/promises";
import type { RetrySettings } from "../config/forwarder-config";

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
    await delay(ms);
};

export const REFERENCE_RETRY: RetrySettings = Object.freeze({
    maxAttempts: 3,
    initialBackoffMs: 1000,
    multiplier: 2,
});

/**
 * Exponential backoff schedule. Attempt numbers start at 1; the wait before
 * attempt n (n >= 2) is initialBackoffMs * multiplier^(n - 2).
 */
export class RetryPolicy {
    readonly maxAttempts: number;
    readonly initialBackoffMs: number;
    readonly multiplier: number;

    constructor(settings: RetrySettings = REFERENCE_RETRY) {
        this.maxAttempts = settings.maxAttempts;
        this.initialBackoffMs = settings.initialBackoffMs;
        this.multiplier = settings.multiplier;
    }

    canAttempt(attempt: number): boolean {
        return attempt <= this.maxAttempts;
    }

    backoffBefore(attempt: number): number {
        if (attempt <= 1) return 0;
        return this.initialBackoffMs * Math.pow(this.multiplier, attempt - 2);
    }
}
