import type { EntryCategory, Payload } from "../envelope/types";
import type { ForwarderConfig } from "../config/forwarder-config";
import { ingestUrl } from "./endpoint";
import { FetchTransport, type HttpResponse, type HttpTransport } from "./http";
import { RetryPolicy, defaultSleep, type Sleep } from "./retry";
import { ForwarderError } from "./errors";

export type DeliveryOutcome =
    | { kind: "delivered"; status: number; attempts: number }
    | { kind: "rejected"; status: number; reason: string; attempts: number }
    | { kind: "throttled"; status: 429; reason: string; attempts: number }
    | { kind: "exhausted"; attempts: number; lastError: string };

export type ResponseClass =
    | { type: "success" }
    | { type: "fatal"; reason: string }
    | { type: "throttled"; reason: string }
    | { type: "retryable"; reason: string };

export function classifyResponse(res: Pick<HttpResponse, "status" | "statusText">): ResponseClass {
    const { status } = res;
    const label = `HTTP ${status}${res.statusText ? ` ${res.statusText}` : ""}`;
    if (status >= 200 && status < 300) return { type: "success" };
    if (status === 400) return { type: "fatal", reason: `${label}. Unexpected payload` };
    if (status === 403) return { type: "fatal", reason: `${label}. Review your license key` };
    if (status === 404) return { type: "fatal", reason: `${label}. Review the region endpoint` };
    if (status === 429) return { type: "throttled", reason: `${label}. Too many requests` };
    if (status >= 400 && status < 500) return { type: "fatal", reason: label };
    return { type: "retryable", reason: label };
}

export interface IngestClientOptions {
    ingestHost: string;
    licenseKey: string;
    retry?: RetryPolicy;
    transport?: HttpTransport;
    sleep?: Sleep;
    requestTimeoutMs?: number;
}

/**
 * Posts gzip payloads to the ingest service.
 *
 * Each call runs its own attempt/backoff loop: success and 4xx end it at
 * once, 429 ends it as throttled without another attempt, and network
 * failures or other statuses back off and retry until the attempt budget
 * is spent.
 */
export class IngestClient {
    private readonly ingestHost: string;
    private readonly licenseKey: string;
    private readonly retry: RetryPolicy;
    private readonly transport: HttpTransport;
    private readonly sleep: Sleep;
    private readonly requestTimeoutMs?: number;

    constructor(opts: IngestClientOptions) {
        this.ingestHost = opts.ingestHost;
        this.licenseKey = opts.licenseKey;
        this.retry = opts.retry ?? new RetryPolicy();
        this.transport = opts.transport ?? new FetchTransport(opts.requestTimeoutMs);
        this.sleep = opts.sleep ?? defaultSleep;
        this.requestTimeoutMs = opts.requestTimeoutMs;
    }

    static fromConfig(config: ForwarderConfig, overrides: Pick<IngestClientOptions, "transport" | "sleep"> = {}): IngestClient {
        return new IngestClient({
            ingestHost: config.ingestHost,
            licenseKey: config.licenseKey,
            retry: new RetryPolicy(config.retry),
            requestTimeoutMs: config.requestTimeoutMs,
            ...overrides,
        });
    }

    async send(category: EntryCategory, payload: Payload): Promise<DeliveryOutcome> {
        const url = ingestUrl(this.ingestHost, category);
        let lastError = "no attempt made";

        for (let attempt = 1; this.retry.canAttempt(attempt); attempt++) {
            if (attempt > 1) {
                const backoff = this.retry.backoffBefore(attempt);
                console.log("ingest-retry", `Retrying in ${backoff} ms`, { category, attempt });
                await this.sleep(backoff);
            }

            let res: HttpResponse;
            try {
                res = await this.transport.send({
                    method: "POST",
                    url,
                    headers: {
                        "X-License-Key": this.licenseKey,
                        "Content-Encoding": "gzip",
                        "Content-Type": "application/json",
                    },
                    body: payload,
                    timeoutMs: this.requestTimeoutMs,
                });
            } catch (err) {
                if (!(err instanceof ForwarderError) || !err.retryable) throw err;
                lastError = err.message;
                console.warn("ingest-attempt-failed", `There was an error. Reason: ${err.message}`, { category, attempt });
                continue;
            }

            const verdict = classifyResponse(res);
            switch (verdict.type) {
                case "success":
                    console.log("ingest-delivered", `Log entry sent. Response code: ${res.status}`, { category, attempt, bytes: payload.length });
                    return { kind: "delivered", status: res.status, attempts: attempt };
                case "fatal":
                    console.error("ingest-rejected", verdict.reason, { category, attempt });
                    return { kind: "rejected", status: res.status, reason: verdict.reason, attempts: attempt };
                case "throttled":
                    console.error("ingest-throttled", verdict.reason, { category, attempt });
                    return { kind: "throttled", status: 429, reason: verdict.reason, attempts: attempt };
                case "retryable":
                    lastError = verdict.reason;
                    console.warn("ingest-attempt-failed", `There was an error. Reason: ${verdict.reason}`, { category, attempt });
                    break;
            }
        }

        console.error("ingest-exhausted", "Retry limit reached. Failed to send log entry.", { category, attempts: this.retry.maxAttempts });
        return { kind: "exhausted", attempts: this.retry.maxAttempts, lastError };
    }
}
