import { z } from "zod";
import { ConfigError } from "../transport/errors";

export const US_INGEST_HOST = "https://cloud-collector.newrelic.com";
export const EU_INGEST_HOST = "https://cloud-collector.eu.newrelic.com";

const RegionSchema = z.union([
    z.enum(["US", "EU"]),
    z.string().url().refine(u => /^https?:\/\//.test(u), "must be an http(s) URL"),
]);

export const ForwarderEnvSchema = z.object({
    LICENSE_KEY: z.string().min(1),
    INGEST_REGION: RegionSchema,
    MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    INITIAL_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    BACKOFF_MULTIPLIER: z.coerce.number().min(1).default(2),
    MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(1000 * 1024),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type IngestRegion = z.infer<typeof RegionSchema>;

export interface RetrySettings {
    readonly maxAttempts: number;
    readonly initialBackoffMs: number;
    readonly multiplier: number;
}

export interface ForwarderConfig {
    readonly licenseKey: string;
    readonly ingestHost: string;
    readonly retry: RetrySettings;
    readonly maxPayloadBytes: number;
    readonly requestTimeoutMs: number;
}

export function resolveIngestHost(region: IngestRegion): string {
    if (region === "US") return US_INGEST_HOST;
    if (region === "EU") return EU_INGEST_HOST;
    return region.replace(/\/+$/, "");
}

/**
 * Builds the process-wide configuration once at cold start.
 * Missing or invalid values fail the invocation before any record is read;
 * the region is never guessed from the license key.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ForwarderConfig {
    const parsed = ForwarderEnvSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".") || "/"} ${i.message}`);
        throw new ConfigError("Invalid forwarder configuration", issues);
    }
    const e = parsed.data;
    return Object.freeze({
        licenseKey: e.LICENSE_KEY,
        ingestHost: resolveIngestHost(e.INGEST_REGION),
        retry: Object.freeze({
            maxAttempts: e.MAX_RETRIES,
            initialBackoffMs: e.INITIAL_BACKOFF_MS,
            multiplier: e.BACKOFF_MULTIPLIER,
        }),
        maxPayloadBytes: e.MAX_PAYLOAD_BYTES,
        requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    });
}
