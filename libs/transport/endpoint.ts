import type { EntryCategory } from "../envelope/types";

export const INGEST_SERVICE_VERSION = "v1";

export const INGEST_SERVICE_PATHS: Readonly<Record<EntryCategory, string>> = Object.freeze({
    vpc: "/aws/vpc",
    lambda: "/aws/lambda",
    other: "/aws",
});

export function ingestUrl(host: string, category: EntryCategory): string {
    return `${host}${INGEST_SERVICE_PATHS[category]}/${INGEST_SERVICE_VERSION}`;
}
