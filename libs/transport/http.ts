import { NetworkError } from "./errors";

export interface HttpRequest {
    method: "POST";
    url: string;
    headers: Record<string, string>;
    body: Buffer;
    timeoutMs?: number;
}

export interface HttpResponse {
    status: number;
    statusText: string;
}

/**
 * Sends one request. Resolves with any HTTP status; rejects with
 * NetworkError only when no response was received.
 */
export interface HttpTransport {
    send(request: HttpRequest): Promise<HttpResponse>;
}

function causeCode(error: Error): string | undefined {
    const cause: unknown = error.cause;
    if (cause && typeof cause === "object" && "code" in cause && typeof cause.code === "string") {
        return cause.code;
    }
    return undefined;
}

export function toNetworkError(error: unknown, timeoutMs: number): NetworkError {
    if (!(error instanceof Error)) return new NetworkError(String(error), "ConnectionFailed", error);

    if (error.name === "AbortError" || error.name === "TimeoutError") {
        return new NetworkError(`Request timeout after ${timeoutMs}ms`, "Timeout", error);
    }
    const detail = `${error.message}${causeCode(error) ? ` (${causeCode(error)})` : ""}`;
    if (/ENOTFOUND|EAI_AGAIN/.test(detail)) {
        return new NetworkError(`DNS resolution failed: ${detail}`, "DnsFailed", error);
    }
    if (/ETIMEDOUT|UND_ERR_CONNECT_TIMEOUT/.test(detail)) {
        return new NetworkError(`Connection timed out: ${detail}`, "Timeout", error);
    }
    return new NetworkError(`Connection failed: ${detail}`, "ConnectionFailed", error);
}

/** fetch-based transport (Node 20 global fetch). */
export class FetchTransport implements HttpTransport {
    private readonly defaultTimeoutMs: number;

    constructor(defaultTimeoutMs = 10_000) {
        this.defaultTimeoutMs = defaultTimeoutMs;
    }

    async send(request: HttpRequest): Promise<HttpResponse> {
        const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;
        try {
            const response = await fetch(request.url, {
                method: request.method,
                headers: request.headers,
                body: new Uint8Array(request.body),
                signal: AbortSignal.timeout(timeoutMs),
            });
            // Drain the body so the connection goes back to the pool.
            await response.arrayBuffer();
            return { status: response.status, statusText: response.statusText };
        } catch (error) {
            throw toNetworkError(error, timeoutMs);
        }
    }
}
