import { IngestClient, classifyResponse } from "./ingest-client";
import { RetryPolicy } from "./retry";
import type { HttpRequest, HttpResponse, HttpTransport } from "./http";
import { BadRequestError, NetworkError } from "./errors";

type Step = number | NetworkError;

class ScriptedTransport implements HttpTransport {
    readonly requests: HttpRequest[] = [];
    constructor(private readonly steps: Step[]) {}

    async send(request: HttpRequest): Promise<HttpResponse> {
        this.requests.push(request);
        const step = this.steps[Math.min(this.requests.length, this.steps.length) - 1];
        if (step instanceof NetworkError) throw step;
        return { status: step, statusText: "" };
    }
}

const payload = Buffer.from("gzipped-bytes");

function setup(steps: Step[]) {
    const transport = new ScriptedTransport(steps);
    const sleeps: number[] = [];
    const client = new IngestClient({
        ingestHost: "https://ingest.test",
        licenseKey: "test-license",
        retry: new RetryPolicy(),
        transport,
        sleep: async (ms) => { sleeps.push(ms); },
    });
    return { client, transport, sleeps };
}

const timeout = () => new NetworkError("Request timeout after 10000ms", "Timeout");

beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => jest.restoreAllMocks());

test("2xx on first attempt is delivered with one call", async () => {
    const { client, transport, sleeps } = setup([202]);
    await expect(client.send("other", payload)).resolves.toEqual({ kind: "delivered", status: 202, attempts: 1 });
    expect(transport.requests).toHaveLength(1);
    expect(sleeps).toEqual([]);
});

test("posts gzip body to the category path with credential headers", async () => {
    const { client, transport } = setup([200]);
    await client.send("vpc", payload);
    const [req] = transport.requests;
    expect(req.method).toBe("POST");
    expect(req.url).toBe("https://ingest.test/aws/vpc/v1");
    expect(req.headers).toEqual({
        "X-License-Key": "test-license",
        "Content-Encoding": "gzip",
        "Content-Type": "application/json",
    });
    expect(req.body).toBe(payload);
});

test("403 is rejected immediately without sleeping", async () => {
    const { client, transport, sleeps } = setup([403, 200]);
    const out = await client.send("lambda", payload);
    expect(out).toEqual({ kind: "rejected", status: 403, reason: "HTTP 403. Review your license key", attempts: 1 });
    expect(transport.requests).toHaveLength(1);
    expect(sleeps).toEqual([]);
});

test("timeouts twice then success sleeps 1000 and 2000", async () => {
    const { client, transport, sleeps } = setup([timeout(), timeout(), 200]);
    await expect(client.send("other", payload)).resolves.toEqual({ kind: "delivered", status: 200, attempts: 3 });
    expect(transport.requests).toHaveLength(3);
    expect(sleeps).toEqual([1000, 2000]);
});

test("persistent network failure is exhausted after the attempt budget", async () => {
    const { client, transport, sleeps } = setup([timeout()]);
    const out = await client.send("other", payload);
    expect(out).toEqual({ kind: "exhausted", attempts: 3, lastError: "Request timeout after 10000ms" });
    expect(transport.requests).toHaveLength(3);
    expect(sleeps).toEqual([1000, 2000]);
});

test("5xx responses are retried like network failures", async () => {
    const { client, transport, sleeps } = setup([503, 200]);
    await expect(client.send("other", payload)).resolves.toEqual({ kind: "delivered", status: 200, attempts: 2 });
    expect(transport.requests).toHaveLength(2);
    expect(sleeps).toEqual([1000]);
});

test("429 is surfaced as throttled on the attempt it occurred", async () => {
    const { client, transport, sleeps } = setup([timeout(), 429, 200]);
    const out = await client.send("other", payload);
    expect(out).toEqual({ kind: "throttled", status: 429, reason: "HTTP 429. Too many requests", attempts: 2 });
    expect(transport.requests).toHaveLength(2);
    expect(sleeps).toEqual([1000]);
});

test("unexpected transport errors are not swallowed", async () => {
    const transport: HttpTransport = { send: async () => { throw new RangeError("bug"); } };
    const client = new IngestClient({ ingestHost: "https://ingest.test", licenseKey: "k", transport, sleep: async () => undefined });
    await expect(client.send("other", payload)).rejects.toThrow(RangeError);
});

test("only retryable forwarder errors earn another attempt", async () => {
    const sends: number[] = [];
    const transport: HttpTransport = {
        send: async () => { sends.push(1); throw new BadRequestError("refused before sending"); },
    };
    const client = new IngestClient({ ingestHost: "https://ingest.test", licenseKey: "k", transport, sleep: async () => undefined });
    await expect(client.send("other", payload)).rejects.toThrow(BadRequestError);
    expect(sends).toHaveLength(1);
});

test("each attempt is logged", async () => {
    const { client } = setup([timeout(), 200]);
    await client.send("other", payload);
    expect(console.warn).toHaveBeenCalledWith(
        "ingest-attempt-failed",
        "There was an error. Reason: Request timeout after 10000ms",
        { category: "other", attempt: 1 },
    );
    expect(console.log).toHaveBeenCalledWith("ingest-retry", "Retrying in 1000 ms", { category: "other", attempt: 2 });
    expect(console.log).toHaveBeenCalledWith(
        "ingest-delivered",
        "Log entry sent. Response code: 200",
        { category: "other", attempt: 2, bytes: payload.length },
    );
});

test("response classification table", () => {
    expect(classifyResponse({ status: 204, statusText: "No Content" })).toEqual({ type: "success" });
    expect(classifyResponse({ status: 400, statusText: "Bad Request" }))
        .toEqual({ type: "fatal", reason: "HTTP 400 Bad Request. Unexpected payload" });
    expect(classifyResponse({ status: 404, statusText: "" }))
        .toEqual({ type: "fatal", reason: "HTTP 404. Review the region endpoint" });
    expect(classifyResponse({ status: 413, statusText: "" })).toEqual({ type: "fatal", reason: "HTTP 413" });
    expect(classifyResponse({ status: 429, statusText: "" }).type).toBe("throttled");
    expect(classifyResponse({ status: 500, statusText: "" }).type).toBe("retryable");
    expect(classifyResponse({ status: 302, statusText: "" }).type).toBe("retryable");
});
