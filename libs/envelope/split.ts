import { gzipSync } from "zlib";
import { parse as parseJson, stringify as stringifyJson } from "lossless-json";
import type { LogEnvelope, Payload, WireEnvelope } from "./types";
import { validate, SchemaValidationError, type CloudWatchLogsDataV1 } from "../contracts/src/validate";
import { MalformedEntryError, PayloadTooLargeError } from "../transport/errors";

export const DEFAULT_MAX_PAYLOAD_BYTES = 1000 * 1024;

export interface SplitOptions {
    maxPayloadBytes?: number;
}

export function toWire(envelope: LogEnvelope): WireEnvelope {
    return {
        context: {
            function_name: envelope.context.functionName,
            invoked_function_arn: envelope.context.invokedFunctionArn,
            log_group_name: envelope.context.logGroupName,
            log_stream_name: envelope.context.logStreamName,
        },
        entry: envelope.entry,
    };
}

export function serializeEnvelope(envelope: LogEnvelope): Payload {
    return gzipSync(Buffer.from(JSON.stringify(toWire(envelope)), "utf8"));
}

function parseEntry(entry: string): CloudWatchLogsDataV1 {
    let data: unknown;
    try {
        // Lossless, so integers beyond 2^53 in events survive the round trip.
        data = parseJson(entry);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new MalformedEntryError(`Oversized entry is not JSON: ${reason}`);
    }
    try {
        validate("cloudwatch.logs.data.v1", data);
        return data;
    } catch (err) {
        if (err instanceof SchemaValidationError) {
            throw new MalformedEntryError(`Oversized entry has no logEvents list: ${err.details.join("; ")}`);
        }
        throw err;
    }
}

/**
 * Halves the envelope's logEvents. Every other field of the entry is kept
 * in both halves; the left half gets floor(n / 2) events.
 */
export function splitEnvelope(envelope: LogEnvelope, data = parseEntry(envelope.entry)): [LogEnvelope, LogEnvelope] {
    const half = Math.floor(data.logEvents.length / 2);
    const rebuild = (logEvents: unknown[]): LogEnvelope => {
        const entry = stringifyJson({ ...data, logEvents });
        if (entry === undefined) throw new MalformedEntryError("Split entry could not be serialized");
        return { context: envelope.context, entry };
    };
    return [rebuild(data.logEvents.slice(0, half)), rebuild(data.logEvents.slice(half))];
}

/**
 * Yields gzip payloads that are each strictly smaller than maxPayloadBytes,
 * in original event order. Uses a work-list instead of recursion, so the
 * depth of the split tree does not grow the call stack.
 */
export function* toPayloads(envelope: LogEnvelope, opts: SplitOptions = {}): Generator<Payload, void, undefined> {
    const limit = opts.maxPayloadBytes ?? DEFAULT_MAX_PAYLOAD_BYTES;
    const pending: LogEnvelope[] = [envelope];

    while (pending.length > 0) {
        const current = pending.pop();
        if (current === undefined) break;

        const payload = serializeEnvelope(current);
        if (payload.length < limit) {
            yield payload;
            continue;
        }

        const data = parseEntry(current.entry);
        if (data.logEvents.length <= 1) {
            throw new PayloadTooLargeError(payload.length, limit);
        }

        const [left, right] = splitEnvelope(current, data);
        // LIFO: push right first so the left half is emitted first.
        pending.push(right, left);
    }
}
