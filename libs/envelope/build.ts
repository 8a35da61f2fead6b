import type { InvocationContext, LogEnvelope } from "./types";
import { EnvelopeError } from "../transport/errors";

const utf8 = new TextDecoder("utf-8");

export function buildEnvelope(rawEntry: string | Uint8Array, context: InvocationContext | null | undefined): LogEnvelope {
    if (!context) {
        throw new EnvelopeError("Cannot build a log envelope without an invocation context");
    }
    const entry = typeof rawEntry === "string" ? rawEntry : utf8.decode(rawEntry);
    return Object.freeze({
        context: Object.freeze({
            functionName: context.functionName,
            invokedFunctionArn: context.invokedFunctionArn,
            logGroupName: context.logGroupName,
            logStreamName: context.logStreamName,
        }),
        entry,
    });
}
