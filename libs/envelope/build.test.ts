import { buildEnvelope } from "./build";
import { EnvelopeError } from "../transport/errors";

const ctx = {
    functionName: "log-forwarder",
    invokedFunctionArn: "arn:aws:lambda:eu-central-1:123456789012:function:log-forwarder",
    logGroupName: "/aws/lambda/log-forwarder",
    logStreamName: "2025/09/30/[$LATEST]abc",
};

test("copies the invocation context verbatim", () => {
    const env = buildEnvelope("hello", ctx);
    expect(env).toEqual({ context: ctx, entry: "hello" });
    expect(env.context).not.toBe(ctx);
    expect(Object.isFrozen(env)).toBe(true);
    expect(Object.isFrozen(env.context)).toBe(true);
});

test("decodes byte entries as UTF-8", () => {
    const env = buildEnvelope(Buffer.from("größe ✓", "utf8"), ctx);
    expect(env.entry).toBe("größe ✓");
});

test("missing context is a programming error", () => {
    expect(() => buildEnvelope("x", undefined)).toThrow(EnvelopeError);
    expect(() => buildEnvelope("x", null)).toThrow("without an invocation context");
});
