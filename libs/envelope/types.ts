export interface InvocationContext {
    readonly functionName: string;
    readonly invokedFunctionArn: string;
    readonly logGroupName: string;
    readonly logStreamName: string;
}

export interface LogEnvelope {
    readonly context: InvocationContext;
    readonly entry: string;
}

/** Routing key for the ingest endpoint path. */
export type EntryCategory = "vpc" | "lambda" | "other";

/** gzip-compressed JSON body, ready to be POSTed. */
export type Payload = Buffer;

/** Shape of the JSON body on the wire, before compression. */
export interface WireEnvelope {
    context: {
        function_name: string;
        invoked_function_arn: string;
        log_group_name: string;
        log_stream_name: string;
    };
    entry: string;
}
