import type { EntryCategory, LogEnvelope } from "./types";

const VPC_FLOW_LOG_GROUP = '"logGroup":"/aws/vpc/flow-logs"';
const LAMBDA_LOG_GROUP = '"logGroup":"/aws/lambda/';
// The marker sits inside a JSON-encoded message string, hence the escaped quotes.
const LAMBDA_MONITORING_MARKER = ',\\"NR_LAMBDA_MONITORING\\",';

export function classifyEntry(input: LogEnvelope | string): EntryCategory {
    const entry = typeof input === "string" ? input : input?.entry;
    if (typeof entry !== "string") return "other";

    if (entry.includes(VPC_FLOW_LOG_GROUP)) return "vpc";
    if (entry.includes(LAMBDA_LOG_GROUP) && entry.includes(LAMBDA_MONITORING_MARKER)) return "lambda";
    return "other";
}
