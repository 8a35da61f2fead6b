import { gunzipSync } from "zlib";

/** awslogs.data is base64 of a gzip'd JSON data message. */
export function decodeAwsLogsData(data: string): string {
    return gunzipSync(Buffer.from(data, "base64")).toString("utf8");
}
