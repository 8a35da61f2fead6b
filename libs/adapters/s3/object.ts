import { gunzipSync } from "zlib";
import { GetObjectCommand } from "@aws-sdk/client-s3";

/** The slice of S3Client used here, so tests can hand in a stub. */
export interface S3ObjectReader {
    send(command: GetObjectCommand): Promise<{ Body?: { transformToByteArray(): Promise<Uint8Array> } }>;
}

export async function getS3Body(s3: S3ObjectReader, bucket: string, key: string): Promise<Buffer> {
    const out = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!out.Body) throw new Error(`Empty S3 object body for s3://${bucket}/${key}`);
    const bytes = Buffer.from(await out.Body.transformToByteArray());
    return key.split(".").pop() === "gz" ? gunzipSync(bytes) : bytes;
}

export function splitLines(text: string): string[] {
    return text.split(/\r?\n/).filter(line => line.length > 0);
}

/** Reads a log file from S3 and returns its non-empty lines. */
export async function readLogLines(s3: S3ObjectReader, bucket: string, key: string): Promise<string[]> {
    const body = await getS3Body(s3, bucket, key);
    return splitLines(body.toString("utf8"));
}
