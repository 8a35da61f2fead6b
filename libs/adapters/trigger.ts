import { z } from "zod";

const CloudWatchLogsEventSchema = z.object({
    awslogs: z.object({ data: z.string().min(1) }),
});

const S3RecordSchema = z.object({
    eventName: z.string(),
    s3: z.object({
        bucket: z.object({ name: z.string().min(1) }),
        object: z.object({ key: z.string().min(1) }),
    }),
});

const S3EventSchema = z.object({
    Records: z.array(z.unknown()).min(1),
});

export type Trigger =
    | { kind: "cw_logs"; data: string }
    | { kind: "s3"; bucket: string; key: string }
    | { kind: "unknown" };

/** S3 notifications carry keys form-encoded ("+" for spaces). */
export function decodeS3Key(key: string): string {
    return decodeURIComponent(key.replace(/\+/g, " "));
}

/**
 * Tells a CloudWatch Logs subscription event from an S3 ObjectCreated
 * notification. Only the first S3 record is looked at.
 */
export function detectTrigger(event: unknown): Trigger {
    const cw = CloudWatchLogsEventSchema.safeParse(event);
    if (cw.success) return { kind: "cw_logs", data: cw.data.awslogs.data };

    const s3Event = S3EventSchema.safeParse(event);
    if (s3Event.success) {
        const record = S3RecordSchema.safeParse(s3Event.data.Records[0]);
        if (record.success && record.data.eventName.includes("ObjectCreated")) {
            return {
                kind: "s3",
                bucket: record.data.s3.bucket.name,
                key: decodeS3Key(record.data.s3.object.key),
            };
        }
    }

    return { kind: "unknown" };
}
