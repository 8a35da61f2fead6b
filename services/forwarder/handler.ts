import { S3Client } from "@aws-sdk/client-s3";
import type { Context } from "aws-lambda";

import { loadConfig, type ForwarderConfig } from "../../libs/config/forwarder-config";
import { detectTrigger, type Trigger } from "../../libs/adapters/trigger";
import { decodeAwsLogsData } from "../../libs/adapters/cwlogs/decode";
import { readLogLines, type S3ObjectReader } from "../../libs/adapters/s3/object";
import { Dispatcher, type DispatchSummary, type PayloadSender } from "../../libs/dispatch/dispatcher";
import { IngestClient } from "../../libs/transport/ingest-client";
import { metricCount, metricMs } from "../../libs/obs/metrics";

export interface ForwarderDeps {
  config: ForwarderConfig;
  s3: S3ObjectReader;
  sender?: PayloadSender;
}

export interface ForwarderResult {
  trigger: Trigger["kind"];
  records: number;
  payloads: number;
  delivered: number;
  rejected: number;
  dropped: number;
}

export type ForwarderHandler = (event: unknown, context: Context) => Promise<ForwarderResult>;

function tally(result: ForwarderResult, s: DispatchSummary) {
  result.records++;
  result.payloads += s.payloads;
  result.delivered += s.delivered;
  result.rejected += s.rejected;
  result.dropped += s.dropped;
}

async function recordsOf(trigger: Trigger, s3: S3ObjectReader): Promise<string[]> {
  switch (trigger.kind) {
    case "cw_logs":
      return [decodeAwsLogsData(trigger.data)];
    case "s3":
      // A log file holds many entries; each line is sent as its own record.
      return readLogLines(s3, trigger.bucket, trigger.key);
    case "unknown":
      return [];
  }
}

export function createHandler(deps: ForwarderDeps): ForwarderHandler {
  const dispatcher = new Dispatcher({
    sender: deps.sender ?? IngestClient.fromConfig(deps.config),
    maxPayloadBytes: deps.config.maxPayloadBytes,
  });

  return async (event, context) => {
    const t0 = Date.now();
    const trigger = detectTrigger(event);
    const result: ForwarderResult = { trigger: trigger.kind, records: 0, payloads: 0, delivered: 0, rejected: 0, dropped: 0 };

    if (trigger.kind === "unknown") {
      console.warn("Not supported", JSON.stringify(event));
      return result;
    }

    try {
      const records = await recordsOf(trigger, deps.s3);
      // Sequential: a throttled or exhausted endpoint stops the remaining records.
      for (const record of records) {
        tally(result, await dispatcher.dispatch(record, context));
      }
    } catch (err) {
      await metricCount("forwarder_error_count", 1, { service: "forwarder", trigger: trigger.kind });
      console.error("Forwarder error", { trigger: trigger.kind, recordsDone: result.records }, err);
      throw err;
    } finally {
      await metricCount("forwarder_payload_delivered_count", result.delivered, { service: "forwarder" });
      await metricCount("forwarder_payload_rejected_count", result.rejected + result.dropped, { service: "forwarder" });
      await metricMs("forwarder_latency_ms", Date.now() - t0, { service: "forwarder" });
    }

    console.log("Forwarder done", JSON.stringify(result));
    return result;
  };
}

let handler: ForwarderHandler | undefined;

/** Lambda entry point; configuration is read on the first (cold) invocation. */
export async function main(event: unknown, context: Context): Promise<ForwarderResult> {
  handler ??= createHandler({ config: loadConfig(), s3: new S3Client({}) });
  return handler(event, context);
}
