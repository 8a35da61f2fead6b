import type { EntryCategory, InvocationContext } from "../envelope/types";
import { buildEnvelope } from "../envelope/build";
import { classifyEntry } from "../envelope/classify";
import { toPayloads } from "../envelope/split";
import type { DeliveryOutcome } from "../transport/ingest-client";
import { BadRequestError, MaxRetriesError, ThrottlingError } from "../transport/errors";

/** The part of IngestClient the dispatcher needs. */
export interface PayloadSender {
    send(category: EntryCategory, payload: Buffer): Promise<DeliveryOutcome>;
}

export interface DispatchSummary {
    category: EntryCategory;
    payloads: number;
    delivered: number;
    rejected: number;
    /** Envelopes abandoned by the splitter (malformed or oversized). */
    dropped: number;
}

export interface DispatcherOptions {
    sender: PayloadSender;
    maxPayloadBytes: number;
}

export class Dispatcher {
    private readonly sender: PayloadSender;
    private readonly maxPayloadBytes: number;

    constructor(opts: DispatcherOptions) {
        this.sender = opts.sender;
        this.maxPayloadBytes = opts.maxPayloadBytes;
    }

    /**
     * Delivers one raw log record. Rejected payloads and unsplittable
     * envelopes are logged and skipped; throttling and retry exhaustion
     * abort the record by throwing.
     */
    async dispatch(rawEntry: string | Uint8Array, context: InvocationContext): Promise<DispatchSummary> {
        const envelope = buildEnvelope(rawEntry, context);
        const category = classifyEntry(envelope);
        const summary: DispatchSummary = { category, payloads: 0, delivered: 0, rejected: 0, dropped: 0 };

        try {
            for (const payload of toPayloads(envelope, { maxPayloadBytes: this.maxPayloadBytes })) {
                summary.payloads++;
                const outcome = await this.sender.send(category, payload);
                switch (outcome.kind) {
                    case "delivered":
                        summary.delivered++;
                        break;
                    case "rejected":
                        summary.rejected++;
                        console.error("payload-dropped", outcome.reason, { category, status: outcome.status });
                        break;
                    case "throttled":
                        throw new ThrottlingError(outcome.reason, outcome.attempts);
                    case "exhausted":
                        throw new MaxRetriesError(outcome.attempts, outcome.lastError);
                }
            }
        } catch (err) {
            if (!(err instanceof BadRequestError)) throw err;
            summary.dropped++;
            console.error("envelope-dropped", err.message, { category, code: err.code, sentBefore: summary.payloads });
        }

        return summary;
    }
}
