import { type DeadLetterEntry, SCHEMA_VERSIONS } from "@logflow/core-contracts";
import {
	type DLQMessage,
	type DLQPublisher,
	type EnvelopeKind,
	type EnvelopeSource,
	type LogflowProducer,
	type OutgoingMessage,
	createEnvelope,
	resolveTopic,
} from "@logflow/core-kafka";
import type { Logger, Metrics } from "@logflow/core-telemetry";
import type { OutputSink, PipelineOutput } from "@logflow/stream-engine";

/** Where the record that produced the buffered outputs was consumed */
export interface RecordOrigin {
	topic: string;
	partition: number;
	offset: string;
}

export interface OutputPublisherOptions {
	producer: LogflowProducer;
	dlqPublisher: DLQPublisher;
	logger: Logger;
	metrics: Metrics;
	source: EnvelopeSource;
	topicPrefix: string;
}

type EnvelopedOutput = Exclude<PipelineOutput, { kind: "dead_letter" }>;

interface EnvelopeBody {
	kind: EnvelopeKind;
	schema_version: string;
	payload: unknown;
	trace_id?: string;
}

function envelopeBody(output: EnvelopedOutput): EnvelopeBody {
	switch (output.kind) {
		case "parsed":
			return {
				kind: "parsed",
				schema_version: SCHEMA_VERSIONS.LOGS_PARSED,
				payload: output.record,
			};
		case "span":
			return {
				kind: "span",
				schema_version: SCHEMA_VERSIONS.LOGS_PARSED,
				payload: output.record,
				trace_id: output.record.trace_id,
			};
		case "unified": {
			const body: EnvelopeBody = {
				kind: "unified",
				schema_version: SCHEMA_VERSIONS.LOGS_UNIFIED,
				payload: output.event,
			};
			if (output.event.trace_id) body.trace_id = output.event.trace_id;
			return body;
		}
		case "metric":
			return {
				kind: "metric",
				schema_version: SCHEMA_VERSIONS.METRICS,
				payload: output.snapshot,
			};
		case "alert":
			return {
				kind: "alert",
				schema_version: SCHEMA_VERSIONS.ALERTS,
				payload: output.alert,
			};
	}
}

/**
 * Pipeline sink backed by Kafka. `push` only buffers; `flush` sends the
 * buffer as one batch and routes dead letters through the DLQ publisher.
 * A failed batch stays buffered for the next flush.
 */
export class OutputPublisher implements OutputSink {
	private pending: OutgoingMessage[] = [];
	private deadLetters: DeadLetterEntry[] = [];

	constructor(private readonly options: OutputPublisherOptions) {}

	get size(): number {
		return this.pending.length + this.deadLetters.length;
	}

	push(output: PipelineOutput): void {
		if (output.kind === "dead_letter") {
			this.deadLetters.push(output.entry);
			return;
		}

		const envelope = createEnvelope({
			stream: output.stream,
			source: this.options.source,
			...envelopeBody(output),
		});
		this.pending.push({
			topic: resolveTopic(output.stream, this.options.topicPrefix),
			envelope,
			options: { key: output.key },
		});
	}

	async flush(origin?: RecordOrigin): Promise<void> {
		while (this.deadLetters.length > 0) {
			const [entry] = this.deadLetters;
			if (!entry) break;
			await this.options.dlqPublisher.publish(this.toDLQMessage(entry, origin));
			this.deadLetters.shift();
		}

		if (this.pending.length === 0) {
			return;
		}

		const batch = this.pending;
		this.pending = [];
		try {
			await this.options.producer.sendBatch(batch);
		} catch (error) {
			this.pending = batch.concat(this.pending);
			this.options.logger.warn("Output batch kept for retry", {
				messages: batch.length,
			});
			throw error;
		}

		const perTopic = new Map<string, number>();
		for (const { topic } of batch) {
			perTopic.set(topic, (perTopic.get(topic) ?? 0) + 1);
		}
		for (const [topic, count] of perTopic) {
			this.options.metrics.increment("outputs.published", count, { topic });
		}
	}

	private toDLQMessage(entry: DeadLetterEntry, origin?: RecordOrigin): DLQMessage {
		const message: DLQMessage = {
			originalTopic: origin?.topic ?? resolveTopic(entry.source_topic, this.options.topicPrefix),
			originalKey: entry.key,
			originalMessage: entry.payload,
			failureStage: "parse",
			errorClassification: "poison",
			errorCode: entry.reason,
			errorMessage: entry.field ? `${entry.detail} (field: ${entry.field})` : entry.detail,
			retryCount: 0,
		};
		if (origin) {
			message.originalPartition = origin.partition;
			message.originalOffset = origin.offset;
		}
		return message;
	}
}
