import {
	type DLQPayload,
	type ErrorClassification,
	SCHEMA_VERSIONS,
	STREAMS,
} from "@logflow/core-contracts";
import type { Logger } from "@logflow/core-telemetry";
import { v4 as uuidv4 } from "uuid";
import { type EnvelopeSource, createEnvelope } from "./envelope.js";
import type { LogflowProducer } from "./producer.js";
import { getDLQTopic } from "./topics.js";

export interface DLQMessage {
	originalTopic: string;
	originalPartition?: number;
	originalOffset?: string;
	originalKey?: string | null;
	originalMessage: unknown;
	failureStage: DLQPayload["failure_stage"];
	errorClassification: ErrorClassification;
	errorCode: string;
	errorMessage: string;
	errorStack?: string;
	retryCount: number;
}

export interface DLQPublisher {
	publish(message: DLQMessage): Promise<void>;
}

interface DLQPublisherOptions {
	producer: LogflowProducer;
	logger: Logger;
	source: EnvelopeSource;
	topicPrefix?: string;
}

/**
 * Build the dead-letter payload. Optional fields are left off rather
 * than serialised as null.
 */
export function buildDLQPayload(
	message: DLQMessage,
	source: EnvelopeSource,
	now: Date = new Date(),
): DLQPayload {
	const payload: DLQPayload = {
		dlq_id: uuidv4(),
		original_topic: message.originalTopic,
		original_message: message.originalMessage,
		failure_stage: message.failureStage,
		error_classification: message.errorClassification,
		error_code: message.errorCode,
		error_message: message.errorMessage,
		retry_count: message.retryCount,
		dlq_at: now.toISOString(),
		processing_service: source.service,
	};
	if (message.originalPartition !== undefined)
		payload.original_partition = message.originalPartition;
	if (message.originalOffset) payload.original_offset = message.originalOffset;
	if (message.originalKey) payload.original_key = message.originalKey;
	if (message.errorStack) payload.error_stack = message.errorStack;
	if (source.instance_id) payload.processing_instance = source.instance_id;
	return payload;
}

class DLQPublisherImpl implements DLQPublisher {
	private producer: LogflowProducer;
	private logger: Logger;
	private source: EnvelopeSource;
	private topic: string;

	constructor(options: DLQPublisherOptions) {
		this.producer = options.producer;
		this.logger = options.logger;
		this.source = options.source;
		this.topic = getDLQTopic(options.topicPrefix);
	}

	async publish(message: DLQMessage): Promise<void> {
		const dlqPayload = buildDLQPayload(message, this.source);

		const envelope = createEnvelope({
			stream: STREAMS.DEAD_LETTER,
			kind: "dead_letter",
			schema_version: SCHEMA_VERSIONS.DLQ,
			source: this.source,
			payload: dlqPayload,
		});

		try {
			await this.producer.send(this.topic, envelope, {
				key: message.originalKey ?? null,
			});

			this.logger.info("Message published to DLQ", {
				dlq_id: dlqPayload.dlq_id,
				original_topic: message.originalTopic,
				error_classification: message.errorClassification,
				error_code: message.errorCode,
			});
		} catch (error) {
			// DLQ publishing must not block the partition
			this.logger.error("Failed to publish to DLQ", {
				dlq_id: dlqPayload.dlq_id,
				original_topic: message.originalTopic,
				error_message: error instanceof Error ? error.message : String(error),
			});
		}
	}
}

export function createDLQPublisher(options: DLQPublisherOptions): DLQPublisher {
	return new DLQPublisherImpl(options);
}
