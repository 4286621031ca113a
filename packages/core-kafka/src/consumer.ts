import type { RawLogRecord } from "@logflow/core-contracts";
import type { Logger } from "@logflow/core-telemetry";
import { extractTraceContext } from "@logflow/core-telemetry";
import type {
	Consumer,
	EachMessagePayload,
	Kafka,
	KafkaMessage,
} from "kafkajs";
import type { DLQPublisher } from "./dlq.js";
import {
	NonRetryableError,
	RetryableError,
	classifyError,
	errorCode,
} from "./errors.js";

export type ProcessResult =
	| { status: "success" }
	| { status: "skip"; reason: string }
	| { status: "retry"; reason: string; delay?: number }
	| { status: "dlq"; reason: string; error: Error };

export type MessageHandler = (
	record: RawLogRecord,
	context: MessageContext,
) => Promise<ProcessResult>;

export interface MessageContext {
	topic: string;
	partition: number;
	offset: string;
	headers: Record<string, string | undefined>;
	trace_id?: string;
	span_id?: string;
	logger: Logger;
}

export interface ConsumerOptions {
	kafka: Kafka;
	logger: Logger;
	groupId: string;
	topics: string[];
	dlqPublisher?: DLQPublisher;
	fromBeginning?: boolean;
	maxRetries?: number;
	retryBackoffMs?: number;
	sessionTimeout?: number;
	heartbeatInterval?: number;
}

export interface LogflowConsumer {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	subscribe(): Promise<void>;
	run(handler: MessageHandler): Promise<void>;
	isConnected(): boolean;
	pause(): void;
	resume(): void;
}

/**
 * Turn a Kafka message into a raw log record. The broker timestamp is
 * the ingest time. Tombstones (null value) have no record.
 */
export function toRawRecord(
	topic: string,
	message: KafkaMessage,
): RawLogRecord | null {
	if (message.value === null) {
		return null;
	}
	const ingestTime = Number(message.timestamp);
	return {
		source_topic: topic,
		key: message.key ? message.key.toString("utf8") : null,
		payload: message.value,
		ingest_time: Number.isFinite(ingestTime) ? ingestTime : Date.now(),
	};
}

class LogflowConsumerImpl implements LogflowConsumer {
	private consumer: Consumer;
	private logger: Logger;
	private topics: string[];
	private dlqPublisher: DLQPublisher | undefined;
	private fromBeginning: boolean;
	private maxRetries: number;
	private retryBackoffMs: number;
	private connected = false;
	private running = false;
	private paused = false;

	constructor(options: ConsumerOptions) {
		this.consumer = options.kafka.consumer({
			groupId: options.groupId,
			sessionTimeout: options.sessionTimeout ?? 30000,
			heartbeatInterval: options.heartbeatInterval ?? 3000,
			maxBytesPerPartition: 1048576, // 1MB
			retry: {
				retries: options.maxRetries ?? 5,
			},
		});
		this.logger = options.logger;
		this.topics = options.topics;
		this.dlqPublisher = options.dlqPublisher;
		this.fromBeginning = options.fromBeginning ?? false;
		this.maxRetries = options.maxRetries ?? 3;
		this.retryBackoffMs = options.retryBackoffMs ?? 1000;
	}

	async connect(): Promise<void> {
		if (this.connected) return;
		await this.consumer.connect();
		this.connected = true;
		this.logger.info("Kafka consumer connected");
	}

	async disconnect(): Promise<void> {
		if (!this.connected) return;
		await this.consumer.disconnect();
		this.connected = false;
		this.running = false;
		this.logger.info("Kafka consumer disconnected");
	}

	isConnected(): boolean {
		return this.connected;
	}

	async subscribe(): Promise<void> {
		await this.consumer.subscribe({
			topics: this.topics,
			fromBeginning: this.fromBeginning,
		});
		this.logger.info("Subscribed to topics", { topics: this.topics });
	}

	pause(): void {
		if (this.paused) return;
		this.consumer.pause(this.topics.map((topic) => ({ topic })));
		this.paused = true;
		this.logger.info("Consumer paused");
	}

	resume(): void {
		if (!this.paused) return;
		this.consumer.resume(this.topics.map((topic) => ({ topic })));
		this.paused = false;
		this.logger.info("Consumer resumed");
	}

	async run(handler: MessageHandler): Promise<void> {
		if (this.running) {
			throw new Error("Consumer already running");
		}
		this.running = true;

		await this.consumer.run({
			eachMessage: async (payload: EachMessagePayload) => {
				await this.handleMessage(payload, handler);
			},
		});
	}

	private async handleMessage(
		payload: EachMessagePayload,
		handler: MessageHandler,
	): Promise<void> {
		const { topic, partition, message } = payload;

		const headers = this.extractHeaders(message);
		const traceContext = extractTraceContext(headers);

		const context: MessageContext = {
			topic,
			partition,
			offset: message.offset,
			headers,
			logger: this.logger.child({
				topic,
				partition,
				offset: message.offset,
				trace_id: traceContext.trace_id,
			}),
		};
		if (traceContext.trace_id) context.trace_id = traceContext.trace_id;
		if (traceContext.span_id) context.span_id = traceContext.span_id;

		const record = toRawRecord(topic, message);
		if (!record) {
			context.logger.warn("Tombstone received, skipping");
			return;
		}

		const result = await this.processWithRetries(record, context, handler);

		switch (result.status) {
			case "success":
				break;

			case "skip":
				context.logger.debug("Message skipped", { reason: result.reason });
				break;

			case "retry":
				// processWithRetries converts exhausted retries to dlq
				break;

			case "dlq":
				await this.sendToDLQ(message, context, result.error);
				break;
		}
	}

	private extractHeaders(
		message: KafkaMessage,
	): Record<string, string | undefined> {
		const headers: Record<string, string | undefined> = {};
		if (message.headers) {
			for (const [key, value] of Object.entries(message.headers)) {
				headers[key] = value?.toString();
			}
		}
		return headers;
	}

	private async processWithRetries(
		record: RawLogRecord,
		context: MessageContext,
		handler: MessageHandler,
	): Promise<ProcessResult> {
		let lastError: Error | undefined;
		let retryCount = 0;

		while (retryCount <= this.maxRetries) {
			try {
				const result = await handler(record, context);

				if (result.status === "retry") {
					if (retryCount >= this.maxRetries) {
						return {
							status: "dlq",
							reason: `Max retries exceeded: ${result.reason}`,
							error: lastError ?? new RetryableError(result.reason, "MAX_RETRIES"),
						};
					}

					const delay = result.delay ?? this.retryBackoffMs * 2 ** retryCount;
					context.logger.warn("Retrying message", {
						retry_count: retryCount + 1,
						max_retries: this.maxRetries,
						delay_ms: delay,
						reason: result.reason,
					});

					await this.sleep(delay);
					retryCount++;
					continue;
				}

				return result;
			} catch (error) {
				lastError = error instanceof Error ? error : new Error(String(error));

				if (error instanceof NonRetryableError) {
					return {
						status: "dlq",
						reason: error.message,
						error,
					};
				}

				if (
					classifyError(lastError) === "retryable" &&
					retryCount < this.maxRetries
				) {
					const delay = this.retryBackoffMs * 2 ** retryCount;
					context.logger.warn("Retrying after error", {
						retry_count: retryCount + 1,
						max_retries: this.maxRetries,
						delay_ms: delay,
						error_message: lastError.message,
					});
					await this.sleep(delay);
					retryCount++;
					continue;
				}

				return {
					status: "dlq",
					reason: `Processing failed: ${lastError.message}`,
					error: lastError,
				};
			}
		}

		return {
			status: "dlq",
			reason: "Max retries exceeded",
			error: lastError ?? new Error("Unknown error"),
		};
	}

	private async sendToDLQ(
		message: KafkaMessage,
		context: MessageContext,
		error: Error,
	): Promise<void> {
		const classification = classifyError(error);

		if (!this.dlqPublisher) {
			context.logger.error("No DLQ publisher configured, message dropped", {
				error_message: error.message,
				error_classification: classification,
			});
			return;
		}

		const dlqMessage = {
			originalTopic: context.topic,
			originalPartition: context.partition,
			originalOffset: context.offset,
			originalKey: message.key ? message.key.toString("utf8") : null,
			originalMessage: message.value ? message.value.toString("utf8") : null,
			failureStage: "process" as const,
			errorClassification: classification,
			errorCode: errorCode(error),
			errorMessage: error.message,
			retryCount: this.maxRetries,
		};

		await this.dlqPublisher.publish(
			error.stack ? { ...dlqMessage, errorStack: error.stack } : dlqMessage,
		);

		context.logger.warn("Message sent to DLQ", {
			error_classification: classification,
			error_code: dlqMessage.errorCode,
		});
	}

	private sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}

export function createConsumer(options: ConsumerOptions): LogflowConsumer {
	return new LogflowConsumerImpl(options);
}
