import type { Logger } from "@logflow/core-telemetry";
import { injectTraceContext } from "@logflow/core-telemetry";
import type {
	Kafka,
	Message as KafkaMessage,
	Producer,
	RecordMetadata,
} from "kafkajs";
import type { Envelope } from "./envelope.js";

export interface ProduceOptions {
	/** Partition key. Records without one are spread round-robin. */
	key?: string | null;
	headers?: Record<string, string>;
}

export interface OutgoingMessage {
	topic: string;
	envelope: Envelope;
	options?: ProduceOptions;
}

export interface LogflowProducer {
	connect(): Promise<void>;
	disconnect(): Promise<void>;
	isConnected(): boolean;
	send(
		topic: string,
		envelope: Envelope,
		options?: ProduceOptions,
	): Promise<RecordMetadata[]>;
	sendBatch(messages: OutgoingMessage[]): Promise<RecordMetadata[]>;
}

export interface ProducerOptions {
	kafka: Kafka;
	logger: Logger;
	serviceName: string;
	serviceVersion: string;
}

class LogflowProducerImpl implements LogflowProducer {
	private producer: Producer;
	private logger: Logger;
	private serviceName: string;
	private serviceVersion: string;
	private connected = false;

	constructor(options: ProducerOptions) {
		this.producer = options.kafka.producer({
			idempotent: true,
			maxInFlightRequests: 5,
		});
		this.logger = options.logger;
		this.serviceName = options.serviceName;
		this.serviceVersion = options.serviceVersion;
	}

	async connect(): Promise<void> {
		if (this.connected) return;
		await this.producer.connect();
		this.connected = true;
		this.logger.info("Kafka producer connected");
	}

	async disconnect(): Promise<void> {
		if (!this.connected) return;
		await this.producer.disconnect();
		this.connected = false;
		this.logger.info("Kafka producer disconnected");
	}

	isConnected(): boolean {
		return this.connected;
	}

	async send(
		topic: string,
		envelope: Envelope,
		options?: ProduceOptions,
	): Promise<RecordMetadata[]> {
		const result = await this.producer.send({
			topic,
			messages: [this.toMessage(envelope, options)],
		});

		this.logger.debug("Message sent", {
			topic,
			message_id: envelope.message_id,
			kind: envelope.kind,
		});

		return result;
	}

	async sendBatch(messages: OutgoingMessage[]): Promise<RecordMetadata[]> {
		if (messages.length === 0) {
			return [];
		}

		const topicMessages = new Map<string, KafkaMessage[]>();

		for (const { topic, envelope, options } of messages) {
			const existing = topicMessages.get(topic) ?? [];
			existing.push(this.toMessage(envelope, options));
			topicMessages.set(topic, existing);
		}

		const result = await this.producer.sendBatch({
			topicMessages: Array.from(topicMessages.entries()).map(
				([topic, batch]) => ({
					topic,
					messages: batch,
				}),
			),
		});

		this.logger.debug("Batch sent", {
			message_count: messages.length,
			topic_count: topicMessages.size,
		});

		return result;
	}

	private toMessage(envelope: Envelope, options?: ProduceOptions): KafkaMessage {
		const traceContext = injectTraceContext();

		const headers: Record<string, string> = {
			"x-logflow-service": this.serviceName,
			"x-logflow-version": this.serviceVersion,
			"x-logflow-schema-version": envelope.schema_version,
			"x-logflow-message-id": envelope.message_id,
			...(traceContext.trace_id && {
				"x-datadog-trace-id": traceContext.trace_id,
			}),
			...(traceContext.span_id && {
				"x-datadog-parent-id": traceContext.span_id,
			}),
			...options?.headers,
		};

		return {
			key: options?.key ?? null,
			value: JSON.stringify(envelope),
			headers,
		};
	}
}

export function createProducer(options: ProducerOptions): LogflowProducer {
	return new LogflowProducerImpl(options);
}
