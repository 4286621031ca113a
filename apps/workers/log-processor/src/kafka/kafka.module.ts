import { RAW_STREAMS } from "@logflow/core-contracts";
import {
	type DLQPublisher,
	type LogflowProducer,
	createConsumer,
	createDLQPublisher,
	createKafkaClient,
	createProducer,
	resolveTopic,
} from "@logflow/core-kafka";
import type { Logger } from "@logflow/core-telemetry";
import { Global, Module } from "@nestjs/common";
import type { Kafka } from "kafkajs";
import { WORKER_CONFIG, type WorkerConfig } from "../config/config.module.js";
import { LOGGER } from "../telemetry/telemetry.module.js";

export const KAFKA_CLIENT = "KAFKA_CLIENT";
export const KAFKA_PRODUCER = "KAFKA_PRODUCER";
export const KAFKA_CONSUMER = "KAFKA_CONSUMER";
export const DLQ_PUBLISHER = "DLQ_PUBLISHER";

/**
 * Topics consumed: every raw input stream under the deployment prefix
 */
export function inputTopics(config: WorkerConfig): string[] {
	return RAW_STREAMS.map((stream) => resolveTopic(stream, config.kafka.topicPrefix));
}

@Global()
@Module({
	providers: [
		{
			provide: KAFKA_CLIENT,
			useFactory: (config: WorkerConfig, logger: Logger) =>
				createKafkaClient({
					config: config.kafka,
					logger,
					logLevel: config.base.logLevel,
				}),
			inject: [WORKER_CONFIG, LOGGER],
		},
		{
			provide: KAFKA_PRODUCER,
			useFactory: (kafka: Kafka, config: WorkerConfig, logger: Logger) =>
				createProducer({
					kafka,
					logger,
					serviceName: config.base.service.name,
					serviceVersion: config.base.service.version,
				}),
			inject: [KAFKA_CLIENT, WORKER_CONFIG, LOGGER],
		},
		{
			provide: DLQ_PUBLISHER,
			useFactory: (producer: LogflowProducer, config: WorkerConfig, logger: Logger) =>
				createDLQPublisher({
					producer,
					logger,
					source: {
						service: config.base.service.name,
						version: config.base.service.version,
					},
					topicPrefix: config.kafka.topicPrefix,
				}),
			inject: [KAFKA_PRODUCER, WORKER_CONFIG, LOGGER],
		},
		{
			provide: KAFKA_CONSUMER,
			useFactory: (
				kafka: Kafka,
				config: WorkerConfig,
				logger: Logger,
				dlqPublisher: DLQPublisher,
			) =>
				createConsumer({
					kafka,
					logger,
					dlqPublisher,
					groupId: config.kafka.groupId,
					topics: inputTopics(config),
					fromBeginning: config.kafka.fromBeginning,
					maxRetries: config.kafka.maxRetries,
					retryBackoffMs: config.kafka.retryBackoffMs,
					sessionTimeout: config.kafka.sessionTimeout,
					heartbeatInterval: config.kafka.heartbeatInterval,
				}),
			inject: [KAFKA_CLIENT, WORKER_CONFIG, LOGGER, DLQ_PUBLISHER],
		},
	],
	exports: [KAFKA_CLIENT, KAFKA_PRODUCER, KAFKA_CONSUMER, DLQ_PUBLISHER],
})
export class KafkaModule {}
