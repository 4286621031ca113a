import type {
	DLQPublisher,
	LogflowConsumer,
	LogflowProducer,
} from "@logflow/core-kafka";
import type { Logger, Metrics } from "@logflow/core-telemetry";
import { type LogPipeline, createLogPipeline } from "@logflow/stream-engine";
import { Module } from "@nestjs/common";
import { WORKER_CONFIG, type WorkerConfig } from "../config/config.module.js";
import { DLQ_PUBLISHER, KAFKA_CONSUMER, KAFKA_PRODUCER } from "../kafka/kafka.module.js";
import { LifecycleService } from "../lifecycle/lifecycle.service.js";
import { LOGGER, METRICS } from "../telemetry/telemetry.module.js";
import { OutputPublisher } from "./output.publisher.js";
import { LogProcessorService } from "./worker.service.js";

export const OUTPUT_PUBLISHER = "OUTPUT_PUBLISHER";
export const PIPELINE = "PIPELINE";

@Module({
	providers: [
		{
			provide: OUTPUT_PUBLISHER,
			useFactory: (
				producer: LogflowProducer,
				dlqPublisher: DLQPublisher,
				config: WorkerConfig,
				logger: Logger,
				metrics: Metrics,
			) =>
				new OutputPublisher({
					producer,
					dlqPublisher,
					logger: logger.child({ component: "publisher" }),
					metrics,
					source: {
						service: config.base.service.name,
						version: config.base.service.version,
					},
					topicPrefix: config.kafka.topicPrefix,
				}),
			inject: [KAFKA_PRODUCER, DLQ_PUBLISHER, WORKER_CONFIG, LOGGER, METRICS],
		},
		{
			provide: PIPELINE,
			useFactory: (
				publisher: OutputPublisher,
				config: WorkerConfig,
				logger: Logger,
				metrics: Metrics,
			) =>
				createLogPipeline({
					config: config.pipeline,
					sink: publisher,
					logger,
					metrics,
				}),
			inject: [OUTPUT_PUBLISHER, WORKER_CONFIG, LOGGER, METRICS],
		},
		{
			provide: LogProcessorService,
			useFactory: (
				consumer: LogflowConsumer,
				producer: LogflowProducer,
				pipeline: LogPipeline,
				publisher: OutputPublisher,
				config: WorkerConfig,
				logger: Logger,
				metrics: Metrics,
				lifecycle: LifecycleService,
			) =>
				new LogProcessorService({
					consumer,
					producer,
					pipeline,
					publisher,
					config,
					logger,
					metrics,
					lifecycle,
				}),
			inject: [
				KAFKA_CONSUMER,
				KAFKA_PRODUCER,
				PIPELINE,
				OUTPUT_PUBLISHER,
				WORKER_CONFIG,
				LOGGER,
				METRICS,
				LifecycleService,
			],
		},
	],
	exports: [PIPELINE],
})
export class WorkerModule {}
