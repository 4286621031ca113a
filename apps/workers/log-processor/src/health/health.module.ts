import type { LogflowConsumer, LogflowProducer } from "@logflow/core-kafka";
import type { LogPipeline } from "@logflow/stream-engine";
import { Module } from "@nestjs/common";
import { KAFKA_CONSUMER, KAFKA_PRODUCER } from "../kafka/kafka.module.js";
import { PIPELINE, WorkerModule } from "../worker/worker.module.js";
import { HealthController } from "./health.controller.js";
import { HEALTH_SERVICE, HealthService } from "./health.service.js";

@Module({
	imports: [WorkerModule],
	controllers: [HealthController],
	providers: [
		{
			provide: HEALTH_SERVICE,
			useFactory: (
				consumer: LogflowConsumer,
				producer: LogflowProducer,
				pipeline: LogPipeline,
			) => new HealthService(consumer, producer, pipeline),
			inject: [KAFKA_CONSUMER, KAFKA_PRODUCER, PIPELINE],
		},
	],
	exports: [HEALTH_SERVICE],
})
export class HealthModule {}
