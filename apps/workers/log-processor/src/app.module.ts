import { Module } from "@nestjs/common";
import { WorkerConfigModule } from "./config/config.module.js";
import { HealthModule } from "./health/health.module.js";
import { KafkaModule } from "./kafka/kafka.module.js";
import { LifecycleModule } from "./lifecycle/lifecycle.module.js";
import { TelemetryModule } from "./telemetry/telemetry.module.js";
import { WorkerModule } from "./worker/worker.module.js";

@Module({
	imports: [
		WorkerConfigModule.forRoot(),
		TelemetryModule,
		LifecycleModule,
		KafkaModule,
		WorkerModule,
		HealthModule,
	],
})
export class AppModule {}
