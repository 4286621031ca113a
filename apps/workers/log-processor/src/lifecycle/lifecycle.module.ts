import type { Logger, Metrics } from "@logflow/core-telemetry";
import { Global, Module } from "@nestjs/common";
import { LOGGER, METRICS } from "../telemetry/telemetry.module.js";
import { LifecycleService } from "./lifecycle.service.js";

@Global()
@Module({
	providers: [
		{
			provide: LifecycleService,
			useFactory: (logger: Logger, metrics: Metrics) =>
				new LifecycleService(logger.child({ component: "lifecycle" }), metrics),
			inject: [LOGGER, METRICS],
		},
	],
	exports: [LifecycleService],
})
export class LifecycleModule {}
