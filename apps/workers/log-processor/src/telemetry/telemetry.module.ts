import {
	type Logger,
	type TagBuilder,
	createLogger,
	createMetrics,
	createTagBuilder,
	initTracer,
} from "@logflow/core-telemetry";
import { Global, Module } from "@nestjs/common";
import { WORKER_CONFIG, type WorkerConfig } from "../config/config.module.js";
import { NestLogger } from "./nest-logger.js";

export const LOGGER = "LOGGER";
export const METRICS = "METRICS";
export const TAG_BUILDER = "TAG_BUILDER";

const METRIC_PREFIX = "logflow";

@Global()
@Module({
	providers: [
		{
			provide: TAG_BUILDER,
			useFactory: (config: WorkerConfig) =>
				createTagBuilder(config.base.service, config.base.env),
			inject: [WORKER_CONFIG],
		},
		{
			provide: LOGGER,
			useFactory: (config: WorkerConfig, tags: TagBuilder) =>
				createLogger({
					level: config.base.logLevel,
					serviceTags: tags.getServiceTags(),
					pretty: config.base.logFormat === "pretty",
				}),
			inject: [WORKER_CONFIG, TAG_BUILDER],
		},
		{
			provide: METRICS,
			useFactory: (config: WorkerConfig, tags: TagBuilder) => {
				const baseTags = tags.getServiceTags();
				if (!config.datadog.traceEnabled) {
					return createMetrics({ prefix: METRIC_PREFIX, baseTags });
				}
				const tracer = initTracer({
					service: config.datadog.service,
					version: config.datadog.version,
					env: config.datadog.env,
					logInjection: config.datadog.logsInjection,
					runtimeMetrics: config.datadog.runtimeMetricsEnabled,
				});
				return createMetrics({ prefix: METRIC_PREFIX, baseTags, tracer });
			},
			inject: [WORKER_CONFIG, TAG_BUILDER],
		},
		{
			provide: NestLogger,
			useFactory: (logger: Logger) => new NestLogger(logger.child({ component: "nest" })),
			inject: [LOGGER],
		},
	],
	exports: [TAG_BUILDER, LOGGER, METRICS, NestLogger],
})
export class TelemetryModule {}
