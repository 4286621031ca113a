import type { RawLogRecord } from "@logflow/core-contracts";
import {
	type LogflowConsumer,
	type LogflowProducer,
	type MessageContext,
	type ProcessResult,
	streamForTopic,
} from "@logflow/core-kafka";
import { type Logger, type Metrics, withSpan } from "@logflow/core-telemetry";
import type { LogPipeline } from "@logflow/stream-engine";
import type { OnApplicationBootstrap } from "@nestjs/common";
import type { WorkerConfig } from "../config/config.module.js";
import type { LifecycleService } from "../lifecycle/lifecycle.service.js";
import type { OutputPublisher } from "./output.publisher.js";

const STATS_INTERVAL_MS = 10_000;

export interface LogProcessorDeps {
	consumer: LogflowConsumer;
	producer: LogflowProducer;
	pipeline: LogPipeline;
	publisher: OutputPublisher;
	config: WorkerConfig;
	logger: Logger;
	metrics: Metrics;
	lifecycle: LifecycleService;
}

/**
 * Feeds consumed raw records through the pipeline and publishes what it
 * produces before the offset is committed.
 */
export class LogProcessorService implements OnApplicationBootstrap {
	private readonly consumer: LogflowConsumer;
	private readonly producer: LogflowProducer;
	private readonly pipeline: LogPipeline;
	private readonly publisher: OutputPublisher;
	private readonly config: WorkerConfig;
	private readonly logger: Logger;
	private readonly metrics: Metrics;
	private readonly lifecycle: LifecycleService;
	/** Position of the last record given to the pipeline */
	private lastIngested: string | null = null;
	private statsTimer: NodeJS.Timeout | null = null;
	private stopped = false;

	constructor(deps: LogProcessorDeps) {
		this.consumer = deps.consumer;
		this.producer = deps.producer;
		this.pipeline = deps.pipeline;
		this.publisher = deps.publisher;
		this.config = deps.config;
		this.logger = deps.logger.child({ stage: "process" });
		this.metrics = deps.metrics;
		this.lifecycle = deps.lifecycle;
	}

	async onApplicationBootstrap(): Promise<void> {
		await this.producer.connect();
		await this.consumer.connect();
		await this.consumer.subscribe();
		this.lifecycle.onShutdown(() => this.stop());

		this.statsTimer = setInterval(() => this.reportStats(), STATS_INTERVAL_MS);
		this.statsTimer.unref();

		this.logger.info("Log processor starting", {
			topic_prefix: this.config.kafka.topicPrefix,
			shutdown_policy: this.config.pipeline.shutdownPolicy,
			shard_count: this.config.pipeline.shardCount,
		});
		await this.consumer.run((record, context) => this.handle(record, context));
	}

	/**
	 * Ingest one record and publish its outputs. A retry of the same
	 * offset only republishes, so windows never count a record twice.
	 */
	async handle(record: RawLogRecord, context: MessageContext): Promise<ProcessResult> {
		const stream = streamForTopic(record.source_topic, this.config.kafka.topicPrefix);
		const position = `${context.topic}:${context.partition}:${context.offset}`;

		return withSpan(
			"logflow.process",
			{ resource: stream, tags: { topic: context.topic } },
			async () => {
				if (this.lastIngested !== position) {
					this.pipeline.ingest({ ...record, source_topic: stream }, context.partition);
					this.lastIngested = position;
					this.metrics.increment("records.consumed", 1, { topic: context.topic });
				}

				try {
					await this.publisher.flush({
						topic: context.topic,
						partition: context.partition,
						offset: context.offset,
					});
				} catch (error) {
					const message = error instanceof Error ? error.message : String(error);
					context.logger.warn("Publishing outputs failed", {
						error_message: message,
						pending: this.publisher.size,
					});
					return { status: "retry", reason: `publish failed: ${message}` };
				}

				return { status: "success" };
			},
		);
	}

	/**
	 * Stop consuming, close the pipeline under its shutdown policy and
	 * publish whatever that produced.
	 */
	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;

		if (this.statsTimer) {
			clearInterval(this.statsTimer);
			this.statsTimer = null;
		}

		await this.consumer.disconnect();
		const summary = this.pipeline.shutdown();
		await this.publisher.flush();
		await this.producer.disconnect();

		this.logger.info("Log processor stopped", {
			policy: summary.policy,
			windows_flushed: summary.windows_flushed,
			windows_discarded: summary.windows_discarded,
		});
	}

	reportStats(): void {
		const stats = this.pipeline.stats();
		for (const [query, open] of Object.entries(stats.open_windows)) {
			this.metrics.gauge("windows.open", open, { query });
		}
		for (const [query, late] of Object.entries(stats.late_events)) {
			this.metrics.gauge("events.late_total", late, { query });
		}
		this.metrics.gauge("events.clock_skew_total", stats.clock_skew_events);
		for (const [query, watermark] of Object.entries(stats.watermarks)) {
			if (watermark === null) continue;
			this.metrics.gauge("watermark.lag_ms", Date.now() - watermark, { query });
		}
	}
}
