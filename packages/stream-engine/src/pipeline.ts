import {
	type Alert,
	type DeadLetterEntry,
	type MetricSnapshot,
	type ParsedLogKind,
	type ParsedLogRecord,
	type RawLogRecord,
	STREAMS,
	type SpanRecord,
	type UnifiedLogEvent,
	metricStream,
} from "@logflow/core-contracts";
import type { PipelineConfig } from "@logflow/core-config";
import type { Logger, Metrics } from "@logflow/core-telemetry";
import { type AlertEvaluator, createAlertEvaluator } from "./alerts/rules.js";
import { EngineError } from "./errors.js";
import { normalize } from "./normalizer.js";
import { type ParserRegistry, createParserRegistry } from "./parsers/registry.js";
import { toDeadLetter } from "./parsers/types.js";
import { type ShutdownPolicy, WindowedAggregator } from "./windowing/aggregator.js";
import { LateEventCounters } from "./windowing/late-counters.js";
import { type AggregationInput, createAggregationQueries } from "./windowing/queries.js";
import { WatermarkTracker } from "./windowing/watermark.js";

export type PipelineOutput =
	| { kind: "parsed"; stream: string; key: string | null; record: ParsedLogRecord }
	| { kind: "span"; stream: string; key: string | null; record: SpanRecord }
	| { kind: "unified"; stream: string; key: string | null; event: UnifiedLogEvent }
	| { kind: "metric"; stream: string; key: string; snapshot: MetricSnapshot }
	| { kind: "alert"; stream: string; key: string; alert: Alert }
	| { kind: "dead_letter"; stream: string; key: string | null; entry: DeadLetterEntry };

/**
 * Receives pipeline output. `push` must not block: sinks that talk to a
 * broker buffer and flush on their own schedule.
 */
export interface OutputSink {
	push(output: PipelineOutput): void;
}

export interface LogPipelineOptions {
	config: PipelineConfig;
	sink: OutputSink;
	logger: Logger;
	metrics?: Metrics;
	/** Share late-event counters with another owner, e.g. a worker thread */
	counterBuffer?: SharedArrayBuffer;
}

export interface PipelineStats {
	/** Watermark of each query over the partitions that feed it */
	watermarks: Record<string, number | null>;
	/** Watermark of each input partition on its own */
	partitions: Record<string, number>;
	open_windows: Record<string, number>;
	late_events: Record<string, number>;
	clock_skew_events: number;
	records_ingested: number;
	dead_letters: number;
	windows_emitted: number;
	windows_discarded: number;
	alerts_raised: number;
}

export interface ShutdownSummary {
	policy: ShutdownPolicy;
	windows_flushed: number;
	windows_discarded: number;
}

const PARSED_STREAMS: Readonly<Record<ParsedLogKind, string>> = {
	structured: STREAMS.STRUCTURED_PARSED,
	syslog: STREAMS.SYSLOG_PARSED,
	nginx: STREAMS.NGINX_PARSED,
	app_legacy: STREAMS.APP_PARSED,
};

const CLOCK_SKEW_COUNTER = "clock_skew";

const NOOP_METRICS: Metrics = {
	increment() {},
	gauge() {},
	histogram() {},
	timing() {},
};

function aggregationInputs(
	record: ParsedLogRecord,
	event: UnifiedLogEvent,
): AggregationInput[] {
	const inputs: AggregationInput[] = [{ source: "unified", value: event }];
	if (record.kind === "syslog") {
		inputs.push({ source: "syslog", value: record });
	} else if (record.kind === "nginx") {
		inputs.push({ source: "nginx", value: record });
	}
	return inputs;
}

/**
 * A query and the watermark over the partitions that carry its input
 * source. A quiet topic only holds back the queries it feeds.
 */
interface QueryLane {
	readonly aggregator: WindowedAggregator;
	readonly watermark: WatermarkTracker;
}

/**
 * Parse, normalize, alert and aggregate one raw record at a time.
 * Each query's windows close as its own event-time watermark passes their
 * end.
 */
export class LogPipeline {
	private readonly registry: ParserRegistry;
	private readonly alerts: AlertEvaluator;
	private readonly lanes: QueryLane[];
	private readonly partitionClock: WatermarkTracker;
	private readonly counters: LateEventCounters;
	private readonly sink: OutputSink;
	private readonly logger: Logger;
	private readonly metrics: Metrics;
	private readonly maxClockSkewMs: number;
	private readonly shutdownPolicy: ShutdownPolicy;
	private closed = false;
	private recordsIngested = 0;
	private deadLetters = 0;
	private windowsEmitted = 0;
	private windowsDiscarded = 0;
	private alertsRaised = 0;

	constructor(options: LogPipelineOptions) {
		const { config } = options;
		this.registry = createParserRegistry({ syslog: config.syslog });
		this.alerts = createAlertEvaluator(config.alerts);
		const { allowedLatenessMs } = config.watermark;
		this.lanes = createAggregationQueries(config.queries).map((query) => ({
			aggregator: new WindowedAggregator(query, config.shardCount),
			watermark: new WatermarkTracker(allowedLatenessMs),
		}));
		this.partitionClock = new WatermarkTracker(allowedLatenessMs);
		this.counters = new LateEventCounters(
			[...this.lanes.map((lane) => lane.aggregator.query.name), CLOCK_SKEW_COUNTER],
			options.counterBuffer,
		);
		this.maxClockSkewMs = config.watermark.maxClockSkewMs;
		this.shutdownPolicy = config.shutdownPolicy;
		this.sink = options.sink;
		this.logger = options.logger.child({ component: "pipeline" });
		this.metrics = options.metrics ?? NOOP_METRICS;
	}

	ingest(raw: RawLogRecord, partition: number): void {
		if (this.closed) {
			throw new EngineError("Pipeline is shut down", "PIPELINE_CLOSED");
		}
		this.recordsIngested++;
		const partitionKey = `${raw.source_topic}:${partition}`;
		const result = this.registry.parse(raw);

		switch (result.status) {
			case "failed": {
				const entry = toDeadLetter(raw, result.failure);
				this.deadLetters++;
				this.sink.push({
					kind: "dead_letter",
					stream: STREAMS.DEAD_LETTER,
					key: raw.key,
					entry,
				});
				this.metrics.increment("records.dead_lettered", 1, {
					topic: raw.source_topic,
					reason: entry.reason,
				});
				this.logger.debug("Record dead-lettered", {
					topic: raw.source_topic,
					partition,
					reason: entry.reason,
					field: entry.field,
				});
				return;
			}

			case "log": {
				const record = Object.freeze(result.record);
				this.sink.push({
					kind: "parsed",
					stream: PARSED_STREAMS[record.kind],
					key: raw.key,
					record,
				});

				const event = normalize(record);
				this.sink.push({
					kind: "unified",
					stream: STREAMS.LOGS_UNIFIED,
					key: event.source_name,
					event,
				});
				this.metrics.increment("records.parsed", 1, { log_source: record.log_source });

				for (const alert of this.alerts.evaluateRecord(event)) {
					this.raise(alert);
				}

				this.aggregate(
					aggregationInputs(record, event),
					record.event_time,
					raw.ingest_time,
					partitionKey,
				);
				return;
			}

			case "spans": {
				for (const span of result.spans) {
					const frozen = Object.freeze(span);
					this.sink.push({
						kind: "span",
						stream: STREAMS.SPANS_PARSED,
						key: frozen.trace_id,
						record: frozen,
					});
					this.aggregate(
						[{ source: "span", value: frozen }],
						frozen.event_time,
						raw.ingest_time,
						partitionKey,
					);
				}
				this.metrics.increment("records.parsed", result.spans.length, { log_source: "otel" });
				return;
			}
		}
	}

	/**
	 * Apply the shutdown policy to every open window. The pipeline
	 * accepts no records afterwards.
	 */
	shutdown(): ShutdownSummary {
		if (this.closed) {
			return { policy: this.shutdownPolicy, windows_flushed: 0, windows_discarded: 0 };
		}
		this.closed = true;

		let flushed = 0;
		let discarded = 0;
		for (const { aggregator } of this.lanes) {
			const result = aggregator.flush(this.shutdownPolicy);
			for (const snapshot of result.snapshots) {
				this.emitSnapshot(snapshot);
			}
			flushed += result.snapshots.length;
			discarded += result.discarded;
		}
		this.windowsDiscarded += discarded;

		if (discarded > 0) {
			this.logger.warn("Open windows discarded on shutdown", {
				windows_discarded: discarded,
			});
		}
		this.logger.info("Pipeline shut down", {
			policy: this.shutdownPolicy,
			windows_flushed: flushed,
			windows_discarded: discarded,
		});

		return {
			policy: this.shutdownPolicy,
			windows_flushed: flushed,
			windows_discarded: discarded,
		};
	}

	stats(): PipelineStats {
		const counters = this.counters.snapshot();
		const lateEvents: Record<string, number> = {};
		const openWindows: Record<string, number> = {};
		const watermarks: Record<string, number | null> = {};
		for (const { aggregator, watermark } of this.lanes) {
			const name = aggregator.query.name;
			lateEvents[name] = counters[name] ?? 0;
			openWindows[name] = aggregator.openWindows();
			watermarks[name] = watermark.hasWatermark() ? watermark.current : null;
		}

		return {
			watermarks,
			partitions: this.partitionClock.partitions(),
			open_windows: openWindows,
			late_events: lateEvents,
			clock_skew_events: counters[CLOCK_SKEW_COUNTER] ?? 0,
			records_ingested: this.recordsIngested,
			dead_letters: this.deadLetters,
			windows_emitted: this.windowsEmitted,
			windows_discarded: this.windowsDiscarded,
			alerts_raised: this.alertsRaised,
		};
	}

	/**
	 * An event is clock-skewed when it runs further than the allowed skew
	 * ahead of both its own partition's watermark and the time the broker
	 * received it. Skewed events advance no watermark.
	 */
	private aggregate(
		inputs: readonly AggregationInput[],
		eventTime: number,
		ingestTime: number,
		partitionKey: string,
	): void {
		const partitionWatermark = this.partitionClock.watermarkOf(partitionKey);
		if (
			partitionWatermark !== null &&
			eventTime - partitionWatermark > this.maxClockSkewMs &&
			eventTime - ingestTime > this.maxClockSkewMs
		) {
			this.counters.increment(CLOCK_SKEW_COUNTER);
			this.metrics.increment("events.clock_skew");
			this.logger.warn("Clock-skewed event dropped from aggregation", {
				partition_key: partitionKey,
				event_time: eventTime,
				ingest_time: ingestTime,
				watermark: partitionWatermark,
				skew_ms: eventTime - partitionWatermark,
			});
			return;
		}
		this.partitionClock.observe(partitionKey, eventTime);

		for (const { aggregator, watermark } of this.lanes) {
			const { query } = aggregator;
			if (!inputs.some((input) => input.source === query.source)) continue;

			const current = watermark.current;
			for (const input of inputs) {
				const observation = query.observe(input);
				if (!observation) continue;

				if (aggregator.accumulate(observation, current) === "late") {
					this.counters.increment(query.name);
					this.metrics.increment("events.late", 1, { query: query.name });
					this.logger.debug("Late event dropped", {
						query: query.name,
						group_key: observation.group_key,
						event_time: eventTime,
						watermark: current,
					});
				}
			}

			const next = watermark.observe(partitionKey, eventTime);
			if (next > current) {
				for (const snapshot of aggregator.advance(next)) {
					this.emitSnapshot(snapshot);
				}
			}
		}
	}

	private emitSnapshot(snapshot: MetricSnapshot): void {
		this.windowsEmitted++;
		this.sink.push({
			kind: "metric",
			stream: metricStream(snapshot.query),
			key: snapshot.group_key,
			snapshot,
		});
		this.metrics.increment("windows.emitted", 1, { query: snapshot.query });

		for (const alert of this.alerts.evaluateWindow(snapshot)) {
			this.raise(alert);
		}
	}

	private raise(alert: Alert): void {
		this.alertsRaised++;
		this.sink.push({ kind: "alert", stream: alert.stream, key: alert.subject, alert });
		this.metrics.increment("alerts.raised", 1, {
			alert_type: alert.alert_type,
			severity: alert.severity,
		});
	}
}

export function createLogPipeline(options: LogPipelineOptions): LogPipeline {
	return new LogPipeline(options);
}
