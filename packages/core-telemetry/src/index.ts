export {
	createLogger,
	type Logger,
	type LogContext,
	type LoggerOptions,
} from "./logger.js";
export {
	initTracer,
	withSpan,
	injectTraceContext,
	extractTraceContext,
	type SpanOptions,
	type TracerOptions,
} from "./tracer.js";
export {
	createTagBuilder,
	ALLOWED_METRIC_KEYS,
	HIGH_CARDINALITY_TAGS,
	validateTags,
	validateMetricTags,
	filterMetricTags,
	sanitizeTagValue,
	isHighCardinality,
	isAllowedMetricKey,
	HighCardinalityMetricError,
	type ServiceTags,
	type MetricTags,
	type TagBuilder,
} from "./tags.js";
export {
	createMetrics,
	createStatsMetrics,
	type Metrics,
	type StatsClient,
} from "./metrics.js";
