// Pipeline
export {
	LogPipeline,
	createLogPipeline,
	type LogPipelineOptions,
	type OutputSink,
	type PipelineOutput,
	type PipelineStats,
	type ShutdownSummary,
} from "./pipeline.js";

// Parsers
export {
	createParserRegistry,
	formatForTopic,
	type LogFormat,
	type ParserRegistry,
	type ParserRegistryOptions,
	type RegistryResult,
} from "./parsers/registry.js";
export {
	decodePayload,
	toDeadLetter,
	type ParseFailure,
	type ParseResult,
} from "./parsers/types.js";
export { parseSyslog, resolveSyslogTimestamp, severityLabel } from "./parsers/syslog.js";
export { parseNginx, parseTimeLocal } from "./parsers/nginx.js";
export { parseAppLegacy, detectDialect, splitTopLevelPipes } from "./parsers/app-legacy.js";
export { parseStructured, structuredLogSchema } from "./parsers/structured.js";
export { parseOtelSpans, otlpTraceSchema } from "./parsers/otel.js";

// Normalizer
export { normalize, nginxSeverity } from "./normalizer.js";

// Windowing
export { assignWindow, WindowState, type WindowStatus } from "./windowing/window-state.js";
export { WindowedAggregator, type ShutdownPolicy } from "./windowing/aggregator.js";
export { WatermarkTracker } from "./windowing/watermark.js";
export { LateEventCounters } from "./windowing/late-counters.js";
export {
	QUERY_NAMES,
	createAggregationQueries,
	type AggregationInput,
	type AggregationQuery,
} from "./windowing/queries.js";

// Alerts
export { createAlertEvaluator, type AlertEvaluator } from "./alerts/rules.js";
export { classifyTier, type Tiers } from "./alerts/tiers.js";

export { EngineError, QueryConfigError, WindowStateError } from "./errors.js";
