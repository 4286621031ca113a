import type {
	GroupValue,
	NginxAccessRecord,
	SpanRecord,
	SyslogRecord,
	UnifiedLogEvent,
} from "@logflow/core-contracts";
import type { PipelineConfig, QueryConfig, QueryName } from "@logflow/core-config";
import { QueryConfigError } from "../errors.js";
import type { DeriveFn, Observation } from "./window-state.js";

export type AggregationInput =
	| { readonly source: "unified"; readonly value: UnifiedLogEvent }
	| { readonly source: "syslog"; readonly value: SyslogRecord }
	| { readonly source: "nginx"; readonly value: NginxAccessRecord }
	| { readonly source: "span"; readonly value: SpanRecord };

export type InputSource = AggregationInput["source"];

type ValueOf<S extends InputSource> = Extract<
	AggregationInput,
	{ source: S }
>["value"];

type FieldFn<T> = (value: T) => GroupValue | null;

export interface QueryDefinition<T> {
	readonly name: string;
	/** Inputs outside the query's scope, e.g. non-sshd syslog lines */
	readonly accepts?: (value: T) => boolean;
	/** Fields the query may be grouped by */
	readonly fields: Readonly<Record<string, FieldFn<T>>>;
	readonly counters: Readonly<Record<string, (value: T) => boolean>>;
	readonly measures: Readonly<Record<string, (value: T) => number | null>>;
	readonly derive?: DeriveFn;
}

export interface AggregationQuery {
	readonly name: string;
	readonly source: InputSource;
	readonly windowMs: number;
	readonly groupBy: readonly string[];
	readonly counterNames: readonly string[];
	readonly measureNames: readonly string[];
	readonly derive: DeriveFn;
	observe(input: AggregationInput): Observation | null;
}

export const QUERY_NAMES = {
	errorRateByService: "error-rate-by-service",
	latencyByService: "latency-by-service",
	volumeByEndpoint: "volume-by-endpoint",
	volumeBySourceAndSeverity: "volume-by-source-and-severity",
	sshFailuresByHost: "ssh-failures-by-host",
	httpStatusByCode: "http-status-by-code",
	requestsByClientIp: "requests-by-client-ip",
	spanMetrics: "span-metrics",
} as const satisfies Record<QueryName, string>;

/** Group value used when the grouped field is null on the input */
export const MISSING_GROUP_VALUE = "unknown";

/** Severities the error-rate query counts as errors; matches the default critical-log set */
const ERROR_SEVERITIES: ReadonlySet<string> = new Set([
	"ERROR",
	"CRITICAL",
	"EMERGENCY",
	"FATAL",
]);

const FAILED_PASSWORD = /Failed password/i;

const noDerived: DeriveFn = () => ({});

function ratio(numerator: number, denominator: number, scale = 1): number | null {
	return denominator === 0 ? null : (numerator * scale) / denominator;
}

const UNIFIED_FIELDS: Readonly<Record<string, FieldFn<UnifiedLogEvent>>> = {
	source_name: (e) => e.source_name,
	hostname: (e) => e.hostname,
	log_type: (e) => e.log_type,
	severity_label: (e) => e.severity_label,
	status_code: (e) => e.status_code,
};

const NGINX_FIELDS: Readonly<Record<string, FieldFn<NginxAccessRecord>>> = {
	client_ip: (r) => r.client_ip,
	method: (r) => r.method,
	path: (r) => r.path,
	status_code: (r) => r.status_code,
	protocol: (r) => r.protocol,
};

const SYSLOG_FIELDS: Readonly<Record<string, FieldFn<SyslogRecord>>> = {
	hostname: (r) => r.hostname,
	process: (r) => r.process,
	facility: (r) => r.facility,
	severity_label: (r) => r.severity_label,
};

const SPAN_FIELDS: Readonly<Record<string, FieldFn<SpanRecord>>> = {
	service_name: (s) => s.service_name,
	span_name: (s) => s.span_name,
};

const isHttpError = (r: NginxAccessRecord): boolean => r.status_code >= 400;

export const errorRateByService: QueryDefinition<UnifiedLogEvent> = {
	name: QUERY_NAMES.errorRateByService,
	fields: UNIFIED_FIELDS,
	counters: {
		errors: (e) => ERROR_SEVERITIES.has(e.severity_label.toUpperCase()),
	},
	measures: {},
	derive: (counters, count) => ({
		error_rate_pct: ratio(counters.errors ?? 0, count, 100),
	}),
};

export const latencyByService: QueryDefinition<UnifiedLogEvent> = {
	name: QUERY_NAMES.latencyByService,
	accepts: (e) => e.latency_ms !== null,
	fields: UNIFIED_FIELDS,
	counters: {},
	measures: { latency_ms: (e) => e.latency_ms },
};

export const volumeByEndpoint: QueryDefinition<NginxAccessRecord> = {
	name: QUERY_NAMES.volumeByEndpoint,
	fields: NGINX_FIELDS,
	counters: {
		errors: isHttpError,
		server_errors: (r) => r.status_code >= 500,
	},
	measures: {
		bytes_sent: (r) => r.bytes_sent,
		response_time_ms: (r) =>
			r.response_time_sec === null ? null : Math.round(r.response_time_sec * 1000),
	},
};

export const volumeBySourceAndSeverity: QueryDefinition<UnifiedLogEvent> = {
	name: QUERY_NAMES.volumeBySourceAndSeverity,
	fields: UNIFIED_FIELDS,
	counters: {},
	measures: {},
};

export const sshFailuresByHost: QueryDefinition<SyslogRecord> = {
	name: QUERY_NAMES.sshFailuresByHost,
	accepts: (r) => r.process === "sshd" && FAILED_PASSWORD.test(r.message ?? ""),
	fields: SYSLOG_FIELDS,
	counters: {},
	measures: {},
};

export const httpStatusByCode: QueryDefinition<NginxAccessRecord> = {
	name: QUERY_NAMES.httpStatusByCode,
	accepts: isHttpError,
	fields: NGINX_FIELDS,
	counters: {},
	measures: {},
};

export const requestsByClientIp: QueryDefinition<NginxAccessRecord> = {
	name: QUERY_NAMES.requestsByClientIp,
	fields: NGINX_FIELDS,
	counters: { errors: isHttpError },
	measures: { bytes_sent: (r) => r.bytes_sent },
	derive: (counters, count) => ({
		error_ratio: ratio(counters.errors ?? 0, count),
	}),
};

export const spanMetrics: QueryDefinition<SpanRecord> = {
	name: QUERY_NAMES.spanMetrics,
	fields: SPAN_FIELDS,
	counters: { errors: (s) => s.is_error },
	measures: { duration_ms: (s) => s.duration_ms },
	derive: (counters, count) => ({
		error_rate_pct: ratio(counters.errors ?? 0, count, 100),
	}),
};

export function groupKeyOf(
	groupBy: readonly string[],
	group: Readonly<Record<string, GroupValue>>,
): string {
	return groupBy.map((field) => `${field}=${group[field] ?? MISSING_GROUP_VALUE}`).join(",");
}

/**
 * Bind a definition to its configured window and grouping. Unknown or
 * repeated group-by fields are rejected here, at startup.
 */
export function bindQuery<S extends InputSource>(
	source: S,
	definition: QueryDefinition<ValueOf<S>>,
	config: QueryConfig,
	pick: (input: AggregationInput) => ValueOf<S> | null,
): AggregationQuery {
	const { name } = definition;
	if (!Number.isInteger(config.windowMs) || config.windowMs <= 0) {
		throw new QueryConfigError(name, `window must be a positive integer, got ${config.windowMs}`);
	}
	if (config.groupBy.length === 0) {
		throw new QueryConfigError(name, "at least one group-by field is required");
	}
	if (new Set(config.groupBy).size !== config.groupBy.length) {
		throw new QueryConfigError(name, `duplicate group-by field in ${config.groupBy.join(",")}`);
	}

	const extractors = config.groupBy.map((field) => {
		const extract = definition.fields[field];
		if (!extract) {
			throw new QueryConfigError(
				name,
				`cannot group by ${field}; expected one of ${Object.keys(definition.fields).join(", ")}`,
			);
		}
		return { field, extract };
	});

	const counters = Object.entries(definition.counters);
	const measures = Object.entries(definition.measures);
	const groupBy = [...config.groupBy];

	return {
		name,
		source,
		windowMs: config.windowMs,
		groupBy,
		counterNames: counters.map(([counter]) => counter),
		measureNames: measures.map(([measure]) => measure),
		derive: definition.derive ?? noDerived,
		observe(input) {
			const value = pick(input);
			if (value === null) return null;
			if (definition.accepts && !definition.accepts(value)) return null;

			const group: Record<string, GroupValue> = {};
			for (const { field, extract } of extractors) {
				group[field] = extract(value) ?? MISSING_GROUP_VALUE;
			}

			const values: Record<string, number> = {};
			for (const [measure, extract] of measures) {
				const v = extract(value);
				if (v !== null && Number.isFinite(v)) values[measure] = v;
			}

			return {
				event_time: value.event_time,
				group_key: groupKeyOf(groupBy, group),
				group,
				counters: counters.filter(([, test]) => test(value)).map(([counter]) => counter),
				values,
			};
		},
	};
}

const pickUnified = (input: AggregationInput): UnifiedLogEvent | null =>
	input.source === "unified" ? input.value : null;
const pickSyslog = (input: AggregationInput): SyslogRecord | null =>
	input.source === "syslog" ? input.value : null;
const pickNginx = (input: AggregationInput): NginxAccessRecord | null =>
	input.source === "nginx" ? input.value : null;
const pickSpan = (input: AggregationInput): SpanRecord | null =>
	input.source === "span" ? input.value : null;

/**
 * Every analytics query, each with its own window and grouping.
 */
export function createAggregationQueries(
	config: PipelineConfig["queries"],
): AggregationQuery[] {
	return [
		bindQuery("unified", errorRateByService, config.errorRateByService, pickUnified),
		bindQuery("unified", latencyByService, config.latencyByService, pickUnified),
		bindQuery("nginx", volumeByEndpoint, config.volumeByEndpoint, pickNginx),
		bindQuery(
			"unified",
			volumeBySourceAndSeverity,
			config.volumeBySourceAndSeverity,
			pickUnified,
		),
		bindQuery("syslog", sshFailuresByHost, config.sshFailuresByHost, pickSyslog),
		bindQuery("nginx", httpStatusByCode, config.httpStatusByCode, pickNginx),
		bindQuery("nginx", requestsByClientIp, config.requestsByClientIp, pickNginx),
		bindQuery("span", spanMetrics, config.spanMetrics, pickSpan),
	];
}
