import type { ServiceIdentity } from "@logflow/core-config";

/**
 * Required tags for all telemetry (metrics, logs, traces)
 */
export const REQUIRED_TAGS = ["env", "service", "version"] as const;

const OPTIONAL_TAGS = [
	"team",
	"cloud",
	"region",
	"domain",
	"pipeline",
	"stage",
] as const;

/**
 * Low-cardinality dimensions accepted on metrics in addition to the
 * required and optional tags.
 */
const APPROVED_METRIC_DIMENSIONS = [
	"error_code",
	"reason",
	"status",
	"operation",
	"topic",
	"query",
	"log_source",
	"alert_type",
	"severity",
] as const;

/**
 * Tags that belong in logs and span attributes only. Group keys and
 * client addresses are unbounded in a log stream.
 */
export const HIGH_CARDINALITY_TAGS = [
	"group_key",
	"client_ip",
	"hostname",
	"trace_id",
	"span_id",
	"message_id",
	"dlq_id",
	"offset",
] as const;

type ApprovedMetricDimension = (typeof APPROVED_METRIC_DIMENSIONS)[number];

export const ALLOWED_METRIC_KEYS = [
	...REQUIRED_TAGS,
	...OPTIONAL_TAGS,
	...APPROVED_METRIC_DIMENSIONS,
] as const;

export interface ServiceTags {
	env: string;
	service: string;
	version: string;
	team?: string;
	cloud?: string;
	region?: string;
	domain?: string;
	pipeline?: string;
	stage?: string;
}

export type MetricTags = ServiceTags &
	Partial<Record<ApprovedMetricDimension, string>>;

/**
 * Sanitize a tag value for Datadog: lowercase, special characters
 * collapsed to underscores, at most 200 characters.
 */
export function sanitizeTagValue(value: string): string {
	return value
		.toLowerCase()
		.replace(/[^a-z0-9_\-./]/g, "_")
		.replace(/_+/g, "_")
		.slice(0, 200);
}

export function validateTags(
	tags: Record<string, string | undefined>,
	context: string,
): void {
	const missing = REQUIRED_TAGS.filter((tag) => !tags[tag]);
	if (missing.length > 0) {
		throw new Error(
			`Missing required tags in ${context}: ${missing.join(", ")}`,
		);
	}
}

const HIGH_CARDINALITY_SET: ReadonlySet<string> = new Set(HIGH_CARDINALITY_TAGS);
const ALLOWED_METRIC_SET: ReadonlySet<string> = new Set(ALLOWED_METRIC_KEYS);

export function isHighCardinality(tagName: string): boolean {
	return HIGH_CARDINALITY_SET.has(tagName);
}

export function isAllowedMetricKey(tagName: string): boolean {
	return ALLOWED_METRIC_SET.has(tagName);
}

export class HighCardinalityMetricError extends Error {
	constructor(
		public readonly forbiddenKeys: string[],
		context?: string,
	) {
		super(
			`High-cardinality tags not allowed in metrics${context ? ` (${context})` : ""}: ${forbiddenKeys.join(", ")}. ` +
				"Put them on log lines or span attributes instead.",
		);
		this.name = "HighCardinalityMetricError";
	}
}

export function validateMetricTags(
	tags: Record<string, string | undefined>,
	context?: string,
): void {
	const forbiddenKeys = Object.keys(tags).filter((key) =>
		isHighCardinality(key),
	);
	if (forbiddenKeys.length > 0) {
		throw new HighCardinalityMetricError(forbiddenKeys, context);
	}
}

/**
 * Keep only allowed metric keys with a defined value. Used on the hot
 * path where throwing per emission is not an option.
 */
export function filterMetricTags(
	tags: Record<string, string | undefined>,
): Record<string, string> {
	const filtered: Record<string, string> = {};
	for (const [key, value] of Object.entries(tags)) {
		if (value !== undefined && isAllowedMetricKey(key)) {
			filtered[key] = value;
		}
	}
	return filtered;
}

function definedOnly(
	tags: Record<string, string | undefined>,
): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(tags)) {
		if (value !== undefined) {
			result[key] = value;
		}
	}
	return result;
}

export interface TagBuilder {
	getServiceTags(): ServiceTags;
	/** Throws HighCardinalityMetricError on a forbidden key. */
	forMetric(extra?: Record<string, string | undefined>): Record<string, string>;
	forLog(extra?: Record<string, string | undefined>): Record<string, string>;
	forStage(
		stage: string,
		extra?: Record<string, string | undefined>,
	): Record<string, string>;
}

export function createTagBuilder(
	identity: ServiceIdentity,
	env: string,
): TagBuilder {
	const baseTags: ServiceTags = {
		env,
		service: identity.name,
		version: identity.version,
		team: identity.team,
		cloud: identity.cloud,
		region: identity.region,
		domain: identity.domain,
		pipeline: identity.pipeline,
	};

	return {
		getServiceTags(): ServiceTags {
			return { ...baseTags };
		},

		forMetric(extra) {
			const tags = { ...baseTags, ...extra };
			validateMetricTags(tags, `forMetric(${identity.name})`);
			return definedOnly(tags);
		},

		forLog(extra) {
			return definedOnly({ ...baseTags, ...extra });
		},

		forStage(stage, extra) {
			return definedOnly({ ...baseTags, stage, ...extra });
		},
	};
}
