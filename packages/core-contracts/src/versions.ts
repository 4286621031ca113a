/**
 * Current schema versions for all event types
 */
export const SCHEMA_VERSIONS = {
	ENVELOPE: "v1",
	LOGS_PARSED: "v1",
	LOGS_UNIFIED: "v1",
	METRICS: "v1",
	ALERTS: "v1",
	DLQ: "v1",
} as const;

export type SchemaVersion =
	(typeof SCHEMA_VERSIONS)[keyof typeof SCHEMA_VERSIONS];
