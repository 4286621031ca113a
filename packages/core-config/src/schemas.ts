import { z } from "zod";

export const serviceIdentitySchema = z.object({
	name: z.string().min(1),
	version: z.string().min(1),
	team: z.string().min(1),
	cloud: z.string().default("local"),
	region: z.string().default("local"),
	domain: z.string().default("logs"),
	pipeline: z.string().default("log-processing"),
});

export type ServiceIdentity = z.infer<typeof serviceIdentitySchema>;

export const baseConfigSchema = z.object({
	env: z.enum(["dev", "staging", "prod"]).default("dev"),
	nodeEnv: z.enum(["development", "production", "test"]).default("development"),
	service: serviceIdentitySchema,
	logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
	logFormat: z.enum(["json", "pretty"]).default("json"),
	healthPort: z.number().int().positive().default(3000),
});

export type BaseConfig = z.infer<typeof baseConfigSchema>;

export const kafkaConfigSchema = z.object({
	bootstrapServers: z.string().min(1),
	securityProtocol: z
		.enum(["SASL_SSL", "PLAINTEXT", "SSL"])
		.default("SASL_SSL"),
	saslMechanism: z
		.enum(["PLAIN", "SCRAM-SHA-256", "SCRAM-SHA-512"])
		.default("PLAIN"),
	saslUsername: z.string().optional(),
	saslPassword: z.string().optional(),
	clientId: z.string().min(1),
	groupId: z.string().min(1),
	/** Prepended to every topic name, e.g. `staging.` */
	topicPrefix: z.string().default(""),
	fromBeginning: z.boolean().default(false),
	sessionTimeout: z.number().default(30000),
	heartbeatInterval: z.number().default(3000),
	maxRetries: z.number().default(5),
	retryBackoffMs: z.number().default(100),
});

export type KafkaConfig = z.infer<typeof kafkaConfigSchema>;

export const datadogConfigSchema = z.object({
	apiKey: z.string().optional(),
	site: z.string().default("datadoghq.com"),
	env: z.string().min(1),
	service: z.string().min(1),
	version: z.string().min(1),
	logsInjection: z.boolean().default(true),
	traceEnabled: z.boolean().default(false),
	runtimeMetricsEnabled: z.boolean().default(true),
});

export type DatadogConfig = z.infer<typeof datadogConfigSchema>;

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

const MINUTE_MS = 60_000;

function queryConfigSchema(windowMs: number, groupBy: string[]) {
	return z
		.object({
			windowMs: z.number().int().positive().default(windowMs),
			groupBy: z.array(z.string().min(1)).min(1).default(groupBy),
		})
		.default({});
}

export type QueryConfig = z.infer<ReturnType<typeof queryConfigSchema>>;

export const alertSeveritySchema = z.enum(["CRITICAL", "WARNING", "INFO"]);

/**
 * Severity tiers of a window rule. `info` is null for rules that only have
 * two tiers.
 */
function tieredThresholdSchema(
	critical: number,
	warning: number,
	info: number | null,
) {
	return z
		.object({
			critical: z.number().finite().default(critical),
			warning: z.number().finite().default(warning),
			info: z.number().finite().nullable().default(info),
		})
		.refine(
			(t) => t.critical >= t.warning && (t.info === null || t.warning >= t.info),
			{ message: "Thresholds must satisfy critical >= warning >= info" },
		)
		.default({});
}

export type TieredThreshold = z.infer<ReturnType<typeof tieredThresholdSchema>>;

export const pipelineConfigSchema = z.object({
	syslog: z.object({
		/** RFC-3164 timestamps carry no year; there is deliberately no default */
		defaultYear: z.number().int().min(1970).max(9999),
	}),
	watermark: z
		.object({
			allowedLatenessMs: z.number().int().nonnegative().default(5000),
			maxClockSkewMs: z.number().int().positive().default(60 * MINUTE_MS),
		})
		.default({}),
	shardCount: z.number().int().min(1).max(256).default(4),
	shutdownPolicy: z.enum(["flush", "discard"]).default("flush"),
	queries: z
		.object({
			errorRateByService: queryConfigSchema(MINUTE_MS, ["source_name"]),
			latencyByService: queryConfigSchema(MINUTE_MS, ["source_name"]),
			volumeByEndpoint: queryConfigSchema(MINUTE_MS, ["method", "path"]),
			volumeBySourceAndSeverity: queryConfigSchema(MINUTE_MS, [
				"log_type",
				"severity_label",
			]),
			sshFailuresByHost: queryConfigSchema(5 * MINUTE_MS, ["hostname"]),
			httpStatusByCode: queryConfigSchema(MINUTE_MS, ["status_code"]),
			requestsByClientIp: queryConfigSchema(5 * MINUTE_MS, ["client_ip"]),
			spanMetrics: queryConfigSchema(MINUTE_MS, ["service_name", "span_name"]),
		})
		.default({}),
	alerts: z
		.object({
			criticalLog: z
				.object({
					severities: z
						.array(z.string().min(1))
						.min(1)
						.default(["ERROR", "CRITICAL", "EMERGENCY", "FATAL"]),
					severity: alertSeveritySchema.default("CRITICAL"),
				})
				.default({}),
			/** Error rate in percent, strict comparison */
			errorRate: tieredThresholdSchema(10, 5, null),
			/** Max latency in milliseconds, strict comparison */
			latencySla: tieredThresholdSchema(5000, 2000, null),
			/** Failed sshd logins per host, inclusive comparison */
			sshBruteForce: tieredThresholdSchema(10, 5, 3),
			/** 4xx/5xx responses per status code, strict comparison */
			httpStatusAnomaly: tieredThresholdSchema(100, 50, 10),
			suspiciousIp: z
				.object({
					minRequests: z.number().int().nonnegative().default(20),
					minErrorRatio: z.number().min(0).max(1).default(0.5),
					severity: alertSeveritySchema.default("WARNING"),
				})
				.default({}),
		})
		.default({}),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type QueryName = keyof PipelineConfig["queries"];
