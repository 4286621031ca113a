import { z } from "zod";
import { MissingEnvVarError, ValidationError } from "./errors.js";
import {
	type BaseConfig,
	type DatadogConfig,
	type KafkaConfig,
	type PipelineConfig,
	type QueryName,
	baseConfigSchema,
	datadogConfigSchema,
	kafkaConfigSchema,
	pipelineConfigSchema,
} from "./schemas.js";

export interface ConfigLoaderOptions {
	/** Throw on missing required vars instead of deferring to schema validation */
	strict?: boolean;
	/** Custom environment object (defaults to process.env) */
	env?: Record<string, string | undefined>;
}

type EnvValue = string | number | boolean | string[];

interface EnvVarDef {
	key: string;
	required?: boolean;
	default?: EnvValue;
	transform?: (value: string) => EnvValue;
}

function getEnvVar(
	env: Record<string, string | undefined>,
	def: EnvVarDef,
	strict: boolean,
): EnvValue | undefined {
	const value = env[def.key];

	if (value === undefined || value === "") {
		if (def.required && strict) {
			throw new MissingEnvVarError(def.key);
		}
		return def.default;
	}

	if (def.transform) {
		return def.transform(value);
	}

	return value;
}

const toBool = (v: string): boolean => v.toLowerCase() === "true" || v === "1";
const toInt = (v: string): number => Number.parseInt(v, 10);
// Strict: "12abc" becomes NaN and fails validation instead of reading as 12
const toNumber = (v: string): number => Number(v.trim());
const toList = (v: string): string[] =>
	v
		.split(",")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);

/**
 * Env var stem for each aggregation query, e.g. `WINDOW_SSH_FAILURES_BY_HOST_MS`
 */
const QUERY_ENV_STEMS: Record<QueryName, string> = {
	errorRateByService: "ERROR_RATE_BY_SERVICE",
	latencyByService: "LATENCY_BY_SERVICE",
	volumeByEndpoint: "VOLUME_BY_ENDPOINT",
	volumeBySourceAndSeverity: "VOLUME_BY_SOURCE_AND_SEVERITY",
	sshFailuresByHost: "SSH_FAILURES_BY_HOST",
	httpStatusByCode: "HTTP_STATUS_BY_CODE",
	requestsByClientIp: "REQUESTS_BY_CLIENT_IP",
	spanMetrics: "SPAN_METRICS",
};

export interface FullConfig {
	base: BaseConfig;
	kafka: KafkaConfig;
	pipeline: PipelineConfig;
	datadog: DatadogConfig;
}

const validateSchema = <S extends z.ZodTypeAny>(
	schema: S,
	data: unknown,
	name: string,
): z.output<S> => {
	const result = schema.safeParse(data);
	if (!result.success) {
		const errors = result.error.errors.map((e) => ({
			path: e.path.join("."),
			message: e.message,
		}));
		throw new ValidationError(`Invalid ${name} configuration`, errors);
	}
	return result.data;
};

/**
 * Read the pipeline section only. Exposed separately so tools and tests can
 * build an engine without Kafka settings.
 */
export function loadPipelineConfig(
	options: ConfigLoaderOptions = {},
): PipelineConfig {
	const env = options.env ?? process.env;
	const strict = options.strict ?? false;
	const read = (def: EnvVarDef) => getEnvVar(env, def, strict);

	const queries: Record<string, { windowMs?: EnvValue; groupBy?: EnvValue }> =
		{};
	for (const [name, stem] of Object.entries(QUERY_ENV_STEMS)) {
		queries[name] = {
			windowMs: read({ key: `WINDOW_${stem}_MS`, transform: toNumber }),
			groupBy: read({ key: `GROUP_BY_${stem}`, transform: toList }),
		};
	}

	const tiers = (stem: string, unit: string) => ({
		critical: read({ key: `ALERT_${stem}_CRITICAL_${unit}`, transform: toNumber }),
		warning: read({ key: `ALERT_${stem}_WARNING_${unit}`, transform: toNumber }),
		info: read({ key: `ALERT_${stem}_INFO_${unit}`, transform: toNumber }),
	});

	const pipelineRaw = {
		syslog: {
			defaultYear: read({
				key: "SYSLOG_DEFAULT_YEAR",
				required: true,
				transform: toNumber,
			}),
		},
		watermark: {
			allowedLatenessMs: read({
				key: "WATERMARK_ALLOWED_LATENESS_MS",
				transform: toNumber,
			}),
			maxClockSkewMs: read({
				key: "WATERMARK_MAX_CLOCK_SKEW_MS",
				transform: toNumber,
			}),
		},
		shardCount: read({ key: "PIPELINE_SHARD_COUNT", transform: toNumber }),
		shutdownPolicy: read({ key: "PIPELINE_SHUTDOWN_POLICY" }),
		queries,
		alerts: {
			criticalLog: {
				severities: read({ key: "ALERT_CRITICAL_LOG_SEVERITIES", transform: toList }),
				severity: read({ key: "ALERT_CRITICAL_LOG_SEVERITY" }),
			},
			errorRate: tiers("ERROR_RATE", "PCT"),
			latencySla: tiers("LATENCY", "MS"),
			sshBruteForce: tiers("SSH_FAILURES", "COUNT"),
			httpStatusAnomaly: tiers("HTTP_STATUS", "COUNT"),
			suspiciousIp: {
				minRequests: read({
					key: "ALERT_SUSPICIOUS_IP_MIN_REQUESTS",
					transform: toNumber,
				}),
				minErrorRatio: read({
					key: "ALERT_SUSPICIOUS_IP_MIN_ERROR_RATIO",
					transform: toNumber,
				}),
				severity: read({ key: "ALERT_SUSPICIOUS_IP_SEVERITY" }),
			},
		},
	};

	return validateSchema(pipelineConfigSchema, pipelineRaw, "pipeline");
}

export function loadConfig(options: ConfigLoaderOptions = {}): FullConfig {
	const env = options.env ?? process.env;
	const strict = options.strict ?? false;

	// Extract commonly reused values first
	const serviceName = String(
		getEnvVar(env, { key: "SERVICE_NAME", required: true }, strict) ?? "",
	);
	const serviceVersion = String(
		getEnvVar(env, { key: "SERVICE_VERSION", default: "0.1.0" }, strict),
	);
	const envName = String(
		getEnvVar(env, { key: "ENV", default: "dev" }, strict),
	);

	const baseRaw = {
		env: envName,
		nodeEnv: getEnvVar(
			env,
			{ key: "NODE_ENV", default: "development" },
			strict,
		),
		service: {
			name: serviceName,
			version: serviceVersion,
			team: getEnvVar(env, { key: "TEAM", default: "observability" }, strict),
			cloud: getEnvVar(env, { key: "CLOUD" }, strict),
			region: getEnvVar(env, { key: "REGION" }, strict),
			domain: getEnvVar(env, { key: "DOMAIN" }, strict),
			pipeline: getEnvVar(env, { key: "PIPELINE" }, strict),
		},
		logLevel: getEnvVar(env, { key: "LOG_LEVEL", default: "info" }, strict),
		logFormat: getEnvVar(env, { key: "LOG_FORMAT", default: "json" }, strict),
		healthPort: getEnvVar(
			env,
			{ key: "HEALTH_PORT", default: 3000, transform: toInt },
			strict,
		),
	};

	const kafkaRaw = {
		bootstrapServers: getEnvVar(
			env,
			{ key: "KAFKA_BOOTSTRAP_SERVERS", required: true },
			strict,
		),
		securityProtocol: getEnvVar(
			env,
			{ key: "KAFKA_SECURITY_PROTOCOL", default: "SASL_SSL" },
			strict,
		),
		saslMechanism: getEnvVar(
			env,
			{ key: "KAFKA_SASL_MECHANISM", default: "PLAIN" },
			strict,
		),
		saslUsername: getEnvVar(env, { key: "KAFKA_SASL_USERNAME" }, strict),
		saslPassword: getEnvVar(env, { key: "KAFKA_SASL_PASSWORD" }, strict),
		clientId: getEnvVar(
			env,
			{ key: "KAFKA_CLIENT_ID", default: serviceName },
			strict,
		),
		groupId: getEnvVar(
			env,
			{ key: "KAFKA_GROUP_ID", default: `${serviceName}-group` },
			strict,
		),
		topicPrefix: getEnvVar(env, { key: "KAFKA_TOPIC_PREFIX" }, strict),
		fromBeginning: getEnvVar(
			env,
			{ key: "KAFKA_FROM_BEGINNING", default: false, transform: toBool },
			strict,
		),
		sessionTimeout: getEnvVar(
			env,
			{ key: "KAFKA_SESSION_TIMEOUT", default: 30000, transform: toInt },
			strict,
		),
		heartbeatInterval: getEnvVar(
			env,
			{ key: "KAFKA_HEARTBEAT_INTERVAL", default: 3000, transform: toInt },
			strict,
		),
		maxRetries: getEnvVar(
			env,
			{ key: "KAFKA_MAX_RETRIES", default: 5, transform: toInt },
			strict,
		),
		retryBackoffMs: getEnvVar(
			env,
			{ key: "KAFKA_RETRY_BACKOFF_MS", default: 100, transform: toInt },
			strict,
		),
	};

	const datadogRaw = {
		apiKey: getEnvVar(env, { key: "DD_API_KEY" }, strict),
		site: getEnvVar(env, { key: "DD_SITE", default: "datadoghq.com" }, strict),
		env: getEnvVar(env, { key: "DD_ENV", default: envName }, strict),
		service: getEnvVar(
			env,
			{ key: "DD_SERVICE", default: serviceName },
			strict,
		),
		version: getEnvVar(
			env,
			{ key: "DD_VERSION", default: serviceVersion },
			strict,
		),
		logsInjection: getEnvVar(
			env,
			{ key: "DD_LOGS_INJECTION", default: true, transform: toBool },
			strict,
		),
		traceEnabled: getEnvVar(
			env,
			{ key: "DD_TRACE_ENABLED", default: false, transform: toBool },
			strict,
		),
		runtimeMetricsEnabled: getEnvVar(
			env,
			{ key: "DD_RUNTIME_METRICS_ENABLED", default: true, transform: toBool },
			strict,
		),
	};

	// Validate with Zod - it applies defaults and transforms
	return {
		base: validateSchema(baseConfigSchema, baseRaw, "base"),
		kafka: validateSchema(kafkaConfigSchema, kafkaRaw, "kafka"),
		pipeline: loadPipelineConfig(options),
		datadog: validateSchema(datadogConfigSchema, datadogRaw, "datadog"),
	};
}
