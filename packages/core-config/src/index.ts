export {
	loadConfig,
	loadPipelineConfig,
	type ConfigLoaderOptions,
	type FullConfig,
} from "./loader.js";
export {
	baseConfigSchema,
	kafkaConfigSchema,
	datadogConfigSchema,
	pipelineConfigSchema,
	alertSeveritySchema,
} from "./schemas.js";
export type {
	BaseConfig,
	KafkaConfig,
	DatadogConfig,
	PipelineConfig,
	PipelineConfigInput,
	QueryConfig,
	QueryName,
	TieredThreshold,
	ServiceIdentity,
} from "./schemas.js";
export { ConfigError, MissingEnvVarError, ValidationError } from "./errors.js";
