import type { KafkaConfig } from "@logflow/core-config";
import type { Logger } from "@logflow/core-telemetry";
import {
	Kafka,
	type KafkaConfig as KafkaJSConfig,
	type SASLOptions,
	logLevel,
} from "kafkajs";

export interface KafkaClientOptions {
	config: KafkaConfig;
	logger: Logger;
	logLevel?: "debug" | "info" | "warn" | "error";
}

function toKafkaLogLevel(level: string): logLevel {
	switch (level) {
		case "debug":
			return logLevel.DEBUG;
		case "info":
			return logLevel.INFO;
		case "warn":
			return logLevel.WARN;
		case "error":
			return logLevel.ERROR;
		default:
			return logLevel.INFO;
	}
}

function toSasl(config: KafkaConfig): SASLOptions {
	const username = config.saslUsername ?? "";
	const password = config.saslPassword ?? "";
	switch (config.saslMechanism) {
		case "PLAIN":
			return { mechanism: "plain", username, password };
		case "SCRAM-SHA-256":
			return { mechanism: "scram-sha-256", username, password };
		case "SCRAM-SHA-512":
			return { mechanism: "scram-sha-512", username, password };
	}
}

export function createKafkaClient(options: KafkaClientOptions): Kafka {
	const { config, logger } = options;
	const kafkaLogger = logger.child({ component: "kafkajs" });

	const kafkaConfig: KafkaJSConfig = {
		clientId: config.clientId,
		brokers: config.bootstrapServers.split(",").map((b) => b.trim()),
		logLevel: toKafkaLogLevel(options.logLevel ?? "info"),
		logCreator: () => {
			return ({ level, log }) => {
				const { message, ...extra } = log;
				if (level === logLevel.ERROR) {
					kafkaLogger.error(message, extra);
				} else if (level === logLevel.WARN) {
					kafkaLogger.warn(message, extra);
				} else {
					kafkaLogger.debug(message, extra);
				}
			};
		},
		retry: {
			retries: config.maxRetries,
			initialRetryTime: config.retryBackoffMs,
			maxRetryTime: 30000,
		},
	};

	if (config.securityProtocol === "SASL_SSL") {
		kafkaConfig.ssl = true;
		kafkaConfig.sasl = toSasl(config);
	} else if (config.securityProtocol === "SSL") {
		kafkaConfig.ssl = true;
	}

	return new Kafka(kafkaConfig);
}
