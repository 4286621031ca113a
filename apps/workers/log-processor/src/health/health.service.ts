import type { LogflowConsumer, LogflowProducer } from "@logflow/core-kafka";
import type { LogPipeline, PipelineStats } from "@logflow/stream-engine";

export const HEALTH_SERVICE = "HEALTH_SERVICE";

export interface ComponentHealth {
	status: "ok" | "unhealthy";
	message?: string;
}

export interface HealthResponse {
	status: "ok" | "unhealthy";
	timestamp: string;
	checks: {
		consumer: ComponentHealth;
		producer: ComponentHealth;
	};
	pipeline: PipelineStats;
}

function connectionCheck(connected: boolean, name: string): ComponentHealth {
	return connected
		? { status: "ok" }
		: { status: "unhealthy", message: `${name} not connected` };
}

export class HealthService {
	constructor(
		private readonly consumer: LogflowConsumer,
		private readonly producer: LogflowProducer,
		private readonly pipeline: LogPipeline,
	) {}

	check(now: Date = new Date()): HealthResponse {
		const checks = {
			consumer: connectionCheck(this.consumer.isConnected(), "Kafka consumer"),
			producer: connectionCheck(this.producer.isConnected(), "Kafka producer"),
		};

		const allOk = Object.values(checks).every((c) => c.status === "ok");

		return {
			status: allOk ? "ok" : "unhealthy",
			timestamp: now.toISOString(),
			checks,
			pipeline: this.pipeline.stats(),
		};
	}
}
