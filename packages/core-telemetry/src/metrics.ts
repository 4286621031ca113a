import type { Tracer } from "dd-trace";
import { type MetricTags, filterMetricTags } from "./tags.js";

export interface Metrics {
	increment(name: string, value?: number, tags?: Record<string, string>): void;
	gauge(name: string, value: number, tags?: Record<string, string>): void;
	histogram(name: string, value: number, tags?: Record<string, string>): void;
	timing(name: string, durationMs: number, tags?: Record<string, string>): void;
}

interface MetricsOptions {
	prefix: string;
	baseTags: MetricTags;
	tracer?: Tracer;
}

/**
 * The part of dd-trace's DogStatsD client used here. Tags are an object
 * keyed by tag name.
 */
interface StatsClient {
	increment(stat: string, value?: number, tags?: Record<string, string>): void;
	gauge(stat: string, value?: number, tags?: Record<string, string>): void;
	distribution(
		stat: string,
		value?: number,
		tags?: Record<string, string>,
	): void;
}

class DatadogMetrics implements Metrics {
	private prefix: string;
	private baseTags: Record<string, string>;
	private dogstatsd: StatsClient;

	constructor(options: MetricsOptions, client: StatsClient) {
		this.prefix = options.prefix;
		this.baseTags = filterMetricTags({ ...options.baseTags });
		this.dogstatsd = client;
	}

	private formatTags(extraTags?: Record<string, string>): Record<string, string> {
		return { ...this.baseTags, ...filterMetricTags(extraTags ?? {}) };
	}

	private formatName(name: string): string {
		return `${this.prefix}.${name}`;
	}

	increment(name: string, value = 1, tags?: Record<string, string>): void {
		this.dogstatsd.increment(
			this.formatName(name),
			value,
			this.formatTags(tags),
		);
	}

	gauge(name: string, value: number, tags?: Record<string, string>): void {
		this.dogstatsd.gauge(this.formatName(name), value, this.formatTags(tags));
	}

	histogram(name: string, value: number, tags?: Record<string, string>): void {
		this.dogstatsd.distribution(
			this.formatName(name),
			value,
			this.formatTags(tags),
		);
	}

	timing(
		name: string,
		durationMs: number,
		tags?: Record<string, string>,
	): void {
		this.histogram(`${name}.duration_ms`, durationMs, tags);
	}
}

/**
 * No-op metrics for when Datadog is not configured
 */
class NoopMetrics implements Metrics {
	increment(): void {}
	gauge(): void {}
	histogram(): void {}
	timing(): void {}
}

export function createMetrics(options: MetricsOptions): Metrics {
	if (!options.tracer) {
		return new NoopMetrics();
	}
	return new DatadogMetrics(options, options.tracer.dogstatsd);
}

export function createStatsMetrics(
	options: Omit<MetricsOptions, "tracer">,
	client: StatsClient,
): Metrics {
	return new DatadogMetrics(options, client);
}

export type { StatsClient };
