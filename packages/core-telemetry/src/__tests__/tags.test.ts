import { describe, expect, it } from "vitest";
import {
	ALLOWED_METRIC_KEYS,
	HIGH_CARDINALITY_TAGS,
	HighCardinalityMetricError,
	createTagBuilder,
	filterMetricTags,
	isAllowedMetricKey,
	isHighCardinality,
	sanitizeTagValue,
	validateMetricTags,
	validateTags,
} from "../tags.js";

describe("tags", () => {
	describe("constants", () => {
		it("should treat group keys and client addresses as high-cardinality", () => {
			expect(HIGH_CARDINALITY_TAGS).toContain("group_key");
			expect(HIGH_CARDINALITY_TAGS).toContain("client_ip");
			expect(HIGH_CARDINALITY_TAGS).toContain("trace_id");
		});

		it("should allow query and log_source as metric dimensions", () => {
			expect(ALLOWED_METRIC_KEYS).toContain("query");
			expect(ALLOWED_METRIC_KEYS).toContain("log_source");
			expect(ALLOWED_METRIC_KEYS).toContain("env");
		});

		it("should allow the optional service tags on metrics", () => {
			expect(ALLOWED_METRIC_KEYS).toEqual(expect.arrayContaining(["team", "region", "stage"]));
		});
	});

	describe("validateTags", () => {
		it("should pass when all required tags are present", () => {
			const tags = { env: "dev", service: "test", version: "1.0.0" };
			expect(() => validateTags(tags, "test")).not.toThrow();
		});

		it("should list every missing tag", () => {
			expect(() => validateTags({ service: "test" }, "logger")).toThrow(
				"Missing required tags in logger: env, version",
			);
		});
	});

	describe("validateMetricTags", () => {
		it("should pass for low-cardinality tags", () => {
			const tags = {
				env: "dev",
				service: "test",
				version: "1.0.0",
				query: "error-rate-by-service",
				reason: "late",
			};
			expect(() => validateMetricTags(tags)).not.toThrow();
		});

		it("should throw when a group key is present", () => {
			const tags = { env: "dev", group_key: "checkout" };
			expect(() => validateMetricTags(tags, "windows")).toThrow(
				HighCardinalityMetricError,
			);
			expect(() => validateMetricTags(tags, "windows")).toThrow(
				/\(windows\): group_key/,
			);
		});
	});

	describe("filterMetricTags", () => {
		it("should drop unknown, forbidden and undefined keys", () => {
			expect(
				filterMetricTags({
					query: "latency-by-service",
					client_ip: "10.0.0.1",
					custom: "x",
					reason: undefined,
				}),
			).toEqual({ query: "latency-by-service" });
		});
	});

	describe("isHighCardinality / isAllowedMetricKey", () => {
		it("should classify keys", () => {
			expect(isHighCardinality("hostname")).toBe(true);
			expect(isHighCardinality("stage")).toBe(false);
			expect(isAllowedMetricKey("alert_type")).toBe(true);
			expect(isAllowedMetricKey("span_id")).toBe(false);
		});
	});

	describe("sanitizeTagValue", () => {
		it("should lowercase and collapse special characters", () => {
			expect(sanitizeTagValue("Logs Syslog  Raw")).toBe("logs_syslog_raw");
		});

		it("should keep hyphens and dots", () => {
			expect(sanitizeTagValue("logs-nginx.raw")).toBe("logs-nginx.raw");
		});

		it("should truncate to 200 chars", () => {
			expect(sanitizeTagValue("a".repeat(250)).length).toBe(200);
		});
	});

	describe("createTagBuilder", () => {
		const identity = {
			name: "log-processor",
			version: "1.0.0",
			team: "observability",
			cloud: "local",
			region: "local",
			domain: "logs",
			pipeline: "log-processing",
		};

		it("should use the configured env", () => {
			const builder = createTagBuilder(identity, "staging");
			expect(builder.getServiceTags()).toEqual({
				env: "staging",
				service: "log-processor",
				version: "1.0.0",
				team: "observability",
				cloud: "local",
				region: "local",
				domain: "logs",
				pipeline: "log-processing",
			});
		});

		it("should build metric tags with approved dimensions", () => {
			const builder = createTagBuilder(identity, "dev");
			const tags = builder.forMetric({ query: "span-metrics", reason: undefined });
			expect(tags.query).toBe("span-metrics");
			expect("reason" in tags).toBe(false);
		});

		it("should reject high-cardinality metric tags", () => {
			const builder = createTagBuilder(identity, "dev");
			expect(() => builder.forMetric({ client_ip: "10.0.0.9" })).toThrow(
				HighCardinalityMetricError,
			);
		});

		it("should allow high-cardinality tags on logs and stages", () => {
			const builder = createTagBuilder(identity, "dev");
			expect(builder.forLog({ group_key: "checkout" }).group_key).toBe(
				"checkout",
			);
			const stage = builder.forStage("parse", { topic: "logs-syslog-raw" });
			expect(stage.stage).toBe("parse");
			expect(stage.topic).toBe("logs-syslog-raw");
		});
	});
});
