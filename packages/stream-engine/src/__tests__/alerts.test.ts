import type { MetricSnapshot, UnifiedLogEvent } from "@logflow/core-contracts";
import { pipelineConfigSchema } from "@logflow/core-config";
import { describe, expect, it } from "vitest";
import { createAlertEvaluator } from "../alerts/rules.js";
import { classifyTier } from "../alerts/tiers.js";

const { alerts } = pipelineConfigSchema.parse({ syslog: { defaultYear: 2024 } });
const evaluator = createAlertEvaluator(alerts);

const snapshot = (overrides: Partial<MetricSnapshot>): MetricSnapshot => ({
	query: "error-rate-by-service",
	window_start: 0,
	window_end: 60_000,
	group_key: "source_name=payments",
	group: { source_name: "payments" },
	count: 10,
	counters: {},
	measures: {},
	derived: {},
	closed_by: "watermark",
	...overrides,
});

const event = (severity_label: string): UnifiedLogEvent => ({
	event_time: 5_000,
	severity_label,
	source_name: "payments",
	hostname: "pay-1",
	message: "charge failed",
	status_code: null,
	latency_ms: null,
	trace_id: "trace-1",
	log_type: "structured",
});

describe("classifyTier", () => {
	const tiers = { critical: 10, warning: 5, info: 3 };

	it("should compare strictly with gt", () => {
		expect(classifyTier(10, tiers, "gt")).toBe("WARNING");
		expect(classifyTier(10.5, tiers, "gt")).toBe("CRITICAL");
		expect(classifyTier(3, tiers, "gt")).toBeNull();
	});

	it("should include the threshold with gte", () => {
		expect(classifyTier(10, tiers, "gte")).toBe("CRITICAL");
		expect(classifyTier(3, tiers, "gte")).toBe("INFO");
	});

	it("should skip a missing info tier", () => {
		expect(classifyTier(4, { critical: 10, warning: 5, info: null }, "gt")).toBeNull();
	});
});

describe("createAlertEvaluator", () => {
	describe("evaluateRecord", () => {
		it("should raise a critical-log alert for error severities", () => {
			expect(evaluator.evaluateRecord(event("error"))).toEqual([
				{
					alert_time: 5_000,
					alert_type: "CRITICAL_LOG",
					stream: "alerts-critical-logs",
					severity: "CRITICAL",
					subject: "payments",
					evidence: {
						severity_label: "error",
						log_type: "structured",
						hostname: "pay-1",
						message: "charge failed",
						trace_id: "trace-1",
					},
				},
			]);
		});

		it("should ignore other severities", () => {
			expect(evaluator.evaluateRecord(event("WARN"))).toEqual([]);
		});
	});

	describe("evaluateWindow", () => {
		const errorRate = (pct: number) =>
			evaluator.evaluateWindow(snapshot({ derived: { error_rate_pct: pct } }));

		it("should stay quiet at exactly the warning threshold", () => {
			expect(errorRate(5)).toEqual([]);
		});

		it("should raise a warning at exactly the critical threshold", () => {
			const [alert] = errorRate(10);
			expect(alert?.severity).toBe("WARNING");
			expect(alert?.stream).toBe("alerts-error-rate");
			expect(alert?.alert_time).toBe(60_000);
			expect(alert?.subject).toBe("source_name=payments");
		});

		it("should raise critical above the critical threshold", () => {
			expect(errorRate(12.5)[0]?.severity).toBe("CRITICAL");
		});

		it("should ignore an undefined error rate", () => {
			expect(evaluator.evaluateWindow(snapshot({ derived: { error_rate_pct: null } }))).toEqual([]);
		});

		it("should count ssh failures inclusively", () => {
			const ssh = (count: number) =>
				evaluator.evaluateWindow(
					snapshot({
						query: "ssh-failures-by-host",
						group_key: "hostname=db-02",
						group: { hostname: "db-02" },
						window_end: 300_000,
						count,
					}),
				);

			expect(ssh(2)).toEqual([]);
			expect(ssh(3)[0]?.severity).toBe("INFO");
			expect(ssh(5)[0]?.severity).toBe("WARNING");
			expect(ssh(10)).toEqual([
				{
					alert_time: 300_000,
					alert_type: "SSH_BRUTE_FORCE",
					stream: "security-ssh-failures",
					severity: "CRITICAL",
					subject: "hostname=db-02",
					evidence: {
						query: "ssh-failures-by-host",
						window_start: 0,
						window_end: 300_000,
						closed_by: "watermark",
						failed_attempts: 10,
						count: 10,
					},
				},
			]);
		});

		it("should read max latency", () => {
			const [alert] = evaluator.evaluateWindow(
				snapshot({
					query: "latency-by-service",
					measures: {
						latency_ms: { count: 2, sum: 2_600, min: 100, max: 2_500, avg: 1_300 },
					},
				}),
			);

			expect(alert?.alert_type).toBe("LATENCY_SLA");
			expect(alert?.severity).toBe("WARNING");
			expect(alert?.evidence.max_latency_ms).toBe(2_500);
		});

		it("should grade http status counts", () => {
			const status = (count: number) =>
				evaluator.evaluateWindow(snapshot({ query: "http-status-by-code", count }));

			expect(status(10)).toEqual([]);
			expect(status(11)[0]?.severity).toBe("INFO");
			expect(status(100)[0]?.severity).toBe("WARNING");
			expect(status(101)[0]?.severity).toBe("CRITICAL");
		});

		it("should flag a client ip over both request and error thresholds", () => {
			const ip = (count: number, errors: number) =>
				evaluator.evaluateWindow(
					snapshot({
						query: "requests-by-client-ip",
						group_key: "client_ip=203.0.113.7",
						count,
						counters: { errors },
						derived: { error_ratio: errors / count },
					}),
				);

			expect(ip(20, 15)).toEqual([]);
			expect(ip(25, 5)).toEqual([]);
			const [alert] = ip(25, 15);
			expect(alert?.alert_type).toBe("SUSPICIOUS_IP");
			expect(alert?.severity).toBe("WARNING");
			expect(alert?.stream).toBe("security-suspicious-ips");
			expect(alert?.evidence.total_requests).toBe(25);
			expect(alert?.evidence.error_count).toBe(15);
			expect(alert?.evidence.error_ratio).toBe(0.6);
		});

		it("should raise nothing for queries without a rule", () => {
			expect(
				evaluator.evaluateWindow(snapshot({ query: "volume-by-endpoint", count: 1_000 })),
			).toEqual([]);
		});
	});
});
