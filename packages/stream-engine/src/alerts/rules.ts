import {
	type Alert,
	type AlertSeverity,
	type AlertType,
	type EvidenceValue,
	type MetricSnapshot,
	STREAMS,
	type UnifiedLogEvent,
} from "@logflow/core-contracts";
import type { PipelineConfig } from "@logflow/core-config";
import { QUERY_NAMES } from "../windowing/queries.js";
import { type TierComparison, type Tiers, classifyTier } from "./tiers.js";

export type AlertThresholds = PipelineConfig["alerts"];

export interface AlertEvaluator {
	/** Per-record rules over a unified event */
	evaluateRecord(event: UnifiedLogEvent): Alert[];
	/** Per-window rules over a closed window */
	evaluateWindow(snapshot: MetricSnapshot): Alert[];
}

type WindowRule = (snapshot: MetricSnapshot) => Alert | null;

function makeAlert(
	alertType: AlertType,
	stream: string,
	severity: AlertSeverity,
	alertTime: number,
	subject: string,
	evidence: Record<string, EvidenceValue>,
): Alert {
	return Object.freeze({
		alert_time: alertTime,
		alert_type: alertType,
		stream,
		severity,
		subject,
		evidence: Object.freeze(evidence),
	});
}

function windowEvidence(snapshot: MetricSnapshot): Record<string, EvidenceValue> {
	return {
		query: snapshot.query,
		window_start: snapshot.window_start,
		window_end: snapshot.window_end,
		closed_by: snapshot.closed_by,
	};
}

function tieredRule(
	alertType: AlertType,
	stream: string,
	tiers: Tiers,
	comparison: TierComparison,
	metric: string,
	read: (snapshot: MetricSnapshot) => number | null,
): WindowRule {
	return (snapshot) => {
		const value = read(snapshot);
		if (value === null) return null;
		const severity = classifyTier(value, tiers, comparison);
		if (!severity) return null;
		return makeAlert(alertType, stream, severity, snapshot.window_end, snapshot.group_key, {
			...windowEvidence(snapshot),
			[metric]: value,
			count: snapshot.count,
		});
	};
}

/**
 * Build the rule set from configured thresholds. Rules are level
 * triggered: every qualifying record or window raises its own alert.
 */
export function createAlertEvaluator(thresholds: AlertThresholds): AlertEvaluator {
	const criticalSeverities: ReadonlySet<string> = new Set(
		thresholds.criticalLog.severities.map((s) => s.toUpperCase()),
	);

	const windowRules: ReadonlyMap<string, WindowRule> = new Map<string, WindowRule>([
		[
			QUERY_NAMES.errorRateByService,
			tieredRule(
				"ERROR_RATE",
				STREAMS.ALERTS_ERROR_RATE,
				thresholds.errorRate,
				"gt",
				"error_rate_pct",
				(s) => s.derived.error_rate_pct ?? null,
			),
		],
		[
			QUERY_NAMES.latencyByService,
			tieredRule(
				"LATENCY_SLA",
				STREAMS.ALERTS_LATENCY_SLA,
				thresholds.latencySla,
				"gt",
				"max_latency_ms",
				(s) => s.measures.latency_ms?.max ?? null,
			),
		],
		[
			QUERY_NAMES.sshFailuresByHost,
			tieredRule(
				"SSH_BRUTE_FORCE",
				STREAMS.SECURITY_SSH_FAILURES,
				thresholds.sshBruteForce,
				"gte",
				"failed_attempts",
				(s) => s.count,
			),
		],
		[
			QUERY_NAMES.httpStatusByCode,
			tieredRule(
				"HTTP_STATUS_ANOMALY",
				STREAMS.ALERTS_HTTP_STATUS,
				thresholds.httpStatusAnomaly,
				"gt",
				"status_count",
				(s) => s.count,
			),
		],
		[
			QUERY_NAMES.requestsByClientIp,
			(snapshot) => {
				const { minRequests, minErrorRatio, severity } = thresholds.suspiciousIp;
				const errorRatio = snapshot.derived.error_ratio ?? null;
				if (errorRatio === null) return null;
				if (!(snapshot.count > minRequests && errorRatio > minErrorRatio)) {
					return null;
				}
				return makeAlert(
					"SUSPICIOUS_IP",
					STREAMS.SECURITY_SUSPICIOUS_IPS,
					severity,
					snapshot.window_end,
					snapshot.group_key,
					{
						...windowEvidence(snapshot),
						total_requests: snapshot.count,
						error_count: snapshot.counters.errors ?? 0,
						error_ratio: errorRatio,
					},
				);
			},
		],
	]);

	return {
		evaluateRecord(event) {
			if (!criticalSeverities.has(event.severity_label.toUpperCase())) {
				return [];
			}
			return [
				makeAlert(
					"CRITICAL_LOG",
					STREAMS.ALERTS_CRITICAL_LOGS,
					thresholds.criticalLog.severity,
					event.event_time,
					event.source_name,
					{
						severity_label: event.severity_label,
						log_type: event.log_type,
						hostname: event.hostname,
						message: event.message,
						trace_id: event.trace_id,
					},
				),
			];
		},

		evaluateWindow(snapshot) {
			const rule = windowRules.get(snapshot.query);
			const alert = rule ? rule(snapshot) : null;
			return alert ? [alert] : [];
		},
	};
}
