export type AlertSeverity = "CRITICAL" | "WARNING" | "INFO";

export type AlertType =
	| "CRITICAL_LOG"
	| "ERROR_RATE"
	| "LATENCY_SLA"
	| "SSH_BRUTE_FORCE"
	| "HTTP_STATUS_ANOMALY"
	| "SUSPICIOUS_IP";

export type EvidenceValue = string | number | boolean | null;

/**
 * Produced once per triggering condition. There is no resolution model, so
 * an alert is never updated or retracted.
 */
export interface Alert {
	/** Event time of the record, or window end for window rules */
	readonly alert_time: number;
	readonly alert_type: AlertType;
	/** Output stream the alert belongs to */
	readonly stream: string;
	readonly severity: AlertSeverity;
	/** Source name for record alerts, group key for window alerts */
	readonly subject: string;
	readonly evidence: Readonly<Record<string, EvidenceValue>>;
}
