export type GroupValue = string | number;

/**
 * Summary of one numeric measure inside a closed window. min, max and avg
 * are null when no input carried the measure.
 */
export interface MeasureSummary {
	readonly count: number;
	readonly sum: number;
	readonly min: number | null;
	readonly max: number | null;
	readonly avg: number | null;
}

/**
 * Immutable output of a closed tumbling window.
 */
export interface MetricSnapshot {
	/** Aggregation query that produced the window */
	readonly query: string;
	readonly window_start: number;
	readonly window_end: number;
	/** Stable string form of `group`, e.g. `host=db-02` */
	readonly group_key: string;
	readonly group: Readonly<Record<string, GroupValue>>;
	/** Inputs accumulated into the window */
	readonly count: number;
	readonly counters: Readonly<Record<string, number>>;
	readonly measures: Readonly<Record<string, MeasureSummary>>;
	/** Ratios computed from the counters at emission, e.g. `error_rate_pct` */
	readonly derived: Readonly<Record<string, number | null>>;
	readonly closed_by: "watermark" | "shutdown";
}
