import type {
	GroupValue,
	MeasureSummary,
	MetricSnapshot,
} from "@logflow/core-contracts";
import { WindowStateError } from "../errors.js";

export type WindowStatus =
	| "open"
	| "accumulating"
	| "closed"
	| "emitted"
	| "discarded";

export type ClosedBy = MetricSnapshot["closed_by"];

const TRANSITIONS: Readonly<Record<WindowStatus, readonly WindowStatus[]>> = {
	open: ["accumulating", "closed"],
	accumulating: ["accumulating", "closed"],
	closed: ["emitted", "discarded"],
	emitted: [],
	discarded: [],
};

/**
 * One input reduced to what a window needs: its group, which counters it
 * increments and the measure values it carries.
 */
export interface Observation {
	readonly event_time: number;
	readonly group_key: string;
	readonly group: Readonly<Record<string, GroupValue>>;
	readonly counters: readonly string[];
	readonly values: Readonly<Record<string, number>>;
}

export interface WindowBounds {
	readonly start: number;
	readonly end: number;
}

/**
 * Tumbling window containing `eventTime`: `[floor(t/d)*d, start+d)`.
 */
export function assignWindow(eventTime: number, durationMs: number): WindowBounds {
	const start = Math.floor(eventTime / durationMs) * durationMs;
	return { start, end: start + durationMs };
}

export type DeriveFn = (
	counters: Readonly<Record<string, number>>,
	count: number,
) => Record<string, number | null>;

export interface WindowSpec {
	readonly query: string;
	readonly counterNames: readonly string[];
	readonly measureNames: readonly string[];
	readonly derive: DeriveFn;
}

interface MeasureAccumulator {
	count: number;
	sum: number;
	min: number | null;
	max: number | null;
}

/**
 * Accumulator for one `(window, group key)`. Sums, min and max are kept
 * incrementally; averages and derived ratios are computed once, at
 * emission.
 */
export class WindowState {
	private status: WindowStatus = "open";
	private count = 0;
	private closedBy: ClosedBy | null = null;
	private readonly counters = new Map<string, number>();
	private readonly measures = new Map<string, MeasureAccumulator>();

	constructor(
		private readonly spec: WindowSpec,
		readonly bounds: WindowBounds,
		readonly groupKey: string,
		readonly group: Readonly<Record<string, GroupValue>>,
	) {
		for (const name of spec.counterNames) {
			this.counters.set(name, 0);
		}
		for (const name of spec.measureNames) {
			this.measures.set(name, { count: 0, sum: 0, min: null, max: null });
		}
	}

	get id(): string {
		return `${this.spec.query}/${this.groupKey}@[${this.bounds.start},${this.bounds.end})`;
	}

	get state(): WindowStatus {
		return this.status;
	}

	get size(): number {
		return this.count;
	}

	add(observation: Observation): void {
		this.transition("accumulating");
		this.count++;

		for (const name of observation.counters) {
			this.counters.set(name, (this.counters.get(name) ?? 0) + 1);
		}

		for (const [name, value] of Object.entries(observation.values)) {
			const acc = this.measures.get(name);
			if (!acc) continue;
			acc.count++;
			acc.sum += value;
			acc.min = acc.min === null ? value : Math.min(acc.min, value);
			acc.max = acc.max === null ? value : Math.max(acc.max, value);
		}
	}

	close(by: ClosedBy): void {
		this.transition("closed");
		this.closedBy = by;
	}

	emit(): MetricSnapshot {
		const closedBy = this.closedBy;
		if (closedBy === null) {
			throw new WindowStateError(this.status, "emitted", this.id);
		}
		this.transition("emitted");

		const counters = Object.fromEntries(this.counters);
		const measures: Record<string, MeasureSummary> = {};
		for (const [name, acc] of this.measures) {
			measures[name] = Object.freeze({
				count: acc.count,
				sum: acc.sum,
				min: acc.min,
				max: acc.max,
				avg: acc.count === 0 ? null : acc.sum / acc.count,
			});
		}

		return Object.freeze({
			query: this.spec.query,
			window_start: this.bounds.start,
			window_end: this.bounds.end,
			group_key: this.groupKey,
			group: Object.freeze({ ...this.group }),
			count: this.count,
			counters: Object.freeze(counters),
			measures: Object.freeze(measures),
			derived: Object.freeze(this.spec.derive(counters, this.count)),
			closed_by: closedBy,
		});
	}

	discard(): void {
		this.transition("discarded");
	}

	private transition(to: WindowStatus): void {
		if (!TRANSITIONS[this.status].includes(to)) {
			throw new WindowStateError(this.status, to, this.id);
		}
		this.status = to;
	}
}
