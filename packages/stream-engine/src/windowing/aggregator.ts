import type { MetricSnapshot } from "@logflow/core-contracts";
import { fnv1a } from "./hash.js";
import type { AggregationQuery } from "./queries.js";
import { WindowShard } from "./shard.js";
import { type Observation, type WindowState, assignWindow } from "./window-state.js";

export type ShutdownPolicy = "flush" | "discard";

export type AccumulateResult = "accepted" | "late";

export interface FlushResult {
	snapshots: MetricSnapshot[];
	discarded: number;
}

function byEndThenKey(a: WindowState, b: WindowState): number {
	if (a.bounds.end !== b.bounds.end) {
		return a.bounds.end - b.bounds.end;
	}
	return a.groupKey < b.groupKey ? -1 : a.groupKey > b.groupKey ? 1 : 0;
}

/**
 * Tumbling-window aggregation for one query. Group keys are spread over
 * shards by FNV-1a; closed windows come out ordered by
 * `(window_end, group_key)`.
 */
export class WindowedAggregator {
	private readonly shards: WindowShard[];

	constructor(
		readonly query: AggregationQuery,
		shardCount: number,
	) {
		const spec = {
			query: query.name,
			counterNames: query.counterNames,
			measureNames: query.measureNames,
			derive: query.derive,
		};
		this.shards = Array.from(
			{ length: shardCount },
			(_, i) => new WindowShard(i, spec),
		);
	}

	shardFor(groupKey: string): WindowShard {
		const shard = this.shards[fnv1a(groupKey) % this.shards.length];
		if (!shard) {
			throw new RangeError(`No shard for ${groupKey}`);
		}
		return shard;
	}

	/**
	 * Add an observation unless its window already closed under
	 * `watermark`.
	 */
	accumulate(observation: Observation, watermark: number): AccumulateResult {
		const bounds = assignWindow(observation.event_time, this.query.windowMs);
		if (bounds.end <= watermark) {
			return "late";
		}
		this.shardFor(observation.group_key).accumulate(observation, bounds);
		return "accepted";
	}

	advance(watermark: number): MetricSnapshot[] {
		const ready = this.shards.flatMap((shard) => shard.closeReady(watermark));
		return ready.sort(byEndThenKey).map((window) => window.emit());
	}

	flush(policy: ShutdownPolicy): FlushResult {
		const remaining = this.shards
			.flatMap((shard) => shard.drain("shutdown"))
			.sort(byEndThenKey);

		if (policy === "discard") {
			for (const window of remaining) {
				window.discard();
			}
			return { snapshots: [], discarded: remaining.length };
		}
		return { snapshots: remaining.map((window) => window.emit()), discarded: 0 };
	}

	openWindows(): number {
		return this.shards.reduce((total, shard) => total + shard.openWindows, 0);
	}
}
