import type { UnifiedLogEvent } from "@logflow/core-contracts";
import { pipelineConfigSchema } from "@logflow/core-config";
import { describe, expect, it } from "vitest";
import { QueryConfigError, WindowStateError } from "../errors.js";
import { WindowedAggregator } from "../windowing/aggregator.js";
import { fnv1a } from "../windowing/hash.js";
import { LateEventCounters } from "../windowing/late-counters.js";
import { type AggregationQuery, createAggregationQueries } from "../windowing/queries.js";
import { WatermarkTracker } from "../windowing/watermark.js";
import { type Observation, WindowState, assignWindow } from "../windowing/window-state.js";

const defaults = pipelineConfigSchema.parse({ syslog: { defaultYear: 2024 } });

const queryNamed = (name: string, queries = createAggregationQueries(defaults.queries)) => {
	const query = queries.find((q) => q.name === name);
	if (!query) throw new Error(`no query ${name}`);
	return query;
};

const event = (
	event_time: number,
	source_name: string,
	severity_label = "INFO",
	latency_ms: number | null = null,
): UnifiedLogEvent => ({
	event_time,
	severity_label,
	source_name,
	hostname: null,
	message: "m",
	status_code: null,
	latency_ms,
	trace_id: null,
	log_type: "structured",
});

const observe = (query: AggregationQuery, value: UnifiedLogEvent): Observation => {
	const observation = query.observe({ source: "unified", value });
	if (!observation) throw new Error("input not accepted");
	return observation;
};

describe("assignWindow", () => {
	it("should use half-open intervals", () => {
		expect(assignWindow(59_999, 60_000)).toEqual({ start: 0, end: 60_000 });
		expect(assignWindow(60_000, 60_000)).toEqual({ start: 60_000, end: 120_000 });
	});
});

describe("fnv1a", () => {
	it("should match the reference 32-bit values", () => {
		expect(fnv1a("")).toBe(0x811c9dc5);
		expect(fnv1a("a")).toBe(0xe40c292c);
	});
});

describe("WindowState", () => {
	const spec = {
		query: "q",
		counterNames: [],
		measureNames: [],
		derive: () => ({}),
	};
	const observation: Observation = {
		event_time: 10,
		group_key: "k=v",
		group: { k: "v" },
		counters: [],
		values: {},
	};

	it("should move through its lifecycle once", () => {
		const window = new WindowState(spec, { start: 0, end: 100 }, "k=v", { k: "v" });
		expect(window.state).toBe("open");

		window.add(observation);
		window.add(observation);
		expect(window.state).toBe("accumulating");
		expect(window.size).toBe(2);

		window.close("watermark");
		const snapshot = window.emit();

		expect(window.state).toBe("emitted");
		expect(snapshot.count).toBe(2);
		expect(Object.isFrozen(snapshot)).toBe(true);
	});

	it("should refuse input after closing", () => {
		const window = new WindowState(spec, { start: 0, end: 100 }, "k=v", { k: "v" });
		window.close("watermark");

		expect(() => window.add(observation)).toThrow(WindowStateError);
		expect(() => window.add(observation)).toThrow(
			"Illegal window transition closed -> accumulating for q/k=v@[0,100)",
		);
	});

	it("should refuse to emit an open window or emit twice", () => {
		const window = new WindowState(spec, { start: 0, end: 100 }, "k=v", { k: "v" });
		expect(() => window.emit()).toThrow(WindowStateError);

		window.close("shutdown");
		window.emit();
		expect(() => window.emit()).toThrow(WindowStateError);
	});
});

describe("WindowedAggregator", () => {
	it("should put an event at a window end into the next window", () => {
		const query = queryNamed("error-rate-by-service");
		const aggregator = new WindowedAggregator(query, 4);

		expect(aggregator.accumulate(observe(query, event(60_000, "payments")), -Infinity)).toBe(
			"accepted",
		);

		expect(aggregator.advance(60_000)).toEqual([]);
		const [snapshot] = aggregator.advance(120_000);
		expect(snapshot?.window_start).toBe(60_000);
		expect(snapshot?.window_end).toBe(120_000);
	});

	it("should summarize counters and derived ratios", () => {
		const query = queryNamed("error-rate-by-service");
		const aggregator = new WindowedAggregator(query, 2);
		for (const [t, severity] of [
			[0, "ERROR"],
			[1_000, "INFO"],
			[2_000, "INFO"],
			[3_000, "info"],
		] as const) {
			aggregator.accumulate(observe(query, event(t, "payments", severity)), -Infinity);
		}

		const [snapshot] = aggregator.advance(60_000);

		expect(snapshot).toEqual({
			query: "error-rate-by-service",
			window_start: 0,
			window_end: 60_000,
			group_key: "source_name=payments",
			group: { source_name: "payments" },
			count: 4,
			counters: { errors: 1 },
			measures: {},
			derived: { error_rate_pct: 25 },
			closed_by: "watermark",
		});
		expect(aggregator.openWindows()).toBe(0);
	});

	it("should summarize measures", () => {
		const query = queryNamed("latency-by-service");
		const aggregator = new WindowedAggregator(query, 1);
		aggregator.accumulate(observe(query, event(0, "api", "INFO", 100)), -Infinity);
		aggregator.accumulate(observe(query, event(1, "api", "INFO", 300)), -Infinity);

		expect(query.observe({ source: "unified", value: event(2, "api") })).toBeNull();

		const [snapshot] = aggregator.advance(60_000);
		expect(snapshot?.measures).toEqual({
			latency_ms: { count: 2, sum: 400, min: 100, max: 300, avg: 200 },
		});
	});

	it("should report late events and leave emitted windows alone", () => {
		const query = queryNamed("error-rate-by-service");
		const aggregator = new WindowedAggregator(query, 4);
		aggregator.accumulate(observe(query, event(10_000, "payments")), -Infinity);
		const [emitted] = aggregator.advance(60_000);

		expect(aggregator.accumulate(observe(query, event(30_000, "payments")), 60_000)).toBe("late");
		expect(aggregator.openWindows()).toBe(0);
		expect(emitted?.count).toBe(1);
	});

	it("should order closed windows by end then group key", () => {
		const query = queryNamed("error-rate-by-service");
		const aggregator = new WindowedAggregator(query, 3);
		aggregator.accumulate(observe(query, event(70_000, "alpha")), -Infinity);
		aggregator.accumulate(observe(query, event(10_000, "beta")), -Infinity);
		aggregator.accumulate(observe(query, event(20_000, "alpha")), -Infinity);

		const order = aggregator
			.advance(200_000)
			.map((s) => `${s.window_end}/${s.group_key}`);

		expect(order).toEqual([
			"60000/source_name=alpha",
			"60000/source_name=beta",
			"120000/source_name=alpha",
		]);
	});

	it("should flush or discard on shutdown", () => {
		const query = queryNamed("error-rate-by-service");
		const flushing = new WindowedAggregator(query, 2);
		const discarding = new WindowedAggregator(query, 2);
		for (const aggregator of [flushing, discarding]) {
			aggregator.accumulate(observe(query, event(0, "a")), -Infinity);
			aggregator.accumulate(observe(query, event(0, "b")), -Infinity);
		}

		const flushed = flushing.flush("flush");
		expect(flushed.discarded).toBe(0);
		expect(flushed.snapshots.map((s) => [s.group_key, s.closed_by])).toEqual([
			["source_name=a", "shutdown"],
			["source_name=b", "shutdown"],
		]);

		expect(discarding.flush("discard")).toEqual({ snapshots: [], discarded: 2 });
	});

	it("should keep a group key on one shard", () => {
		const aggregator = new WindowedAggregator(queryNamed("error-rate-by-service"), 8);
		expect(aggregator.shardFor("source_name=a")).toBe(aggregator.shardFor("source_name=a"));
	});
});

describe("createAggregationQueries", () => {
	it("should count only error severities towards the error rate", () => {
		const query = queryNamed("error-rate-by-service");
		const countersOf = (severity: string) => observe(query, event(0, "api", severity)).counters;

		expect(countersOf("ERROR")).toEqual(["errors"]);
		expect(countersOf("fatal")).toEqual(["errors"]);
		expect(countersOf("ALERT")).toEqual([]);
		expect(countersOf("WARN")).toEqual([]);
	});

	const withQueries = (queries: Record<string, unknown>) =>
		pipelineConfigSchema.parse({ syslog: { defaultYear: 2024 }, queries }).queries;

	it("should reject a field the query cannot group by", () => {
		expect(() =>
			createAggregationQueries(withQueries({ errorRateByService: { groupBy: ["path"] } })),
		).toThrow(
			"Query error-rate-by-service: cannot group by path; expected one of source_name, hostname, log_type, severity_label, status_code",
		);
	});

	it("should reject duplicate group-by fields", () => {
		expect(() =>
			createAggregationQueries(
				withQueries({ httpStatusByCode: { groupBy: ["status_code", "status_code"] } }),
			),
		).toThrow(QueryConfigError);
	});

	it("should group a null field under unknown", () => {
		const queries = createAggregationQueries(
			withQueries({ errorRateByService: { groupBy: ["hostname", "source_name"] } }),
		);
		const query = queryNamed("error-rate-by-service", queries);

		expect(observe(query, event(0, "payments")).group_key).toBe(
			"hostname=unknown,source_name=payments",
		);
	});
});

describe("WatermarkTracker", () => {
	it("should take the minimum over partitions and never regress", () => {
		const tracker = new WatermarkTracker(5_000);
		expect(tracker.hasWatermark()).toBe(false);

		expect(tracker.observe("p0", 10_000)).toBe(5_000);
		expect(tracker.observe("p1", 8_000)).toBe(5_000);
		expect(tracker.observe("p1", 20_000)).toBe(5_000);
		expect(tracker.observe("p0", 30_000)).toBe(15_000);
		expect(tracker.observe("p0", 1_000)).toBe(15_000);

		expect(tracker.hasWatermark()).toBe(true);
		expect(tracker.partitions()).toEqual({ p0: 25_000, p1: 15_000 });
	});

	it("should report each partition on its own", () => {
		const tracker = new WatermarkTracker(5_000);
		tracker.observe("p0", 10_000);
		tracker.observe("p0", 7_000);

		expect(tracker.watermarkOf("p0")).toBe(5_000);
		expect(tracker.watermarkOf("p1")).toBeNull();
	});
});

describe("LateEventCounters", () => {
	it("should count per name", () => {
		const counters = new LateEventCounters(["a", "b"]);

		expect(counters.increment("a")).toBe(1);
		expect(counters.increment("a", 2)).toBe(3);
		expect(counters.snapshot()).toEqual({ a: 3, b: 0 });
	});

	it("should share counts through the buffer", () => {
		const first = new LateEventCounters(["a", "b"]);
		const second = new LateEventCounters(["a", "b"], first.buffer);

		second.increment("b", 4);

		expect(first.get("b")).toBe(4);
	});

	it("should reject unknown names and short buffers", () => {
		const counters = new LateEventCounters(["a"]);
		expect(() => counters.increment("z")).toThrow(RangeError);
		expect(() => new LateEventCounters(["a", "b"], new SharedArrayBuffer(8))).toThrow(
			"Counter buffer holds 1 slots, 2 needed",
		);
	});
});
