import type { AlertSeverity } from "@logflow/core-contracts";

export interface Tiers {
	readonly critical: number;
	readonly warning: number;
	readonly info: number | null;
}

/** `gt` fires strictly above a tier, `gte` at or above it */
export type TierComparison = "gt" | "gte";

/**
 * Highest tier `value` reaches, or null when it is under every tier.
 */
export function classifyTier(
	value: number,
	tiers: Tiers,
	comparison: TierComparison,
): AlertSeverity | null {
	const reaches = (threshold: number): boolean =>
		comparison === "gt" ? value > threshold : value >= threshold;

	if (reaches(tiers.critical)) return "CRITICAL";
	if (reaches(tiers.warning)) return "WARNING";
	if (tiers.info !== null && reaches(tiers.info)) return "INFO";
	return null;
}
