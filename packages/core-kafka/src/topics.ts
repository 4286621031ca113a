import { STREAMS } from "@logflow/core-contracts";

/**
 * Broker topic for a stream. Deployments that share a cluster set a
 * prefix such as `staging.`.
 */
export function resolveTopic(stream: string, prefix = ""): string {
	return `${prefix}${stream}`;
}

/**
 * Inverse of resolveTopic. Topics without the prefix come back unchanged.
 */
export function streamForTopic(topic: string, prefix = ""): string {
	if (prefix && topic.startsWith(prefix)) {
		return topic.slice(prefix.length);
	}
	return topic;
}

/**
 * Every source topic shares one dead-letter topic
 */
export function getDLQTopic(prefix = ""): string {
	return resolveTopic(STREAMS.DEAD_LETTER, prefix);
}
