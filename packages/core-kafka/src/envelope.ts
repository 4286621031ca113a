import { v4 as uuidv4 } from "uuid";

export interface EnvelopeSource {
	service: string;
	version: string;
	instance_id?: string;
}

export type EnvelopeKind =
	| "parsed"
	| "unified"
	| "span"
	| "metric"
	| "alert"
	| "dead_letter";

export interface Envelope<T = unknown> {
	message_id: string;
	trace_id?: string;
	span_id?: string;
	/** Logical stream name, without any deployment prefix */
	stream: string;
	kind: EnvelopeKind;
	schema_version: string;
	created_at: string;
	source: EnvelopeSource;
	payload: T;
}

export interface CreateEnvelopeOptions<T> {
	stream: string;
	kind: EnvelopeKind;
	schema_version: string;
	source: EnvelopeSource;
	payload: T;
	trace_id?: string;
	span_id?: string;
}

export function createEnvelope<T>(
	options: CreateEnvelopeOptions<T>,
): Envelope<T> {
	const envelope: Envelope<T> = {
		message_id: uuidv4(),
		stream: options.stream,
		kind: options.kind,
		schema_version: options.schema_version,
		created_at: new Date().toISOString(),
		source: options.source,
		payload: options.payload,
	};
	if (options.trace_id) envelope.trace_id = options.trace_id;
	if (options.span_id) envelope.span_id = options.span_id;
	return envelope;
}
