export { createKafkaClient, type KafkaClientOptions } from "./client.js";
export {
	createProducer,
	type LogflowProducer,
	type OutgoingMessage,
	type ProduceOptions,
	type ProducerOptions,
} from "./producer.js";
export {
	createConsumer,
	toRawRecord,
	type LogflowConsumer,
	type ConsumerOptions,
	type MessageContext,
	type MessageHandler,
	type ProcessResult,
} from "./consumer.js";
export {
	buildDLQPayload,
	createDLQPublisher,
	type DLQPublisher,
	type DLQMessage,
} from "./dlq.js";
export {
	createEnvelope,
	type Envelope,
	type EnvelopeKind,
	type EnvelopeSource,
	type CreateEnvelopeOptions,
} from "./envelope.js";
export { getDLQTopic, resolveTopic, streamForTopic } from "./topics.js";
export {
	KafkaError,
	RetryableError,
	NonRetryableError,
	classifyError,
	errorCode,
} from "./errors.js";
