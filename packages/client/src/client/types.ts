/**
 * Boundary to the raw broker client
 *
 * The typed layer only talks to brokers through these interfaces. The default
 * implementation wraps kafkajs; tests use the in-memory broker from
 * `@topicwire/client/testing`.
 */

import type { ConnectionConfig } from '@/config/option-set.js'
import type { Logger } from '@/logger.js'

/**
 * How partitions of a new topic are replicated: a fixed replication factor,
 * or explicit broker ids per partition (`assignment[p]` lists partition p's
 * replicas)
 */
export type TopicReplication =
	| { readonly type: 'fixed'; readonly factor: number }
	| { readonly type: 'variable'; readonly assignment: readonly (readonly number[])[] }

export const replication = {
	fixed(factor: number): TopicReplication {
		return { type: 'fixed', factor }
	},
	variable(assignment: readonly (readonly number[])[]): TopicReplication {
		return { type: 'variable', assignment }
	},
}

export interface RawSendRequest {
	topic: string
	key: Buffer | null
	value: Buffer
	headers: Record<string, Buffer>
	timeoutMs: number
}

export interface RawDeliveryReport {
	topic: string
	partition: number
	offset: bigint
}

export interface RawProducer {
	send(request: RawSendRequest): Promise<RawDeliveryReport>
	disconnect(): Promise<void>
}

/**
 * A received record. Buffers belong to the receiver.
 */
export interface RawMessage {
	topic: string
	partition: number
	offset: bigint
	/** Milliseconds since the epoch */
	timestamp: bigint
	key: Buffer | null
	value: Buffer | null
	headers: Record<string, Buffer>
}

export interface RawConsumer {
	subscribe(topic: string): Promise<void>
	/**
	 * Wait for the next record. Aborting the signal rejects with the signal's
	 * reason and leaves the record for the next call.
	 */
	receive(signal?: AbortSignal): Promise<RawMessage>
	disconnect(): Promise<void>
}

export interface RawTopicSpec {
	topic: string
	numPartitions: number
	replication: TopicReplication
	configEntries: Record<string, string>
}

export interface RawTopicResult {
	topic: string
	/** Protocol error name, null on success */
	errorCode: string | null
	errorMessage?: string
}

export interface RawAdmin {
	createTopics(specs: readonly RawTopicSpec[], timeoutMs?: number): Promise<RawTopicResult[]>
	disconnect(): Promise<void>
}

/**
 * Creates raw clients from built configurations
 *
 * Creation is synchronous and throws ConstructionError when the configuration
 * is structurally invalid. Connecting happens on first use.
 */
export interface BrokerClientFactory {
	createProducer(config: ConnectionConfig<'producer'>, logger: Logger): RawProducer
	createConsumer(config: ConnectionConfig<'consumer'>, logger: Logger): RawConsumer
	createAdmin(config: ConnectionConfig<'admin'>, logger: Logger): RawAdmin
}
