/**
 * Producer type definitions
 */

import type { ClientOptions } from '@/client/options.js'

export type TypedProducerOptions = ClientOptions

/**
 * Per-send options
 */
export interface SendOptions {
	/** Message key; absent keys leave partitioning to the broker client */
	key?: string | Buffer | null
	/** Message headers */
	headers?: Record<string, string | Buffer>
	/** Time to wait for the broker's acknowledgement in ms (default: 30000) */
	timeoutMs?: number
}

/**
 * Where an acknowledged message was written
 */
export interface DeliveryReport {
	topic: string
	partition: number
	offset: bigint
}
