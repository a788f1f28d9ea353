/**
 * Consumer types and interfaces
 */

import type { BrokerError } from '@/client/errors.js'
import type { ClientOptions } from '@/client/options.js'
import type { PayloadOf, Topic } from '@/topic.js'
import type { TypedMessage } from './message.js'

export type TypedConsumerOptions = ClientOptions

export interface ReceiveOptions {
	/** Abandons the wait; no message is consumed */
	signal?: AbortSignal
}

/**
 * One step of a consumer stream: a message, or a broker error the stream
 * continued past
 */
export type ReceiveResult<TTopic extends Topic<T>, T = PayloadOf<TTopic>> =
	| { ok: true; message: TypedMessage<TTopic, T> }
	| { ok: false; error: BrokerError }
