/**
 * Options shared by the typed producer, consumer and admin
 */

import { KafkaJsClientFactory } from '@/client/kafkajs.js'
import type { BrokerClientFactory } from '@/client/types.js'
import type { LoggingOptions } from '@/logger.js'

export interface ClientOptions extends LoggingOptions {
	/** Creates the underlying raw clients (default: kafkajs) */
	clients?: BrokerClientFactory
}

export function resolveClientFactory(options: ClientOptions): BrokerClientFactory {
	return options.clients ?? new KafkaJsClientFactory()
}
