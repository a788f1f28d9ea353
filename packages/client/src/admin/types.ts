/**
 * Admin types
 */

import type { TopicCreationError } from '@/client/errors.js'
import type { ClientOptions } from '@/client/options.js'
import type { TopicReplication } from '@/client/types.js'
import type { Topic } from '@/topic.js'

export type TypedAdminOptions = ClientOptions

export interface CreateTopicOptions {
	/** Topic-level configuration, e.g. `{ 'cleanup.policy': 'compact' }` */
	configEntries?: Record<string, string>
	/** Request timeout in ms (default: default.api.timeout.ms, else the client's) */
	timeoutMs?: number
}

export interface TopicCreationRequest {
	topic: Topic<unknown>
	partitions: number
	replication: TopicReplication
	configEntries?: Record<string, string>
}

export type TopicCreationResult =
	| { topic: string; ok: true }
	| { topic: string; ok: false; error: TopicCreationError }
