/**
 * Role builders
 *
 * Each role composes the capability groups that apply to it and adds its own
 * options. Options shared between roles are defined once in capabilities.ts.
 *
 * @example
 * ```typescript
 * const config = new ConsumerConfigBuilder()
 *   .bootstrapServers(['localhost:9092'])
 *   .groupId('user:123')
 *   .autoOffsetReset('earliest')
 *   .build()
 * ```
 */

import {
	withApiTimeoutOptions,
	withClientOptions,
	withRetryOptions,
	withSaslOptions,
	withTlsOptions,
} from './capabilities.js'
import { OptionSetBuilder } from './option-set.js'
import type { Acks, AutoOffsetReset, CompressionName, Duration, IsolationLevel } from './types.js'

class ProducerOptionSet extends OptionSetBuilder<'producer'> {
	constructor() {
		super('producer')
	}
}

class ConsumerOptionSet extends OptionSetBuilder<'consumer'> {
	constructor() {
		super('consumer')
	}
}

class AdminOptionSet extends OptionSetBuilder<'admin'> {
	constructor() {
		super('admin')
	}
}

/**
 * Producer configuration: client, TLS, SASL and retry options
 */
export class ProducerConfigBuilder extends withRetryOptions(
	withSaslOptions(withTlsOptions(withClientOptions(ProducerOptionSet)))
) {
	/**
	 * Acknowledgments the leader must collect before answering a produce request.
	 *
	 * Default: all
	 */
	acks(acks: Acks): this {
		return this.set('acks', acks)
	}

	/**
	 * Compression applied to produced batches.
	 *
	 * Default: none
	 */
	compressionType(compression: CompressionName): this {
		return this.set('compression.type', compression)
	}

	/**
	 * Have the broker deduplicate retried batches.
	 *
	 * Default: false
	 */
	enableIdempotence(enable: boolean): this {
		return this.set('enable.idempotence', enable)
	}
}

/**
 * Consumer configuration: client, TLS, SASL and API timeout options plus
 * group membership and fetch tuning
 */
export class ConsumerConfigBuilder extends withApiTimeoutOptions(
	withSaslOptions(withTlsOptions(withClientOptions(ConsumerOptionSet)))
) {
	/**
	 * Allow the broker to create a subscribed topic that does not exist yet,
	 * if `auto.create.topics.enable` is on broker-side.
	 *
	 * Default: true
	 */
	allowAutoCreateTopics(allow: boolean): this {
		return this.set('allow.auto.create.topics', allow)
	}

	/**
	 * Where to start when the group has no committed offset, or the committed
	 * offset no longer exists.
	 *
	 * Default: latest
	 */
	autoOffsetReset(reset: AutoOffsetReset): this {
		return this.set('auto.offset.reset', reset)
	}

	/**
	 * How often offsets are committed in the background when auto commit is on.
	 *
	 * Default: 5000 (5 seconds)
	 */
	autoCommitInterval(interval: Duration): this {
		return this.set('auto.commit.interval.ms', Math.trunc(interval))
	}

	/**
	 * Commit offsets periodically in the background.
	 *
	 * Default: true
	 */
	enableAutoCommit(commit: boolean): this {
		return this.set('enable.auto.commit', commit)
	}

	/**
	 * Leave internal topics out of pattern subscriptions.
	 *
	 * Default: true
	 */
	excludeInternalTopics(exclude: boolean): this {
		return this.set('exclude.internal.topics', exclude)
	}

	/**
	 * Upper bound on data returned by one fetch request. Not absolute: a first
	 * batch larger than this is still returned so the consumer makes progress.
	 *
	 * Default: 52428800 (50 mebibytes)
	 */
	fetchMaxBytes(count: number): this {
		return this.set('fetch.max.bytes', count)
	}

	/**
	 * Minimum data the broker accumulates before answering a fetch.
	 *
	 * Default: 1
	 */
	fetchMinBytes(count: number): this {
		return this.set('fetch.min.bytes', count)
	}

	/**
	 * Consumer group this consumer belongs to. Required for group management
	 * and committed offsets.
	 *
	 * Default: null
	 */
	groupId(groupId: string): this {
		return this.set('group.id', groupId)
	}

	/**
	 * Static membership id. A static member that restarts within the session
	 * timeout does not cause a rebalance.
	 *
	 * Default: null
	 */
	groupInstanceId(id: string): this {
		return this.set('group.instance.id', id)
	}

	/**
	 * Expected time between heartbeats to the group coordinator. Must be lower
	 * than `session.timeout.ms`, typically no more than a third of it.
	 *
	 * Default: 3000 (3 seconds)
	 */
	heartbeatInterval(interval: Duration): this {
		return this.set('heartbeat.interval.ms', Math.trunc(interval))
	}

	/**
	 * Whether transactional records are read before they commit.
	 *
	 * Default: read_uncommitted
	 */
	isolationLevel(level: IsolationLevel): this {
		return this.set('isolation.level', level)
	}

	/**
	 * Data returned per partition by one fetch.
	 *
	 * Default: 1048576 (1 mebibyte)
	 */
	maxPartitionFetchBytes(count: number): this {
		return this.set('max.partition.fetch.bytes', count)
	}

	/**
	 * Longest allowed gap between receive calls before the member is
	 * considered failed and the group rebalances. Static members instead stop
	 * heartbeating and are removed after `session.timeout.ms`.
	 *
	 * Default: 300000 (5 minutes)
	 */
	maxPollInterval(interval: Duration): this {
		return this.set('max.poll.interval.ms', Math.trunc(interval))
	}

	/**
	 * Records returned by one poll. Does not change fetching.
	 *
	 * Default: 500
	 */
	maxPollRecords(count: number): this {
		return this.set('max.poll.records', count)
	}

	/**
	 * Time without heartbeats after which the broker removes the member and
	 * rebalances. Bounded broker-side by `group.min.session.timeout.ms` and
	 * `group.max.session.timeout.ms`.
	 *
	 * Default: 45000 (45 seconds)
	 */
	sessionTimeout(timeout: Duration): this {
		return this.set('session.timeout.ms', Math.trunc(timeout))
	}
}

/**
 * Admin client configuration: client, TLS, SASL, API timeout and retry options
 */
export class AdminConfigBuilder extends withRetryOptions(
	withApiTimeoutOptions(withSaslOptions(withTlsOptions(withClientOptions(AdminOptionSet))))
) {}
