/**
 * Translation of built connection configurations into kafkajs options
 *
 * Pure functions: nothing here connects. Keys kafkajs has no equivalent for
 * are reported back in `ignored` so the adapter can log them.
 */

import {
	CompressionTypes,
	type AdminConfig,
	type ConsumerConfig,
	type KafkaConfig,
	type ProducerConfig,
	type RetryOptions,
	type SASLOptions,
} from 'kafkajs'
import type { ConnectionOptions } from 'node:tls'

import { ConstructionError } from '@/client/errors.js'
import type { ConnectionConfig } from '@/config/option-set.js'
import type { AutoOffsetReset, ClientRole, CompressionName, SaslMechanism, SecurityProtocol } from '@/config/types.js'

const SECURITY_PROTOCOLS: readonly SecurityProtocol[] = ['PLAINTEXT', 'SSL', 'SASL_PLAINTEXT', 'SASL_SSL']
const SASL_MECHANISMS: readonly SaslMechanism[] = ['PLAIN', 'SCRAM-SHA-256', 'SCRAM-SHA-512']
const OFFSET_RESETS: readonly AutoOffsetReset[] = ['earliest', 'latest', 'none']
const ISOLATION_LEVELS = ['read_committed', 'read_uncommitted'] as const
const ACKS = ['all', '-1', '0', '1'] as const
const COMPRESSIONS: readonly CompressionName[] = ['none', 'gzip', 'snappy', 'lz4', 'zstd']

const COMPRESSION_TYPES: Record<CompressionName, CompressionTypes> = {
	none: CompressionTypes.None,
	gzip: CompressionTypes.GZIP,
	snappy: CompressionTypes.Snappy,
	lz4: CompressionTypes.LZ4,
	zstd: CompressionTypes.ZSTD,
}

const BROKER_ADDRESS = /^(\[[^\]]+\]|[^\s:,[\]]+):(\d{1,5})$/

/**
 * Reads typed values out of a configuration, remembering which keys were used
 */
class OptionReader {
	private readonly used = new Set<string>()

	constructor(private readonly config: ConnectionConfig) {}

	string(key: string): string | undefined {
		this.used.add(key)
		return this.config.get(key)
	}

	integer(key: string): number | undefined {
		const raw = this.string(key)
		if (raw === undefined) {
			return undefined
		}
		if (!/^-?\d+$/.test(raw.trim())) {
			throw new ConstructionError(this.config.role, `option ${key} must be an integer, got "${raw}"`, key)
		}
		return Number(raw)
	}

	boolean(key: string): boolean | undefined {
		const raw = this.string(key)
		if (raw === undefined) {
			return undefined
		}
		if (raw !== 'true' && raw !== 'false') {
			throw new ConstructionError(this.config.role, `option ${key} must be true or false, got "${raw}"`, key)
		}
		return raw === 'true'
	}

	oneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined {
		const raw = this.string(key)
		if (raw === undefined) {
			return undefined
		}
		const match = allowed.find(value => value === raw)
		if (match === undefined) {
			throw new ConstructionError(
				this.config.role,
				`option ${key} must be one of ${allowed.join(', ')}, got "${raw}"`,
				key
			)
		}
		return match
	}

	unused(): string[] {
		return [...this.config.keys()].filter(key => !this.used.has(key))
	}
}

/**
 * Split and check a `bootstrap.servers` value
 *
 * Empty entries (e.g. from a trailing comma) are skipped; anything that is
 * not `host:port` with a port in 1-65535 fails construction.
 */
export function parseBootstrapServers(role: ClientRole, value: string | undefined): string[] {
	const servers = (value ?? '')
		.split(',')
		.map(entry => entry.trim())
		.filter(entry => entry.length > 0)

	if (servers.length === 0) {
		throw new ConstructionError(role, 'bootstrap.servers is empty', 'bootstrap.servers')
	}

	for (const server of servers) {
		const portText = BROKER_ADDRESS.exec(server)?.[2]
		const port = portText === undefined ? 0 : Number(portText)
		if (port < 1 || port > 65535) {
			throw new ConstructionError(role, `malformed bootstrap server "${server}"`, 'bootstrap.servers')
		}
	}

	return servers
}

function readRetry(reader: OptionReader): RetryOptions | undefined {
	const retry: RetryOptions = {
		initialRetryTime: reader.integer('retry.backoff.ms'),
		maxRetryTime: reader.integer('retry.backoff.max.ms'),
		retries: reader.integer('retries'),
	}
	return Object.values(retry).some(value => value !== undefined) ? retry : undefined
}

function readTls(reader: OptionReader): ConnectionOptions | true {
	const tls: ConnectionOptions = {
		ca: reader.string('ssl.truststore.certificates'),
		cert: reader.string('ssl.keystore.certificate.chain'),
		key: reader.string('ssl.keystore.key'),
		passphrase: reader.string('ssl.key.password'),
	}
	return Object.values(tls).some(value => value !== undefined) ? tls : true
}

function readSasl(reader: OptionReader, role: ClientRole): SASLOptions {
	const mechanism = reader.oneOf('sasl.mechanism', SASL_MECHANISMS) ?? 'PLAIN'
	const username = reader.string('sasl.username')
	const password = reader.string('sasl.password')
	if (username === undefined || password === undefined) {
		throw new ConstructionError(
			role,
			'SASL security protocol requires sasl.username and sasl.password',
			username === undefined ? 'sasl.username' : 'sasl.password'
		)
	}

	switch (mechanism) {
		case 'PLAIN':
			return { mechanism: 'plain', username, password }
		case 'SCRAM-SHA-256':
			return { mechanism: 'scram-sha-256', username, password }
		case 'SCRAM-SHA-512':
			return { mechanism: 'scram-sha-512', username, password }
	}
}

function readClient(reader: OptionReader, role: ClientRole): KafkaConfig {
	const protocol = reader.oneOf('security.protocol', SECURITY_PROTOCOLS) ?? 'PLAINTEXT'
	const usesTls = protocol === 'SSL' || protocol === 'SASL_SSL'
	const usesSasl = protocol === 'SASL_PLAINTEXT' || protocol === 'SASL_SSL'

	return {
		brokers: parseBootstrapServers(role, reader.string('bootstrap.servers')),
		clientId: reader.string('client.id'),
		requestTimeout: reader.integer('request.timeout.ms'),
		connectionTimeout: reader.integer('socket.connection.setup.timeout.ms'),
		retry: readRetry(reader),
		ssl: usesTls ? readTls(reader) : undefined,
		sasl: usesSasl ? readSasl(reader, role) : undefined,
	}
}

export interface KafkaJsProducerSettings {
	client: KafkaConfig
	producer: ProducerConfig
	acks: number
	compression: CompressionTypes
	ignored: string[]
}

export interface KafkaJsConsumerSettings {
	client: KafkaConfig
	consumer: ConsumerConfig
	autoCommit: boolean
	autoCommitInterval?: number
	autoOffsetReset: AutoOffsetReset
	ignored: string[]
}

export interface KafkaJsAdminSettings {
	client: KafkaConfig
	admin: AdminConfig
	/** Timeout for admin requests that take no explicit one */
	apiTimeoutMs?: number
	ignored: string[]
}

export function toProducerSettings(config: ConnectionConfig<'producer'>): KafkaJsProducerSettings {
	const reader = new OptionReader(config)
	const client = readClient(reader, config.role)
	const acks = reader.oneOf('acks', ACKS) ?? 'all'

	return {
		client,
		producer: {
			retry: client.retry,
			metadataMaxAge: reader.integer('metadata.max.age.ms'),
			idempotent: reader.boolean('enable.idempotence'),
		},
		acks: acks === 'all' ? -1 : Number(acks),
		compression: COMPRESSION_TYPES[reader.oneOf('compression.type', COMPRESSIONS) ?? 'none'],
		ignored: reader.unused(),
	}
}

export function toConsumerSettings(config: ConnectionConfig<'consumer'>): KafkaJsConsumerSettings {
	const reader = new OptionReader(config)
	const client = readClient(reader, config.role)
	const groupId = reader.string('group.id')
	if (groupId === undefined || groupId.length === 0) {
		throw new ConstructionError(config.role, 'group.id is required', 'group.id')
	}
	const isolation = reader.oneOf('isolation.level', ISOLATION_LEVELS)

	return {
		client,
		consumer: {
			groupId,
			retry: client.retry,
			metadataMaxAge: reader.integer('metadata.max.age.ms'),
			sessionTimeout: reader.integer('session.timeout.ms'),
			heartbeatInterval: reader.integer('heartbeat.interval.ms'),
			rebalanceTimeout: reader.integer('max.poll.interval.ms'),
			minBytes: reader.integer('fetch.min.bytes'),
			maxBytes: reader.integer('fetch.max.bytes'),
			maxBytesPerPartition: reader.integer('max.partition.fetch.bytes'),
			allowAutoTopicCreation: reader.boolean('allow.auto.create.topics'),
			readUncommitted: isolation === undefined ? undefined : isolation === 'read_uncommitted',
		},
		autoCommit: reader.boolean('enable.auto.commit') ?? true,
		autoCommitInterval: reader.integer('auto.commit.interval.ms'),
		autoOffsetReset: reader.oneOf('auto.offset.reset', OFFSET_RESETS) ?? 'latest',
		ignored: reader.unused(),
	}
}

export function toAdminSettings(config: ConnectionConfig<'admin'>): KafkaJsAdminSettings {
	const reader = new OptionReader(config)
	const client = readClient(reader, config.role)

	return {
		client,
		admin: { retry: client.retry },
		apiTimeoutMs: reader.integer('default.api.timeout.ms'),
		ignored: reader.unused(),
	}
}
