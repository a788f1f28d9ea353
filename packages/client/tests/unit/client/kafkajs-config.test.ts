import { CompressionTypes } from 'kafkajs'
import { describe, expect, it } from 'vitest'

import { ConstructionError } from '@/client/errors.js'
import {
	parseBootstrapServers,
	toAdminSettings,
	toConsumerSettings,
	toProducerSettings,
} from '@/client/kafkajs-config.js'
import { AdminConfigBuilder, ConsumerConfigBuilder, ProducerConfigBuilder } from '@/config/builders.js'
import { ConnectionConfig } from '@/config/option-set.js'

describe('parseBootstrapServers', () => {
	it('splits and trims the list', () => {
		expect(parseBootstrapServers('producer', 'a:9092, b:9093')).toEqual(['a:9092', 'b:9093'])
	})

	it('skips empty entries', () => {
		expect(parseBootstrapServers('producer', 'a:9092,')).toEqual(['a:9092'])
	})

	it('accepts bracketed IPv6 hosts', () => {
		expect(parseBootstrapServers('admin', '[::1]:9092')).toEqual(['[::1]:9092'])
	})

	it('rejects an empty list', () => {
		expect(() => parseBootstrapServers('consumer', '')).toThrow(
			'Cannot create consumer client: bootstrap.servers is empty'
		)
		expect(() => parseBootstrapServers('consumer', undefined)).toThrow(ConstructionError)
	})

	it.each(['localhost', 'localhost:', 'localhost:0', 'localhost:70000', 'local host:9092'])(
		'rejects "%s"',
		server => {
			expect(() => parseBootstrapServers('producer', server)).toThrow(`malformed bootstrap server "${server}"`)
		}
	)

	it('names the option at fault', () => {
		try {
			parseBootstrapServers('producer', 'nope')
			expect.unreachable()
		} catch (error) {
			expect(error).toBeInstanceOf(ConstructionError)
			expect(error).toMatchObject({ role: 'producer', option: 'bootstrap.servers' })
		}
	})
})

describe('toProducerSettings', () => {
	it('maps client and producer options', () => {
		const settings = toProducerSettings(
			new ProducerConfigBuilder()
				.bootstrapServers(['localhost:9092'])
				.clientId('api')
				.requestTimeout(5000)
				.socketConnectionSetupTimeout(2000)
				.retryBackoff(100)
				.retryBackoffMax(1000)
				.retries(3)
				.metadataMaxAge(60000)
				.acks('all')
				.compressionType('gzip')
				.enableIdempotence(true)
				.build()
		)

		expect(settings.client).toEqual({
			brokers: ['localhost:9092'],
			clientId: 'api',
			requestTimeout: 5000,
			connectionTimeout: 2000,
			retry: { initialRetryTime: 100, maxRetryTime: 1000, retries: 3 },
			ssl: undefined,
			sasl: undefined,
		})
		expect(settings.producer).toEqual({
			retry: { initialRetryTime: 100, maxRetryTime: 1000, retries: 3 },
			metadataMaxAge: 60000,
			idempotent: true,
		})
		expect(settings.acks).toBe(-1)
		expect(settings.compression).toBe(CompressionTypes.GZIP)
		expect(settings.ignored).toEqual([])
	})

	it('uses acks=all and no compression by default', () => {
		const settings = toProducerSettings(new ProducerConfigBuilder().bootstrapServers(['localhost:9092']).build())

		expect(settings.acks).toBe(-1)
		expect(settings.compression).toBe(CompressionTypes.None)
		expect(settings.client.retry).toBeUndefined()
	})

	it('reports keys kafkajs cannot apply', () => {
		const settings = toProducerSettings(
			new ProducerConfigBuilder()
				.bootstrapServers(['localhost:9092'])
				.sendBufferBytes(131072)
				.metricsNumSamples(2)
				.build()
		)

		expect(settings.ignored).toEqual(['send.buffer.bytes', 'metrics.num.samples'])
	})

	it('rejects values of the wrong shape', () => {
		const config = ConnectionConfig.from('producer', { 'bootstrap.servers': 'localhost:9092', acks: 'some' })

		expect(() => toProducerSettings(config)).toThrow(
			'Cannot create producer client: option acks must be one of all, -1, 0, 1, got "some"'
		)
	})

	it('rejects non-integer durations', () => {
		const config = ConnectionConfig.from('producer', {
			'bootstrap.servers': 'localhost:9092',
			'request.timeout.ms': '1.5s',
		})

		expect(() => toProducerSettings(config)).toThrow('option request.timeout.ms must be an integer, got "1.5s"')
	})
})

describe('security settings', () => {
	it('enables TLS with the configured PEM material', () => {
		const settings = toProducerSettings(
			new ProducerConfigBuilder()
				.bootstrapServers(['localhost:9093'])
				.securityProtocol('SSL')
				.sslTruststoreCertificates('ca-pem')
				.build()
		)

		expect(settings.client.ssl).toEqual({ ca: 'ca-pem', cert: undefined, key: undefined, passphrase: undefined })
		expect(settings.client.sasl).toBeUndefined()
	})

	it('enables TLS with system trust when no material is given', () => {
		const settings = toAdminSettings(
			new AdminConfigBuilder().bootstrapServers(['localhost:9093']).securityProtocol('SSL').build()
		)

		expect(settings.client.ssl).toBe(true)
	})

	it('maps SASL mechanisms', () => {
		const settings = toAdminSettings(
			new AdminConfigBuilder()
				.bootstrapServers(['localhost:9094'])
				.securityProtocol('SASL_PLAINTEXT')
				.saslMechanism('SCRAM-SHA-512')
				.saslUsername('user')
				.saslPassword('test-secret')
				.build()
		)

		expect(settings.client.sasl).toEqual({ mechanism: 'scram-sha-512', username: 'user', password: 'test-secret' })
		expect(settings.client.ssl).toBeUndefined()
	})

	it('requires SASL credentials', () => {
		const config = new AdminConfigBuilder()
			.bootstrapServers(['localhost:9094'])
			.securityProtocol('SASL_SSL')
			.saslUsername('user')
			.build()

		expect(() => toAdminSettings(config)).toThrow('SASL security protocol requires sasl.username and sasl.password')
	})

	it('ignores SASL keys under PLAINTEXT', () => {
		const settings = toAdminSettings(
			new AdminConfigBuilder().bootstrapServers(['localhost:9092']).saslUsername('user').build()
		)

		expect(settings.client.sasl).toBeUndefined()
		expect(settings.ignored).toEqual(['sasl.username'])
	})
})

describe('toConsumerSettings', () => {
	it('maps group and fetch options', () => {
		const settings = toConsumerSettings(
			new ConsumerConfigBuilder()
				.bootstrapServers(['localhost:9092'])
				.groupId('g1')
				.autoOffsetReset('earliest')
				.sessionTimeout(30000)
				.heartbeatInterval(3000)
				.maxPollInterval(60000)
				.fetchMinBytes(1)
				.fetchMaxBytes(1024)
				.maxPartitionFetchBytes(512)
				.allowAutoCreateTopics(false)
				.isolationLevel('read_committed')
				.enableAutoCommit(false)
				.autoCommitInterval(1000)
				.build()
		)

		expect(settings.consumer).toEqual({
			groupId: 'g1',
			retry: undefined,
			metadataMaxAge: undefined,
			sessionTimeout: 30000,
			heartbeatInterval: 3000,
			rebalanceTimeout: 60000,
			minBytes: 1,
			maxBytes: 1024,
			maxBytesPerPartition: 512,
			allowAutoTopicCreation: false,
			readUncommitted: false,
		})
		expect(settings.autoCommit).toBe(false)
		expect(settings.autoCommitInterval).toBe(1000)
		expect(settings.autoOffsetReset).toBe('earliest')
	})

	it('defaults to auto commit from the latest offset', () => {
		const settings = toConsumerSettings(
			new ConsumerConfigBuilder().bootstrapServers(['localhost:9092']).groupId('g1').build()
		)

		expect(settings.autoCommit).toBe(true)
		expect(settings.autoOffsetReset).toBe('latest')
		expect(settings.consumer.readUncommitted).toBeUndefined()
	})

	it('requires a group id', () => {
		const config = new ConsumerConfigBuilder().bootstrapServers(['localhost:9092']).build()

		expect(() => toConsumerSettings(config)).toThrow('Cannot create consumer client: group.id is required')
	})

	it('rejects malformed booleans', () => {
		const config = ConnectionConfig.from('consumer', {
			'bootstrap.servers': 'localhost:9092',
			'group.id': 'g1',
			'enable.auto.commit': 'yes',
		})

		expect(() => toConsumerSettings(config)).toThrow('option enable.auto.commit must be true or false, got "yes"')
	})
})

describe('toAdminSettings', () => {
	it('uses default.api.timeout.ms as the request timeout', () => {
		const settings = toAdminSettings(
			new AdminConfigBuilder().bootstrapServers(['localhost:9092']).retries(2).defaultApiTimeout(15000).build()
		)

		expect(settings.apiTimeoutMs).toBe(15000)
		expect(settings.admin).toEqual({ retry: { initialRetryTime: undefined, maxRetryTime: undefined, retries: 2 } })
	})
})
