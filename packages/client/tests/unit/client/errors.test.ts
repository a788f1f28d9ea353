import { describe, expect, it } from 'vitest'

import {
	BrokerError,
	BrokerErrorCode,
	ConstructionError,
	KafkaError,
	SerializationError,
	TopicCreationError,
	isRetriable,
	toBrokerError,
} from '@/client/errors.js'

class FakeKafkaJsProtocolError extends Error {
	readonly type = 'UNKNOWN_TOPIC_OR_PARTITION'
	readonly retriable = true
}

class KafkaJSRequestTimeoutError extends Error {
	override readonly name = 'KafkaJSRequestTimeoutError'
}

describe('client errors', () => {
	it('BrokerError defaults retriable from the code', () => {
		expect(new BrokerError('send', BrokerErrorCode.RequestTimedOut, 'slow').retriable).toBe(true)
		expect(new BrokerError('send', BrokerErrorCode.TopicAlreadyExists, 'exists').retriable).toBe(false)
		expect(new BrokerError('send', BrokerErrorCode.NetworkException, 'closed', false).retriable).toBe(false)
	})

	it('formats messages with their context', () => {
		expect(new BrokerError('send', 'REQUEST_TIMED_OUT', 'no ack').message).toBe('send failed (REQUEST_TIMED_OUT): no ack')
		expect(new ConstructionError('admin', 'bad', 'retries').message).toBe('Cannot create admin client: bad')
		expect(new TopicCreationError('orders', 'TOPIC_ALREADY_EXISTS').message).toBe(
			'Cannot create topic orders (TOPIC_ALREADY_EXISTS)'
		)
		expect(new SerializationError('orders', 'decode', new SyntaxError('Unexpected token')).message).toBe(
			'Failed to decode payload for topic orders: Unexpected token'
		)
	})

	it('subclasses share the KafkaError base', () => {
		const error = new TopicCreationError('orders', 'INVALID_REPLICATION_FACTOR', 'too few brokers')
		expect(error).toBeInstanceOf(KafkaError)
		expect(error.name).toBe('TopicCreationError')
		expect(error.topic).toBe('orders')
		expect(error.code).toBe('INVALID_REPLICATION_FACTOR')
	})

	it('isRetriable only trusts client errors', () => {
		expect(isRetriable(new BrokerError('receive', BrokerErrorCode.NetworkException, 'reset'))).toBe(true)
		expect(isRetriable(new Error('plain'))).toBe(false)
		expect(isRetriable('string')).toBe(false)
	})
})

describe('toBrokerError', () => {
	it('keeps the code and retriable flag of kafkajs errors', () => {
		const cause = new FakeKafkaJsProtocolError('This server does not host this topic-partition')
		const error = toBrokerError(cause, 'send')

		expect(error.code).toBe('UNKNOWN_TOPIC_OR_PARTITION')
		expect(error.retriable).toBe(true)
		expect(error.operation).toBe('send')
		expect(error.cause).toBe(cause)
	})

	it('maps request timeouts', () => {
		const error = toBrokerError(new KafkaJSRequestTimeoutError('Request createTopics timed out'), 'createTopics')

		expect(error.code).toBe(BrokerErrorCode.RequestTimedOut)
		expect(error.message).toBe('createTopics failed (REQUEST_TIMED_OUT): Request createTopics timed out')
	})

	it('passes broker errors through', () => {
		const original = new BrokerError('subscribe', BrokerErrorCode.Unknown, 'x')
		expect(toBrokerError(original, 'receive')).toBe(original)
	})

	it('wraps non-errors', () => {
		const error = toBrokerError('socket hang up', 'connect')

		expect(error.code).toBe(BrokerErrorCode.Unknown)
		expect(error.retriable).toBe(false)
		expect(error.message).toBe('connect failed (UNKNOWN): socket hang up')
	})
})
