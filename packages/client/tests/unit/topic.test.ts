import { describe, expect, expectTypeOf, it } from 'vitest'

import { codec } from '@/codec.js'
import { topic, topicFamily, type PayloadOf, type Topic } from '@/topic.js'

type Update = 'Thing1' | 'Thing2'

class SessionTopic implements Topic<Update> {
	readonly codec = codec.json<Update>()

	constructor(readonly id: string) {}

	topicName(): string {
		return `session:${this.id}`
	}
}

describe('topic', () => {
	it('resolves a fixed name', () => {
		const orders = topic<{ id: string }>('orders')
		expect(orders.topicName()).toBe('orders')
	})

	it('defaults to the JSON codec', () => {
		const orders = topic<{ id: string }>('orders')
		expect(orders.codec.encode({ id: '1' }).toString('utf-8')).toBe('{"id":"1"}')
	})

	it('takes an explicit codec', () => {
		const audit = topic('audit', { codec: codec.string() })
		expect(audit.codec.decode(Buffer.from('a'))).toBe('a')
		expectTypeOf(audit).toEqualTypeOf<Topic<string>>()
	})

	it('is immutable', () => {
		expect(Object.isFrozen(topic('orders'))).toBe(true)
	})
})

describe('topicFamily', () => {
	it('computes names from arguments', () => {
		const sessionTopic = topicFamily<Update, [id: string]>(id => `session:${id}`)

		expect(sessionTopic('abc').topicName()).toBe('session:abc')
		expect(sessionTopic('s2d54f').topicName()).toBe('session:s2d54f')
	})

	it('shares one codec across the family', () => {
		const sessionTopic = topicFamily<Update, [id: string]>(id => `session:${id}`)
		expect(sessionTopic('a').codec).toBe(sessionTopic('b').codec)
	})
})

describe('user-defined topics', () => {
	it('compose names from instance state', () => {
		expect(new SessionTopic('abc').topicName()).toBe('session:abc')
	})

	it('expose their payload type', () => {
		expectTypeOf<PayloadOf<SessionTopic>>().toEqualTypeOf<Update>()
	})
})
