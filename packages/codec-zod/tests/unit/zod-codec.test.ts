import {
	ConsumerConfigBuilder,
	ProducerConfigBuilder,
	SerializationError,
	TypedConsumer,
	TypedProducer,
	topic,
} from '@topicwire/client'
import { createMemoryBroker } from '@topicwire/client/testing'
import { describe, expect, it } from 'vitest'
import { z, ZodError } from 'zod'

import { zodCodec } from '../../src/index.js'

const Reading = z.object({
	sensor: z.string(),
	celsius: z.number(),
})

describe('zodCodec', () => {
	it('encodes checked values as JSON', () => {
		const codec = zodCodec(Reading)
		expect(codec.encode({ sensor: 's1', celsius: 20 }).toString('utf-8')).toBe('{"sensor":"s1","celsius":20}')
	})

	it('strips unknown keys on decode', () => {
		const codec = zodCodec(Reading)
		expect(codec.decode(Buffer.from('{"sensor":"s1","celsius":20,"extra":true}'))).toEqual({
			sensor: 's1',
			celsius: 20,
		})
	})

	it('throws a ZodError for values that do not match', () => {
		const codec = zodCodec(Reading)
		expect(() => codec.decode(Buffer.from('{"sensor":"s1"}'))).toThrow(ZodError)
	})

	it('applies schema transforms on decode', () => {
		const codec = zodCodec(z.string().transform(value => value.length))
		expect(codec.decode(Buffer.from('"abcd"'))).toBe(4)
	})

	it('takes a custom wire format', () => {
		const codec = zodCodec(z.string().email(), {
			serialize: value => Buffer.from(String(value), 'latin1'),
			deserialize: buffer => buffer.toString('latin1'),
		})

		expect(codec.decode(Buffer.from('user@example.com', 'latin1'))).toBe('user@example.com')
		expect(() => codec.encode('nope')).toThrow(ZodError)
	})

	it('surfaces mismatched payloads as SerializationError on receive', async () => {
		const broker = createMemoryBroker()
		const readings = topic('readings', { codec: zodCodec(Reading) })
		const loose = topic<unknown>('readings')
		const consumer = new TypedConsumer(
			new ConsumerConfigBuilder().bootstrapServers(['localhost:9092']).groupId('g1').autoOffsetReset('earliest').build(),
			readings,
			{ clients: broker }
		)

		await new TypedProducer(new ProducerConfigBuilder().bootstrapServers(['localhost:9092']).build(), {
			clients: broker,
		}).send(loose, { sensor: 42 })
		const message = await consumer.receive()

		expect(() => message.payload()).toThrow(SerializationError)
	})
})
