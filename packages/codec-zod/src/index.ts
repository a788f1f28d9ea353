/**
 * Schema-checked codecs backed by zod
 */

import type { Codec } from '@topicwire/client'
import type { ZodType, ZodTypeDef } from 'zod'

export interface ZodCodecOptions {
	/** Serialize a checked value (default: JSON) */
	serialize?: (value: unknown) => Buffer
	/** Parse bytes into a value to check (default: JSON) */
	deserialize?: (buffer: Buffer) => unknown
}

function toJson(value: unknown): Buffer {
	return Buffer.from(JSON.stringify(value), 'utf-8')
}

function fromJson(buffer: Buffer): unknown {
	return JSON.parse(buffer.toString('utf-8'))
}

/**
 * Codec that checks payloads against a zod schema in both directions
 *
 * Encoding a value that does not match, or decoding bytes that do not, throws
 * the ZodError; the typed clients report it as a SerializationError.
 *
 * @example
 * ```typescript
 * const Update = z.object({ kind: z.enum(['Thing1', 'Thing2']), at: z.number() })
 * const updates = topic('updates', { codec: zodCodec(Update) })
 * ```
 */
export function zodCodec<T>(schema: ZodType<T, ZodTypeDef, unknown>, options: ZodCodecOptions = {}): Codec<T> {
	const serialize = options.serialize ?? toJson
	const deserialize = options.deserialize ?? fromJson

	return {
		encode: value => serialize(schema.parse(value)),
		decode: buffer => schema.parse(deserialize(buffer)),
	}
}
