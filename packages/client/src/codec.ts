/**
 * Payload codecs
 *
 * A codec converts a topic's payload type to bytes and back. Codecs throw on
 * failure; producers and messages turn the throw into a SerializationError.
 */

export interface Codec<T> {
	encode(value: T): Buffer
	decode(buffer: Buffer): T
}

export function string(): Codec<string> {
	return {
		encode: value => Buffer.from(value, 'utf-8'),
		decode: buffer => buffer.toString('utf-8'),
	}
}

/**
 * JSON codec, the default for topics. Decoding does not check the shape of
 * the parsed value; use a schema codec for that.
 */
export function json<T>(): Codec<T> {
	return {
		encode: value => {
			const text: string | undefined = JSON.stringify(value)
			if (text === undefined) {
				throw new TypeError(`Value of type ${typeof value} has no JSON representation`)
			}
			return Buffer.from(text, 'utf-8')
		},
		decode: buffer => JSON.parse(buffer.toString('utf-8')) as T,
	}
}

export function buffer(): Codec<Buffer> {
	return {
		encode: value => value,
		decode: value => value,
	}
}

export const codec = {
	string,
	json,
	buffer,
}
