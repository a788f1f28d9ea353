/**
 * Option-set primitive shared by every configuration builder
 *
 * All setters, whatever capability they belong to, end in `set()`: one
 * textual key/value assignment into an insertion-ordered map. Setting a key
 * again replaces its value and keeps its position.
 */

import { BuilderConsumedError } from '@/client/errors.js'
import type { ClientRole, OptionValue } from './types.js'

/**
 * Canonical textual form of an option value
 */
export function toOptionString(value: OptionValue): string {
	return String(value)
}

function isEntryIterable(
	entries: Iterable<readonly [string, OptionValue]> | Readonly<Record<string, OptionValue>>
): entries is Iterable<readonly [string, OptionValue]> {
	return typeof Reflect.get(entries, Symbol.iterator) === 'function'
}

/**
 * Finished, read-only set of options for one client role
 */
export class ConnectionConfig<R extends ClientRole = ClientRole> implements Iterable<[string, string]> {
	readonly role: R
	private readonly options: ReadonlyMap<string, string>

	constructor(role: R, options: ReadonlyMap<string, string>) {
		this.role = role
		this.options = new Map(options)
		Object.freeze(this)
	}

	/**
	 * Build a configuration from plain key/value pairs, e.g. parsed from a
	 * properties file or the environment
	 */
	static from<R extends ClientRole>(
		role: R,
		entries: Iterable<readonly [string, OptionValue]> | Readonly<Record<string, OptionValue>>
	): ConnectionConfig<R> {
		const pairs = isEntryIterable(entries) ? entries : Object.entries(entries)
		const options = new Map<string, string>()
		for (const [key, value] of pairs) {
			options.set(key, toOptionString(value))
		}
		return new ConnectionConfig(role, options)
	}

	get size(): number {
		return this.options.size
	}

	get(key: string): string | undefined {
		return this.options.get(key)
	}

	has(key: string): boolean {
		return this.options.has(key)
	}

	keys(): IterableIterator<string> {
		return this.options.keys()
	}

	entries(): IterableIterator<[string, string]> {
		return this.options.entries()
	}

	toRecord(): Record<string, string> {
		return Object.fromEntries(this.options)
	}

	[Symbol.iterator](): IterableIterator<[string, string]> {
		return this.options.entries()
	}
}

/**
 * Builder holding one configuration under construction
 *
 * `build()` is terminal. Any call after it throws BuilderConsumedError, since
 * nothing stops a reference to the builder from outliving the build.
 */
export class OptionSetBuilder<R extends ClientRole> {
	readonly role: R
	private readonly options = new Map<string, string>()
	private consumed = false

	constructor(role: R) {
		this.role = role
	}

	/**
	 * Set any option by its broker-defined key. Ranges are not checked.
	 */
	set(key: string, value: OptionValue): this {
		this.assertNotConsumed()
		this.options.set(key, toOptionString(value))
		return this
	}

	/**
	 * Finish the configuration. The builder cannot be used afterwards.
	 */
	build(): ConnectionConfig<R> {
		this.assertNotConsumed()
		this.consumed = true
		return new ConnectionConfig(this.role, this.options)
	}

	private assertNotConsumed(): void {
		if (this.consumed) {
			throw new BuilderConsumedError(this.role)
		}
	}
}
