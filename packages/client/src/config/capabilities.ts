/**
 * Capability option groups
 *
 * Each group is declared once as an interface plus a class mixin, and role
 * builders compose the mixins they need. Setters never validate: each one
 * writes exactly one key through `set()` and returns the builder.
 *
 * @see https://www.typescriptlang.org/docs/handbook/mixins.html
 */

import type { DnsLookup, Duration, OptionValue, RecordingLevel, SaslMechanism, SecurityProtocol } from './types.js'

/**
 * Class constructor accepted by the mixins.
 *
 * TypeScript requires `any[]` here: a mixin class must have a constructor
 * with a single rest parameter of type `any[]` (TS2545).
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = object> = new (...args: any[]) => T

/**
 * Anything that accumulates options through the option-set primitive
 */
export interface OptionSink {
	set(key: string, value: OptionValue): this
}

function millis(duration: Duration): number {
	return Math.trunc(duration)
}

function list(values: readonly string[]): string {
	return values.join(',')
}

// ==================== General client options ====================

export interface ClientCapability {
	/**
	 * Seed brokers used to discover the cluster, as `host:port` pairs.
	 * The list only affects the initial connection.
	 *
	 * Default: ""
	 */
	bootstrapServers(servers: readonly string[]): this
	/**
	 * How DNS lookups are used when connecting.
	 *
	 * Default: use_all_dns_ips
	 */
	clientDnsLookup(lookup: DnsLookup): this
	/**
	 * Logical application name sent with every request, for server-side logs.
	 *
	 * Default: ""
	 */
	clientId(id: string): this
	/**
	 * Close idle connections after this long.
	 *
	 * Default: 300000 (5 minutes)
	 */
	connectionsMaxIdle(idle: Duration): this
	/**
	 * Force a metadata refresh after this long even without leadership changes.
	 *
	 * Default: 300000 (5 minutes)
	 */
	metadataMaxAge(age: Duration): this
	/**
	 * Metrics reporter class names.
	 *
	 * Default: ""
	 */
	metricReporters(reporters: readonly string[]): this
	/**
	 * Number of samples kept to compute metrics.
	 *
	 * Default: 2
	 */
	metricsNumSamples(count: number): this
	/**
	 * Highest recording level for metrics.
	 *
	 * Default: INFO
	 */
	metricsRecordingLevel(level: RecordingLevel): this
	/**
	 * Window a metrics sample is computed over.
	 *
	 * Default: 30000 (30 seconds)
	 */
	metricsSampleWindow(window: Duration): this
	/**
	 * TCP receive buffer size; -1 uses the OS default.
	 *
	 * Default: 65536 (64 kibibytes)
	 */
	receiveBufferBytes(count: number): this
	/**
	 * Base delay before reconnecting to a host that failed.
	 *
	 * Default: 50
	 */
	reconnectBackoff(backoff: Duration): this
	/**
	 * Cap on the exponential per-host reconnect backoff. 20% jitter is added
	 * after each increase.
	 *
	 * Default: 1000 (1 second)
	 */
	reconnectBackoffMax(max: Duration): this
	/**
	 * Maximum wait for the response to a request before it is resent or failed.
	 *
	 * Default: 30000 (30 seconds)
	 */
	requestTimeout(timeout: Duration): this
	/**
	 * Delay before retrying a failed request.
	 *
	 * Default: 100
	 */
	retryBackoff(backoff: Duration): this
	/**
	 * Protocol used to talk to brokers.
	 *
	 * Default: PLAINTEXT
	 */
	securityProtocol(protocol: SecurityProtocol): this
	/**
	 * Security provider creator class names.
	 *
	 * Default: null
	 */
	securityProviders(providers: readonly string[]): this
	/**
	 * TCP send buffer size; -1 uses the OS default.
	 *
	 * Default: 131072 (128 kibibytes)
	 */
	sendBufferBytes(count: number): this
	/**
	 * Time allowed to establish a socket connection.
	 *
	 * Default: 10000 (10 seconds)
	 */
	socketConnectionSetupTimeout(timeout: Duration): this
	/**
	 * Cap on the exponentially growing connection setup timeout.
	 *
	 * Default: 30000 (30 seconds)
	 */
	socketConnectionSetupTimeoutMax(max: Duration): this
}

export function withClientOptions<TBase extends Constructor<OptionSink>>(Base: TBase) {
	return class ClientOptions extends Base implements ClientCapability {
		bootstrapServers(servers: readonly string[]): this {
			return this.set('bootstrap.servers', list(servers))
		}

		clientDnsLookup(lookup: DnsLookup): this {
			return this.set('client.dns.lookup', lookup)
		}

		clientId(id: string): this {
			return this.set('client.id', id)
		}

		connectionsMaxIdle(idle: Duration): this {
			return this.set('connections.max.idle.ms', millis(idle))
		}

		metadataMaxAge(age: Duration): this {
			return this.set('metadata.max.age.ms', millis(age))
		}

		metricReporters(reporters: readonly string[]): this {
			return this.set('metric.reporters', list(reporters))
		}

		metricsNumSamples(count: number): this {
			return this.set('metrics.num.samples', count)
		}

		metricsRecordingLevel(level: RecordingLevel): this {
			return this.set('metrics.recording.level', level)
		}

		metricsSampleWindow(window: Duration): this {
			return this.set('metrics.sample.window.ms', millis(window))
		}

		receiveBufferBytes(count: number): this {
			return this.set('receive.buffer.bytes', count)
		}

		reconnectBackoff(backoff: Duration): this {
			return this.set('reconnect.backoff.ms', millis(backoff))
		}

		reconnectBackoffMax(max: Duration): this {
			return this.set('reconnect.backoff.max.ms', millis(max))
		}

		requestTimeout(timeout: Duration): this {
			return this.set('request.timeout.ms', millis(timeout))
		}

		retryBackoff(backoff: Duration): this {
			return this.set('retry.backoff.ms', millis(backoff))
		}

		securityProtocol(protocol: SecurityProtocol): this {
			return this.set('security.protocol', protocol)
		}

		securityProviders(providers: readonly string[]): this {
			return this.set('security.providers', list(providers))
		}

		sendBufferBytes(count: number): this {
			return this.set('send.buffer.bytes', count)
		}

		socketConnectionSetupTimeout(timeout: Duration): this {
			return this.set('socket.connection.setup.timeout.ms', millis(timeout))
		}

		socketConnectionSetupTimeoutMax(max: Duration): this {
			return this.set('socket.connection.setup.timeout.max.ms', millis(max))
		}
	}
}

// ==================== TLS ====================

export interface TlsCapability {
	/**
	 * Password of the private key given by `ssl.keystore.key`.
	 *
	 * Default: null
	 */
	sslKeyPassword(password: string): this
	/**
	 * PEM certificate chain presented to brokers.
	 *
	 * Default: null
	 */
	sslKeystoreCertificateChain(chain: string): this
	/**
	 * PEM (PKCS#8) private key. Encrypted keys need `ssl.key.password`.
	 *
	 * Default: null
	 */
	sslKeystoreKey(key: string): this
	/**
	 * PEM CA certificates used to verify brokers.
	 *
	 * Default: null (system trust store)
	 */
	sslTruststoreCertificates(certificates: string): this
}

export function withTlsOptions<TBase extends Constructor<OptionSink>>(Base: TBase) {
	return class TlsOptions extends Base implements TlsCapability {
		sslKeyPassword(password: string): this {
			return this.set('ssl.key.password', password)
		}

		sslKeystoreCertificateChain(chain: string): this {
			return this.set('ssl.keystore.certificate.chain', chain)
		}

		sslKeystoreKey(key: string): this {
			return this.set('ssl.keystore.key', key)
		}

		sslTruststoreCertificates(certificates: string): this {
			return this.set('ssl.truststore.certificates', certificates)
		}
	}
}

// ==================== SASL ====================

export interface SaslCapability {
	/**
	 * SASL mechanism used when the security protocol is SASL_*.
	 *
	 * Default: PLAIN
	 */
	saslMechanism(mechanism: SaslMechanism): this
	/** Default: null */
	saslUsername(username: string): this
	/** Default: null */
	saslPassword(password: string): this
}

export function withSaslOptions<TBase extends Constructor<OptionSink>>(Base: TBase) {
	return class SaslOptions extends Base implements SaslCapability {
		saslMechanism(mechanism: SaslMechanism): this {
			return this.set('sasl.mechanism', mechanism)
		}

		saslUsername(username: string): this {
			return this.set('sasl.username', username)
		}

		saslPassword(password: string): this {
			return this.set('sasl.password', password)
		}
	}
}

// ==================== Retry policy ====================

export interface RetryCapability {
	/**
	 * Maximum number of times a failed request is retried.
	 *
	 * Default: unset (the key is absent until this is called)
	 */
	retries(count: number): this
	/**
	 * Cap on the exponential retry backoff.
	 *
	 * Default: 1000 (1 second)
	 */
	retryBackoffMax(max: Duration): this
}

export function withRetryOptions<TBase extends Constructor<OptionSink>>(Base: TBase) {
	return class RetryOptions extends Base implements RetryCapability {
		retries(count: number): this {
			return this.set('retries', count)
		}

		retryBackoffMax(max: Duration): this {
			return this.set('retry.backoff.max.ms', millis(max))
		}
	}
}

// ==================== API timeout ====================

export interface ApiTimeoutCapability {
	/**
	 * Timeout for client operations that take no explicit timeout.
	 *
	 * Default: 60000 (1 minute)
	 */
	defaultApiTimeout(timeout: Duration): this
}

export function withApiTimeoutOptions<TBase extends Constructor<OptionSink>>(Base: TBase) {
	return class ApiTimeoutOptions extends Base implements ApiTimeoutCapability {
		defaultApiTimeout(timeout: Duration): this {
			return this.set('default.api.timeout.ms', millis(timeout))
		}
	}
}
