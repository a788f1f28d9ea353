/**
 * Value types for connection configuration options
 */

/**
 * Client role a connection configuration is built for
 */
export type ClientRole = 'producer' | 'consumer' | 'admin'

/**
 * Any value with a canonical textual form
 */
export type OptionValue = string | number | bigint | boolean

/**
 * Duration in milliseconds
 */
export type Duration = number

/**
 * Protocol used to communicate with brokers
 */
export type SecurityProtocol = 'PLAINTEXT' | 'SSL' | 'SASL_PLAINTEXT' | 'SASL_SSL'

/**
 * SASL mechanisms the kafkajs adapter can authenticate with
 */
export type SaslMechanism = 'PLAIN' | 'SCRAM-SHA-256' | 'SCRAM-SHA-512'

/**
 * How the client uses DNS lookups
 */
export type DnsLookup = 'use_all_dns_ips' | 'resolve_canonical_bootstrap_servers_only'

/**
 * Highest recording level for metrics
 */
export type RecordingLevel = 'INFO' | 'DEBUG' | 'TRACE'

/**
 * Behaviour when a consumer group has no committed offset
 *
 * - earliest: start from the earliest offset
 * - latest: start from the latest offset
 * - none: fail if no previous offset is found for the group
 */
export type AutoOffsetReset = 'earliest' | 'latest' | 'none'

/**
 * Visibility of transactional records to a consumer
 */
export type IsolationLevel = 'read_committed' | 'read_uncommitted'

/**
 * Acknowledgments a producer waits for
 */
export type Acks = 'all' | '-1' | '0' | '1'

/**
 * Compression codec for produced batches
 */
export type CompressionName = 'none' | 'gzip' | 'snappy' | 'lz4' | 'zstd'
