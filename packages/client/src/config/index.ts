export { ConnectionConfig, OptionSetBuilder, toOptionString } from './option-set.js'
export {
	withApiTimeoutOptions,
	withClientOptions,
	withRetryOptions,
	withSaslOptions,
	withTlsOptions,
	type ApiTimeoutCapability,
	type ClientCapability,
	type Constructor,
	type OptionSink,
	type RetryCapability,
	type SaslCapability,
	type TlsCapability,
} from './capabilities.js'
export { AdminConfigBuilder, ConsumerConfigBuilder, ProducerConfigBuilder } from './builders.js'
export type * from './types.js'
