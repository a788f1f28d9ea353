// Connection configuration
export * from '@/config/index.js'

// Topics and codecs
export { topic, topicFamily, type PayloadOf, type Topic, type TopicOptions } from '@/topic.js'
export { codec, string, json, buffer, type Codec } from '@/codec.js'

// Typed clients
export * from '@/producer/index.js'
export * from '@/consumer/index.js'
export * from '@/admin/index.js'

// Raw client boundary and errors
export * from '@/client/index.js'

// Logger
export { createLogger, noopLogger, type Logger, type LoggingOptions, type LogLevel } from '@/logger.js'
