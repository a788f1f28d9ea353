export { TypedConsumer } from './consumer.js'
export { TypedMessage } from './message.js'
export type { ReceiveOptions, ReceiveResult, TypedConsumerOptions } from './types.js'
