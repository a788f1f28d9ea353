export { TypedProducer } from './producer.js'
export type { DeliveryReport, SendOptions, TypedProducerOptions } from './types.js'
