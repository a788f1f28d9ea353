export { TypedAdmin } from './admin.js'
export type { CreateTopicOptions, TopicCreationRequest, TopicCreationResult, TypedAdminOptions } from './types.js'
