export { readBacklogEvent, readKibelaEvent, transformEvent } from './dispatch.js';
export type { DispatchLogger, TransformContext } from './dispatch.js';
export { webhookBodySchema } from './payload-schema.js';
