export { eventSchema, eventBatchSchema } from './event-schema.js';
export type { EventInput } from './event-schema.js';
export { agentOptionsSchema, parseAgentOptions } from './agent-options.js';
export type { AgentOptions, AgentOptionsInput } from './agent-options.js';
export { HandlebarsTemplateResolver } from './template-resolver.js';
export type { TemplateResolver } from './template-resolver.js';
export { buildParameters, renderFields, normalizeHtmlFlag, presence } from './parameter-builder.js';
export { AgentLiveness } from './liveness.js';
export type { LivenessSnapshot } from './liveness.js';
export { PushoverAgent } from './pushover-agent.js';
export type { BatchSummary, EventOutcome, PreparedNotification } from './pushover-agent.js';
