/**
 * Subagents - Module exports
 */

export * from './types.js';
export {
  SUBAGENT_MODELS,
  SubagentExtensionSchema,
  isSubagentModel,
  type SubagentModel,
} from './schema.js';
export { subagentKind, AGENT_FILE_NAME } from './kind.js';
export { createSubagent, type CreateSubagentOptions } from './factory.js';
export { SubagentManager, type SubagentManagerOptions } from './manager.js';
