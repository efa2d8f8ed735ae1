/**
 * Skills System - Module exports
 */

export * from './types.js';
export {
  SkillExtensionSchema,
  SkillMetadataSchema,
  MAX_DESCRIPTION_LENGTH,
  MAX_COMPATIBILITY_LENGTH,
} from './schema.js';
export { skillKind, SKILL_FILE_NAME } from './kind.js';
export { SkillManager, type SkillManagerOptions } from './manager.js';
export { SkillService } from './service.js';
