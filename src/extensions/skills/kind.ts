/**
 * How the discovery engine reads and checks skills
 */

import type { ResourceKind } from '../../base/discovery/index.js';
import { InvalidResourceError } from '../../base/utils/errors.js';
import { MAX_COMPATIBILITY_LENGTH, MAX_DESCRIPTION_LENGTH, SkillExtensionSchema } from './schema.js';
import type { SkillExtensions } from './types.js';

export const SKILL_FILE_NAME = 'SKILL.md';

export const skillKind: ResourceKind<SkillExtensions> = {
  label: 'Skill',
  fileName: SKILL_FILE_NAME,
  extensionSchema: SkillExtensionSchema,

  validate(skill) {
    if (skill.description.length > MAX_DESCRIPTION_LENGTH) {
      throw new InvalidResourceError(
        `description must be ${MAX_DESCRIPTION_LENGTH} characters or less`,
        skill.name
      );
    }
    const { compatibility } = skill.extensions;
    if (compatibility !== undefined && compatibility.length > MAX_COMPATIBILITY_LENGTH) {
      throw new InvalidResourceError(
        `compatibility must be ${MAX_COMPATIBILITY_LENGTH} characters or less`,
        skill.name
      );
    }
  },

  cloneExtensions(extensions) {
    const copy: SkillExtensions = { ...extensions };
    if (extensions.metadata) {
      copy.metadata = { ...extensions.metadata };
    }
    return copy;
  },
};
