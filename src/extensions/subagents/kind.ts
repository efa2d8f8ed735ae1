/**
 * How the discovery engine reads and checks subagents
 */

import type { ResourceKind } from '../../base/discovery/index.js';
import { InvalidResourceError } from '../../base/utils/errors.js';
import { SUBAGENT_MODELS, SubagentExtensionSchema, isSubagentModel, type SubagentExtensions } from './schema.js';

export const AGENT_FILE_NAME = 'AGENT.md';

export const subagentKind: ResourceKind<SubagentExtensions> = {
  label: 'Subagent',
  fileName: AGENT_FILE_NAME,
  extensionSchema: SubagentExtensionSchema,

  validate(subagent) {
    const { model } = subagent.extensions;
    if (model !== undefined && model !== '' && !isSubagentModel(model)) {
      throw new InvalidResourceError(`model must be one of: ${SUBAGENT_MODELS.join(', ')}`, subagent.name);
    }
  },

  cloneExtensions(extensions) {
    return { ...extensions };
  },
};
