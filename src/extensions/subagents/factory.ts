/**
 * Build subagents in code, for registration alongside discovered ones
 */

import type { SubagentModel } from './schema.js';
import type { SubagentInput } from './types.js';

export interface CreateSubagentOptions {
  name: string;
  description: string;
  /** System prompt */
  prompt?: string;
  allowedTools?: string[];
  model?: SubagentModel;
  maxActions?: number;
  thinkingEnabled?: boolean;
  thinkingBudget?: number;
}

/**
 * Create a subagent ready for `SubagentManager.register`
 */
export function createSubagent(options: CreateSubagentOptions): SubagentInput {
  const subagent: SubagentInput = {
    name: options.name,
    description: options.description,
    allowedTools: options.allowedTools ? [...options.allowedTools] : [],
    extensions: {},
    body: options.prompt ?? '',
  };

  if (options.model !== undefined) subagent.extensions.model = options.model;
  if (options.maxActions !== undefined) subagent.extensions.maxActions = options.maxActions;
  if (options.thinkingEnabled !== undefined) subagent.extensions.thinkingEnabled = options.thinkingEnabled;
  if (options.thinkingBudget !== undefined) subagent.extensions.thinkingBudget = options.thinkingBudget;

  return subagent;
}
