/**
 * AGENT.md frontmatter schema
 *
 * YAML keys are snake_case; the decoded fields are camelCase. A field of the
 * wrong type (a string `max_actions`, a fractional budget) is dropped.
 */

import { z } from 'zod';

export const SUBAGENT_MODELS = ['inherit', 'haiku', 'sonnet', 'opus'] as const;

export type SubagentModel = (typeof SUBAGENT_MODELS)[number];

export function isSubagentModel(value: string): value is SubagentModel {
  return SUBAGENT_MODELS.some((model) => model === value);
}

export interface SubagentExtensions {
  /** Model to run the subagent on; checked against SUBAGENT_MODELS by validation */
  model?: string;
  maxActions?: number;
  thinkingEnabled?: boolean;
  thinkingBudget?: number;
}

const optionalInt = z.number().int().optional().catch(undefined);

export const SubagentExtensionSchema = z
  .object({
    model: z.string().optional().catch(undefined),
    max_actions: optionalInt,
    thinking_enabled: z.boolean().optional().catch(undefined),
    thinking_budget: optionalInt,
  })
  .transform((raw): SubagentExtensions => {
    const extensions: SubagentExtensions = {};
    if (raw.model !== undefined) extensions.model = raw.model;
    if (raw.max_actions !== undefined) extensions.maxActions = raw.max_actions;
    if (raw.thinking_enabled !== undefined) extensions.thinkingEnabled = raw.thinking_enabled;
    if (raw.thinking_budget !== undefined) extensions.thinkingBudget = raw.thinking_budget;
    return extensions;
  });
