/**
 * SKILL.md frontmatter schema
 *
 * Optional fields of the wrong YAML type are dropped instead of failing the
 * whole skill.
 */

import { z } from 'zod';

export const MAX_DESCRIPTION_LENGTH = 1024;
export const MAX_COMPATIBILITY_LENGTH = 500;

function stringifyScalar(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  return undefined;
}

/**
 * `metadata` is a flat string map; scalar values are stringified and
 * anything nested is dropped
 */
export const SkillMetadataSchema = z.record(z.unknown()).transform((raw) => {
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    const text = stringifyScalar(value);
    if (text !== undefined) {
      metadata[key] = text;
    }
  }
  return metadata;
});

export const SkillExtensionSchema = z.object({
  license: z.string().optional().catch(undefined),
  compatibility: z.string().optional().catch(undefined),
  metadata: SkillMetadataSchema.optional().catch(undefined),
});
