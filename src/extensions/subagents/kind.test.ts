/**
 * Subagent frontmatter and validation tests
 */

import { describe, it, expect } from '@jest/globals';
import { subagentKind } from './kind.js';
import { isSubagentModel } from './schema.js';
import { decodeMetadataOnly } from '../../base/discovery/frontmatter.js';
import { validateResource } from '../../base/discovery/resource.js';
import { InvalidResourceError } from '../../base/utils/errors.js';
import { definitionDocument } from '../../../tests/helpers/fixtures.js';

function decode(extra: string[]) {
  return decodeMetadataOnly(definitionDocument(['name: reviewer', 'description: Reviews code', ...extra]), subagentKind);
}

describe('subagentKind', () => {
  it('should decode snake_case fields into camelCase extensions', () => {
    const agent = decode(['model: sonnet', 'max_actions: 25', 'thinking_enabled: true', 'thinking_budget: 8000']);

    expect(agent.extensions).toEqual({
      model: 'sonnet',
      maxActions: 25,
      thinkingEnabled: true,
      thinkingBudget: 8000,
    });
  });

  it('should drop fields of the wrong type', () => {
    const agent = decode([
      'model: 3',
      'max_actions: "25"',
      'thinking_enabled: yes please',
      'thinking_budget: 1.5',
    ]);

    expect(agent.extensions).toEqual({});
  });

  it('should reject an unknown model', () => {
    const agent = decode(['model: gpt-4']);

    expect(() => validateResource(agent, subagentKind)).toThrow(InvalidResourceError);
    expect(() => validateResource(agent, subagentKind)).toThrow(
      'model must be one of: inherit, haiku, sonnet, opus'
    );
  });

  it('should accept every known model', () => {
    for (const model of ['inherit', 'haiku', 'sonnet', 'opus']) {
      expect(() => validateResource(decode([`model: ${model}`]), subagentKind)).not.toThrow();
    }
  });

  it('should narrow model names', () => {
    expect(isSubagentModel('opus')).toBe(true);
    expect(isSubagentModel('Opus')).toBe(false);
  });
});
