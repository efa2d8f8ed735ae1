/**
 * Resource name validation
 *
 * Names are joined into filesystem paths (`<root>/<name>/SKILL.md`), so this
 * grammar is what keeps a caller-supplied name inside the configured roots:
 * 1-64 characters of [a-z0-9-], no leading or trailing hyphen, no "--".
 */

import { InvalidNameError } from './errors.js';

export const MAX_RESOURCE_NAME_LENGTH = 64;

function isNameChar(char: string): boolean {
  return (char >= 'a' && char <= 'z') || (char >= '0' && char <= '9') || char === '-';
}

/**
 * Validate a resource name, throwing an InvalidNameError whose `code`
 * identifies the first rule broken.
 */
export function validateResourceName(name: string): void {
  if (name.length === 0) {
    throw new InvalidNameError('NAME_EMPTY', name, 'name cannot be empty');
  }
  if (name.length > MAX_RESOURCE_NAME_LENGTH) {
    throw new InvalidNameError(
      'NAME_TOO_LONG',
      name,
      `name must be ${MAX_RESOURCE_NAME_LENGTH} characters or less`
    );
  }
  if (name.startsWith('-') || name.endsWith('-')) {
    throw new InvalidNameError('NAME_HYPHEN', name, 'name cannot start or end with a hyphen');
  }

  let prev = '';
  for (const char of name) {
    if (char === '-' && prev === '-') {
      throw new InvalidNameError(
        'NAME_CONSECUTIVE_HYPHEN',
        name,
        'name cannot contain consecutive hyphens'
      );
    }
    if (!isNameChar(char)) {
      throw new InvalidNameError(
        'NAME_INVALID_CHARACTER',
        name,
        'name must contain only lowercase letters, numbers, and hyphens'
      );
    }
    prev = char;
  }
}

/**
 * Predicate form of validateResourceName
 */
export function isValidResourceName(name: string): boolean {
  try {
    validateResourceName(name);
    return true;
  } catch {
    return false;
  }
}
