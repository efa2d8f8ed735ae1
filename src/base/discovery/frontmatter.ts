/**
 * Frontmatter codec - split definition files and decode their YAML frontmatter
 *
 * Uses gray-matter to parse the YAML block and zod to normalize it into
 * resource fields. Shape mismatches in optional fields are dropped, not
 * reported.
 */

import matter from 'gray-matter';
import { z } from 'zod';
import type { CapabilityResource, ResourceKind } from './types.js';
import { FrontmatterError, InvalidResourceError, MissingFieldError, errorMessage } from '../utils/errors.js';

const DELIMITER = '---';
const CLOSING = `\n${DELIMITER}`;

/**
 * `allowed-tools` may be a space-delimited string or a YAML sequence.
 * Both normalize to an ordered list of tool names; any other shape is [].
 */
export const AllowedToolsSchema = z
  .union([
    z.string().transform((value) => value.split(/\s+/).filter((tool) => tool.length > 0)),
    z
      .array(z.unknown())
      .transform((items) => items.filter((item): item is string => typeof item === 'string')),
  ])
  .catch([]);

/**
 * Fields shared by every resource kind
 */
export const CoreFrontmatterSchema = z.object({
  name: z.string().catch(''),
  description: z.string().catch(''),
  'allowed-tools': AllowedToolsSchema,
});

export interface SplitDocument {
  frontmatter: string;
  body: string;
}

/**
 * A decoded definition file, before it is tied to a location on disk
 */
export type DecodedResource<E extends object> = Omit<
  CapabilityResource<E>,
  'sourceType' | 'directoryPath' | 'originalPath'
>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function locateClosing(text: string): number {
  const firstLineEnd = text.indexOf('\n');
  const firstLine = firstLineEnd === -1 ? text : text.slice(0, firstLineEnd);
  if (firstLine.trimEnd() !== DELIMITER) {
    throw new FrontmatterError(`invalid YAML frontmatter: missing opening ${DELIMITER}`);
  }

  const closing = text.indexOf(CLOSING, DELIMITER.length);
  if (closing === -1) {
    throw new FrontmatterError(`invalid YAML frontmatter: missing closing ${DELIMITER}`);
  }
  return closing;
}

/**
 * Split a document into its frontmatter and body.
 *
 * The document must open with a `---` line and contain a closing `---` line.
 * Both parts come back trimmed.
 */
export function splitFrontmatter(document: string): SplitDocument {
  const text = document.trim();
  const closing = locateClosing(text);

  return {
    frontmatter: text.slice(DELIMITER.length, closing).trim(),
    body: text.slice(closing + CLOSING.length).trim(),
  };
}

/**
 * Parse the YAML block of a document into a plain record
 */
function readFrontmatterData(document: string): Record<string, unknown> {
  let data: unknown;
  try {
    // Options disable gray-matter's content cache, which keeps unparsed
    // entries around after a YAML error.
    data = matter(document.trim(), {}).data;
  } catch (error) {
    throw new FrontmatterError(`failed to parse YAML frontmatter: ${errorMessage(error)}`, error);
  }
  return isRecord(data) ? data : {};
}

function decode<E extends object>(
  document: string,
  kind: ResourceKind<E>,
  includeBody: boolean
): DecodedResource<E> {
  const { frontmatter, body } = splitFrontmatter(document);
  const data = readFrontmatterData(document);

  const core = CoreFrontmatterSchema.parse(data);
  if (core.name === '') {
    throw new MissingFieldError('name');
  }
  if (core.description === '') {
    throw new MissingFieldError('description', core.name);
  }

  const extensions = kind.extensionSchema.safeParse(data);
  if (!extensions.success) {
    const issues = extensions.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new InvalidResourceError(`invalid ${kind.fileName} frontmatter: ${issues.join(', ')}`, core.name);
  }

  return {
    name: core.name,
    description: core.description,
    allowedTools: core['allowed-tools'],
    extensions: extensions.data,
    rawFrontmatter: frontmatter,
    body: includeBody ? body : '',
  };
}

/**
 * Decode metadata only; `body` is always ''.
 */
export function decodeMetadataOnly<E extends object>(
  document: string,
  kind: ResourceKind<E>
): DecodedResource<E> {
  return decode(document, kind, false);
}

/**
 * Decode metadata and body
 */
export function decodeFull<E extends object>(document: string, kind: ResourceKind<E>): DecodedResource<E> {
  return decode(document, kind, true);
}
