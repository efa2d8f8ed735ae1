/**
 * Shared fixtures for tests that need resource directories on disk
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export interface TempDir {
  path: string;
  cleanup(): Promise<void>;
}

export async function createTempDir(prefix = 'capreg-test-'): Promise<TempDir> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return {
    path: dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Build a definition document from frontmatter lines and a body
 */
export function definitionDocument(frontmatter: string[], body = ''): string {
  return `---\n${frontmatter.join('\n')}\n---\n\n${body}\n`;
}

/**
 * Write `<root>/<dir>/<fileName>`, creating directories as needed
 *
 * @returns Path of the written file
 */
export async function writeDefinitionFile(
  root: string,
  dir: string,
  fileName: string,
  content: string
): Promise<string> {
  const target = path.join(root, dir);
  await fs.mkdir(target, { recursive: true });
  const filePath = path.join(target, fileName);
  await fs.writeFile(filePath, content, 'utf-8');
  return filePath;
}

/**
 * Write a minimal valid SKILL.md under `<root>/<name>/`
 */
export function writeSkill(
  root: string,
  name: string,
  description: string,
  options: { body?: string; extra?: string[]; dir?: string } = {}
): Promise<string> {
  return writeDefinitionFile(
    root,
    options.dir ?? name,
    'SKILL.md',
    definitionDocument([`name: ${name}`, `description: ${description}`, ...(options.extra ?? [])], options.body)
  );
}

/**
 * Write a minimal valid AGENT.md under `<root>/<name>/`
 */
export function writeAgent(
  root: string,
  name: string,
  description: string,
  options: { body?: string; extra?: string[]; dir?: string } = {}
): Promise<string> {
  return writeDefinitionFile(
    root,
    options.dir ?? name,
    'AGENT.md',
    definitionDocument([`name: ${name}`, `description: ${description}`, ...(options.extra ?? [])], options.body)
  );
}
