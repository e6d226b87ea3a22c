/**
 * Change directory layout
 *
 * Names of the documents a change instance holds and the walk over its specs
 * directory. Paths handed back are relative to the change directory and use
 * forward slashes.
 */

import type { Dirent } from 'node:fs';
import { access, readdir } from 'node:fs/promises';
import { join } from 'node:path';

export const PROPOSAL_FILE = 'proposal.md';
export const TASKS_FILE = 'tasks.md';
export const SPECS_DIR = 'specs';
export const STATE_FILE = 'STATE.yaml';

/**
 * Top-level documents whose checksums are tracked, besides every spec
 */
export const TRACKED_FILES = [
  PROPOSAL_FILE,
  TASKS_FILE,
  'CHALLENGE.md',
  'IMPLEMENTATION.md',
  'VERIFICATION.md',
] as const;

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Template files start with an underscore and are never validated
 */
export function isTemplate(fileName: string): boolean {
  return fileName.startsWith('_');
}

/**
 * Spec documents under `specs/`, recursively, in sorted walk order
 */
export async function listSpecFiles(changeDir: string): Promise<string[]> {
  const found: string[] = [];

  const walk = async (relativeDir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(join(changeDir, relativeDir), { withFileTypes: true });
    } catch {
      // no specs directory
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const relativePath = `${relativeDir}/${entry.name}`;
      if (entry.isDirectory()) {
        await walk(relativePath);
      } else if (entry.isFile() && entry.name.endsWith('.md') && !isTemplate(entry.name)) {
        found.push(relativePath);
      }
    }
  };

  await walk(SPECS_DIR);
  return found;
}

/**
 * Tracked documents that exist in the change directory
 */
export async function listTrackedFiles(changeDir: string): Promise<string[]> {
  const files: string[] = [];
  for (const name of TRACKED_FILES) {
    if (await fileExists(join(changeDir, name))) {
      files.push(name);
    }
  }
  return [...files, ...(await listSpecFiles(changeDir))];
}
