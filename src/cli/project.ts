/**
 * Project lookup shared by the change commands
 */

import { resolve } from 'node:path';
import type { ChangegateConfig } from '../types/index.js';
import { loadConfig, resolveChangeDir, resolveSchemasDir } from '../core/services/config-manager.js';

export interface ChangeContext {
  rootPath: string;
  config: ChangegateConfig;
  changeDir: string;
  schemasDir: string;
}

export function projectRoot(root: string | undefined): string {
  return resolve(root ?? process.cwd());
}

/**
 * Configuration and directories for one change of the project at `root`
 */
export async function openChange(root: string | undefined, changeId: string): Promise<ChangeContext> {
  const rootPath = projectRoot(root);
  const config = await loadConfig(rootPath);

  return {
    rootPath,
    config,
    changeDir: await resolveChangeDir(rootPath, config, changeId),
    schemasDir: await resolveSchemasDir(rootPath, config),
  };
}
