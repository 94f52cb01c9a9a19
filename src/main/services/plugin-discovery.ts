import * as fs from 'fs';
import * as path from 'path';
import { appLog } from './log-service';

/** Extensions the module importer can load. */
export const PLUGIN_EXTENSIONS: readonly string[] = ['.js', '.cjs'];

/** Module names that live in the plugins directory but are never loaded as plugins. */
export const RESERVED_MODULE_NAMES: readonly string[] = ['plugin-api', 'plugin-template'];

export interface DiscoveredPlugin {
  /** File name without extension. */
  id: string;
  fileName: string;
  modulePath: string;
}

export function isPluginCandidate(fileName: string): boolean {
  if (fileName.startsWith('_')) return false;
  const ext = path.extname(fileName);
  if (!PLUGIN_EXTENSIONS.includes(ext)) return false;
  const base = path.basename(fileName, ext);
  return base.length > 0 && !RESERVED_MODULE_NAMES.includes(base);
}

/**
 * Lists loadable plugin files directly under `pluginsDir`, sorted by file name.
 * A missing directory means "no plugins".
 */
export function listPluginCandidates(pluginsDir: string): DiscoveredPlugin[] {
  if (!fs.existsSync(pluginsDir)) return [];

  const results: DiscoveredPlugin[] = [];
  try {
    const entries = fs.readdirSync(pluginsDir, { withFileTypes: true });
    for (const entry of entries) {
      if (!isPluginCandidate(entry.name)) continue;
      const modulePath = path.join(pluginsDir, entry.name);
      // Symlinks need stat() to check the target
      if (!entry.isFile()) {
        if (!entry.isSymbolicLink()) continue;
        try {
          if (!fs.statSync(modulePath).isFile()) continue;
        } catch {
          continue; // broken symlink
        }
      }
      results.push({
        id: path.basename(entry.name, path.extname(entry.name)),
        fileName: entry.name,
        modulePath,
      });
    }
  } catch (err) {
    appLog('core:plugins', 'error', `Cannot read plugins directory: ${pluginsDir}`, {
      meta: { pluginsDir, error: err instanceof Error ? err.message : String(err) },
    });
    return [];
  }

  return results.sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0));
}
