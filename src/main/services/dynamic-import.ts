/**
 * Loads a plugin module by absolute path. Kept separate so tests can swap
 * in modules without touching the filesystem.
 */
export async function dynamicImportModule(modulePath: string): Promise<unknown> {
  return import(modulePath);
}
