import * as os from 'os';
import * as path from 'path';
import * as fs from 'fs';

export interface SettingsStore<T> {
  /** Absolute path of the backing JSON file. */
  readonly filePath: string;
  get(): T;
  save(settings: T): void;
}

/** `$HYPRIL_HOME`, falling back to `~/.hypril`. */
export function getUserDataDir(): string {
  return process.env.HYPRIL_HOME || path.join(os.homedir(), '.hypril');
}

function readJsonObject(filePath: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('expected a JSON object at the top level');
  }
  return { ...parsed };
}

/**
 * JSON settings kept in the user data dir. File values are merged over
 * `defaults` and handed to `migrate`, which owns per-field checks. A file
 * that cannot be read or migrated yields the defaults.
 */
export function createSettingsStore<T extends object>(
  filename: string,
  defaults: T,
  migrate?: (raw: Record<string, unknown>) => T,
): SettingsStore<T> {
  const filePath = path.join(getUserDataDir(), filename);

  return {
    filePath,

    get() {
      if (!fs.existsSync(filePath)) return { ...defaults };
      try {
        const merged = { ...defaults, ...readJsonObject(filePath) };
        return migrate ? migrate(merged) : merged;
      } catch (err) {
        // console.warn, not appLog: the log service reads its level from a settings store.
        console.warn(`[settings-store] Ignoring ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
        return { ...defaults };
      }
    },

    save(settings: T) {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const tmpPath = `${filePath}.tmp`;
      fs.writeFileSync(tmpPath, `${JSON.stringify(settings, null, 2)}\n`, 'utf-8');
      fs.renameSync(tmpPath, filePath);
    },
  };
}
