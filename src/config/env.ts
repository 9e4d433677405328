import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

export interface LoadedEnv {
  /** The .env file that was applied, or null when none was found */
  path: string | null;
  error?: string;
}

function defaultSearchDirs(): string[] {
  const cwd = process.cwd();
  return [cwd, path.join(cwd, '..')];
}

/**
 * Apply the first .env found in `searchDirs` (working directory, then its parent).
 * Variables already set in the process win over the file.
 * Called before the logger exists; entry points log the returned result.
 */
export function loadEnv(searchDirs: string[] = defaultSearchDirs()): LoadedEnv {
  for (const dir of searchDirs) {
    const envPath = path.join(dir, '.env');
    if (!fs.existsSync(envPath)) continue;

    const result = dotenv.config({ path: envPath });
    return result.error ? { path: envPath, error: result.error.message } : { path: envPath };
  }
  return { path: null };
}

export function describeLoadedEnv(env: LoadedEnv): Record<string, string> {
  if (!env.path) return { envFile: 'none' };
  return env.error ? { envFile: env.path, error: env.error } : { envFile: env.path };
}
