import path from 'node:path';
import dotenv from 'dotenv';

const DEFAULT_ENV_PATH = path.resolve('.env');

function isMissingFile(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

export function loadEnvironment(envPath?: string) {
  const resolved = path.resolve(envPath ?? DEFAULT_ENV_PATH);
  const result = dotenv.config({ path: resolved, override: true });
  if (result.error && !isMissingFile(result.error)) {
    throw result.error;
  }
}
