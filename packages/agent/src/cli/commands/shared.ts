import { readFile } from 'node:fs/promises';
import type { Backend } from '../../backend/base.js';
import type { ConfigOptions } from '../../config.js';

const PACKAGE_NAMES = new Set(['@vigil/agent', 'vigil']);
const MAX_PARENT_DIRECTORIES = 8;

/**
 * Overrides for the commands, used by tests and embedding tools
 */
export type CliDependencies = {
  config?: ConfigOptions;
  backend?: Backend;
};

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Mask a secret, keeping only its first four characters
 */
export function maskSecret(value: string): string {
  return value.length <= 4 ? '****' : `${value.slice(0, 4)}****`;
}

/**
 * Read the agent version from the nearest package.json of this package.
 *
 * Works both from the sources and from the build output, which sit at
 * different depths.
 */
export async function loadVersion(): Promise<string> {
  let directory = new URL('./', import.meta.url);

  for (let depth = 0; depth < MAX_PARENT_DIRECTORIES; depth += 1) {
    const version = await readPackageVersion(new URL('package.json', directory));
    if (version) {
      return version;
    }
    directory = new URL('../', directory);
  }

  return '0.0.0';
}

async function readPackageVersion(path: URL): Promise<string | null> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch {
    return null;
  }

  const parsed: unknown = JSON.parse(contents);
  if (
    parsed !== null &&
    typeof parsed === 'object' &&
    'name' in parsed &&
    typeof parsed.name === 'string' &&
    PACKAGE_NAMES.has(parsed.name) &&
    'version' in parsed &&
    typeof parsed.version === 'string'
  ) {
    return parsed.version;
  }
  return null;
}
