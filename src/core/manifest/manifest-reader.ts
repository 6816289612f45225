/**
 * Cargo-style manifest reading.
 *
 * Collects the names declared in every dependency table of a TOML manifest.
 * Version specifiers (plain strings or inline tables) are discarded.
 */

import * as TOML from 'smol-toml';
import { MANIFEST_DEPENDENCY_SECTIONS, type ManifestDependencySection } from '../../constants/index.js';
import { ManifestParseError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

type TomlTable = Record<string, unknown>;

function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Resolve a dotted section path (`workspace.dependencies`) to a table.
 */
function getSection(manifest: TomlTable, section: ManifestDependencySection): TomlTable | undefined {
  let current: unknown = manifest;
  for (const key of section.split('.')) {
    if (!isTable(current)) return undefined;
    current = current[key];
  }
  return isTable(current) ? current : undefined;
}

export function parseManifest(text: string): TomlTable {
  try {
    return TOML.parse(text);
  } catch (error) {
    throw new ManifestParseError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Sorted union of dependency names across all dependency sections.
 */
export function extractManifestDependencies(manifest: TomlTable): string[] {
  const names = new Set<string>();

  for (const section of MANIFEST_DEPENDENCY_SECTIONS) {
    const table = getSection(manifest, section);
    if (!table) continue;
    for (const name of Object.keys(table)) {
      names.add(name);
    }
  }

  const dependencies = Array.from(names).sort();
  logger.debug(`Manifest declares ${dependencies.length} dependencies`, { dependencies });
  return dependencies;
}

/**
 * Package name from the `[package]` table, if declared.
 */
export function readManifestPackageName(manifest: TomlTable): string | undefined {
  const pkg = manifest['package'];
  if (!isTable(pkg)) return undefined;
  const name = pkg['name'];
  return typeof name === 'string' && name.length > 0 ? name : undefined;
}
