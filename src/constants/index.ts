/**
 * Shared constants for the deptree CLI
 * Single source of truth for directory names, file patterns, defaults
 * and the literal pieces of the rendered output.
 */

export const DIR_PATTERNS = {
  DEPTREE: '.deptree'
} as const;

export const FILE_PATTERNS = {
  CARGO_TOML: 'Cargo.toml',
  TOML_FILES: '.toml',
  CONFIG_FILES: ['config.jsonc', 'config.json'],
  TEST_GRAPH: 'test_graph.txt'
} as const;

export const ENV_VARS = {
  VERBOSE: 'DEPTREE_VERBOSE',
  REGISTRY_URL: 'DEPTREE_REGISTRY_URL',
  CONFIG: 'DEPTREE_CONFIG'
} as const;

export const DEFAULTS = {
  MAX_DEPTH: 3,
  FILTER: '',
  REGISTRY_URL: 'https://crates.io/api/v1',
  USER_AGENT: 'deptree (dependency graph explorer)'
} as const;

/**
 * Manifest tables whose keys are collected as direct dependencies.
 * Dotted entries address nested tables.
 */
export const MANIFEST_DEPENDENCY_SECTIONS = [
  'dependencies',
  'dev-dependencies',
  'build-dependencies',
  'workspace.dependencies',
  'workspace.dev-dependencies'
] as const;

/**
 * Registry dependency kind followed when expanding remote packages.
 */
export const NORMAL_DEPENDENCY_KIND = 'normal' as const;

export const GITHUB_HOSTS = {
  WEB: 'github.com',
  RAW: 'raw.githubusercontent.com',
  DEFAULT_REF: 'HEAD'
} as const;

export const TREE_CONNECTORS = {
  BRANCH: '├── ',
  LAST: '└── ',
  PIPE: '│   ',
  BLANK: '    '
} as const;

export const CYCLIC_MARKER = ' (cyclic)' as const;
export const LOAD_ORDER_SEPARATOR = '-> ' as const;
export const CYCLE_NOTE_PREFIX = 'Cycles detected at: ' as const;

export type ManifestDependencySection = typeof MANIFEST_DEPENDENCY_SECTIONS[number];
