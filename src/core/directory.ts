import * as os from 'os';
import * as path from 'path';
import type { DeptreeDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * deptree keeps its files under ~/.deptree on every platform
 * (dotfile convention, like ~/.aws).
 */
export function getDeptreeDirectories(homeDir: string = os.homedir()): DeptreeDirectories {
  return {
    config: path.join(homeDir, DIR_PATTERNS.DEPTREE)
  };
}
