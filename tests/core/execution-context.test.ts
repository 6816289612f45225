/**
 * Tests for ExecutionContext module
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { createExecutionContext } from '../../src/core/execution-context.js';
import { mkdir, rm, writeFile } from 'fs/promises';
import { realpathSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ValidationError } from '../../src/utils/errors.js';
import { createFakeFetch, createRecordingOutput } from '../test-helpers.js';

describe('ExecutionContext', () => {
  let testDir: string;
  let originalCwd: string;

  beforeEach(async () => {
    originalCwd = process.cwd();

    testDir = join(tmpdir(), `deptree-ctx-test-${Date.now()}`);
    await mkdir(testDir, { recursive: true });

    // Resolve real path (handles /private on macOS)
    testDir = realpathSync(testDir);

    process.chdir(testDir);
  });

  afterEach(async () => {
    process.chdir(originalCwd);
    await rm(testDir, { recursive: true, force: true });
  });

  describe('createExecutionContext', () => {
    it('should default to the process working directory', async () => {
      const context = await createExecutionContext({});

      assert.strictEqual(context.sourceCwd, testDir);
      assert.strictEqual(context.output, undefined);
      assert.strictEqual(context.fetch, undefined);
    });

    it('should resolve --cwd against the working directory', async () => {
      await mkdir(join(testDir, 'project'));

      const context = await createExecutionContext({ cwd: 'project' });

      assert.strictEqual(context.sourceCwd, join(testDir, 'project'));
    });

    it('should carry injected ports', async () => {
      const output = createRecordingOutput();
      const fetch = createFakeFetch({});

      const context = await createExecutionContext({ output, fetch });

      assert.strictEqual(context.output, output);
      assert.strictEqual(context.fetch, fetch);
    });

    it('should reject a missing directory', async () => {
      await assert.rejects(
        createExecutionContext({ cwd: 'does-not-exist' }),
        (error: unknown) => error instanceof ValidationError && error.message.includes('Working directory does not exist')
      );
    });

    it('should reject a file', async () => {
      await writeFile(join(testDir, 'file.txt'), 'x');

      await assert.rejects(createExecutionContext({ cwd: 'file.txt' }), ValidationError);
    });
  });
});
