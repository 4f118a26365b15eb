/**
 * Unit tests for Hash Utilities
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { computeConfigHash, shortHash } from '../../../src/lib/hash.js';

describe('shortHash', () => {
  it('should return the first 8 hex characters of the SHA256', () => {
    assert.strictEqual(shortHash('hello'), '2cf24dba');
  });

  it('should be deterministic', () => {
    assert.strictEqual(shortHash('same content'), shortHash('same content'));
  });

  it('should differ for different inputs', () => {
    assert.notStrictEqual(shortHash('content A'), shortHash('content B'));
  });
});

describe('computeConfigHash', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = join(tmpdir(), `vmforge-hash-test-${randomUUID()}`);
    await mkdir(tempDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should hash the file content', async () => {
    const file = join(tempDir, 'vmforge.yaml');
    await writeFile(file, 'hello');

    assert.strictEqual(await computeConfigHash(file), '2cf24dba');
  });

  it('should reject when the file does not exist', async () => {
    await assert.rejects(computeConfigHash(join(tempDir, 'missing.yaml')), { code: 'ENOENT' });
  });
});
