/**
 * Tests for the change detector
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs/promises';
import * as path from 'path';
import { classifyChange, computeFingerprint, fingerprintFile } from './change-detector.js';

let testCounter = 0;
function getTestDir(): string {
  return `.pipeline-kit-test-drift-${process.pid}-${++testCounter}`;
}

describe('Change detector', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = getTestDir();
    await fs.mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('computeFingerprint - unit tests', () => {
    it('should produce the SHA-256 hex digest', () => {
      expect(computeFingerprint('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });

    it('should treat whitespace differences as different content', () => {
      expect(computeFingerprint('a: 1\n')).not.toBe(computeFingerprint('a:  1\n'));
    });

    it('should agree for strings and their UTF-8 bytes', () => {
      fc.assert(
        fc.property(fc.string(), (text) => {
          expect(computeFingerprint(Buffer.from(text, 'utf-8'))).toBe(computeFingerprint(text));
        })
      );
    });
  });

  describe('fingerprintFile - unit tests', () => {
    it('should return null for a file that does not exist', async () => {
      expect(await fingerprintFile(path.join(testDir, 'missing.yml'))).toBeNull();
    });

    it('should fingerprint file bytes', async () => {
      const file = path.join(testDir, 'pipeline.yml');
      await fs.writeFile(file, 'stages: []\n');

      expect(await fingerprintFile(file)).toBe(computeFingerprint('stages: []\n'));
    });

    it('should rethrow errors other than a missing file', async () => {
      await expect(fingerprintFile(testDir)).rejects.toThrow();
    });
  });

  describe('classifyChange - unit tests', () => {
    it('should report created when there was no file before', () => {
      expect(classifyChange(null, computeFingerprint('x'))).toBe('created');
    });

    it('should compare fingerprints otherwise', () => {
      fc.assert(
        fc.property(fc.string(), fc.string(), (before, after) => {
          const expected = before === after ? 'unchanged' : 'changed';
          expect(classifyChange(computeFingerprint(before), computeFingerprint(after))).toBe(expected);
        })
      );
    });
  });
});
