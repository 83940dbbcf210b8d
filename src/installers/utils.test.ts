import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  describeError,
  expandTilde,
  filesMatch,
  isDirWritable,
  isExecutable,
  nearestExistingDir
} from './utils';
import { TEST_TEMP_DIR, TEST_WORK_DIR } from '../test-setup';

describe('utils.ts', () => {
  const testHomedir = os.homedir();

  describe('expandTilde', () => {
    it('should handle various tilde patterns', () => {
      const testCases = [
        { input: '~', expected: testHomedir },
        { input: '~/bin', expected: path.join(testHomedir, 'bin') },
        { input: '~bin', expected: '~bin' }, // No expansion
        { input: '/usr/bin', expected: '/usr/bin' },
        { input: 'C:\\GitEx\\', expected: 'C:\\GitEx\\' },
        { input: '', expected: '' }
      ];

      testCases.forEach(({ input, expected }) => {
        expect(expandTilde(input)).toBe(expected);
      });
    });
  });

  describe('nearestExistingDir', () => {
    it('should walk up to the first directory that exists', () => {
      expect(nearestExistingDir(path.join(TEST_WORK_DIR, 'a', 'b', 'c'))).toBe(TEST_WORK_DIR);
    });

    it('should return an existing directory unchanged', () => {
      expect(nearestExistingDir(TEST_TEMP_DIR)).toBe(TEST_TEMP_DIR);
    });
  });

  describe('isDirWritable', () => {
    it('should treat a missing directory under a writable parent as writable', () => {
      expect(isDirWritable(path.join(TEST_WORK_DIR, 'not-yet'))).toBe(true);
    });
  });

  describe('isExecutable', () => {
    it('should require the execute bit for owner, group and other', () => {
      const file = path.join(TEST_WORK_DIR, 'tool');
      fs.writeFileSync(file, '#!/bin/sh');

      fs.chmodSync(file, 0o744);
      expect(isExecutable(file)).toBe(false);

      fs.chmodSync(file, 0o755);
      expect(isExecutable(file)).toBe(true);
    });
  });

  describe('filesMatch', () => {
    it('should compare file contents', () => {
      const a = path.join(TEST_WORK_DIR, 'a');
      const b = path.join(TEST_WORK_DIR, 'b');
      fs.writeFileSync(a, 'same');
      fs.writeFileSync(b, 'same');
      expect(filesMatch(a, b)).toBe(true);

      fs.writeFileSync(b, 'diff');
      expect(filesMatch(a, b)).toBe(false);
    });

    it('should be false when either file is missing', () => {
      const a = path.join(TEST_WORK_DIR, 'a');
      fs.writeFileSync(a, 'same');
      expect(filesMatch(a, path.join(TEST_WORK_DIR, 'missing'))).toBe(false);
    });
  });

  describe('describeError', () => {
    it('should prefer the error message', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
      expect(describeError('plain')).toBe('plain');
    });
  });
});
