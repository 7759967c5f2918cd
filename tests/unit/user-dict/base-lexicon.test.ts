/**
 * Base Lexicon Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { writeFile } from 'fs/promises';
import { listBaseLexiconFiles, readBaseLexicon } from '../../../src/user-dict';
import { createTempDir, removeTempDir, writeBaseLexicon } from '../../helpers/temp-dir';

describe('base lexicon', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('listBaseLexiconFiles', () => {
    it('should return an empty list when the directory does not exist', async () => {
      expect(await listBaseLexiconFiles(path.join(dir, 'missing'))).toEqual([]);
    });

    it('should list only .csv.zst files in lexical order', async () => {
      await writeBaseLexicon(dir, 'b', 'b\n');
      await writeBaseLexicon(dir, 'a', 'a\n');
      await writeFile(path.join(dir, 'c.csv'), 'c\n');

      expect(await listBaseLexiconFiles(dir)).toEqual([
        path.join(dir, 'a.csv.zst'),
        path.join(dir, 'b.csv.zst'),
      ]);
    });
  });

  describe('readBaseLexicon', () => {
    it('should decompress and concatenate files in the given order', async () => {
      const first = await writeBaseLexicon(dir, 'first', 'line1\nline2\n');
      const second = await writeBaseLexicon(dir, 'second', 'line3\n');

      expect(await readBaseLexicon([first, second])).toBe('line1\nline2\nline3\n');
    });

    it('should terminate each file with a newline', async () => {
      const first = await writeBaseLexicon(dir, 'first', 'line1');
      const second = await writeBaseLexicon(dir, 'second', 'line2');

      expect(await readBaseLexicon([first, second])).toBe('line1\nline2\n');
    });

    it('should return an empty string for no files', async () => {
      expect(await readBaseLexicon([])).toBe('');
    });
  });
});
