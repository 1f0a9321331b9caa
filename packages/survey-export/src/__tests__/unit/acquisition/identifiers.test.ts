/**
 * Detail identifier helpers
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  detailParamsFor,
  identifierFor,
  parseBatchIdentifiers,
  parseCellId,
  readBatchFile,
} from '../../../acquisition/identifiers.js';
import { ConfigurationError } from '../../../core/errors.js';
import { makeTempDir, removeTempDir } from '../../utils/fixtures.js';

describe('parseCellId', () => {
  it('should split OPERATOR_LAC_CID', () => {
    expect(parseCellId('310410_7033_17811')).toEqual({ operator: '310410', lac: '7033', cid: '17811' });
  });

  it.each(['310410_7033', '310410__17811', '1_2_3_4', ''])('should reject %j', (id) => {
    expect(parseCellId(id)).toBeNull();
  });
});

describe('identifierFor', () => {
  it('should prefer netid', () => {
    expect(identifierFor({ netid: 'aa:bb:cc:dd:ee:ff', operator: '310410' })).toBe('aa:bb:cc:dd:ee:ff');
  });

  it('should name cell lookups by their fields in fixed order', () => {
    expect(identifierFor({ cid: '17811', operator: '310410', lac: '7033' })).toBe(
      'operator-310410_lac-7033_cid-17811'
    );
  });

  it('should fall back to a generic name', () => {
    expect(identifierFor({})).toBe('detail');
  });
});

describe('detailParamsFor', () => {
  it('should combine shared fields with the identifier', () => {
    expect(detailParamsFor('aa:00', { operator: '310410', netid: 'ignored', lac: '' })).toEqual({
      operator: '310410',
      netid: 'aa:00',
    });
  });
});

describe('batch files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should skip blank lines and comments', () => {
    expect(parseBatchIdentifiers('# office\naa:00\r\n\n  bb:11  \n#cc:22\n')).toEqual(['aa:00', 'bb:11']);
  });

  it('should read identifiers from disk', async () => {
    const path = join(dir, 'ids.txt');
    await writeFile(path, 'aa:00\nbb:11\n', 'utf-8');

    expect(await readBatchFile(path)).toEqual(['aa:00', 'bb:11']);
  });

  it('should reject a file without identifiers', async () => {
    const path = join(dir, 'empty.txt');
    await writeFile(path, '# nothing here\n', 'utf-8');

    await expect(readBatchFile(path)).rejects.toThrow(`Batch file ${path} lists no identifiers`);
  });

  it('should reject a missing file as a configuration problem', async () => {
    await expect(readBatchFile(join(dir, 'absent.txt'))).rejects.toBeInstanceOf(ConfigurationError);
  });
});
