import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { parseArtifactFilename, readArtifactContent } from '../src/artifacts.js';

describe('parseArtifactFilename', () => {
  it('drops the suffix the portal appends', () => {
    expect(parseArtifactFilename('attachment; filename=report_20240101.pdf')).toBe('report.pdf');
  });

  it('removes surrounding quotes', () => {
    expect(parseArtifactFilename('attachment; filename="report_20240101.pdf"')).toBe('report.pdf');
  });

  it('cuts at the last underscore only', () => {
    expect(parseArtifactFilename('attachment; filename="monthly_sales_1712.xlsx"')).toBe('monthly_sales.xlsx');
  });

  it('keeps the last extension', () => {
    expect(parseArtifactFilename('attachment; filename=data_99.tar.gz')).toBe('data.gz');
  });

  it('reads the value after the last equals sign', () => {
    expect(parseArtifactFilename('attachment; name=x; filename=log_1.txt')).toBe('log.txt');
  });

  it('leaves a name without a suffix as is', () => {
    expect(parseArtifactFilename('attachment; filename=report.pdf')).toBe('report.pdf');
  });

  it('leaves a name whose underscore follows the extension dot as is', () => {
    expect(parseArtifactFilename('attachment; filename=v1.0_final')).toBe('v1.0_final');
  });
});

describe('readArtifactContent', () => {
  it('returns bytes unchanged', async () => {
    const bytes = new Uint8Array([1, 2, 3]);
    expect(await readArtifactContent(bytes)).toBe(bytes);
  });

  it('reads a file path', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'portal-read-'));
    try {
      const path = join(dir, 'a.bin');
      await writeFile(path, Buffer.from([9, 8, 7]));

      const content = await readArtifactContent(path);

      expect([...content]).toEqual([9, 8, 7]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
