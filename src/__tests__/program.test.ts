import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConversionError } from '../convert/errors.js';
import { buildProgram } from '../program.js';

const RIS = [
  'TY  - JOUR',
  'AU  - Nobody, Ann',
  'ER  - ',
  'TY  - JOUR',
  'AU  - Doe, Jane',
  'TI  - A Study',
  'PY  - 2021',
  'ER  - ',
  '',
].join('\n');

describe('bibconvert CLI', () => {
  let tempDir: string;
  let inputPath: string;
  let outputPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bibconvert-cli-'));
    inputPath = path.join(tempDir, 'export.ris');
    outputPath = path.join(tempDir, 'library.bib');
    await fs.writeFile(inputPath, RIS);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should convert a file and print a summary', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await buildProgram().parseAsync(['node', 'bibconvert', 'ris', inputPath, outputPath]);

    expect(log).toHaveBeenCalledWith(`Converted 1 of 2 records to ${outputPath} (1 skipped)`);
    expect(error).toHaveBeenCalledWith('[skip] ris line 1: missing title');
    expect(await fs.readFile(outputPath, 'utf-8')).toContain('@article{doe2021,');
  });

  it('should keep quiet about skipped records with --quiet', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await buildProgram().parseAsync(['node', 'bibconvert', 'pubmed', inputPath, outputPath, '--quiet']);

    expect(error).not.toHaveBeenCalled();
  });

  it('should surface fatal errors to the caller', async () => {
    await expect(
      buildProgram().parseAsync(['node', 'bibconvert', 'endnote', inputPath, outputPath])
    ).rejects.toThrow(ConversionError);
  });
});
