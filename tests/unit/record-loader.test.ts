import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DatabaseConfig } from '../../src/config/database.js';
import { RecordLoader, sampleRecords } from '../../src/utils/recordLoader.js';
import { rowsToInputRecords } from '../../src/utils/records.js';
import { createTempDir, removeTempDir } from './helpers.js';

const COLUMNS = { idColumn: 'file_id', contentColumn: 'text_content' };

describe('rowsToInputRecords', () => {
  it('falls back to a positional id when the id is missing', () => {
    const records = rowsToInputRecords(
      [
        { file_id: 'a1', text_content: 'first' },
        { file_id: '', text_content: 'second' },
        { text_content: null },
        { file_id: 42, text_content: 'fourth', document_id: 'doc-4' },
      ],
      COLUMNS
    );

    expect(records).toEqual([
      { recordId: 'a1', content: 'first' },
      { recordId: 'index1', content: 'second' },
      { recordId: 'index2', content: null },
      { recordId: '42', content: 'fourth' },
    ]);
  });
});

describe('sampleRecords', () => {
  const records = ['a', 'b', 'c', 'd', 'e'];

  it('keeps the original order of the chosen records', () => {
    expect(sampleRecords(records, 2, () => 0)).toEqual(['a', 'b']);
    expect(sampleRecords(records, 2, () => 0.99)).toEqual(['a', 'e']);
  });

  it('returns everything when the sample is not smaller than the input', () => {
    expect(sampleRecords(records, 10)).toEqual(records);
  });
});

describe('RecordLoader files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('loads records from CSV', async () => {
    const filePath = path.join(dir, 'filtered_texts.csv');
    await fs.writeFile(filePath, 'file_id,document_id,text_content\nf1,d1,"Plaintiff alleges, in part:\nforce"\nf2,d2,\n');

    expect(await RecordLoader.loadFromFile(filePath, COLUMNS)).toEqual([
      { recordId: 'f1', content: 'Plaintiff alleges, in part:\nforce' },
      { recordId: 'f2', content: '' },
    ]);
  });

  it('loads records from a JSON array', async () => {
    const filePath = path.join(dir, 'records.json');
    await fs.writeFile(filePath, JSON.stringify([{ file_id: 'f1', text_content: 'text' }]));

    expect(await RecordLoader.loadFromFile(filePath, COLUMNS)).toEqual([{ recordId: 'f1', content: 'text' }]);
  });

  it('rejects unsupported files and JSON that is not an array of objects', async () => {
    const jsonPath = path.join(dir, 'records.json');
    await fs.writeFile(jsonPath, '{"file_id": "f1"}');

    await expect(RecordLoader.loadRows(path.join(dir, 'records.xlsx'))).rejects.toThrow('Unsupported file format: .xlsx. Use .json or .csv');
    await expect(RecordLoader.loadRows(jsonPath)).rejects.toThrow('JSON record file must contain an array');

    await fs.writeFile(jsonPath, '["f1"]');
    await expect(RecordLoader.loadRows(jsonPath)).rejects.toThrow('Invalid entry at index 0: must be an object');
  });

  it('reads the identity mapping keeping the first entry per file id', async () => {
    const filePath = path.join(dir, 'identity.csv');
    await fs.writeFile(filePath, 'file_id,document_id,case_id,text_content\nf1,d1,c1,x\nf1,d9,c9,y\nf2,d2,,z\n,d3,c3,w\n');

    const mapping = await RecordLoader.loadIdentityMapping(filePath);

    expect([...mapping.entries()]).toEqual([
      ['f1', { document_id: 'd1', case_id: 'c1' }],
      ['f2', { document_id: 'd2', case_id: '' }],
    ]);
  });
});

describe('RecordLoader.loadFromQuery', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('loads records through the database record source', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const load = vi.spyOn(DatabaseConfig, 'loadRecords').mockResolvedValue([{ recordId: 'f1', content: 'from db' }]);

    const records = await RecordLoader.loadFromQuery('SELECT file_id, text_content FROM complaints', COLUMNS);

    expect(load).toHaveBeenCalledWith('SELECT file_id, text_content FROM complaints', COLUMNS);
    expect(records).toEqual([{ recordId: 'f1', content: 'from db' }]);
  });
});
