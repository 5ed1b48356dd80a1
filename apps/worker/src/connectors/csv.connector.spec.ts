import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { CsvConnector, extractPath, formatCsvLine } from './csv.connector';

describe('formatCsvLine', () => {
  it('quotes cells holding delimiters, quotes or line breaks', () => {
    expect(
      formatCsvLine(['plain', 'a,b', 'say "hi"', 'two\nlines', null, { a: 1 }]),
    ).toBe('plain,"a,b","say ""hi""","two\nlines",,"{""a"":1}"');
  });

  it('honours a custom delimiter', () => {
    expect(formatCsvLine(['a,b', 'c;d'], ';')).toBe('a,b;"c;d"');
  });
});

describe('extractPath', () => {
  it('follows dot paths through nested objects', () => {
    const data = { vendor: { address: { city: 'Lyon' } }, lines: [1] };

    expect(extractPath(data, 'vendor.address.city')).toBe('Lyon');
    expect(extractPath(data, 'vendor.missing.city')).toBeUndefined();
    expect(extractPath(data, 'lines.0')).toBeUndefined();
  });
});

describe('CsvConnector', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'csv-connector-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const baseConfig = () => ({
    outputDir: dir,
    filenameTemplate: 'invoices.csv',
    columns: ['id', 'vendor', 'total'],
    fieldMapping: { subject_id: 'id', 'vendor.name': 'vendor', total: 'total' },
  });

  it('writes the header once and appends mapped rows', async () => {
    const connector = new CsvConnector(baseConfig());

    const first = await connector.deliver('doc1', {
      vendor: { name: 'Acme, Inc.' },
      total: 10,
    });
    await connector.deliver('doc2', { total: 3.5 });

    expect(first.success).toBe(true);
    expect(first.response_data).toEqual({
      file: path.join(dir, 'invoices.csv'),
      row_count: 1,
    });
    expect(await readFile(path.join(dir, 'invoices.csv'), 'utf8')).toBe(
      'id,vendor,total\r\ndoc1,"Acme, Inc.",10\r\ndoc2,,3.5\r\n',
    );
  });

  it('writes concurrent deliveries without a second header', async () => {
    const connector = new CsvConnector(baseConfig());

    await Promise.all([
      connector.deliver('doc1', { total: 1 }),
      connector.deliver('doc2', { total: 2 }),
    ]);

    expect(await readFile(path.join(dir, 'invoices.csv'), 'utf8')).toBe(
      'id,vendor,total\r\ndoc1,,1\r\ndoc2,,2\r\n',
    );
  });

  it('writes a batch in a single append', async () => {
    const connector = new CsvConnector({ ...baseConfig(), includeHeader: false });

    const results = await connector.deliverBatch([
      { subjectId: 'doc1', data: { total: 1 } },
      { subjectId: 'doc2', data: { total: 2 } },
    ]);

    expect(results.map((result) => result.success)).toEqual([true, true]);
    expect(await readFile(path.join(dir, 'invoices.csv'), 'utf8')).toBe(
      'doc1,,1\r\ndoc2,,2\r\n',
    );
  });

  it('starts a numbered part when a file is full', async () => {
    const connector = new CsvConnector({ ...baseConfig(), maxRowsPerFile: 2 });

    for (const subjectId of ['doc1', 'doc2', 'doc3']) {
      await connector.deliver(subjectId, { total: 1 });
    }

    expect((await readdir(dir)).sort()).toEqual([
      'invoices.csv',
      'invoices_part2.csv',
    ]);
    expect(await readFile(path.join(dir, 'invoices_part2.csv'), 'utf8')).toBe(
      'id,vendor,total\r\ndoc3,,1\r\n',
    );
  });

  it('splits a batch across parts when it overflows a file', async () => {
    const connector = new CsvConnector({ ...baseConfig(), maxRowsPerFile: 2 });

    const results = await connector.deliverBatch(
      ['doc1', 'doc2', 'doc3', 'doc4', 'doc5'].map((subjectId) => ({
        subjectId,
        data: { total: 1 },
      })),
    );

    expect(
      results.map((result) => [
        path.basename(String(result.response_data?.file)),
        result.response_data?.row_count,
      ]),
    ).toEqual([
      ['invoices.csv', 2],
      ['invoices.csv', 2],
      ['invoices_part2.csv', 2],
      ['invoices_part2.csv', 2],
      ['invoices_part3.csv', 1],
    ]);
    expect(await readFile(path.join(dir, 'invoices.csv'), 'utf8')).toBe(
      'id,vendor,total\r\ndoc1,,1\r\ndoc2,,1\r\n',
    );
    expect(await readFile(path.join(dir, 'invoices_part2.csv'), 'utf8')).toBe(
      'id,vendor,total\r\ndoc3,,1\r\ndoc4,,1\r\n',
    );
    expect(await readFile(path.join(dir, 'invoices_part3.csv'), 'utf8')).toBe(
      'id,vendor,total\r\ndoc5,,1\r\n',
    );
  });

  it('names files after the UTC date by default', async () => {
    const connector = new CsvConnector({
      outputDir: dir,
      columns: ['id'],
      fieldMapping: { subject_id: 'id' },
    });

    const result = await connector.deliver('doc1', {});

    expect(path.basename(String(result.response_data?.file))).toMatch(
      /^export_\d{8}\.csv$/,
    );
  });
});
