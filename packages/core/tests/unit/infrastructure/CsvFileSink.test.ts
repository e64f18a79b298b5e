import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CsvFileSink, formatRecords } from '../../../src/infrastructure/sinks/CsvFileSink.js';

describe('CsvFileSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pipjoin-sink-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should append each group to the file', async () => {
    const sink = new CsvFileSink(join(dir, 'out.csv'));

    await sink.flush([
      { sequence: 1, identifier: 'http://register.test/a/1', result: '7001' },
      { sequence: 2, identifier: 'http://register.test/a/2', result: '' },
    ]);
    await sink.flush([{ sequence: 3, identifier: 'http://register.test/a/3', result: 'PIPFAIL' }]);

    const content = await readFile(sink.path, 'utf-8');
    expect(content).toBe(
      '1,http://register.test/a/1,7001\n' + '2,http://register.test/a/2,\n' + '3,http://register.test/a/3,PIPFAIL\n',
    );
  });

  it('should keep existing content', async () => {
    const sink = new CsvFileSink(join(dir, 'out.csv'));
    await sink.flush([{ sequence: 1, identifier: 'a', result: 'x' }]);

    await new CsvFileSink(join(dir, 'out.csv')).flush([{ sequence: 2, identifier: 'b', result: 'y' }]);

    expect(await readFile(sink.path, 'utf-8')).toBe('1,a,x\n2,b,y\n');
  });

  it('should create an empty file for an empty group', async () => {
    const sink = new CsvFileSink(join(dir, 'out.csv'));

    await sink.flush([]);

    expect(await readFile(sink.path, 'utf-8')).toBe('');
  });

  it('should reject when the file cannot be opened', async () => {
    const sink = new CsvFileSink(join(dir, 'missing', 'out.csv'));

    await expect(sink.flush([{ sequence: 1, identifier: 'a', result: 'x' }])).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});

describe('formatRecords()', () => {
  it('should quote fields that contain a delimiter', () => {
    expect(formatRecords([{ sequence: 4, identifier: 'a,b', result: 'say "hi"' }])).toBe('4,"a,b","say ""hi"""\n');
  });

  it('should return an empty string for no records', () => {
    expect(formatRecords([])).toBe('');
  });
});
