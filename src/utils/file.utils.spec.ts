import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as iconv from 'iconv-lite';
import { ExportReadError } from './errors';
import { readExportFile } from './file.utils';

describe('readExportFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'reaction-leaderboard-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read UTF-8 and drop a BOM', () => {
    const filePath = path.join(tempDir, 'result.json');
    fs.writeFileSync(filePath, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('{"id": 1}', 'utf8')]));

    expect(readExportFile(filePath)).toBe('{"id": 1}');
  });

  it('should decode other encodings', () => {
    const filePath = path.join(tempDir, 'result.json');
    fs.writeFileSync(filePath, iconv.encode('{"name": "Привет"}', 'win1251'));

    expect(readExportFile(filePath, 'win1251')).toBe('{"name": "Привет"}');
  });

  it('should throw ExportReadError for a missing file', () => {
    expect(() => readExportFile(path.join(tempDir, 'missing.json'))).toThrow(ExportReadError);
  });

  it('should throw ExportReadError for an unknown encoding', () => {
    const filePath = path.join(tempDir, 'result.json');
    fs.writeFileSync(filePath, '{}');

    expect(() => readExportFile(filePath, 'not-an-encoding')).toThrow(ExportReadError);
  });
});
