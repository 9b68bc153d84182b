import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileTransport } from './file-transport';

function readLines(filePath: string): Record<string, unknown>[] {
  return fs
    .readFileSync(filePath, 'utf8')
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => JSON.parse(line));
}

describe('FileTransport', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'quarry-logs-'));
  });

  afterEach(() => {
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('should write every entry to the main log and errors to the error log', async () => {
    const transport = new FileTransport({ logDir, service: 'batch' });

    transport.write({ level: 'INFO', msg: 'started' });
    transport.write({ level: 'ERROR', msg: 'BADSYM failed' });
    await transport.flush();

    const main = readLines(transport.getLogFilePath('main'));
    const errors = readLines(transport.getLogFilePath('error'));

    expect(main.map((entry) => entry.msg)).toEqual(['started', 'BADSYM failed']);
    expect(errors.map((entry) => entry.msg)).toEqual(['BADSYM failed']);
  });

  it('should name files by service and date', () => {
    const transport = new FileTransport({ logDir, service: 'gateway' });
    expect(transport.getLogFilePath('main', '2024-03-01')).toBe(
      path.join(logDir, 'gateway-2024-03-01.log')
    );
    expect(transport.getLogFilePath('error', '2024-03-01')).toBe(
      path.join(logDir, 'gateway-2024-03-01.error.log')
    );
  });

  it('should append after a flush', async () => {
    const transport = new FileTransport({ logDir, service: 'cli' });

    transport.write({ level: 'INFO', msg: 'one' });
    await transport.flush();
    transport.write({ level: 'INFO', msg: 'two' });
    await transport.flush();

    expect(readLines(transport.getLogFilePath('main')).map((entry) => entry.msg)).toEqual([
      'one',
      'two',
    ]);
  });
});
