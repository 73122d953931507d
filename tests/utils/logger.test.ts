import fs from 'fs';
import os from 'os';
import path from 'path';
import { enableFileLog, logFileName, logger } from '../../src/utils/logger';

describe('logger', () => {
  let logDir: string;

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dupe-sweep-'));
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    enableFileLog(null);
    jest.restoreAllMocks();
    fs.rmSync(logDir, { recursive: true, force: true });
  });

  it('should name log files after the run start time', () => {
    expect(logFileName(new Date(2024, 0, 31, 14, 25, 1))).toBe('dupe-sweep_20240131_142501.log');
  });

  it('should copy console lines into the log file once enabled', () => {
    const file = enableFileLog(path.join(logDir, 'nested'));
    logger.info('Batch 1: 2 assets deleted (moved to trash).');
    logger.error('Batch 2 failed, not deleted: a, b', new Error('HTTP 500'));

    expect(file).not.toBeNull();
    const lines = fs.readFileSync(file ?? '', 'utf8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] INFO: Batch 1: 2 assets deleted \(moved to trash\)\.$/);
    expect(lines[1]).toMatch(/ERROR: Batch 2 failed, not deleted: a, b: HTTP 500$/);
  });

  it('should stay on the console when no file is enabled', () => {
    logger.info('hello');

    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/INFO: hello$/));
    expect(fs.readdirSync(logDir)).toEqual([]);
  });
});
