import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { logFault, logError, logWarn, logInfo, setConsoleLogging } from './fault-logger.js';
import type { FaultEntry } from './fault-logger.js';
import { SyncAuthError } from './errors.js';

const { mockConfig, testDir } = await vi.hoisted(async () => {
  const os = await import('node:os');
  const p = await import('node:path');
  return {
    mockConfig: {
      enabled: true,
      level: 'warn' as 'error' | 'warn' | 'info' | 'debug',
      max_file_size_mb: 5,
    },
    testDir: p.join(os.tmpdir(), `reposcope-test-faults-${process.pid}`),
  };
});

vi.mock('./config.js', () => ({
  getLogPath: () => `${testDir}/reposcope.log`,
  getLoggingConfig: () => ({ ...mockConfig }),
}));

function readEntries(file: string): FaultEntry[] {
  return fs
    .readFileSync(file, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line) as FaultEntry);
}

describe('fault-logger', () => {
  const logPath = path.join(testDir, 'reposcope.log');
  const backupPath = logPath + '.1';

  beforeEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
    fs.mkdirSync(testDir, { recursive: true });

    mockConfig.enabled = true;
    mockConfig.level = 'warn';
    mockConfig.max_file_size_mb = 5;
  });

  afterEach(() => {
    setConsoleLogging(null);
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  describe('local file channel', () => {
    it('should write a JSON line to reposcope.log', () => {
      logFault('error', 'test', 'something broke');
      const [entry] = readEntries(logPath);
      expect(entry.level).toBe('error');
      expect(entry.component).toBe('test');
      expect(entry.message).toBe('something broke');
      expect(entry.timestamp).toBeTruthy();
    });

    it('should include stack trace and code from the error', () => {
      const err = new SyncAuthError('Permission denied (publickey)');
      logFault('error', 'sync', 'clone failed', { error: err });
      const [entry] = readEntries(logPath);
      expect(entry.stack).toContain('Permission denied (publickey)');
      expect(entry.code).toBe('SYNC_AUTH_ERROR');
    });

    it('should include context object', () => {
      logFault('error', 'sync', 'failed', { context: { repository: 'api', attempt: 2 } });
      const [entry] = readEntries(logPath);
      expect(entry.context).toEqual({ repository: 'api', attempt: 2 });
    });

    it('should create the data directory if missing', () => {
      fs.rmSync(testDir, { recursive: true });
      logFault('error', 'test', 'no dir');
      expect(fs.existsSync(logPath)).toBe(true);
    });

    it('should skip debug and info when level=warn', () => {
      logFault('debug', 'test', 'debug msg');
      logFault('info', 'test', 'info msg');
      expect(fs.existsSync(logPath)).toBe(false);
    });

    it('should write warn when level=warn', () => {
      logFault('warn', 'test', 'warn msg');
      expect(fs.existsSync(logPath)).toBe(true);
    });

    it('should respect enabled=false', () => {
      mockConfig.enabled = false;
      logFault('error', 'test', 'should not log');
      expect(fs.existsSync(logPath)).toBe(false);
    });

    it('should append multiple entries as JSON lines', () => {
      logFault('error', 'a', 'first');
      logFault('warn', 'b', 'second');
      const entries = readEntries(logPath);
      expect(entries.map((e) => e.message)).toEqual(['first', 'second']);
    });
  });

  describe('rotation', () => {
    it('should rotate when the file exceeds max size', () => {
      mockConfig.max_file_size_mb = 0.0001; // ~100 bytes
      logFault('error', 'test', 'a'.repeat(200));
      logFault('error', 'test', 'after rotation');

      expect(fs.existsSync(backupPath)).toBe(true);
      expect(readEntries(logPath).map((e) => e.message)).toEqual(['after rotation']);
    });

    it('should overwrite the .1 backup on second rotation', () => {
      mockConfig.max_file_size_mb = 0.0001;
      logFault('error', 'test', 'a'.repeat(200));
      logFault('error', 'test', 'b'.repeat(200));
      logFault('error', 'test', 'final');

      const backup = readEntries(backupPath);
      expect(backup[backup.length - 1].message).toBe('b'.repeat(200));
    });
  });

  describe('console channel', () => {
    it('should echo to stderr at or above the console level', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      setConsoleLogging('info');

      logInfo('scheduler', 'pass started');
      logFault('debug', 'scheduler', 'hidden');

      expect(write).toHaveBeenCalledTimes(1);
      expect(String(write.mock.calls[0][0])).toContain('INFO scheduler: pass started');
    });

    it('should not echo when console logging is off', () => {
      const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      logError('sync', 'failed');
      expect(write).not.toHaveBeenCalled();
    });
  });

  describe('convenience wrappers', () => {
    it('logError should include error and context', () => {
      logError('engine', 'analysis failed', new Error('oops'), { repository: 'api' });
      const [entry] = readEntries(logPath);
      expect(entry.level).toBe('error');
      expect(entry.stack).toContain('Error: oops');
      expect(entry.context).toEqual({ repository: 'api' });
    });

    it('logError should accept a non-Error value', () => {
      logError('engine', 'odd failure', 'plain string');
      const [entry] = readEntries(logPath);
      expect(entry.stack).toBeUndefined();
      expect(entry.code).toBeUndefined();
    });

    it('logWarn should log at warn level', () => {
      logWarn('detector', 'skipped file');
      const [entry] = readEntries(logPath);
      expect(entry.level).toBe('warn');
      expect(entry.component).toBe('detector');
    });

    it('logInfo should log when level=info', () => {
      mockConfig.level = 'info';
      logInfo('daemon', 'started');
      const [entry] = readEntries(logPath);
      expect(entry.level).toBe('info');
    });
  });
});
