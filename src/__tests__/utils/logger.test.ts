import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

describe('root logger', () => {
  const originalCwd = process.cwd();
  const originalLevel = process.env.LOG_LEVEL;
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'metavault-logger-'));
    writeFileSync(join(workDir, '.env'), 'LOG_LEVEL=debug\n');
    process.chdir(workDir);
    delete process.env.LOG_LEVEL;
    jest.resetModules();
  });

  afterEach(() => {
    process.chdir(originalCwd);
    rmSync(workDir, { recursive: true, force: true });
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('takes its level from a LOG_LEVEL set in .env', async () => {
    const { getRootLogger, loggers } = await import('../../utils/logger');

    expect(getRootLogger().level).toBe('debug');
    expect(loggers.mcpStdio().level).toBe('debug');
  });

  it('keeps that level once the settings are loaded', async () => {
    const { loggers } = await import('../../utils/logger');
    const { loadSettings } = await import('../../config');
    const stdioLogger = loggers.mcpStdio();

    process.env.METAVAULT_BASE_URL = 'https://metavault.test';
    try {
      loadSettings();
    } finally {
      delete process.env.METAVAULT_BASE_URL;
    }

    expect(stdioLogger.level).toBe('debug');
  });
});
