import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildBackupConfig, validateBackupConfig } from '../backup/config.js';
import type { BackupConfig } from '../backup/types.js';

function makeConfig(overrides?: Partial<BackupConfig>): BackupConfig {
  return buildBackupConfig({ domain: 'printer.local', outDir: '/tmp/backup', ...overrides });
}

describe('buildBackupConfig', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('RRF_BACKUP_')) {
        delete process.env[key];
      }
    }
  });

  afterEach(() => {
    process.env = { ...savedEnv };
  });

  it('should build config with defaults', () => {
    const config = buildBackupConfig();

    expect(config).toEqual({
      domain: '',
      port: 80,
      password: 'reprap',
      dirToBackup: '0:/sys',
      outDir: '',
      excludes: [],
      removeLocal: false,
      atomicWrites: true,
      verbose: false,
      logFormat: 'pretty',
    });
  });

  it('should read values from environment', () => {
    process.env['RRF_BACKUP_DOMAIN'] = 'env-printer';
    process.env['RRF_BACKUP_PORT'] = '8080';
    process.env['RRF_BACKUP_PASSWORD'] = 'test-secret';
    process.env['RRF_BACKUP_DIR'] = '0:/macros';
    process.env['RRF_BACKUP_OUT_DIR'] = '/srv/backup';
    process.env['RRF_BACKUP_REMOVE_LOCAL'] = 'true';
    process.env['RRF_BACKUP_ATOMIC_WRITES'] = 'false';
    process.env['RRF_BACKUP_VERBOSE'] = 'TRUE';
    process.env['RRF_BACKUP_LOG_FORMAT'] = 'json';

    const config = buildBackupConfig();

    expect(config.domain).toBe('env-printer');
    expect(config.port).toBe(8080);
    expect(config.password).toBe('test-secret');
    expect(config.dirToBackup).toBe('0:/macros');
    expect(config.outDir).toBe('/srv/backup');
    expect(config.removeLocal).toBe(true);
    expect(config.atomicWrites).toBe(false);
    expect(config.verbose).toBe(true);
    expect(config.logFormat).toBe('json');
  });

  it('should split comma-separated exclusions from environment', () => {
    process.env['RRF_BACKUP_EXCLUDE'] = '0:/sys/a, 0:/sys/b,,';
    expect(buildBackupConfig().excludes).toEqual(['0:/sys/a', '0:/sys/b']);
  });

  it('should let overrides win over environment', () => {
    process.env['RRF_BACKUP_DOMAIN'] = 'env-printer';
    process.env['RRF_BACKUP_EXCLUDE'] = '0:/sys/a';

    const config = buildBackupConfig({ domain: 'cli-printer', excludes: ['0:/sys/b'] });

    expect(config.domain).toBe('cli-printer');
    expect(config.excludes).toEqual(['0:/sys/b']);
  });

  it('should turn an unparseable port into NaN', () => {
    process.env['RRF_BACKUP_PORT'] = 'eighty';
    expect(buildBackupConfig().port).toBeNaN();
  });

  it('should fall back to pretty logs for an unknown format', () => {
    process.env['RRF_BACKUP_LOG_FORMAT'] = 'xml';
    expect(buildBackupConfig().logFormat).toBe('pretty');
  });
});

describe('validateBackupConfig', () => {
  it('should accept a complete config', () => {
    expect(validateBackupConfig(makeConfig())).toEqual([]);
  });

  it('should require domain and output directory', () => {
    const errors = validateBackupConfig(makeConfig({ domain: '', outDir: '' }));
    expect(errors).toEqual(['domain is required', 'outDir is required']);
  });

  it('should reject ports outside the valid range', () => {
    expect(validateBackupConfig(makeConfig({ port: 0 }))).toEqual([
      'port must be an integer between 1 and 65535 (got 0)',
    ]);
    expect(validateBackupConfig(makeConfig({ port: 70000 }))).toEqual([
      'port must be an integer between 1 and 65535 (got 70000)',
    ]);
    expect(validateBackupConfig(makeConfig({ port: NaN }))).toEqual([
      'port must be an integer between 1 and 65535 (got NaN)',
    ]);
  });

  it('should reject a remote directory that is only slashes', () => {
    expect(validateBackupConfig(makeConfig({ dirToBackup: '//' }))).toEqual([
      'dirToBackup must not be empty',
    ]);
  });

  it('should reject exclusions that would match everything', () => {
    expect(validateBackupConfig(makeConfig({ excludes: ['0:/sys/a', '/'] }))).toEqual([
      'exclude prefix "/" would exclude everything',
    ]);
  });
});
