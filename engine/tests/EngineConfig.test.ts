import { mkdirSync, mkdtempSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ConfigurationError, LogLevel, loadConfig } from '../src/index.js';

let workdir: string;

beforeEach(() => {
  workdir = mkdtempSync(join(tmpdir(), 'taskline-config-'));
});

afterEach(() => {
  rmSync(workdir, { recursive: true, force: true });
});

function writeConfig(relative: string, content: string): void {
  const file = join(workdir, relative);
  mkdirSync(join(file, '..'), { recursive: true });
  writeFileSync(file, content, 'utf-8');
}

describe('loadConfig', () => {
  it('falls back to defaults when the default file is absent', () => {
    const config = loadConfig({ workdir, env: {} });

    expect(config.name).toBe('taskline');
    expect(config.configFile).toBeUndefined();
    expect(config.log).toMatchObject({
      level: LogLevel.INFO,
      format: 'text',
      console: true,
      file: true,
      database: true,
      path: join(workdir, 'logs'),
      fileName: 'taskline.log',
      rotate: { maxSizeMb: 100, backupCount: 5 },
      table: 'workflow_syslog',
    });
    expect(config.db).toEqual({
      host: 'localhost',
      port: 3306,
      username: 'root',
      password: '',
      database: 'workflow',
      charset: 'utf8mb4',
      connectionLimit: 5,
    });
    expect(config.flow.table).toBe('workflow_flow');
    expect(existsSync(join(workdir, 'logs'))).toBe(true);
  });

  it('reads etc/taskline.yaml and keeps defaults for the rest', () => {
    writeConfig('etc/taskline.yaml', 'log:\n  level: warn\n  file: false\ndb:\n  host: db.internal\n  port: 3307\n');

    const config = loadConfig({ workdir, env: {} });

    expect(config.configFile).toBe(join(workdir, 'etc', 'taskline.yaml'));
    expect(config.log.level).toBe(LogLevel.WARN);
    expect(config.db.host).toBe('db.internal');
    expect(config.db.port).toBe(3307);
    expect(config.db.database).toBe('workflow');
    expect(existsSync(join(workdir, 'logs'))).toBe(false);
  });

  it('reads JSON through the same parser', () => {
    writeConfig('custom.json', '{"name":"batch","flow":{"table":"flows"}}');
    const config = loadConfig({ workdir, file: 'custom.json', env: {} });
    expect(config.name).toBe('batch');
    expect(config.flow.table).toBe('flows');
  });

  it('layers environment overrides over file values', () => {
    writeConfig('etc/taskline.yaml', 'db:\n  host: from-file\n  password: file-secret\n');

    const config = loadConfig({
      workdir,
      env: {
        TASKLINE_LOG_LEVEL: 'DEBUG',
        TASKLINE_DB_HOST: 'from-env',
        TASKLINE_DB_PORT: '4406',
        TASKLINE_DB_USER: 'runner',
        TASKLINE_DB_PASSWORD: 'test-secret',
        TASKLINE_DB_NAME: 'flows',
      },
    });

    expect(config.log.level).toBe(LogLevel.DEBUG);
    expect(config.db).toMatchObject({
      host: 'from-env',
      port: 4406,
      username: 'runner',
      password: 'test-secret',
      database: 'flows',
    });
  });

  it('takes the file from TASKLINE_CONFIG', () => {
    writeConfig('alt.yaml', 'name: alt\n');
    expect(loadConfig({ workdir, env: { TASKLINE_CONFIG: 'alt.yaml' } }).name).toBe('alt');
  });

  it('fails on a missing explicit file', () => {
    expect(() => loadConfig({ workdir, file: 'nope.yaml', env: {} })).toThrow(ConfigurationError);
  });

  it('fails on invalid values with their path', () => {
    writeConfig('etc/taskline.yaml', 'log:\n  level: loud\n');
    try {
      loadConfig({ workdir, env: {} });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.path).toBe('log.level');
        expect(error.message.startsWith('Invalid configuration at log.level: ')).toBe(true);
      }
    }
  });

  it('refuses table names that are not plain identifiers', () => {
    writeConfig('etc/taskline.yaml', 'flow:\n  table: "flows; drop"\n');
    expect(() => loadConfig({ workdir, env: {} })).toThrow('Invalid configuration at flow.table: must be a plain identifier');
  });

  it('fails on unparsable YAML', () => {
    writeConfig('etc/taskline.yaml', 'log: [unclosed\n');
    expect(() => loadConfig({ workdir, env: {} })).toThrow(ConfigurationError);
  });
});
