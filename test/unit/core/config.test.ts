import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ConfigManager, CONFIG_FILE_NAME } from '../../../src/core/config.js';
import { ConfigError } from '../../../src/core/errors.js';

describe('ConfigManager', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fanout-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: string): void {
    writeFileSync(join(dir, CONFIG_FILE_NAME), content, 'utf-8');
  }

  it('should fall back to defaults', () => {
    const config = new ConfigManager(dir, {}).load();
    expect(config).toEqual({
      traversal: { workers: 4, mode: 'in-process' },
      logging: { level: 'info', pretty: false },
    });
  });

  it('should read the project config file', () => {
    writeConfig('traversal:\n  workers: 8\nlogging:\n  level: debug\n');
    const config = new ConfigManager(dir, {}).load();

    expect(config.traversal).toEqual({ workers: 8, mode: 'in-process' });
    expect(config.logging.level).toBe('debug');
  });

  it('should let environment variables override the file', () => {
    writeConfig('traversal:\n  workers: 8\n');
    const config = new ConfigManager(dir, {
      FANOUT_WORKERS: '2',
      FANOUT_MODE: 'thread',
      FANOUT_LOG_LEVEL: 'warn',
    }).load();

    expect(config.traversal).toEqual({ workers: 2, mode: 'thread' });
    expect(config.logging.level).toBe('warn');
  });

  it('should let explicit overrides win over everything', () => {
    writeConfig('traversal:\n  workers: 8\n');
    const config = new ConfigManager(dir, { FANOUT_WORKERS: '2' }).load({
      traversal: { workers: 3, mode: undefined },
    });

    expect(config.traversal).toEqual({ workers: 3, mode: 'in-process' });
  });

  it('should reject a worker count below 1', () => {
    expect(() => new ConfigManager(dir, {}).load({ traversal: { workers: 0 } })).toThrow(ConfigError);
    expect(() => new ConfigManager(dir, {}).load({ traversal: { workers: 0 } })).toThrow(
      /^Invalid configuration: traversal\.workers: /,
    );
  });

  it('should reject a non-numeric FANOUT_WORKERS', () => {
    expect(() => new ConfigManager(dir, { FANOUT_WORKERS: 'many' }).load()).toThrow(ConfigError);
  });

  it('should reject an unknown mode', () => {
    writeConfig('traversal:\n  mode: cluster\n');
    expect(() => new ConfigManager(dir, {}).load()).toThrow(/traversal\.mode/);
  });

  it('should reject unparseable YAML', () => {
    writeConfig('traversal: [unclosed\n');
    expect(() => new ConfigManager(dir, {}).load()).toThrow(
      `Failed to parse project config at ${join(dir, CONFIG_FILE_NAME)}`,
    );
  });

  it('should reject a config file that is not a mapping', () => {
    writeConfig('- 1\n- 2\n');
    expect(() => new ConfigManager(dir, {}).load()).toThrow('must be a mapping');
  });

  it('should treat an empty config file as absent', () => {
    writeConfig('');
    expect(new ConfigManager(dir, {}).load().traversal.workers).toBe(4);
  });

  it('should cache the loaded configuration', () => {
    const manager = new ConfigManager(dir, {});
    const loaded = manager.load({ traversal: { workers: 6 } });
    expect(manager.get()).toBe(loaded);
  });
});
