import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '@step-relay/shared';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_SERVER_CONFIG, loadServerConfig, readConfigFile } from '../src/index.js';

describe('loadServerConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'step-relay-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(contents: string): string {
    const path = join(dir, 'server.yaml');
    writeFileSync(path, contents);
    return path;
  }

  it('should fall back to defaults', () => {
    expect(loadServerConfig({ argv: [], env: {} })).toEqual({
      host: 'localhost',
      port: 8080,
      timeoutThresholdSeconds: 5,
      idleTimeoutSeconds: 30,
      maxFrameBytes: 65536,
    });
    expect(DEFAULT_SERVER_CONFIG.port).toBe(8080);
  });

  it('should read command line flags', () => {
    const config = loadServerConfig({
      argv: ['--host', '0.0.0.0', '--port', '9000', '--timeout', '2.5', '--first-step-id', '1'],
      env: {},
    });

    expect(config).toMatchObject({
      host: '0.0.0.0',
      port: 9000,
      timeoutThresholdSeconds: 2.5,
      firstStepId: 1,
    });
  });

  it('should read the environment', () => {
    const config = loadServerConfig({
      argv: [],
      env: { PORT: '7000', STEP_TIMEOUT_THRESHOLD: '3', STEP_IDLE_TIMEOUT: '10' },
    });

    expect(config).toMatchObject({ port: 7000, timeoutThresholdSeconds: 3, idleTimeoutSeconds: 10 });
  });

  it('should let flags override the environment', () => {
    const config = loadServerConfig({ argv: ['--port', '9001'], env: { PORT: '7000' } });
    expect(config.port).toBe(9001);
  });

  it('should read a YAML file named by --config', () => {
    const path = writeConfig('port: 6000\nidleTimeoutSeconds: 12\nmaxFrameBytes: 4096\n');

    const config = loadServerConfig({ argv: ['--config', path], env: {} });

    expect(config).toMatchObject({ port: 6000, idleTimeoutSeconds: 12, maxFrameBytes: 4096 });
  });

  it('should let the environment override the YAML file', () => {
    const path = writeConfig('port: 6000\n');

    const config = loadServerConfig({ argv: [], env: { CONFIG_PATH: path, PORT: '6001' } });

    expect(config.port).toBe(6001);
  });

  it('should reject invalid values', () => {
    expect(() => loadServerConfig({ argv: ['--port', 'http'], env: {} })).toThrow(ConfigError);
    expect(() => loadServerConfig({ argv: ['--port', '70000'], env: {} })).toThrow(
      /^Invalid server configuration: port:/
    );
    expect(() => loadServerConfig({ argv: ['--timeout=-1'], env: {} })).toThrow(ConfigError);
  });

  it('should bound the idle timeout to what a timer can hold', () => {
    expect(loadServerConfig({ argv: ['--idle-timeout', '2147483'], env: {} }).idleTimeoutSeconds).toBe(
      2147483
    );
    expect(() => loadServerConfig({ argv: ['--idle-timeout', '2500000'], env: {} })).toThrow(
      new ConfigError(
        'Invalid server configuration: idleTimeoutSeconds: Number must be less than or equal to 2147483'
      )
    );
  });

  it('should reject unknown flags', () => {
    expect(() => loadServerConfig({ argv: ['--verbose'], env: {} })).toThrow(
      /^Invalid command line:/
    );
  });

  it('should reject unknown keys in the YAML file', () => {
    const path = writeConfig('port: 6000\ncolour: blue\n');

    expect(() => readConfigFile(path)).toThrow(ConfigError);
  });

  it('should report a missing YAML file', () => {
    const path = join(dir, 'missing.yaml');

    expect(() => readConfigFile(path)).toThrow(`Cannot read config file ${path}`);
  });

  it('should treat an empty YAML file as no overrides', () => {
    expect(readConfigFile(writeConfig(''))).toEqual({});
  });
});
