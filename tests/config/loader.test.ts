/**
 * Minutes Insights - Configuration Loader Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';

import { ConfigLoader, getChangedFields } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/utils/types.js';
import { createTestConfig } from '../fixtures/config.js';

const ENV_KEYS = [
  'PORT',
  'HOST',
  'STORE_DRIVER',
  'MINUTES_TABLE',
  'LLM_API_KEY',
  'OPENAI_API_KEY',
  'ROUTER_MIN_CONFIDENCE',
  'QUERY_DEFAULT_LIMIT',
  'LOG_LEVEL',
  'LOG_FORMAT',
  'SESSION_MAX_COUNT',
  'CONFIG_HOT_RELOAD',
];

describe('ConfigLoader', () => {
  let dir: string;
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'insights-config-'));
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  const writeFile = (name: string, content: string): string => {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  };

  it('should fall back to defaults when the file is missing', async () => {
    const config = await new ConfigLoader(path.join(dir, 'missing.yaml')).load();

    expect(config.server.port).toBe(8080);
    expect(config.store).toEqual({ driver: 'memory', dataFile: './data/minutes.sample.json', table: 'minutes' });
    expect(config.query.defaultLimit).toBe(100);
    expect(config.agents.routerMinConfidence).toBe(0.5);
    expect(config.postgres.poolMax).toBe(10);
    expect(config.postgres).not.toHaveProperty('poolMin');
    expect(config.hotReload).toBe(true);
  });

  it('should read a YAML file', async () => {
    const filePath = writeFile(
      'insights.yaml',
      ['server:', '  port: 9090', 'store:', '  table: board_minutes', 'query:', '  maxRows: 50'].join('\n')
    );

    const config = await new ConfigLoader(filePath).load();

    expect(config.server.port).toBe(9090);
    expect(config.store.table).toBe('board_minutes');
    expect(config.query.maxRows).toBe(50);
    expect(config.query.defaultLimit).toBe(100);
    expect(config.configFilePath).toBe(filePath);
  });

  it('should read a JSON file', async () => {
    const filePath = writeFile('insights.json', JSON.stringify({ session: { maxHistoryLength: 4 } }));

    const config = await new ConfigLoader(filePath).load();

    expect(config.session.maxHistoryLength).toBe(4);
  });

  it('should treat an empty YAML file as defaults', async () => {
    const config = await new ConfigLoader(writeFile('empty.yaml', '')).load();

    expect(config.server.port).toBe(8080);
  });

  it('should let environment variables override the file', async () => {
    const filePath = writeFile('insights.yaml', 'server:\n  port: 9090\n');
    process.env.PORT = '7070';
    process.env.STORE_DRIVER = 'POSTGRES';
    process.env.OPENAI_API_KEY = 'test-secret';
    process.env.ROUTER_MIN_CONFIDENCE = '0.7';
    process.env.CONFIG_HOT_RELOAD = 'false';

    const config = await new ConfigLoader(filePath).load();

    expect(config.server.port).toBe(7070);
    expect(config.store.driver).toBe('postgres');
    expect(config.llm.apiKey).toBe('test-secret');
    expect(config.agents.routerMinConfidence).toBe(0.7);
    expect(config.hotReload).toBe(false);
  });

  it('should read logging and session overrides', async () => {
    process.env.LOG_LEVEL = 'DEBUG';
    process.env.LOG_FORMAT = 'pretty';
    process.env.SESSION_MAX_COUNT = '25';

    const config = await new ConfigLoader(path.join(dir, 'missing.yaml')).load();

    expect(config.logging.level).toBe('debug');
    expect(config.logging.format).toBe('pretty');
    expect(config.session).toEqual({ maxHistoryLength: 10, maxSessions: 25, maxArtifacts: 20 });
  });

  it('should ignore invalid enum and number overrides', async () => {
    process.env.STORE_DRIVER = 'mysql';
    process.env.QUERY_DEFAULT_LIMIT = 'lots';

    const config = await new ConfigLoader(path.join(dir, 'missing.yaml')).load();

    expect(config.store.driver).toBe('memory');
    expect(config.query.defaultLimit).toBe(100);
  });

  it('should reject an invalid file', async () => {
    const filePath = writeFile('bad.yaml', 'query:\n  defaultLimit: 0\n');

    await expect(new ConfigLoader(filePath).load()).rejects.toThrow(
      'Invalid configuration file: query.defaultLimit: Number must be greater than or equal to 1'
    );
    await expect(new ConfigLoader(filePath).load()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('should reject a table name that is not an identifier', async () => {
    const filePath = writeFile('bad.yaml', 'store:\n  table: "minutes; drop"\n');

    await expect(new ConfigLoader(filePath).load()).rejects.toThrow(
      'store.table: table must be a lower-case SQL identifier'
    );
  });

  it('should throw from getConfig before load', () => {
    expect(() => new ConfigLoader(path.join(dir, 'missing.yaml')).getConfig()).toThrow(ConfigurationError);
  });

  it('should notify subscribers of changed fields on reload', async () => {
    const filePath = writeFile('insights.yaml', 'query:\n  maxRows: 50\n');
    const loader = new ConfigLoader(filePath);
    await loader.load();

    const seen: string[][] = [];
    loader.onConfigChange((_old, _new, fields) => seen.push(fields));

    fs.writeFileSync(filePath, 'query:\n  maxRows: 80\nsession:\n  maxHistoryLength: 3\n');
    await loader.reload();

    expect(seen).toEqual([['query.maxRows', 'session.maxHistoryLength']]);
    expect(loader.getConfig().query.maxRows).toBe(80);
  });

  it('should keep the previous configuration when a reload is invalid', async () => {
    const filePath = writeFile('insights.yaml', 'query:\n  maxRows: 50\n');
    const loader = new ConfigLoader(filePath);
    await loader.load();

    fs.writeFileSync(filePath, 'query:\n  maxRows: -1\n');
    await loader.reload();

    expect(loader.getConfig().query.maxRows).toBe(50);
  });
});

describe('getChangedFields', () => {
  it('should return dotted paths of changed leaves', () => {
    const before = createTestConfig();
    const after = createTestConfig({
      llm: { ...before.llm, apiKey: 'other-secret' },
      hotReload: true,
    });

    expect(getChangedFields(before, after)).toEqual(['llm.apiKey', 'hotReload']);
  });

  it('should return nothing for equal configurations', () => {
    expect(getChangedFields(createTestConfig(), createTestConfig())).toEqual([]);
  });
});
