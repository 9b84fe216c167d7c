/**
 * Configuration tests
 */

import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import { ConfigError } from '@roamer/shared';
import { DEFAULT_CONFIG_FILE, configFromEnv, loadConfig, parseConfig } from '../config.js';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    const config = parseConfig({});

    expect(config.session).toEqual({
      stepBudget: 30,
      timeBudgetMs: 300000,
      historyLength: 5,
      captureRetryCap: 3,
      captureRetryDelayMs: 1000,
      waitBetweenStepsMs: 1000,
      launchOnStart: true,
      fallbackText: 'test',
    });
    expect(config.loop).toEqual({ window: 8, warnAt: 3, forceAfterWarnings: 2 });
    expect(config.oracle).toMatchObject({ provider: 'google', invalidRetryCap: 2, unavailableRetryCap: 3 });
    expect(config.knowledge).toEqual({ path: '.roamer/knowledge.jsonl', wipe: false });
    expect(config.fingerprint.level).toBe('attributes');
    expect(config.logging.level).toBe('info');
  });

  it('lists every invalid field', () => {
    let caught: unknown;
    try {
      parseConfig({ session: { stepBudget: 0 }, logging: { level: 'loud' } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: 'CONFIG_ERROR',
      details: {
        issues: ['session.stepBudget: Number must be greater than 0', 'logging.level: Expected one of debug, info, warn, error'],
      },
    });
  });

  it('accepts a null knowledge path for in-memory runs', () => {
    expect(parseConfig({ knowledge: { path: null } }).knowledge.path).toBeNull();
  });
});

describe('configFromEnv', () => {
  it('maps ROAMER_* variables onto config paths', () => {
    expect(
      configFromEnv({
        ROAMER_STEP_BUDGET: '12',
        ROAMER_LLM_PROVIDER: 'openai',
        ROAMER_KNOWLEDGE_PATH: '/var/roamer/knowledge.jsonl',
        ROAMER_LOG_LEVEL: '',
        HOME: '/root',
      })
    ).toEqual({
      session: { stepBudget: 12 },
      oracle: { provider: 'openai' },
      knowledge: { path: '/var/roamer/knowledge.jsonl' },
    });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'roamer-config-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('uses defaults when there is no config file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });
    expect(config).toEqual(parseConfig({}));
  });

  it('layers file, environment and overrides in that order', async () => {
    await fs.writeJson(path.join(dir, DEFAULT_CONFIG_FILE), {
      session: { stepBudget: 20, historyLength: 2 },
      oracle: { provider: 'openai', model: 'gpt-4o-mini' },
    });

    const config = await loadConfig({
      cwd: dir,
      env: { ROAMER_STEP_BUDGET: '25' },
      overrides: { session: { historyLength: 7 } },
    });

    expect(config.session).toMatchObject({ stepBudget: 25, historyLength: 7, waitBetweenStepsMs: 1000 });
    expect(config.oracle).toMatchObject({ provider: 'openai', model: 'gpt-4o-mini' });
  });

  it('reads an explicit file relative to cwd', async () => {
    await fs.writeJson(path.join(dir, 'ci.json'), { scheduler: { wallClockMs: 60000 } });

    const config = await loadConfig({ file: 'ci.json', cwd: dir, env: {} });
    expect(config.scheduler.wallClockMs).toBe(60000);
  });

  it('fails when an explicit file is missing', async () => {
    await expect(loadConfig({ file: 'absent.json', cwd: dir, env: {} })).rejects.toThrow(
      `Config file not found: ${path.join(dir, 'absent.json')}`
    );
  });

  it('fails when the file is not a JSON object', async () => {
    const file = path.join(dir, DEFAULT_CONFIG_FILE);
    await fs.writeJson(file, [1, 2, 3]);

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(`Config file ${file} must contain a JSON object`);
  });

  it('rejects environment values that do not validate', async () => {
    await expect(loadConfig({ cwd: dir, env: { ROAMER_STEP_BUDGET: 'many' } })).rejects.toBeInstanceOf(ConfigError);
  });
});
