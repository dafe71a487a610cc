import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createConfigTemplate, loadSettings } from './settings';
import { AppError, ErrorType } from '../utils/errors';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('loadSettings', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fin-config-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.removeSync(dir);
  });

  it('defaults to files inside the config directory', () => {
    expect(loadSettings({ FIN_CONFIG_DIR: dir })).toEqual({
      configDir: dir,
      configFile: path.join(dir, 'config.json'),
      databasePath: path.join(dir, 'financial_data.db'),
      rulesFile: path.join(dir, 'category_rules.yaml'),
    });
  });

  it('uses ~/.fin when no config directory is set', () => {
    expect(loadSettings({}).configDir).toBe(path.join(os.homedir(), '.fin'));
  });

  it('takes paths from the environment, relative to the config directory', () => {
    const settings = loadSettings({
      FIN_CONFIG_DIR: dir,
      FIN_DATABASE_PATH: 'data/fin.db',
      FIN_RULES_FILE: '/etc/fin/rules.yaml',
    });

    expect(settings.databasePath).toBe(path.join(dir, 'data', 'fin.db'));
    expect(settings.rulesFile).toBe('/etc/fin/rules.yaml');
  });

  it('ignores empty environment values', () => {
    const settings = loadSettings({ FIN_CONFIG_DIR: dir, FIN_DATABASE_PATH: '' });
    expect(settings.databasePath).toBe(path.join(dir, 'financial_data.db'));
  });

  it('prefers config.json over the environment', () => {
    fs.writeJsonSync(path.join(dir, 'config.json'), { rulesFile: 'my-rules.yaml' });

    const settings = loadSettings({ FIN_CONFIG_DIR: dir, FIN_RULES_FILE: 'env-rules.yaml' });

    expect(settings.rulesFile).toBe(path.join(dir, 'my-rules.yaml'));
  });

  it('rejects malformed config files', () => {
    fs.writeFileSync(path.join(dir, 'config.json'), '{ not json');
    expect(() => loadSettings({ FIN_CONFIG_DIR: dir })).toThrow(AppError);

    fs.writeJsonSync(path.join(dir, 'config.json'), { databasePath: 42 });
    expect(thrownBy(() => loadSettings({ FIN_CONFIG_DIR: dir }))).toMatchObject({
      type: ErrorType.CONFIGURATION_ERROR,
      message: `databasePath in ${path.join(dir, 'config.json')} must be a non-empty string`,
    });
  });

  it('writes a template once', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const settings = loadSettings({ FIN_CONFIG_DIR: path.join(dir, 'nested') });

    expect(createConfigTemplate(settings)).toBe(true);
    expect(fs.readJsonSync(settings.configFile)).toEqual({
      databasePath: settings.databasePath,
      rulesFile: settings.rulesFile,
    });
    expect(createConfigTemplate(settings)).toBe(false);
  });
});
