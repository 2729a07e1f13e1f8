import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  ConfigError,
  engineOptionsFromConfig,
  loadConfig,
  parseEnvFile,
  renderOptionsFromConfig,
} from '../src/index';

describe('parseEnvFile', () => {
  it('reads keys, skipping comments and blank lines', () => {
    const parsed = parseEnvFile('# settings\n\nTOKWEAVE_ENV=test\nTOKWEAVE_COLOR = "never"\nbroken line\n');

    expect(parsed).toEqual({ TOKWEAVE_ENV: 'test', TOKWEAVE_COLOR: 'never' });
  });

  it('strips single quotes', () => {
    expect(parseEnvFile("TOKWEAVE_MAX_STALLED_ROUNDS='3'")).toEqual({
      TOKWEAVE_MAX_STALLED_ROUNDS: '3',
    });
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tokweave-config-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('uses defaults without a .env file or variables', () => {
    expect(loadConfig(root, {})).toEqual({
      environment: 'development',
      color: 'auto',
      maxStalledRounds: 1,
    });
  });

  it('finds a .env file in a parent directory', () => {
    const nested = path.join(root, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(
      path.join(root, '.env'),
      'TOKWEAVE_ENV=production\nTOKWEAVE_COLOR=always\nTOKWEAVE_MAX_STALLED_ROUNDS=4\n',
    );

    expect(loadConfig(nested, {})).toEqual({
      environment: 'production',
      color: 'always',
      maxStalledRounds: 4,
    });
  });

  it('lets process variables override the .env file', () => {
    fs.writeFileSync(path.join(root, '.env'), 'TOKWEAVE_ENV=production\n');

    expect(loadConfig(root, { TOKWEAVE_ENV: 'test' }).environment).toBe('test');
  });

  it('ignores empty variables', () => {
    fs.writeFileSync(path.join(root, '.env'), 'TOKWEAVE_ENV=production\n');

    expect(loadConfig(root, { TOKWEAVE_ENV: '' }).environment).toBe('production');
  });

  it('turns colour off when NO_COLOR is set', () => {
    expect(loadConfig(root, { NO_COLOR: '1', TOKWEAVE_COLOR: 'always' }).color).toBe('never');
  });

  it('accepts Infinity as the stall limit', () => {
    expect(loadConfig(root, { TOKWEAVE_MAX_STALLED_ROUNDS: 'Infinity' }).maxStalledRounds).toBe(
      Infinity,
    );
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig(root, { TOKWEAVE_COLOR: 'sometimes' })).toThrow(ConfigError);
    expect(() => loadConfig(root, { TOKWEAVE_MAX_STALLED_ROUNDS: '-2' })).toThrow(
      /maxStalledRounds/,
    );
  });
});

describe('option helpers', () => {
  it('builds engine options from config', () => {
    const options = engineOptionsFromConfig({
      environment: 'test',
      color: 'auto',
      maxStalledRounds: 3,
    });

    expect(options.maxStalledRounds).toBe(3);
    expect(options.logger).toBeDefined();
  });

  it('maps colour modes to render options', () => {
    const base = { environment: 'development', maxStalledRounds: 1 } as const;

    expect(renderOptionsFromConfig({ ...base, color: 'auto' })).toEqual({});
    expect(renderOptionsFromConfig({ ...base, color: 'always' })).toEqual({ color: true });
    expect(renderOptionsFromConfig({ ...base, color: 'never' })).toEqual({ color: false });
  });
});
