import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { validateEnv } from '../../../src/infra/env.js';
import { parseVars, resolveRunConfig } from '../../../src/infra/runConfig.js';
import { ConfigError } from '../../../src/domain/errors.js';

const env = validateEnv({ FLEET_COMMAND_TEMPLATE: './provision.sh {{ name }}' });

describe('resolveRunConfig', () => {
  it('should derive the run configuration from the environment', () => {
    const config = resolveRunConfig(env);

    expect(config.commandTemplate).toBe('./provision.sh {{ name }}');
    expect(config.inventoryPath).toBe(path.resolve('./inventory/hosts'));
    expect(config.inventoryFormat).toBe('auto');
    expect(config.relay).toBeNull();
    expect(config.retryDelayMs).toBe(10_000);
    expect(config.maxRetryDelayMs).toBe(300_000);
    expect(config.attemptTimeoutMs).toBe(7_200_000);
    expect(config.nonRetryableKinds).toEqual([]);
    expect(config.preflightFile).toBeNull();
  });

  it('should let flags override the environment', () => {
    const config = resolveRunConfig(env, {
      command: 'echo {{ host }}',
      concurrency: '3',
      retries: '0',
      retryDelay: '1.5',
      retryDelayMode: 'linear',
      timeout: '60',
      relay: 'ops@relay.test',
      only: ['lab-01,lab-02', 'lab-05'],
      var: ['branch=main'],
      noRetryOn: 'auth_rejected, launch_failed',
    });

    expect(config.commandTemplate).toBe('echo {{ host }}');
    expect(config.concurrency).toBe(3);
    expect(config.maxRetries).toBe(0);
    expect(config.retryDelayMs).toBe(1500);
    expect(config.retryDelayMode).toBe('linear');
    expect(config.attemptTimeoutMs).toBe(60_000);
    expect(config.relay).toBe('ops@relay.test');
    expect(config.only).toEqual(['lab-01', 'lab-02', 'lab-05']);
    expect(config.vars).toEqual({ branch: 'main' });
    expect(config.nonRetryableKinds).toEqual(['auth_rejected', 'launch_failed']);
  });

  it('should reject invalid flags', () => {
    expect(() => resolveRunConfig(env, { concurrency: '0' })).toThrow(ConfigError);
    expect(() => resolveRunConfig(env, { retryDelayMode: 'random' })).toThrow(/--retryDelayMode/);
    expect(() => resolveRunConfig(env, { noRetryOn: 'bad_luck' })).toThrow(
      'Unknown failure kind "bad_luck" in no-retry list'
    );
  });

  it('should reject durations a timer cannot hold', () => {
    expect(() => resolveRunConfig(env, { timeout: '2592000' })).toThrow(/--timeout/);
    expect(() => resolveRunConfig(env, { retryDelay: '3000000' })).toThrow(/--retryDelay/);
    expect(() => resolveRunConfig(env, { maxRetryDelay: '3000000' })).toThrow(/--maxRetryDelay/);
    expect(resolveRunConfig(env, { timeout: '2147483' }).attemptTimeoutMs).toBe(2_147_483_000);
  });

  it('should require a command template unless told otherwise', () => {
    const bare = validateEnv({});

    expect(() => resolveRunConfig(bare)).toThrow(
      'A command template is required (--command or FLEET_COMMAND_TEMPLATE)'
    );
    expect(resolveRunConfig(bare, {}, { requireCommand: false }).commandTemplate).toBe('');
  });
});

describe('parseVars', () => {
  it('should split on the first equals sign', () => {
    expect(parseVars(['token=a=b', 'empty='])).toEqual({ token: 'a=b', empty: '' });
  });

  it('should reject entries without a key', () => {
    expect(() => parseVars(['=value'])).toThrow('Invalid --var "=value": expected key=value');
    expect(() => parseVars(['novalue'])).toThrow(ConfigError);
  });
});
