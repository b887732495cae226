/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DebugLogger } from './DebugLogger.js';
import { ConfigurationManager } from './ConfigurationManager.js';

function fileLogger(namespace: string): DebugLogger {
  ConfigurationManager.getInstance().setEphemeralConfig({
    output: { target: 'file' },
  });
  const logger = new DebugLogger(namespace);
  vi.spyOn(logger.fileOutput, 'write').mockResolvedValue();
  return logger;
}

describe('DebugLogger', () => {
  beforeEach(() => {
    vi.unstubAllEnvs();
    vi.stubEnv('DEBUG', '');
    ConfigurationManager.resetForTesting();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    ConfigurationManager.resetForTesting();
  });

  it('is disabled unless a namespace is configured', () => {
    expect(new DebugLogger('ask:test').enabled).toBe(false);
  });

  it('does not evaluate message functions while disabled', () => {
    const logger = fileLogger('ask:test');
    const message = vi.fn(() => 'expensive');

    logger.debug(message);

    expect(message).not.toHaveBeenCalled();
    expect(logger.fileOutput.write).not.toHaveBeenCalled();
  });

  it('writes evaluated messages when enabled', () => {
    const logger = fileLogger('ask:test');
    logger.enabled = true;

    logger.debug(() => 'sent 3 turns');

    expect(logger.fileOutput.write).toHaveBeenCalledWith(
      expect.objectContaining({
        namespace: 'ask:test',
        level: 'debug',
        message: 'sent 3 turns',
      }),
    );
  });

  it('redacts configured secrets', () => {
    const logger = fileLogger('ask:test');
    logger.enabled = true;

    logger.log('Using apiKey: test-secret');

    expect(logger.fileOutput.write).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Using apiKey: [REDACTED]' }),
    );
  });

  it('follows wildcard namespaces as configuration changes', () => {
    const logger = new DebugLogger('ask:client');

    logger.configManager.setEphemeralConfig({
      enabled: true,
      namespaces: ['ask:*'],
    });
    expect(logger.enabled).toBe(true);

    logger.configManager.setEphemeralConfig({ namespaces: ['ask:store'] });
    expect(logger.enabled).toBe(false);
  });

  it('drops entries below the configured level', () => {
    const logger = fileLogger('ask:test');
    logger.configManager.setEphemeralConfig({ level: 'warn' });
    logger.enabled = true;

    logger.debug('quiet');
    logger.warn('loud');

    expect(logger.fileOutput.write).toHaveBeenCalledTimes(1);
    expect(logger.fileOutput.write).toHaveBeenCalledWith(
      expect.objectContaining({ level: 'warn', message: 'loud' }),
    );
  });
});

describe('ConfigurationManager', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    ConfigurationManager.resetForTesting();
  });

  it('takes only ask namespaces from DEBUG', () => {
    vi.stubEnv('DEBUG', 'express:*, ask:store');
    ConfigurationManager.resetForTesting();

    const config = ConfigurationManager.getInstance().getEffectiveConfig();

    expect(config.enabled).toBe(true);
    expect(config.namespaces).toEqual(['ask:store']);
  });

  it('lets ASK_DEBUG replace DEBUG', () => {
    vi.stubEnv('DEBUG', 'ask:store');
    vi.stubEnv('ASK_DEBUG', 'ask:client,ask:session');
    ConfigurationManager.resetForTesting();

    expect(
      ConfigurationManager.getInstance().getEffectiveConfig().namespaces,
    ).toEqual(['ask:client', 'ask:session']);
  });

  it('ranks command-line settings above the environment and settings file', () => {
    vi.stubEnv('ASK_DEBUG', 'ask:client');
    ConfigurationManager.resetForTesting();
    const manager = ConfigurationManager.getInstance();

    manager.setSettingsConfig({ level: 'error', namespaces: ['ask:store'] });
    manager.setCliConfig({ namespaces: ['ask:*'] });

    expect(manager.getEffectiveConfig()).toMatchObject({
      enabled: true,
      level: 'error',
      namespaces: ['ask:*'],
    });
  });

  it('notifies subscribers when the configuration changes', () => {
    const manager = ConfigurationManager.getInstance();
    const listener = vi.fn();
    manager.subscribe(listener);

    manager.setEphemeralConfig({ level: 'warn' });
    manager.unsubscribe(listener);
    manager.setEphemeralConfig({ level: 'error' });

    expect(listener).toHaveBeenCalledTimes(1);
  });
});
