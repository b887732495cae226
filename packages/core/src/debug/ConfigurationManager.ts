/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugSettings } from './types.js';

/** Namespace prefix every logger of this project shares. */
export const DEBUG_NAMESPACE_PREFIX = 'ask';

/**
 * Merges debug settings from every source, lowest priority first:
 * defaults, settings file, environment, command line, ephemeral.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private settingsConfig: Partial<DebugSettings> | null = null;
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  /**
   * Drops the singleton so the next getInstance() re-reads the environment.
   */
  static resetForTesting(): void {
    ConfigurationManager.instance = undefined;
  }

  private constructor(env: NodeJS.ProcessEnv = process.env) {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      output: { target: 'stderr' },
      redactPatterns: ['apiKey', 'token', 'password', 'authorization'],
    };
    this.loadEnvironmentConfig(env);
    this.mergedConfig = this.merge();
  }

  // DEBUG is shared with other tools, so only our namespaces are taken from it.
  private loadEnvironmentConfig(env: NodeJS.ProcessEnv): void {
    const debugEnv = env['DEBUG'];
    if (debugEnv) {
      const namespaces = this.parseDebugEnv(debugEnv).filter(
        (ns) => ns.startsWith(DEBUG_NAMESPACE_PREFIX) || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    const askDebug = env['ASK_DEBUG'];
    if (askDebug) {
      this.envConfig = {
        enabled: true,
        namespaces: this.parseDebugEnv(askDebug),
      };
    }

    const output = env['ASK_DEBUG_OUTPUT'];
    if (output) {
      this.envConfig = { ...this.envConfig, output: { target: output } };
    }
  }

  private merge(): DebugSettings {
    const layers = [
      this.settingsConfig,
      this.envConfig,
      this.cliConfig,
      this.ephemeralConfig,
    ];
    return layers.reduce<DebugSettings>(
      (merged, layer) => (layer ? { ...merged, ...layer } : merged),
      { ...this.defaultConfig },
    );
  }

  private mergeConfigurations(): void {
    this.mergedConfig = this.merge();
    this.listeners.forEach((listener) => listener());
  }

  setSettingsConfig(config: Partial<DebugSettings>): void {
    this.settingsConfig = config;
    this.mergeConfigurations();
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = { ...this.ephemeralConfig, ...config };
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getOutputTarget(): string {
    const output = this.mergedConfig.output;
    return typeof output === 'string' ? output : output.target;
  }

  getOutputDirectory(): string | undefined {
    const output = this.mergedConfig.output;
    return typeof output === 'string' ? undefined : output.directory;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
