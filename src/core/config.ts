/**
 * Rainflow Engine - Configuration Manager
 * =======================================
 * Loads, validates and manages the service configuration
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { CountFlags, DEFAULT_COUNT_FLAGS, DEFAULT_WOEHLER_K, DEFAULT_WOEHLER_NX, DEFAULT_WOEHLER_SX } from '../types';
import {
  CountingConfigZ,
  FullConfigZ,
  LoggingConfigZ,
  ServerConfigZ,
  WoehlerZ,
  formatIssues,
} from './schemas';
import { RainflowOptions } from '../engine/rainflow-config';
import { woehlerAny } from '../engine/woehler';

// ============================================================================
// CONFIGURATION TYPES
// ============================================================================

export type CountingConfig = z.infer<typeof CountingConfigZ>;
export type WoehlerConfig = z.infer<typeof WoehlerZ>;
export type LoggingConfig = z.infer<typeof LoggingConfigZ>;
export type ServerConfig = z.infer<typeof ServerConfigZ>;
export type FullConfig = z.infer<typeof FullConfigZ>;

/** Per-session overrides of the counting section */
export type CountingOverrides = Partial<Omit<CountingConfig, 'flags'>> & { flags?: Partial<CountFlags> };

/** Partial configuration as found in files or runtime updates */
const ConfigOverridesZ = FullConfigZ.deepPartial();
export type ConfigOverrides = z.infer<typeof ConfigOverridesZ>;

// ============================================================================
// DEFAULT FULL CONFIG
// ============================================================================

export const DEFAULT_FULL_CONFIG: FullConfig = {
  version: '1.0',
  description: 'Rainflow counting service - default configuration',
  counting: {
    classCount: 100,
    classWidth: 1,
    classOffset: -50,
    hysteresis: 1,
    countingMethod: '4ptm',
    residualMethod: 'none',
    spreadDamage: 'half_23',
    flags: { ...DEFAULT_COUNT_FLAGS },
  },
  woehler: {
    sx: DEFAULT_WOEHLER_SX,
    nx: DEFAULT_WOEHLER_NX,
    k: DEFAULT_WOEHLER_K,
  },
  logging: {
    level: 'info',
    console: true,
    file: false,
    filePath: './data/logs/rainflow.log',
  },
  server: {
    port: 3000,
    maxSessions: 100,
    maxFeedValues: 100000,
  },
};

// ============================================================================
// CONFIG MANAGER CLASS
// ============================================================================

export class ConfigManager {
  private config: FullConfig;
  private configPath: string | null = null;

  constructor(configPath?: string) {
    this.config = this.mergeConfig(DEFAULT_FULL_CONFIG, {});

    if (configPath) {
      this.loadFromFile(configPath);
    }
  }

  /**
   * Load configuration from a JSON file, missing entries keep their defaults
   */
  loadFromFile(filePath: string): void {
    const absolutePath = path.resolve(filePath);
    const content = fs.readFileSync(absolutePath, 'utf-8');
    const parsed = ConfigOverridesZ.safeParse(JSON.parse(content));

    if (!parsed.success) {
      throw new Error(`Invalid config file ${filePath}: ${formatIssues(parsed.error).join('; ')}`);
    }

    this.config = this.mergeConfig(DEFAULT_FULL_CONFIG, parsed.data);
    this.configPath = absolutePath;
  }

  /**
   * Deep merge two config objects
   */
  private mergeConfig(base: FullConfig, override: ConfigOverrides): FullConfig {
    return {
      version: override.version ?? base.version,
      description: override.description ?? base.description,
      counting: {
        ...base.counting,
        ...override.counting,
        flags: { ...base.counting.flags, ...override.counting?.flags },
      },
      woehler: { ...base.woehler, ...override.woehler },
      logging: { ...base.logging, ...override.logging },
      server: { ...base.server, ...override.server },
    };
  }

  /**
   * Get the full configuration
   */
  getFullConfig(): FullConfig {
    return structuredClone(this.config);
  }

  getCountingConfig(): CountingConfig {
    return { ...this.config.counting, flags: { ...this.config.counting.flags } };
  }

  getWoehlerConfig(): WoehlerConfig {
    return { ...this.config.woehler };
  }

  getLoggingConfig(): LoggingConfig {
    return { ...this.config.logging };
  }

  getServerConfig(): ServerConfig {
    return { ...this.config.server };
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  /**
   * Session options from the counting and Woehler sections, with overrides
   */
  getRainflowOptions(counting: CountingOverrides = {}, woehler?: WoehlerConfig): RainflowOptions {
    const merged = { ...this.config.counting, ...counting, flags: { ...this.config.counting.flags, ...counting.flags } };
    return {
      classCount: merged.classCount,
      classWidth: merged.classWidth,
      classOffset: merged.classOffset,
      hysteresis: merged.hysteresis,
      countingMethod: merged.countingMethod,
      spreadDamage: merged.spreadDamage,
      flags: merged.flags,
      woehler: woehlerAny(woehler ?? this.config.woehler),
    };
  }

  /**
   * Update configuration at runtime. An update that leaves the config
   * invalid throws and the current config stays in place.
   */
  updateConfig(updates: ConfigOverrides): void {
    const merged = FullConfigZ.safeParse(this.mergeConfig(this.config, updates));

    if (!merged.success) {
      throw new Error(`Invalid config update: ${formatIssues(merged.error).join('; ')}`);
    }

    this.config = merged.data;
  }

  /**
   * Save current configuration to file
   */
  saveToFile(filePath?: string): void {
    const targetPath = filePath ?? this.configPath;
    if (!targetPath) {
      throw new Error('No config file path specified');
    }

    const dir = path.dirname(path.resolve(targetPath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const content = JSON.stringify(this.config, null, 2);
    fs.writeFileSync(targetPath, content, 'utf-8');
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const result = FullConfigZ.safeParse(this.config);

    if (!result.success) {
      errors.push(...formatIssues(result.error));
    }

    const counting = this.config.counting;
    if (counting.classCount > 0 && !(counting.classWidth > 0)) {
      errors.push('counting.classWidth must be positive when classes are counted');
    }
    if (counting.countingMethod !== '4ptm' && counting.residualMethod === 'clormann_seeger') {
      errors.push('counting.residualMethod clormann_seeger requires countingMethod 4ptm');
    }

    return { valid: errors.length === 0, errors };
  }
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

let globalConfig: ConfigManager | null = null;

export function initConfig(configPath?: string): ConfigManager {
  globalConfig = new ConfigManager(configPath);
  return globalConfig;
}

export function getConfig(): ConfigManager {
  if (!globalConfig) {
    globalConfig = new ConfigManager();
  }
  return globalConfig;
}
