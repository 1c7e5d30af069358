import { readFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import type { ZodIssue } from 'zod';
import type { MergedConfig, PifanConfigFile, LogLevel } from './config-schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_VERSION, configFileSchema } from './config-schema.js';
import { ConfigurationError, errorMessage } from '../core/errors.js';

/**
 * Values taken from the command line; they win over everything else.
 */
export interface ConfigOverrides {
  monitorSocket?: string | undefined;
  monitorPort?: number | undefined;
  logLevel?: LogLevel | undefined;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Render zod issues as "path: message" strings.
 */
export function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * ConfigLoader - loads and merges configuration from multiple sources.
 *
 * Priority (highest wins):
 * 1. Command-line overrides
 * 2. Environment variables
 * 3. Config file (data/config/pifan.json)
 * 4. Hardcoded defaults
 */
export class ConfigLoader {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(configPath = DEFAULT_CONFIG.paths.config, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.env = env;
  }

  /**
   * Load and merge configuration from all sources.
   */
  async load(overrides: ConfigOverrides = {}): Promise<MergedConfig> {
    const file = await this.loadConfigFile();

    const config = structuredClone(DEFAULT_CONFIG);
    config.paths.config = this.configPath;

    if (file) {
      this.mergeConfigFile(config, file);
    }

    this.mergeEnvironment(config);
    this.mergeOverrides(config, overrides);

    return config;
  }

  /**
   * Load and validate the config file. A missing file means defaults.
   */
  private async loadConfigFile(): Promise<PifanConfigFile | null> {
    const filePath = join(this.configPath, 'pifan.json');

    let content: string;
    try {
      await access(filePath);
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw new ConfigurationError(`Failed to read ${filePath}: ${errorMessage(error)}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = configFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid config file ${filePath}`, formatIssues(parsed.error.issues));
    }

    const version = parsed.data.version;
    if (version !== undefined && version > CONFIG_FILE_VERSION) {
      throw new ConfigurationError(
        `Config file version (${String(version)}) is newer than supported (${String(CONFIG_FILE_VERSION)})`
      );
    }

    return parsed.data;
  }

  /**
   * Merge config file values into the config object.
   */
  private mergeConfigFile(config: MergedConfig, file: PifanConfigFile): void {
    // Pipeline is replaced whole, never merged stage by stage
    if (file.pipeline) {
      config.pipeline = file.pipeline;
    }

    if (file.monitor) {
      if (file.monitor.socketPath) {
        config.monitor.socketPath = file.monitor.socketPath;
        config.monitor.enabled = true;
      }
      if (file.monitor.host) {
        config.monitor.host = file.monitor.host;
      }
      if (file.monitor.port !== undefined) {
        config.monitor.port = file.monitor.port;
        config.monitor.enabled = true;
      }
      if (file.monitor.enabled !== undefined) {
        config.monitor.enabled = file.monitor.enabled;
      }
    }

    if (file.logging) {
      if (file.logging.level) {
        config.logging.level = file.logging.level;
      }
      if (file.logging.pretty !== undefined) {
        config.logging.pretty = file.logging.pretty;
      }
      if (file.logging.maxFiles !== undefined) {
        config.logging.maxFiles = file.logging.maxFiles;
      }
      if (file.logging.logDir) {
        config.logging.logDir = file.logging.logDir;
      }
    }
  }

  /**
   * Override config with environment variables.
   */
  private mergeEnvironment(config: MergedConfig): void {
    const logLevel = this.env['LOG_LEVEL'];
    if (logLevel && isLogLevel(logLevel)) {
      config.logging.level = logLevel;
    }

    const socketPath = this.env['PIFAN_MONITOR_SOCKET'];
    if (socketPath) {
      config.monitor.socketPath = socketPath;
      config.monitor.enabled = true;
    }

    const port = this.env['PIFAN_MONITOR_PORT'];
    if (port) {
      config.monitor.port = this.parseInteger('PIFAN_MONITOR_PORT', port, 0);
      config.monitor.enabled = true;
    }

    const period = this.env['PIFAN_SAMPLE_PERIOD_MS'];
    if (period) {
      config.pipeline.samplePeriodMs = this.parseInteger('PIFAN_SAMPLE_PERIOD_MS', period, 1);
    }

    const dataPath = this.env['DATA_PATH'];
    if (dataPath) {
      config.paths.data = dataPath;
      config.paths.logs = join(dataPath, 'logs');
      config.logging.logDir = config.paths.logs;
    }
  }

  private mergeOverrides(config: MergedConfig, overrides: ConfigOverrides): void {
    if (overrides.monitorSocket) {
      config.monitor.socketPath = overrides.monitorSocket;
      config.monitor.enabled = true;
    }
    if (overrides.monitorPort !== undefined) {
      config.monitor.port = overrides.monitorPort;
      config.monitor.enabled = true;
    }
    if (overrides.logLevel) {
      config.logging.level = overrides.logLevel;
    }
  }

  private parseInteger(name: string, value: string, min: number): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new ConfigurationError(`${name} must be an integer >= ${String(min)}, got "${value}"`);
    }
    return parsed;
  }
}

/**
 * Factory function for creating a config loader.
 */
export function createConfigLoader(configPath?: string, env?: NodeJS.ProcessEnv): ConfigLoader {
  return new ConfigLoader(configPath, env);
}

/**
 * Load configuration from default paths.
 * Convenience function for quick setup.
 */
export async function loadConfig(
  configPath?: string,
  overrides?: ConfigOverrides
): Promise<MergedConfig> {
  const loader = createConfigLoader(configPath);
  return loader.load(overrides);
}
