import { loadConfig, validateConfig, type StringsDemoConfig } from '../config.js';
import { logger } from '../lib/logger.js';
import { StringsDemo } from '../strings-demo.js';

export interface CliContext {
  config: StringsDemoConfig;
  demo: StringsDemo;
}

/**
 * Load and validate configuration, apply the log level, and build the demo
 */
export function createCliContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const config = loadConfig(env);
  validateConfig(config);
  logger.level = config.logLevel;

  return { config, demo: StringsDemo.fromConfig(config) };
}

/**
 * Run a command body, reporting failures on stderr with exit code 1
 */
export function runAction(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Error: Unknown error occurred');
    }
    process.exitCode = 1;
  }
}
