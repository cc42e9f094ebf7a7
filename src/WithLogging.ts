import type { ConfigManager } from './ConfigManager';

export interface ComponentLogger {
  verbose(msg: string, ...data: unknown[]): void;
  log(msg: string, ...data: unknown[]): void;
  warn(msg: string, ...data: unknown[]): void;
  error(msg: string, ...data: unknown[]): void;
}

/**
 * Logger for one component: messages are prefixed with `[Docsift.<name>]`
 */
export function createComponentLogger(
  configManager: ConfigManager,
  componentName: string
): ComponentLogger {
  const baseLogger = configManager.getLogger();
  const prefix = `[Docsift.${componentName}]`;
  return {
    verbose: (msg, ...data) => baseLogger.verbose(`${prefix} ${msg}`, ...data),
    log: (msg, ...data) => baseLogger.log(`${prefix} ${msg}`, ...data),
    warn: (msg, ...data) => baseLogger.warn(`${prefix} ${msg}`, ...data),
    error: (msg, ...data) => baseLogger.error(`${prefix} ${msg}`, ...data),
  };
}

/**
 * Base class for components that log through their ConfigManager
 */
export abstract class WithLogging {
  protected abstract readonly configManager: ConfigManager;
  protected abstract readonly componentName: string;
  private componentLogger?: ComponentLogger;

  // Created on first use: subclasses set componentName after super()
  private get logger(): ComponentLogger {
    this.componentLogger ??= createComponentLogger(
      this.configManager,
      this.componentName
    );
    return this.componentLogger;
  }

  protected verbose(msg: string, ...data: unknown[]): void {
    this.logger.verbose(msg, ...data);
  }

  protected log(msg: string, ...data: unknown[]): void {
    this.logger.log(msg, ...data);
  }

  protected warn(msg: string, ...data: unknown[]): void {
    this.logger.warn(msg, ...data);
  }

  protected error(msg: string, ...data: unknown[]): void {
    this.logger.error(msg, ...data);
  }
}
