import { type ArgumentRule, strictArgumentRule } from "../types/subtype";

/**
 * Receives trace output from the checker.
 */
export interface CheckLogger {
  debug(message: string): void;
}

export const silentLogger: CheckLogger = {
  debug() {},
};

export const consoleLogger: CheckLogger = {
  debug(message) {
    console.debug(message);
  },
};

/**
 * Type checker configuration.
 */
export interface CheckConfig {
  /** How function argument types are compared. */
  argumentRule?: ArgumentRule;
  /** Told about every check that is deferred and every runtime check run. */
  logger?: CheckLogger;
}

export type ResolvedCheckConfig = Required<CheckConfig>;

export function resolveConfig(config: CheckConfig = {}): ResolvedCheckConfig {
  return {
    argumentRule: config.argumentRule ?? strictArgumentRule,
    logger: config.logger ?? silentLogger,
  };
}
