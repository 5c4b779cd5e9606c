export type StublayerErrorCode = "config-error" | "unknown-module" | "generation-failed";

export class StublayerError extends Error {
  constructor(
    message: string,
    public readonly code: StublayerErrorCode
  ) {
    super(message);
    this.name = "StublayerError";
  }
}

/**
 * Malformed or contradictory configuration. Aborts the run before any module is touched.
 */
export class ConfigError extends StublayerError {
  constructor(message: string) {
    super(message, "config-error");
    this.name = "ConfigError";
  }
}

export class UnknownModuleError extends StublayerError {
  constructor(public readonly moduleName: string) {
    super(`Unknown module: ${moduleName}`, "unknown-module");
    this.name = "UnknownModuleError";
  }
}

/**
 * The external stub generator failed for one package.
 * `diagnostics` holds the tool's own output, truncated.
 */
export class GenerationError extends StublayerError {
  constructor(
    message: string,
    public readonly packageName: string,
    public readonly diagnostics: string
  ) {
    super(message, "generation-failed");
    this.name = "GenerationError";
  }
}

export function isStublayerError(err: unknown): err is StublayerError {
  return err instanceof StublayerError;
}
