import * as os from "node:os";
import * as path from "node:path";

// ==================== User Paths ====================

export const DEFAULT_STUBLAYER_HOME_DIRNAME = ".stublayer";
export const DEFAULT_USER_OVERLAYS_DIRNAME = "overlays";

export function getDefaultStublayerHome(): string {
  return path.join(os.homedir(), DEFAULT_STUBLAYER_HOME_DIRNAME);
}

// ==================== Project Paths ====================

export const DEFAULT_CONFIG_FILENAME = ".stublayer.json";
export const DEFAULT_OUTPUT_DIRNAME = ".stublayer";
export const DEFAULT_OUT_DIRNAME = "out";
export const DEFAULT_STATE_DIRNAME = ".state";
export const DEFAULT_LOCAL_DIRNAME = ".local";
export const DEFAULT_GENERATED_DIRNAME = "generated";
export const DEFAULT_BUILD_RECORD_FILENAME = "build.json";
export const DEFAULT_LOCK_FILENAME = "run.lock";

// ==================== Config Defaults ====================

export const DEFAULT_DISCOVER_MODULES = false as const;
export const DEFAULT_REQUIREMENTS_PATHS: readonly string[] = ["requirements.txt"];
export const DEFAULT_PYTHON_EXECUTABLE = "python3" as const;
export const DEFAULT_GENERATOR_COMMAND = "stubgen" as const;
export const AUTO_VERSION = "auto" as const;

// ==================== Generator Defaults ====================

export const DEFAULT_GENERATOR_OUT_DIRNAME = "out";
export const GENERATOR_DIAGNOSTICS_MAX_CHARS = 2_000 as const;
