import { loadConfig, type RagConfig } from "./rag/config.js";
import { ConfigError, errorMessage } from "./rag/errors.js";

/** Loads the config, exiting with a message when it is missing or invalid. */
export function loadConfigOrExit(configPath?: string): RagConfig {
  try {
    return loadConfig({ configPath });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

export function exitOnError(err: unknown): never {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined;
}
