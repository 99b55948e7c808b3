import { loadConfig } from "../config/ConfigLoader.js";
import type { RagConfig } from "../config/Config.js";
import { RagSystem } from "../RagSystem.js";
import { createRunId, RunLogger } from "../runtime/RunLogger.js";
import { toConfigSource, type ParsedArgs } from "./CliArgs.js";

export interface CommandContext {
  config: RagConfig;
  logger: RunLogger;
  system: RagSystem;
}

export const openCommandContext = async (parsed: ParsedArgs, command: string): Promise<CommandContext> => {
  const config = await loadConfig({ cli: toConfigSource(parsed), configPath: parsed.configPath });
  const logger = new RunLogger(config.workspaceRoot, config.logging.directory, createRunId(command), config.logging.level);
  const system = await RagSystem.open(config, { logger });
  return { config, logger, system };
};
