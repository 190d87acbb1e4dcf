import { existsSync, statSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { AgentId, ToolPaths } from "../types/index.js";
import { CONFIG_FILE, NEXTSTEP_FILE, X100_DIR } from "./config-store.js";
import { activeDirs } from "./registry.js";

/** Asset pool shipped with the package. */
export const BUNDLED_RESOURCES_DIR = fileURLToPath(new URL("../../resources/", import.meta.url));

/**
 * Pick the asset pool: $X100_RESOURCES_DIR, then a project-local
 * .x100/resources/, then the bundled pool.
 */
export function resolveResourcesDir(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const fromEnv = env.X100_RESOURCES_DIR?.trim();
  if (fromEnv) {
    return fromEnv;
  }
  const local = join(projectRoot, X100_DIR, "resources");
  if (existsSync(local) && statSync(local).isDirectory()) {
    return local;
  }
  return BUNDLED_RESOURCES_DIR;
}

export function resolveToolPaths(
  projectRoot: string,
  agentId: AgentId,
  resourcesDir: string = resolveResourcesDir(projectRoot)
): ToolPaths {
  const x100Dir = join(projectRoot, X100_DIR);
  const active = activeDirs(projectRoot, agentId);
  return {
    projectRoot,
    x100Dir,
    configPath: join(x100Dir, CONFIG_FILE),
    nextstepConfigPath: join(x100Dir, NEXTSTEP_FILE),
    resourcesDir,
    templatesDir: join(resourcesDir, "templates"),
    availableCommandsDir: join(resourcesDir, "available-commands"),
    availableAgentsDir: join(resourcesDir, "available-agents"),
    activeCommandsDir: active.commands,
    activeAgentsDir: active.agents,
  };
}
