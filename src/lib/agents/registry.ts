import type { AgentTypeConfig } from "./types";

const registry = new Map<string, AgentTypeConfig>();

export function registerAgentType(config: AgentTypeConfig): void {
  if (registry.has(config.type)) {
    throw new Error(
      `[agent-registry] Agent type "${config.type}" is already registered`
    );
  }
  registry.set(config.type, config);
}

/** A missing registration is a wiring bug, so this throws. */
export function requireAgentType(type: string): AgentTypeConfig {
  const config = registry.get(type);
  if (!config) {
    throw new Error(`[agent-registry] no agent registered for "${type}"`);
  }
  return config;
}
