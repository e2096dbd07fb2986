import * as fs from 'fs';
import { parse as parseToml } from 'smol-toml';
import { RepoPaths } from './types';
import { ILogger } from './logger';
import { agentTomlPath } from './repo';
import { isRecord } from './utils';

export const DEFAULT_AGENT_ID = 'default-user';

export type AgentIdSource = 'env' | 'agent.toml' | 'user' | 'default';

export interface AgentIdentity {
  id: string;
  source: AgentIdSource;
}

function readAgentToml(file: string, logger: ILogger): string | undefined {
  if (!fs.existsSync(file)) return undefined;
  try {
    const table = parseToml(fs.readFileSync(file, 'utf-8'));
    const agentId = isRecord(table) ? table.agent_id : undefined;
    return typeof agentId === 'string' && agentId.trim() ? agentId.trim() : undefined;
  } catch (error) {
    logger.warn(`ignoring unreadable ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

/**
 * BRD_AGENT_ID, then `.braid/agent.toml` of this worktree, then USER, then
 * `default-user`.
 */
export function resolveAgentId(paths: RepoPaths, logger: ILogger, env: NodeJS.ProcessEnv = process.env): AgentIdentity {
  const fromEnv = env.BRD_AGENT_ID?.trim();
  if (fromEnv) return { id: fromEnv, source: 'env' };

  const fromToml = readAgentToml(agentTomlPath(paths), logger);
  if (fromToml) return { id: fromToml, source: 'agent.toml' };

  const user = env.USER?.trim();
  if (user) return { id: user, source: 'user' };

  logger.warn(`no agent identity found (set BRD_AGENT_ID or USER); using '${DEFAULT_AGENT_ID}'`);
  return { id: DEFAULT_AGENT_ID, source: 'default' };
}
