import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { resolveAgentId } from './agent';
import { RepoPaths } from './types';
import { RecordingLogger, makeTempRepo, removeTempRepo } from './testing/fakes';

describe('resolveAgentId', () => {
  let paths: RepoPaths;
  let logger: RecordingLogger;

  beforeEach(() => {
    paths = makeTempRepo();
    logger = new RecordingLogger();
  });

  afterEach(() => {
    removeTempRepo(paths);
  });

  const writeAgentToml = (content: string): void => {
    fs.mkdirSync(path.join(paths.worktreeRoot, '.braid'), { recursive: true });
    fs.writeFileSync(path.join(paths.worktreeRoot, '.braid', 'agent.toml'), content);
  };

  it('prefers BRD_AGENT_ID', () => {
    writeAgentToml('agent_id = "from-toml"\n');
    expect(resolveAgentId(paths, logger, { BRD_AGENT_ID: 'from-env', USER: 'sam' })).toEqual({
      id: 'from-env',
      source: 'env',
    });
  });

  it('falls back to agent.toml, then USER', () => {
    writeAgentToml('agent_id = "from-toml"\n');
    expect(resolveAgentId(paths, logger, { USER: 'sam' }).id).toBe('from-toml');

    fs.rmSync(path.join(paths.worktreeRoot, '.braid', 'agent.toml'));
    expect(resolveAgentId(paths, logger, { USER: 'sam' })).toEqual({ id: 'sam', source: 'user' });
  });

  it('warns before using the default identity', () => {
    expect(resolveAgentId(paths, logger, {}).id).toBe('default-user');
    expect(logger.warnings).toEqual(["no agent identity found (set BRD_AGENT_ID or USER); using 'default-user'"]);
  });

  it('ignores an unreadable agent.toml', () => {
    writeAgentToml('agent_id = ');
    expect(resolveAgentId(paths, logger, { USER: 'sam' }).id).toBe('sam');
    expect(logger.warnings).toHaveLength(1);
  });
});
