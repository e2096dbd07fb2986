import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { createContainer, TYPES } from './container';
import { TrackerService, ITrackerService } from './tracker';
import { DoctorService } from './doctor';
import { LayoutService } from './layout';
import { IGitService } from './git';
import { RepoPaths } from './types';
import { toBrdError } from './errors';
import { FakeGitService, RecordingLogger, makeTempRepo, removeTempRepo, writeConfig } from './testing/fakes';

describe('createContainer', () => {
  let paths: RepoPaths;

  beforeEach(() => {
    paths = makeTempRepo();
  });

  afterEach(() => {
    removeTempRepo(paths);
  });

  it('wires every service as a singleton', () => {
    const container = createContainer(paths, { agentId: 'agent-one', logger: new RecordingLogger() });

    const tracker = container.get<ITrackerService>(TYPES.ITrackerService);
    expect(tracker).toBeInstanceOf(TrackerService);
    expect(container.get(TYPES.ITrackerService)).toBe(tracker);
    expect(container.get(TYPES.IDoctorService)).toBeInstanceOf(DoctorService);
    expect(container.get(TYPES.ILayoutService)).toBeInstanceOf(LayoutService);
    expect(container.get(TYPES.RepoPaths)).toBe(paths);
    expect(container.get(TYPES.AgentId)).toBe('agent-one');
  });

  it('reads the agent identity from agent.toml when none is given', () => {
    fs.mkdirSync(path.join(paths.worktreeRoot, '.braid'), { recursive: true });
    fs.writeFileSync(path.join(paths.worktreeRoot, '.braid', 'agent.toml'), 'agent_id = "from-toml"\n');
    const previous = process.env.BRD_AGENT_ID;
    delete process.env.BRD_AGENT_ID;
    try {
      const container = createContainer(paths, { logger: new RecordingLogger() });
      expect(container.get(TYPES.AgentId)).toBe('from-toml');
    } finally {
      if (previous !== undefined) process.env.BRD_AGENT_ID = previous;
    }
  });

  it('fails every command on a repo newer than this build', async () => {
    writeConfig(paths, 'schema_version = 999\nid_prefix = "tst"\n');
    const container = createContainer(paths, { agentId: 'agent-one', logger: new RecordingLogger() });
    container.rebind<IGitService>(TYPES.IGitService).toConstantValue(new FakeGitService());
    const tracker = container.get<ITrackerService>(TYPES.ITrackerService);

    const error = await tracker.list().then(
      () => undefined,
      (thrown: unknown) => toBrdError(thrown)
    );

    expect(error?.kind).toBe('parse_error');
    expect(error?.exitCode).toBe(16);
    expect(error?.message).toMatch(/this repo uses schema v999, but this brd only supports up to v9/);
  });
});
