import { Container } from 'inversify';
import { RepoPaths } from './types';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { IConfigService, ConfigService } from './config';
import { ILockService, LockService } from './lock';
import { IGitService, GitService } from './git';
import { ILayoutService, LayoutService } from './layout';
import { IStorageService, StorageService } from './storage';
import { IGraphService, GraphService } from './graph';
import { ISyncService, SyncService } from './sync';
import { ITrackerService, TrackerService } from './tracker';
import { IDoctorService, DoctorService } from './doctor';
import { resolveAgentId } from './agent';
import { TYPES } from './tokens';

export { TYPES };

export interface ContainerOptions {
  /** Overrides BRD_AGENT_ID / agent.toml / USER resolution. */
  agentId?: string;
  logger?: ILogger;
}

export function createContainer(paths: RepoPaths, options: ContainerOptions = {}): Container {
  const container = new Container();
  const logger = options.logger ?? new ConsoleLogger(LogLevel.INFO);

  container.bind<RepoPaths>(TYPES.RepoPaths).toConstantValue(paths);
  container.bind<ILogger>(TYPES.ILogger).toConstantValue(logger);
  // resolved lazily so read-only commands never warn about a missing identity
  container
    .bind<string>(TYPES.AgentId)
    .toDynamicValue(() => options.agentId ?? resolveAgentId(paths, logger).id)
    .inSingletonScope();

  container.bind<IConfigService>(TYPES.IConfigService).to(ConfigService).inSingletonScope();
  container.bind<ILockService>(TYPES.ILockService).to(LockService).inSingletonScope();
  container.bind<IGitService>(TYPES.IGitService).to(GitService).inSingletonScope();
  container.bind<ILayoutService>(TYPES.ILayoutService).to(LayoutService).inSingletonScope();
  container.bind<IStorageService>(TYPES.IStorageService).to(StorageService).inSingletonScope();
  container.bind<IGraphService>(TYPES.IGraphService).to(GraphService).inSingletonScope();
  container.bind<ISyncService>(TYPES.ISyncService).to(SyncService).inSingletonScope();
  container.bind<ITrackerService>(TYPES.ITrackerService).to(TrackerService).inSingletonScope();
  container.bind<IDoctorService>(TYPES.IDoctorService).to(DoctorService).inSingletonScope();

  return container;
}
