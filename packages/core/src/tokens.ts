export const TYPES = {
  RepoPaths: Symbol.for('RepoPaths'),
  AgentId: Symbol.for('AgentId'),
  ILogger: Symbol.for('ILogger'),
  IConfigService: Symbol.for('IConfigService'),
  ILockService: Symbol.for('ILockService'),
  IGitService: Symbol.for('IGitService'),
  ILayoutService: Symbol.for('ILayoutService'),
  IStorageService: Symbol.for('IStorageService'),
  IGraphService: Symbol.for('IGraphService'),
  ISyncService: Symbol.for('ISyncService'),
  ITrackerService: Symbol.for('ITrackerService'),
  IDoctorService: Symbol.for('IDoctorService'),
};
