import { injectable, inject, optional } from 'inversify';
import { AsyncLocalStorage } from 'async_hooks';
import * as fs from 'fs';
import * as path from 'path';
import * as lockfile from 'proper-lockfile';
import { RepoPaths } from './types';
import { BrdError } from './errors';
import { ILogger, ConsoleLogger, LogLevel } from './logger';
import { lockPath } from './repo';
import { TYPES } from './tokens';

export type ReleaseFn = () => Promise<void>;

export interface LockOptions {
  /** Fail immediately instead of waiting when another process holds the lock. */
  tryLock?: boolean;
}

export interface ILockService {
  getLockPath(): string;
  acquire(options?: LockOptions): Promise<ReleaseFn>;
  withLock<T>(operation: () => Promise<T>, options?: LockOptions): Promise<T>;
  isLocked(): Promise<boolean>;
}

const STALE_MS = 10_000;

function heldElsewhere(cause?: unknown): BrdError {
  return new BrdError('error', 'lock is held by another brd process', {}, { cause });
}

/**
 * Exclusive advisory lock on `<git-common-dir>/brd/lock`, shared by every
 * worktree of the repository.
 *
 * `withLock` is reentrant only for calls made from inside a held operation.
 * Independent callers in the same process wait their turn in arrival order.
 */
@injectable()
export class LockService implements ILockService {
  private readonly lockFilePath: string;
  private readonly holder = new AsyncLocalStorage<true>();
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;
  private logger: ILogger;

  constructor(
    @inject(TYPES.RepoPaths) paths: RepoPaths,
    @inject(TYPES.ILogger) @optional() logger?: ILogger
  ) {
    this.lockFilePath = lockPath(paths);
    this.logger = logger || new ConsoleLogger(LogLevel.INFO);
  }

  getLockPath(): string {
    return this.lockFilePath;
  }

  async acquire(options: LockOptions = {}): Promise<ReleaseFn> {
    await this.ensureLockFile();
    let lost: Error | undefined;
    let release: ReleaseFn;
    try {
      release = await lockfile.lock(this.lockFilePath, {
        realpath: false,
        stale: STALE_MS,
        retries: options.tryLock ? 0 : { forever: true, minTimeout: 50, maxTimeout: 1000, factor: 1.5 },
        onCompromised: error => {
          lost = error;
          this.logger.error(`lock ${this.lockFilePath} was compromised: ${error.message}`);
        },
      });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ELOCKED') {
        throw heldElsewhere(error);
      }
      throw BrdError.io(`failed to acquire lock: ${this.lockFilePath}`, error);
    }
    this.logger.debug(`acquired lock ${this.lockFilePath}`);

    return async () => {
      // a compromised lock is already gone; releasing it again would throw ERELEASED
      if (lost) {
        throw new BrdError('error', `lock ${this.lockFilePath} was lost while held: ${lost.message}`, {}, { cause: lost });
      }
      await release();
      this.logger.debug(`released lock ${this.lockFilePath}`);
    };
  }

  async withLock<T>(operation: () => Promise<T>, options: LockOptions = {}): Promise<T> {
    if (this.holder.getStore()) {
      return operation();
    }
    if (options.tryLock && this.pending > 0) {
      throw heldElsewhere();
    }

    // in-process callers take turns in arrival order before touching the lock file
    this.pending++;
    const previous = this.tail;
    let finished: () => void = () => undefined;
    this.tail = new Promise<void>(resolve => {
      finished = resolve;
    });
    try {
      await previous;
      return await this.runHeld(operation, options);
    } finally {
      this.pending--;
      finished();
    }
  }

  private async runHeld<T>(operation: () => Promise<T>, options: LockOptions): Promise<T> {
    const release = await this.acquire(options);
    let result: T;
    try {
      result = await this.holder.run(true, operation);
    } catch (error) {
      await release().catch(releaseError => {
        this.logger.warn(`failed to release lock ${this.lockFilePath}:`, releaseError);
      });
      throw error;
    }
    await release();
    return result;
  }

  async isLocked(): Promise<boolean> {
    if (!fs.existsSync(this.lockFilePath)) return false;
    return lockfile.check(this.lockFilePath, { realpath: false, stale: STALE_MS });
  }

  // created lazily, never truncated
  private async ensureLockFile(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.lockFilePath), { recursive: true });
    const handle = await fs.promises.open(this.lockFilePath, 'a');
    await handle.close();
  }
}
