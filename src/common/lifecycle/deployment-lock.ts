import fs from 'fs-extra';
import path from 'path';
import { ReconcileInProgressError } from '../errors/lifecycle-errors';

const isProcessAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
};

/**
 * Single-writer guard for one deployment. Holders in this process are tracked in memory; when a lock directory is
 * given, an exclusive `<name>.lock` file holding the owner's pid also keeps other processes out.
 */
export class DeploymentLock {
  private static held = new Set<string>();

  private readonly name: string;
  private readonly lock_dir?: string;
  private acquired = false;

  constructor(name: string, lock_dir?: string) {
    this.name = name;
    this.lock_dir = lock_dir;
  }

  get lock_file(): string | undefined {
    return this.lock_dir ? path.join(this.lock_dir, `${this.name}.lock`) : undefined;
  }

  private async writeLockFile(lock_file: string): Promise<void> {
    await fs.ensureDir(path.dirname(lock_file));
    try {
      await fs.writeFile(lock_file, `${process.pid}`, { flag: 'wx' });
      return;
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) {
        throw err;
      }
    }

    const owner = Number.parseInt(await fs.readFile(lock_file, 'utf-8'));
    if (Number.isInteger(owner) && isProcessAlive(owner)) {
      throw new ReconcileInProgressError(this.name, owner);
    }

    // Stale lock left behind by a process that died
    await fs.remove(lock_file);
    try {
      await fs.writeFile(lock_file, `${process.pid}`, { flag: 'wx' });
    } catch {
      throw new ReconcileInProgressError(this.name);
    }
  }

  async acquire(): Promise<void> {
    if (DeploymentLock.held.has(this.name)) {
      throw new ReconcileInProgressError(this.name, process.pid);
    }
    DeploymentLock.held.add(this.name);

    const lock_file = this.lock_file;
    if (lock_file) {
      try {
        await this.writeLockFile(lock_file);
      } catch (err) {
        DeploymentLock.held.delete(this.name);
        throw err;
      }
    }
    this.acquired = true;
  }

  async release(): Promise<void> {
    if (!this.acquired) {
      return;
    }
    this.acquired = false;
    DeploymentLock.held.delete(this.name);
    const lock_file = this.lock_file;
    if (lock_file) {
      await fs.remove(lock_file);
    }
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }
}
