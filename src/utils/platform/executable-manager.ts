/**
 * Executable lookup on PATH using the 'which' package
 */

import which from 'which';

export interface ExecutableInfo {
  path: string;
  exists: boolean;
}

export interface ExecutableManager {
  find(executable: string): Promise<ExecutableInfo>;
}

const NEGATIVE_CACHE_MS = 30000;

class ExecutableManagerImpl implements ExecutableManager {
  private cache = new Map<string, ExecutableInfo>();

  async find(executable: string): Promise<ExecutableInfo> {
    const cached = this.cache.get(executable);
    if (cached) {
      return cached;
    }

    try {
      const info: ExecutableInfo = { path: await which(executable), exists: true };
      this.cache.set(executable, info);
      return info;
    } catch {
      const info: ExecutableInfo = { path: '', exists: false };

      // Missing tools may be installed later; forget the miss after a while
      this.cache.set(executable, info);
      setTimeout(() => this.cache.delete(executable), NEGATIVE_CACHE_MS).unref();
      return info;
    }
  }
}

export const executableManager: ExecutableManager = new ExecutableManagerImpl();
