// src/core/runtime/RuntimeRegistry.ts - Factory for runtime managers
import { RuntimeManager, RuntimeManagerOptions } from './RuntimeManager';
import { PythonRuntimeManager } from './python/PythonRuntimeManager';
import { RuntimeType } from '../../types/Runtime';
import { logger } from '../../utils/Logger';

interface RuntimeManagerConstructor {
  new (options: RuntimeManagerOptions): RuntimeManager;
}

/**
 * Registry for all runtime managers. One instance per runtime and cache directory, so the
 * catalog caches each manager owns are shared by every caller in the process.
 */
export class RuntimeRegistry {
  private static managers = new Map<RuntimeType, RuntimeManagerConstructor>([
    ['python', PythonRuntimeManager],
  ]);
  private static instances = new Map<string, RuntimeManager>();

  static create(type: RuntimeType, options: RuntimeManagerOptions): RuntimeManager {
    const cacheKey = `${type}:${options.cacheDir}`;

    const cached = this.instances.get(cacheKey);
    if (cached) {
      return cached;
    }

    const ManagerClass = this.managers.get(type);
    if (!ManagerClass) {
      throw new Error(`No runtime manager registered for type: ${type}`);
    }

    const manager = new ManagerClass(options);
    this.instances.set(cacheKey, manager);

    return manager;
  }

  static isSupported(type: string): type is RuntimeType {
    for (const registered of this.managers.keys()) {
      if (registered === type) return true;
    }
    return false;
  }

  static getRegisteredTypes(): RuntimeType[] {
    return Array.from(this.managers.keys());
  }

  static clearCache(): void {
    this.instances.clear();
    logger.debug('Cleared runtime manager cache');
  }
}
