import { createLazyValue } from '../lifecycle/lazyValue';

export type ConfigAccessors<TConfig> = {
  getConfig(): TConfig;
  resetConfigForTests(): void;
};

/**
 * Wraps a config loader with lazy caching so the environment is read once,
 * on first use rather than at import time.
 */
export function createConfigAccessors<TConfig>(loadConfig: () => TConfig): ConfigAccessors<TConfig> {
  const cachedConfig = createLazyValue(loadConfig);

  return {
    getConfig: () => cachedConfig.get(),
    resetConfigForTests: () => cachedConfig.reset(),
  };
}
