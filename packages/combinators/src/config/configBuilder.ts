import type { Env, ReadBoolEnvOptions, ReadIntEnvOptions, ReadStringEnvOptions } from './env';
import { readBoolEnv, readIntEnv, readStringEnv } from './env';

/**
 * Immutable builder: every step reads one env value and returns a new builder whose
 * config type carries the added key.
 */
export class ConfigBuilder<TConfig extends Record<string, unknown>> {
  private readonly env: Env;
  private readonly config: TConfig;

  constructor(env: Env, config: TConfig) {
    this.env = env;
    this.config = config;
  }

  int<TKey extends string>(
    key: TKey,
    envKeys: readonly string[] | string,
    fallback: number,
    options?: ReadIntEnvOptions,
  ): ConfigBuilder<TConfig & Record<TKey, number>> {
    return this.with(key, readIntEnv(this.env, envKeys, fallback, options));
  }

  bool<TKey extends string>(
    key: TKey,
    envKeys: readonly string[] | string,
    fallback: boolean,
    options?: ReadBoolEnvOptions,
  ): ConfigBuilder<TConfig & Record<TKey, boolean>> {
    return this.with(key, readBoolEnv(this.env, envKeys, fallback, options));
  }

  string<TKey extends string>(
    key: TKey,
    envKeys: readonly string[] | string,
    fallback: string,
    options?: ReadStringEnvOptions,
  ): ConfigBuilder<TConfig & Record<TKey, string>> {
    return this.with(key, readStringEnv(this.env, envKeys, fallback, options));
  }

  build(): TConfig {
    return this.config;
  }

  private with<TKey extends string, TValue>(
    key: TKey,
    value: TValue,
  ): ConfigBuilder<TConfig & Record<TKey, TValue>> {
    const next = { ...this.config, [key]: value } as TConfig & Record<TKey, TValue>;
    return new ConfigBuilder(this.env, next);
  }
}

export function createConfigBuilder(env: Env = process.env): ConfigBuilder<Record<string, never>> {
  return new ConfigBuilder<Record<string, never>>(env, {});
}
