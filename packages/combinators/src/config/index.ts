export type {
  Env,
  InvalidEnvPolicy,
  ReadBoolEnvOptions,
  ReadIntEnvOptions,
  ReadStringEnvOptions,
} from './env';
export { readBoolEnv, readIntEnv, readStringEnv } from './env';
export { ConfigBuilder, createConfigBuilder } from './configBuilder';
export { createConfigAccessors, type ConfigAccessors } from './configAccessors';
export {
  defaultPoolMaxWorkers,
  getConfig,
  loadCallwrapConfig,
  resetConfigForTests,
  type CallwrapConfig,
} from './callwrapConfig';
