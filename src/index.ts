export * from './types';
export * from './db';
export * from './db/transactions';
export * from './rules/rule';
export * from './rules/store';
export * from './rules/engine';
export * from './utils/errors';
export {
  loadSettings,
  createConfigTemplate,
  type Settings,
  type ConfigFile
} from './config/settings';
