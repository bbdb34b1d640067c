export * from './types.js';
export { runExternal } from './timeout.js';
export {
  HttpImageryAnalyzer,
  HttpPlanGenerator,
  UnconfiguredImageryAnalyzer,
  UnconfiguredPlanGenerator,
  type HttpEngineConfig,
} from './http-engines.js';
export { FileInventorySource, StaticInventorySource } from './file-inventory.js';
