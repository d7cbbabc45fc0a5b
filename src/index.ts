export { GlacierManager, TGlacierManagerConfig } from './manager/GlacierManager';
export * from './manager/errors';
export * from './manager/model';
export { InventoryStore } from './inventory/InventoryStore';
export { VaultPruner, PrunerState, TPruneReport, TDeleteFailure, TVaultPrunerOptions } from './pruner/VaultPruner';
export { loadRunConfig, resolveRunConfig, readConfigFile, TRunConfig, TInventorySource } from './config';
export { getLogger, TLogLevel } from './logging/Logger';
export { main } from './cli';
