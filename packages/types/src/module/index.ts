/**
 * Module system type exports.
 *
 * The capability interface every feature module implements, its descriptor
 * and health snapshot, and the lifecycle states the module manager reports.
 */

export type { IModule } from './IModule.js';
export type { IModuleDescriptor } from './IModuleDescriptor.js';
export type { IHealthSnapshot, JsonValue } from './IHealthSnapshot.js';
export type { ModuleState, ModuleManagerState } from './ModuleState.js';
