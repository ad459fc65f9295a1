export { PostgresDataContext, PostgresQueryable } from './data-context.js';
export type { DataContextConfig } from './data-context.js';
export type { CompiledQuery, CompiledSelect } from './compiler.js';
export type { EntityModel, NavigationModel } from './model.js';
export { EntityRecord } from './row-mapper.js';
