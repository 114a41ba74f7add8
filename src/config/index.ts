export { loadConfig, parseConfig, saveLastRun, loadApiKeys, detectConfigFormat } from './loader.js';
export { resolveGroup, leafQueries, isGroup, type GroupMember, type GroupNode, type QueryNode } from './groups.js';
export { ConfigFileSchema, MetadataListSchema, toMonitorConfig } from './schema.js';
