/**
 * Command exports
 */

export { pruneCommand, type PruneOptions } from './prune.js';
