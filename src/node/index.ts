/**
 * Node.js specific exports.
 * Contains modules that load native add-ons (better-sqlite3).
 * Browser/Edge builds should NOT import from this module.
 */

export { SqliteCheckpointer } from '../graph/sqlite-checkpointer';
export type { SqliteCheckpointerConfig } from '../graph/sqlite-checkpointer';
