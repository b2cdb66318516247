export { executions, EXECUTIONS_DDL } from './schema.js';
export { createDbClient, ensureSchema } from './client.js';
export type { Database, SqlClient } from './client.js';
export { insertExecution } from './execution-repository.js';
export { queryExecutions } from './execution-query-repository.js';
export type { ExecutionRow } from './execution-query-repository.js';
export { PgExecutionLog } from './pg-execution-log.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
