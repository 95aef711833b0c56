export type {
	InstaloAdapter,
	InstaloAdapterOptions,
	InstaloTransactionAdapter,
	Row,
	SortBy,
	Where,
	WhereOperator,
} from "./adapter.js";
export {
	buildWhereClause,
	keysToCamel,
	keysToSnake,
	quoteColumn,
	toCamelCase,
	toSnakeCase,
} from "./adapter-utils.js";
export { createTableResolver } from "./schema-prefix.js";
export { buildSqlAdapterMethods, type SqlExecutor } from "./sql-adapter-methods.js";
export {
	type ColumnDefinition,
	INSTALO_TABLES,
	MODELS,
	type ModelName,
	type TableDefinition,
} from "./tables.js";
export {
	type AfterCommitHook,
	queueAfterTransactionHook,
	runWithTransactionContext,
} from "./transaction-context.js";
