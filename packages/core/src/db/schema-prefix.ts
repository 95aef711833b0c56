/**
 * Creates a function that qualifies table names with the configured PostgreSQL
 * schema and quotes them for direct use in SQL.
 *
 * - `"public"` → `"table_name"`
 * - `"instalo"` → `"instalo"."table_name"`
 */
export function createTableResolver(schema: string): (tableName: string) => string {
	if (schema === "public") {
		return (tableName: string) => `"${tableName}"`;
	}
	return (tableName: string) => `"${schema}"."${tableName}"`;
}
