import * as p from "@clack/prompts";
import pc from "picocolors";
import pg, { type Client } from "pg";

export const DEFAULT_SCHEMA = "instalo";

export interface ConnectionOptions {
	url?: string;
	schema?: string;
}

export interface ResolvedConnection {
	dbUrl: string;
	schema: string;
}

const SCHEMA_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Schema from `--schema`, then INSTALO_SCHEMA, then the default. */
export function resolveSchema(
	options: ConnectionOptions,
	env: NodeJS.ProcessEnv = process.env,
): string | null {
	const schema = options.schema ?? env.INSTALO_SCHEMA ?? DEFAULT_SCHEMA;
	if (!SCHEMA_PATTERN.test(schema)) {
		p.log.error(
			`${pc.red("Invalid schema")} ${pc.dim(`"${schema}" must contain only letters, digits and underscores`)}`,
		);
		process.exitCode = 1;
		return null;
	}
	return schema;
}

/**
 * Resolve the database URL and schema from flags and the environment.
 * Reports the problem and sets a failing exit code when either is unusable.
 */
export function resolveConnection(
	options: ConnectionOptions,
	env: NodeJS.ProcessEnv = process.env,
): ResolvedConnection | null {
	const dbUrl = options.url ?? env.DATABASE_URL;
	if (!dbUrl) {
		p.log.error(`${pc.red("No DATABASE_URL")} ${pc.dim("set DATABASE_URL or use --url")}`);
		process.exitCode = 1;
		return null;
	}

	const schema = resolveSchema(options, env);
	if (schema === null) return null;

	return { dbUrl, schema };
}

/** Connect a single client, run `fn`, and always close the connection. */
export async function withClient<T>(
	dbUrl: string,
	fn: (client: Client) => Promise<T>,
): Promise<T> {
	const client = new pg.Client({ connectionString: dbUrl });
	await client.connect();
	try {
		return await fn(client);
	} finally {
		await client.end();
	}
}

export function sanitizeErrorMessage(message: string): string {
	return message
		.replace(/postgres(ql)?:\/\/[^\s]+/gi, "postgres://***")
		.replace(/(password|token|secret|key)[=:]\s*\S+/gi, "$1=***");
}

export function errorMessage(error: unknown): string {
	return sanitizeErrorMessage(error instanceof Error ? error.message : String(error));
}
