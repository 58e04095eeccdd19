/**
 * Repository Base Utilities
 *
 * Error classification for pg driver failures.
 */

// ============================================
// Error Handling
// ============================================

/**
 * Error codes for repository operations
 */
export type RepositoryErrorCode =
	| "CONSTRAINT_VIOLATION"
	| "DUPLICATE_KEY"
	| "CONNECTION_ERROR"
	| "QUERY_ERROR";

const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "ETIMEDOUT", "57P01"]);

/**
 * Repository error with context
 */
export class RepositoryError extends Error {
	constructor(
		message: string,
		public readonly code: RepositoryErrorCode,
		public readonly table?: string,
		public override readonly cause?: Error
	) {
		super(message);
		this.name = "RepositoryError";
	}

	/**
	 * Map a pg error to a repository error using its SQLSTATE or errno code.
	 */
	static fromPgError(table: string, error: unknown): RepositoryError {
		if (error instanceof RepositoryError) {
			return error;
		}
		if (!(error instanceof Error)) {
			return new RepositoryError(`Query error in ${table}: ${String(error)}`, "QUERY_ERROR", table);
		}

		const code = errorCode(error);

		if (code === "23505") {
			return new RepositoryError(error.message, "DUPLICATE_KEY", table, error);
		}

		if (code?.startsWith("23")) {
			return new RepositoryError(
				`Constraint violation in ${table}: ${error.message}`,
				"CONSTRAINT_VIOLATION",
				table,
				error
			);
		}

		if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) {
			return new RepositoryError(`Connection error on ${table}: ${error.message}`, "CONNECTION_ERROR", table, error);
		}

		return new RepositoryError(`Query error in ${table}: ${error.message}`, "QUERY_ERROR", table, error);
	}
}

function errorCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
