export type NotebookErrorCode =
	| "INVALID_CONFIG"
	| "INVALID_PACKAGE_REF"
	| "PACKAGE_CACHE_NOT_FOUND"
	| "EMPTY_PACKAGE_CACHE"
	| "INVALID_VERSION_ENTRY"
	| "CONFIG_NOT_FOUND"
	| "DEPENDENCY_LINE_NOT_FOUND"
	| "INVALID_TITLE"
	| "INVALID_ENTRY_TYPE"
	| "ENTRY_EXISTS"
	| "ENTRIES_INDEX_NOT_FOUND"
	| "TYPST_QUERY_FAILED"
	| "INVALID_ENTRY_METADATA"
	| "NO_ENTRY_TYPES";

/**
 * Error with a stable code the CLI reports alongside the message.
 * Anything not wrapped in a NotebookError is treated as unexpected.
 */
export class NotebookError extends Error {
	readonly code: NotebookErrorCode;
	readonly cause?: unknown;

	constructor(code: NotebookErrorCode, message: string, cause?: unknown) {
		super(message);
		this.name = "NotebookError";
		this.code = code;
		this.cause = cause;
	}
}

export function isNotebookError(err: unknown): err is NotebookError {
	return err instanceof NotebookError;
}

/** Node's errno code, when `err` carries one. */
export function errnoCode(err: unknown): string | undefined {
	if (typeof err === "object" && err !== null && "code" in err) {
		const { code } = err;
		return typeof code === "string" ? code : undefined;
	}
	return undefined;
}
