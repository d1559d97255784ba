import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import {
	DEFAULT_PACKAGE_REF,
	ENTRIES_INDEX_FILE,
	MAIN_FILE,
	PACKAGES_FILE,
} from "../../shared/constants";
import type { PackageRef } from "../../shared/types";
import { NotebookError } from "../errors";
import { LOG_LEVELS, type LogLevel } from "../logging/logger";

const PACKAGE_REF_PATTERN = /^@([a-z0-9][a-z0-9_-]*)\/([a-z0-9][a-z0-9_-]*)$/i;

const envSchema = z.object({
	NOTEBOOK_WORKSPACE: z.string().min(1).optional(),
	NOTEBOOK_PACKAGE_CACHE: z.string().min(1).optional(),
	NOTEBOOK_PACKAGE: z
		.string()
		.regex(PACKAGE_REF_PATTERN, "expected @namespace/name")
		.optional(),
	NOTEBOOK_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
	XDG_DATA_HOME: z.string().min(1).optional(),
});

export type NotebookEnv = z.infer<typeof envSchema>;

/** Values given on the command line; each one wins over the environment. */
export interface ConfigOverrides {
	workspace?: string;
	packageCache?: string;
	packageRef?: string;
	logLevel?: string;
}

export interface WorkspaceConfig {
	workspaceDir: string;
	packagesFile: string;
	mainFile: string;
	entriesIndexFile: string;
	/** Root of the Typst package cache (`<data>/typst/packages`) */
	packageCacheDir: string;
	packageRef: PackageRef;
	/** `<packageCacheDir>/<namespace>/<name>`, one subdirectory per version */
	packageVersionsDir: string;
	logLevel: LogLevel;
}

export function parsePackageRef(value: string): PackageRef {
	const match = PACKAGE_REF_PATTERN.exec(value);
	if (!match?.[1] || !match[2]) {
		throw new NotebookError(
			"INVALID_PACKAGE_REF",
			`Package reference must look like @namespace/name: ${value}`,
		);
	}
	return { namespace: match[1], name: match[2] };
}

export function formatPackageRef(ref: PackageRef): string {
	return `@${ref.namespace}/${ref.name}`;
}

/** Typst keeps local packages under `$XDG_DATA_HOME/typst/packages`. */
export function defaultPackageCacheDir(env: NotebookEnv): string {
	const dataHome = env.XDG_DATA_HOME ?? join(homedir(), ".local", "share");
	return join(dataHome, "typst", "packages");
}

export function loadWorkspaceConfig(
	env: Record<string, string | undefined>,
	overrides: ConfigOverrides = {},
	cwd: string = process.cwd(),
): WorkspaceConfig {
	const parsed = envSchema.safeParse({
		...pickDefined(env),
		...pickDefined({
			NOTEBOOK_WORKSPACE: overrides.workspace,
			NOTEBOOK_PACKAGE_CACHE: overrides.packageCache,
			NOTEBOOK_PACKAGE: overrides.packageRef,
			NOTEBOOK_LOG_LEVEL: overrides.logLevel,
		}),
	});
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new NotebookError("INVALID_CONFIG", `Invalid configuration: ${details}`);
	}
	const values = parsed.data;

	const workspaceDir = resolve(cwd, values.NOTEBOOK_WORKSPACE ?? ".");
	const packageCacheDir = values.NOTEBOOK_PACKAGE_CACHE
		? resolve(cwd, values.NOTEBOOK_PACKAGE_CACHE)
		: defaultPackageCacheDir(values);
	const packageRef = parsePackageRef(
		values.NOTEBOOK_PACKAGE ?? DEFAULT_PACKAGE_REF,
	);

	return {
		workspaceDir,
		packagesFile: join(workspaceDir, PACKAGES_FILE),
		mainFile: join(workspaceDir, MAIN_FILE),
		entriesIndexFile: join(workspaceDir, ENTRIES_INDEX_FILE),
		packageCacheDir,
		packageRef,
		packageVersionsDir: join(
			packageCacheDir,
			packageRef.namespace,
			packageRef.name,
		),
		logLevel: values.NOTEBOOK_LOG_LEVEL ?? "info",
	};
}

/** Treats empty strings like unset variables. */
function pickDefined(
	values: Record<string, string | undefined>,
): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(values)) {
		if (value !== undefined && value !== "") {
			result[key] = value;
		}
	}
	return result;
}
