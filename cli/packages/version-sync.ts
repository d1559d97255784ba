import type { PackageRef, VersionStrategy } from "../../shared/types";
import { formatPackageRef } from "../config/workspace-config";
import { NotebookError } from "../errors";
import type { Logger } from "../logging/logger";
import { readTextFile, writeTextFileAtomic } from "../store/text-file-store";
import { replaceDependencyVersion } from "./dependency-line";
import { listVersionEntries, selectVersion } from "./package-cache";

export interface VersionSyncOptions {
	/** File holding the dependency line, normally `<workspace>/packages.typ` */
	packagesFile: string;
	/** `<cache>/<namespace>/<name>` */
	packageVersionsDir: string;
	packageRef: PackageRef;
	strategy?: VersionStrategy;
	logger: Logger;
}

export interface VersionSyncResult {
	configPath: string;
	version: string;
	/** Versions the dependency lines held before the rewrite */
	previousVersions: string[];
	replacements: number;
	/** False when the file already pinned `version` and was left untouched */
	changed: boolean;
}

/**
 * Pin the package dependency line to a version that is actually installed.
 *
 * Fails when the version directory is missing or empty, or when the packages
 * file is missing. A file without any dependency line is left as it is.
 */
export async function syncPackageVersion(
	options: VersionSyncOptions,
): Promise<VersionSyncResult> {
	const log = options.logger.child({ component: "version-sync" });
	const ref = formatPackageRef(options.packageRef);

	const entries = await listVersionEntries(options.packageVersionsDir);
	const version = selectVersion(entries, options.strategy);
	log.debug({ entries, version }, "selected installed version");

	const original = await readTextFile(options.packagesFile);
	if (original === null) {
		throw new NotebookError(
			"CONFIG_NOT_FOUND",
			`Packages file does not exist: ${options.packagesFile}`,
		);
	}

	const { text, replacements, previousVersions } = replaceDependencyVersion(
		original,
		options.packageRef,
		version,
	);

	if (replacements === 0) {
		log.warn(
			{ file: options.packagesFile, ref },
			"no dependency line found; file left unchanged",
		);
	}

	const changed = text !== original;
	if (changed) {
		await writeTextFileAtomic(options.packagesFile, text);
		log.info(
			{ file: options.packagesFile, from: previousVersions, to: version },
			`pinned ${ref}:${version}`,
		);
	} else if (replacements > 0) {
		log.info({ file: options.packagesFile }, `${ref}:${version} already pinned`);
	}

	return {
		configPath: options.packagesFile,
		version,
		previousVersions,
		replacements,
		changed,
	};
}
