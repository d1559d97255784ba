import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import type { VersionStrategy } from "../../shared/types";
import { errnoCode, NotebookError } from "../errors";
import { compareVersions, isVersionTriplet } from "./dependency-line";

/**
 * Immediate, non-hidden subdirectories of a package's cache directory,
 * one per installed version, sorted by code unit (what `ls` prints in the
 * C locale).
 */
export async function listVersionEntries(dir: string): Promise<string[]> {
	let dirents: Dirent[];
	try {
		dirents = await readdir(dir, { withFileTypes: true });
	} catch (err: unknown) {
		const code = errnoCode(err);
		if (code === "ENOENT" || code === "ENOTDIR") {
			throw new NotebookError(
				"PACKAGE_CACHE_NOT_FOUND",
				`Package directory does not exist: ${dir}`,
				err,
			);
		}
		throw err;
	}

	const entries: string[] = [];
	for (const dirent of dirents) {
		if (dirent.name.startsWith(".")) continue;
		if (dirent.isDirectory()) {
			entries.push(dirent.name);
			continue;
		}
		// a linked checkout counts when it points at a directory
		if (dirent.isSymbolicLink()) {
			const target = await safeStat(join(dir, dirent.name));
			if (target?.isDirectory()) entries.push(dirent.name);
		}
	}

	return entries.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

async function safeStat(
	path: string,
): Promise<Awaited<ReturnType<typeof stat>> | null> {
	try {
		return await stat(path);
	} catch {
		return null;
	}
}

/**
 * Pick the version to pin.
 *
 * `first` takes the first listed entry, which is not necessarily the
 * highest version when several are installed. `latest` compares triplets.
 */
export function selectVersion(
	entries: readonly string[],
	strategy: VersionStrategy = "first",
): string {
	if (entries.length === 0) {
		throw new NotebookError(
			"EMPTY_PACKAGE_CACHE",
			"Package directory contains no installed versions",
		);
	}

	if (strategy === "latest") {
		const versions = entries.filter(isVersionTriplet).sort(compareVersions);
		const latest = versions.at(-1);
		if (latest === undefined) {
			throw new NotebookError(
				"INVALID_VERSION_ENTRY",
				`No installed entry is a MAJOR.MINOR.PATCH version: ${entries.join(", ")}`,
			);
		}
		return latest;
	}

	const [first = ""] = entries;
	if (!isVersionTriplet(first)) {
		throw new NotebookError(
			"INVALID_VERSION_ENTRY",
			`First installed entry is not a MAJOR.MINOR.PATCH version: ${first}`,
		);
	}
	return first;
}
