import type { PackageRef } from "../../shared/types";
import { formatPackageRef } from "../config/workspace-config";
import { NotebookError } from "../errors";
import { readTextFile } from "../store/text-file-store";
import { findDependencyVersions } from "./dependency-line";

/** The version packages.typ currently pins `ref` to (its first dependency line). */
export async function readPinnedVersion(
	packagesFile: string,
	ref: PackageRef,
): Promise<string> {
	const source = await readTextFile(packagesFile);
	if (source === null) {
		throw new NotebookError(
			"CONFIG_NOT_FOUND",
			`Packages file does not exist: ${packagesFile}`,
		);
	}
	const [version] = findDependencyVersions(source, ref);
	if (version === undefined) {
		throw new NotebookError(
			"DEPENDENCY_LINE_NOT_FOUND",
			`No ${formatPackageRef(ref)}:X.Y.Z dependency in ${packagesFile}`,
		);
	}
	return version;
}
