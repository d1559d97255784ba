import { stat } from "node:fs/promises";
import { join } from "node:path";
import {
	formatPackageRef,
	type WorkspaceConfig,
} from "../config/workspace-config";
import { findDependencyVersions } from "../packages/dependency-line";
import { readTextFile } from "../store/text-file-store";
import {
	EXPECTED_INCLUDES,
	includesInExpectedOrder,
	readComposition,
} from "./notebook-document";

export type WorkspaceProblemCode =
	| "MAIN_NOT_FOUND"
	| "TEMPLATE_NOT_APPLIED"
	| "INCLUDE_ORDER_MISMATCH"
	| "INCLUDE_NOT_FOUND"
	| "CONFIG_NOT_FOUND"
	| "DEPENDENCY_LINE_NOT_FOUND"
	| "PINNED_VERSION_NOT_INSTALLED";

export interface WorkspaceProblem {
	code: WorkspaceProblemCode;
	message: string;
}

export type WorkspaceCheckConfig = Pick<
	WorkspaceConfig,
	| "workspaceDir"
	| "mainFile"
	| "packagesFile"
	| "packageRef"
	| "packageVersionsDir"
>;

/**
 * Everything that would make the renderer fail at load time: a missing
 * main document, a broken include order, a missing included file, or a
 * pinned version that is not installed. An empty result means it renders.
 */
export async function checkWorkspace(
	config: WorkspaceCheckConfig,
): Promise<WorkspaceProblem[]> {
	const problems: WorkspaceProblem[] = [];
	problems.push(...(await checkMainDocument(config)));
	problems.push(...(await checkPinnedVersion(config)));
	return problems;
}

async function checkMainDocument(
	config: WorkspaceCheckConfig,
): Promise<WorkspaceProblem[]> {
	const source = await readTextFile(config.mainFile);
	if (source === null) {
		return [
			{
				code: "MAIN_NOT_FOUND",
				message: `Main document does not exist: ${config.mainFile}`,
			},
		];
	}

	const problems: WorkspaceProblem[] = [];
	const composition = readComposition(source);

	if (!composition.hasTemplate) {
		problems.push({
			code: "TEMPLATE_NOT_APPLIED",
			message: "Main document has no `#show: notebook.with(...)` rule",
		});
	}

	if (!includesInExpectedOrder(composition.includes)) {
		problems.push({
			code: "INCLUDE_ORDER_MISMATCH",
			message: `Expected includes ${EXPECTED_INCLUDES.join(", ")} but found ${
				composition.includes.length > 0
					? composition.includes.join(", ")
					: "none"
			}`,
		});
	}

	for (const include of composition.includes) {
		const includePath = join(config.workspaceDir, include);
		if (!(await isFile(includePath))) {
			problems.push({
				code: "INCLUDE_NOT_FOUND",
				message: `Included document does not exist: ${include}`,
			});
		}
	}

	return problems;
}

async function checkPinnedVersion(
	config: WorkspaceCheckConfig,
): Promise<WorkspaceProblem[]> {
	const source = await readTextFile(config.packagesFile);
	if (source === null) {
		return [
			{
				code: "CONFIG_NOT_FOUND",
				message: `Packages file does not exist: ${config.packagesFile}`,
			},
		];
	}

	const ref = formatPackageRef(config.packageRef);
	const versions = findDependencyVersions(source, config.packageRef);
	if (versions.length === 0) {
		return [
			{
				code: "DEPENDENCY_LINE_NOT_FOUND",
				message: `No ${ref}:X.Y.Z dependency in ${config.packagesFile}`,
			},
		];
	}

	const problems: WorkspaceProblem[] = [];
	for (const version of new Set(versions)) {
		if (!(await isDirectory(join(config.packageVersionsDir, version)))) {
			problems.push({
				code: "PINNED_VERSION_NOT_INSTALLED",
				message: `${ref}:${version} is not installed in ${config.packageVersionsDir}`,
			});
		}
	}
	return problems;
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch {
		return false;
	}
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}
