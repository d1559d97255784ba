import { join } from "node:path";
import {
	MAIN_FILE,
	NOTEBOOK_SECTIONS,
	PACKAGES_FILE,
	SECTION_INCLUDE_PATHS,
} from "../../shared/constants";
import type { NotebookOptions, PackageRef } from "../../shared/types";
import type { Logger } from "../logging/logger";
import { createTextFile, writeTextFileAtomic } from "../store/text-file-store";
import {
	renderMainDocument,
	renderPackagesDocument,
	renderSectionDocument,
} from "./notebook-document";

export interface InitWorkspaceOptions {
	workspaceDir: string;
	notebook: NotebookOptions;
	packageRef: PackageRef;
	version: string;
	/** Overwrite files that already exist */
	force?: boolean;
	logger: Logger;
}

export interface InitWorkspaceResult {
	written: string[];
	skipped: string[];
}

/**
 * Write the notebook's composition files: packages.typ, main.typ and the
 * three included sections. Existing files are kept unless `force` is set.
 */
export async function initWorkspace(
	options: InitWorkspaceOptions,
): Promise<InitWorkspaceResult> {
	const log = options.logger.child({ component: "init" });

	const files: Array<[string, string]> = [
		[
			PACKAGES_FILE,
			renderPackagesDocument(
				options.packageRef,
				options.version,
				options.notebook.theme,
			),
		],
		[MAIN_FILE, renderMainDocument(options.notebook)],
		...NOTEBOOK_SECTIONS.map((section): [string, string] => [
			SECTION_INCLUDE_PATHS[section].slice(1),
			renderSectionDocument(section),
		]),
	];

	const result: InitWorkspaceResult = { written: [], skipped: [] };
	for (const [relativePath, content] of files) {
		const filePath = join(options.workspaceDir, relativePath);
		if (options.force) {
			await writeTextFileAtomic(filePath, content);
			result.written.push(relativePath);
		} else if (await createTextFile(filePath, content)) {
			result.written.push(relativePath);
		} else {
			log.warn({ file: relativePath }, "already exists; kept");
			result.skipped.push(relativePath);
		}
	}

	log.info(
		{ written: result.written.length, skipped: result.skipped.length },
		`initialized notebook in ${options.workspaceDir}`,
	);
	return result;
}
