import { DEFAULT_THEME } from "../../shared/constants";
import { initWorkspace } from "../document/workspace-scaffold";
import { isNotebookError } from "../errors";
import { isVersionTriplet } from "../packages/dependency-line";
import { listVersionEntries, selectVersion } from "../packages/package-cache";
import {
	booleanValue,
	type CommandContext,
	type CommandDefinition,
	requiredString,
	stringValue,
	UsageError,
} from "./command";

/** Written when nothing is installed yet; `sync-version` replaces it later. */
const PLACEHOLDER_VERSION = "0.1.0";

async function resolveInitialVersion({
	config,
	values,
	logger,
}: CommandContext): Promise<string> {
	const requested = stringValue(values, "version");
	if (requested !== undefined) {
		if (!isVersionTriplet(requested)) {
			throw new UsageError(`--version must be MAJOR.MINOR.PATCH: ${requested}`);
		}
		return requested;
	}

	try {
		return selectVersion(await listVersionEntries(config.packageVersionsDir));
	} catch (err: unknown) {
		if (!isNotebookError(err)) throw err;
		logger.warn(
			{ component: "init", code: err.code },
			`${err.message}; pinning ${PLACEHOLDER_VERSION} until sync-version runs`,
		);
		return PLACEHOLDER_VERSION;
	}
}

export const initCommand: CommandDefinition = {
	name: "init",
	summary: "Write main.typ, packages.typ and the section documents",
	optionHelp: [
		"--team <name>        team identifier shown on the cover (required)",
		"--season <name>      season label (required)",
		"--year <range>       year range, e.g. 2025-2026 (required)",
		`--theme <name>       template theme (default: ${DEFAULT_THEME})`,
		"--version <x.y.z>    template version to pin (default: first installed)",
		"--force              overwrite existing files",
	],
	options: {
		team: { type: "string" },
		season: { type: "string" },
		year: { type: "string" },
		theme: { type: "string" },
		version: { type: "string" },
		force: { type: "boolean" },
	},
	async execute(context) {
		const { config, values, logger, io } = context;
		const notebook = {
			teamName: requiredString(values, "team"),
			season: requiredString(values, "season"),
			year: requiredString(values, "year"),
			theme: stringValue(values, "theme") ?? DEFAULT_THEME,
		};
		if (!/^[a-z][a-z0-9-]*$/.test(notebook.theme)) {
			throw new UsageError(`--theme must be a theme identifier: ${notebook.theme}`);
		}

		const result = await initWorkspace({
			workspaceDir: config.workspaceDir,
			notebook,
			packageRef: config.packageRef,
			version: await resolveInitialVersion(context),
			force: booleanValue(values, "force"),
			logger,
		});
		for (const file of result.written) io.print(`wrote ${file}`);
		for (const file of result.skipped) io.print(`kept ${file}`);
		return 0;
	},
};
