import type { EntryType } from "../../shared/types";
import { readComposition } from "../document/notebook-document";
import {
	type ResolvedEntryTypes,
	resolveThemeEntryTypes,
} from "../entries/entry-types";
import { queryEntryTypeMetadata } from "../entries/typst-query";
import { readPinnedVersion } from "../packages/pinned-version";
import { readTextFile } from "../store/text-file-store";
import type { CommandContext, CommandDefinition } from "./command";

/** Entry types of the theme main.typ applies, from the pinned template. */
export async function loadEntryTypes({
	config,
	logger,
	run,
}: CommandContext): Promise<ResolvedEntryTypes> {
	const version = await readPinnedVersion(config.packagesFile, config.packageRef);
	const themes = await queryEntryTypeMetadata({
		packageRef: config.packageRef,
		version,
		cwd: config.workspaceDir,
		run,
	});

	const mainSource = await readTextFile(config.mainFile);
	const themeExpr =
		mainSource === null ? null : readComposition(mainSource).themeExpr;
	return resolveThemeEntryTypes(themes, themeExpr, logger);
}

export function formatEntryType(entryType: EntryType, color: boolean): string {
	if (!color) {
		return `${entryType.name} ${entryType.color}`;
	}
	const { r, g, b } = entryType.rgb;
	return `\u001b[38;2;${r};${g};${b}m${entryType.name}\u001b[0m ${entryType.color}`;
}

export const entryTypesCommand: CommandDefinition = {
	name: "entry-types",
	summary: "List the entry types the notebook's theme offers",
	optionHelp: [],
	options: {},
	async execute(context) {
		const resolved = await loadEntryTypes(context);
		context.io.print(`theme: ${resolved.theme}`);
		for (const entryType of resolved.entryTypes) {
			context.io.print(formatEntryType(entryType, context.io.color));
		}
		return 0;
	},
};
