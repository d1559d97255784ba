import { NOTEBOOK_SECTIONS } from "../../shared/constants";
import type { EntryDraft } from "../../shared/types";
import { readGitUserName } from "../entries/author";
import { formatIsoDate, parseEntryDate, todayDate } from "../entries/entry-date";
import { createEntry, isNotebookSection } from "../entries/entry-writer";
import { NotebookError } from "../errors";
import {
	booleanValue,
	type CommandContext,
	type CommandDefinition,
	requiredString,
	stringValue,
	UsageError,
} from "./command";
import { loadEntryTypes } from "./entry-types";

async function buildDraft(context: CommandContext): Promise<EntryDraft> {
	const { values, logger, run, config } = context;

	const section = stringValue(values, "section") ?? "body";
	if (!isNotebookSection(section)) {
		throw new UsageError(
			`--section must be one of ${NOTEBOOK_SECTIONS.join(", ")}: ${section}`,
		);
	}

	const today = todayDate(context.now());
	const dateInput = stringValue(values, "date");
	let date = today;
	if (dateInput !== undefined) {
		const parsed = parseEntryDate(dateInput);
		if (parsed === null) {
			logger.warn(
				{ component: "new-entry", input: dateInput },
				`failed to parse date, using ${formatIsoDate(today)}`,
			);
		} else {
			date = parsed;
		}
	}

	return {
		section,
		title: requiredString(values, "title"),
		type: requiredString(values, "type"),
		date,
		author:
			stringValue(values, "author") ??
			(await readGitUserName(run, config.workspaceDir)),
		witness: stringValue(values, "witness") ?? "",
	};
}

async function assertKnownEntryType(
	context: CommandContext,
	type: string,
): Promise<void> {
	const { theme, entryTypes } = await loadEntryTypes(context);
	if (!entryTypes.some((entryType) => entryType.name === type)) {
		throw new NotebookError(
			"INVALID_ENTRY_TYPE",
			`Theme ${theme} has no entry type "${type}"; expected one of ${entryTypes
				.map((entryType) => entryType.name)
				.join(", ")}`,
		);
	}
}

export const newEntryCommand: CommandDefinition = {
	name: "new-entry",
	summary: "Create an entry and add it to entries/entries.typ",
	optionHelp: [
		"--title <title>      entry title; use a/b to nest it (required)",
		"--type <name>        entry type from `entry-types` (required)",
		"--section <name>     frontmatter, body or appendix (default: body)",
		"--date <yyyy-mm-dd>  entry date (default: today)",
		"--author <name>      author (default: git user.name)",
		"--witness <name>     witness (default: none)",
		"--skip-type-check    do not ask typst for the theme's entry types",
	],
	options: {
		title: { type: "string" },
		type: { type: "string" },
		section: { type: "string" },
		date: { type: "string" },
		author: { type: "string" },
		witness: { type: "string" },
		"skip-type-check": { type: "boolean" },
	},
	async execute(context) {
		const draft = await buildDraft(context);
		if (!booleanValue(context.values, "skip-type-check")) {
			await assertKnownEntryType(context, draft.type);
		}

		const entry = await createEntry({
			workspaceDir: context.config.workspaceDir,
			draft,
			logger: context.logger,
		});
		context.io.print(entry.includePath);
		return 0;
	},
};
