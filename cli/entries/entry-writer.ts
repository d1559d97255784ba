import { join } from "node:path";
import {
	ENTRIES_DIR,
	ENTRIES_INDEX_FILE,
	NOTEBOOK_SECTIONS,
} from "../../shared/constants";
import type { EntryDraft, NotebookSection } from "../../shared/types";
import { typstString } from "../document/typst-source";
import { NotebookError } from "../errors";
import type { Logger } from "../logging/logger";
import {
	appendTextFile,
	createTextFile,
	readTextFile,
} from "../store/text-file-store";
import { formatTypstDate } from "./entry-date";

export function isNotebookSection(value: string): value is NotebookSection {
	return NOTEBOOK_SECTIONS.some((section) => section === value);
}

export interface EntryPaths {
	/** Title shown in the notebook: the last segment of the input title */
	displayTitle: string;
	/** Workspace-relative entry file, e.g. `entries/week_1/design_brief/design_brief.typ` */
	file: string;
	/** Path as written in entries.typ, e.g. `/entries/week_1/design_brief/design_brief.typ` */
	includePath: string;
}

/**
 * Map an entry title to its location. Each `/`-separated segment becomes a
 * directory, lowercased with spaces replaced by underscores, and the file is
 * named after the last segment.
 */
export function entryPaths(title: string): EntryPaths {
	const rawSegments = title
		.split("/")
		.map((segment) => segment.trim())
		.filter((segment) => segment.length > 0);
	const displayTitle = rawSegments.at(-1);
	if (displayTitle === undefined) {
		throw new NotebookError("INVALID_TITLE", "Entry title must be specified");
	}
	if (rawSegments.some((segment) => segment === "." || segment === "..")) {
		throw new NotebookError(
			"INVALID_TITLE",
			`Entry title cannot contain "." or ".." segments: ${title}`,
		);
	}

	const segments = rawSegments.map((segment) =>
		segment.toLowerCase().replace(/ /g, "_"),
	);
	const fileName = segments[segments.length - 1];
	const file = [ENTRIES_DIR, ...segments, `${fileName}.typ`].join("/");
	return { displayTitle, file, includePath: `/${file}` };
}

export function renderEntryDocument(
	draft: EntryDraft,
	displayTitle: string,
): string {
	return `#import "/packages.typ": *
#import components: *

#show: create-entry.with(
  section: ${typstString(draft.section)},
  title: ${typstString(displayTitle)},
  type: ${typstString(draft.type)},
  date: ${formatTypstDate(draft.date)},
  author: ${typstString(draft.author)},
  witness: ${typstString(draft.witness)},
)
`;
}

export interface CreateEntryOptions {
	workspaceDir: string;
	draft: EntryDraft;
	logger: Logger;
}

export interface CreatedEntry {
	filePath: string;
	includePath: string;
	displayTitle: string;
}

/**
 * Write a new entry file and append its `#include` to entries/entries.typ.
 * Never overwrites an existing entry.
 */
export async function createEntry(
	options: CreateEntryOptions,
): Promise<CreatedEntry> {
	const log = options.logger.child({ component: "new-entry" });
	const { draft } = options;

	if (draft.type.trim().length === 0) {
		throw new NotebookError("INVALID_ENTRY_TYPE", "Entry type must be specified");
	}
	const paths = entryPaths(draft.title);

	const indexFile = join(options.workspaceDir, ENTRIES_INDEX_FILE);
	if ((await readTextFile(indexFile)) === null) {
		throw new NotebookError(
			"ENTRIES_INDEX_NOT_FOUND",
			`Entries index does not exist: ${indexFile}`,
		);
	}

	const filePath = join(options.workspaceDir, paths.file);
	const created = await createTextFile(
		filePath,
		renderEntryDocument(draft, paths.displayTitle),
	);
	if (!created) {
		throw new NotebookError(
			"ENTRY_EXISTS",
			`Entry file already exists: ${paths.file}`,
		);
	}

	await appendTextFile(indexFile, `\n\n#include ${typstString(paths.includePath)}`);
	log.info({ file: paths.file, section: draft.section }, "created entry");

	return { filePath, includePath: paths.includePath, displayTitle: paths.displayTitle };
}
