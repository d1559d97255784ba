import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import {
	createEntry,
	entryPaths,
	renderEntryDocument,
} from "../../../cli/entries/entry-writer";
import { createSilentLogger } from "../../../cli/logging/logger";
import type { EntryDraft } from "../../../shared/types";
import { thrownBy } from "../../helpers/errors";
import { createTempNotebook, type TempNotebook } from "../../helpers/temp-notebook";

const INDEX_SOURCE = '#import "/packages.typ": *\n';

const DRAFT: EntryDraft = {
	section: "body",
	title: "Design Brief",
	type: "identify",
	date: { year: 2026, month: 10, day: 18 },
	author: 'Sam "S" Lee',
	witness: "",
};

describe("entryPaths", () => {
	it("derives the directory and file from the title", () => {
		expect(entryPaths("Design Brief")).toEqual({
			displayTitle: "Design Brief",
			file: "entries/design_brief/design_brief.typ",
			includePath: "/entries/design_brief/design_brief.typ",
		});
	});

	it("nests entries on slashes and shows only the last segment", () => {
		expect(entryPaths("Week 1/Drivetrain Test/")).toEqual({
			displayTitle: "Drivetrain Test",
			file: "entries/week_1/drivetrain_test/drivetrain_test.typ",
			includePath: "/entries/week_1/drivetrain_test/drivetrain_test.typ",
		});
	});

	it("rejects empty titles and path traversal", () => {
		expect(thrownBy(() => entryPaths(" / "))).toMatchObject({
			code: "INVALID_TITLE",
		});
		expect(thrownBy(() => entryPaths("../outside"))).toMatchObject({
			code: "INVALID_TITLE",
		});
	});
});

describe("renderEntryDocument", () => {
	it("applies create-entry with escaped values", () => {
		expect(renderEntryDocument(DRAFT, "Design Brief")).toBe(`#import "/packages.typ": *
#import components: *

#show: create-entry.with(
  section: "body",
  title: "Design Brief",
  type: "identify",
  date: datetime(year: 2026, month: 10, day: 18),
  author: "Sam \\"S\\" Lee",
  witness: "",
)
`);
	});
});

describe("createEntry", () => {
	let notebook: TempNotebook;
	let indexFile: string;

	const create = (draft: EntryDraft = DRAFT) =>
		createEntry({
			workspaceDir: notebook.workspaceDir,
			draft,
			logger: createSilentLogger(),
		});

	beforeEach(() => {
		notebook = createTempNotebook();
		mkdirSync(join(notebook.workspaceDir, "entries"));
		indexFile = notebook.config.entriesIndexFile;
		writeFileSync(indexFile, INDEX_SOURCE);
	});

	afterEach(() => {
		notebook.cleanup();
	});

	it("writes the entry and appends its include", async () => {
		const entry = await create();

		expect(entry).toEqual({
			filePath: join(notebook.workspaceDir, "entries/design_brief/design_brief.typ"),
			includePath: "/entries/design_brief/design_brief.typ",
			displayTitle: "Design Brief",
		});
		expect(readFileSync(entry.filePath, "utf-8")).toBe(
			renderEntryDocument(DRAFT, "Design Brief"),
		);
		expect(readFileSync(indexFile, "utf-8")).toBe(
			`${INDEX_SOURCE}\n\n#include "/entries/design_brief/design_brief.typ"`,
		);
	});

	it("appends includes in creation order", async () => {
		await create();
		await create({ ...DRAFT, title: "Week 1/Build Log", type: "build" });

		expect(readFileSync(indexFile, "utf-8")).toBe(
			`${INDEX_SOURCE}\n\n#include "/entries/design_brief/design_brief.typ"` +
				`\n\n#include "/entries/week_1/build_log/build_log.typ"`,
		);
	});

	it("never overwrites an existing entry", async () => {
		await create();
		const indexAfterFirst = readFileSync(indexFile, "utf-8");

		await expect(create({ ...DRAFT, author: "Someone Else" })).rejects.toMatchObject({
			code: "ENTRY_EXISTS",
		});
		expect(readFileSync(indexFile, "utf-8")).toBe(indexAfterFirst);
		expect(
			readFileSync(
				join(notebook.workspaceDir, "entries/design_brief/design_brief.typ"),
				"utf-8",
			),
		).toContain('author: "Sam \\"S\\" Lee"');
	});

	it("fails before writing anything when entries.typ is missing", async () => {
		rmSync(indexFile);

		await expect(create()).rejects.toMatchObject({
			code: "ENTRIES_INDEX_NOT_FOUND",
		});
		expect(existsSync(join(notebook.workspaceDir, "entries/design_brief"))).toBe(
			false,
		);
	});

	it("rejects an empty entry type", async () => {
		await expect(create({ ...DRAFT, type: "  " })).rejects.toMatchObject({
			code: "INVALID_ENTRY_TYPE",
		});
	});
});
