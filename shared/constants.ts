/** Notebook sections, in the order main.typ includes them. */
export const NOTEBOOK_SECTIONS = ["frontmatter", "body", "appendix"] as const;

/** Workspace-relative include path for each section. */
export const SECTION_INCLUDE_PATHS = {
	frontmatter: "/frontmatter.typ",
	body: "/entries/entries.typ",
	appendix: "/appendix.typ",
} as const;

export const PACKAGES_FILE = "packages.typ";
export const MAIN_FILE = "main.typ";
export const ENTRIES_DIR = "entries";
export const ENTRIES_INDEX_FILE = "entries/entries.typ";

export const DEFAULT_PACKAGE_REF = "@local/notebookinator";
export const DEFAULT_THEME = "radial";

/** Label the entry-type query attaches to its metadata element. */
export const ENTRY_TYPES_LABEL = "<entry-types>";
