import { z } from "zod";
import { DEFAULT_THEME } from "../../shared/constants";
import type { EntryType } from "../../shared/types";
import { NotebookError } from "../errors";
import type { Logger } from "../logging/logger";

// -- Query output: `typst query --field value` prints one value per match --
const colorValueSchema = z.union([
	z.string(),
	z.object({ color: z.string() }).passthrough(),
]);

const themeMetadataSchema = z.tuple([
	z.string(),
	z.array(z.tuple([z.string(), colorValueSchema])).nullable(),
]);

export const entryTypeQueryOutputSchema = z
	.array(z.array(themeMetadataSchema))
	.nonempty();

/** Theme name -> entry types, in the order the template declares them. */
export type ThemeEntryTypes = Map<string, EntryType[]>;

const COLOR_PATTERN = /^(?:rgb\(\s*")?#?([0-9a-f]{6})(?:"\s*\))?$/i;

/** Accepts `rgb("#rrggbb")` (Typst's repr) or a bare `#rrggbb`. */
export function parseColor(value: string): Pick<EntryType, "color" | "rgb"> {
	const hex = COLOR_PATTERN.exec(value.trim())?.[1];
	if (!hex) {
		throw new NotebookError(
			"INVALID_ENTRY_METADATA",
			`Entry type color is not an rgb hex color: ${value}`,
		);
	}
	const channel = (offset: number) =>
		Number.parseInt(hex.slice(offset, offset + 2), 16);
	return {
		color: `#${hex.toLowerCase()}`,
		rgb: { r: channel(0), g: channel(2), b: channel(4) },
	};
}

/**
 * Parse the JSON the entry-type query prints. Themes without entry-type
 * metadata are dropped.
 */
export function parseEntryTypeMetadata(raw: string): ThemeEntryTypes {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (err: unknown) {
		throw new NotebookError(
			"INVALID_ENTRY_METADATA",
			"Entry-type query did not print JSON",
			err,
		);
	}

	const parsed = entryTypeQueryOutputSchema.safeParse(json);
	if (!parsed.success) {
		throw new NotebookError(
			"INVALID_ENTRY_METADATA",
			`Unexpected entry-type metadata shape: ${parsed.error.issues[0]?.message ?? "unknown"}`,
			parsed.error,
		);
	}

	const themes: ThemeEntryTypes = new Map();
	for (const [themeName, entries] of parsed.data[0]) {
		if (entries === null) continue;
		themes.set(
			themeName,
			entries.map(([name, value]) => ({
				name,
				...parseColor(typeof value === "string" ? value : value.color),
			})),
		);
	}
	return themes;
}

export interface ResolvedEntryTypes {
	theme: string;
	entryTypes: EntryType[];
	/** False when the theme was a fallback rather than read from main.typ */
	fromMainDocument: boolean;
}

/**
 * Pick the entry types of the theme main.typ uses. The theme expression
 * (`radial-theme`, `themes.linear.linear-theme`, ...) names the theme; when
 * it cannot be matched, fall back to the default theme, then to any theme.
 */
export function resolveThemeEntryTypes(
	themes: ThemeEntryTypes,
	themeExpr: string | null,
	logger: Logger,
): ResolvedEntryTypes {
	const log = logger.child({ component: "entry-types" });
	if (themeExpr !== null) {
		for (const [theme, entryTypes] of themes) {
			if (themeExpr.includes(theme)) {
				return { theme, entryTypes, fromMainDocument: true };
			}
		}
	}

	let fallback: string | undefined = themes.has(DEFAULT_THEME)
		? DEFAULT_THEME
		: undefined;
	if (fallback === undefined) {
		for (const theme of themes.keys()) {
			fallback = theme;
			break;
		}
	}
	const entryTypes = fallback === undefined ? undefined : themes.get(fallback);
	if (fallback === undefined || entryTypes === undefined) {
		throw new NotebookError(
			"NO_ENTRY_TYPES",
			"No theme in the template package declares entry types",
		);
	}

	log.warn(
		{ theme: fallback },
		`could not find theme in main.typ, defaulting to ${fallback}`,
	);
	return { theme: fallback, entryTypes, fromMainDocument: false };
}
