import {
	NOTEBOOK_SECTIONS,
	SECTION_INCLUDE_PATHS,
} from "../../shared/constants";
import type {
	NotebookOptions,
	NotebookSection,
	PackageRef,
} from "../../shared/types";
import {
	namedArguments,
	parseTypstString,
	readArgumentList,
	stripComments,
	typstString,
} from "./typst-source";

/** Include paths main.typ must list, in this order and no others. */
export const EXPECTED_INCLUDES: readonly string[] = NOTEBOOK_SECTIONS.map(
	(section) => SECTION_INCLUDE_PATHS[section],
);

export function themeBinding(theme: string): string {
	return `${theme}-theme`;
}

/**
 * packages.typ: the single place the template version is pinned. Everything
 * else imports `/packages.typ` instead of the package itself.
 */
export function renderPackagesDocument(
	ref: PackageRef,
	version: string,
	theme: string,
): string {
	return `// The version below is rewritten by \`notebook sync-version\`.
#import "@${ref.namespace}/${ref.name}:${version}": *
#import themes.${theme}: ${themeBinding(theme)}, components

#let create-entry(section: "body", ..args, body) = {
  let entry = (
    frontmatter: create-frontmatter-entry,
    body: create-body-entry,
    appendix: create-appendix-entry,
  ).at(section)
  entry(..args, body)
}
`;
}

export function renderMainDocument(options: NotebookOptions): string {
	const includes = EXPECTED_INCLUDES.map((path) => `#include ${typstString(path)}`);
	return `#import "/packages.typ": *

#show: notebook.with(
  team-name: ${typstString(options.teamName)},
  season: ${typstString(options.season)},
  year: ${typstString(options.year)},
  theme: ${themeBinding(options.theme)},
)

${includes.join("\n")}
`;
}

export function renderSectionDocument(section: NotebookSection): string {
	switch (section) {
		case "frontmatter":
			return `#import "/packages.typ": *
#import components: *

#create-frontmatter-entry(title: "Table of Contents")[
  #toc()
]
`;
		case "body":
			return `#import "/packages.typ": *
`;
		case "appendix":
			return `#import "/packages.typ": *
#import components: *

#create-appendix-entry(title: "Glossary")[
  #glossary()
]
`;
	}
}

export interface Composition {
	/** Named arguments of `notebook.with(...)`, expressions unparsed */
	templateArgs: Map<string, string>;
	teamName: string | null;
	season: string | null;
	year: string | null;
	/** Theme expression as written, e.g. `radial-theme` or `themes.linear.linear-theme` */
	themeExpr: string | null;
	/** `#include` paths in document order */
	includes: string[];
	/** Whether a `#show: notebook.with(...)` rule was found */
	hasTemplate: boolean;
}

/** Pull the template options and the include order out of a main.typ source. */
export function readComposition(source: string): Composition {
	const code = stripComments(source);

	let templateArgs = new Map<string, string>();
	let hasTemplate = false;
	const showMatch = /#show\s*:\s*notebook\.with\(/.exec(code);
	if (showMatch) {
		const openIndex = showMatch.index + showMatch[0].length - 1;
		const list = readArgumentList(code, openIndex);
		if (list !== null) {
			hasTemplate = true;
			templateArgs = namedArguments(list);
		}
	}

	const stringArg = (name: string): string | null => {
		const expr = templateArgs.get(name);
		return expr === undefined ? null : parseTypstString(expr);
	};

	const includes = Array.from(
		code.matchAll(/^[ \t]*#include[ \t]+"([^"\n]+)"/gm),
		(match) => match[1] ?? "",
	);

	return {
		templateArgs,
		teamName: stringArg("team-name"),
		season: stringArg("season"),
		year: stringArg("year"),
		themeExpr: templateArgs.get("theme") ?? null,
		includes,
		hasTemplate,
	};
}

/** main.typ sits at the workspace root, so `a.typ` and `./a.typ` mean `/a.typ`. */
export function rootIncludePath(path: string): string {
	const relative = path.replace(/^(\.\/)+/, "");
	return relative.startsWith("/") ? relative : `/${relative}`;
}

export function includesInExpectedOrder(includes: readonly string[]): boolean {
	return (
		includes.length === EXPECTED_INCLUDES.length &&
		includes.every((path, index) => rootIncludePath(path) === EXPECTED_INCLUDES[index])
	);
}
