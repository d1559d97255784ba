import { ENTRY_TYPES_LABEL } from "../../shared/constants";
import type { PackageRef } from "../../shared/types";
import { errnoCode, NotebookError } from "../errors";
import type { ProcessRunner } from "../process/run-process";
import { parseEntryTypeMetadata, type ThemeEntryTypes } from "./entry-types";

/**
 * Typst program that exposes every theme's `entry-type-metadata` component
 * as `(theme, pairs | none)` under the entry-types label.
 */
export function renderEntryTypeQuery(ref: PackageRef, version: string): string {
	return `#import "@${ref.namespace}/${ref.name}:${version}": themes
#metadata(
  dictionary(themes).pairs().map(((name, theme)) => {
    let entry-metadata = dictionary(theme.components).pairs().find(
      ((key, _value)) => key == "entry-type-metadata",
    )
    if entry-metadata == none {
      return (name, none)
    }
    return (name, entry-metadata.at(1).pairs())
  }),
) ${ENTRY_TYPES_LABEL}
`;
}

export interface EntryTypeQueryOptions {
	packageRef: PackageRef;
	version: string;
	/** Directory typst runs in; the workspace root */
	cwd: string;
	run: ProcessRunner;
	typstCommand?: string;
}

export async function queryEntryTypeMetadata(
	options: EntryTypeQueryOptions,
): Promise<ThemeEntryTypes> {
	const command = options.typstCommand ?? "typst";
	const program = renderEntryTypeQuery(options.packageRef, options.version);

	let result: Awaited<ReturnType<ProcessRunner>>;
	try {
		result = await options.run(
			command,
			["query", "-", ENTRY_TYPES_LABEL, "--field", "value"],
			{ input: program, cwd: options.cwd },
		);
	} catch (err: unknown) {
		const reason =
			errnoCode(err) === "ENOENT"
				? `${command} is not installed or not on PATH`
				: `could not start ${command}`;
		throw new NotebookError(
			"TYPST_QUERY_FAILED",
			`Entry-type query failed: ${reason}`,
			err,
		);
	}

	if (result.exitCode !== 0) {
		throw new NotebookError(
			"TYPST_QUERY_FAILED",
			`Entry-type query exited with ${result.exitCode}: ${result.stderr.trim()}`,
		);
	}

	return parseEntryTypeMetadata(result.stdout);
}
