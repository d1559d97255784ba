import { parseArgs } from "node:util";
import { checkCommand } from "./commands/check";
import {
	type CommandDefinition,
	type CommandIo,
	stringValue,
	UsageError,
} from "./commands/command";
import { entryTypesCommand } from "./commands/entry-types";
import { initCommand } from "./commands/init";
import { newEntryCommand } from "./commands/new-entry";
import { syncVersionCommand } from "./commands/sync-version";
import { loadWorkspaceConfig } from "./config/workspace-config";
import { isNotebookError } from "./errors";
import { createLogger, type LogLevel, type Logger } from "./logging/logger";
import { type ProcessRunner, runProcess } from "./process/run-process";

export const COMMANDS: readonly CommandDefinition[] = [
	syncVersionCommand,
	initCommand,
	checkCommand,
	newEntryCommand,
	entryTypesCommand,
];

const GLOBAL_OPTIONS = {
	workspace: { type: "string" },
	"package-cache": { type: "string" },
	package: { type: "string" },
	"log-level": { type: "string" },
	help: { type: "boolean", short: "h" },
} as const;

const GLOBAL_HELP = [
	"--workspace <dir>       notebook root (default: $NOTEBOOK_WORKSPACE or cwd)",
	"--package-cache <dir>   Typst package cache (default: $XDG_DATA_HOME/typst/packages)",
	"--package <@ns/name>    template package (default: @local/notebookinator)",
	"--log-level <level>     pino log level (default: info)",
];

export interface CliDeps {
	env: Record<string, string | undefined>;
	cwd: string;
	io: CommandIo;
	/** Error output for usage text and failures that happen before logging is set up */
	printError: (line: string) => void;
	run: ProcessRunner;
	now: () => Date;
	createLogger: (level: LogLevel) => Logger;
}

const DEFAULT_DEPS: CliDeps = {
	env: process.env,
	cwd: process.cwd(),
	io: {
		print: (line) => process.stdout.write(`${line}\n`),
		color: process.stdout.isTTY === true,
	},
	printError: (line) => process.stderr.write(`${line}\n`),
	run: runProcess,
	now: () => new Date(),
	createLogger,
};

export function usage(command?: CommandDefinition): string {
	if (command) {
		return [
			`usage: notebook ${command.name} [options]`,
			"",
			command.summary,
			"",
			...command.optionHelp.map((line) => `  ${line}`),
			...GLOBAL_HELP.map((line) => `  ${line}`),
		].join("\n");
	}
	const width = Math.max(...COMMANDS.map((entry) => entry.name.length));
	return [
		"usage: notebook <command> [options]",
		"",
		...COMMANDS.map(
			(entry) => `  ${entry.name.padEnd(width)}  ${entry.summary}`,
		),
		"",
		...GLOBAL_HELP.map((line) => `  ${line}`),
	].join("\n");
}

/**
 * Parse argv (without the node and script entries), run one command and
 * resolve to the exit code: 0 on success, 1 on failure, 2 on bad usage.
 */
export async function runCli(
	argv: readonly string[],
	deps?: Partial<CliDeps>,
): Promise<number> {
	const { env, cwd, io, printError, run, now, createLogger: makeLogger } = {
		...DEFAULT_DEPS,
		...deps,
	};

	const [name, ...rest] = argv;
	if (name === undefined || name === "-h" || name === "--help" || name === "help") {
		io.print(usage());
		return name === undefined ? 2 : 0;
	}

	const command = COMMANDS.find((entry) => entry.name === name);
	if (!command) {
		printError(`unknown command: ${name}`);
		printError(usage());
		return 2;
	}

	let values: Record<string, unknown>;
	try {
		values = parseArgs({
			args: [...rest],
			options: { ...GLOBAL_OPTIONS, ...command.options },
			strict: true,
			allowPositionals: false,
		}).values;
	} catch (err: unknown) {
		printError(err instanceof Error ? err.message : String(err));
		printError(usage(command));
		return 2;
	}

	if (values.help === true) {
		io.print(usage(command));
		return 0;
	}

	let logger: Logger | null = null;
	try {
		const config = loadWorkspaceConfig(
			env,
			{
				workspace: stringValue(values, "workspace"),
				packageCache: stringValue(values, "package-cache"),
				packageRef: stringValue(values, "package"),
				logLevel: stringValue(values, "log-level"),
			},
			cwd,
		);
		logger = makeLogger(config.logLevel);
		return await command.execute({ config, values, logger, io, run, now });
	} catch (err: unknown) {
		if (err instanceof UsageError) {
			printError(err.message);
			printError(usage(command));
			return 2;
		}
		const log = logger ?? makeLogger("info");
		if (isNotebookError(err)) {
			log.error({ command: name, code: err.code }, err.message);
		} else {
			log.error({ command: name, err }, "unexpected failure");
		}
		return 1;
	}
}
