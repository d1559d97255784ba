import type { ParseArgsConfig } from "node:util";
import type { WorkspaceConfig } from "../config/workspace-config";
import type { Logger } from "../logging/logger";
import type { ProcessRunner } from "../process/run-process";

export type CommandOptions = NonNullable<ParseArgsConfig["options"]>;

/** Bad command-line input; reported with usage and exit code 2. */
export class UsageError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "UsageError";
	}
}

export interface CommandIo {
	/** One line of command output (stdout) */
	print: (line: string) => void;
	/** Whether output may carry ANSI colors */
	color: boolean;
}

export interface CommandContext {
	config: WorkspaceConfig;
	values: Record<string, unknown>;
	logger: Logger;
	io: CommandIo;
	run: ProcessRunner;
	now: () => Date;
}

export interface CommandDefinition {
	name: string;
	summary: string;
	/** Lines appended to the usage text, one per option */
	optionHelp: string[];
	options: CommandOptions;
	/** Resolves to the process exit code */
	execute: (context: CommandContext) => Promise<number>;
}

export function stringValue(
	values: Record<string, unknown>,
	name: string,
): string | undefined {
	const value = values[name];
	return typeof value === "string" ? value : undefined;
}

export function requiredString(
	values: Record<string, unknown>,
	name: string,
): string {
	const value = stringValue(values, name);
	if (value === undefined || value.trim().length === 0) {
		throw new UsageError(`--${name} is required`);
	}
	return value;
}

export function booleanValue(
	values: Record<string, unknown>,
	name: string,
): boolean {
	return values[name] === true;
}
