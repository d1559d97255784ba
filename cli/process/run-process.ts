import { spawn } from "node:child_process";
import { errnoCode } from "../errors";

export interface ProcessResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

/** Runs a command to completion, feeding `input` on stdin. */
export type ProcessRunner = (
	command: string,
	args: string[],
	options?: { input?: string; cwd?: string },
) => Promise<ProcessResult>;

/**
 * Default runner backed by child_process.spawn. Rejects only when the
 * process cannot be started (e.g. ENOENT); a non-zero exit resolves.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) =>
	new Promise<ProcessResult>((resolve, reject) => {
		const child = spawn(command, args, {
			cwd: options.cwd,
			stdio: ["pipe", "pipe", "pipe"],
		});
		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];

		child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
		child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
		child.on("error", reject);
		child.on("close", (code) => {
			resolve({
				exitCode: code ?? 1,
				stdout: Buffer.concat(stdout).toString("utf-8"),
				stderr: Buffer.concat(stderr).toString("utf-8"),
			});
		});

		// a child that exits without reading stdin reports through "close"
		child.stdin.on("error", (err) => {
			if (errnoCode(err) !== "EPIPE") reject(err);
		});
		child.stdin.end(options.input ?? "");
	});
