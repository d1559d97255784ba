import type { ProcessRunner } from "../process/run-process";

/** `git config user.name`, or "" when git is missing or has no name set. */
export async function readGitUserName(
	run: ProcessRunner,
	cwd: string,
): Promise<string> {
	try {
		const result = await run("git", ["config", "--get", "user.name"], { cwd });
		return result.exitCode === 0 ? result.stdout.trim() : "";
	} catch {
		return "";
	}
}
