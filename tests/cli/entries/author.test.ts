import { describe, expect, it, vi } from "vitest";
import { readGitUserName } from "../../../cli/entries/author";
import type { ProcessRunner } from "../../../cli/process/run-process";

describe("readGitUserName", () => {
	it("returns the configured name without the trailing newline", async () => {
		const run = vi
			.fn<ProcessRunner>()
			.mockResolvedValue({ exitCode: 0, stdout: "Sam Lee\n", stderr: "" });

		await expect(readGitUserName(run, "/notebook")).resolves.toBe("Sam Lee");
		expect(run).toHaveBeenCalledWith(
			"git",
			["config", "--get", "user.name"],
			{ cwd: "/notebook" },
		);
	});

	it("returns an empty name when git has none configured", async () => {
		const run = vi
			.fn<ProcessRunner>()
			.mockResolvedValue({ exitCode: 1, stdout: "", stderr: "" });

		await expect(readGitUserName(run, "/notebook")).resolves.toBe("");
	});

	it("returns an empty name when git cannot be started", async () => {
		const run = vi
			.fn<ProcessRunner>()
			.mockRejectedValue(new Error("spawn git ENOENT"));

		await expect(readGitUserName(run, "/notebook")).resolves.toBe("");
	});
});
