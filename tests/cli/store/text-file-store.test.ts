import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	chmodSync,
	existsSync,
	mkdirSync,
	mkdtempSync,
	readFileSync,
	rmSync,
	statSync,
	writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	appendTextFile,
	createTextFile,
	readTextFile,
	writeTextFileAtomic,
} from "../../../cli/store/text-file-store";

describe("text file store", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "notebook-store-"));
	});

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true });
	});

	it("reads null for a missing file", async () => {
		await expect(readTextFile(join(tempDir, "missing.typ"))).resolves.toBeNull();
	});

	it("propagates errors other than a missing file", async () => {
		await expect(readTextFile(tempDir)).rejects.toMatchObject({ code: "EISDIR" });
	});

	it("writes atomically, creating parent directories", async () => {
		const filePath = join(tempDir, "nested", "packages.typ");

		await writeTextFileAtomic(filePath, "first");
		await writeTextFileAtomic(filePath, "second");

		expect(readFileSync(filePath, "utf-8")).toBe("second");
		expect(existsSync(`${filePath}.tmp`)).toBe(false);
	});

	it("keeps the permission bits of the file it replaces", async () => {
		const filePath = join(tempDir, "packages.typ");
		writeFileSync(filePath, "first");
		chmodSync(filePath, 0o640);

		await writeTextFileAtomic(filePath, "second");

		expect(statSync(filePath).mode & 0o777).toBe(0o640);
		expect(readFileSync(filePath, "utf-8")).toBe("second");
	});

	it("removes the temp file when the rename fails", async () => {
		const filePath = join(tempDir, "packages.typ");
		mkdirSync(join(filePath, "inside"), { recursive: true });

		await expect(writeTextFileAtomic(filePath, "text")).rejects.toMatchObject({
			code: "EISDIR",
		});
		expect(existsSync(`${filePath}.tmp`)).toBe(false);
	});

	it("creates a file only when it does not exist", async () => {
		const filePath = join(tempDir, "entries", "a", "a.typ");

		await expect(createTextFile(filePath, "one")).resolves.toBe(true);
		await expect(createTextFile(filePath, "two")).resolves.toBe(false);
		expect(readFileSync(filePath, "utf-8")).toBe("one");
	});

	it("appends to an existing file", async () => {
		const filePath = join(tempDir, "entries.typ");
		writeFileSync(filePath, "head");

		await appendTextFile(filePath, "\n\ntail");

		expect(readFileSync(filePath, "utf-8")).toBe("head\n\ntail");
	});
});
