import {
	appendFile,
	chmod,
	mkdir,
	readFile,
	rename,
	rm,
	stat,
	writeFile,
} from "node:fs/promises";
import { dirname } from "node:path";
import { errnoCode } from "../errors";

/**
 * Read a UTF-8 file, or null when it does not exist.
 * Other filesystem errors propagate.
 */
export async function readTextFile(filePath: string): Promise<string | null> {
	try {
		return await readFile(filePath, "utf-8");
	} catch (err: unknown) {
		if (errnoCode(err) === "ENOENT") {
			return null;
		}
		throw err;
	}
}

async function existingMode(filePath: string): Promise<number | null> {
	try {
		return (await stat(filePath)).mode & 0o7777;
	} catch (err: unknown) {
		if (errnoCode(err) === "ENOENT") {
			return null;
		}
		throw err;
	}
}

/**
 * Replace a file's contents through a sibling temp file and a rename, so a
 * reader never observes a half-written file. An existing file keeps its
 * permission bits; the temp file is removed when any step fails.
 */
export async function writeTextFileAtomic(
	filePath: string,
	content: string,
): Promise<void> {
	await mkdir(dirname(filePath), { recursive: true });
	const mode = await existingMode(filePath);
	const tmpPath = `${filePath}.tmp`;
	try {
		await writeFile(tmpPath, content, "utf-8");
		if (mode !== null) {
			await chmod(tmpPath, mode);
		}
		await rename(tmpPath, filePath);
	} catch (err: unknown) {
		await rm(tmpPath, { force: true });
		throw err;
	}
}

/**
 * Create a file that must not exist yet.
 * Resolves false instead of overwriting when it does.
 */
export async function createTextFile(
	filePath: string,
	content: string,
): Promise<boolean> {
	await mkdir(dirname(filePath), { recursive: true });
	try {
		await writeFile(filePath, content, { encoding: "utf-8", flag: "wx" });
		return true;
	} catch (err: unknown) {
		if (errnoCode(err) === "EEXIST") {
			return false;
		}
		throw err;
	}
}

export async function appendTextFile(
	filePath: string,
	content: string,
): Promise<void> {
	await appendFile(filePath, content, "utf-8");
}
