import { mkdirSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
	loadWorkspaceConfig,
	type WorkspaceConfig,
} from "../../cli/config/workspace-config";

export interface TempNotebook {
	root: string;
	workspaceDir: string;
	packageCacheDir: string;
	config: WorkspaceConfig;
	/** Environment pointing the CLI at this notebook */
	env: Record<string, string>;
	installVersion: (version: string) => string;
	cleanup: () => void;
}

/**
 * A throwaway notebook workspace plus a package cache holding the given
 * `@local/notebookinator` versions.
 */
export function createTempNotebook(versions: string[] = []): TempNotebook {
	const root = mkdtempSync(join(tmpdir(), "notebook-test-"));
	const workspaceDir = join(root, "notebook");
	const packageCacheDir = join(root, "packages");
	mkdirSync(workspaceDir);

	const env = {
		NOTEBOOK_WORKSPACE: workspaceDir,
		NOTEBOOK_PACKAGE_CACHE: packageCacheDir,
	};
	const config = loadWorkspaceConfig(env, {}, root);
	mkdirSync(config.packageVersionsDir, { recursive: true });

	const installVersion = (version: string) => {
		const dir = join(config.packageVersionsDir, version);
		mkdirSync(dir, { recursive: true });
		return dir;
	};
	for (const version of versions) installVersion(version);

	return {
		root,
		workspaceDir,
		packageCacheDir,
		config,
		env,
		installVersion,
		cleanup: () => rmSync(root, { recursive: true, force: true }),
	};
}
