import type { VersionStrategy } from "../../shared/types";
import { formatPackageRef } from "../config/workspace-config";
import { syncPackageVersion } from "../packages/version-sync";
import {
	type CommandDefinition,
	stringValue,
	UsageError,
} from "./command";

function parseStrategy(value: string | undefined): VersionStrategy {
	if (value === undefined || value === "first" || value === "latest") {
		return value ?? "first";
	}
	throw new UsageError(`--strategy must be "first" or "latest": ${value}`);
}

export const syncVersionCommand: CommandDefinition = {
	name: "sync-version",
	summary: "Pin packages.typ to the template version installed locally",
	optionHelp: [
		"--strategy first|latest  which installed version to pin (default: first)",
	],
	options: {
		strategy: { type: "string" },
	},
	async execute({ config, values, logger, io }) {
		const result = await syncPackageVersion({
			packagesFile: config.packagesFile,
			packageVersionsDir: config.packageVersionsDir,
			packageRef: config.packageRef,
			strategy: parseStrategy(stringValue(values, "strategy")),
			logger,
		});
		io.print(`${formatPackageRef(config.packageRef)}:${result.version}`);
		return 0;
	},
};
