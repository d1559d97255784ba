import { checkWorkspace } from "../document/composition-check";
import type { CommandDefinition } from "./command";

export const checkCommand: CommandDefinition = {
	name: "check",
	summary: "Verify the include order, included files and pinned version",
	optionHelp: [],
	options: {},
	async execute({ config, logger, io }) {
		const problems = await checkWorkspace(config);
		for (const problem of problems) {
			io.print(`${problem.code}: ${problem.message}`);
		}
		if (problems.length > 0) {
			logger.error(
				{ component: "check", problems: problems.length },
				"workspace will not render",
			);
			return 1;
		}
		io.print("ok");
		return 0;
	},
};
