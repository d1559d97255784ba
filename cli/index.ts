import { runCli } from "./app";

runCli(process.argv.slice(2))
	.then((exitCode) => {
		process.exitCode = exitCode;
	})
	.catch((err: unknown) => {
		console.error("notebook: failed to run:", err);
		process.exitCode = 1;
	});
