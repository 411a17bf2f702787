#!/usr/bin/env -S npx tsx
import { Command } from "commander";
import fs from "fs";
import { init } from "z3-solver";

import { renderFeatureDocs } from "@covenant/analysis";
import { verifySource } from "@covenant/cli/verify";
import { getZ3, options, setZ3, type Z3Handle } from "@covenant/shared/config/options";
import { configure, logger } from "@covenant/shared/logging";

const z3 = async (): Promise<Z3Handle> => {
	const existing = getZ3();
	if (existing) {
		return existing;
	}
	const api = await init();
	const handle = { Z3: api.Context("main"), core: api.Z3 };
	setZ3(handle);
	return handle;
};

const program = new Command();

program
	.name("covenant")
	.arguments("<filepath>")
	.option("--verbose", "Enable verbose output")
	.option("--timeout <ms>", "Solver timeout per query, in milliseconds")
	.option("--log-file <path>", "Also write debug logs to this file")
	.description("Verify the properties and table invariants of every module in a file")
	.action(async (file: string, cmd: { verbose?: boolean; timeout?: string; logFile?: string }) => {
		options.verbose = cmd.verbose ?? false;
		options.logFile = cmd.logFile;
		if (cmd.timeout !== undefined) {
			const ms = Number.parseInt(cmd.timeout, 10);
			if (Number.isNaN(ms) || ms <= 0) {
				program.error(`invalid timeout '${cmd.timeout}'`);
			}
			options.timeout = ms;
		}
		configure();

		const source = fs.readFileSync(file, "utf-8");
		logger.debug(`verifying ${file}`);
		const report = await verifySource(await z3(), source, file);
		report.lines.forEach(line => console.log(line));
		process.exit(report.ok ? 0 : 1);
	});

program
	.command("docs")
	.description("Print the reference of property and invariant functions")
	.action(() => {
		console.log(renderFeatureDocs());
	});

program.parseAsync().catch(e => {
	console.error(e instanceof Error ? e.message : String(e));
	process.exit(2);
});
