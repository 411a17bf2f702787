import { describe, expect, beforeAll, test } from "vitest";

import { verifySource } from "@covenant/cli/verify";
import type { Z3Handle } from "@covenant/shared/config/options";

import { fixture, z3 } from "./helpers/fixtures";

describe("verifying source files", () => {
	let handle: Z3Handle;
	beforeAll(async () => {
		handle = await z3();
	});

	test("a ledger that keeps its invariant", async () => {
		const report = await verifySource(handle, fixture("ledger.cov"), "ledger.cov");
		expect(report.lines).toEqual([
			"ledger.open-account: Property proven valid",
			"ledger.deposit: Property proven valid",
			"ledger.deposit: Property proven valid",
			"ledger.open-account maintains accounts: Property proven valid",
			"ledger.deposit maintains accounts: Property proven valid",
		]);
		expect(report.ok).toBe(true);
	});

	test("a withdrawal that can overdraw", async () => {
		const report = await verifySource(handle, fixture("overdraft.cov"), "overdraft.cov");
		expect(report.ok).toBe(false);
		expect(report.lines.map(l => l.split("\n")[0])).toEqual([
			"ledger.withdraw: overdraft.cov:5:15:Warning: Invalidating model found:",
			"ledger.withdraw maintains accounts: overdraft.cov:2:33:Warning: Invalidating model found:",
		]);
		expect(report.lines[0]).toContain("    amount := ");
	});

	test("source that does not load", async () => {
		const report = await verifySource(handle, "(module ledger", "broken.cov");
		expect(report).toEqual({ ok: false, lines: ["broken.cov:1:9: unexpected end of input"] });
	});
});
