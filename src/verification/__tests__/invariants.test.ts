import { describe, it, expect, beforeAll, beforeEach, vi } from "vitest";
import * as E from "fp-ts/Either";

import { saturateModel } from "@covenant/analysis/model";
import { typecheckTopLevel } from "@covenant/lang/typecheck";
import type { Z3Handle } from "@covenant/shared/config/options";

import { VerificationService } from "../check";
import type { CheckResult, ModuleChecks } from "../result";
import { load, z3 } from "./helpers";

vi.mock("@covenant/analysis/model", async importOriginal => {
	const actual = await importOriginal<typeof import("@covenant/analysis/model")>();
	return { ...actual, saturateModel: vi.fn(actual.saturateModel) };
});

vi.mock("@covenant/lang/typecheck", async importOriginal => {
	const actual = await importOriginal<typeof import("@covenant/lang/typecheck")>();
	return { ...actual, typecheckTopLevel: vi.fn(actual.typecheckTopLevel) };
});

const LIMITS = `
  (defschema account
    @invariants [(>= balance 0) (> balance 5) (< balance 1000000)]
    balance:integer)
  (deftable accounts:{account})
`;

const kind = (result: CheckResult | undefined): string => {
	if (!result) return "missing";
	if (E.isRight(result)) return result.right.type;
	const { failure } = result.left;
	return failure.type === "SmtFailure" ? failure.failure.type : failure.type;
};

describe("invariant sessions", () => {
	let handle: Z3Handle;
	beforeAll(async () => {
		handle = await z3();
	});
	beforeEach(() => {
		vi.mocked(saturateModel).mockClear();
		vi.mocked(typecheckTopLevel).mockClear();
	});

	const verify = async (body: string): Promise<ModuleChecks> => {
		const modules = load(`(module test 'k ${body})`);
		const data = modules["test"];
		if (!data) throw new Error("no module");
		const result = await VerificationService(handle, { timeout: 10_000 }).verifyModule(modules, data);
		if (E.isLeft(result)) throw new Error(result.left.type);
		return result.right;
	};

	it("keeps checking the other invariants after one of them throws", async () => {
		vi.mocked(saturateModel).mockImplementationOnce(() => {
			throw new Error("model unavailable");
		});
		const checks = await verify(`${LIMITS} (defun overdraw:string (id:string) (write accounts id { "balance": -1 }))`);
		const [first, second, third] = checks.invariantChecks["overdraw"]?.["accounts"] ?? [];
		expect(first).toEqual(E.left({ location: expect.anything(), failure: { type: "SmtFailure", failure: { type: "UnexpectedFailure", message: "model unavailable" } } }));
		expect([second, third].map(kind)).toEqual(["Invalid", "ProvedTheorem"]);
		expect(vi.mocked(saturateModel)).toHaveBeenCalledTimes(2);
	});

	it("typechecks each function once per module", async () => {
		await verify(`${LIMITS}
		  (defun f:bool (x:integer) @property (valid success) (> x 0))
		  (defun g:string (id:string) (write accounts id { "balance": 10 }))`);
		const names = vi.mocked(typecheckTopLevel).mock.calls.map(([ref]) => ref.definition.name);
		expect(names.filter(n => n === "f")).toEqual(["f"]);
		expect(names.filter(n => n === "g")).toEqual(["g"]);
	});
});
