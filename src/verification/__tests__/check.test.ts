import { describe, it, expect, beforeAll } from "vitest";
import * as E from "fp-ts/Either";

import type { Check, Table } from "@covenant/analysis/types";
import { typecheckTopLevel } from "@covenant/lang/typecheck";
import type { Z3Handle } from "@covenant/shared/config/options";
import { dummyLocation } from "@covenant/shared/provenance";

import { VerificationService, type FunctionBody } from "../check";
import { moduleTables } from "../extract";
import { describeCheckResult, describeVerificationFailure, type CheckResult, type ModuleChecks, type SmtFailure } from "../result";
import type { VerificationServiceAPI } from "../types";
import { load, loadOne, z3 } from "./helpers";

const BANK = `
  (defschema account
    @invariants [(>= balance 0) (< balance 1000000)]
    balance:integer)
  (deftable accounts:{account})
`;

const NESTED = `
  (defschema info tier:integer)
  (defschema account balance:integer meta:object{info})
  (deftable accounts:{account})
`;

const DEPOSIT = `(defun deposit:string (id:string amount:integer)
  (enforce (> amount 0) "positive")
  (let ((bal (at 'balance (read accounts id))))
    (update accounts id { "balance": (+ bal amount) })))`;

describe("VerificationService", () => {
	let handle: Z3Handle;
	let service: VerificationServiceAPI;
	beforeAll(async () => {
		handle = await z3();
		service = VerificationService(handle, { timeout: 10_000 });
	});

	const verify = async (body: string): Promise<ModuleChecks> => {
		const modules = load(`(module test 'k ${body})`);
		const data = modules["test"];
		if (!data) throw new Error("no module");
		const result = await service.verifyModule(modules, data);
		if (E.isLeft(result)) {
			throw new Error(describeVerificationFailure(result.left));
		}
		return result.right;
	};

	const kind = (result: CheckResult | undefined): string => {
		if (!result) return "missing";
		if (E.isRight(result)) return result.right.type;
		const { failure } = result.left;
		return failure.type === "SmtFailure" ? failure.failure.type : failure.type;
	};

	const smtFailure = (result: CheckResult | undefined): SmtFailure | undefined =>
		result && E.isLeft(result) && result.left.failure.type === "SmtFailure" ? result.left.failure.failure : undefined;

	it("proves a function that cannot fail", async () => {
		const checks = await verify(`(defun test:bool (x:integer) @property (valid success) (if (< x 10) true false))`);
		expect(checks.propertyChecks["test"]?.map(kind)).toEqual(["ProvedTheorem"]);
		expect(checks.invariantChecks["test"]).toEqual({});
	});

	it("reads each goal the right way round", async () => {
		const checks = await verify(`(defun f:bool ()
		  @properties [(satisfiable abort) (valid abort) (satisfiable success)]
		  (enforce false "cannot pass"))`);
		expect(checks.propertyChecks["f"]?.map(kind)).toEqual(["SatisfiedProperty", "ProvedTheorem", "Unsatisfiable"]);
	});

	it("agrees between a valid property and its unsatisfiable negation", async () => {
		const checks = await verify(`(defun f:bool (x:integer)
		  @properties [(valid success) (satisfiable (not success))]
		  (if (< x 10) true false))`);
		expect(checks.propertyChecks["f"]?.map(kind)).toEqual(["ProvedTheorem", "Unsatisfiable"]);
	});

	it("finds models for conditional failures", async () => {
		const checks = await verify(`(defun f:bool (x:integer)
		  @properties [(satisfiable abort) (valid abort)]
		  (if (< x 10) (enforce (< x 5) "too big") true))`);
		const [satisfied, invalid] = checks.propertyChecks["f"] ?? [];
		expect([satisfied, invalid].map(kind)).toEqual(["SatisfiedProperty", "Invalid"]);

		const model = satisfied && E.isRight(satisfied) && satisfied.right.type === "SatisfiedProperty" ? satisfied.right.model : undefined;
		const x = model?.args[0];
		expect(x?.name).toBe("x");
		const value = x?.value.type === "Int" ? x.value.value : undefined;
		expect(value !== undefined && value >= 5n && value < 10n).toBe(true);

		const counterexample = smtFailure(invalid);
		const y = counterexample?.type === "Invalid" ? counterexample.model.args[0]?.value : undefined;
		expect(y?.type === "Int" && (y.value >= 10n || y.value < 5n)).toBe(true);
	});

	it("describes results with their location", async () => {
		const checks = await verify(`(defun f:bool () @property (satisfiable success) (enforce false "no"))`);
		expect(checks.propertyChecks["f"]?.map(describeCheckResult)).toEqual(["test.cov:1:44:Warning: This property is unsatisfiable"]);
	});

	it("reports an invariant broken by a write", async () => {
		const checks = await verify(`${BANK} (defun overdraw:string (id:string) (write accounts id { "balance": -1 }))`);
		const [nonNegative, bounded] = checks.invariantChecks["overdraw"]?.["accounts"] ?? [];
		expect([nonNegative, bounded].map(kind)).toEqual(["Invalid", "ProvedTheorem"]);
		const failure = smtFailure(nonNegative);
		expect(failure?.type === "Invalid" && failure.model.writes.map(w => w.row)).toEqual([{ balance: { type: "Int", value: -1n } }]);
	});

	it("checks each invariant in isolation", async () => {
		const checks = await verify(`${BANK}
		  (defun deposit:string (id:string amount:integer)
		    @properties [(> (column-delta accounts balance) 0) (= (cell-delta accounts balance id) amount) (row-written accounts id)]
		    (enforce (> amount 0) "positive")
		    (let ((bal (at 'balance (read accounts id))))
		      (update accounts id { "balance": (+ bal amount) })))`);
		expect(checks.invariantChecks["deposit"]?.["accounts"]?.map(kind)).toEqual(["ProvedTheorem", "Invalid"]);
		expect(checks.propertyChecks["deposit"]?.map(kind)).toEqual(["ProvedTheorem", "ProvedTheorem", "ProvedTheorem"]);
	});

	it("gives each invariant the verdict it gets in a session of its own", async () => {
		const modules = load(`(module test 'k ${BANK} ${DEPOSIT})`);
		const data = modules["test"];
		const ref = data?.refs["deposit"];
		if (!data || !ref) throw new Error("no deposit");
		const tables = moduleTables(modules, data);
		const { topLevel } = typecheckTopLevel(ref, modules);
		if (E.isLeft(tables) || topLevel.type !== "TopFun") throw new Error("deposit does not check");
		const fn: FunctionBody = { info: topLevel.info, args: topLevel.args, resultType: topLevel.funType.result, body: topLevel.body };

		const shared = await service.verifyFunctionInvariants(fn, tables.right);
		const together = E.isRight(shared) ? shared.right["accounts"]?.map(kind) : [];

		const alone: string[] = [];
		for (const table of tables.right) {
			for (const inv of table.invariants) {
				const only: Table[] = [{ ...table, invariants: [inv] }];
				const result = await service.verifyFunctionInvariants(fn, only);
				alone.push(E.isRight(result) ? kind(result.right["accounts"]?.[0]) : "failed");
			}
		}
		expect(together).toEqual(["ProvedTheorem", "Invalid"]);
		expect(alone).toEqual(together);
	});

	it("leaves tables a function does not touch out of its invariant checks", async () => {
		const checks = await verify(`${BANK} (defun noop:bool () true)`);
		expect(checks.invariantChecks["noop"]).toEqual({});
	});

	it("models object-typed columns", async () => {
		const checks = await verify(`${NESTED}
		  (defun f:integer (id:string)
		    @properties [(valid false) (satisfiable true)]
		    (let ((row (read accounts id))) (at 'balance row)))
		  (defun g:integer (id:string m:object{info})
		    @properties [(= result (at 'tier m)) (satisfiable (!= result (at 'tier m)))]
		    (update accounts id { "meta": m })
		    (at 'tier (at 'meta (read accounts id))))`);
		expect(checks.propertyChecks["f"]?.map(kind)).toEqual(["Invalid", "SatisfiedProperty"]);
		expect(checks.propertyChecks["g"]?.map(kind)).toEqual(["ProvedTheorem", "Unsatisfiable"]);
	});

	it("reports a solver timeout as an unknown answer", async () => {
		const hurried = VerificationService(handle, { timeout: 1 });
		const modules = load(`(module test 'k
		  (defun cubes:bool (x:integer y:integer z:integer)
		    @property (valid (!= (+ (* x (* x x)) (* y (* y y))) (* z (* z z))))
		    true))`);
		const data = modules["test"];
		if (!data) throw new Error("no module");
		const result = await hurried.verifyModule(modules, data);
		const [cubes] = E.isRight(result) ? (result.right.propertyChecks["cubes"] ?? []) : [];
		expect(smtFailure(cubes)).toEqual({ type: "Unknown", reason: "timeout" });
	});

	it("tracks keyset enforcement", async () => {
		const checks = await verify(`(defun admin:bool ()
		  @properties [(authorized-by 'admin) (valid (authorized-by 'other)) (satisfiable abort)]
		  (enforce-keyset 'admin))`);
		expect(checks.propertyChecks["admin"]?.map(kind)).toEqual(["ProvedTheorem", "Invalid", "SatisfiedProperty"]);
	});

	it("fails the module on properties that do not parse", async () => {
		const modules = load(`(module test 'k (defun f:bool () @properties [(table-written) (> y 0)] true))`);
		const data = modules["test"];
		if (!data) throw new Error("no module");
		const result = await service.verifyModule(modules, data);
		expect(E.isLeft(result) && result.left.type).toBe("ModuleParseFailures");
		expect(E.isLeft(result) && describeVerificationFailure(result.left)).toBe(
			[
				"test.cov:1:47: could not parse (table-written): table-written: expected 1 arguments, found 0",
				"test.cov:1:63: could not parse (> y 0): unbound variable y",
			].join("\n"),
		);
	});

	it("fails the module on signatures it cannot model", async () => {
		const modules = load(`(module test 'k (defun f:bool (xs:[integer]) true))`);
		const data = modules["test"];
		if (!data) throw new Error("no module");
		const result = await service.verifyModule(modules, data);
		expect(result).toMatchObject(E.left({ type: "TypeTranslationFailure", message: "couldn't translate argument type of 'xs'" }));
	});

	it("fails the module on functions that do not typecheck", async () => {
		const modules = load(`(module test 'k (defun f:bool (x:integer) @property (valid success) (+ x 1)))`);
		const data = modules["test"];
		if (!data) throw new Error("no module");
		const result = await service.verifyModule(modules, data);
		expect(E.isLeft(result) && describeVerificationFailure(result.left)).toBe("test.cov:1:69:Warning: f: declared to return bool but returns integer");
	});

	describe("single checks", () => {
		const valid: Check = { type: "Valid", prop: { type: "BoolLit", value: true } };

		it("proves a check against one function", async () => {
			const data = loadOne(`(module test 'k (defun f:integer (x:integer) (abs x)))`);
			const result = await service.verifyCheck(data, "f", { type: "Valid", prop: { type: "Compare", op: "Gte", left: { type: "Var", id: 0, name: "result", ety: { type: "Int" } }, right: { type: "IntLit", value: 0n } } });
			expect(E.isRight(result) && kind(result.right)).toBe("ProvedTheorem");
		});

		it("reports names that are not functions", async () => {
			const data = loadOne(`(module test 'k (defconst C 1))`);
			expect(await service.verifyCheck(data, "missing", valid)).toEqual(E.right(E.left({ location: dummyLocation, failure: { type: "NotAFunction", name: "missing" } })));
			const constant = await service.verifyCheck(data, "C", valid);
			expect(E.isRight(constant) && kind(constant.right)).toBe("NotAFunction");
		});

		it("reports calls to other functions as translation failures", async () => {
			const data = loadOne(`(module test 'k (defun g:integer (x:integer) x) (defun f:integer (x:integer) (g x)))`);
			const result = await service.verifyCheck(data, "f", valid);
			expect(E.isRight(result) && describeCheckResult(result.right)).toBe("test.cov:1:78:Warning: Calls to user functions are not yet supported: g");
		});

		it("reports operations without a model as analysis failures", async () => {
			const data = loadOne(`(module test 'k (defun f:decimal (x:decimal) (sqrt x)))`);
			const result = await service.verifyCheck(data, "f", valid);
			expect(E.isRight(result) && kind(result.right)).toBe("AnalyzeFailure");
			expect(E.isRight(result) && describeCheckResult(result.right)).toBe("test.cov:1:17:Warning: Unsupported operation: sqrt");
		});
	});
});
