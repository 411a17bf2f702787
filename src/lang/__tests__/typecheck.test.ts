import { describe, it, expect } from "vitest";
import * as E from "fp-ts/Either";

import { loadModules, type ModuleData, type ModuleName } from "../module";
import { typecheckTopLevel, type TypecheckResult } from "../typecheck";
import { display } from "../types";

const SCHEMA = `
  (defschema account balance:integer owner:string guard:keyset)
  (deftable accounts:{account})
`;

const checkIn = (defs: string, name: string): TypecheckResult => {
	const loaded = loadModules(`(module m 'k ${SCHEMA} ${defs})`);
	if (E.isLeft(loaded)) {
		throw new Error(loaded.left.map(f => f.message).join("\n"));
	}
	const modules: Record<ModuleName, ModuleData> = loaded.right;
	const ref = modules["m"]?.refs[name];
	if (!ref) {
		throw new Error(`no definition ${name}`);
	}
	return typecheckTopLevel(ref, modules);
};

const messages = (result: TypecheckResult) => result.failures.map(f => f.message);

describe("typechecker", () => {
	it("types a function signature and infers the body's result", () => {
		const { topLevel, failures } = checkIn(`(defun f (x:integer y:decimal) (+ x y))`, "f");
		expect(failures).toEqual([]);
		if (topLevel.type !== "TopFun") throw new Error("expected a function");
		expect(topLevel.args.map(a => display(a.type))).toEqual(["integer", "decimal"]);
		expect(display(topLevel.funType.result)).toBe("decimal");
	});

	it("resolves table reads to the schema's object type", () => {
		const { topLevel, failures } = checkIn(`(defun get:integer (id:string) (at 'balance (read accounts id)))`, "get");
		expect(failures).toEqual([]);
		expect(topLevel.type === "TopFun" && display(topLevel.funType.result)).toBe("integer");
	});

	it("binds let and let* names", () => {
		const { failures } = checkIn(`(defun f:integer (x:integer) (let* ((a (+ x 1)) (b (* a 2))) b))`, "f");
		expect(failures).toEqual([]);
	});

	it("keeps let bindings parallel", () => {
		const result = checkIn(`(defun f:integer (x:integer) (let ((a 1) (b a)) b))`, "f");
		expect(messages(result)).toEqual(["unbound name 'a'"]);
	});

	it("reports a mismatched declared result", () => {
		const result = checkIn(`(defun f:bool (x:integer) (+ x 1))`, "f");
		expect(messages(result)).toEqual(["f: declared to return bool but returns integer"]);
	});

	it("reports branch types that disagree", () => {
		const result = checkIn(`(defun f (x:integer) (if (< x 1) "small" 2))`, "f");
		expect(messages(result)).toEqual(["if: branches have different types string and integer"]);
	});

	it("checks objects written to tables", () => {
		const result = checkIn(`(defun f (id:string) (write accounts id { "balance": "lots", "owner": id }))`, "f");
		expect(messages(result)).toEqual([
			"write: column 'balance' expects integer, found string",
			"write: missing column 'guard' of account",
		]);
	});

	it("allows partial updates", () => {
		const result = checkIn(`(defun f (id:string) (update accounts id { "balance": 0 }))`, "f");
		expect(result.failures).toEqual([]);
	});

	it("reports unknown columns in at", () => {
		const result = checkIn(`(defun f (id:string) (at 'nope (read accounts id)))`, "f");
		expect(messages(result)).toEqual(["at: 'nope' is not a field of object{account}"]);
	});

	it("reports native arity errors", () => {
		const result = checkIn(`(defun f (x:integer) (enforce (> x 0)))`, "f");
		expect(messages(result)).toEqual(["enforce: wrong number of arguments (1)"]);
	});

	it("checks calls to module functions against their signatures", () => {
		const result = checkIn(`(defun g:integer (x:integer) x) (defun f () (g "one"))`, "f");
		expect(messages(result)).toEqual(["g: argument 'x' expects integer, found string"]);
	});

	it("reports unknown functions and missing annotations", () => {
		const result = checkIn(`(defun f (x) (frobnicate x))`, "f");
		expect(messages(result)).toEqual(["missing type annotation for 'x'", "unknown function 'frobnicate'"]);
	});

	it("inlines constants", () => {
		const { topLevel, failures } = checkIn(`(defconst LIMIT 10) (defun f (x:integer) (< x LIMIT))`, "f");
		expect(failures).toEqual([]);
		if (topLevel.type !== "TopFun") throw new Error("expected a function");
		const [body] = topLevel.body;
		expect(body?.kind === "Native" && body.args[1]?.kind).toBe("Const");
	});

	it("types tables and schemas", () => {
		const table = checkIn("", "accounts").topLevel;
		expect(table.type === "TopTable" && table.schema.fields.map(f => `${f.name}:${display(f.type)}`)).toEqual(["balance:integer", "owner:string", "guard:keyset"]);
	});
});
