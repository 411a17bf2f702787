import { describe, it, expect } from "vitest";
import * as E from "fp-ts/Either";

import { loadModules } from "@covenant/lang/module";
import { typecheckTopLevel } from "@covenant/lang/typecheck";

import { describeTranslateFailureNoLoc } from "../errors";
import { translate, type Translation } from "../translate";
import { ETypes } from "../types";

const translateIn = (defs: string, name = "f") => {
	const loaded = loadModules(`(module m 'k
	  (defschema account balance:integer owner:string)
	  (deftable accounts:{account})
	  ${defs})`);
	if (E.isLeft(loaded)) throw new Error(loaded.left.map(f => f.message).join("\n"));
	const ref = loaded.right["m"]?.refs[name];
	if (!ref) throw new Error(`no definition ${name}`);
	const { topLevel, failures } = typecheckTopLevel(ref, loaded.right);
	if (topLevel.type !== "TopFun" || failures.length > 0) throw new Error(failures.map(f => f.message).join("\n"));
	return translate(topLevel.info, topLevel.args, topLevel.funType.result, topLevel.body);
};

const translated = (defs: string): Translation => {
	const result = translateIn(defs);
	if (E.isLeft(result)) throw new Error(describeTranslateFailureNoLoc(result.left.failure));
	return result.right;
};

const x = { type: "Var", id: 1, name: "x", ety: ETypes.Int };

describe("term translation", () => {
	it("lowers conditionals and comparisons", () => {
		const { term, tagAllocs } = translated("(defun f:bool (x:integer) (if (< x 10) true false))");
		expect(term).toEqual({
			type: "If",
			cond: { type: "Compare", op: "Lt", left: x, right: { type: "Lit", value: { type: "Int", value: 10n } } },
			then: { type: "Lit", value: { type: "Bool", value: true } },
			else: { type: "Lit", value: { type: "Bool", value: false } },
		});
		expect(tagAllocs).toEqual([]);
	});

	it("gives let bindings fresh identifiers and tags", () => {
		const { term, tagAllocs } = translated("(defun f:integer (x:integer) (let ((y (+ x 1))) y))");
		expect(term).toEqual({
			type: "Let",
			id: 2,
			name: "y",
			tag: 0,
			value: { type: "Arith", op: "Add", left: x, right: { type: "Lit", value: { type: "Int", value: 1n } }, ety: ETypes.Int },
			body: { type: "Var", id: 2, name: "y", ety: ETypes.Int },
		});
		expect(tagAllocs).toMatchObject([{ type: "Var", tag: 0, id: 2, name: "y", ety: ETypes.Int }]);
	});

	it("sequences body forms and tags database access", () => {
		const { term, tagAllocs } = translated(`(defun f:string (id:string)
		  (enforce (>= (at 'balance (read accounts id)) 0) "overdrawn")
		  (update accounts id { "balance": 1 }))`);
		expect(term.type).toBe("Seq");
		expect(tagAllocs.map(t => t.type)).toEqual(["Read", "Write"]);
		expect(tagAllocs[0]).toMatchObject({ tag: 0, table: "accounts", columns: { balance: ETypes.Int, owner: ETypes.Str } });
		expect(term.type === "Seq" && term.rest).toMatchObject({ type: "Write", writeType: "Update", table: "accounts", tag: 1 });
	});

	it("reads keysets named by strings before enforcing them", () => {
		const { term, tagAllocs } = translated(`(defun f:bool () (enforce-keyset "admin"))`);
		expect(term).toMatchObject({ type: "EnforceKeyset", keyset: { type: "ReadKeyset", name: { type: "Lit", value: { type: "Str", value: "admin" } } }, tag: 0 });
		expect(tagAllocs).toMatchObject([{ type: "Auth", tag: 0 }]);
	});

	it("keeps constructs without a model as unsupported terms", () => {
		const { term } = translated(`(defun f:string (s:string) (+ s "!"))`);
		expect(term).toMatchObject({ type: "Unsupported", what: "string concatenation" });
	});

	it("rejects calls to module functions", () => {
		const result = translateIn("(defun g:integer (x:integer) x) (defun f:integer (x:integer) (g x))");
		expect(E.isLeft(result) && describeTranslateFailureNoLoc(result.left.failure)).toBe("Calls to user functions are not yet supported: g");
	});

	it("rejects list literals", () => {
		const result = translateIn("(defun f:integer () (length [1 2]))");
		expect(E.isLeft(result) && describeTranslateFailureNoLoc(result.left.failure)).toBe("Analysis of list literals is not supported");
	});

	it("rejects untranslatable signatures", () => {
		const result = translateIn("(defun f:integer (xs:[integer]) 1)");
		expect(E.isLeft(result) && describeTranslateFailureNoLoc(result.left.failure)).toBe("couldn't translate argument type of 'xs': [integer]");
	});
});
