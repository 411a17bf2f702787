import { describe, it, expect } from "vitest";
import * as E from "fp-ts/Either";

import { describeLoadFailure, loadModule, loadModules, type ModuleData } from "../module";

const load = (source: string, name = "bank"): ModuleData => {
	const result = loadModule(source, name, "bank.cov");
	if (E.isLeft(result)) {
		throw new Error(result.left.map(describeLoadFailure).join("\n"));
	}
	return result.right;
};

const BANK = `
(module bank 'bank-admin
  "A tiny bank"
  (defschema account
    "Balances"
    @invariants [(>= balance 0)]
    balance:integer
    owner:string)
  (deftable accounts:{account})
  (defconst MIN 10)
  (defun transfer:string (from:string amount:integer)
    "Moves funds"
    @property (valid success)
    (enforce (> amount 0) "positive")
    (update accounts from { "balance": amount })))
`;

describe("modules", () => {
	it("loads a module with its governing keyset and docstring", () => {
		const data = load(BANK);
		expect(data.module.name).toBe("bank");
		expect(data.module.keyset).toBe("bank-admin");
		expect(data.module.meta["doc"]).toMatchObject({ type: "Lit", literal: { type: "String", value: "A tiny bank" } });
		expect(Object.keys(data.refs)).toEqual(["account", "accounts", "MIN", "transfer"]);
	});

	it("splits metadata from definition bodies", () => {
		const { refs } = load(BANK);
		const transfer = refs["transfer"]?.definition;
		expect(transfer?.type).toBe("Defun");
		if (transfer?.type !== "Defun") return;
		expect(Object.keys(transfer.meta).sort()).toEqual(["doc", "property"]);
		expect(transfer.body).toHaveLength(2);
		expect(transfer.args.map(a => a.name)).toEqual(["from", "amount"]);
		expect(transfer.returnAnn).toMatchObject({ type: "Prim", name: "string" });
	});

	it("reads schema fields and invariants", () => {
		const account = load(BANK).refs["account"]?.definition;
		if (account?.type !== "Defschema") throw new Error("expected a schema");
		expect(account.fields.map(f => f.name)).toEqual(["balance", "owner"]);
		expect(account.meta["invariants"]).toMatchObject({ type: "List", delimiter: "bracket" });
	});

	it("a lone string body is the body, not a docstring", () => {
		const f = load(`(module m 'k (defun f:string () "hello"))`, "m").refs["f"]?.definition;
		if (f?.type !== "Defun") throw new Error("expected a function");
		expect(f.meta["doc"]).toBeUndefined();
		expect(f.body).toHaveLength(1);
	});

	it("rejects unannotated schema fields", () => {
		const result = loadModules(`(module m 'k (defschema s a:integer b))`, "m.cov");
		expect(E.isLeft(result) && result.left.map(describeLoadFailure)).toEqual(["m.cov:1:37: defschema s: fields must be annotated names, found b"]);
	});

	it("rejects duplicate definitions", () => {
		const result = loadModules(`(module m 'k (defconst A 1) (defconst A 2))`);
		expect(E.isLeft(result) && result.left.map(f => f.message)).toEqual(["module m: duplicate definition of 'A'"]);
	});

	it("rejects unknown definition forms", () => {
		const result = loadModules(`(module m 'k (defpact p () 1))`);
		expect(E.isLeft(result) && result.left.map(f => f.message)).toEqual(["unknown definition form 'defpact'"]);
	});

	it("requires a keyset name", () => {
		const result = loadModules(`(module m (defconst A 1))`);
		expect(E.isLeft(result) && result.left.map(f => f.message)).toEqual(["module m: expected a governing keyset name"]);
	});

	it("reports a missing module", () => {
		const result = loadModule(`(module m 'k (defconst A 1))`, "other");
		expect(E.isLeft(result) && result.left.map(f => f.message)).toEqual(["no module named 'other'"]);
	});
});
