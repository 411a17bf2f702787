import { describe, it, expect } from "vitest";
import * as E from "fp-ts/Either";

import { read } from "../reader";
import { display, type Exp } from "../exp";

const readAll = (source: string): Exp[] => {
	const result = read(source, "test.cov");
	if (E.isLeft(result)) {
		throw new Error(result.left.message);
	}
	return result.right;
};

describe("reader", () => {
	it("reads literals", () => {
		const [int, dec, str, sym, bool] = readAll(`42 -1.5 "a\\"b" 'admin true`);
		expect(int).toMatchObject({ type: "Lit", literal: { type: "Integer", value: 42n } });
		expect(dec).toMatchObject({ type: "Lit", literal: { type: "Decimal", value: "-1.5" } });
		expect(str).toMatchObject({ type: "Lit", literal: { type: "String", value: 'a"b' } });
		expect(sym).toMatchObject({ type: "Lit", literal: { type: "Symbol", value: "admin" } });
		expect(bool).toMatchObject({ type: "Lit", literal: { type: "Bool", value: true } });
	});

	it("reads annotated atoms", () => {
		const [x, row, t, xs] = readAll("x:integer row:object{account} accounts:{account} xs:[decimal]");
		expect(x).toMatchObject({ type: "Atom", name: "x", annotation: { type: "Prim", name: "integer" } });
		expect(row).toMatchObject({ type: "Atom", annotation: { type: "Schema", kind: "object", schema: "account" } });
		expect(t).toMatchObject({ type: "Atom", annotation: { type: "Schema", kind: "bare", schema: "account" } });
		expect(xs).toMatchObject({ type: "Atom", annotation: { type: "List", elem: { type: "Prim", name: "decimal" } } });
	});

	it("reads nested forms, objects and metadata", () => {
		const exps = readAll(`(defun f (x) @doc "d" [1 2] { "a": x, "b" := 2 })`);
		expect(exps).toHaveLength(1);
		const [form] = exps;
		expect(form && display(form)).toBe(`(defun f (x) @doc "d" [1 2] { "a" : x, "b" := 2 })`);
	});

	it("skips comments and whitespace", () => {
		const exps = readAll("; leading\n(a) ; trailing\n(b)");
		expect(exps.map(display)).toEqual(["(a)", "(b)"]);
	});

	it("records 1-based locations with the source text", () => {
		const [, second] = readAll("(a)\n  (b c)");
		expect(second?.location.from).toMatchObject({ line: 2, column: 3 });
		expect(second?.location.code).toBe("(b c)");
		expect(second?.location.file).toBe("test.cov");
	});

	it("fails on unbalanced input", () => {
		const result = read("(a b", "test.cov");
		expect(E.isLeft(result) && result.left.message).toBe("unexpected end of input");
	});

	it("fails on unknown annotation types", () => {
		const result = read("x:money");
		expect(E.isLeft(result) && result.left.message).toBe("unknown type 'money'");
		expect(E.isLeft(result) && result.left.location.from).toMatchObject({ line: 1, column: 3 });
	});

	it("fails on a mismatched closing delimiter", () => {
		const result = read("(a]");
		expect(E.isLeft(result) && result.left.message).toBe("unexpected ']'");
	});
});
