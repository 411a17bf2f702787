import { describe, it, expect } from "vitest";

import { escapeAnchor, renderFeatureDocs } from "../docs";

describe("feature docs", () => {
	it("escapes anchors", () => {
		expect(escapeAnchor("+")).toBe("plus");
		expect(escapeAnchor("-")).toBe("minus");
		expect(escapeAnchor(">=")).toBe("gteq");
		expect(escapeAnchor("!=")).toBe("bangeq");
		expect(escapeAnchor("add-time")).toBe("add-time");
	});

	const docs = renderFeatureDocs();
	const lines = docs.split("\n");

	it("opens with a title and one heading per group", () => {
		expect(lines[0]).toBe("# Property and Invariant Functions {#properties-and-invariants}");
		expect(lines.filter(l => l.startsWith("## "))).toEqual([
			"## Numerical operators {#numerical-operators}",
			"## Logical operators {#logical-operators}",
			"## Object operators {#object-operators}",
			"## String operators {#string-operators}",
			"## Temporal operators {#temporal-operators}",
			"## Quantification operators {#quantification-operators}",
			"## Transactional operators {#transactional-operators}",
			"## Database operators {#database-operators}",
			"## Authorization operators {#authorization-operators}",
		]);
	});

	it("anchors a shared symbol once", () => {
		expect(lines.filter(l => l.startsWith("### \\+"))).toEqual(["### \\+ {#Fplus}", "### \\+", "### \\+"]);
		expect(lines.filter(l => l.startsWith("### \\-"))).toEqual(["### \\- {#Fminus}", "### \\-"]);
	});

	it("renders a usage with its arguments and availability", () => {
		const section = [
			"### when {#Fwhen}",
			"",
			"```lisp",
			"(when x y)",
			"```",
			"",
			"* takes `x`: `bool`",
			"* takes `y`: `bool`",
			"* produces `bool`",
			"",
			"Logical implication. Equivalent to `(or (not x) y)`.",
			"",
			"Supported in either invariants or properties.",
		].join("\n");
		expect(docs).toContain(section);
	});

	it("renders binders and unconstrained type variables", () => {
		const start = lines.indexOf("### forall {#Fforall}");
		expect(lines.slice(start + 6, start + 11)).toEqual(["* binds `a`", "* takes `y`: _r_", "* produces _r_", "* where _a_ is _any type_", "* where _r_ is _any type_"]);
		expect(docs).toContain("Supported in properties only.");
	});
});
