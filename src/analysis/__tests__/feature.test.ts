import { describe, it, expect } from "vitest";
import * as O from "fp-ts/Option";

import {
	ArithOps,
	ComparisonOps,
	FEATURES,
	LogicalOps,
	RoundingLikeOps,
	UnaryArithOps,
	WriteTypes,
	availability,
	doc,
	featuresByAvailability,
	featuresBySymbol,
	operatorSymbol,
	parseOperator,
	symbol,
	type OpTable,
} from "../feature";

const roundTrips = <Op extends string>(table: OpTable<Op>) => {
	table.byOp.forEach((sym, op) => {
		expect(parseOperator(table, sym)).toEqual(O.some(op));
		expect(operatorSymbol(table, op)).toBe(sym);
	});
};

describe("feature catalog", () => {
	it("documents every feature", () => {
		FEATURES.forEach(f => {
			const d = doc(f);
			expect(d.feature).toBe(f);
			expect(d.usages.length).toBeGreaterThan(0);
		});
	});

	it("shares symbols between overloaded features", () => {
		expect(featuresBySymbol("+")).toEqual(["Addition", "ObjectMerge", "StringConcatenation"]);
		expect(featuresBySymbol("-")).toEqual(["Subtraction", "NumericNegation"]);
	});

	it("marks database and transactional features as property-only", () => {
		const propOnly = featuresByAvailability("PropOnly");
		expect(propOnly).toContain("TableWritten");
		expect(propOnly).toContain("TransactionAborts");
		expect(propOnly).not.toContain("Addition");
		expect(availability("LogicalImplication")).toBe("InvAndProp");
	});

	it("reads symbol forms and binders from usages", () => {
		expect(symbol("TransactionSucceeds")).toBe("success");
		expect(doc("TransactionSucceeds").usages[0]?.form).toEqual({ type: "Sym", result: { type: "Con", name: "bool" } });
		const forall = doc("UniversalQuantification").usages[0]?.form;
		expect(forall?.type === "Fun" && forall.binds).toBe("a");
		expect(forall?.type === "Fun" && forall.result).toEqual({ type: "Var", name: "r" });
	});

	it("maps operator symbols both ways", () => {
		roundTrips(ArithOps);
		roundTrips(UnaryArithOps);
		roundTrips(ComparisonOps);
		roundTrips(LogicalOps);
		roundTrips(RoundingLikeOps);
		roundTrips(WriteTypes);
	});

	it("does not parse symbols of other operator classes", () => {
		expect(parseOperator(ArithOps, ">=")).toEqual(O.none);
		expect(parseOperator(ComparisonOps, ">=")).toEqual(O.some("Gte"));
		expect(parseOperator(ArithOps, "mod")).toEqual(O.some("Mod"));
	});
});
