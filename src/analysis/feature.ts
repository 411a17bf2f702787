import * as O from "fp-ts/Option";

import catalog from "./features.json";

/** Every operator of the property and invariant language. */
export const FEATURES = [
	"Addition",
	"Subtraction",
	"Multiplication",
	"Division",
	"Exponentiation",
	"Logarithm",
	"NumericNegation",
	"SquareRoot",
	"NaturalLogarithm",
	"Exponential",
	"AbsoluteValue",
	"BankersRound",
	"CeilingRound",
	"FloorRound",
	"Modulus",
	"GreaterThan",
	"LessThan",
	"GreaterThanOrEqual",
	"LessThanOrEqual",
	"Equality",
	"Inequality",
	"LogicalConjunction",
	"LogicalDisjunction",
	"LogicalNegation",
	"LogicalImplication",
	"ObjectProjection",
	"ObjectMerge",
	"StringLength",
	"StringConcatenation",
	"TemporalAddition",
	"UniversalQuantification",
	"ExistentialQuantification",
	"TransactionAborts",
	"TransactionSucceeds",
	"FunctionResult",
	"TableWritten",
	"TableRead",
	"CellDelta",
	"ColumnDelta",
	"RowRead",
	"RowWritten",
	"RowReadCount",
	"RowWriteCount",
	"AuthorizedBy",
	"RowEnforced",
] as const;

export type Feature = (typeof FEATURES)[number];

export type Availability = "PropOnly" | "InvAndProp";

/** A type in a usage signature: a concrete type name, or a variable bound in `constraints`. */
export type FeatureType = { type: "Con"; name: string } | { type: "Var"; name: string };

export type FormType =
	| { type: "Fun"; binds?: string; args: { name: string; type: FeatureType }[]; result: FeatureType }
	| { type: "Sym"; result: FeatureType };

/** An empty `oneOf` leaves the variable unconstrained. */
export type Usage = { template: string; constraints: { var: string; oneOf: string[] }[]; form: FormType };

export type FeatureDoc = {
	feature: Feature;
	group: string;
	symbol: string;
	availability: Availability;
	description: string;
	usages: Usage[];
};

type RawUsage = {
	template: string;
	constraints: { var: string; oneOf: string[] }[];
	sym: boolean;
	bindings: string | null;
	args: { name: string; type: string }[];
	result: string;
};
type RawFeature = { feature: string; group: string; symbol: string; availability: string; description: string; usages: RawUsage[] };

const usage = (raw: RawUsage): Usage => {
	const vars = raw.constraints.map(c => c.var);
	const ty = (name: string): FeatureType => (vars.includes(name) ? { type: "Var", name } : { type: "Con", name });
	const form: FormType = raw.sym
		? { type: "Sym", result: ty(raw.result) }
		: { type: "Fun", binds: raw.bindings ?? undefined, args: raw.args.map(a => ({ name: a.name, type: ty(a.type) })), result: ty(raw.result) };
	return { template: raw.template, constraints: raw.constraints, form };
};

const load = (raws: RawFeature[]): ReadonlyMap<Feature, FeatureDoc> => {
	const docs = new Map<Feature, FeatureDoc>();
	raws.forEach(raw => {
		const feature = FEATURES.find(f => f === raw.feature);
		if (!feature) {
			throw new Error(`Unknown feature in catalog: ${raw.feature}`);
		}
		docs.set(feature, {
			feature,
			group: raw.group,
			symbol: raw.symbol,
			availability: raw.availability === "PropOnly" ? "PropOnly" : "InvAndProp",
			description: raw.description,
			usages: raw.usages.map(usage),
		});
	});
	const missing = FEATURES.filter(f => !docs.has(f));
	if (missing.length > 0) {
		throw new Error(`Features missing from catalog: ${missing.join(", ")}`);
	}
	return docs;
};

const loaded = load(catalog);

export const doc = (feature: Feature): FeatureDoc => {
	const d = loaded.get(feature);
	if (!d) {
		throw new Error(`Feature missing from catalog: ${feature}`);
	}
	return d;
};

export const symbol = (feature: Feature) => doc(feature).symbol;
export const availability = (feature: Feature) => doc(feature).availability;

/** Features sharing a symbol, e.g. `+` is addition, string concatenation and object merge. */
export const featuresBySymbol = (sym: string): Feature[] => FEATURES.filter(f => doc(f).symbol === sym);

export const featuresByAvailability = (av: Availability): Feature[] => FEATURES.filter(f => doc(f).availability === av);

/*
 * Operator classes. Each is a closed union with a bidirectional symbol table built once from the catalog.
 */

export type OpTable<Op extends string> = { bySymbol: ReadonlyMap<string, Op>; byOp: ReadonlyMap<Op, string> };

const opTable = <Op extends string>(entries: [Feature, Op][]): OpTable<Op> => ({
	bySymbol: new Map(entries.map(([f, op]): [string, Op] => [symbol(f), op])),
	byOp: new Map(entries.map(([f, op]): [Op, string] => [op, symbol(f)])),
});

export const parseOperator = <Op extends string>(table: OpTable<Op>, name: string): O.Option<Op> => O.fromNullable(table.bySymbol.get(name));

export const operatorSymbol = <Op extends string>(table: OpTable<Op>, op: Op): string => table.byOp.get(op) ?? op;

export type ArithOp = "Add" | "Sub" | "Mul" | "Div" | "Pow" | "Log" | "Mod";
export const ArithOps = opTable<ArithOp>([
	["Addition", "Add"],
	["Subtraction", "Sub"],
	["Multiplication", "Mul"],
	["Division", "Div"],
	["Exponentiation", "Pow"],
	["Logarithm", "Log"],
	["Modulus", "Mod"],
]);

export type UnaryArithOp = "Negate" | "Sqrt" | "Ln" | "Exp" | "Abs";
export const UnaryArithOps = opTable<UnaryArithOp>([
	["NumericNegation", "Negate"],
	["SquareRoot", "Sqrt"],
	["NaturalLogarithm", "Ln"],
	["Exponential", "Exp"],
	["AbsoluteValue", "Abs"],
]);

export type ComparisonOp = "Gt" | "Lt" | "Gte" | "Lte" | "Eq" | "Neq";
export const ComparisonOps = opTable<ComparisonOp>([
	["GreaterThan", "Gt"],
	["LessThan", "Lt"],
	["GreaterThanOrEqual", "Gte"],
	["LessThanOrEqual", "Lte"],
	["Equality", "Eq"],
	["Inequality", "Neq"],
]);

export type LogicalOp = "And" | "Or" | "Not";
export const LogicalOps = opTable<LogicalOp>([
	["LogicalConjunction", "And"],
	["LogicalDisjunction", "Or"],
	["LogicalNegation", "Not"],
]);

export type RoundingLikeOp = "Round" | "Ceiling" | "Floor";
export const RoundingLikeOps = opTable<RoundingLikeOp>([
	["BankersRound", "Round"],
	["CeilingRound", "Ceiling"],
	["FloorRound", "Floor"],
]);

export type WriteType = "Insert" | "Update" | "Write";
export const WriteTypes: OpTable<WriteType> = {
	bySymbol: new Map<string, WriteType>([
		["insert", "Insert"],
		["update", "Update"],
		["write", "Write"],
	]),
	byOp: new Map<WriteType, string>([
		["Insert", "insert"],
		["Update", "update"],
		["Write", "write"],
	]),
};
