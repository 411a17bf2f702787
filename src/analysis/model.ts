import type { Bool, Context, Expr, Model as Z3Model, Sort } from "z3-solver";
import { match } from "ts-pattern";

import { render, type Location } from "@covenant/shared/provenance";

import type { Env } from "./env";
import { showEType } from "./types";
import type { ArgBinding, EType, TagAllocation, TagId, VarId } from "./types";

export type Z3 = Context<"main">;

/** Where an enforced keyset came from. */
export type Provenance = { type: "Named"; name: string } | { type: "Cell"; table: string; column: string; key: Expr<"main"> } | { type: "Argument"; name: string };

/** A symbolic value: a solver expression of the sort `ety` maps to, or an object of such values. */
export type AVal = { type: "Sym"; ety: EType; expr: Expr<"main">; prov?: Provenance } | { type: "Obj"; fields: Record<string, AVal> };

export type ModelArg = ArgBinding & { value: AVal };

export type TaggedRow = { table: string; location: Location; key: Expr<"main">; row: Record<string, AVal>; reached: Bool<"main"> };

export type ModelTags = {
	reads: Map<TagId, TaggedRow>;
	writes: Map<TagId, TaggedRow>;
	auths: Map<TagId, { location: Location; authorized: Bool<"main">; reached: Bool<"main"> }>;
	vars: Map<TagId, { id: VarId; name: string; location: Location; value: AVal }>;
};

/** The symbolic model of one function: its arguments, its result and every tagged sub-expression. */
export type Model = { args: Map<VarId, ModelArg>; result: ModelArg; tags: ModelTags; ksProvs: Map<TagId, Provenance> };

/**
 * Sorts and literal constants of one solver session. String and keyset values are elements of
 * uninterpreted sorts; distinct string literals are distinct constants.
 */
export type Symbolic = {
	Z3: Z3;
	sorts: { Str: Sort<"main">; KeySet: Sort<"main"> };
	sortOf: (ety: EType) => Sort<"main">;
	fresh: (name: string, ety: EType) => AVal;
	string: (value: string) => Expr<"main">;
	keyset: (name: string) => Expr<"main">;
	/** Every string literal used so far. */
	literals: Map<string, Expr<"main">>;
};

export const symbolic = (Z3: Z3): Symbolic => {
	const sorts = { Str: Z3.Sort.declare("String"), KeySet: Z3.Sort.declare("KeySet") };
	const literals = new Map<string, Expr<"main">>();

	const sortOf = (ety: EType): Sort<"main"> =>
		match(ety)
			.with({ type: "Int" }, { type: "Time" }, () => Z3.Int.sort())
			.with({ type: "Decimal" }, () => Z3.Real.sort())
			.with({ type: "Bool" }, () => Z3.Bool.sort())
			.with({ type: "Str" }, () => sorts.Str)
			.with({ type: "KeySet" }, () => sorts.KeySet)
			.with({ type: "Object" }, () => {
				throw new Error("objects have no single sort");
			})
			.exhaustive();

	const fresh = (name: string, ety: EType): AVal =>
		ety.type === "Object"
			? { type: "Obj", fields: Object.fromEntries(Object.entries(ety.fields).map(([k, f]) => [k, fresh(`${name}.${k}`, f)])) }
			: { type: "Sym", ety, expr: Z3.Const(name, sortOf(ety)) };

	const string = (value: string) => {
		const existing = literals.get(value);
		if (existing) {
			return existing;
		}
		const lit = Z3.Const(`str:${JSON.stringify(value)}`, sorts.Str);
		literals.set(value, lit);
		return lit;
	};

	const keyset = (name: string) => Z3.Const(`keyset:${name}`, sorts.KeySet);

	return { Z3, sorts, sortOf, fresh, string, keyset, literals };
};

/** Allocates a symbolic value for the result and every argument of the environment. */
export const allocArgs = (sym: Symbolic, env: Env): { args: Map<VarId, ModelArg>; result: ModelArg } => {
	const alloc = (b: ArgBinding): ModelArg => ({ ...b, value: sym.fresh(`arg.${b.name}`, b.ety) });
	const result = alloc(env.result);
	const args = new Map(env.args.map((b): [VarId, ModelArg] => [b.id, alloc(b)]));
	args.set(result.id, result);
	return { args, result };
};

/** Allocates fresh symbolic values for every tag. The analysis equates them with what they track. */
export const allocModelTags = (sym: Symbolic, tagAllocs: TagAllocation[]): ModelTags => {
	const { Z3 } = sym;
	const tags: ModelTags = { reads: new Map(), writes: new Map(), auths: new Map(), vars: new Map() };
	const row = (prefix: string, table: string, location: Location, columns: Record<string, EType>): TaggedRow => ({
		table,
		location,
		key: Z3.Const(`${prefix}.key`, sym.sorts.Str),
		row: Object.fromEntries(Object.entries(columns).map(([c, ety]) => [c, sym.fresh(`${prefix}.${c}`, ety)])),
		reached: Z3.Bool.const(`${prefix}.reached`),
	});
	tagAllocs.forEach(alloc =>
		match(alloc)
			.with({ type: "Read" }, ({ tag, table, columns, location }) => tags.reads.set(tag, row(`tag${tag}.read.${table}`, table, location, columns)))
			.with({ type: "Write" }, ({ tag, table, columns, location }) => tags.writes.set(tag, row(`tag${tag}.write.${table}`, table, location, columns)))
			.with({ type: "Auth" }, ({ tag, location }) =>
				tags.auths.set(tag, { location, authorized: Z3.Bool.const(`tag${tag}.auth`), reached: Z3.Bool.const(`tag${tag}.auth.reached`) }),
			)
			.with({ type: "Var" }, ({ tag, id, name, ety, location }) => tags.vars.set(tag, { id, name, location, value: sym.fresh(`tag${tag}.var.${name}`, ety) }))
			.exhaustive(),
	);
	return tags;
};

export type Concrete =
	| { type: "Int"; value: bigint }
	| { type: "Decimal"; value: string }
	| { type: "Bool"; value: boolean }
	| { type: "Str"; value: string; literal: boolean }
	| { type: "Time"; value: bigint }
	| { type: "KeySet"; value: string }
	| { type: "Object"; fields: Record<string, Concrete> }
	| { type: "Unknown"; value: string };

export type SaturatedModel = {
	args: { name: string; ety: EType; value: Concrete; location: Location }[];
	result: { ety: EType; value: Concrete };
	vars: { name: string; value: Concrete; location: Location }[];
	reads: { table: string; key: Concrete; row: Record<string, Concrete>; location: Location }[];
	writes: { table: string; key: Concrete; row: Record<string, Concrete>; location: Location }[];
	auths: { location: Location; authorized: boolean; provenance?: string }[];
};

const rational = (numerator: bigint, denominator: bigint): string => {
	if (denominator === 1n) {
		return `${numerator}.0`;
	}
	let d = denominator;
	let scale = 0;
	while (d % 10n === 0n) {
		d /= 10n;
		scale++;
	}
	while (d % 2n === 0n || d % 5n === 0n) {
		const factor = d % 2n === 0n ? 2n : 5n;
		d /= factor;
		scale++;
	}
	if (d !== 1n) {
		return `${numerator}/${denominator}`;
	}
	const scaled = (numerator * 10n ** BigInt(scale)) / denominator;
	const negative = scaled < 0n;
	const digits = (negative ? -scaled : scaled).toString().padStart(scale + 1, "0");
	return `${negative ? "-" : ""}${digits.slice(0, -scale)}.${digits.slice(-scale)}`;
};

/**
 * Resolves every symbolic value of `model` against a satisfying assignment. This has to happen
 * while the solver session that produced `z3Model` is still open.
 */
export const saturateModel = (sym: Symbolic, model: Model, z3Model: Z3Model<"main">): SaturatedModel => {
	const { Z3 } = sym;
	const literalNames = [...sym.literals].map(([value, expr]) => ({ value, name: z3Model.eval(expr, true).toString() }));

	const concrete = (v: AVal): Concrete => {
		if (v.type === "Obj") {
			return { type: "Object", fields: Object.fromEntries(Object.entries(v.fields).map(([k, f]) => [k, concrete(f)])) };
		}
		return scalar(v.ety, v.expr);
	};

	const scalar = (ety: EType, expr: Expr<"main">): Concrete => {
		const e = z3Model.eval(expr, true);
		return match(ety)
			.with({ type: "Int" }, { type: "Time" }, ({ type }): Concrete => (Z3.isIntVal(e) ? { type, value: e.value() } : { type: "Unknown", value: e.toString() }))
			.with({ type: "Decimal" }, (): Concrete => {
				if (Z3.isRealVal(e)) {
					const { numerator, denominator } = e.value();
					return { type: "Decimal", value: rational(numerator, denominator) };
				}
				return Z3.isIntVal(e) ? { type: "Decimal", value: rational(e.value(), 1n) } : { type: "Unknown", value: e.toString() };
			})
			.with({ type: "Bool" }, (): Concrete => ({ type: "Bool", value: Z3.isTrue(e) }))
			.with({ type: "Str" }, (): Concrete => {
				const name = e.toString();
				const lit = literalNames.find(l => l.name === name);
				return lit ? { type: "Str", value: lit.value, literal: true } : { type: "Str", value: name, literal: false };
			})
			.with({ type: "KeySet" }, (): Concrete => ({ type: "KeySet", value: e.toString() }))
			.with({ type: "Object" }, (): Concrete => ({ type: "Unknown", value: e.toString() }))
			.exhaustive();
	};

	const holds = (b: Bool<"main">) => Z3.isTrue(z3Model.eval(b, true));

	const rows = (tagged: Map<TagId, TaggedRow>) =>
		[...tagged.values()]
			.filter(r => holds(r.reached))
			.map(r => ({ table: r.table, location: r.location, key: scalar({ type: "Str" }, r.key), row: Object.fromEntries(Object.entries(r.row).map(([c, v]) => [c, concrete(v)])) }));

	const showProv = (p: Provenance): string =>
		match(p)
			.with({ type: "Named" }, ({ name }) => `keyset '${name}'`)
			.with({ type: "Argument" }, ({ name }) => `argument ${name}`)
			.with({ type: "Cell" }, ({ table, column, key }) => `${table}.${column} of row ${showConcrete(scalar({ type: "Str" }, key))}`)
			.exhaustive();

	const args = [...model.args.values()].filter(a => a.id !== model.result.id).sort((a, b) => a.id - b.id);
	return {
		args: args.map(a => ({ name: a.name, ety: a.ety, value: concrete(a.value), location: a.location })),
		result: { ety: model.result.ety, value: concrete(model.result.value) },
		vars: [...model.tags.vars.values()].map(v => ({ name: v.name, value: concrete(v.value), location: v.location })),
		reads: rows(model.tags.reads),
		writes: rows(model.tags.writes),
		auths: [...model.tags.auths.entries()]
			.filter(([, a]) => holds(a.reached))
			.map(([tag, a]) => {
				const prov = model.ksProvs.get(tag);
				return { location: a.location, authorized: holds(a.authorized), provenance: prov ? showProv(prov) : undefined };
			}),
	};
};

export const showConcrete = (c: Concrete): string =>
	match(c)
		.with({ type: "Int" }, { type: "Time" }, ({ value }) => value.toString())
		.with({ type: "Decimal" }, ({ value }) => value)
		.with({ type: "Bool" }, ({ value }) => (value ? "true" : "false"))
		.with({ type: "Str" }, ({ value, literal }) => (literal ? JSON.stringify(value) : value))
		.with({ type: "KeySet" }, { type: "Unknown" }, ({ value }) => value)
		.with({ type: "Object" }, ({ fields }) => `{ ${Object.entries(fields).map(([k, v]) => `${k}: ${showConcrete(v)}`).join(", ")} }`)
		.exhaustive();

const showRow = (row: Record<string, Concrete>) =>
	Object.entries(row)
		.map(([c, v]) => `${c}: ${showConcrete(v)}`)
		.join(", ");

export const showModel = (model: SaturatedModel): string => {
	const lines: string[] = [];
	const section = (title: string, items: string[]) => {
		if (items.length > 0) {
			lines.push(`  ${title}:`, ...items.map(i => `    ${i}`));
		}
	};
	section(
		"Arguments",
		model.args.map(a => `${a.name} := ${showConcrete(a.value)} (${showEType(a.ety)})`),
	);
	section(
		"Variables",
		model.vars.map(v => `${v.name} := ${showConcrete(v.value)} at ${render(v.location)}`),
	);
	section(
		"Reads",
		model.reads.map(r => `${r.table} ${showConcrete(r.key)} => { ${showRow(r.row)} } at ${render(r.location)}`),
	);
	section(
		"Writes",
		model.writes.map(w => `${w.table} ${showConcrete(w.key)} => { ${showRow(w.row)} } at ${render(w.location)}`),
	);
	section(
		"Keysets",
		model.auths.map(a => `${a.authorized ? "authorized" : "not authorized"}${a.provenance ? ` by ${a.provenance}` : ""} at ${render(a.location)}`),
	);
	lines.push(`  Result:`, `    ${showConcrete(model.result.value)} (${showEType(model.result.ety)})`);
	return lines.join("\n");
};
