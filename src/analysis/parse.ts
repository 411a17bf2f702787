import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";
import { match } from "ts-pattern";

import * as X from "@covenant/syntax/exp";
import type { Exp } from "@covenant/syntax/exp";

import { ArithOps, ComparisonOps, LogicalOps, RoundingLikeOps, UnaryArithOps, availability, featuresBySymbol, parseOperator } from "./feature";
import type { Feature } from "./feature";
import { ETypes, etypeEquals, isNumericE, showEType } from "./types";
import type { Check, EType, Invariant, Prop, TableEnv, VarId } from "./types";

class ParseError extends Error {}

type Typed = { prop: Prop; ety: EType };

type Mode =
	| { type: "Property"; tableEnv: TableEnv; nameEnv: Record<string, VarId>; idEnv: Map<VarId, EType>; next: () => VarId }
	| { type: "Invariant"; fieldEnv: Record<string, EType> };

const PRIM_ETYPES: Record<string, EType> = {
	integer: ETypes.Int,
	decimal: ETypes.Decimal,
	string: ETypes.Str,
	bool: ETypes.Bool,
	time: ETypes.Time,
	keyset: ETypes.KeySet,
};

const fail = (message: string): never => {
	throw new ParseError(message);
};

/** Feature named by a head symbol, preferring the first catalog entry for shared symbols. */
const featureOf = (sym: string): Feature | undefined => featuresBySymbol(sym)[0];

const parseProp = (mode: Mode, exp: Exp): Typed => {
	const requireProp = (sym: string) => {
		const feature = featureOf(sym);
		if (mode.type === "Invariant" && feature && availability(feature) === "PropOnly") {
			fail(`${sym} is not available in invariants`);
		}
	};

	const expectType = (sym: string, t: Typed, ok: (ety: EType) => boolean, wanted: string) => {
		if (!ok(t.ety)) {
			fail(`${sym}: expected ${wanted}, found ${showEType(t.ety)}`);
		}
	};

	const arity = (sym: string, args: Exp[], ...counts: number[]) => {
		if (!counts.includes(args.length)) {
			fail(`${sym}: expected ${counts.join(" or ")} arguments, found ${args.length}`);
		}
	};

	const tableName = (e: Exp | undefined): string => {
		const name = e === undefined ? undefined : e.type === "Atom" ? e.name : X.stringish(e);
		if (name === undefined || mode.type !== "Property") {
			return fail(`expected a table name, found ${e ? X.display(e) : "nothing"}`);
		}
		if (!mode.tableEnv[name]) {
			return fail(`unknown table ${name}`);
		}
		return name;
	};

	const columnOf = (table: string, e: Exp | undefined): [string, EType] => {
		const name = e === undefined ? undefined : e.type === "Atom" ? e.name : X.stringish(e);
		const ety = name !== undefined && mode.type === "Property" ? mode.tableEnv[table]?.[name] : undefined;
		if (name === undefined || ety === undefined) {
			return fail(`unknown column ${name ?? "?"} of table ${table}`);
		}
		return [name, ety];
	};

	const rowKey = (sym: string, e: Exp | undefined): Prop => {
		if (!e) {
			return fail(`${sym}: missing row key`);
		}
		const row = parseProp(mode, e);
		expectType(sym, row, ety => ety.type === "Str", "string");
		return row.prop;
	};

	const atom = (name: string): Typed => {
		if (name === "abort" || name === "success") {
			requireProp(name);
			return { prop: { type: name === "abort" ? "Abort" : "Success" }, ety: ETypes.Bool };
		}
		if (mode.type === "Invariant") {
			const ety = mode.fieldEnv[name];
			return ety ? { prop: { type: "Column", name, ety }, ety } : fail(`unbound variable ${name}`);
		}
		const id = mode.nameEnv[name];
		const ety = id === undefined ? undefined : mode.idEnv.get(id);
		if (id === undefined || ety === undefined) {
			return fail(`unbound variable ${name}`);
		}
		return { prop: { type: "Var", id, name, ety }, ety };
	};

	const numericResult = (sym: string, args: Typed[]): EType => {
		args.forEach(a => expectType(sym, a, isNumericE, "integer or decimal"));
		return args.every(a => a.ety.type === "Int") ? ETypes.Int : ETypes.Decimal;
	};

	const quantifier = (sym: "forall" | "exists", args: Exp[]): Typed => {
		requireProp(sym);
		arity(sym, args, 2);
		const [binders, body] = args;
		if (mode.type !== "Property" || !binders || !body || binders.type !== "List" || binders.items.length === 0) {
			return fail(`${sym}: expected (${sym} (x:type ...) body)`);
		}
		const fresh = mode.next;
		const bound = binders.items.map(b => {
			const ety = b.type === "Atom" && b.annotation?.type === "Prim" ? PRIM_ETYPES[b.annotation.name] : undefined;
			if (b.type !== "Atom" || ety === undefined) {
				return fail(`${sym}: binders must be annotated with a primitive type, found ${X.display(b)}`);
			}
			return { name: b.name, id: fresh(), ety };
		});
		const inner: Mode = {
			...mode,
			nameEnv: { ...mode.nameEnv, ...Object.fromEntries(bound.map(b => [b.name, b.id])) },
			idEnv: new Map([...mode.idEnv, ...bound.map((b): [VarId, EType] => [b.id, b.ety])]),
		};
		const parsedBody = parseProp(inner, body);
		expectType(sym, parsedBody, ety => ety.type === "Bool", "bool");
		const prop = bound.reduceRight<Prop>((acc, b) => ({ type: sym === "forall" ? "Forall" : "Exists", id: b.id, name: b.name, ety: b.ety, body: acc }), parsedBody.prop);
		return { prop, ety: ETypes.Bool };
	};

	const application = (sym: string, argExps: Exp[]): Typed => {
		if (sym === "forall" || sym === "exists") {
			return quantifier(sym, argExps);
		}
		requireProp(sym);

		const db = match(sym)
			.with("table-written", "table-read", (): Typed => {
				arity(sym, argExps, 1);
				return { prop: { type: sym === "table-written" ? "TableWritten" : "TableRead", table: tableName(argExps[0]) }, ety: ETypes.Bool };
			})
			.with("cell-delta", "column-delta", (): Typed => {
				arity(sym, argExps, sym === "cell-delta" ? 3 : 2);
				const table = tableName(argExps[0]);
				const [column, ety] = columnOf(table, argExps[1]);
				if (!isNumericE(ety)) {
					return fail(`${sym}: column ${column} is not numeric`);
				}
				return sym === "cell-delta"
					? { prop: { type: "CellDelta", table, column, row: rowKey(sym, argExps[2]), ety }, ety }
					: { prop: { type: "ColumnDelta", table, column, ety }, ety };
			})
			.with("row-read", "row-written", "row-read-count", "row-write-count", (): Typed => {
				arity(sym, argExps, 2);
				const table = tableName(argExps[0]);
				const row = rowKey(sym, argExps[1]);
				return match(sym)
					.with("row-read", (): Typed => ({ prop: { type: "RowRead", table, row }, ety: ETypes.Bool }))
					.with("row-written", (): Typed => ({ prop: { type: "RowWritten", table, row }, ety: ETypes.Bool }))
					.with("row-read-count", (): Typed => ({ prop: { type: "RowReadCount", table, row }, ety: ETypes.Int }))
					.otherwise((): Typed => ({ prop: { type: "RowWriteCount", table, row }, ety: ETypes.Int }));
			})
			.with("authorized-by", (): Typed => {
				arity(sym, argExps, 1);
				const [k] = argExps;
				const keyset = k === undefined ? undefined : X.stringish(k);
				return keyset === undefined ? fail(`${sym}: expected a keyset name`) : { prop: { type: "AuthorizedBy", keyset }, ety: ETypes.Bool };
			})
			.with("row-enforced", (): Typed => {
				arity(sym, argExps, 3);
				const table = tableName(argExps[0]);
				const [column, ety] = columnOf(table, argExps[1]);
				if (ety.type !== "KeySet") {
					return fail(`${sym}: column ${column} is not a keyset`);
				}
				return { prop: { type: "RowEnforced", table, column, row: rowKey(sym, argExps[2]) }, ety: ETypes.Bool };
			})
			.otherwise(() => undefined);
		if (db) {
			return db;
		}

		const args = argExps.map(a => parseProp(mode, a));
		const [a, b] = args;

		if (sym === "-" && a && args.length === 1) {
			const ety = numericResult(sym, args);
			return { prop: { type: "Unary", op: "Negate", arg: a.prop, ety }, ety };
		}
		if (sym === "+" && a && b && a.ety.type === "Str") {
			expectType(sym, b, ety => ety.type === "Str", "string");
			return { prop: { type: "StrConcat", left: a.prop, right: b.prop }, ety: ETypes.Str };
		}
		if (sym === "+" && a?.ety.type === "Object") {
			return fail("object merge is not supported in properties");
		}

		const arith = parseOperator(ArithOps, sym);
		if (O.isSome(arith)) {
			arity(sym, argExps, 2);
			if (!a || !b) {
				return fail(`${sym}: expected 2 arguments`);
			}
			if (arith.value === "Mod") {
				args.forEach(x => expectType(sym, x, t => t.type === "Int", "integer"));
			}
			const ety = numericResult(sym, args);
			return { prop: { type: "Arith", op: arith.value, left: a.prop, right: b.prop, ety }, ety };
		}

		const unary = parseOperator(UnaryArithOps, sym);
		if (O.isSome(unary)) {
			arity(sym, argExps, 1);
			if (!a) {
				return fail(`${sym}: expected 1 argument`);
			}
			const operand = numericResult(sym, args);
			const ety = unary.value === "Negate" || unary.value === "Abs" ? operand : ETypes.Decimal;
			return { prop: { type: "Unary", op: unary.value, arg: a.prop, ety }, ety };
		}

		const rounding = parseOperator(RoundingLikeOps, sym);
		if (O.isSome(rounding)) {
			arity(sym, argExps, 1, 2);
			if (!a) {
				return fail(`${sym}: expected an argument`);
			}
			expectType(sym, a, isNumericE, "decimal");
			if (b) {
				expectType(sym, b, ety => ety.type === "Int", "integer precision");
			}
			return { prop: { type: "Rounding", op: rounding.value, arg: a.prop, precision: b?.prop }, ety: b ? ETypes.Decimal : ETypes.Int };
		}

		const comparison = parseOperator(ComparisonOps, sym);
		if (O.isSome(comparison)) {
			arity(sym, argExps, 2);
			if (!a || !b) {
				return fail(`${sym}: expected 2 arguments`);
			}
			const ordered = comparison.value !== "Eq" && comparison.value !== "Neq";
			const comparable = (ety: EType) => isNumericE(ety) || ety.type === "Str" || ety.type === "Time" || (!ordered && ety.type !== "Object");
			expectType(sym, a, comparable, ordered ? "an ordered value" : "a comparable value");
			if (!(isNumericE(a.ety) && isNumericE(b.ety)) && !etypeEquals(a.ety, b.ety)) {
				return fail(`${sym}: cannot compare ${showEType(a.ety)} with ${showEType(b.ety)}`);
			}
			return { prop: { type: "Compare", op: comparison.value, left: a.prop, right: b.prop }, ety: ETypes.Bool };
		}

		if (sym === "when") {
			arity(sym, argExps, 2);
			if (!a || !b) {
				return fail(`${sym}: expected 2 arguments`);
			}
			args.forEach(x => expectType(sym, x, ety => ety.type === "Bool", "bool"));
			return { prop: { type: "Logical", op: "Or", args: [{ type: "Logical", op: "Not", args: [a.prop] }, b.prop] }, ety: ETypes.Bool };
		}

		const logical = parseOperator(LogicalOps, sym);
		if (O.isSome(logical)) {
			if (logical.value === "Not") {
				arity(sym, argExps, 1);
			} else if (args.length < 1) {
				return fail(`${sym}: expected at least 1 argument`);
			}
			args.forEach(x => expectType(sym, x, ety => ety.type === "Bool", "bool"));
			return { prop: { type: "Logical", op: logical.value, args: args.map(x => x.prop) }, ety: ETypes.Bool };
		}

		return match(sym)
			.with("at", (): Typed => {
				arity(sym, argExps, 2);
				const key = argExps[0] === undefined ? undefined : X.stringish(argExps[0]);
				if (key === undefined || !b) {
					return fail("at: expected a literal field name and an object");
				}
				if (b.ety.type !== "Object") {
					return fail(`at: expected an object, found ${showEType(b.ety)}`);
				}
				const ety = b.ety.fields[key];
				return ety ? { prop: { type: "At", field: key, object: b.prop, ety }, ety } : fail(`at: no field ${key} in ${showEType(b.ety)}`);
			})
			.with("length", (): Typed => {
				arity(sym, argExps, 1);
				if (!a) {
					return fail("length: expected an argument");
				}
				expectType(sym, a, ety => ety.type === "Str", "string");
				return { prop: { type: "StrLength", arg: a.prop }, ety: ETypes.Int };
			})
			.with("add-time", (): Typed => {
				arity(sym, argExps, 2);
				if (!a || !b) {
					return fail("add-time: expected 2 arguments");
				}
				expectType(sym, a, ety => ety.type === "Time", "time");
				expectType(sym, b, isNumericE, "integer or decimal");
				return { prop: { type: "AddTime", time: a.prop, seconds: b.prop }, ety: ETypes.Time };
			})
			.otherwise(() => fail(`unknown operator ${sym}`));
	};

	return match(exp)
		.with({ type: "Lit" }, ({ literal }): Typed =>
			match(literal)
				.with({ type: "Integer" }, ({ value }): Typed => ({ prop: { type: "IntLit", value }, ety: ETypes.Int }))
				.with({ type: "Decimal" }, ({ value }): Typed => ({ prop: { type: "DecLit", value }, ety: ETypes.Decimal }))
				.with({ type: "String" }, { type: "Symbol" }, ({ value }): Typed => ({ prop: { type: "StrLit", value }, ety: ETypes.Str }))
				.with({ type: "Bool" }, ({ value }): Typed => ({ prop: { type: "BoolLit", value }, ety: ETypes.Bool }))
				.exhaustive(),
		)
		.with({ type: "Atom" }, ({ name }) => atom(name))
		.with({ type: "List", delimiter: "paren" }, list => {
			const [head, ...rest] = list.items;
			if (!head || head.type !== "Atom") {
				return fail(`expected an operator application, found ${X.display(list)}`);
			}
			return application(head.name, rest);
		})
		.otherwise(e => fail(`unexpected ${X.display(e)}`));
};

const running = <A>(act: () => A): E.Either<string, A> => {
	try {
		return E.right(act());
	} catch (e) {
		if (e instanceof ParseError) {
			return E.left(e.message);
		}
		throw e;
	}
};

const boolean = (t: Typed): Prop => (t.ety.type === "Bool" ? t.prop : fail(`expected a bool proposition, found ${showEType(t.ety)}`));

/**
 * Parses a property. `(valid P)` and `(satisfiable P)` pick the goal explicitly; a bare
 * proposition is checked for validity assuming the transaction succeeds. Quantified variables get
 * identifiers from `startId` on.
 */
export const expToCheck = (tableEnv: TableEnv, startId: VarId, nameEnv: Record<string, VarId>, idEnv: Map<VarId, EType>, exp: Exp): E.Either<string, Check> => {
	let next = startId;
	const mode: Mode = { type: "Property", tableEnv, nameEnv, idEnv, next: () => next++ };
	return running((): Check => {
		const h = X.head(exp);
		if ((h === "valid" || h === "satisfiable") && exp.type === "List") {
			const [, inner, ...extra] = exp.items;
			if (!inner || extra.length > 0) {
				return fail(`${h}: expected exactly one proposition`);
			}
			return { type: h === "valid" ? "Valid" : "Satisfiable", prop: boolean(parseProp(mode, inner)) };
		}
		return { type: "PropertyHolds", prop: boolean(parseProp(mode, exp)) };
	});
};

/** Parses an invariant over the fields of a schema. Only features available in invariants are accepted. */
export const expToInvariant = (resultType: EType, fieldEnv: Record<string, EType>, exp: Exp): E.Either<string, Invariant> =>
	running(() => {
		const t = parseProp({ type: "Invariant", fieldEnv }, exp);
		if (!etypeEquals(t.ety, resultType)) {
			return fail(`expected an invariant of type ${showEType(resultType)}, found ${showEType(t.ety)}`);
		}
		return t.prop;
	});
