import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import * as O from "fp-ts/Option";
import { match } from "ts-pattern";
import type { Arith, Bool, Expr, SMTArray, Sort } from "z3-solver";

import type { Located, Location } from "@covenant/shared/provenance";

import { maybeTranslateType } from "./env";
import type { AnalyzeFailure, AnalyzeFailureNoLoc } from "./errors";
import { ArithOps, ComparisonOps, UnaryArithOps, operatorSymbol } from "./feature";
import type { ComparisonOp } from "./feature";
import type { AVal, ModelArg, ModelTags, Provenance, Symbolic } from "./model";
import type { Check, EType, Prop, Table, TagId, Term, VarId } from "./types";
import { ETypes, isNumericE } from "./types";

export type AnalysisResult = { prop: Bool<"main">; ksProvs: Map<TagId, Provenance> };

/** Results come with the side constraints that tie tags, the result and string literals to the term. */
export type Analysis<A> = { result: A; constraints: Bool<"main">[] };

type Column = SMTArray<"main", [Sort<"main">], Sort<"main">>;

/** Storage of one column: an array per scalar field, nested the way the column's object type is. */
type Cells = { type: "Leaf"; ety: EType; array: Column } | { type: "Node"; fields: Record<string, Cells> };

type TableState = { name: string; columns: Record<string, EType>; initial: Record<string, Cells>; current: Record<string, Cells> };

type Event =
	| { type: "Read"; table: string; key: Expr<"main">; pc: Bool<"main"> }
	| { type: "Write"; table: string; key: Expr<"main">; pc: Bool<"main">; deltas: Record<string, Arith<"main">> }
	| { type: "Enforce"; prov?: Provenance; pc: Bool<"main"> };

class AnalyzeError extends Error {
	constructor(
		readonly location: Location,
		readonly failure: AnalyzeFailureNoLoc,
	) {
		super(failure.type);
	}
}

/**
 * Symbolically executes a translated function body. Writes are guarded by the path condition,
 * so both branches of a conditional run against the same table state.
 */
const evaluator = (sym: Symbolic, tables: Table[], args: Map<VarId, ModelArg>, tags: ModelTags, info: Location) => {
	const { Z3 } = sym;
	const constraints: Bool<"main">[] = [];
	const events: Event[] = [];
	const ksProvs = new Map<TagId, Provenance>();
	const env = new Map<VarId, AVal>([...args].map(([id, a]): [VarId, AVal] => [id, a.value]));
	const authorized = Z3.Array.const("authorized", sym.sorts.KeySet, Z3.Bool.sort());
	const T = Z3.Bool.val(true);

	let success: Bool<"main"> = T;
	let pc: Bool<"main"> = T;
	let location = info;

	const fail = (failure: AnalyzeFailureNoLoc): never => {
		throw new AnalyzeError(location, failure);
	};
	const unsupported = (what: string) => fail({ type: "UnsupportedOperation", what });
	const malformed = (message: string) => fail({ type: "MalformedTerm", message });

	const cellsFor = (path: string, ety: EType): Cells =>
		ety.type === "Object"
			? { type: "Node", fields: Object.fromEntries(Object.entries(ety.fields).map(([k, f]) => [k, cellsFor(`${path}.${k}`, f)])) }
			: { type: "Leaf", ety, array: Z3.Array.const(path, sym.sorts.Str, sym.sortOf(ety)) };

	const states = new Map<string, TableState>();
	const table = (name: string): TableState => {
		const existing = states.get(name);
		if (existing) {
			return existing;
		}
		const def = tables.find(t => t.name === name);
		if (!def) {
			return fail({ type: "UnknownTable", table: name });
		}
		const columns: Record<string, EType> = {};
		def.schema.fields.forEach(f =>
			F.pipe(
				maybeTranslateType(f.type),
				O.map(ety => {
					columns[f.name] = ety;
				}),
			),
		);
		const initial = Object.fromEntries(Object.entries(columns).map(([c, ety]): [string, Cells] => [c, cellsFor(`${name}.${c}.initial`, ety)]));
		const state: TableState = { name, columns, initial, current: { ...initial } };
		states.set(name, state);
		return state;
	};

	const scalar = (v: AVal): Expr<"main"> => (v.type === "Sym" ? v.expr : malformed("expected a scalar, found an object"));
	const bool = (v: AVal): Bool<"main"> => {
		const e = scalar(v);
		return Z3.isBool(e) ? e : malformed("expected a boolean");
	};
	const arith = (v: AVal): Arith<"main"> => {
		const e = scalar(v);
		return Z3.isArith(e) ? e : malformed("expected a number");
	};
	const etypeOf = (v: AVal): EType => (v.type === "Sym" ? v.ety : malformed("expected a scalar, found an object"));
	const sval = (ety: EType, expr: Expr<"main">): AVal => ({ type: "Sym", ety, expr });

	const select = (cells: Cells, k: Expr<"main">): AVal =>
		cells.type === "Leaf" ? sval(cells.ety, cells.array.select(k)) : { type: "Obj", fields: Object.fromEntries(Object.entries(cells.fields).map(([f, c]) => [f, select(c, k)])) };

	const store = (cells: Cells, k: Expr<"main">, v: AVal): Cells => {
		if (cells.type === "Leaf") {
			return { ...cells, array: cells.array.store(k, scalar(v)) };
		}
		if (v.type !== "Obj") {
			return malformed("expected an object");
		}
		const given = v.fields;
		return { type: "Node", fields: Object.fromEntries(Object.entries(cells.fields).map(([f, c]) => [f, store(c, k, given[f] ?? malformed(`missing field ${f}`))])) };
	};

	/** A numeric value at `ety`, promoting integers to reals for decimal arithmetic. */
	const numeric = (v: AVal, ety: EType): Arith<"main"> => {
		const a = arith(v);
		return ety.type === "Decimal" && etypeOf(v).type !== "Decimal" ? Z3.ToReal(a) : a;
	};
	const zero = (ety: EType): Arith<"main"> => (ety.type === "Decimal" ? Z3.Real.val(0) : Z3.Int.val(0));
	/** `v` stored at column type `ety`, with integers promoted where the column is decimal. */
	const conform = (v: AVal, ety: EType): AVal => {
		if (ety.type === "Object") {
			if (v.type !== "Obj") {
				return malformed("expected an object");
			}
			const given = v.fields;
			return { type: "Obj", fields: Object.fromEntries(Object.entries(ety.fields).map(([f, fe]) => [f, conform(given[f] ?? malformed(`missing field ${f}`), fe)])) };
		}
		return sval(ety, isNumericE(ety) ? numeric(v, ety) : scalar(v));
	};
	const widest = (l: AVal, r: AVal): EType => (etypeOf(l).type === "Decimal" || etypeOf(r).type === "Decimal" ? ETypes.Decimal : etypeOf(l));

	const equal = (l: AVal, r: AVal): Bool<"main"> => {
		if (l.type === "Obj" || r.type === "Obj") {
			if (l.type !== "Obj" || r.type !== "Obj") {
				return malformed("cannot compare an object with a scalar");
			}
			return Z3.And(
				...Object.entries(l.fields).map(([k, f]) => {
					const g = r.fields[k];
					return g ? equal(f, g) : malformed(`cannot compare objects: no field ${k}`);
				}),
			);
		}
		if (isNumericE(l.ety) && isNumericE(r.ety)) {
			const ety = widest(l, r);
			return numeric(l, ety).eq(numeric(r, ety));
		}
		return l.expr.eq(r.expr);
	};

	const compare = (op: ComparisonOp, l: AVal, r: AVal): Bool<"main"> => {
		if (op === "Eq") {
			return equal(l, r);
		}
		if (op === "Neq") {
			return Z3.Not(equal(l, r));
		}
		const lt = etypeOf(l);
		if (!isNumericE(lt) && lt.type !== "Time") {
			return unsupported(`${operatorSymbol(ComparisonOps, op)} on ${lt.type === "Str" ? "strings" : lt.type}`);
		}
		const ety = widest(l, r);
		const a = numeric(l, ety);
		const b = numeric(r, ety);
		return match(op)
			.with("Gt", () => a.gt(b))
			.with("Lt", () => a.lt(b))
			.with("Gte", () => a.ge(b))
			.with("Lte", () => a.le(b))
			.exhaustive();
	};

	const merge = (c: Bool<"main">, t: AVal, e: AVal): AVal => {
		if (t.type === "Obj" && e.type === "Obj") {
			return { type: "Obj", fields: Object.fromEntries(Object.entries(t.fields).map(([k, f]) => [k, e.fields[k] ? merge(c, f, e.fields[k]) : f])) };
		}
		if (t.type === "Sym" && e.type === "Sym") {
			if (isNumericE(t.ety) && isNumericE(e.ety)) {
				const ety = widest(t, e);
				return sval(ety, Z3.If(c, numeric(t, ety), numeric(e, ety)));
			}
			return sval(t.ety, Z3.If(c, t.expr, e.expr));
		}
		return malformed("branches produce values of different shapes");
	};

	/** The bound variable's value, keeping the keyset provenance of whatever it was bound to. */
	const rebind = (value: AVal, bound: AVal): AVal => {
		if (value.type === "Obj" && bound.type === "Obj") {
			const fields = value.fields;
			return { type: "Obj", fields: Object.fromEntries(Object.entries(bound.fields).map(([k, f]) => [k, fields[k] ? rebind(fields[k], f) : f])) };
		}
		return value.type === "Sym" && value.prov && bound.type === "Sym" ? { ...value, expr: bound.expr } : bound;
	};

	const guard = (cond: Bool<"main">) => {
		success = Z3.And(success, Z3.Implies(pc, cond));
	};

	const arithmetic = (term: Extract<Term, { type: "Arith" }>): AVal => {
		const l = evaluate(term.left);
		const r = evaluate(term.right);
		const a = numeric(l, term.ety);
		const b = numeric(r, term.ety);
		return match(term.op)
			.with("Add", () => sval(term.ety, a.add(b)))
			.with("Sub", () => sval(term.ety, a.sub(b)))
			.with("Mul", () => sval(term.ety, a.mul(b)))
			.with("Div", "Mod", op => {
				guard(Z3.Not(b.eq(zero(term.ety))));
				return sval(term.ety, op === "Div" ? a.div(b) : a.mod(b));
			})
			.with("Pow", "Log", op => unsupported(operatorSymbol(ArithOps, op)))
			.exhaustive();
	};

	const rounding = (term: Extract<Term, { type: "Rounding" }>): AVal => {
		if (term.precision) {
			return unsupported("rounding to a precision");
		}
		const v = evaluate(term.arg);
		const x = arith(v);
		if (etypeOf(v).type === "Int") {
			return sval(ETypes.Int, x);
		}
		return match(term.op)
			.with("Floor", () => sval(ETypes.Int, Z3.ToInt(x)))
			.with("Ceiling", () => sval(ETypes.Int, Z3.ToInt(x.neg()).neg()))
			.with("Round", () => unsupported("banker's rounding"))
			.exhaustive();
	};

	const key = (t: Term): Expr<"main"> => {
		const v = evaluate(t);
		return etypeOf(v).type === "Str" ? scalar(v) : malformed("row keys must be strings");
	};

	/** Keysets read from a row remember the cell they came from. */
	const fromCell = (v: AVal, t: string, column: string, k: Expr<"main">): AVal => {
		if (v.type === "Obj") {
			return { type: "Obj", fields: Object.fromEntries(Object.entries(v.fields).map(([f, fv]) => [f, fromCell(fv, t, `${column}.${f}`, k)])) };
		}
		return v.ety.type === "KeySet" ? { ...v, prov: { type: "Cell", table: t, column, key: k } } : v;
	};

	const read = (term: Extract<Term, { type: "Read" }>): AVal => {
		const state = table(term.table);
		const k = key(term.key);
		const tagged = tags.reads.get(term.tag);
		if (!tagged) {
			return malformed(`no allocation for read tag ${term.tag}`);
		}
		constraints.push(tagged.key.eq(k), tagged.reached.eq(pc));
		const fields: Record<string, AVal> = {};
		Object.keys(state.columns).forEach(c => {
			const cells = state.current[c];
			const v = tagged.row[c];
			if (!cells || !v) {
				return;
			}
			constraints.push(equal(v, select(cells, k)));
			fields[c] = fromCell(v, term.table, c, k);
		});
		events.push({ type: "Read", table: term.table, key: k, pc });
		return { type: "Obj", fields };
	};

	const write = (term: Extract<Term, { type: "Write" }>): AVal => {
		const state = table(term.table);
		const k = key(term.key);
		const obj = evaluate(term.object);
		if (obj.type !== "Obj") {
			return malformed("writes take an object");
		}
		const tagged = tags.writes.get(term.tag);
		if (!tagged) {
			return malformed(`no allocation for write tag ${term.tag}`);
		}
		constraints.push(tagged.key.eq(k), tagged.reached.eq(pc));
		const deltas: Record<string, Arith<"main">> = {};
		Object.entries(state.columns).forEach(([c, ety]) => {
			const cells = state.current[c];
			if (!cells) {
				return;
			}
			const old = select(cells, k);
			const given = obj.fields[c];
			if (!given && term.writeType !== "Update") {
				return malformed(`${term.writeType.toLowerCase()} to ${term.table} is missing column ${c}`);
			}
			const next = given ? conform(given, ety) : old;
			state.current[c] = store(cells, k, merge(pc, next, old));
			const v = tagged.row[c];
			if (v) {
				constraints.push(equal(v, next));
			}
			if (isNumericE(ety) && given) {
				const n = arith(next);
				deltas[c] = term.writeType === "Insert" ? n : n.sub(arith(old));
			}
		});
		events.push({ type: "Write", table: term.table, key: k, pc, deltas });
		return sval(ETypes.Str, sym.string("Write succeeded"));
	};

	const enforceKeyset = (term: Extract<Term, { type: "EnforceKeyset" }>): AVal => {
		const ks = evaluate(term.keyset);
		const tagged = tags.auths.get(term.tag);
		if (!tagged || ks.type !== "Sym" || ks.ety.type !== "KeySet") {
			return malformed("enforce-keyset takes a keyset");
		}
		constraints.push(tagged.authorized.eq(authorized.select(ks.expr)), tagged.reached.eq(pc));
		guard(tagged.authorized);
		if (ks.prov) {
			ksProvs.set(term.tag, ks.prov);
		}
		events.push({ type: "Enforce", prov: ks.prov, pc });
		return sval(ETypes.Bool, T);
	};

	const evaluate = (term: Term): AVal =>
		match(term)
			.with({ type: "Lit" }, ({ value }) =>
				match(value)
					.with({ type: "Int" }, ({ value: v }) => sval(ETypes.Int, Z3.Int.val(v)))
					.with({ type: "Decimal" }, ({ value: v }) => sval(ETypes.Decimal, Z3.Real.val(v)))
					.with({ type: "Str" }, ({ value: v }) => sval(ETypes.Str, sym.string(v)))
					.with({ type: "Bool" }, ({ value: v }) => sval(ETypes.Bool, Z3.Bool.val(v)))
					.exhaustive(),
			)
			.with({ type: "Var" }, ({ id, name }) => env.get(id) ?? malformed(`unbound variable ${name}`))
			.with({ type: "Arith" }, arithmetic)
			.with({ type: "Unary" }, ({ op, arg, ety }) => {
				const a = numeric(evaluate(arg), ety);
				return match(op)
					.with("Negate", () => sval(ety, a.neg()))
					.with("Abs", () => sval(ety, Z3.If(a.ge(zero(ety)), a, a.neg())))
					.otherwise(o => unsupported(operatorSymbol(UnaryArithOps, o)));
			})
			.with({ type: "Compare" }, ({ op, left, right }) => sval(ETypes.Bool, compare(op, evaluate(left), evaluate(right))))
			.with({ type: "Logical" }, ({ op, args }) => {
				const bs = args.map(a => bool(evaluate(a)));
				return match(op)
					.with("And", () => sval(ETypes.Bool, Z3.And(...bs)))
					.with("Or", () => sval(ETypes.Bool, Z3.Or(...bs)))
					.with("Not", () => {
						const [b] = bs;
						return b ? sval(ETypes.Bool, Z3.Not(b)) : malformed("not takes one argument");
					})
					.exhaustive();
			})
			.with({ type: "Rounding" }, rounding)
			.with({ type: "If" }, t => {
				const c = bool(evaluate(t.cond));
				const saved = pc;
				pc = Z3.And(saved, c);
				const then = evaluate(t.then);
				pc = Z3.And(saved, Z3.Not(c));
				const otherwise = evaluate(t.else);
				pc = saved;
				return merge(c, then, otherwise);
			})
			.with({ type: "Let" }, t => {
				const value = evaluate(t.value);
				const tagged = tags.vars.get(t.tag);
				if (!tagged) {
					return malformed(`no allocation for variable tag ${t.tag}`);
				}
				constraints.push(equal(tagged.value, value));
				env.set(t.id, rebind(value, tagged.value));
				return evaluate(t.body);
			})
			.with({ type: "Seq" }, ({ first, rest }) => {
				evaluate(first);
				return evaluate(rest);
			})
			.with({ type: "Enforce" }, ({ cond }) => {
				guard(bool(evaluate(cond)));
				return sval(ETypes.Bool, T);
			})
			.with({ type: "EnforceKeyset" }, t => {
				location = t.location;
				return enforceKeyset(t);
			})
			.with({ type: "ReadKeyset" }, ({ name }) => {
				if (name.type !== "Lit" || name.value.type !== "Str") {
					return unsupported("keyset names computed at run time");
				}
				const ks: AVal = { type: "Sym", ety: ETypes.KeySet, expr: sym.keyset(name.value.value), prov: { type: "Named", name: name.value.value } };
				return ks;
			})
			.with({ type: "Read" }, t => {
				location = t.location;
				return read(t);
			})
			.with({ type: "Write" }, t => {
				location = t.location;
				return write(t);
			})
			.with({ type: "Object" }, ({ fields }): AVal => ({ type: "Obj", fields: Object.fromEntries(Object.entries(fields).map(([k, f]) => [k, evaluate(f)])) }))
			.with({ type: "At" }, ({ field, object }) => {
				const obj = evaluate(object);
				const v = obj.type === "Obj" ? obj.fields[field] : undefined;
				return v ?? malformed(`no field ${field}`);
			})
			.with({ type: "AddTime" }, ({ time, seconds }) => {
				const s = evaluate(seconds);
				if (etypeOf(s).type !== "Int") {
					return unsupported("adding fractional seconds to a time");
				}
				return sval(ETypes.Time, arith(evaluate(time)).add(arith(s)));
			})
			.with({ type: "Time" }, t => {
				location = t.location;
				const ms = Date.parse(t.value);
				return Number.isNaN(ms) ? malformed(`invalid time ${t.value}`) : sval(ETypes.Time, Z3.Int.val(BigInt(Math.floor(ms / 1000))));
			})
			.with({ type: "Unsupported" }, t => {
				location = t.location;
				return unsupported(t.what);
			})
			.exhaustive();

	/** Rows the function touches, with the columns of their initial and final states. */
	const touchedKeys = (name: string) => events.flatMap(e => (e.type !== "Enforce" && e.table === name ? [e.key] : []));

	const rowAt = (state: TableState, version: "initial" | "current", k: Expr<"main">): Record<string, AVal> =>
		Object.fromEntries(Object.entries(state[version]).map(([c, cells]) => [c, select(cells, k)]));

	const sum = (ety: EType, xs: Arith<"main">[]) => xs.reduce((acc, x) => acc.add(x), zero(ety));

	const prop = (p: Prop, scope: Map<VarId, AVal>, row?: Record<string, AVal>): AVal =>
		match(p)
			.with({ type: "BoolLit" }, ({ value }) => sval(ETypes.Bool, Z3.Bool.val(value)))
			.with({ type: "IntLit" }, ({ value }) => sval(ETypes.Int, Z3.Int.val(value)))
			.with({ type: "DecLit" }, ({ value }) => sval(ETypes.Decimal, Z3.Real.val(value)))
			.with({ type: "StrLit" }, ({ value }) => sval(ETypes.Str, sym.string(value)))
			.with({ type: "Var" }, ({ id, name }) => scope.get(id) ?? malformed(`unbound variable ${name}`))
			.with({ type: "Column" }, ({ name }) => row?.[name] ?? malformed(`unknown column ${name}`))
			.with({ type: "Arith" }, ({ op, left, right, ety }) => {
				const a = numeric(prop(left, scope, row), ety);
				const b = numeric(prop(right, scope, row), ety);
				return match(op)
					.with("Add", () => sval(ety, a.add(b)))
					.with("Sub", () => sval(ety, a.sub(b)))
					.with("Mul", () => sval(ety, a.mul(b)))
					.with("Div", () => sval(ety, a.div(b)))
					.with("Mod", () => sval(ety, a.mod(b)))
					.with("Pow", "Log", o => unsupported(operatorSymbol(ArithOps, o)))
					.exhaustive();
			})
			.with({ type: "Unary" }, ({ op, arg, ety }) => {
				const a = numeric(prop(arg, scope, row), ety);
				return match(op)
					.with("Negate", () => sval(ety, a.neg()))
					.with("Abs", () => sval(ety, Z3.If(a.ge(zero(ety)), a, a.neg())))
					.otherwise(o => unsupported(operatorSymbol(UnaryArithOps, o)));
			})
			.with({ type: "Compare" }, ({ op, left, right }) => sval(ETypes.Bool, compare(op, prop(left, scope, row), prop(right, scope, row))))
			.with({ type: "Logical" }, ({ op, args }) => {
				const bs = args.map(a => bool(prop(a, scope, row)));
				return match(op)
					.with("And", () => sval(ETypes.Bool, Z3.And(...bs)))
					.with("Or", () => sval(ETypes.Bool, Z3.Or(...bs)))
					.with("Not", () => {
						const [b] = bs;
						return b ? sval(ETypes.Bool, Z3.Not(b)) : malformed("not takes one argument");
					})
					.exhaustive();
			})
			.with({ type: "Rounding" }, ({ op, arg, precision }) => {
				if (precision) {
					return unsupported("rounding to a precision");
				}
				const v = prop(arg, scope, row);
				const x = arith(v);
				if (etypeOf(v).type === "Int") {
					return sval(ETypes.Int, x);
				}
				return match(op)
					.with("Floor", () => sval(ETypes.Int, Z3.ToInt(x)))
					.with("Ceiling", () => sval(ETypes.Int, Z3.ToInt(x.neg()).neg()))
					.with("Round", () => unsupported("banker's rounding"))
					.exhaustive();
			})
			.with({ type: "At" }, ({ field, object }) => {
				const obj = prop(object, scope, row);
				return (obj.type === "Obj" ? obj.fields[field] : undefined) ?? malformed(`no field ${field}`);
			})
			.with({ type: "StrLength" }, () => unsupported("string length"))
			.with({ type: "StrConcat" }, () => unsupported("string concatenation"))
			.with({ type: "AddTime" }, ({ time, seconds }) => {
				const s = prop(seconds, scope, row);
				if (etypeOf(s).type !== "Int") {
					return unsupported("adding fractional seconds to a time");
				}
				return sval(ETypes.Time, arith(prop(time, scope, row)).add(arith(s)));
			})
			.with({ type: "Forall" }, { type: "Exists" }, q => {
				if (q.ety.type === "Object") {
					return unsupported("quantification over objects");
				}
				const x = Z3.Const(`q${q.id}.${q.name}`, sym.sortOf(q.ety));
				const body = bool(prop(q.body, new Map<VarId, AVal>([...scope, [q.id, sval(q.ety, x)]]), row));
				return sval(ETypes.Bool, q.type === "Forall" ? Z3.ForAll<[Sort<"main">]>([x], body) : Z3.Exists<[Sort<"main">]>([x], body));
			})
			.with({ type: "Success" }, () => sval(ETypes.Bool, success))
			.with({ type: "Abort" }, () => sval(ETypes.Bool, Z3.Not(success)))
			.with({ type: "TableWritten" }, { type: "TableRead" }, ({ type, table: t }) => {
				const kind = type === "TableWritten" ? "Write" : "Read";
				return sval(ETypes.Bool, Z3.Or(Z3.Bool.val(false), ...events.filter(e => e.type === kind && e.table === t).map(e => e.pc)));
			})
			.with({ type: "CellDelta" }, ({ table: t, column, row: r, ety }) => {
				const state = table(t);
				const k = scalar(prop(r, scope, row));
				const before = state.initial[column];
				const after = state.current[column];
				if (!before || !after) {
					return malformed(`unknown column ${column}`);
				}
				if (before.type !== "Leaf" || after.type !== "Leaf") {
					return malformed(`column ${column} is not numeric`);
				}
				const a = after.array.select(k);
				const b = before.array.select(k);
				return Z3.isArith(a) && Z3.isArith(b) ? sval(ety, a.sub(b)) : malformed(`column ${column} is not numeric`);
			})
			.with({ type: "ColumnDelta" }, ({ table: t, column, ety }) =>
				sval(
					ety,
					sum(
						ety,
						events.flatMap(e => {
							const d = e.type === "Write" && e.table === t ? e.deltas[column] : undefined;
							return d ? [Z3.If(e.pc, d, zero(ety))] : [];
						}),
					),
				),
			)
			.with({ type: "RowRead" }, { type: "RowWritten" }, { type: "RowReadCount" }, { type: "RowWriteCount" }, p => {
				const k = scalar(prop(p.row, scope, row));
				const kind = p.type === "RowRead" || p.type === "RowReadCount" ? "Read" : "Write";
				const hits = events.flatMap(e => (e.type === kind && e.table === p.table ? [Z3.And(e.pc, e.key.eq(k))] : []));
				if (p.type === "RowRead" || p.type === "RowWritten") {
					return sval(ETypes.Bool, Z3.Or(Z3.Bool.val(false), ...hits));
				}
				return sval(
					ETypes.Int,
					sum(
						ETypes.Int,
						hits.map(h => Z3.If(h, Z3.Int.val(1), Z3.Int.val(0))),
					),
				);
			})
			.with({ type: "AuthorizedBy" }, ({ keyset }) =>
				sval(ETypes.Bool, Z3.Or(Z3.Bool.val(false), ...events.flatMap(e => (e.type === "Enforce" && e.prov?.type === "Named" && e.prov.name === keyset ? [e.pc] : [])))),
			)
			.with({ type: "RowEnforced" }, ({ table: t, column, row: r }) => {
				const k = scalar(prop(r, scope, row));
				return sval(
					ETypes.Bool,
					Z3.Or(
						Z3.Bool.val(false),
						...events.flatMap(e => (e.type === "Enforce" && e.prov?.type === "Cell" && e.prov.table === t && e.prov.column === column ? [Z3.And(e.pc, e.prov.key.eq(k))] : [])),
					),
				);
			})
			.exhaustive();

	const run = (term: Term, result: ModelArg) => {
		const value = evaluate(term);
		location = info;
		constraints.push(equal(result.value, value));
		return value;
	};

	/** String literals are pairwise distinct; added last so literals introduced by propositions count. */
	const finish = (): Bool<"main">[] => {
		const lits = [...sym.literals.values()];
		return lits.length > 1 ? [...constraints, Z3.Distinct(...lits)] : [...constraints];
	};

	const property = (check: Check): AnalysisResult => {
		location = info;
		const p = bool(prop(check.prop, env));
		return { prop: check.type === "PropertyHolds" ? Z3.Implies(success, p) : p, ksProvs };
	};

	/** Invariant `inv` of `t`, assumed on the initial state of every touched row and checked on every written one. */
	const invariant = (t: Table, inv: Located<Prop>): Located<AnalysisResult> => {
		location = inv.location;
		const state = table(t.name);
		touchedKeys(t.name).forEach(k => constraints.push(bool(prop(inv.value, env, rowAt(state, "initial", k)))));
		const maintained = events.flatMap(e => (e.type === "Write" && e.table === t.name ? [Z3.Implies(e.pc, bool(prop(inv.value, env, rowAt(state, "current", e.key))))] : []));
		return { location: inv.location, value: { prop: Z3.Implies(success, Z3.And(T, ...maintained)), ksProvs } };
	};

	const touchedTables = () => new Set(events.flatMap(e => (e.type === "Enforce" ? [] : [e.table])));

	return { run, property, invariant, touchedTables, finish };
};

const catching = <A>(act: () => A): E.Either<AnalyzeFailure, A> => {
	try {
		return E.right(act());
	} catch (e) {
		if (e instanceof AnalyzeError) {
			return E.left({ location: e.location, failure: e.failure });
		}
		throw e;
	}
};

export const runPropertyAnalysis = (
	sym: Symbolic,
	check: Check,
	tables: Table[],
	args: Map<VarId, ModelArg>,
	result: ModelArg,
	term: Term,
	tags: ModelTags,
	info: Location,
): E.Either<AnalyzeFailure, Analysis<AnalysisResult>> =>
	catching(() => {
		const ev = evaluator(sym, tables, args, tags, info);
		ev.run(term, result);
		const analysis = ev.property(check);
		return { result: analysis, constraints: ev.finish() };
	});

/**
 * Evaluates the body once and states every invariant of every table the function reads or writes.
 * Tables the function never touches have no entry.
 */
export const runInvariantAnalysis = (
	sym: Symbolic,
	tables: Table[],
	args: Map<VarId, ModelArg>,
	result: ModelArg,
	term: Term,
	tags: ModelTags,
	info: Location,
): E.Either<AnalyzeFailure, Analysis<Record<string, Located<AnalysisResult>[]>>> =>
	catching(() => {
		const ev = evaluator(sym, tables, args, tags, info);
		ev.run(term, result);
		const touched = ev.touchedTables();
		const results: Record<string, Located<AnalysisResult>[]> = {};
		tables
			.filter(t => touched.has(t.name) && t.invariants.length > 0)
			.forEach(t => {
				results[t.name] = t.invariants.map(inv => ev.invariant(t, inv));
			});
		return { result: results, constraints: ev.finish() };
	});
