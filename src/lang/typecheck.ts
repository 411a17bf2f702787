import { match, P } from "ts-pattern";

import * as X from "@covenant/syntax/exp";
import type { Exp, Literal, TypeAnn } from "@covenant/syntax/exp";
import type { Location } from "@covenant/shared/provenance";

import type { Binding, Node, TcFailure, TopLevel } from "./ast";
import type { Definition, ModuleData, ModuleName, Ref } from "./module";
import { Types, display, field, isNumeric, isPrim, unifies } from "./types";
import type { Arg, FunType, PrimType, Schema, Type } from "./types";

export type TypecheckResult = { topLevel: TopLevel; failures: TcFailure[] };

type Scope = Record<string, Type>;

const PRIMS: PrimType[] = ["integer", "decimal", "string", "bool", "time", "keyset"];
const isPrimName = (name: string): name is PrimType => PRIMS.some(p => p === name);

/** Natives the checker knows, with the arities they accept. */
export const NATIVES: Record<string, [min: number, max: number]> = {
	"+": [2, 2],
	"-": [1, 2],
	"*": [2, 2],
	"/": [2, 2],
	"^": [2, 2],
	mod: [2, 2],
	abs: [1, 1],
	sqrt: [1, 1],
	ln: [1, 1],
	exp: [1, 1],
	log: [2, 2],
	round: [1, 2],
	ceiling: [1, 2],
	floor: [1, 2],
	"<": [2, 2],
	"<=": [2, 2],
	">": [2, 2],
	">=": [2, 2],
	"=": [2, 2],
	"!=": [2, 2],
	and: [1, Infinity],
	or: [1, Infinity],
	not: [1, 1],
	enforce: [2, 2],
	"enforce-keyset": [1, 1],
	"read-keyset": [1, 1],
	read: [2, 2],
	insert: [3, 3],
	write: [3, 3],
	update: [3, 3],
	at: [2, 2],
	length: [1, 1],
	"add-time": [2, 2],
	time: [1, 1],
};

const literalType = (lit: Literal): Type =>
	match(lit)
		.with({ type: "Integer" }, () => Types.Integer)
		.with({ type: "Decimal" }, () => Types.Decimal)
		.with({ type: P.union("String", "Symbol") }, () => Types.String)
		.with({ type: "Bool" }, () => Types.Bool)
		.exhaustive();

const anonymous = (fields: Arg[], location: Location): Schema => ({ name: "", fields, location });

/**
 * Typechecks one top-level definition of a module. The checker never throws: whatever it cannot
 * type gets `Any` and a failure, so callers always receive a `TopLevel`.
 */
export const typecheckTopLevel = (ref: Ref, modules: Record<ModuleName, ModuleData>): TypecheckResult => {
	const failures: TcFailure[] = [];
	const refs = modules[ref.module]?.refs ?? {};
	const fail = (location: Location, message: string) => {
		failures.push({ location, message });
	};

	const lookup = (name: string): Definition | undefined => refs[name]?.definition;

	const schemas: Record<string, Schema> = {};
	const schema = (name: string, location: Location): Schema | undefined => {
		const cached = schemas[name];
		if (cached) {
			return cached;
		}
		const def = lookup(name);
		if (!def || def.type !== "Defschema") {
			fail(location, `unknown schema '${name}'`);
			return undefined;
		}
		// registered before resolving fields so self-references terminate
		const resolved: Schema = { name, fields: [], location: def.location };
		schemas[name] = resolved;
		resolved.fields.push(...def.fields.map(f => ({ name: f.name, type: f.annotation ? resolve(f.annotation, "object") : Types.Any, location: f.location })));
		return resolved;
	};

	const resolve = (ann: TypeAnn, bare: "object" | "table"): Type =>
		match(ann)
			.with({ type: "Prim" }, ({ name, location }) => {
				if (isPrimName(name)) {
					return Types.Prim(name);
				}
				fail(location, `unknown type '${name}'`);
				return Types.Any;
			})
			.with({ type: "Schema" }, ({ kind, schema: name, location }) => {
				const s = schema(name, location);
				if (!s) {
					return Types.Any;
				}
				const k = kind === "bare" ? bare : kind;
				return k === "table" ? Types.Table(s) : Types.Object(s);
			})
			.with({ type: "List" }, ({ elem }) => Types.List(resolve(elem, bare)))
			.exhaustive();

	const argOf = (atom: Extract<Exp, { type: "Atom" }>): Arg => {
		if (!atom.annotation) {
			fail(atom.location, `missing type annotation for '${atom.name}'`);
			return { name: atom.name, type: Types.Any, location: atom.location };
		}
		return { name: atom.name, type: resolve(atom.annotation, "object"), location: atom.location };
	};

	/** The declared signature of a function, without looking at its body. */
	const signature = (def: Extract<Definition, { type: "Defun" }>): FunType => ({
		args: def.args.map(argOf),
		result: def.returnAnn ? resolve(def.returnAnn, "object") : Types.Any,
	});

	const expect = (native: string, node: Node, ok: (ty: Type) => boolean, wanted: string) => {
		if (node.type.type !== "Any" && !ok(node.type)) {
			fail(node.location, `${native}: expected ${wanted}, found ${display(node.type)}`);
		}
	};

	const numericResult = (args: Node[]): Type => {
		if (args.some(a => a.type.type === "Any")) {
			return Types.Any;
		}
		return args.every(a => isPrim(a.type, "integer")) ? Types.Integer : Types.Decimal;
	};

	const checkObjectAgainst = (native: string, obj: Node, target: Schema, partial: boolean) => {
		if (obj.type.type !== "Object") {
			expect(native, obj, () => false, `object{${target.name}}`);
			return;
		}
		const given = obj.type.schema;
		given.fields.forEach(f => {
			const expected = field(target, f.name);
			if (!expected) {
				fail(f.location, `${native}: '${f.name}' is not a column of ${target.name}`);
			} else if (!unifies(expected.type, f.type)) {
				fail(f.location, `${native}: column '${f.name}' expects ${display(expected.type)}, found ${display(f.type)}`);
			}
		});
		if (!partial && given.name === "") {
			target.fields
				.filter(f => !field(given, f.name))
				.forEach(f => fail(obj.location, `${native}: missing column '${f.name}' of ${target.name}`));
		}
	};

	const native = (name: string, args: Node[], location: Location): Type => {
		const [a, b, c] = args;
		const comparable = (ty: Type) => isNumeric(ty) || isPrim(ty, "string", "time");
		return match(name)
			.with("+", () => {
				if (a && b && isPrim(a.type, "string")) {
					expect(name, b, ty => isPrim(ty, "string"), "string");
					return Types.String;
				}
				if (a && b && a.type.type === "Object") {
					expect(name, b, ty => ty.type === "Object", "object");
					return b.type.type === "Object" ? Types.Object(anonymous([...b.type.schema.fields, ...a.type.schema.fields], location)) : Types.Any;
				}
				args.forEach(n => expect(name, n, isNumeric, "integer or decimal"));
				return numericResult(args);
			})
			.with("-", "*", "/", "^", "abs", () => {
				args.forEach(n => expect(name, n, isNumeric, "integer or decimal"));
				return numericResult(args);
			})
			.with("mod", () => {
				args.forEach(n => expect(name, n, ty => isPrim(ty, "integer"), "integer"));
				return Types.Integer;
			})
			.with("sqrt", "ln", "exp", "log", () => {
				args.forEach(n => expect(name, n, isNumeric, "integer or decimal"));
				return Types.Decimal;
			})
			.with("round", "ceiling", "floor", () => {
				if (a) expect(name, a, isNumeric, "decimal");
				if (b) expect(name, b, ty => isPrim(ty, "integer"), "integer precision");
				return b ? Types.Decimal : Types.Integer;
			})
			.with("<", "<=", ">", ">=", () => {
				args.forEach(n => expect(name, n, comparable, "a comparable value"));
				if (a && b && !(isNumeric(a.type) && isNumeric(b.type)) && !unifies(a.type, b.type)) {
					fail(location, `${name}: cannot compare ${display(a.type)} with ${display(b.type)}`);
				}
				return Types.Bool;
			})
			.with("=", "!=", () => {
				if (a && b && !(isNumeric(a.type) && isNumeric(b.type)) && !unifies(a.type, b.type)) {
					fail(location, `${name}: cannot compare ${display(a.type)} with ${display(b.type)}`);
				}
				return Types.Bool;
			})
			.with("and", "or", "not", () => {
				args.forEach(n => expect(name, n, ty => isPrim(ty, "bool"), "bool"));
				return Types.Bool;
			})
			.with("enforce", () => {
				if (a) expect(name, a, ty => isPrim(ty, "bool"), "bool");
				if (b) expect(name, b, ty => isPrim(ty, "string"), "string");
				return Types.Bool;
			})
			.with("enforce-keyset", () => {
				if (a) expect(name, a, ty => isPrim(ty, "string", "keyset"), "keyset or keyset name");
				return Types.Bool;
			})
			.with("read-keyset", () => {
				if (a) expect(name, a, ty => isPrim(ty, "string"), "string");
				return Types.KeySet;
			})
			.with("read", () => {
				if (b) expect(name, b, ty => isPrim(ty, "string"), "string key");
				if (a?.type.type === "Table") {
					return Types.Object(a.type.schema);
				}
				if (a) expect(name, a, () => false, "table");
				return Types.Any;
			})
			.with("insert", "write", "update", () => {
				if (b) expect(name, b, ty => isPrim(ty, "string"), "string key");
				if (a?.type.type === "Table" && c) {
					checkObjectAgainst(name, c, a.type.schema, name === "update");
				} else if (a) {
					expect(name, a, () => false, "table");
				}
				return Types.String;
			})
			.with("at", () => {
				const key = a && a.kind === "Lit" && (a.literal.type === "String" || a.literal.type === "Symbol") ? a.literal.value : undefined;
				if (a && key === undefined) {
					fail(a.location, "at: the column must be a literal string");
				}
				if (!b || b.type.type !== "Object") {
					if (b) expect(name, b, () => false, "object");
					return Types.Any;
				}
				const f = key === undefined ? undefined : field(b.type.schema, key);
				if (key !== undefined && !f) {
					fail(location, `at: '${key}' is not a field of ${display(b.type)}`);
				}
				return f?.type ?? Types.Any;
			})
			.with("length", () => {
				if (a) expect(name, a, ty => isPrim(ty, "string") || ty.type === "List", "string or list");
				return Types.Integer;
			})
			.with("add-time", () => {
				if (a) expect(name, a, ty => isPrim(ty, "time"), "time");
				if (b) expect(name, b, isNumeric, "integer or decimal seconds");
				return Types.Time;
			})
			.with("time", () => {
				if (a) expect(name, a, ty => isPrim(ty, "string"), "string");
				return Types.Time;
			})
			.otherwise(() => Types.Any);
	};

	const bindings = (exp: Exp, scope: Scope, sequential: boolean): [Binding[], Scope] => {
		if (exp.type !== "List") {
			fail(exp.location, `expected let bindings, found ${X.display(exp)}`);
			return [[], scope];
		}
		const inner: Scope = { ...scope };
		const bound = exp.items.flatMap((item): Binding[] => {
			if (item.type !== "List" || item.items.length !== 2 || item.items[0]?.type !== "Atom") {
				fail(item.location, `expected a binding (name value), found ${X.display(item)}`);
				return [];
			}
			const [name, valueExp] = item.items;
			if (!valueExp) {
				return [];
			}
			const value = check(valueExp, sequential ? inner : scope);
			if (name.annotation) {
				const declared = resolve(name.annotation, "object");
				if (!unifies(declared, value.type)) {
					fail(item.location, `let: '${name.name}' declared ${display(declared)} but bound to ${display(value.type)}`);
				}
				inner[name.name] = declared;
			} else {
				inner[name.name] = value.type;
			}
			return [{ name: name.name, value, location: item.location }];
		});
		return [bound, inner];
	};

	const application = (exp: Extract<Exp, { type: "List" }>, scope: Scope): Node => {
		const location = exp.location;
		const [fn, ...rest] = exp.items;
		if (!fn || fn.type !== "Atom") {
			fail(location, `expected an application, found ${X.display(exp)}`);
			return { type: Types.Any, location, kind: "ListLit", items: [] };
		}
		const name = fn.name;

		if (name === "if") {
			const [c, t, e] = rest;
			if (!c || !t || !e || rest.length !== 3) {
				fail(location, "if: expected a condition and two branches");
				return { type: Types.Any, location, kind: "Native", name, args: rest.map(r => check(r, scope)) };
			}
			const cond = check(c, scope);
			expect(name, cond, ty => isPrim(ty, "bool"), "bool");
			const then = check(t, scope);
			const otherwise = check(e, scope);
			if (!unifies(then.type, otherwise.type)) {
				fail(location, `if: branches have different types ${display(then.type)} and ${display(otherwise.type)}`);
			}
			return { type: then.type.type === "Any" ? otherwise.type : then.type, location, kind: "If", cond, then, else: otherwise };
		}

		if (name === "let" || name === "let*") {
			const [binds, ...body] = rest;
			if (!binds || body.length === 0) {
				fail(location, `${name}: expected bindings and a body`);
				return { type: Types.Any, location, kind: "Let", sequential: name === "let*", bindings: [], body: [] };
			}
			const [bound, inner] = bindings(binds, scope, name === "let*");
			const nodes = body.map(b => check(b, inner));
			return { type: nodes[nodes.length - 1]?.type ?? Types.Any, location, kind: "Let", sequential: name === "let*", bindings: bound, body: nodes };
		}

		const args = rest.map(r => check(r, scope));
		const arity = NATIVES[name];
		if (arity) {
			const [min, max] = arity;
			if (args.length < min || args.length > max) {
				fail(location, `${name}: wrong number of arguments (${args.length})`);
				return { type: Types.Any, location, kind: "Native", name, args };
			}
			return { type: native(name, args, location), location, kind: "Native", name, args };
		}

		const def = lookup(name);
		if (def?.type === "Defun") {
			const sig = signature(def);
			if (sig.args.length !== args.length) {
				fail(location, `${name}: expected ${sig.args.length} arguments, found ${args.length}`);
			}
			sig.args.forEach((param, i) => {
				const arg = args[i];
				if (arg && !unifies(param.type, arg.type)) {
					fail(arg.location, `${name}: argument '${param.name}' expects ${display(param.type)}, found ${display(arg.type)}`);
				}
			});
			return { type: sig.result, location, kind: "Call", fn: name, args };
		}

		fail(fn.location, `unknown function '${name}'`);
		return { type: Types.Any, location, kind: "Call", fn: name, args };
	};

	const check = (exp: Exp, scope: Scope): Node =>
		match(exp)
			.with({ type: "Lit" }, ({ literal, location }): Node => ({ type: literalType(literal), location, kind: "Lit", literal }))
			.with({ type: "Atom" }, ({ name, location }): Node => {
				const local = scope[name];
				if (local) {
					return { type: local, location, kind: "Var", name };
				}
				const def = lookup(name);
				if (def?.type === "Defconst") {
					const value = check(def.value, {});
					return { type: value.type, location, kind: "Const", name, value };
				}
				if (def?.type === "Deftable") {
					const ty = def.schemaAnn ? resolve(def.schemaAnn, "table") : Types.Any;
					if (ty.type === "Table") {
						return { type: ty, location, kind: "TableRef", table: name, schema: ty.schema };
					}
				}
				fail(location, `unbound name '${name}'`);
				return { type: Types.Any, location, kind: "Var", name };
			})
			.with({ type: "Object" }, ({ entries, location }): Node => {
				const checked = entries.flatMap(({ key, value }) => {
					const k = X.stringish(key);
					if (k === undefined) {
						fail(key.location, `object keys must be strings, found ${X.display(key)}`);
						return [];
					}
					return [{ key: k, value: check(value, scope), location: key.location }];
				});
				const fields = checked.map(({ key, value, location: l }) => ({ name: key, type: value.type, location: l }));
				return { type: Types.Object(anonymous(fields, location)), location, kind: "Object", entries: checked.map(({ key, value }) => ({ key, value })) };
			})
			.with({ type: "List", delimiter: "bracket" }, ({ items, location }): Node => {
				const nodes = items.map(i => check(i, scope));
				return { type: Types.List(nodes[0]?.type ?? Types.Any), location, kind: "ListLit", items: nodes };
			})
			.with({ type: "List", delimiter: "paren" }, list => application(list, scope))
			.with({ type: "Meta" }, ({ key, location }): Node => {
				fail(location, `unexpected metadata @${key}`);
				return { type: Types.Any, location, kind: "ListLit", items: [] };
			})
			.exhaustive();

	const def = ref.definition;
	const topLevel = match(def)
		.with({ type: "Defun" }, (fun): TopLevel => {
			const sig = signature(fun);
			const scope = Object.fromEntries(sig.args.map(a => [a.name, a.type]));
			const body = fun.body.map(b => check(b, scope));
			const last = body[body.length - 1];
			const inferred = last?.type ?? Types.Any;
			if (fun.returnAnn && !unifies(sig.result, inferred)) {
				fail(last?.location ?? fun.location, `${fun.name}: declared to return ${display(sig.result)} but returns ${display(inferred)}`);
			}
			const result = fun.returnAnn ? sig.result : inferred;
			return { type: "TopFun", name: fun.name, info: fun.location, funType: { args: sig.args, result }, args: sig.args, body };
		})
		.with({ type: "Defconst" }, (c): TopLevel => {
			const value = check(c.value, {});
			return { type: "TopConst", name: c.name, info: c.location, constType: value.type, value };
		})
		.with({ type: "Deftable" }, (t): TopLevel => {
			const ty = t.schemaAnn ? resolve(t.schemaAnn, "table") : undefined;
			if (ty?.type === "Table") {
				return { type: "TopTable", name: t.name, info: t.location, schema: ty.schema };
			}
			fail(t.location, `table '${t.name}' must be declared with a schema`);
			return { type: "TopTable", name: t.name, info: t.location, schema: anonymous([], t.location) };
		})
		.with({ type: "Defschema" }, (s): TopLevel => ({ type: "TopSchema", name: s.name, info: s.location, schema: schema(s.name, s.location) ?? anonymous([], s.location) }))
		.exhaustive();

	return { topLevel, failures };
};
