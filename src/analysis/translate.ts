import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import * as O from "fp-ts/Option";
import { match } from "ts-pattern";

import type { Node } from "@covenant/lang/ast";
import type { Arg, Schema, Type } from "@covenant/lang/types";
import type { Location } from "@covenant/shared/provenance";

import { allocateEnvironment, maybeTranslateType, type Env } from "./env";
import type { TranslateFailure, TranslateFailureNoLoc } from "./errors";
import { ArithOps, ComparisonOps, LogicalOps, RoundingLikeOps, WriteTypes, parseOperator } from "./feature";
import type { EType, TagAllocation, TagId, Term, VarId } from "./types";

export type Translation = { env: Env; term: Term; tagAllocs: TagAllocation[] };

class TranslateError extends Error {
	constructor(
		readonly location: Location,
		readonly failure: TranslateFailureNoLoc,
	) {
		super(failure.type);
	}
}

const fail = (location: Location, failure: TranslateFailureNoLoc): never => {
	throw new TranslateError(location, failure);
};

type Scope = Record<string, { id: VarId; ety: EType }>;

/**
 * Lowers a typechecked function body into a `Term`, recording a tag allocation for every
 * sub-expression the model tracks: reads, writes, keyset enforcements and let bindings.
 */
export const translate = (info: Location, args: Arg[], resultType: Type, body: Node[]): E.Either<TranslateFailure, Translation> =>
	F.pipe(
		allocateEnvironment(resultType, args, info),
		E.mapLeft(({ message, type, location }): TranslateFailure => ({ location: location ?? info, failure: { type: "TypeTranslation", message, hostType: type } })),
		E.chain(env => {
			let nextId = env.next;
			let nextTag: TagId = 0;
			const tagAllocs: TagAllocation[] = [];
			const tag = (alloc: (t: TagId) => TagAllocation): TagId => {
				const t = nextTag++;
				tagAllocs.push(alloc(t));
				return t;
			};

			const etype = (node: Node): EType =>
				F.pipe(
					maybeTranslateType(node.type),
					O.getOrElse((): EType => fail(node.location, { type: "TypeTranslation", message: "couldn't translate type", hostType: node.type })),
				);

			const columns = (schema: Schema, location: Location): Record<string, EType> =>
				Object.fromEntries(
					schema.fields.map(f => [
						f.name,
						F.pipe(
							maybeTranslateType(f.type),
							O.getOrElse((): EType => fail(location, { type: "TypeTranslation", message: `couldn't translate column ${f.name}`, hostType: f.type })),
						),
					]),
				);

			const tableOf = (node: Node | undefined, location: Location): { table: string; schema: Schema } => {
				if (node?.kind !== "TableRef") {
					return fail(location, { type: "NonLiteral", what: "table" });
				}
				return { table: node.table, schema: node.schema };
			};

			const seq = (terms: Term[], location: Location): Term => {
				const [first, ...rest] = terms;
				if (!first) {
					return fail(location, { type: "UnsupportedNode", what: "an empty body" });
				}
				return rest.length === 0 ? first : { type: "Seq", first, rest: seq(rest, location) };
			};

			const native = (node: Extract<Node, { kind: "Native" }>, scope: Scope): Term => {
				const { name, location } = node;
				// table arguments are resolved by name, not lowered
				const terms = node.args.map(a => (a.kind === "TableRef" ? undefined : go(a, scope)));
				const args = terms.filter((t): t is Term => t !== undefined);
				const [a, b, c] = terms;
				const [na] = node.args;
				const unsupported = (what: string): Term => ({ type: "Unsupported", what, args, location });

				if (name === "+" && na && na.type.type === "Prim" && na.type.prim === "string") {
					return unsupported("string concatenation");
				}
				if (name === "+" && na && na.type.type === "Object") {
					return unsupported("object merge");
				}
				if (name === "-" && a && args.length === 1) {
					return { type: "Unary", op: "Negate", arg: a, ety: etype(node) };
				}
				const arith = parseOperator(ArithOps, name);
				if (O.isSome(arith) && a && b) {
					return { type: "Arith", op: arith.value, left: a, right: b, ety: etype(node) };
				}
				const comparison = parseOperator(ComparisonOps, name);
				if (O.isSome(comparison) && a && b) {
					return { type: "Compare", op: comparison.value, left: a, right: b };
				}
				const logical = parseOperator(LogicalOps, name);
				if (O.isSome(logical)) {
					return { type: "Logical", op: logical.value, args };
				}
				const rounding = parseOperator(RoundingLikeOps, name);
				if (O.isSome(rounding) && a) {
					return { type: "Rounding", op: rounding.value, arg: a, precision: b };
				}
				const write = parseOperator(WriteTypes, name);
				if (O.isSome(write) && b && c) {
					const { table, schema } = tableOf(node.args[0], location);
					const t = tag(t => ({ type: "Write", tag: t, table, columns: columns(schema, location), location }));
					return { type: "Write", writeType: write.value, table, key: b, object: c, tag: t, location };
				}

				return match(name)
					.with("abs", (): Term => (a ? { type: "Unary", op: "Abs", arg: a, ety: etype(node) } : unsupported(name)))
					.with("sqrt", "ln", "exp", (): Term => (a ? { type: "Unary", op: name === "sqrt" ? "Sqrt" : name === "ln" ? "Ln" : "Exp", arg: a, ety: etype(node) } : unsupported(name)))
					.with("enforce", (): Term => (a ? { type: "Enforce", cond: a } : unsupported(name)))
					.with("enforce-keyset", (): Term => {
						if (!a || !na) {
							return unsupported(name);
						}
						const keyset: Term = na.type.type === "Prim" && na.type.prim === "string" ? { type: "ReadKeyset", name: a } : a;
						const t = tag(t => ({ type: "Auth", tag: t, location }));
						return { type: "EnforceKeyset", keyset, tag: t, location };
					})
					.with("read-keyset", (): Term => (a ? { type: "ReadKeyset", name: a } : unsupported(name)))
					.with("read", (): Term => {
						const { table, schema } = tableOf(node.args[0], location);
						if (!b) {
							return unsupported(name);
						}
						const t = tag(t => ({ type: "Read", tag: t, table, columns: columns(schema, location), location }));
						return { type: "Read", table, key: b, tag: t, location };
					})
					.with("at", (): Term => {
						const key = na?.kind === "Lit" && (na.literal.type === "String" || na.literal.type === "Symbol") ? na.literal.value : undefined;
						if (key === undefined || !b) {
							return fail(location, { type: "NonLiteral", what: "object field" });
						}
						return { type: "At", field: key, object: b, ety: etype(node) };
					})
					.with("add-time", (): Term => (a && b ? { type: "AddTime", time: a, seconds: b } : unsupported(name)))
					.with("time", (): Term => {
						if (na?.kind !== "Lit" || na.literal.type !== "String") {
							return fail(location, { type: "NonLiteral", what: "time" });
						}
						return { type: "Time", value: na.literal.value, location };
					})
					.otherwise(() => unsupported(name));
			};

			const go = (node: Node, scope: Scope): Term =>
				match(node)
					.with({ kind: "Lit" }, ({ literal }): Term =>
						match(literal)
							.with({ type: "Integer" }, ({ value }): Term => ({ type: "Lit", value: { type: "Int", value } }))
							.with({ type: "Decimal" }, ({ value }): Term => ({ type: "Lit", value: { type: "Decimal", value } }))
							.with({ type: "String" }, { type: "Symbol" }, ({ value }): Term => ({ type: "Lit", value: { type: "Str", value } }))
							.with({ type: "Bool" }, ({ value }): Term => ({ type: "Lit", value: { type: "Bool", value } }))
							.exhaustive(),
					)
					.with({ kind: "Var" }, ({ name, location }): Term => {
						const bound = scope[name];
						return bound ? { type: "Var", id: bound.id, name, ety: bound.ety } : fail(location, { type: "UnboundVariable", name });
					})
					.with({ kind: "Const" }, ({ value }) => go(value, scope))
					.with({ kind: "Native" }, n => native(n, scope))
					.with({ kind: "Call" }, ({ fn, location }) => fail(location, { type: "UserFunctionCall", fn }))
					.with({ kind: "If" }, (n): Term => ({ type: "If", cond: go(n.cond, scope), then: go(n.then, scope), else: go(n.else, scope) }))
					.with({ kind: "Let" }, ({ sequential, bindings, body, location }): Term => {
						const inner: Scope = { ...scope };
						const bound = bindings.map(binding => {
							const value = go(binding.value, sequential ? inner : scope);
							const id = nextId++;
							const ety = etype(binding.value);
							const t = tag(t => ({ type: "Var", tag: t, id, name: binding.name, ety, location: binding.location }));
							inner[binding.name] = { id, ety };
							return { id, name: binding.name, tag: t, value };
						});
						const rest = seq(
							body.map(b => go(b, inner)),
							location,
						);
						return bound.reduceRight<Term>((acc, b) => ({ type: "Let", id: b.id, name: b.name, tag: b.tag, value: b.value, body: acc }), rest);
					})
					.with({ kind: "Object" }, ({ entries }): Term => ({ type: "Object", fields: Object.fromEntries(entries.map(e => [e.key, go(e.value, scope)])) }))
					.with({ kind: "ListLit" }, ({ location }) => fail(location, { type: "UnsupportedNode", what: "list literals" }))
					.with({ kind: "TableRef" }, ({ table, location }) => fail(location, { type: "UnsupportedNode", what: `table ${table} used as a value` }))
					.exhaustive();

			const scope: Scope = Object.fromEntries(env.args.map(a => [a.name, { id: a.id, ety: a.ety }]));
			try {
				const term = seq(
					body.map(b => go(b, scope)),
					info,
				);
				return E.right({ env, term, tagAllocs });
			} catch (e) {
				if (e instanceof TranslateError) {
					return E.left({ location: e.location, failure: e.failure });
				}
				throw e;
			}
		}),
	);
