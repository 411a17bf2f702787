import * as A from "fp-ts/Array";
import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import * as O from "fp-ts/Option";

import { allocateEnvironment, maybeTranslateType } from "@covenant/analysis/env";
import { expToCheck, expToInvariant } from "@covenant/analysis/parse";
import { ETypes } from "@covenant/analysis/types";
import type { Check, EType, Table, TableEnv } from "@covenant/analysis/types";
import type { Arg, FunType } from "@covenant/lang/types";
import type { Meta, ModuleData, ModuleName, Ref } from "@covenant/lang/module";
import { typecheckTopLevel } from "@covenant/lang/typecheck";
import type { Located } from "@covenant/shared/provenance";
import type { Exp } from "@covenant/syntax/exp";

import type { ParseFailure, VerificationFailure } from "./result";

export type FunChecks = { ref: Ref; checks: E.Either<ParseFailure[], Located<Check>[]> };

/** Column types of the fields that have a symbolic representation. */
const columnTypes = (fields: Arg[]): Record<string, EType> =>
	Object.fromEntries(
		fields.flatMap(f =>
			F.pipe(
				maybeTranslateType(f.type),
				O.match(
					(): [string, EType][] => [],
					(ety): [string, EType][] => [[f.name, ety]],
				),
			),
		),
	);

/**
 * Metadata under the plural key must be a list; the singular key holds one expression. Both may be
 * given, in which case the plural entries come first.
 */
export const collectExps = (name: string, multi: Exp | undefined, single: Exp | undefined): E.Either<ParseFailure[], Exp[]> => {
	const singles = single ? [single] : [];
	if (!multi) {
		return E.right(singles);
	}
	if (multi.type !== "List" || multi.delimiter !== "bracket") {
		return E.left([[multi, `${name} must be a list`]]);
	}
	return E.right([...multi.items, ...singles]);
};

/** Parses every expression, collecting all failures rather than stopping at the first. */
export const runExpParserOver = <T>(
	name: string,
	multi: Exp | undefined,
	single: Exp | undefined,
	parser: (exp: Exp) => E.Either<string, T>,
): E.Either<ParseFailure[], Located<T>[]> =>
	F.pipe(
		collectExps(name, multi, single),
		E.chain(exps => {
			const { left, right } = F.pipe(
				exps,
				A.map(exp =>
					F.pipe(
						parser(exp),
						E.bimap(
							(reason): ParseFailure => [exp, reason],
							(value): Located<T> => ({ location: exp.location, value }),
						),
					),
				),
				A.separate,
			);
			return left.length > 0 ? E.left(left) : E.right(right);
		}),
	);

const metaOf = (ref: Ref): Meta => ref.definition.meta;

/**
 * Every table visible to `data`, with the invariants its schema declares. Tables come from all
 * loaded modules; schemas, and so invariants, only from the module being verified.
 */
export const moduleTables = (modules: Record<ModuleName, ModuleData>, data: ModuleData): E.Either<ParseFailure[], Table[]> => {
	const tables = Object.values(modules).flatMap(m => Object.values(m.refs).filter(ref => ref.definition.type === "Deftable"));
	const schemas = Object.fromEntries(Object.values(data.refs).flatMap((ref): [string, Ref][] => (ref.definition.type === "Defschema" ? [[ref.definition.name, ref]] : [])));

	const { left, right } = F.pipe(
		tables,
		A.filterMap(ref => {
			const { topLevel } = typecheckTopLevel(ref, modules);
			return topLevel.type === "TopTable" ? O.some(topLevel) : O.none;
		}),
		A.map(({ name, schema }) => {
			const schemaRef = schemas[schema.name];
			const meta = schemaRef ? metaOf(schemaRef) : {};
			const fieldEnv = columnTypes(schema.fields);
			return F.pipe(
				runExpParserOver("invariants", meta["invariants"], meta["invariant"], exp => expToInvariant(ETypes.Bool, fieldEnv, exp)),
				E.map((invariants): Table => ({ name, schema, invariants })),
			);
		}),
		A.separate,
	);
	return left.length > 0 ? E.left(A.flatten(left)) : E.right(right);
};

/** Definitions the typechecker can give a function type: functions and constants. */
export const moduleTypecheckableRefs = (data: ModuleData): Record<string, Ref> =>
	Object.fromEntries(Object.entries(data.refs).filter(([, ref]) => ref.definition.type === "Defun" || ref.definition.type === "Defconst"));

export const tableEnv = (tables: Table[]): TableEnv => Object.fromEntries(tables.map(t => [t.name, columnTypes(t.schema.fields)]));

/**
 * Parses the properties of every function. Quantified variables in a property are numbered after
 * the function's result and arguments. An untranslatable signature fails the whole module.
 */
export const moduleFunChecks = (tables: Table[], modTys: Record<string, { ref: Ref; funType: FunType }>): E.Either<VerificationFailure, Record<string, FunChecks>> => {
	const tenv = tableEnv(tables);
	return F.pipe(
		Object.entries(modTys),
		A.traverse(E.Applicative)(([name, { ref, funType }]) =>
			F.pipe(
				allocateEnvironment(funType.result, funType.args, ref.definition.location),
				E.mapLeft(({ message, type }): VerificationFailure => ({ type: "TypeTranslationFailure", message, hostType: type })),
				E.map((env): [string, FunChecks] => {
					const meta = metaOf(ref);
					const checks = runExpParserOver("properties", meta["properties"], meta["property"], exp => expToCheck(tenv, env.next, env.nameEnv, env.idEnv, exp));
					return [name, { ref, checks }];
				}),
			),
		),
		E.map(entries => Object.fromEntries(entries)),
	);
};
