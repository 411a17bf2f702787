import * as A from "fp-ts/Array";
import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import * as O from "fp-ts/Option";
import { match } from "ts-pattern";

import type { Arg, Type } from "@covenant/lang/types";
import type { Location } from "@covenant/shared/provenance";

import type { ArgBinding, EType, VarId } from "./types";

export const RESULT_ID: VarId = 0;

/** Host types with a symbolic representation. Tables, lists and untyped values have none. */
export const maybeTranslateType = (ty: Type): O.Option<EType> =>
	match(ty)
		.with({ type: "Prim" }, ({ prim }): O.Option<EType> =>
			O.some(
				match(prim)
					.with("integer", (): EType => ({ type: "Int" }))
					.with("decimal", (): EType => ({ type: "Decimal" }))
					.with("string", (): EType => ({ type: "Str" }))
					.with("bool", (): EType => ({ type: "Bool" }))
					.with("time", (): EType => ({ type: "Time" }))
					.with("keyset", (): EType => ({ type: "KeySet" }))
					.exhaustive(),
			),
		)
		.with({ type: "Object" }, ({ schema }) =>
			F.pipe(
				schema.fields,
				A.traverse(O.Applicative)(f =>
					F.pipe(
						maybeTranslateType(f.type),
						O.map(ety => [f.name, ety] as const),
					),
				),
				O.map((fields): EType => ({ type: "Object", fields: Object.fromEntries(fields) })),
			),
		)
		.otherwise(() => O.none);

export type TypeTranslationError = { message: string; type: Type; location?: Location };

export type Env = {
	/** Argument and result names to their identifiers. */
	nameEnv: Record<string, VarId>;
	idEnv: Map<VarId, EType>;
	result: ArgBinding;
	args: ArgBinding[];
	/** First identifier free for variables introduced later, such as quantifier or let bindings. */
	next: VarId;
};

/**
 * Assigns identifiers to a function's result and arguments: 0 is `result`, arguments follow in
 * declaration order. Check parsing and term translation both go through here, so the identifiers
 * they assign always agree.
 */
export const allocateEnvironment = (resultType: Type, args: Arg[], location: Location): E.Either<TypeTranslationError, Env> =>
	F.pipe(
		E.Do,
		E.apS(
			"result",
			F.pipe(
				maybeTranslateType(resultType),
				E.fromOption((): TypeTranslationError => ({ message: "couldn't translate result type", type: resultType, location })),
				E.map((ety): ArgBinding => ({ id: RESULT_ID, name: "result", ety, location })),
			),
		),
		E.apS(
			"args",
			F.pipe(
				args,
				A.mapWithIndex((i, arg) =>
					F.pipe(
						maybeTranslateType(arg.type),
						E.fromOption((): TypeTranslationError => ({ message: `couldn't translate argument type of '${arg.name}'`, type: arg.type, location: arg.location })),
						E.map((ety): ArgBinding => ({ id: i + 1, name: arg.name, ety, location: arg.location })),
					),
				),
				A.sequence(E.Applicative),
			),
		),
		E.map(({ result, args }) => {
			const all = [result, ...args];
			return {
				result,
				args,
				nameEnv: Object.fromEntries(all.map(b => [b.name, b.id])),
				idEnv: new Map(all.map((b): [VarId, EType] => [b.id, b.ety])),
				next: all.length,
			};
		}),
	);
