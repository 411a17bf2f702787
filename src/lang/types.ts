import { match, P } from "ts-pattern";

import type { Location } from "@covenant/shared/provenance";

export type PrimType = "integer" | "decimal" | "string" | "bool" | "time" | "keyset";

export type Type =
	| { type: "Prim"; prim: PrimType }
	| { type: "Object"; schema: Schema }
	| { type: "Table"; schema: Schema }
	| { type: "List"; elem: Type }
	/** Stands in for a type the checker could not determine; it unifies with everything. */
	| { type: "Any" };

export type Arg = { name: string; type: Type; location: Location };

export type Schema = { name: string; fields: Arg[]; location: Location };

export type FunType = { args: Arg[]; result: Type };

const prim = (p: PrimType): Type => ({ type: "Prim", prim: p });

export const Types = {
	Prim: prim,
	Integer: prim("integer"),
	Decimal: prim("decimal"),
	String: prim("string"),
	Bool: prim("bool"),
	Time: prim("time"),
	KeySet: prim("keyset"),
	Any: { type: "Any" } satisfies Type,
	Object: (schema: Schema): Type => ({ type: "Object", schema }),
	Table: (schema: Schema): Type => ({ type: "Table", schema }),
	List: (elem: Type): Type => ({ type: "List", elem }),
};

export const isPrim = (ty: Type, ...prims: PrimType[]): boolean => ty.type === "Prim" && prims.includes(ty.prim);

export const isNumeric = (ty: Type) => isPrim(ty, "integer", "decimal");

export const field = (schema: Schema, name: string): Arg | undefined => schema.fields.find(f => f.name === name);

/** Structural equality where `Any` matches anything; schemas are compared by name. */
export const unifies = (left: Type, right: Type): boolean =>
	match([left, right])
		.with([{ type: "Any" }, P._], [P._, { type: "Any" }], () => true)
		.with([{ type: "Prim" }, { type: "Prim" }], ([l, r]) => l.prim === r.prim)
		.with([{ type: "Object" }, { type: "Object" }], [{ type: "Table" }, { type: "Table" }], ([l, r]) => l.schema.name === r.schema.name)
		.with([{ type: "List" }, { type: "List" }], ([l, r]) => unifies(l.elem, r.elem))
		.otherwise(() => false);

export const display = (ty: Type): string =>
	match(ty)
		.with({ type: "Prim" }, ({ prim }) => prim)
		.with({ type: "Object" }, ({ schema }) => `object{${schema.name}}`)
		.with({ type: "Table" }, ({ schema }) => `table{${schema.name}}`)
		.with({ type: "List" }, ({ elem }) => `[${display(elem)}]`)
		.with({ type: "Any" }, () => "*")
		.exhaustive();
