import { match } from "ts-pattern";

import type { Location } from "@covenant/shared/provenance";

export type Literal =
	| { type: "Integer"; value: bigint }
	| { type: "Decimal"; value: string }
	| { type: "String"; value: string }
	| { type: "Symbol"; value: string }
	| { type: "Bool"; value: boolean };

/**
 * Type annotations as written in source, before they are resolved against a module:
 * `x:integer`, `row:object{account}`, `accounts:{account}`, `xs:[integer]`.
 */
export type TypeAnn =
	| { type: "Prim"; name: string; location: Location }
	| { type: "Schema"; kind: "object" | "table" | "bare"; schema: string; location: Location }
	| { type: "List"; elem: TypeAnn; location: Location };

export type Exp =
	| { type: "Lit"; literal: Literal; location: Location }
	| { type: "Atom"; name: string; annotation?: TypeAnn; location: Location }
	| { type: "List"; delimiter: "paren" | "bracket"; items: Exp[]; location: Location }
	| { type: "Object"; entries: ObjectEntry[]; location: Location }
	| { type: "Meta"; key: string; value: Exp; location: Location };

export type ObjectEntry = { key: Exp; value: Exp; binding: boolean };

export const Constructors = {
	Lit: (literal: Literal, location: Location): Exp => ({ type: "Lit", literal, location }),
	Atom: (name: string, location: Location, annotation?: TypeAnn): Exp => ({ type: "Atom", name, annotation, location }),
	List: (items: Exp[], location: Location, delimiter: "paren" | "bracket" = "paren"): Exp => ({ type: "List", delimiter, items, location }),
};

export const displayLiteral = (lit: Literal): string =>
	match(lit)
		.with({ type: "Integer" }, ({ value }) => value.toString())
		.with({ type: "Decimal" }, ({ value }) => value)
		.with({ type: "String" }, ({ value }) => JSON.stringify(value))
		.with({ type: "Symbol" }, ({ value }) => `'${value}`)
		.with({ type: "Bool" }, ({ value }) => (value ? "true" : "false"))
		.exhaustive();

export const displayAnn = (ann: TypeAnn): string =>
	match(ann)
		.with({ type: "Prim" }, ({ name }) => name)
		.with({ type: "Schema", kind: "bare" }, ({ schema }) => `{${schema}}`)
		.with({ type: "Schema" }, ({ kind, schema }) => `${kind}{${schema}}`)
		.with({ type: "List" }, ({ elem }) => `[${displayAnn(elem)}]`)
		.exhaustive();

export const display = (exp: Exp): string =>
	match(exp)
		.with({ type: "Lit" }, ({ literal }) => displayLiteral(literal))
		.with({ type: "Atom" }, ({ name, annotation }) => (annotation ? `${name}:${displayAnn(annotation)}` : name))
		.with({ type: "List", delimiter: "paren" }, ({ items }) => `(${items.map(display).join(" ")})`)
		.with({ type: "List", delimiter: "bracket" }, ({ items }) => `[${items.map(display).join(" ")}]`)
		.with({ type: "Object" }, ({ entries }) => `{ ${entries.map(({ key, value, binding }) => `${display(key)} ${binding ? ":=" : ":"} ${display(value)}`).join(", ")} }`)
		.with({ type: "Meta" }, ({ key, value }) => `@${key} ${display(value)}`)
		.exhaustive();

/** The head symbol of an application form, if `exp` is one. */
export const head = (exp: Exp): string | undefined => {
	if (exp.type !== "List" || exp.delimiter !== "paren") {
		return undefined;
	}
	const [first] = exp.items;
	return first?.type === "Atom" ? first.name : undefined;
};

/** Literal string-like content: strings and symbols both name things (tables, columns, keysets). */
export const stringish = (exp: Exp): string | undefined => {
	if (exp.type !== "Lit") {
		return undefined;
	}
	return exp.literal.type === "String" || exp.literal.type === "Symbol" ? exp.literal.value : undefined;
};
