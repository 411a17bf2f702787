import * as E from "fp-ts/Either";
import type { Token } from "moo";

import { lexer } from "./lexer";
import type { Exp, Literal, ObjectEntry, TypeAnn } from "./exp";
import { fromToken, type Location } from "@covenant/shared/provenance";

export type ReadFailure = { location: Location; message: string };

const PRIMS = ["integer", "decimal", "string", "bool", "time", "keyset"];

class ReadError extends Error {
	constructor(
		readonly location: Location,
		message: string,
	) {
		super(message);
	}
}

/**
 * Reads every top-level expression of `source`. Locations are 1-based and carry the
 * source text of the expression they belong to.
 */
export const read = (source: string, file?: string): E.Either<ReadFailure, Exp[]> => {
	lexer.reset(source);
	const tokens: Token[] = [];
	for (const tok of lexer) {
		if (tok.type === "ws" || tok.type === "comment") {
			continue;
		}
		tokens.push(tok);
	}

	let pos = 0;
	const loc = (tok: Token) => fromToken(tok, file);
	const eof = (): Location => {
		const last = tokens[tokens.length - 1];
		return last ? loc(last) : { from: { line: 1, column: 1 }, file };
	};

	const peek = (): Token | undefined => tokens[pos];
	const next = (): Token => {
		const tok = tokens[pos];
		if (!tok) {
			throw new ReadError(eof(), "unexpected end of input");
		}
		pos++;
		return tok;
	};
	const expect = (type: string): Token => {
		const tok = next();
		if (tok.type !== type) {
			throw new ReadError(loc(tok), `expected ${type} but found '${tok.text}'`);
		}
		return tok;
	};

	const withCode = (start: Token, location: Location): Location => {
		const end = tokens[pos - 1];
		const stop = end ? end.offset + end.text.length : start.offset + start.text.length;
		const last = end ?? start;
		return { ...location, to: { line: last.line, column: last.col }, code: source.slice(start.offset, stop) };
	};

	const typeAnn = (): TypeAnn => {
		const tok = next();
		const location = loc(tok);
		if (tok.type === "lbrace") {
			const schema = expect("atom");
			expect("rbrace");
			return { type: "Schema", kind: "bare", schema: schema.value, location };
		}
		if (tok.type === "lbracket") {
			const elem = typeAnn();
			expect("rbracket");
			return { type: "List", elem, location };
		}
		if (tok.type !== "atom") {
			throw new ReadError(location, `expected a type but found '${tok.text}'`);
		}
		if ((tok.value === "object" || tok.value === "table") && peek()?.type === "lbrace") {
			next();
			const schema = expect("atom");
			expect("rbrace");
			return { type: "Schema", kind: tok.value === "object" ? "object" : "table", schema: schema.value, location };
		}
		if (!PRIMS.includes(tok.value)) {
			throw new ReadError(location, `unknown type '${tok.value}'`);
		}
		return { type: "Prim", name: tok.value, location };
	};

	const literal = (tok: Token): Literal | undefined => {
		switch (tok.type) {
			case "integer":
				return { type: "Integer", value: BigInt(tok.value) };
			case "decimal":
				return { type: "Decimal", value: tok.value };
			case "string":
				return { type: "String", value: tok.value };
			case "symbol":
				return { type: "Symbol", value: tok.value };
			case "bool":
				return { type: "Bool", value: tok.value === "true" };
			default:
				return undefined;
		}
	};

	const sequence = (close: string): Exp[] => {
		const items: Exp[] = [];
		while (peek() && peek()?.type !== close) {
			items.push(exp());
		}
		expect(close);
		return items;
	};

	const object = (start: Token): Exp => {
		const entries: ObjectEntry[] = [];
		while (peek() && peek()?.type !== "rbrace") {
			const key = exp();
			const sep = next();
			if (sep.type !== "colon" && sep.type !== "bind") {
				throw new ReadError(loc(sep), `expected ':' or ':=' after object key but found '${sep.text}'`);
			}
			const value = exp();
			entries.push({ key, value, binding: sep.type === "bind" });
			if (peek()?.type === "comma") {
				next();
			}
		}
		expect("rbrace");
		return { type: "Object", entries, location: withCode(start, loc(start)) };
	};

	const exp = (): Exp => {
		const tok = next();
		const location = loc(tok);
		const lit = literal(tok);
		if (lit) {
			return { type: "Lit", literal: lit, location: withCode(tok, location) };
		}
		switch (tok.type) {
			case "atom": {
				if (peek()?.type === "colon") {
					next();
					const annotation = typeAnn();
					return { type: "Atom", name: tok.value, annotation, location: withCode(tok, location) };
				}
				return { type: "Atom", name: tok.value, location: withCode(tok, location) };
			}
			case "lparen":
				return { type: "List", delimiter: "paren", items: sequence("rparen"), location: withCode(tok, location) };
			case "lbracket":
				return { type: "List", delimiter: "bracket", items: sequence("rbracket"), location: withCode(tok, location) };
			case "lbrace":
				return object(tok);
			case "meta": {
				const value = exp();
				return { type: "Meta", key: tok.value, value, location: withCode(tok, location) };
			}
			case "error":
				throw new ReadError(location, `unexpected character '${tok.text.charAt(0)}'`);
			default:
				throw new ReadError(location, `unexpected '${tok.text}'`);
		}
	};

	try {
		const exps: Exp[] = [];
		while (pos < tokens.length) {
			exps.push(exp());
		}
		return E.right(exps);
	} catch (e) {
		if (e instanceof ReadError) {
			return E.left({ location: e.location, message: e.message });
		}
		throw e;
	}
};
