import * as A from "fp-ts/Array";
import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";
import { match, P } from "ts-pattern";

import * as X from "@covenant/syntax/exp";
import type { Exp, TypeAnn } from "@covenant/syntax/exp";
import { read } from "@covenant/syntax/reader";
import type { Location } from "@covenant/shared/provenance";

export type ModuleName = string;

/** Metadata attached to a definition: `@doc`, `@property`, `@invariants`, ... keyed without the `@`. */
export type Meta = Record<string, Exp>;

export type Definition =
	| { type: "Defun"; name: string; returnAnn?: TypeAnn; args: Extract<Exp, { type: "Atom" }>[]; body: Exp[]; meta: Meta; location: Location }
	| { type: "Defconst"; name: string; value: Exp; meta: Meta; location: Location }
	| { type: "Defschema"; name: string; fields: Extract<Exp, { type: "Atom" }>[]; meta: Meta; location: Location }
	| { type: "Deftable"; name: string; schemaAnn?: TypeAnn; meta: Meta; location: Location };

export type Ref = { module: ModuleName; definition: Definition };

export type ModuleDef = { name: ModuleName; keyset: string; meta: Meta; location: Location };

export type ModuleData = { module: ModuleDef; refs: Record<string, Ref> };

export type LoadFailure = { location: Location; message: string };

const fail = (location: Location, message: string): E.Either<LoadFailure[], never> => E.left([{ location, message }]);

type Atom = Extract<Exp, { type: "Atom" }>;
const isAtom = (exp: Exp): exp is Atom => exp.type === "Atom";

/**
 * Splits the forms following a definition header into metadata and the remaining items.
 * A leading string followed by more forms is the definition's docstring.
 */
const splitMeta = (items: Exp[], allowDocstring: boolean): { meta: Meta; rest: Exp[] } => {
	const meta: Meta = {};
	const rest: Exp[] = [];
	items.forEach((item, i) => {
		if (item.type === "Meta") {
			meta[item.key] = item.value;
			return;
		}
		const isDoc = allowDocstring && i === 0 && item.type === "Lit" && item.literal.type === "String" && items.length > 1;
		if (isDoc) {
			meta["doc"] = item;
			return;
		}
		rest.push(item);
	});
	return { meta, rest };
};

const defun = (items: Exp[], location: Location): E.Either<LoadFailure[], Definition> => {
	const [name, args, ...tail] = items;
	if (!name || !isAtom(name)) {
		return fail(location, "defun: expected a function name");
	}
	if (!args || args.type !== "List" || args.delimiter !== "paren") {
		return fail(name.location, `defun ${name.name}: expected an argument list`);
	}
	const nonAtoms = args.items.filter(a => !isAtom(a));
	if (nonAtoms.length > 0) {
		return E.left(nonAtoms.map(a => ({ location: a.location, message: `defun ${name.name}: arguments must be names, found ${X.display(a)}` })));
	}
	const { meta, rest } = splitMeta(tail, true);
	if (rest.length === 0) {
		return fail(location, `defun ${name.name}: missing body`);
	}
	return E.right({ type: "Defun", name: name.name, returnAnn: name.annotation, args: args.items.filter(isAtom), body: rest, meta, location });
};

const defconst = (items: Exp[], location: Location): E.Either<LoadFailure[], Definition> => {
	const [name, value, ...tail] = items;
	if (!name || !isAtom(name) || !value) {
		return fail(location, "defconst: expected a name and a value");
	}
	const { meta, rest } = splitMeta(tail, false);
	const doc: Meta = rest.length === 1 && rest[0]?.type === "Lit" ? { doc: rest[0] } : {};
	return E.right({ type: "Defconst", name: name.name, value, meta: { ...meta, ...doc }, location });
};

const defschema = (items: Exp[], location: Location): E.Either<LoadFailure[], Definition> => {
	const [name, ...tail] = items;
	if (!name || !isAtom(name)) {
		return fail(location, "defschema: expected a schema name");
	}
	const { meta, rest } = splitMeta(tail, true);
	const bad = rest.filter(f => !isAtom(f) || !f.annotation);
	if (bad.length > 0) {
		return E.left(bad.map(f => ({ location: f.location, message: `defschema ${name.name}: fields must be annotated names, found ${X.display(f)}` })));
	}
	return E.right({ type: "Defschema", name: name.name, fields: rest.filter(isAtom), meta, location });
};

const deftable = (items: Exp[], location: Location): E.Either<LoadFailure[], Definition> => {
	const [name, ...tail] = items;
	if (!name || !isAtom(name)) {
		return fail(location, "deftable: expected a table name");
	}
	const { meta } = splitMeta(tail, true);
	return E.right({ type: "Deftable", name: name.name, schemaAnn: name.annotation, meta, location });
};

export const definition = (exp: Exp): E.Either<LoadFailure[], Definition> => {
	if (exp.type !== "List" || exp.delimiter !== "paren") {
		return fail(exp.location, `expected a definition, found ${X.display(exp)}`);
	}
	const [, ...items] = exp.items;
	return match(X.head(exp))
		.with("defun", () => defun(items, exp.location))
		.with("defconst", () => defconst(items, exp.location))
		.with("defschema", () => defschema(items, exp.location))
		.with("deftable", () => deftable(items, exp.location))
		.with(P._, h => fail(exp.location, `unknown definition form '${h ?? X.display(exp)}'`))
		.exhaustive();
};

export const moduleData = (exp: Exp): E.Either<LoadFailure[], ModuleData> => {
	if (X.head(exp) !== "module" || exp.type !== "List") {
		return fail(exp.location, `expected a module, found ${X.display(exp)}`);
	}
	const [, name, keyset, ...body] = exp.items;
	if (!name || !isAtom(name)) {
		return fail(exp.location, "module: expected a module name");
	}
	const keysetName = keyset ? X.stringish(keyset) : undefined;
	if (keysetName === undefined) {
		return fail(name.location, `module ${name.name}: expected a governing keyset name`);
	}
	const { meta, rest } = splitMeta(body, true);
	const [failures, defs] = F.pipe(rest, A.map(definition), A.separate, ({ left, right }) => [A.flatten(left), right] as const);

	const refs: Record<string, Ref> = {};
	const duplicates: LoadFailure[] = [];
	defs.forEach(def => {
		if (refs[def.name]) {
			duplicates.push({ location: def.location, message: `module ${name.name}: duplicate definition of '${def.name}'` });
			return;
		}
		refs[def.name] = { module: name.name, definition: def };
	});

	const all = failures.concat(duplicates);
	if (all.length > 0) {
		return E.left(all);
	}
	return E.right({ module: { name: name.name, keyset: keysetName, meta, location: exp.location }, refs });
};

/** Loads every module in `source`, collecting the failures of all of them. */
export const loadModules = (source: string, file?: string): E.Either<LoadFailure[], Record<ModuleName, ModuleData>> =>
	F.pipe(
		read(source, file),
		E.mapLeft(failure => [failure]),
		E.chain(exps => {
			const { left, right } = F.pipe(exps, A.map(moduleData), A.separate);
			const failures = A.flatten(left);
			if (failures.length > 0) {
				return E.left(failures);
			}
			const modules: Record<ModuleName, ModuleData> = {};
			for (const data of right) {
				if (modules[data.module.name]) {
					return fail(data.module.location, `duplicate module '${data.module.name}'`);
				}
				modules[data.module.name] = data;
			}
			return E.right(modules);
		}),
	);

export const loadModule = (source: string, name: ModuleName, file?: string): E.Either<LoadFailure[], ModuleData> =>
	F.pipe(
		loadModules(source, file),
		E.chain(modules => {
			const data = modules[name];
			return data ? E.right(data) : fail({ from: { line: 1, column: 1 }, file }, `no module named '${name}'`);
		}),
	);

export const describeLoadFailure = ({ location, message }: LoadFailure) => `${location.file ?? "<input>"}:${location.from.line}:${location.from.column}: ${message}`;
