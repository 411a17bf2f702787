import { Token } from "moo";

export type WithLocation<T> = T & { location: Location };

export type Location = {
	from: LineCol;
	to?: LineCol;
	code?: string;
	file?: string;
};

export type LineCol = { line: number; column: number; token?: Token };

export type Located<T> = { location: Location; value: T };

export const located = <T>(location: Location, value: T): Located<T> => ({ location, value });

export const fromToken = (token: Token, file?: string): Location => ({
	from: { line: token.line, column: token.col, token },
	file,
});

export const span = (start: Location, end: Location): Location => ({
	...start,
	to: end.to ?? end.from,
});

/** Locations for checks that did not come from source text, such as ad-hoc checks. */
export const dummyLocation: Location = { from: { line: 0, column: 0 }, file: "<interactive>" };

export const render = (location: Location): string => `${location.file ?? "<input>"}:${location.from.line}:${location.from.column}`;
