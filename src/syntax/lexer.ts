import moo from "moo";

const unescape = (s: string) => s.replace(/\\(["\\nt])/g, (_, c: string) => (c === "n" ? "\n" : c === "t" ? "\t" : c));

export const lexer = moo.compile({
	ws: { match: /[ \t\r\n]+/, lineBreaks: true },
	comment: /;[^\n]*/,
	lparen: "(",
	rparen: ")",
	lbracket: "[",
	rbracket: "]",
	lbrace: "{",
	rbrace: "}",
	comma: ",",
	bind: ":=",
	colon: ":",
	string: { match: /"(?:\\["\\nt]|[^"\\\n])*"/, value: s => unescape(s.slice(1, -1)) },
	decimal: /-?[0-9]+\.[0-9]+/,
	integer: /-?[0-9]+/,
	symbol: { match: /'[a-zA-Z_][a-zA-Z0-9_\-.]*/, value: s => s.slice(1) },
	meta: { match: /@[a-zA-Z][a-zA-Z0-9\-]*/, value: s => s.slice(1) },
	atom: {
		match: /[a-zA-Z_+\-*/<>=!^%&|?.$][a-zA-Z0-9_+\-*/<>=!^%&|?.$]*/,
		type: moo.keywords({ bool: ["true", "false"] }),
	},
	error: moo.error,
});

export type TokenType = "lparen" | "rparen" | "lbracket" | "rbracket" | "lbrace" | "rbrace" | "comma" | "bind" | "colon" | "string" | "decimal" | "integer" | "symbol" | "meta" | "atom" | "bool" | "error";
