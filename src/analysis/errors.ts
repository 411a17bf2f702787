import { match } from "ts-pattern";

import { display, type Type } from "@covenant/lang/types";
import type { Location } from "@covenant/shared/provenance";

export type TranslateFailureNoLoc =
	| { type: "UnsupportedNode"; what: string }
	| { type: "UserFunctionCall"; fn: string }
	| { type: "UnboundVariable"; name: string }
	| { type: "TypeTranslation"; message: string; hostType: Type }
	| { type: "NonLiteral"; what: string };

export type TranslateFailure = { location: Location; failure: TranslateFailureNoLoc };

export type AnalyzeFailureNoLoc =
	| { type: "UnsupportedOperation"; what: string }
	| { type: "UnknownTable"; table: string }
	| { type: "MalformedTerm"; message: string };

export type AnalyzeFailure = { location: Location; failure: AnalyzeFailureNoLoc };

export const describeTranslateFailureNoLoc = (failure: TranslateFailureNoLoc): string =>
	match(failure)
		.with({ type: "UnsupportedNode" }, ({ what }) => `Analysis of ${what} is not supported`)
		.with({ type: "UserFunctionCall" }, ({ fn }) => `Calls to user functions are not yet supported: ${fn}`)
		.with({ type: "UnboundVariable" }, ({ name }) => `Unbound variable ${name}`)
		.with({ type: "TypeTranslation" }, ({ message, hostType }) => `${message}: ${display(hostType)}`)
		.with({ type: "NonLiteral" }, ({ what }) => `Expected a literal for ${what}`)
		.exhaustive();

export const describeAnalyzeFailureNoLoc = (failure: AnalyzeFailureNoLoc): string =>
	match(failure)
		.with({ type: "UnsupportedOperation" }, ({ what }) => `Unsupported operation: ${what}`)
		.with({ type: "UnknownTable" }, ({ table }) => `Unknown table ${table}`)
		.with({ type: "MalformedTerm" }, ({ message }) => `Malformed term: ${message}`)
		.exhaustive();
