import * as E from "fp-ts/Either";
import { match } from "ts-pattern";

import { describeAnalyzeFailureNoLoc, describeTranslateFailureNoLoc } from "@covenant/analysis/errors";
import type { AnalyzeFailure, AnalyzeFailureNoLoc, TranslateFailure, TranslateFailureNoLoc } from "@covenant/analysis/errors";
import { showModel, type SaturatedModel } from "@covenant/analysis/model";
import type { TcFailure } from "@covenant/lang/ast";
import { display, type Type } from "@covenant/lang/types";
import { render, type Location } from "@covenant/shared/provenance";
import * as Exp from "@covenant/syntax/exp";

export type CheckSuccess = { type: "ProvedTheorem" } | { type: "SatisfiedProperty"; model: SaturatedModel };

export type SmtFailure =
	| { type: "Invalid"; model: SaturatedModel }
	| { type: "Unsatisfiable" }
	| { type: "Unknown"; reason: string }
	| { type: "UnexpectedFailure"; message: string };

export type CheckFailureNoLoc =
	| { type: "NotAFunction"; name: string }
	| { type: "TypecheckFailure"; failures: TcFailure[] }
	| { type: "TranslateFailure"; failure: TranslateFailureNoLoc }
	| { type: "AnalyzeFailure"; failure: AnalyzeFailureNoLoc }
	| { type: "SmtFailure"; failure: SmtFailure };

export type CheckFailure = { location: Location; failure: CheckFailureNoLoc };

export type CheckResult = E.Either<CheckFailure, CheckSuccess>;

/** The report for one module: property results per function, invariant results per function and table. */
export type ModuleChecks = {
	propertyChecks: Record<string, CheckResult[]>;
	invariantChecks: Record<string, Record<string, CheckResult[]>>;
};

/** A property or invariant that failed to parse, with the reason. */
export type ParseFailure = [Exp.Exp, string];

export type VerificationFailure =
	| { type: "ModuleParseFailures"; failures: ParseFailure[] }
	| { type: "ModuleCheckFailure"; failure: CheckFailure }
	| { type: "TypeTranslationFailure"; message: string; hostType: Type };

export const Constructors = {
	Proved: (): CheckSuccess => ({ type: "ProvedTheorem" }),
	Satisfied: (model: SaturatedModel): CheckSuccess => ({ type: "SatisfiedProperty", model }),
	Smt: (location: Location, failure: SmtFailure): CheckFailure => ({ location, failure: { type: "SmtFailure", failure } }),
	Translate: ({ location, failure }: TranslateFailure): CheckFailure => ({ location, failure: { type: "TranslateFailure", failure } }),
	Analyze: ({ location, failure }: AnalyzeFailure): CheckFailure => ({ location, failure: { type: "AnalyzeFailure", failure } }),
};

export const describeCheckSuccess = (success: CheckSuccess): string =>
	match(success)
		.with({ type: "ProvedTheorem" }, () => "Property proven valid")
		.with({ type: "SatisfiedProperty" }, ({ model }) => `Property satisfied with model:\n${showModel(model)}`)
		.exhaustive();

export const describeSmtFailure = (failure: SmtFailure): string =>
	match(failure)
		.with({ type: "Invalid" }, ({ model }) => `Invalidating model found:\n${showModel(model)}`)
		.with({ type: "Unsatisfiable" }, () => "This property is unsatisfiable")
		.with({ type: "Unknown" }, ({ reason }) => `The solver returned 'unknown':\n${JSON.stringify(reason)}`)
		.with({ type: "UnexpectedFailure" }, ({ message }) => message)
		.exhaustive();

/** Typecheck failures render one warning per line at their own locations; everything else at the check's. */
export const describeCheckFailure = ({ location, failure }: CheckFailure): string => {
	if (failure.type === "TypecheckFailure") {
		return failure.failures.map(f => `${render(f.location)}:Warning: ${f.message}`).join("\n");
	}
	const message = match(failure)
		.with({ type: "NotAFunction" }, ({ name }) => `No function named ${name}`)
		.with({ type: "TranslateFailure" }, ({ failure }) => describeTranslateFailureNoLoc(failure))
		.with({ type: "AnalyzeFailure" }, ({ failure }) => describeAnalyzeFailureNoLoc(failure))
		.with({ type: "SmtFailure" }, ({ failure }) => describeSmtFailure(failure))
		.exhaustive();
	return `${render(location)}:Warning: ${message}`;
};

export const describeCheckResult = (result: CheckResult): string => E.match(describeCheckFailure, describeCheckSuccess)(result);

export const describeParseFailure = ([exp, reason]: ParseFailure): string => `${render(exp.location)}: could not parse ${Exp.display(exp)}: ${reason}`;

export const describeVerificationFailure = (failure: VerificationFailure): string =>
	match(failure)
		.with({ type: "ModuleParseFailures" }, ({ failures }) => failures.map(describeParseFailure).join("\n"))
		.with({ type: "ModuleCheckFailure" }, ({ failure }) => describeCheckFailure(failure))
		.with({ type: "TypeTranslationFailure" }, ({ message, hostType }) => `${message}: ${display(hostType)}`)
		.exhaustive();

export const isSuccess = (result: CheckResult) => E.isRight(result);

export { showModel };
