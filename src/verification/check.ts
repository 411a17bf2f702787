import * as A from "fp-ts/Array";
import * as E from "fp-ts/Either";
import * as F from "fp-ts/function";

import { runInvariantAnalysis, runPropertyAnalysis } from "@covenant/analysis/eval";
import { allocArgs, allocModelTags, saturateModel, symbolic, type Model, type Symbolic } from "@covenant/analysis/model";
import { translate } from "@covenant/analysis/translate";
import { checkGoal, type Check, type Table } from "@covenant/analysis/types";
import type { Node, TcFailure, TopLevel } from "@covenant/lang/ast";
import type { ModuleData, ModuleName, Ref } from "@covenant/lang/module";
import { typecheckTopLevel } from "@covenant/lang/typecheck";
import type { Arg, FunType, Type } from "@covenant/lang/types";
import { options, type Z3Handle } from "@covenant/shared/config/options";
import { logger, scoped } from "@covenant/shared/logging";
import { dummyLocation, type Located, type Location } from "@covenant/shared/provenance";

import { moduleFunChecks, moduleTables, moduleTypecheckableRefs } from "./extract";
import { Constructors, describeCheckResult } from "./result";
import type { CheckFailure, CheckResult, CheckSuccess, ModuleChecks, SmtFailure, VerificationFailure } from "./result";
import { inNewAssertionStack, withSession, type SessionConfig, type SolverSession } from "./session";
import type { VerificationServiceAPI, VerificationServiceOptions } from "./types";

/** What translation needs from a typechecked function. */
export type FunctionBody = { info: Location; args: Arg[]; resultType: Type; body: Node[] };

/**
 * Reads the solver's answer according to the session's goal. Models are saturated here, while
 * the session that produced them is still open.
 */
const resultQuery = async (session: SolverSession, sym: Symbolic, model: Model): Promise<E.Either<SmtFailure, CheckSuccess>> => {
	const answer = await session.checkSat();
	if (answer.type === "Unknown") {
		return E.left<SmtFailure>({ type: "Unknown", reason: answer.reason });
	}
	if (session.goal === "Validation") {
		return answer.type === "Unsat" ? E.right(Constructors.Proved()) : E.left<SmtFailure>({ type: "Invalid", model: saturateModel(sym, model, session.model()) });
	}
	return answer.type === "Sat" ? E.right(Constructors.Satisfied(saturateModel(sym, model, session.model()))) : E.left<SmtFailure>({ type: "Unsatisfiable" });
};

/** The body of a typechecked function, or the checker's failures. Other definitions have none. */
const functionBody = (topLevel: TopLevel, failures: TcFailure[]): E.Either<CheckFailure, FunctionBody> | undefined => {
	if (topLevel.type !== "TopFun") {
		return undefined;
	}
	if (failures.length > 0) {
		return E.left({ location: topLevel.info, failure: { type: "TypecheckFailure", failures } });
	}
	return E.right({ info: topLevel.info, args: topLevel.args, resultType: topLevel.funType.result, body: topLevel.body });
};

const unexpected = (location: Location, e: unknown): CheckFailure =>
	Constructors.Smt(location, { type: "UnexpectedFailure", message: e instanceof Error ? e.message : String(e) });

export const VerificationService = (handle: Z3Handle, { timeout = options.timeout }: VerificationServiceOptions = {}): VerificationServiceAPI => {
	const config: SessionConfig = { handle, timeout };

	const verifyFunctionProperty = async ({ info, args, resultType, body }: FunctionBody, tables: Table[], { location, value: check }: Located<Check>): Promise<CheckResult> => {
		const translated = translate(info, args, resultType, body);
		if (E.isLeft(translated)) {
			return E.left(Constructors.Translate(translated.left));
		}
		const { env, term, tagAllocs } = translated.right;

		return withSession<CheckSuccess>(config, checkGoal(check), location, async session => {
			const sym = symbolic(handle.Z3);
			const modelArgs = allocArgs(sym, env);
			const tags = allocModelTags(sym, tagAllocs);
			const analysis = runPropertyAnalysis(sym, check, tables, modelArgs.args, modelArgs.result, term, tags, info);
			if (E.isLeft(analysis)) {
				return E.left(Constructors.Analyze(analysis.left));
			}
			const { result, constraints } = analysis.right;
			session.assert(...constraints);
			session.emit(result.prop);
			const model: Model = { ...modelArgs, tags, ksProvs: result.ksProvs };
			return F.pipe(
				await resultQuery(session, sym, model),
				E.mapLeft(failure => Constructors.Smt(location, failure)),
			);
		});
	};

	/**
	 * Translates the function once and checks every invariant of every table it touches in one
	 * session, each in its own assertion scope. A failure in one scope does not stop the others.
	 */
	const verifyFunctionInvariants = async ({ info, args, resultType, body }: FunctionBody, tables: Table[]): Promise<E.Either<CheckFailure, Record<string, CheckResult[]>>> => {
		const translated = translate(info, args, resultType, body);
		if (E.isLeft(translated)) {
			return E.left(Constructors.Translate(translated.left));
		}
		const { env, term, tagAllocs } = translated.right;

		return withSession<Record<string, CheckResult[]>>(config, "Validation", info, async session => {
			const sym = symbolic(handle.Z3);
			const modelArgs = allocArgs(sym, env);
			const tags = allocModelTags(sym, tagAllocs);
			const analysis = runInvariantAnalysis(sym, tables, modelArgs.args, modelArgs.result, term, tags, info);
			if (E.isLeft(analysis)) {
				return E.left(Constructors.Analyze(analysis.left));
			}
			const { result: byTable, constraints } = analysis.right;
			session.assert(...constraints);

			const results: Record<string, CheckResult[]> = {};
			for (const [table, invariants] of Object.entries(byTable)) {
				const checked: CheckResult[] = [];
				for (const { location, value } of invariants) {
					const model: Model = { ...modelArgs, tags, ksProvs: value.ksProvs };
					try {
						const answer = await inNewAssertionStack(session, async () => {
							session.emit(value.prop);
							return resultQuery(session, sym, model);
						});
						checked.push(F.pipe(answer, E.mapLeft(failure => Constructors.Smt(location, failure))));
					} catch (e) {
						logger.warn(`invariant of ${table} failed: ${e instanceof Error ? e.message : String(e)}`);
						checked.push(E.left(unexpected(location, e)));
					}
				}
				results[table] = checked;
			}
			return E.right(results);
		});
	};

	const verifyFunctionProps = async (fn: FunctionBody, tables: Table[], props: Located<Check>[]): Promise<CheckResult[]> => {
		const results: CheckResult[] = [];
		for (const prop of props) {
			const result = await verifyFunctionProperty(fn, tables, prop);
			logger.debug(`property at line ${prop.location.from.line}: ${describeCheckResult(result)}`);
			results.push(result);
		}
		return results;
	};

	const verifyModule = async (modules: Record<ModuleName, ModuleData>, data: ModuleData): Promise<E.Either<VerificationFailure, ModuleChecks>> =>
		scoped<E.Either<VerificationFailure, ModuleChecks>>(data.module.name, async () => {
			const tables = moduleTables(modules, data);
			if (E.isLeft(tables)) {
				return E.left<VerificationFailure>({ type: "ModuleParseFailures", failures: tables.left });
			}
			logger.debug(`tables: ${tables.right.map(t => `${t.name} (${t.invariants.length} invariants)`).join(", ") || "none"}`);

			const modTys: Record<string, { ref: Ref; funType: FunType }> = {};
			const bodies: Record<string, E.Either<CheckFailure, FunctionBody>> = {};
			Object.entries(moduleTypecheckableRefs(data)).forEach(([name, ref]) => {
				const { topLevel, failures } = typecheckTopLevel(ref, modules);
				const fn = functionBody(topLevel, failures);
				if (topLevel.type === "TopFun" && fn) {
					modTys[name] = { ref, funType: topLevel.funType };
					bodies[name] = fn;
				}
			});

			const funChecks = moduleFunChecks(tables.right, modTys);
			if (E.isLeft(funChecks)) {
				return E.left(funChecks.left);
			}
			const parsed = Object.entries(funChecks.right).map(([name, { checks }]) =>
				F.pipe(
					checks,
					E.map(props => ({ name, props })),
				),
			);
			const { left: parseFailures, right: functions } = A.separate(parsed);
			if (parseFailures.length > 0) {
				return E.left<VerificationFailure>({ type: "ModuleParseFailures", failures: A.flatten(parseFailures) });
			}

			const checks: ModuleChecks = { propertyChecks: {}, invariantChecks: {} };
			for (const { name, props } of functions) {
				const fn = bodies[name];
				if (!fn) {
					continue;
				}
				const invariants = await scoped(name, async (): Promise<E.Either<CheckFailure, Record<string, CheckResult[]>>> => {
					if (E.isLeft(fn)) {
						checks.propertyChecks[name] = [fn];
						return fn;
					}
					checks.propertyChecks[name] = await verifyFunctionProps(fn.right, tables.right, props);
					return verifyFunctionInvariants(fn.right, tables.right);
				});
				if (E.isLeft(invariants)) {
					return E.left<VerificationFailure>({ type: "ModuleCheckFailure", failure: invariants.left });
				}
				checks.invariantChecks[name] = invariants.right;
			}
			return E.right(checks);
		});

	/** Checks `check` against one function of `data`, without scanning the rest of the module. */
	const verifyCheck = async (data: ModuleData, funName: string, check: Check): Promise<E.Either<VerificationFailure, CheckResult>> => {
		const modules = { [data.module.name]: data };
		const tables = moduleTables(modules, data);
		if (E.isLeft(tables)) {
			return E.left<VerificationFailure>({ type: "ModuleParseFailures", failures: tables.left });
		}
		const notAFunction = (location: Location): CheckResult => E.left<CheckFailure>({ location, failure: { type: "NotAFunction", name: funName } });
		const ref = data.refs[funName];
		if (!ref) {
			return E.right(notAFunction(dummyLocation));
		}
		const { topLevel, failures } = typecheckTopLevel(ref, modules);
		const fn = functionBody(topLevel, failures);
		if (!fn) {
			return E.right(notAFunction(topLevel.info));
		}
		if (E.isLeft(fn)) {
			return E.right(fn);
		}
		return E.right(await verifyFunctionProperty(fn.right, tables.right, { location: fn.right.info, value: check }));
	};

	return { verifyModule, verifyCheck, verifyFunctionProperty, verifyFunctionInvariants };
};
