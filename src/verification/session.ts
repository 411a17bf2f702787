import * as E from "fp-ts/Either";
import type { Bool, Model, Solver } from "z3-solver";

import type { Goal } from "@covenant/analysis/types";
import { options, type Z3Handle } from "@covenant/shared/config/options";
import { logger } from "@covenant/shared/logging";
import type { Location } from "@covenant/shared/provenance";

import { Constructors, type CheckFailure } from "./result";

export type SatResult = { type: "Sat" } | { type: "Unsat" } | { type: "Unknown"; reason: string };

/**
 * One incremental solver. The goal is fixed when the session opens: `emit` asserts the negation of
 * a proposition under `Validation` and the proposition itself under `Satisfaction`.
 */
export type SolverSession = {
	goal: Goal;
	pushScope: () => void;
	popScope: () => void;
	assert: (...terms: Bool<"main">[]) => void;
	emit: (prop: Bool<"main">) => void;
	checkSat: () => Promise<SatResult>;
	model: () => Model<"main">;
	/** Number of scopes currently pushed. */
	depth: () => number;
	/** Releases the solver. Models read from it afterwards are invalid. */
	close: () => void;
	closed: () => boolean;
};

export const openSession = ({ Z3, core }: Z3Handle, goal: Goal, timeout = options.timeout): SolverSession => {
	const solver: Solver<"main"> = new Z3.Solver();
	if (timeout !== undefined) {
		solver.set("timeout", timeout);
	}
	let depth = 0;
	let released = false;

	const pushScope = () => {
		solver.push();
		depth++;
	};
	const popScope = () => {
		if (depth === 0) {
			throw new Error("popScope: no scope to pop");
		}
		solver.pop();
		depth--;
	};
	const assert = (...terms: Bool<"main">[]) => solver.add(...terms);
	const emit = (prop: Bool<"main">) => assert(goal === "Validation" ? Z3.Not(prop) : prop);

	const checkSat = async (): Promise<SatResult> => {
		const answer = await solver.check();
		logger.debug(`solver answered ${answer}`);
		if (answer === "sat") {
			return { type: "Sat" };
		}
		if (answer === "unsat") {
			return { type: "Unsat" };
		}
		return { type: "Unknown", reason: core.solver_get_reason_unknown(Z3.ptr, solver.ptr) };
	};

	const close = () => {
		if (!released) {
			solver.release();
			released = true;
		}
	};

	return { goal, pushScope, popScope, assert, emit, checkSat, model: () => solver.model(), depth: () => depth, close, closed: () => released };
};

/** Runs `act` inside a fresh assertion scope, popped on every exit path. */
export const inNewAssertionStack = async <A>(session: SolverSession, act: () => Promise<A>): Promise<A> => {
	session.pushScope();
	try {
		return await act();
	} finally {
		session.popScope();
	}
};

export type SessionConfig = { handle: Z3Handle; timeout?: number };

/**
 * Opens a session for `goal` and runs `act` in it, closing the session on every exit path.
 * Anything the solver throws becomes an `UnexpectedFailure` located at `location`.
 */
export const withSession = async <A>(
	{ handle, timeout }: SessionConfig,
	goal: Goal,
	location: Location,
	act: (session: SolverSession) => Promise<E.Either<CheckFailure, A>>,
): Promise<E.Either<CheckFailure, A>> => {
	const session = openSession(handle, goal, timeout);
	try {
		return await act(session);
	} catch (e) {
		const message = e instanceof Error ? e.message : String(e);
		logger.warn(`solver session failed: ${message}`);
		return E.left(Constructors.Smt(location, { type: "UnexpectedFailure", message }));
	} finally {
		session.close();
	}
};
