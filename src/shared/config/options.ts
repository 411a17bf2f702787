import type { Context, init } from "z3-solver";

export const options: {
	verbose: boolean;
	logFile: string | undefined;
	timeout: number | undefined;
} = {
	verbose: false,
	logFile: undefined,
	timeout: undefined,
};

/**
 * The low-level bindings are kept next to the high-level context: a few solver queries
 * (the reason behind an `unknown` answer) are only reachable through them.
 */
export type Z3Core = Awaited<ReturnType<typeof init>>["Z3"];

export type Z3Handle = {
	Z3: Context<"main">;
	core: Z3Core;
};

let handle: Z3Handle | undefined = undefined;

export const setZ3 = (h: Z3Handle) => {
	handle = h;
};
export const getZ3 = () => handle;
