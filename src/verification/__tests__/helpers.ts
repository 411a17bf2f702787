import * as E from "fp-ts/Either";
import { init } from "z3-solver";

import { describeLoadFailure, loadModules, type ModuleData, type ModuleName } from "@covenant/lang/module";
import type { Z3Handle } from "@covenant/shared/config/options";

let handle: Promise<Z3Handle> | undefined;

/** One solver context for the whole test file; initializing z3 is slow. */
export const z3 = (): Promise<Z3Handle> => {
	if (!handle) {
		handle = init().then(api => ({ Z3: api.Context("main"), core: api.Z3 }));
	}
	return handle;
};

export const load = (source: string): Record<ModuleName, ModuleData> => {
	const loaded = loadModules(source, "test.cov");
	if (E.isLeft(loaded)) {
		throw new Error(loaded.left.map(describeLoadFailure).join("\n"));
	}
	return loaded.right;
};

export const loadOne = (source: string, name = "test"): ModuleData => {
	const data = load(source)[name];
	if (!data) {
		throw new Error(`no module ${name}`);
	}
	return data;
};
