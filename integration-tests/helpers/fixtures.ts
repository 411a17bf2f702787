import fs from "fs";
import { init } from "z3-solver";

import type { Z3Handle } from "@covenant/shared/config/options";

export const fixture = (name: string): string => fs.readFileSync(new URL(`../fixtures/${name}`, import.meta.url), "utf-8");

export const z3 = async (): Promise<Z3Handle> => {
	const api = await init();
	return { Z3: api.Context("main"), core: api.Z3 };
};
