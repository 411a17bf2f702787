import type * as E from "fp-ts/Either";

import type { Check, Table } from "@covenant/analysis/types";
import type { ModuleData, ModuleName } from "@covenant/lang/module";
import type { Located } from "@covenant/shared/provenance";

import type { FunctionBody } from "./check";
import type { CheckFailure, CheckResult, ModuleChecks, VerificationFailure } from "./result";

export type VerificationServiceOptions = {
	/** Per-query solver timeout in milliseconds. Defaults to the global option. */
	timeout?: number;
};

export type VerificationServiceAPI = {
	verifyModule: (modules: Record<ModuleName, ModuleData>, data: ModuleData) => Promise<E.Either<VerificationFailure, ModuleChecks>>;
	verifyCheck: (data: ModuleData, funName: string, check: Check) => Promise<E.Either<VerificationFailure, CheckResult>>;
	verifyFunctionProperty: (fn: FunctionBody, tables: Table[], check: Located<Check>) => Promise<CheckResult>;
	verifyFunctionInvariants: (fn: FunctionBody, tables: Table[]) => Promise<E.Either<CheckFailure, Record<string, CheckResult[]>>>;
};
