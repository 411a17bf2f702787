import * as E from "fp-ts/Either";

import { describeLoadFailure, loadModules } from "@covenant/lang/module";
import type { Z3Handle } from "@covenant/shared/config/options";
import { logger, scoped } from "@covenant/shared/logging";
import { VerificationService, describeCheckResult, describeVerificationFailure, isSuccess, type VerificationServiceOptions } from "@covenant/verification";

export type Report = { ok: boolean; lines: string[] };

/**
 * Loads every module of `source` and verifies each of them against all loaded modules.
 * `ok` is false as soon as any module fails or any check does not succeed.
 */
export const verifySource = async (handle: Z3Handle, source: string, file?: string, opts: VerificationServiceOptions = {}): Promise<Report> => {
	const loaded = loadModules(source, file);
	if (E.isLeft(loaded)) {
		return { ok: false, lines: loaded.left.map(describeLoadFailure) };
	}
	const modules = loaded.right;
	const service = VerificationService(handle, opts);
	const report: Report = { ok: true, lines: [] };

	for (const [name, data] of Object.entries(modules)) {
		await scoped("verify", async () => {
			logger.debug(`verifying module ${name}`);
			const result = await service.verifyModule(modules, data);
			if (E.isLeft(result)) {
				report.ok = false;
				report.lines.push(describeVerificationFailure(result.left));
				return;
			}
			const { propertyChecks, invariantChecks } = result.right;
			Object.entries(propertyChecks).forEach(([fn, results]) =>
				results.forEach(r => {
					report.ok = report.ok && isSuccess(r);
					report.lines.push(`${name}.${fn}: ${describeCheckResult(r)}`);
				}),
			);
			Object.entries(invariantChecks).forEach(([fn, tables]) =>
				Object.entries(tables).forEach(([table, results]) =>
					results.forEach(r => {
						report.ok = report.ok && isSuccess(r);
						report.lines.push(`${name}.${fn} maintains ${table}: ${describeCheckResult(r)}`);
					}),
				),
			);
		});
	}
	return report;
};
