import _ from "lodash";

import { FEATURES, doc, type FeatureType, type Usage } from "./feature";

const escapeText = (s: string) => (s === "+" || s === "-" ? `\\${s}` : s);

export const escapeAnchor = (s: string) =>
	(s.startsWith("-") ? `minus${s.slice(1)}` : s)
		.replaceAll("^", "hat")
		.replaceAll("/", "slash")
		.replaceAll("+", "plus")
		.replaceAll("*", "star")
		.replaceAll("!", "bang")
		.replaceAll(">", "gt")
		.replaceAll("<", "lt")
		.replaceAll("=", "eq");

const showType = (ty: FeatureType) => (ty.type === "Var" ? `_${ty.name}_` : `\`${ty.name}\``);

const renderUsage = ({ template, constraints, form }: Usage): string[] => {
	const lines = ["```lisp", template, "```", ""];
	if (form.type === "Sym") {
		lines.push(`* of type ${showType(form.result)}`);
	} else {
		if (form.binds) {
			lines.push(`* binds \`${form.binds}\``);
		}
		form.args.forEach(a => lines.push(`* takes \`${a.name}\`: ${showType(a.type)}`));
		lines.push(`* produces ${showType(form.result)}`);
	}
	constraints.forEach(c =>
		lines.push(c.oneOf.length === 0 ? `* where _${c.var}_ is _any type_` : `* where _${c.var}_ is of type ${c.oneOf.map(t => `\`${t}\``).join(" or ")}`),
	);
	lines.push("");
	return lines;
};

/** Markdown reference of every property and invariant feature, grouped by section. */
export const renderFeatureDocs = (): string => {
	const lines = ["# Property and Invariant Functions {#properties-and-invariants}", ""];
	const groups = _.groupBy(FEATURES.map(doc), d => d.group);
	const anchored = new Set<string>();
	Object.entries(groups).forEach(([group, docs]) => {
		lines.push(`## ${group} {#${_.kebabCase(group)}}`, "");
		docs.forEach(d => {
			// symbols shared by several features are anchored once
			const anchor = anchored.has(d.symbol) ? "" : ` {#F${escapeAnchor(d.symbol)}}`;
			anchored.add(d.symbol);
			lines.push(`### ${escapeText(d.symbol)}${anchor}`, "");
			d.usages.forEach(u => lines.push(...renderUsage(u)));
			lines.push(d.description, "");
			lines.push(d.availability === "PropOnly" ? "Supported in properties only." : "Supported in either invariants or properties.", "");
		});
	});
	return lines.join("\n");
};
