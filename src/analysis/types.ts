import type { Location, Located } from "@covenant/shared/provenance";
import type { Schema } from "@covenant/lang/types";

import type { ArithOp, ComparisonOp, LogicalOp, RoundingLikeOp, UnaryArithOp, WriteType } from "./feature";

export type VarId = number;
export type TagId = number;

/** Types with a symbolic representation. */
export type EType =
	| { type: "Int" }
	| { type: "Decimal" }
	| { type: "Str" }
	| { type: "Bool" }
	| { type: "Time" }
	| { type: "KeySet" }
	| { type: "Object"; fields: Record<string, EType> };

export const ETypes = {
	Int: { type: "Int" },
	Decimal: { type: "Decimal" },
	Str: { type: "Str" },
	Bool: { type: "Bool" },
	Time: { type: "Time" },
	KeySet: { type: "KeySet" },
} satisfies Record<string, EType>;

export const showEType = (ty: EType): string => {
	switch (ty.type) {
		case "Int":
			return "integer";
		case "Decimal":
			return "decimal";
		case "Str":
			return "string";
		case "Bool":
			return "bool";
		case "Time":
			return "time";
		case "KeySet":
			return "keyset";
		case "Object":
			return `object{${Object.entries(ty.fields)
				.map(([k, v]) => `${k}:${showEType(v)}`)
				.join(", ")}}`;
	}
};

export const etypeEquals = (a: EType, b: EType): boolean => {
	if (a.type === "Object" && b.type === "Object") {
		const ka = Object.keys(a.fields);
		const kb = Object.keys(b.fields);
		return (
			ka.length === kb.length &&
			ka.every(k => {
				const fa = a.fields[k];
				const fb = b.fields[k];
				return fa !== undefined && fb !== undefined && etypeEquals(fa, fb);
			})
		);
	}
	return a.type === b.type;
};

export const isNumericE = (ty: EType) => ty.type === "Int" || ty.type === "Decimal";

export type Goal = "Validation" | "Satisfaction";

/**
 * Propositions of the property language. `Column` only appears in invariants, where it names a
 * field of the row the invariant is stated over.
 */
export type Prop =
	| { type: "BoolLit"; value: boolean }
	| { type: "IntLit"; value: bigint }
	| { type: "DecLit"; value: string }
	| { type: "StrLit"; value: string }
	| { type: "Var"; id: VarId; name: string; ety: EType }
	| { type: "Column"; name: string; ety: EType }
	| { type: "Arith"; op: ArithOp; left: Prop; right: Prop; ety: EType }
	| { type: "Unary"; op: UnaryArithOp; arg: Prop; ety: EType }
	| { type: "Compare"; op: ComparisonOp; left: Prop; right: Prop }
	| { type: "Logical"; op: LogicalOp; args: Prop[] }
	| { type: "Rounding"; op: RoundingLikeOp; arg: Prop; precision?: Prop }
	| { type: "At"; field: string; object: Prop; ety: EType }
	| { type: "StrLength"; arg: Prop }
	| { type: "StrConcat"; left: Prop; right: Prop }
	| { type: "AddTime"; time: Prop; seconds: Prop }
	| { type: "Forall" | "Exists"; id: VarId; name: string; ety: EType; body: Prop }
	| { type: "Success" }
	| { type: "Abort" }
	| { type: "TableWritten" | "TableRead"; table: string }
	| { type: "CellDelta"; table: string; column: string; row: Prop; ety: EType }
	| { type: "ColumnDelta"; table: string; column: string; ety: EType }
	| { type: "RowRead" | "RowWritten" | "RowReadCount" | "RowWriteCount"; table: string; row: Prop }
	| { type: "AuthorizedBy"; keyset: string }
	| { type: "RowEnforced"; table: string; column: string; row: Prop };

/** The three top-level check forms. `PropertyHolds` is validated assuming the transaction succeeds. */
export type Check = { type: "PropertyHolds" | "Valid" | "Satisfiable"; prop: Prop };

export const checkGoal = (check: Check): Goal => (check.type === "Satisfiable" ? "Satisfaction" : "Validation");

export type Invariant = Prop;

export type Table = { name: string; schema: Schema; invariants: Located<Invariant>[] };

export type TableEnv = Record<string, Record<string, EType>>;

/** Symbolic term a function body lowers to. */
export type Term =
	| { type: "Lit"; value: { type: "Int"; value: bigint } | { type: "Decimal"; value: string } | { type: "Str"; value: string } | { type: "Bool"; value: boolean } }
	| { type: "Var"; id: VarId; name: string; ety: EType }
	| { type: "Arith"; op: ArithOp; left: Term; right: Term; ety: EType }
	| { type: "Unary"; op: UnaryArithOp; arg: Term; ety: EType }
	| { type: "Compare"; op: ComparisonOp; left: Term; right: Term }
	| { type: "Logical"; op: LogicalOp; args: Term[] }
	| { type: "Rounding"; op: RoundingLikeOp; arg: Term; precision?: Term }
	| { type: "If"; cond: Term; then: Term; else: Term }
	| { type: "Let"; id: VarId; name: string; tag: TagId; value: Term; body: Term }
	| { type: "Seq"; first: Term; rest: Term }
	| { type: "Enforce"; cond: Term }
	| { type: "EnforceKeyset"; keyset: Term; tag: TagId; location: Location }
	| { type: "ReadKeyset"; name: Term }
	| { type: "Read"; table: string; key: Term; tag: TagId; location: Location }
	| { type: "Write"; writeType: WriteType; table: string; key: Term; object: Term; tag: TagId; location: Location }
	| { type: "Object"; fields: Record<string, Term> }
	| { type: "At"; field: string; object: Term; ety: EType }
	| { type: "AddTime"; time: Term; seconds: Term }
	| { type: "Time"; value: string; location: Location }
	/** A construct the analysis has no model for; reaching it fails the analysis. */
	| { type: "Unsupported"; what: string; args: Term[]; location: Location };

export type TagAllocation =
	| { type: "Read"; tag: TagId; table: string; columns: Record<string, EType>; location: Location }
	| { type: "Write"; tag: TagId; table: string; columns: Record<string, EType>; location: Location }
	| { type: "Auth"; tag: TagId; location: Location }
	| { type: "Var"; tag: TagId; id: VarId; name: string; ety: EType; location: Location };

export type ArgBinding = { id: VarId; name: string; ety: EType; location: Location };
