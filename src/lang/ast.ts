import type { Literal } from "@covenant/syntax/exp";
import type { Location } from "@covenant/shared/provenance";

import type { Arg, FunType, Schema, Type } from "./types";

/** A typechecked expression. Every node carries the type the checker assigned to it. */
export type Node = { type: Type; location: Location } & Kind;

export type Kind =
	| { kind: "Lit"; literal: Literal }
	| { kind: "Var"; name: string }
	/** A module constant, with its definition inlined. */
	| { kind: "Const"; name: string; value: Node }
	| { kind: "Native"; name: string; args: Node[] }
	| { kind: "Call"; fn: string; args: Node[] }
	| { kind: "If"; cond: Node; then: Node; else: Node }
	| { kind: "Let"; sequential: boolean; bindings: Binding[]; body: Node[] }
	| { kind: "Object"; entries: { key: string; value: Node }[] }
	| { kind: "ListLit"; items: Node[] }
	| { kind: "TableRef"; table: string; schema: Schema };

export type Binding = { name: string; value: Node; location: Location };

export type TopLevel =
	| { type: "TopFun"; name: string; info: Location; funType: FunType; args: Arg[]; body: Node[] }
	| { type: "TopConst"; name: string; info: Location; constType: Type; value: Node }
	| { type: "TopTable"; name: string; info: Location; schema: Schema }
	| { type: "TopSchema"; name: string; info: Location; schema: Schema };

export type TcFailure = { location: Location; message: string };
