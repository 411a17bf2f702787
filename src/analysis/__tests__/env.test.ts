import { describe, it, expect } from "vitest";
import * as E from "fp-ts/Either";
import * as O from "fp-ts/Option";

import { Types, type Arg, type Schema } from "@covenant/lang/types";
import { dummyLocation } from "@covenant/shared/provenance";

import { allocateEnvironment, maybeTranslateType, RESULT_ID } from "../env";
import { ETypes } from "../types";

const arg = (name: string, type: Arg["type"]): Arg => ({ name, type, location: dummyLocation });
const schema = (fields: Arg[]): Schema => ({ name: "account", fields, location: dummyLocation });

describe("type translation", () => {
	it("translates primitives", () => {
		expect(maybeTranslateType(Types.Integer)).toEqual(O.some(ETypes.Int));
		expect(maybeTranslateType(Types.KeySet)).toEqual(O.some(ETypes.KeySet));
	});

	it("translates objects field by field", () => {
		const account = schema([arg("balance", Types.Decimal), arg("owner", Types.String)]);
		expect(maybeTranslateType(Types.Object(account))).toEqual(O.some({ type: "Object", fields: { balance: ETypes.Decimal, owner: ETypes.Str } }));
	});

	it("has no translation for lists, tables or objects holding them", () => {
		expect(maybeTranslateType(Types.List(Types.Integer))).toEqual(O.none);
		expect(maybeTranslateType(Types.Table(schema([])))).toEqual(O.none);
		expect(maybeTranslateType(Types.Object(schema([arg("xs", Types.List(Types.Integer))])))).toEqual(O.none);
		expect(maybeTranslateType(Types.Any)).toEqual(O.none);
	});
});

describe("environment allocation", () => {
	it("numbers the result first and arguments in order", () => {
		const env = allocateEnvironment(Types.Bool, [arg("x", Types.Integer), arg("id", Types.String)], dummyLocation);
		if (E.isLeft(env)) throw new Error(env.left.message);
		expect(env.right.result).toMatchObject({ id: RESULT_ID, name: "result", ety: ETypes.Bool });
		expect(env.right.args.map(a => [a.id, a.name])).toEqual([
			[1, "x"],
			[2, "id"],
		]);
		expect(env.right.nameEnv).toEqual({ result: 0, x: 1, id: 2 });
		expect(env.right.idEnv.get(2)).toEqual(ETypes.Str);
		expect(env.right.next).toBe(3);
	});

	it("fails on an untranslatable argument", () => {
		const env = allocateEnvironment(Types.Bool, [arg("xs", Types.List(Types.Integer))], dummyLocation);
		expect(E.isLeft(env) && env.left.message).toBe("couldn't translate argument type of 'xs'");
	});

	it("fails on an untranslatable result", () => {
		const env = allocateEnvironment(Types.Any, [], dummyLocation);
		expect(E.isLeft(env) && env.left.message).toBe("couldn't translate result type");
	});
});
