import { describe, expect, it } from "vitest";
import { classifyType, coerceValue, fromNativeValue, toNativeValue } from "./type-registry.js";

describe("classifyType", () => {
	it("maps known tags to their class", () => {
		expect(classifyType("FixedString")).toBe("string");
		expect(classifyType("guid")).toBe("string");
		expect(classifyType("uint64")).toBe("integer");
		expect(classifyType("double")).toBe("float");
	});

	it("treats unknown and inherited property names as unknown", () => {
		expect(classifyType("Vec3")).toBe("unknown");
		expect(classifyType("toString")).toBe("unknown");
		expect(classifyType(undefined)).toBe("unknown");
	});
});

describe("coerceValue", () => {
	it("turns True/False into booleans regardless of type", () => {
		expect(toNativeValue("int32", "True")).toBe(true);
		expect(toNativeValue("LSString", "False")).toBe(false);
		expect(toNativeValue("CustomTag", "True")).toBe(true);
	});

	it("keeps lowercase booleans as strings", () => {
		expect(toNativeValue("LSString", "true")).toBe("true");
		expect(toNativeValue("CustomTag", "true")).toBe("true");
	});

	it("keeps string-typed values as strings even when numeric", () => {
		expect(coerceValue("LSString", "42")).toEqual({ kind: "native", value: "42" });
		expect(coerceValue("guid", "123")).toEqual({ kind: "native", value: "123" });
	});

	it("parses integer types", () => {
		expect(coerceValue("int32", "42")).toEqual({ kind: "native", value: 42 });
		expect(coerceValue("int64", "-17")).toEqual({ kind: "native", value: -17 });
	});

	it("falls back to the raw string when an integer does not parse losslessly", () => {
		expect(coerceValue("int32", "abc")).toEqual({ kind: "mismatch", value: "abc", expected: "integer" });
		expect(coerceValue("uint8", "007")).toEqual({ kind: "mismatch", value: "007", expected: "integer" });
		expect(coerceValue("int32", "-0")).toEqual({ kind: "mismatch", value: "-0", expected: "integer" });
		expect(coerceValue("uint64", "18446744073709551615")).toEqual({
			kind: "mismatch",
			value: "18446744073709551615",
			expected: "integer"
		});
	});

	it("parses float types", () => {
		expect(coerceValue("float", "0.5")).toEqual({ kind: "native", value: 0.5 });
		expect(coerceValue("double", "42")).toEqual({ kind: "native", value: 42 });
	});

	it("falls back to the raw string for floats that would change on the way back", () => {
		expect(coerceValue("double", "1.0")).toEqual({ kind: "mismatch", value: "1.0", expected: "float" });
		expect(coerceValue("float", "nan")).toEqual({ kind: "mismatch", value: "nan", expected: "float" });
		expect(coerceValue("float", "")).toEqual({ kind: "mismatch", value: "", expected: "float" });
	});

	it("guesses numbers for unknown tags", () => {
		expect(toNativeValue("CustomTag", "3.14")).toBe(3.14);
		expect(toNativeValue("CustomTag", "12")).toBe(12);
		expect(toNativeValue(undefined, "5")).toBe(5);
	});

	it("keeps unparseable values of unknown tags as strings", () => {
		expect(coerceValue("CustomTag", "abc")).toEqual({ kind: "native", value: "abc" });
		expect(toNativeValue("CustomTag", "1.2.3")).toBe("1.2.3");
		expect(toNativeValue("Vec3", "1 2 3")).toBe("1 2 3");
	});
});

describe("fromNativeValue", () => {
	it("formats native values as LSX strings", () => {
		expect(fromNativeValue(true)).toBe("True");
		expect(fromNativeValue(false)).toBe("False");
		expect(fromNativeValue(42)).toBe("42");
		expect(fromNativeValue(3.14)).toBe("3.14");
		expect(fromNativeValue("abc")).toBe("abc");
	});
});
