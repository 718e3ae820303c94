/**
 * Typ-Tags → Koerzierung an der LSJ-Grenze.
 * LSX kennt nur Strings, LSJ nutzt native JSON-Typen (bool, Zahl, String).
 */

export type NativeValue = string | number | boolean;

export type TypeClass = "string" | "integer" | "float" | "unknown";

const KNOWN_TYPES = {
	FixedString: "string",
	LSString: "string",
	TranslatedString: "string",
	guid: "string",
	int32: "integer",
	uint8: "integer",
	uint32: "integer",
	int64: "integer",
	uint64: "integer",
	float: "float",
	double: "float"
} as const satisfies Record<string, Exclude<TypeClass, "unknown">>;

type KnownType = keyof typeof KNOWN_TYPES;

/** Tag, wenn ein Attribut ohne "type" kommt */
export const GENERIC_TYPE = "string";

export type Coercion =
	| { kind: "native"; value: NativeValue }
	/** CoercionMismatch: Wert passt nicht zum Tag, Rohstring bleibt erhalten */
	| { kind: "mismatch"; value: string; expected: "integer" | "float" };

function isKnownType(tag: string): tag is KnownType {
	return Object.prototype.hasOwnProperty.call(KNOWN_TYPES, tag);
}

export function classifyType(tag: string | undefined): TypeClass {
	if (tag === undefined || !isKnownType(tag)) return "unknown";
	return KNOWN_TYPES[tag];
}

// Nur verlustfrei zurückwandelbare Zahlen gelten als geparst ("007", "1.0", "-0" bleiben Strings)
function parseInteger(raw: string): number | undefined {
	if (!/^-?\d+$/.test(raw)) return undefined;
	const n = Number(raw);
	if (!Number.isSafeInteger(n) || String(n) !== raw) return undefined;
	return n;
}

function parseFloatExact(raw: string): number | undefined {
	const n = Number(raw);
	if (!Number.isFinite(n) || String(n) !== raw) return undefined;
	return n;
}

function numeric(raw: string, expected: "integer" | "float"): Coercion {
	const n = expected === "integer" ? parseInteger(raw) : parseFloatExact(raw);
	return n === undefined ? { kind: "mismatch", value: raw, expected } : { kind: "native", value: n };
}

export function coerceValue(tag: string | undefined, raw: string): Coercion {
	// "True"/"False" gelten unabhängig vom Typ als bool
	if (raw === "True" || raw === "False") return { kind: "native", value: raw === "True" };

	const typeClass = classifyType(tag);
	switch (typeClass) {
		case "string":
			return { kind: "native", value: raw };
		case "integer":
		case "float":
			return numeric(raw, typeClass);
		case "unknown": {
			const guess = numeric(raw, raw.includes(".") ? "float" : "integer");
			return guess.kind === "native" ? guess : { kind: "native", value: raw };
		}
		default: {
			const exhaustive: never = typeClass;
			return exhaustive;
		}
	}
}

export function toNativeValue(tag: string | undefined, raw: string): NativeValue {
	return coerceValue(tag, raw).value;
}

export function fromNativeValue(value: NativeValue): string {
	if (typeof value === "boolean") return value ? "True" : "False";
	return String(value);
}
