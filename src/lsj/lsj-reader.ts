import { ParseError, wrapStructureError } from "../errors.js";
import { addRegion, appendChild, baselineVersion, createDocument, createNode, setAttribute } from "../document/model.js";
import { GENERIC_TYPE, fromNativeValue } from "../document/type-registry.js";
import type { LsAttribute, LsDocument, LsNode, LsVersion } from "../document/types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON.parse meldet "at position N" – in Zeile/Spalte umrechnen */
function locate(text: string, message: string): { line?: number; column?: number } {
	const m = message.match(/position (\d+)/);
	if (!m) return {};
	const before = text.slice(0, parseInt(m[1], 10));
	const lines = before.split("\n");
	return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}

/** "M.m.r.b" – gültige Ganzzahl-Präfixe übernehmen, Rest bleibt Baseline */
export function parseVersionString(version: string): LsVersion {
	const v = baselineVersion();
	const fields = ["major", "minor", "revision", "build"] as const;
	const parts = version.split(".");
	for (let i = 0; i < fields.length && i < parts.length; i++) {
		if (!/^\d+$/.test(parts[i])) break;
		v[fields[i]] = parseInt(parts[i], 10);
	}
	return v;
}

function parseAttribute(obj: Record<string, unknown>, path: string): LsAttribute {
	const { type, value, handle, version } = obj;

	let typeTag: string = GENERIC_TYPE;
	if (typeof type === "string") {
		typeTag = type;
	} else if (type !== undefined) {
		throw new ParseError("lsj", "type muss ein String sein", { path: `${path}.type` });
	}
	const attr: LsAttribute = { type: typeTag };

	if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
		attr.value = fromNativeValue(value);
	} else if (value !== undefined && value !== null) {
		throw new ParseError("lsj", "value muss ein Skalar sein", { path: `${path}.value` });
	}

	if (typeof handle === "string") {
		attr.handle = handle;
	} else if (handle !== undefined) {
		throw new ParseError("lsj", "handle muss ein String sein", { path: `${path}.handle` });
	}

	if (version !== undefined) {
		const n = typeof version === "string" && /^\d+$/.test(version) ? parseInt(version, 10) : version;
		if (typeof n !== "number" || !Number.isInteger(n) || n < 0) {
			throw new ParseError("lsj", "version muss eine nicht-negative Ganzzahl sein", { path: `${path}.version` });
		}
		if (n !== 0) attr.version = n;
	}

	return attr;
}

function parseNode(id: string, data: Record<string, unknown>, path: string): LsNode {
	const node = createNode(id);

	for (const [key, value] of Object.entries(data)) {
		const memberPath = `${path}.${key}`;
		if (Array.isArray(value)) {
			// Kindgruppe: jedes Element ist ein Node mit der Gruppen-ID
			value.forEach((item: unknown, i: number) => {
				const itemPath = `${memberPath}[${i}]`;
				if (!isRecord(item)) throw new ParseError("lsj", "Kindgruppe enthält kein Node-Objekt", { path: itemPath });
				const child = parseNode(key, item, itemPath);
				wrapStructureError("lsj", memberPath, () => appendChild(node, child));
			});
		} else if (isRecord(value)) {
			const attr = parseAttribute(value, memberPath);
			wrapStructureError("lsj", memberPath, () => setAttribute(node, key, attr));
		} else {
			throw new ParseError("lsj", "weder Attribut noch Kindgruppe", { path: memberPath });
		}
	}

	return node;
}

/** LSJ-Text → Dokument. Wirft ParseError bei ungültigem JSON oder fehlender Struktur. */
export function parseLsj(json: string): LsDocument {
	const text = json.replace(/^\uFEFF/, "");
	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err);
		throw new ParseError("lsj", message, { ...locate(text, message), cause: err });
	}

	const save = isRecord(data) ? data.save : undefined;
	if (!isRecord(save)) throw new ParseError("lsj", "Ungültiges LSJ: kein save-Objekt");

	const doc = createDocument();
	const header = save.header;
	if (isRecord(header)) {
		if (typeof header.version === "string") {
			doc.version = parseVersionString(header.version);
		} else if (header.version !== undefined) {
			throw new ParseError("lsj", "version muss ein String sein", { path: "save.header.version" });
		}
		if (typeof header.time === "number" && header.time !== 0) doc.time = header.time;
	} else if (header !== undefined) {
		throw new ParseError("lsj", "header muss ein Objekt sein", { path: "save.header" });
	}

	const regions = save.regions;
	if (!isRecord(regions)) throw new ParseError("lsj", "Ungültiges LSJ: kein regions-Objekt", { path: "save.regions" });

	for (const [regionId, regionData] of Object.entries(regions)) {
		const path = `save.regions.${regionId}`;
		if (!isRecord(regionData)) throw new ParseError("lsj", "Region ist kein Node-Objekt", { path });
		// LSJ kennt keine eigene ID für den Wurzelknoten – Region-ID übernehmen
		const root = parseNode(regionId, regionData, path);
		wrapStructureError("lsj", path, () => addRegion(doc, regionId, root));
	}

	return doc;
}
