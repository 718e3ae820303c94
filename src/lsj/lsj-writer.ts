import { formatVersion } from "../document/model.js";
import { toNativeValue } from "../document/type-registry.js";
import type { LsAttribute, LsDocument, LsNode } from "../document/types.js";

export interface LsjWriteOptions {
	/** Zeilenende (default: "\r\n" wie LSLib) */
	eol?: string;
}

type Entry = [key: string, json: string];

/**
 * Dokument → LSJ-Text, Tab-Einrückung wie JSON.stringify(…, "\t").
 * Objekte werden von Hand geschrieben: bei Plain-Objects würden Schlüssel wie "10" nach vorne rutschen.
 */
export function writeLsj(doc: LsDocument, options?: LsjWriteOptions): string {
	const eol = options?.eol ?? "\r\n";

	// LSLib schreibt time immer, 0 = unbekannt
	const header: Entry[] = [
		["time", JSON.stringify(doc.time ?? 0)],
		["version", JSON.stringify(formatVersion(doc.version))]
	];

	const regions: Entry[] = doc.regions.map((r) => [r.id, serializeNode(r.root, 3, eol)]);

	const save: Entry[] = [
		["header", writeObject(header, 2, eol)],
		["regions", writeObject(regions, 2, eol)]
	];
	return writeObject([["save", writeObject(save, 1, eol)]], 0, eol);
}

function serializeNode(node: LsNode, indent: number, eol: string): string {
	const entries: Entry[] = node.members.map((m) => [
		m.id,
		m.kind === "attribute" ? serializeAttribute(m.attribute, indent + 1, eol) : writeArray(m.nodes.map((n) => serializeNode(n, indent + 2, eol)), indent + 1, eol)
	]);
	return writeObject(entries, indent, eol);
}

function serializeAttribute(attr: LsAttribute, indent: number, eol: string): string {
	const entries: Entry[] = [["type", JSON.stringify(attr.type)]];
	if (attr.value !== undefined) entries.push(["value", JSON.stringify(toNativeValue(attr.type, attr.value))]);
	if (attr.handle !== undefined) entries.push(["handle", JSON.stringify(attr.handle)]);
	if (attr.version) entries.push(["version", JSON.stringify(attr.version)]);
	return writeObject(entries, indent, eol);
}

function writeObject(entries: Entry[], indent: number, eol: string): string {
	if (entries.length === 0) return "{}";
	const inner = "\t".repeat(indent + 1);
	const body = entries.map(([key, json]) => `${inner}${JSON.stringify(key)}: ${json}`).join("," + eol);
	return `{${eol}${body}${eol}${"\t".repeat(indent)}}`;
}

function writeArray(items: string[], indent: number, eol: string): string {
	if (items.length === 0) return "[]";
	const inner = "\t".repeat(indent + 1);
	return `[${eol}${items.map((item) => inner + item).join("," + eol)}${eol}${"\t".repeat(indent)}]`;
}
