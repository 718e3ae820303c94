import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError, wrapStructureError } from "../errors.js";
import { addRegion, appendChild, baselineVersion, createDocument, createNode, setAttribute } from "../document/model.js";
import { GENERIC_TYPE } from "../document/type-registry.js";
import type { DuplicateAttributePolicy, LsAttribute, LsDocument, LsNode, LsVersion } from "../document/types.js";

export interface LsxReadOptions {
	/** Umgang mit doppelten Attribut-IDs in einem Node (default: "reject") */
	duplicateAttributes?: DuplicateAttributePolicy;
}

interface XmlElement {
	tag: string;
	attrs: Record<string, string>;
	children: XmlElement[];
}

// preserveOrder: Attribute eines Elements liegen unter ":@"
const ATTRS_KEY = ":@";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseXml(xml: string): unknown {
	const parser = new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: "@_",
		preserveOrder: true,
		parseAttributeValue: false,
		parseTagValue: false,
		trimValues: false,
		htmlEntities: true
	});
	return parser.parse(xml);
}

function getAttrs(el: unknown): Record<string, string> {
	if (!isRecord(el)) return {};
	const attrs: Record<string, string> = {};
	for (const k of Object.keys(el)) {
		if (k.startsWith("@_")) attrs[k.slice(2)] = String(el[k] ?? "");
	}
	return attrs;
}

/** preserveOrder-Ausgabe → Elementbaum (Text, Kommentare und Deklarationen fallen weg) */
function toElements(list: unknown): XmlElement[] {
	if (!Array.isArray(list)) return [];
	const result: XmlElement[] = [];
	for (const entry of list) {
		if (!isRecord(entry)) continue;
		const tag = Object.keys(entry).find((k) => k !== ATTRS_KEY);
		if (!tag || tag.startsWith("#") || tag.startsWith("?")) continue;
		result.push({ tag, attrs: getAttrs(entry[ATTRS_KEY]), children: toElements(entry[tag]) });
	}
	return result;
}

function parseUnsigned(raw: string, what: string, path: string): number {
	if (!/^\d+$/.test(raw)) throw new ParseError("lsx", `${what} ist keine Ganzzahl: "${raw}"`, { path });
	return parseInt(raw, 10);
}

function parseVersion(versionEl: XmlElement | undefined): LsVersion {
	const v = baselineVersion();
	if (!versionEl) return v;
	const a = versionEl.attrs;
	for (const field of ["major", "minor", "revision", "build"] as const) {
		const raw = a[field];
		if (raw !== undefined) v[field] = parseUnsigned(raw, `version.${field}`, "save/version");
	}
	return v;
}

function parseAttribute(el: XmlElement, path: string): [string, LsAttribute] {
	const a = el.attrs;
	if (a.id === undefined) throw new ParseError("lsx", "<attribute> ohne id", { path });
	const attr: LsAttribute = { type: a.type ?? GENERIC_TYPE };
	if (a.value !== undefined) attr.value = a.value;
	if (a.handle !== undefined) attr.handle = a.handle;
	if (a.version !== undefined) {
		// version="0" gilt als nicht vorhanden
		const version = parseUnsigned(a.version, `Attribut-Version von "${a.id}"`, path);
		if (version !== 0) attr.version = version;
	}
	return [a.id, attr];
}

function parseNode(el: XmlElement, parentPath: string, opts: LsxReadOptions): LsNode {
	const id = el.attrs.id;
	if (id === undefined) throw new ParseError("lsx", "<node> ohne id", { path: parentPath });
	const path = `${parentPath}/${id}`;
	const node = createNode(id);

	for (const child of el.children) {
		if (child.tag === "attribute") {
			const [attrId, attr] = parseAttribute(child, path);
			wrapStructureError("lsx", path, () => setAttribute(node, attrId, attr, opts.duplicateAttributes));
		} else if (child.tag === "children") {
			for (const childEl of child.children) {
				if (childEl.tag !== "node") continue;
				const childNode = parseNode(childEl, path, opts);
				wrapStructureError("lsx", path, () => appendChild(node, childNode));
			}
		}
	}

	return node;
}

/** LSX-Text → Dokument. Wirft ParseError bei ungültigem XML oder fehlender Struktur. */
export function parseLsx(xml: string, options: LsxReadOptions = {}): LsDocument {
	const text = xml.replace(/^\uFEFF/, "");
	const valid = XMLValidator.validate(text);
	if (valid !== true) {
		throw new ParseError("lsx", valid.err.msg, { line: valid.err.line, column: valid.err.col });
	}

	const save = toElements(parseXml(text)).find((el) => el.tag === "save");
	if (!save) throw new ParseError("lsx", "Ungültiges LSX: kein <save>-Wurzelelement");

	const doc = createDocument(parseVersion(save.children.find((el) => el.tag === "version")));

	for (const regionEl of save.children) {
		if (regionEl.tag !== "region") continue;
		const regionId = regionEl.attrs.id;
		if (regionId === undefined) throw new ParseError("lsx", "<region> ohne id", { path: "save" });
		const nodes = regionEl.children.filter((el) => el.tag === "node");
		if (nodes.length !== 1) {
			throw new ParseError("lsx", `Region "${regionId}" muss genau einen <node> enthalten (gefunden: ${nodes.length})`, {
				path: regionId
			});
		}
		const root = parseNode(nodes[0], regionId, options);
		wrapStructureError("lsx", regionId, () => addRegion(doc, regionId, root));
	}

	return doc;
}
