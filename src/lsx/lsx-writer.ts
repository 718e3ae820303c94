import { attributesOf, childGroupsOf } from "../document/model.js";
import type { LsAttribute, LsDocument, LsNode } from "../document/types.js";

export interface LsxWriteOptions {
	/** UTF-8 BOM voranstellen wie LSLib (default: true) */
	bom?: boolean;
	/** Zeilenende (default: "\r\n" wie LSLib) */
	eol?: string;
}

export function writeLsx(doc: LsDocument, options?: LsxWriteOptions): string {
	const bom = options?.bom ?? true;
	const EOL = options?.eol ?? "\r\n";
	const v = doc.version;

	let xml = (bom ? "\uFEFF" : "") + '<?xml version="1.0" encoding="utf-8"?>' + EOL;
	xml += "<save>" + EOL;
	xml += `\t<version major="${v.major}" minor="${v.minor}" revision="${v.revision}" build="${v.build}" />` + EOL;
	for (const region of doc.regions) {
		xml += `\t<region id="${escapeXml(region.id)}">` + EOL;
		xml += serializeNode(region.root, 2, EOL);
		xml += `\t</region>` + EOL;
	}
	xml += "</save>";
	return xml;
}

function serializeNode(node: LsNode, indent: number, eol: string): string {
	const tab = "\t";
	const spacing = tab.repeat(indent);
	const inner = tab.repeat(indent + 1);

	// LSLib: leere Nodes als selbstschließend <node id="X" />
	if (node.members.length === 0) {
		return `${spacing}<node id="${escapeXml(node.id)}" />${eol}`;
	}

	let xml = `${spacing}<node id="${escapeXml(node.id)}">${eol}`;

	for (const [id, attr] of attributesOf(node)) {
		xml += serializeAttribute(id, attr, inner, eol);
	}

	// Alle Gruppen in einem <children>, Gruppe für Gruppe in Einfügereihenfolge
	let children = "";
	for (const [, nodes] of childGroupsOf(node)) {
		for (const child of nodes) {
			children += serializeNode(child, indent + 2, eol);
		}
	}
	if (children) {
		xml += `${inner}<children>${eol}${children}${inner}</children>${eol}`;
	}

	xml += `${spacing}</node>${eol}`;
	return xml;
}

function serializeAttribute(id: string, attr: LsAttribute, spacing: string, eol: string): string {
	let xml = `${spacing}<attribute id="${escapeXml(id)}" type="${escapeXml(attr.type)}"`;
	if (attr.value !== undefined) xml += ` value="${escapeXml(attr.value)}"`;
	if (attr.handle !== undefined) xml += ` handle="${escapeXml(attr.handle)}"`;
	if (attr.version) xml += ` version="${attr.version}"`;
	return xml + ` />${eol}`;
}

/** LSLib-kompatibel: <>&" escapen, Apostroph nicht; Zeilenumbrüche/Tabs als Zeichenreferenz */
function escapeXml(unsafe: string): string {
	return unsafe.replace(/[<>&"\n\r\t]/g, (c) => {
		switch (c) {
			case "<":
				return "&lt;";
			case ">":
				return "&gt;";
			case "&":
				return "&amp;";
			case '"':
				return "&quot;";
			case "\n":
				return "&#10;";
			case "\r":
				return "&#13;";
			case "\t":
				return "&#9;";
			default:
				return c;
		}
	});
}
