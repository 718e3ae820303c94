import { StructureError } from "../errors.js";
import type { DuplicateAttributePolicy, LsAttribute, LsDocument, LsNode, LsRegion, LsVersion } from "./types.js";

export function baselineVersion(): LsVersion {
	return { major: 4, minor: 0, revision: 0, build: 0 };
}

export function formatVersion(v: LsVersion): string {
	return `${v.major}.${v.minor}.${v.revision}.${v.build}`;
}

export function createDocument(version: LsVersion = baselineVersion()): LsDocument {
	return { version: { ...version }, regions: [] };
}

export function createNode(id: string): LsNode {
	return { id, members: [] };
}

export function findRegion(doc: LsDocument, id: string): LsRegion | undefined {
	return doc.regions.find((r) => r.id === id);
}

export function addRegion(doc: LsDocument, id: string, root: LsNode): LsRegion {
	if (findRegion(doc, id)) {
		throw new StructureError(`Region "${id}" ist doppelt vorhanden`, { region: id });
	}
	const region: LsRegion = { id, root };
	doc.regions.push(region);
	return region;
}

/**
 * Attribut setzen. Doppelte ID: "reject" wirft, "overwrite" ersetzt an der alten Position.
 * Eine ID, die schon eine Kindgruppe bezeichnet, ist immer ein Fehler.
 */
export function setAttribute(node: LsNode, id: string, attribute: LsAttribute, policy: DuplicateAttributePolicy = "reject"): void {
	const index = node.members.findIndex((m) => m.id === id);
	if (index < 0) {
		node.members.push({ kind: "attribute", id, attribute });
		return;
	}
	const existing = node.members[index];
	if (existing.kind === "children") {
		throw new StructureError(`"${id}" ist in Node "${node.id}" zugleich Attribut und Kindgruppe`, { node: node.id, id });
	}
	if (policy === "reject") {
		throw new StructureError(`Attribut "${id}" ist in Node "${node.id}" doppelt vorhanden`, { node: node.id, id });
	}
	console.warn(`Warnung: Attribut "${id}" in Node "${node.id}" überschrieben`);
	node.members[index] = { kind: "attribute", id, attribute };
}

/** Hängt child an die Gruppe child.id an; neue Gruppen landen am Ende der Member-Liste. */
export function appendChild(parent: LsNode, child: LsNode): void {
	const existing = parent.members.find((m) => m.id === child.id);
	if (!existing) {
		parent.members.push({ kind: "children", id: child.id, nodes: [child] });
		return;
	}
	if (existing.kind === "attribute") {
		throw new StructureError(`"${child.id}" ist in Node "${parent.id}" zugleich Attribut und Kindgruppe`, {
			node: parent.id,
			id: child.id
		});
	}
	existing.nodes.push(child);
}

export function getAttribute(node: LsNode, id: string): LsAttribute | undefined {
	for (const m of node.members) {
		if (m.kind === "attribute" && m.id === id) return m.attribute;
	}
	return undefined;
}

export function getChildren(node: LsNode, groupId: string): LsNode[] {
	for (const m of node.members) {
		if (m.kind === "children" && m.id === groupId) return m.nodes;
	}
	return [];
}

export function* attributesOf(node: LsNode): Generator<[string, LsAttribute]> {
	for (const m of node.members) {
		if (m.kind === "attribute") yield [m.id, m.attribute];
	}
}

export function* childGroupsOf(node: LsNode): Generator<[string, LsNode[]]> {
	for (const m of node.members) {
		if (m.kind === "children") yield [m.id, m.nodes];
	}
}

export function countNodes(doc: LsDocument): number {
	const count = (node: LsNode): number => {
		let n = 1;
		for (const [, nodes] of childGroupsOf(node)) {
			for (const child of nodes) n += count(child);
		}
		return n;
	};
	return doc.regions.reduce((sum, r) => sum + count(r.root), 0);
}

export interface CompareOptions {
	/** LSJ speichert keine eigene ID für den Wurzelknoten einer Region */
	ignoreRootIds?: boolean;
}

/** Erste Abweichung zwischen zwei Dokumenten als Pfadbeschreibung, sonst undefined */
export function findDifference(a: LsDocument, b: LsDocument, options: CompareOptions = {}): string | undefined {
	if (formatVersion(a.version) !== formatVersion(b.version)) {
		return `version: ${formatVersion(a.version)} ≠ ${formatVersion(b.version)}`;
	}
	if (a.regions.length !== b.regions.length) return `Regionen: ${a.regions.length} ≠ ${b.regions.length}`;
	for (let i = 0; i < a.regions.length; i++) {
		const ra = a.regions[i];
		const rb = b.regions[i];
		if (ra.id !== rb.id) return `Region ${i}: "${ra.id}" ≠ "${rb.id}"`;
		if (!options.ignoreRootIds && ra.root.id !== rb.root.id) return `${ra.id}: Wurzel "${ra.root.id}" ≠ "${rb.root.id}"`;
		const diff = compareMembers(ra.root, rb.root, ra.id);
		if (diff) return diff;
	}
	return undefined;
}

// Attribute und Kindgruppen getrennt vergleichen: LSX schreibt Attribute immer zuerst
function compareMembers(a: LsNode, b: LsNode, path: string): string | undefined {
	const attrsA = [...attributesOf(a)];
	const attrsB = [...attributesOf(b)];
	if (attrsA.length !== attrsB.length) return `${path}: ${attrsA.length} ≠ ${attrsB.length} Attribute`;
	for (let i = 0; i < attrsA.length; i++) {
		const [idA, x] = attrsA[i];
		const [idB, y] = attrsB[i];
		if (idA !== idB) return `${path}/${idA}: ≠ attribute "${idB}"`;
		if (x.type !== y.type || x.value !== y.value || x.handle !== y.handle || (x.version ?? 0) !== (y.version ?? 0)) {
			return `${path}/${idA}: ${JSON.stringify(x)} ≠ ${JSON.stringify(y)}`;
		}
	}

	const groupsA = [...childGroupsOf(a)];
	const groupsB = [...childGroupsOf(b)];
	if (groupsA.length !== groupsB.length) return `${path}: ${groupsA.length} ≠ ${groupsB.length} Kindgruppen`;
	for (let i = 0; i < groupsA.length; i++) {
		const [idA, nodesA] = groupsA[i];
		const [idB, nodesB] = groupsB[i];
		const groupPath = `${path}/${idA}`;
		if (idA !== idB) return `${groupPath}: ≠ children "${idB}"`;
		if (nodesA.length !== nodesB.length) return `${groupPath}: ${nodesA.length} ≠ ${nodesB.length} Nodes`;
		for (let j = 0; j < nodesA.length; j++) {
			const diff = compareMembers(nodesA[j], nodesB[j], `${groupPath}[${j}]`);
			if (diff) return diff;
		}
	}
	return undefined;
}
