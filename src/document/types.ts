/**
 * Dokumentmodell für LSX/LSJ – gemeinsame Zwischenrepräsentation beider Formate.
 * Werte bleiben als Rohstrings gespeichert (wie im LSX), Typisierung erst an der LSJ-Grenze.
 */

export interface LsVersion {
	major: number;
	minor: number;
	revision: number;
	build: number;
}

export interface LsAttribute {
	type: string;
	value?: string;
	/** Auch leerer Handle ist ein Wert – fehlend ≠ "" */
	handle?: string;
	/** Nur gesetzt wenn != 0 */
	version?: number;
}

export type NodeMember =
	| { kind: "attribute"; id: string; attribute: LsAttribute }
	| { kind: "children"; id: string; nodes: LsNode[] };

export interface LsNode {
	id: string;
	members: NodeMember[];
}

export interface LsRegion {
	id: string;
	root: LsNode;
}

export interface LsDocument {
	version: LsVersion;
	/** LSJ-Header "time" (LSLib) – im LSX nicht vorhanden */
	time?: number;
	regions: LsRegion[];
}

export type DuplicateAttributePolicy = "reject" | "overwrite";
