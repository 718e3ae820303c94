/**
 * Datei-Ebene um den Codec: Formaterkennung, Einzel- und Ordnerkonvertierung.
 * Binärformate (LSF/LSB/LSV …) brauchen den externen Konverter (LSLib/Divine) und werden abgelehnt.
 */

import { mkdirSync, readFileSync, readdirSync, writeFileSync } from "node:fs";
import { dirname, extname, join } from "node:path";
import { jsonToXml, xmlToJson } from "./convert.js";
import { findDifference } from "./document/model.js";
import { parseLsx } from "./lsx/lsx-reader.js";
import type { XmlToJsonOptions } from "./convert.js";
import type { DocumentFormat } from "./errors.js";
import type { LsxWriteOptions } from "./lsx/lsx-writer.js";

export type FileFormat = DocumentFormat | "binary";

const BINARY_EXTENSIONS = new Set([".lsf", ".lsb", ".lsv", ".lsbc", ".lsbs"]);

export type ConvertOptions = XmlToJsonOptions & LsxWriteOptions;

export interface ConvertedFile {
	input: string;
	output: string;
	from: DocumentFormat;
	to: DocumentFormat;
}

export interface BatchResult {
	converted: ConvertedFile[];
	failed: Array<{ file: string; error: Error }>;
}

export function detectFormat(path: string): FileFormat | undefined {
	const ext = extname(path).toLowerCase();
	if (ext === ".lsx") return "lsx";
	if (ext === ".lsj") return "lsj";
	if (BINARY_EXTENSIONS.has(ext)) return "binary";
	return undefined;
}

export function otherFormat(format: DocumentFormat): DocumentFormat {
	return format === "lsx" ? "lsj" : "lsx";
}

/** Gleicher Pfad, Endung des Zielformats */
export function withExtension(path: string, format: DocumentFormat): string {
	const ext = extname(path);
	return (ext ? path.slice(0, -ext.length) : path) + "." + format;
}

function requireTextFormat(path: string): DocumentFormat {
	const format = detectFormat(path);
	if (format === "binary") {
		throw new Error(`${path}: Binärformat – Konvertierung nur mit externem Konverter (LSLib/Divine) möglich`);
	}
	if (!format) throw new Error(`${path}: unbekanntes Format (erwartet .lsx oder .lsj)`);
	return format;
}

export function convertText(content: string, from: DocumentFormat, options: ConvertOptions = {}): string {
	return from === "lsx" ? xmlToJson(content, options) : jsonToXml(content, options);
}

export function convertFile(input: string, output?: string, options: ConvertOptions = {}): ConvertedFile {
	const from = requireTextFormat(input);
	const to = otherFormat(from);
	const target = output ?? withExtension(input, to);
	const converted = convertText(readFileSync(input, "utf8"), from, options);
	mkdirSync(dirname(target), { recursive: true });
	writeFileSync(target, converted, "utf8");
	return { input, output: target, from, to };
}

function collectFiles(dir: string, format: DocumentFormat, base = ""): string[] {
	const files: string[] = [];
	for (const entry of readdirSync(join(dir, base), { withFileTypes: true })) {
		const rel = base ? join(base, entry.name) : entry.name;
		if (entry.isDirectory()) {
			files.push(...collectFiles(dir, format, rel));
		} else if (detectFormat(entry.name) === format) {
			files.push(rel);
		}
	}
	return files.sort();
}

/**
 * Alle Dateien im Quellformat unter dir ins Zielformat konvertieren.
 * Fehler einzelner Dateien brechen den Lauf nicht ab, sondern landen in failed.
 */
export function convertDirectory(dir: string, target: DocumentFormat, outputDir?: string, options: ConvertOptions = {}): BatchResult {
	const result: BatchResult = { converted: [], failed: [] };
	for (const rel of collectFiles(dir, otherFormat(target))) {
		const input = join(dir, rel);
		const output = withExtension(join(outputDir ?? dir, rel), target);
		try {
			result.converted.push(convertFile(input, output, options));
		} catch (err) {
			result.failed.push({ file: input, error: err instanceof Error ? err : new Error(String(err)) });
		}
	}
	return result;
}

export function listFiles(dir: string, format: DocumentFormat): string[] {
	return collectFiles(dir, format).map((rel) => join(dir, rel));
}

/** LSX → LSJ → LSX im Speicher; liefert die erste Abweichung oder undefined */
export function verifyLsxFile(path: string, options: ConvertOptions = {}): string | undefined {
	const xml = readFileSync(path, "utf8");
	const original = parseLsx(xml, options);
	const roundtrip = parseLsx(jsonToXml(xmlToJson(xml, options), options), options);
	return findDifference(original, roundtrip, { ignoreRootIds: true });
}
