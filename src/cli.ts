#!/usr/bin/env node
/**
 * CLI für den LSX/LSJ-Konverter
 * Verwendung:
 *   convert <input.lsx> [output.lsj]   - LSX zu LSJ
 *   convert <input.lsj> [output.lsx]   - LSJ zu LSX
 *   batch <dir> <lsx|lsj> [outputDir]  - Ordner rekursiv konvertieren
 */

import { existsSync } from "node:fs";
import { convertDirectory, convertFile } from "./files.js";
import type { ConvertOptions } from "./files.js";

const FLAGS = ["--lf", "--no-bom", "--overwrite-duplicates"];

const argv = process.argv.slice(2);
const args = argv.filter((a) => !FLAGS.includes(a));
const command = args[0];
const inputPath = args[1];

const HELP = `
LS Codec - LSX↔LSJ Konverter

Verwendung:
  convert <input.lsx> [output.lsj]       - LSX zu LSJ konvertieren
  convert <input.lsj> [output.lsx]       - LSJ zu LSX konvertieren
  batch <dir> <lsx|lsj> [outputDir]      - Alle Dateien im Ordner ins Zielformat

Optionen:
  --lf                     - LF statt CRLF als Zeilenende
  --no-bom                 - LSX ohne UTF-8 BOM schreiben
  --overwrite-duplicates   - Doppelte Attribut-IDs überschreiben statt abbrechen

Beispiele:
  node dist/cli.js convert meta.lsx meta.lsj
  node dist/cli.js batch ./Mods lsj ./Mods-lsj

LSF/LSB/LSV sind Binärformate und brauchen LSLib (Divine).
`;

if (!command || argv.includes("--help") || argv.includes("-h") || command === "help") {
	console.log(HELP);
	process.exit(command ? 0 : 1);
}

if (!inputPath) {
	console.error(HELP);
	process.exit(1);
}

const options: ConvertOptions = {};
if (argv.includes("--lf")) options.eol = "\n";
if (argv.includes("--no-bom")) options.bom = false;
if (argv.includes("--overwrite-duplicates")) options.duplicateAttributes = "overwrite";

try {
	if (!existsSync(inputPath)) {
		console.error(`Fehler: Pfad nicht gefunden: ${inputPath}`);
		process.exit(1);
	}

	if (command === "convert") {
		const { output, from, to } = convertFile(inputPath, args[2], options);
		console.log(`Fertig: ${inputPath} (${from.toUpperCase()}) → ${output} (${to.toUpperCase()})`);
	} else if (command === "batch") {
		const target = args[2];
		if (target !== "lsx" && target !== "lsj") {
			console.error(`Fehler: Zielformat muss lsx oder lsj sein, nicht: ${target ?? "(leer)"}`);
			process.exit(1);
		}
		const outputDir = args[3] ?? inputPath;
		console.log(`Konvertiere ${inputPath} → ${target.toUpperCase()} nach ${outputDir}...`);
		const { converted, failed } = convertDirectory(inputPath, target, outputDir, options);
		converted.forEach((f) => console.log(`  - ${f.output}`));
		failed.forEach((f) => console.error(`  ! ${f.file}: ${f.error.message}`));
		console.log(`Fertig: ${converted.length} Dateien erstellt, ${failed.length} fehlgeschlagen`);
		if (failed.length > 0) process.exit(1);
	} else {
		console.error(`Unbekannter Befehl: ${command}`);
		process.exit(1);
	}
} catch (err) {
	console.error("Fehler:", err instanceof Error ? err.message : err);
	process.exit(1);
}
