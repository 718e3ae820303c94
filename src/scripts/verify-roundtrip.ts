#!/usr/bin/env node
/**
 * Verifikation gegen echte Ressourcen
 * Jede .lsx unter <dir>: LSX → LSJ → LSX → Dokumentvergleich mit dem Original
 * --quick: nur meta.lsx
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { listFiles, verifyLsxFile } from "../files.js";

function verifyDirectory(dir: string, quick: boolean): boolean {
	console.log("\n=== LSX Roundtrip (LSX → LSJ → LSX) ===\n");
	const files = listFiles(dir, "lsx").filter((f) => !quick || f.endsWith("meta.lsx"));
	if (quick) console.log("(--quick: nur meta.lsx)\n");
	let ok = 0;
	let diff = 0;
	let failed = 0;

	for (const file of files) {
		try {
			const difference = verifyLsxFile(file);
			if (difference === undefined) {
				console.log(`  OK  ${file}`);
				ok++;
			} else {
				console.log(`  DIFF ${file}: ${difference}`);
				diff++;
			}
		} catch (err) {
			console.log(`  FAIL ${file}: ${err instanceof Error ? err.message : err}`);
			failed++;
		}
	}

	console.log(`\nLSX: ${ok} identisch, ${diff} abweichend, ${failed} fehlerhaft von ${files.length} Dateien`);
	return diff === 0 && failed === 0;
}

function main() {
	const quick = process.argv.includes("--quick");
	const dir = process.argv.slice(2).find((a) => !a.startsWith("--")) ?? join(process.cwd(), "Example");
	console.log("Roundtrip-Verifikation");
	console.log("Pfad:", dir);

	if (!existsSync(dir)) {
		console.error(`${dir} nicht gefunden`);
		process.exit(1);
	}

	const lsxOk = verifyDirectory(dir, quick);
	console.log("\n--- Ergebnis ---");
	console.log("LSX → LSJ → LSX:", lsxOk ? "PASS" : "FAIL");
	process.exit(lsxOk ? 0 : 1);
}

main();
