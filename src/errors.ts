export type DocumentFormat = "lsx" | "lsj";

export interface ParseErrorDetails {
	line?: number;
	column?: number;
	/** Pfad im Dokument, z.B. "save.regions.Config.Name" */
	path?: string;
	cause?: unknown;
}

/**
 * Syntaxfehler oder Strukturfehler beim Einlesen eines LSX/LSJ-Dokuments.
 * Nicht behebbar – es gibt kein Teilergebnis.
 */
export class ParseError extends Error {
	readonly format: DocumentFormat;
	readonly line?: number;
	readonly column?: number;
	readonly path?: string;

	constructor(format: DocumentFormat, message: string, details: ParseErrorDetails = {}) {
		super(`${format.toUpperCase()}: ${message}${describeLocation(details)}`, { cause: details.cause });
		this.name = "ParseError";
		this.format = format;
		this.line = details.line;
		this.column = details.column;
		this.path = details.path;
	}
}

/** Verletzung einer Modell-Invariante (doppelte IDs, Attribut/Kindgruppe mit gleicher ID) */
export class StructureError extends Error {
	readonly context?: Record<string, unknown>;

	constructor(message: string, context?: Record<string, unknown>) {
		super(message);
		this.name = "StructureError";
		this.context = context;
	}
}

function describeLocation({ line, column, path }: ParseErrorDetails): string {
	const parts: string[] = [];
	if (line !== undefined) parts.push(column !== undefined ? `Zeile ${line}, Spalte ${column}` : `Zeile ${line}`);
	if (path) parts.push(path);
	return parts.length > 0 ? ` (${parts.join(", ")})` : "";
}

/** Führt fn aus und meldet Modellfehler als ParseError mit Pfadangabe */
export function wrapStructureError<T>(format: DocumentFormat, path: string, fn: () => T): T {
	try {
		return fn();
	} catch (err) {
		if (err instanceof StructureError) throw new ParseError(format, err.message, { path, cause: err });
		throw err;
	}
}
