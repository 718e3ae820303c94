import { parseLsx } from "./lsx/lsx-reader.js";
import type { LsxReadOptions } from "./lsx/lsx-reader.js";
import { writeLsx } from "./lsx/lsx-writer.js";
import type { LsxWriteOptions } from "./lsx/lsx-writer.js";
import { parseLsj } from "./lsj/lsj-reader.js";
import { writeLsj } from "./lsj/lsj-writer.js";
import type { LsjWriteOptions } from "./lsj/lsj-writer.js";

export type XmlToJsonOptions = LsxReadOptions & LsjWriteOptions;
export type JsonToXmlOptions = LsxWriteOptions;

/** LSX → LSJ. Fehler des LSX-Readers (ParseError) werden unverändert weitergereicht. */
export function xmlToJson(xml: string, options?: XmlToJsonOptions): string {
	return writeLsj(parseLsx(xml, options), options);
}

/** LSJ → LSX */
export function jsonToXml(json: string, options?: JsonToXmlOptions): string {
	return writeLsx(parseLsj(json), options);
}
