/**
 * LS Codec
 *
 * Konvertierung zwischen LSX (XML) und LSJ (JSON) – den beiden Textformaten
 * für Larian-Ressourcen und -Savegames. Beide bilden denselben typisierten Node-Baum ab.
 * Binärformate (LSF/LSB/LSV) sind nicht Teil dieses Moduls.
 *
 * @example
 * ```ts
 * import { xmlToJson, jsonToXml, parseLsx } from 'ls-codec';
 *
 * const lsj = xmlToJson(readFileSync('meta.lsx', 'utf8'));
 * const lsx = jsonToXml(lsj);
 *
 * // Dokumentmodell direkt
 * const doc = parseLsx(lsx);
 * console.log(doc.regions.map(r => r.id));
 * ```
 */

export { xmlToJson, jsonToXml } from "./convert.js";
export type { XmlToJsonOptions, JsonToXmlOptions } from "./convert.js";
export { parseLsx } from "./lsx/lsx-reader.js";
export type { LsxReadOptions } from "./lsx/lsx-reader.js";
export { writeLsx } from "./lsx/lsx-writer.js";
export type { LsxWriteOptions } from "./lsx/lsx-writer.js";
export { parseLsj, parseVersionString } from "./lsj/lsj-reader.js";
export { writeLsj } from "./lsj/lsj-writer.js";
export type { LsjWriteOptions } from "./lsj/lsj-writer.js";
export {
	addRegion,
	appendChild,
	attributesOf,
	baselineVersion,
	childGroupsOf,
	countNodes,
	createDocument,
	createNode,
	findDifference,
	findRegion,
	formatVersion,
	getAttribute,
	getChildren,
	setAttribute
} from "./document/model.js";
export type { CompareOptions } from "./document/model.js";
export { classifyType, coerceValue, fromNativeValue, toNativeValue, GENERIC_TYPE } from "./document/type-registry.js";
export type { Coercion, NativeValue, TypeClass } from "./document/type-registry.js";
export type { DuplicateAttributePolicy, LsAttribute, LsDocument, LsNode, LsRegion, LsVersion, NodeMember } from "./document/types.js";
export { ParseError, StructureError } from "./errors.js";
export type { DocumentFormat } from "./errors.js";
export { convertDirectory, convertFile, convertText, detectFormat, listFiles, verifyLsxFile } from "./files.js";
export type { BatchResult, ConvertOptions, ConvertedFile, FileFormat } from "./files.js";
