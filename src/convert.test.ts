import { describe, expect, it } from "vitest";
import { jsonToXml, xmlToJson } from "./convert.js";
import { attributesOf, findDifference } from "./document/model.js";
import { ParseError } from "./errors.js";
import { parseLsx } from "./lsx/lsx-reader.js";

const CONFIG_LSX =
	'<save><version major="4" minor="0" revision="9" build="331"/><region id="Config"><node id="root"><attribute id="Name" type="LSString" value="Test"/></node></region></save>';

const RICH_LSX = `<?xml version="1.0" encoding="utf-8"?>
<save>
	<version major="4" minor="0" revision="9" build="331" />
	<region id="Config">
		<node id="Config">
			<attribute id="Count" type="int32" value="42" />
			<attribute id="Big" type="uint64" value="18446744073709551615" />
			<attribute id="Ratio" type="float" value="0.5" />
			<attribute id="Exact" type="double" value="1.0" />
			<attribute id="Flag" type="bool" value="True" />
			<attribute id="Label" type="LSString" value="42" />
			<attribute id="Pos" type="fvec3" value="1 2 3" />
			<attribute id="Title" type="TranslatedString" handle="" value="x" />
			<attribute id="Desc" type="TranslatedString" handle="h1" version="2" />
			<children>
				<node id="Mods">
					<children>
						<node id="Module"><attribute id="Name" type="FixedString" value="A" /></node>
						<node id="Module"><attribute id="Name" type="FixedString" value="B" /></node>
						<node id="Module"><attribute id="Name" type="FixedString" value="C" /></node>
					</children>
				</node>
				<node id="Empty" />
			</children>
		</node>
	</region>
</save>`;

describe("xmlToJson", () => {
	it("converts the Config example", () => {
		expect(JSON.parse(xmlToJson(CONFIG_LSX))).toEqual({
			save: {
				header: { time: 0, version: "4.0.9.331" },
				regions: { Config: { Name: { type: "LSString", value: "Test" } } }
			}
		});
	});

	it("exposes natively typed values", () => {
		const config = JSON.parse(xmlToJson(RICH_LSX)).save.regions.Config;
		expect(config.Count.value).toBe(42);
		expect(config.Big.value).toBe("18446744073709551615");
		expect(config.Ratio.value).toBe(0.5);
		expect(config.Exact.value).toBe("1.0");
		expect(config.Flag.value).toBe(true);
		expect(config.Label.value).toBe("42");
		expect(config.Pos.value).toBe("1 2 3");
		expect(config.Title).toEqual({ type: "TranslatedString", value: "x", handle: "" });
		expect(config.Desc).toEqual({ type: "TranslatedString", handle: "h1", version: 2 });
		expect(config.Mods[0].Module.map((m: { Name: { value: string } }) => m.Name.value)).toEqual(["A", "B", "C"]);
		expect(config.Empty).toEqual([{}]);
	});

	it("applies the heuristic to unknown type tags", () => {
		const xml = '<save><region id="R"><node id="R"><attribute id="A" type="CustomTag" value="abc"/><attribute id="B" type="CustomTag" value="3.14"/></node></region></save>';
		const json = xmlToJson(xml);
		const root = JSON.parse(json).save.regions.R;
		expect(root.A.value).toBe("abc");
		expect(root.B.value).toBe(3.14);
		expect([...attributesOf(parseLsx(jsonToXml(json)).regions[0].root)]).toEqual([
			["A", { type: "CustomTag", value: "abc" }],
			["B", { type: "CustomTag", value: "3.14" }]
		]);
	});

	it("propagates LSX parse errors", () => {
		expect(() => xmlToJson("<save>")).toThrow(ParseError);
	});

	it("gives the same output for the same input", () => {
		expect(xmlToJson(RICH_LSX)).toBe(xmlToJson(RICH_LSX));
	});
});

describe("jsonToXml", () => {
	it("reproduces the attributes of the Config example", () => {
		const doc = parseLsx(jsonToXml(xmlToJson(CONFIG_LSX)));
		expect(doc.version).toEqual({ major: 4, minor: 0, revision: 9, build: 331 });
		expect(doc.regions[0].id).toBe("Config");
		expect([...attributesOf(doc.regions[0].root)]).toEqual([["Name", { type: "LSString", value: "Test" }]]);
	});

	it("round-trips LSX through LSJ without changing the document", () => {
		expect(parseLsx(jsonToXml(xmlToJson(RICH_LSX)))).toEqual(parseLsx(RICH_LSX));
	});

	it("loses only the region root id", () => {
		const original = parseLsx(CONFIG_LSX);
		const roundtrip = parseLsx(jsonToXml(xmlToJson(CONFIG_LSX)));
		expect(roundtrip.regions[0].root.id).toBe("Config");
		expect(findDifference(original, roundtrip, { ignoreRootIds: true })).toBeUndefined();
	});

	it("propagates LSJ parse errors", () => {
		expect(() => jsonToXml("nope")).toThrow(ParseError);
	});
});
