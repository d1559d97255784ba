import { describe, expect, it } from "vitest";
import pino from "pino";
import {
	parseColor,
	parseEntryTypeMetadata,
	resolveThemeEntryTypes,
} from "../../../cli/entries/entry-types";
import { createSilentLogger } from "../../../cli/logging/logger";
import { ENTRY_TYPE_QUERY_OUTPUT } from "../../fixtures/entry-type-metadata";
import { thrownBy } from "../../helpers/errors";

const logger = createSilentLogger();

describe("parseColor", () => {
	it("reads Typst's rgb repr", () => {
		expect(parseColor('rgb("#FFD966")')).toEqual({
			color: "#ffd966",
			rgb: { r: 255, g: 217, b: 102 },
		});
	});

	it("reads a bare hex color", () => {
		expect(parseColor("#6d9eeb").rgb).toEqual({ r: 109, g: 158, b: 235 });
	});

	it("rejects anything else", () => {
		expect(thrownBy(() => parseColor('rgb("#fff")'))).toMatchObject({
			code: "INVALID_ENTRY_METADATA",
		});
		expect(thrownBy(() => parseColor("red"))).toMatchObject({
			code: "INVALID_ENTRY_METADATA",
		});
	});
});

describe("parseEntryTypeMetadata", () => {
	it("maps each theme to its entry types and drops themes without any", () => {
		const themes = parseEntryTypeMetadata(ENTRY_TYPE_QUERY_OUTPUT);

		expect([...themes.keys()]).toEqual(["radial", "linear"]);
		expect(themes.get("radial")).toEqual([
			{ name: "identify", color: "#ffd966", rgb: { r: 255, g: 217, b: 102 } },
			{ name: "brainstorm", color: "#e06666", rgb: { r: 224, g: 102, b: 102 } },
			{ name: "decide", color: "#6d9eeb", rgb: { r: 109, g: 158, b: 235 } },
		]);
		expect(themes.get("linear")).toEqual([
			{ name: "build", color: "#93c47d", rgb: { r: 147, g: 196, b: 125 } },
		]);
	});

	it("rejects output that is not JSON", () => {
		expect(thrownBy(() => parseEntryTypeMetadata("error: unknown"))).toMatchObject({
			code: "INVALID_ENTRY_METADATA",
		});
	});

	it("rejects JSON of the wrong shape", () => {
		expect(thrownBy(() => parseEntryTypeMetadata("[]"))).toMatchObject({
			code: "INVALID_ENTRY_METADATA",
		});
		expect(
			thrownBy(() => parseEntryTypeMetadata('[[["radial", [["identify", 3]]]]]')),
		).toMatchObject({ code: "INVALID_ENTRY_METADATA" });
	});
});

describe("resolveThemeEntryTypes", () => {
	const themes = parseEntryTypeMetadata(ENTRY_TYPE_QUERY_OUTPUT);

	it("uses the theme named by main.typ", () => {
		const resolved = resolveThemeEntryTypes(
			themes,
			"themes.linear.linear-theme",
			logger,
		);

		expect(resolved.theme).toBe("linear");
		expect(resolved.fromMainDocument).toBe(true);
		expect(resolved.entryTypes.map((entryType) => entryType.name)).toEqual([
			"build",
		]);
	});

	it("falls back to radial when main.typ names no known theme", () => {
		const resolved = resolveThemeEntryTypes(themes, "fancy-theme", logger);

		expect(resolved.theme).toBe("radial");
		expect(resolved.fromMainDocument).toBe(false);
	});

	it("logs the fallback under the entry-types component", () => {
		const lines: string[] = [];
		const captured = pino({ base: undefined }, { write: (line: string) => lines.push(line) });

		resolveThemeEntryTypes(themes, "fancy-theme", captured);

		expect(lines).toHaveLength(1);
		expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
			level: 40,
			component: "entry-types",
			theme: "radial",
			msg: "could not find theme in main.typ, defaulting to radial",
		});
	});

	it("falls back to the first theme when radial has no entry types", () => {
		const withoutRadial = new Map(themes);
		withoutRadial.delete("radial");

		const resolved = resolveThemeEntryTypes(withoutRadial, null, logger);

		expect(resolved.theme).toBe("linear");
	});

	it("fails when no theme declares entry types", () => {
		expect(
			thrownBy(() => resolveThemeEntryTypes(new Map(), null, logger)),
		).toMatchObject({ code: "NO_ENTRY_TYPES" });
	});
});
