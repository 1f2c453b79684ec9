/**
 * Bridge Block Loader
 *
 * Reads a bridge chart described in YAML and builds a `BridgeChart` from it.
 *
 * ```yaml
 * labels: [Start, Sales, Costs, End]
 * totals: [false, false, false, true]
 * layers:
 *   - values: [100, 20, -15, 105]
 *     position: bottom
 *     style: { fill: "#5b6cff" }
 * options:
 *   title: Margin bridge
 * ```
 */

import { parse } from "yaml";
import { BridgeChart } from "./bridge";
import { ConfigurationError } from "./errors";
import type { BridgePadding, BridgeSettingsInput } from "./settings";
import type {
	BridgeBlockLayer,
	BridgeBlockSpec,
	LayerPosition,
	LayerValue,
} from "./types";

// ============================================================================
// Helpers
// ============================================================================

function invalid(path: string, message: string): ConfigurationError {
	return new ConfigurationError("invalid-block", `${path}: ${message}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readArray(value: unknown, path: string): unknown[] {
	if (!Array.isArray(value)) throw invalid(path, "expected a list");
	return value;
}

function readNumber(value: unknown, path: string): number {
	if (typeof value !== "number") throw invalid(path, "expected a number");
	return value;
}

function readString(value: unknown, path: string): string {
	if (typeof value !== "string") throw invalid(path, "expected a string");
	return value;
}

// ============================================================================
// Sections
// ============================================================================

function parseLabels(value: unknown): string[] {
	return readArray(value, "labels").map((label, i) => {
		if (typeof label === "string") return label;
		if (typeof label === "number") return String(label);
		throw invalid(`labels[${i}]`, "expected a string");
	});
}

function parseTotals(value: unknown): boolean[] | undefined {
	if (value == null) return undefined;
	return readArray(value, "totals").map((flag, i) => {
		if (typeof flag !== "boolean") throw invalid(`totals[${i}]`, "expected true or false");
		return flag;
	});
}

function parseLayer(value: unknown, index: number): BridgeBlockLayer {
	const path = `layers[${index}]`;
	if (!isRecord(value)) throw invalid(path, "expected a mapping");

	const values: LayerValue[] = readArray(value.values, `${path}.values`).map((v, i) => {
		if (v === null) return null;
		return readNumber(v, `${path}.values[${i}]`);
	});

	let position: LayerPosition = "bottom";
	const rawPosition = value.position;
	if (rawPosition != null) {
		if (rawPosition !== "bottom" && rawPosition !== "top") {
			throw invalid(`${path}.position`, 'expected "bottom" or "top"');
		}
		position = rawPosition;
	}

	let style: Record<string, unknown> = {};
	if (value.style != null) {
		if (!isRecord(value.style)) throw invalid(`${path}.style`, "expected a mapping");
		style = { ...value.style };
	}

	return { values, position, style };
}

function parsePadding(value: unknown): Partial<BridgePadding> {
	if (!isRecord(value)) throw invalid("options.padding", "expected a mapping");
	const padding: Partial<BridgePadding> = {};
	for (const [key, v] of Object.entries(value)) {
		const path = `options.padding.${key}`;
		switch (key) {
			case "left":
			case "right":
			case "top":
			case "bottom":
				padding[key] = readNumber(v, path);
				break;
			default:
				throw invalid(path, "unknown padding side");
		}
	}
	return padding;
}

function parseOptions(value: unknown): BridgeSettingsInput {
	if (value == null) return {};
	if (!isRecord(value)) throw invalid("options", "expected a mapping");

	const options: BridgeSettingsInput = {};
	for (const [key, v] of Object.entries(value)) {
		const path = `options.${key}`;
		switch (key) {
			case "width":
			case "height":
			case "barWidthRatio":
			case "yTicks":
				options[key] = readNumber(v, path);
				break;
			case "background":
			case "title":
				options[key] = readString(v, path);
				break;
			case "debug":
				if (typeof v !== "boolean") throw invalid(path, "expected true or false");
				options.debug = v;
				break;
			case "palette":
				options.palette = readArray(v, path).map((c, i) => readString(c, `${path}[${i}]`));
				break;
			case "padding":
				options.padding = parsePadding(v);
				break;
			default:
				throw invalid(path, "unknown option");
		}
	}
	return options;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parses and validates a bridge block.
 *
 * @throws ConfigurationError with kind `invalid-block` on malformed input
 */
export function parseBridgeBlock(source: string): BridgeBlockSpec {
	let doc: unknown;
	try {
		doc = parse(source);
	} catch (e) {
		const reason = e instanceof Error ? e.message : String(e);
		throw invalid("(root)", `invalid YAML: ${reason}`);
	}
	if (!isRecord(doc)) throw invalid("(root)", "expected a mapping");

	const layers = doc.layers == null ? [] : readArray(doc.layers, "layers");

	return {
		labels: parseLabels(doc.labels),
		totals: parseTotals(doc.totals),
		layers: layers.map((layer, i) => parseLayer(layer, i)),
		options: parseOptions(doc.options),
	};
}

/**
 * Builds a chart from a parsed block, adding layers in document order.
 */
export function buildBridge(spec: BridgeBlockSpec): BridgeChart {
	const chart = new BridgeChart(spec.labels, spec.totals);
	for (const layer of spec.layers) {
		chart.addLayer(layer.values, layer.position === "bottom", layer.style);
	}
	return chart;
}
