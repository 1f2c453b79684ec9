// src/renderer/bridge.ts

import type { BridgeChart, BridgeLayerView } from "../bridge";
import type { BridgeSettings } from "../settings";
import {
	SVG_NS,
	colorFor,
	createDiv,
	ensureContainer,
	formatValue,
	hideTooltip,
	showTooltip,
	textColorFor,
} from "./renderer-common";

function isGap(v: number | null | undefined): v is null | undefined {
	return v == null || Number.isNaN(v);
}

// Attributes the renderer owns; a layer style cannot replace them.
const RESERVED_ATTRIBUTES = new Set([
	"x",
	"y",
	"width",
	"height",
	"class",
	"data-layer",
	"data-segment",
	"label",
]);

const ATTRIBUTE_NAME = /^[A-Za-z_][A-Za-z0-9_.:-]*$/;

/**
 * Style entries that can be set on a segment `<rect>`. Reserved geometry
 * keys, event handlers (`on*`), names that are not valid attribute names and
 * values other than strings and numbers are left out.
 */
export function styleAttributes(style: Readonly<Record<string, unknown>>): Array<[string, string]> {
	const out: Array<[string, string]> = [];
	for (const [key, value] of Object.entries(style)) {
		if (RESERVED_ATTRIBUTES.has(key.toLowerCase())) continue;
		if (/^on/i.test(key) || !ATTRIBUTE_NAME.test(key)) continue;
		if (typeof value === "string" || typeof value === "number") {
			out.push([key, String(value)]);
		}
	}
	return out;
}

// Smallest and largest y reached by any drawn segment, always including 0.
export function valueExtent(layers: Iterable<BridgeLayerView>): [number, number] {
	let minY = 0;
	let maxY = 0;
	for (const layer of layers) {
		layer.values.forEach((v, i) => {
			if (isGap(v)) return;
			const b = layer.bottom[i];
			minY = Math.min(minY, b, b + v);
			maxY = Math.max(maxY, b, b + v);
		});
	}
	if (!isFinite(minY) || !isFinite(maxY) || maxY === minY) {
		return [0, 1];
	}
	return [minY, maxY];
}

export function renderBridge(
	container: HTMLElement,
	chart: BridgeChart,
	settings: BridgeSettings
): void {
	if (chart.layerCount === 0) {
		createDiv(container, "bridge-charts-empty", "No data available.");
		return;
	}

	const doc = container.ownerDocument;
	const { inner, svg, tooltip } = ensureContainer(container, settings);
	const vw = container.getBoundingClientRect().width || 0;
	const width = Math.max(vw, settings.width);
	inner.style.width = width + "px";
	svg.setAttribute("width", String(width));

	const { left, right, top, bottom } = settings.padding;
	const height = settings.height;
	const plotW = width - left - right;
	const plotH = height - top - bottom;
	const textColor = textColorFor(settings.background);

	const [minY, maxY] = valueExtent(chart.layers());
	const yScale = (v: number) =>
		top + plotH - ((v - minY) * plotH) / (maxY - minY);

	// Y axis
	for (let i = 0; settings.yTicks > 0 && i <= settings.yTicks; i++) {
		const t = minY + ((maxY - minY) * i) / settings.yTicks;
		const y = yScale(t);

		const line = doc.createElementNS(SVG_NS, "line");
		line.setAttribute("class", "bridge-charts-grid");
		line.setAttribute("x1", String(left));
		line.setAttribute("y1", String(y));
		line.setAttribute("x2", String(width - right));
		line.setAttribute("y2", String(y));
		line.setAttribute("stroke", "#cccccc");
		line.setAttribute("stroke-opacity", "0.25");
		svg.appendChild(line);

		const label = doc.createElementNS(SVG_NS, "text");
		label.setAttribute("class", "bridge-charts-y-label");
		label.setAttribute("x", String(left - 4));
		label.setAttribute("y", String(y + 3));
		label.setAttribute("text-anchor", "end");
		label.setAttribute("font-size", "10");
		label.setAttribute("fill", textColor);
		label.textContent = String(Math.round(t));
		svg.appendChild(label);
	}

	const nCats = chart.segmentCount;
	const step = nCats > 0 ? plotW / nCats : plotW;
	const barWidth = step * settings.barWidthRatio;

	// X labels
	chart.segmentLabels.forEach((segment, idx) => {
		const cx = left + step * (idx + 0.5);
		const labelNode = doc.createElementNS(SVG_NS, "text");
		labelNode.setAttribute("class", "bridge-charts-x-label");
		labelNode.setAttribute("x", String(cx));
		labelNode.setAttribute("y", String(height - bottom + 12));
		labelNode.setAttribute("text-anchor", "middle");
		labelNode.setAttribute("font-size", "10");
		labelNode.setAttribute("fill", textColor);
		labelNode.textContent = segment;
		svg.appendChild(labelNode);
	});

	const legendItems: Array<{ text: string; color: string }> = [];

	// Segments, bottom layer first
	let layerIndex = 0;
	for (const layer of chart.layers()) {
		const styleFill = layer.style.fill;
		const styleLabel = layer.style.label;
		const fill =
			typeof styleFill === "string"
				? styleFill
				: colorFor(layerIndex, settings.palette);
		if (typeof styleLabel === "string") {
			legendItems.push({ text: styleLabel, color: fill });
		}
		const attributes = styleAttributes(layer.style);

		layer.values.forEach((v, segIndex) => {
			// zero-height steps draw nothing
			if (isGap(v) || v === 0) return;
			const value = v;
			const base = layer.bottom[segIndex];
			const y0 = yScale(base);
			const y1 = yScale(base + value);
			const cx = left + step * (segIndex + 0.5);

			const rect = doc.createElementNS(SVG_NS, "rect");
			rect.setAttribute("class", "bridge-charts-segment");
			rect.setAttribute("data-layer", String(layerIndex));
			rect.setAttribute("data-segment", String(segIndex));
			rect.setAttribute("x", String(cx - barWidth / 2));
			rect.setAttribute("y", String(Math.min(y0, y1)));
			rect.setAttribute("width", String(barWidth));
			rect.setAttribute("height", String(Math.max(2, Math.abs(y0 - y1))));
			rect.setAttribute("fill", fill);
			rect.setAttribute("stroke", "rgba(0,0,0,0.25)");
			rect.setAttribute("stroke-width", "0.5");
			for (const [key, attr] of attributes) {
				rect.setAttribute(key, attr);
			}

			const title = chart.segmentLabels[segIndex];
			rect.addEventListener("mouseenter", (ev: MouseEvent) =>
				showTooltip(container, tooltip, title, value, ev)
			);
			rect.addEventListener("mouseleave", () => hideTooltip(tooltip));

			svg.appendChild(rect);
		});
		layerIndex++;
	}

	if (legendItems.length > 0) {
		const legend = createDiv(inner, "bridge-charts-legend");
		for (const item of legendItems) {
			const entry = createDiv(legend, "bridge-charts-legend-item");
			const swatch = createDiv(entry, "bridge-charts-legend-swatch");
			swatch.style.width = "10px";
			swatch.style.height = "10px";
			swatch.style.borderRadius = "999px";
			swatch.style.backgroundColor = item.color;
			const text = doc.createElement("span");
			text.textContent = item.text;
			entry.appendChild(text);
		}
	}

	if (settings.debug) {
		console.log(
			`Bridge Charts: rendered ${chart.layerCount} layers over ${nCats} segments (y ${formatValue(minY)}..${formatValue(maxY)})`
		);
	}
}
