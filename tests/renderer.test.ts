/**
 * Tests for the SVG bridge renderer
 */

import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { BridgeChart } from "../src/bridge";
import { BridgeRenderer } from "../src/renderer";
import { styleAttributes, valueExtent } from "../src/renderer/bridge";
import type { BridgeSettingsInput } from "../src/settings";

// 300px wide plot, 240px tall: 4px per unit when values span 0..60
const OPTIONS: BridgeSettingsInput = {
	width: 340,
	height: 260,
	padding: { left: 40, right: 0, top: 10, bottom: 10 },
	barWidthRatio: 0.5,
	yTicks: 4,
};

let container: HTMLDivElement;

beforeEach(() => {
	container = document.createElement("div");
	document.body.appendChild(container);
});

afterEach(() => {
	container.remove();
	vi.restoreAllMocks();
});

function segments(): SVGRectElement[] {
	return Array.from(container.querySelectorAll<SVGRectElement>("rect.bridge-charts-segment"));
}

function simpleChart(): BridgeChart {
	const chart = new BridgeChart(["A", "B", "C"]);
	chart.addLayer([10, 20, 30]);
	return chart;
}

describe("valueExtent", () => {
	it("should include zero and negative steps", () => {
		const chart = new BridgeChart(["A", "B", "C"]);
		chart.addLayer([100, -20, 30]);

		expect(valueExtent(chart.layers())).toEqual([0, 110]);
	});

	it("should fall back to 0..1 without drawn segments", () => {
		const chart = new BridgeChart(["A"]);
		chart.addLayer([null]);

		expect(valueExtent(chart.layers())).toEqual([0, 1]);
	});
});

describe("styleAttributes", () => {
	it("should keep only settable presentation attributes", () => {
		expect(
			styleAttributes({
				fill: "#000000",
				"stroke-width": 2,
				Height: 1,
				class: "mine",
				"data-layer": 7,
				onClick: "alert(1)",
				"stroke width": 2,
				label: "Actual",
				dash: [1, 2],
			})
		).toEqual([
			["fill", "#000000"],
			["stroke-width", "2"],
		]);
	});
});

describe("BridgeRenderer", () => {
	it("should show a placeholder for a chart without layers", () => {
		new BridgeRenderer().render(container, new BridgeChart(["A"]), OPTIONS);

		expect(container.querySelector(".bridge-charts-empty")?.textContent).toBe(
			"No data available."
		);
		expect(container.querySelector("svg")).toBeNull();
	});

	it("should place segments at their bottoms", () => {
		new BridgeRenderer().render(container, simpleChart(), OPTIONS);

		const rects = segments();
		expect(rects).toHaveLength(3);
		expect(rects.map((r) => r.getAttribute("x"))).toEqual(["65", "165", "265"]);
		expect(rects.map((r) => r.getAttribute("y"))).toEqual(["210", "130", "10"]);
		expect(rects.map((r) => r.getAttribute("height"))).toEqual(["40", "80", "120"]);
		expect(rects[0].getAttribute("width")).toBe("50");
	});

	it("should draw negative values downward from their bottom", () => {
		const chart = new BridgeChart(["A", "B"]);
		chart.addLayer([60, -20]);
		new BridgeRenderer().render(container, chart, OPTIONS);

		const rect = segments()[1];
		// from 60 down to 40
		expect(rect.getAttribute("y")).toBe("10");
		expect(rect.getAttribute("height")).toBe("80");
	});

	it("should skip gaps", () => {
		const chart = new BridgeChart(["A", "B", "C"]);
		chart.addLayer([5, null, NaN]);
		new BridgeRenderer().render(container, chart, OPTIONS);

		expect(segments().map((r) => r.getAttribute("data-segment"))).toEqual(["0"]);
	});

	it("should not draw zero-height steps", () => {
		const chart = new BridgeChart(["A", "B", "C"]);
		chart.addLayer([5, 0, 5]);
		new BridgeRenderer().render(container, chart, OPTIONS);

		expect(segments().map((r) => r.getAttribute("data-segment"))).toEqual(["0", "2"]);
	});

	it("should keep geometry and class when the style names them", () => {
		const chart = new BridgeChart(["A", "B", "C"]);
		chart.addLayer([10, 20, 30], true, { y: 0, height: 1, x: 3, width: 4, class: "mine" });
		new BridgeRenderer().render(container, chart, OPTIONS);

		const rects = segments();
		expect(rects).toHaveLength(3);
		expect(rects.map((r) => r.getAttribute("y"))).toEqual(["210", "130", "10"]);
		expect(rects.map((r) => r.getAttribute("height"))).toEqual(["40", "80", "120"]);
		expect(rects[0].getAttribute("x")).toBe("65");
		expect(rects[0].getAttribute("width")).toBe("50");
	});

	it("should not set event handler attributes from a block", () => {
		new BridgeRenderer().renderBlock(
			container,
			'labels: [A]\nlayers:\n  - values: [1]\n    style: { onmouseover: "alert(1)", stroke: "#333333" }'
		);

		const rect = segments()[0];
		expect(rect.hasAttribute("onmouseover")).toBe(false);
		expect(rect.getAttribute("stroke")).toBe("#333333");
	});

	it("should render a block whose style has an invalid attribute name", () => {
		new BridgeRenderer().renderBlock(
			container,
			'labels: [A, B]\nlayers:\n  - values: [1, 2]\n    style: { "stroke width": 2 }'
		);

		expect(segments()).toHaveLength(2);
		expect(container.querySelector(".bridge-charts-error")).toBeNull();
	});

	it("should draw axis labels", () => {
		new BridgeRenderer().render(container, simpleChart(), OPTIONS);

		const xLabels = Array.from(container.querySelectorAll(".bridge-charts-x-label"));
		const yLabels = Array.from(container.querySelectorAll(".bridge-charts-y-label"));
		expect(xLabels.map((n) => n.textContent)).toEqual(["A", "B", "C"]);
		expect(yLabels.map((n) => n.textContent)).toEqual(["0", "15", "30", "45", "60"]);
		expect(container.querySelectorAll(".bridge-charts-grid")).toHaveLength(5);
	});

	it("should pick axis text color from the background", () => {
		const renderer = new BridgeRenderer();
		renderer.render(container, simpleChart(), { ...OPTIONS, background: "#1e1e1e" });
		expect(container.querySelector(".bridge-charts-x-label")?.getAttribute("fill")).toBe("#eeeeee");

		renderer.render(container, simpleChart(), { ...OPTIONS, background: "#fafafa" });
		expect(container.querySelector(".bridge-charts-x-label")?.getAttribute("fill")).toBe("#111111");
	});

	it("should use the palette by layer and let the style override it", () => {
		const chart = new BridgeChart(["A"]);
		chart.addLayer([1]);
		chart.addLayer([2], false);
		chart.addLayer([3], false, { fill: "#000000", opacity: 0.5, "data-kind": "total" });
		new BridgeRenderer().render(container, chart, OPTIONS);

		const rects = segments();
		expect(rects.map((r) => r.getAttribute("fill"))).toEqual(["#5b6cff", "#5ec27f", "#000000"]);
		expect(rects[2].getAttribute("opacity")).toBe("0.5");
		expect(rects[2].getAttribute("data-kind")).toBe("total");
	});

	it("should build a legend from labelled layers", () => {
		const chart = new BridgeChart(["A"]);
		chart.addLayer([1], true, { label: "Actual" });
		chart.addLayer([2], false);
		new BridgeRenderer().render(container, chart, OPTIONS);

		const items = Array.from(container.querySelectorAll(".bridge-charts-legend-item"));
		expect(items.map((n) => n.textContent)).toEqual(["Actual"]);
		expect(segments()[0].hasAttribute("label")).toBe(false);
	});

	it("should show the title and replace previous content", () => {
		const renderer = new BridgeRenderer();
		renderer.render(container, simpleChart(), OPTIONS);
		renderer.render(container, simpleChart(), { ...OPTIONS, title: "Q3 bridge" });

		expect(container.querySelectorAll("svg")).toHaveLength(1);
		expect(container.querySelector(".bridge-charts-title")?.textContent).toBe("Q3 bridge");
	});

	it("should show a tooltip on hover", () => {
		new BridgeRenderer().render(container, simpleChart(), OPTIONS);

		const tooltip = container.querySelector<HTMLElement>(".bridge-charts-tooltip");
		segments()[1].dispatchEvent(new MouseEvent("mouseenter"));

		expect(tooltip?.style.display).toBe("block");
		expect(tooltip?.querySelector(".bridge-charts-tooltip-title")?.textContent).toBe("B");
		expect(tooltip?.querySelector(".bridge-charts-tooltip-value")?.textContent).toBe("20");

		segments()[1].dispatchEvent(new MouseEvent("mouseleave"));
		expect(tooltip?.style.display).toBe("none");
	});

	it("should log a summary in debug mode", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {});
		new BridgeRenderer().render(container, simpleChart(), { ...OPTIONS, debug: true });

		expect(log).toHaveBeenCalledWith(
			"Bridge Charts: rendered 1 layers over 3 segments (y 0..60)"
		);
	});

	it("should render a YAML block", () => {
		new BridgeRenderer().renderBlock(
			container,
			"labels: [A, B, C]\nlayers:\n  - values: [10, 20, 30]\noptions:\n  title: From YAML"
		);

		expect(container.querySelector(".bridge-charts-title")?.textContent).toBe("From YAML");
		expect(segments()).toHaveLength(3);
	});

	it("should show block errors in the container", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		new BridgeRenderer().renderBlock(container, "labels: A");

		expect(container.querySelector(".bridge-charts-error")?.textContent).toBe(
			"Bridge Charts: labels: expected a list"
		);
		expect(error).toHaveBeenCalledTimes(1);
	});
});
