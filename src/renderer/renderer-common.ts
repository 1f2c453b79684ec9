// src/renderer/renderer-common.ts
import type { BridgeSettings } from "../settings";

export const SVG_NS = "http://www.w3.org/2000/svg";

export function createDiv(
	parent: HTMLElement,
	cls: string,
	text?: string
): HTMLDivElement {
	const div = parent.ownerDocument.createElement("div");
	div.className = cls;
	if (text != null) div.textContent = text;
	parent.appendChild(div);
	return div;
}

export function colorFor(idx: number, palette: readonly string[]): string {
	return palette[idx % palette.length];
}

export function ensureContainer(
	container: HTMLElement,
	settings: BridgeSettings
): {
	scroll: HTMLElement;
	inner: HTMLElement;
	svg: SVGSVGElement;
	tooltip: HTMLElement;
} {
	container.classList.add("bridge-charts-container");
	container.style.width = "100%";
	container.style.maxWidth = "100%";
	container.style.position = "relative";

	const scroll = createDiv(container, "bridge-charts-scroll");
	scroll.style.overflowX = "auto";
	scroll.style.overflowY = "hidden";
	scroll.style.width = "100%";

	const inner = createDiv(scroll, "bridge-charts-inner");
	inner.style.display = "block";
	inner.style.minHeight = `${settings.height}px`;
	if (settings.background) inner.style.background = settings.background;

	const svg = container.ownerDocument.createElementNS(SVG_NS, "svg");
	svg.setAttribute("width", "100%");
	svg.setAttribute("height", String(settings.height));
	svg.style.display = "block";
	inner.appendChild(svg);

	const tooltip = createDiv(container, "bridge-charts-tooltip");
	tooltip.style.display = "none";

	return { scroll, inner, svg, tooltip };
}

export function formatValue(value: number): string {
	return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function showTooltip(
	container: HTMLElement,
	tooltip: HTMLElement,
	label: string,
	value: number,
	ev: MouseEvent
): void {
	const rect = container.getBoundingClientRect();

	tooltip.replaceChildren();
	createDiv(tooltip, "bridge-charts-tooltip-title", label);
	createDiv(tooltip, "bridge-charts-tooltip-value", formatValue(value));
	tooltip.style.display = "block";

	const tRect = tooltip.getBoundingClientRect();

	let x = ev.clientX - rect.left + 6;
	let y = ev.clientY - rect.top + 6;

	if (x + tRect.width > rect.width - 4) {
		x = rect.width - tRect.width - 4;
	}
	if (x < 4) x = 4;

	if (y + tRect.height > rect.height - 4) {
		y = rect.height - tRect.height - 4;
	}
	if (y < 4) y = 4;

	tooltip.style.left = x + "px";
	tooltip.style.top = y + "px";
}

export function hideTooltip(tooltip: HTMLElement): void {
	tooltip.style.display = "none";
}

export function isLightColor(raw: string | undefined): boolean {
	if (!raw) return false;
	const c = raw.trim().toLowerCase();
	if (c === "#fff" || c === "#ffffff" || c === "white") return true;
	if (!c.startsWith("#")) return false;
	let r: number, g: number, b: number;
	if (c.length === 4) {
		r = parseInt(c[1] + c[1], 16);
		g = parseInt(c[2] + c[2], 16);
		b = parseInt(c[3] + c[3], 16);
	} else if (c.length === 7) {
		r = parseInt(c.slice(1, 3), 16);
		g = parseInt(c.slice(3, 5), 16);
		b = parseInt(c.slice(5, 7), 16);
	} else {
		return false;
	}
	const lum = (0.2126 * r + 0.7152 * g + 0.0722 * b) / 255;
	return lum > 0.7;
}

// Dark hex backgrounds get light axis text.
export function textColorFor(background: string | undefined): string {
	if (!background || !background.trim().startsWith("#")) return "#111111";
	return isLightColor(background) ? "#111111" : "#eeeeee";
}
