// src/renderer.ts
import type { BridgeChart } from "./bridge";
import { buildBridge, parseBridgeBlock } from "./block";
import { ConfigurationError } from "./errors";
import { renderBridge } from "./renderer/bridge";
import { createDiv } from "./renderer/renderer-common";
import { resolveSettings, type BridgeSettingsInput } from "./settings";

export class BridgeRenderer {
	render(
		container: HTMLElement,
		chart: BridgeChart,
		options: BridgeSettingsInput = {}
	): void {
		const settings = resolveSettings(options);
		container.replaceChildren();
		container.classList.add("bridge-charts-container");

		const header = createDiv(container, "bridge-charts-title-row");
		const titleEl = createDiv(header, "bridge-charts-title");
		if (settings.title) {
			titleEl.textContent = settings.title;
		}

		renderBridge(container, chart, settings);
	}

	/**
	 * Renders a YAML bridge block. Configuration problems are shown in the
	 * container instead of being thrown.
	 */
	renderBlock(container: HTMLElement, source: string): void {
		try {
			const spec = parseBridgeBlock(source);
			this.render(container, buildBridge(spec), spec.options);
		} catch (e) {
			if (!(e instanceof ConfigurationError)) throw e;
			console.error("Bridge Charts: invalid block", e);
			container.replaceChildren();
			createDiv(container, "bridge-charts-error", `Bridge Charts: ${e.message}`);
		}
	}
}
