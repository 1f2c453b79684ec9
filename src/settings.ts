// src/settings.ts

import { ConfigurationError } from "./errors";

export interface BridgePadding {
	left: number;
	right: number;
	top: number;
	bottom: number;
}

export interface BridgeSettings {
	/** Minimum drawing width in px; grows with the container. */
	width: number;
	height: number;
	padding: BridgePadding;
	background?: string;
	title?: string;
	/** Fill colors picked by layer index when a layer has no `fill` style. */
	palette: string[];
	/** Share of each category slot taken by its bar, in (0, 1]. */
	barWidthRatio: number;
	yTicks: number;
	/** Logs a summary line per render. */
	debug: boolean;
}

export type BridgeSettingsInput = Partial<Omit<BridgeSettings, "padding">> & {
	padding?: Partial<BridgePadding>;
};

export const DEFAULT_SETTINGS: BridgeSettings = {
	width: 480,
	height: 300,
	padding: { left: 40, right: 16, top: 18, bottom: 28 },
	palette: [
		"#5b6cff",
		"#5ec27f",
		"#ffb347",
		"#ff6b6b",
		"#b47cff",
		"#4dbbd5",
		"#f78fb3",
		"#50e3a4",
	],
	barWidthRatio: 0.6,
	yTicks: 4,
	debug: false,
};

function invalid(message: string): ConfigurationError {
	return new ConfigurationError("invalid-setting", message);
}

/**
 * Merges user options over the defaults.
 *
 * @throws ConfigurationError when a merged value is out of range
 */
export function resolveSettings(input: BridgeSettingsInput = {}): BridgeSettings {
	const settings: BridgeSettings = {
		...DEFAULT_SETTINGS,
		...input,
		padding: { ...DEFAULT_SETTINGS.padding, ...input.padding },
		palette: [...(input.palette ?? DEFAULT_SETTINGS.palette)],
	};

	if (!(settings.width > 0)) throw invalid(`width must be positive, got ${settings.width}`);
	if (!(settings.height > 0)) throw invalid(`height must be positive, got ${settings.height}`);
	if (!(settings.barWidthRatio > 0 && settings.barWidthRatio <= 1)) {
		throw invalid(`barWidthRatio must be in (0, 1], got ${settings.barWidthRatio}`);
	}
	if (!Number.isInteger(settings.yTicks) || settings.yTicks < 0) {
		throw invalid(`yTicks must be a non-negative integer, got ${settings.yTicks}`);
	}
	if (settings.palette.length === 0) throw invalid("palette must not be empty");

	return settings;
}
