// src/types.ts

import type { BridgeSettingsInput } from "./settings";

/** A segment value. `null`, `undefined` and NaN mark a gap. */
export type LayerValue = number | null | undefined;

/** Rendering parameters forwarded verbatim to the renderer. */
export type LayerStyle = Readonly<Record<string, unknown>>;

export interface LayerInput {
	readonly values: readonly LayerValue[];
	readonly style: LayerStyle;
}

export interface AnnotatedLayer extends LayerInput {
	readonly bottom: readonly number[];
}

export interface OffsetResult {
	bottom: number[];
	tops: number[];
}

export type LayerPosition = "bottom" | "top";

export interface BridgeBlockLayer {
	values: LayerValue[];
	position: LayerPosition;
	style: Record<string, unknown>;
}

// Shape of a ```bridge``` YAML block after validation.
export interface BridgeBlockSpec {
	labels: string[];
	totals?: boolean[];
	layers: BridgeBlockLayer[];
	options: BridgeSettingsInput;
}
