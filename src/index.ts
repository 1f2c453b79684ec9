export { BridgeChart, type BridgeLayerView } from "./bridge";
export { buildBridge, parseBridgeBlock } from "./block";
export { ConfigurationError, type ConfigurationErrorKind } from "./errors";
export { calcBottom, cleanValues, recomputeOffsets } from "./offsets";
export { BridgeRenderer } from "./renderer";
export { renderBridge, styleAttributes, valueExtent } from "./renderer/bridge";
export {
	DEFAULT_SETTINGS,
	resolveSettings,
	type BridgePadding,
	type BridgeSettings,
	type BridgeSettingsInput,
} from "./settings";
export type {
	AnnotatedLayer,
	BridgeBlockLayer,
	BridgeBlockSpec,
	LayerInput,
	LayerPosition,
	LayerStyle,
	LayerValue,
	OffsetResult,
} from "./types";
