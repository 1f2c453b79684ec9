/**
 * Bridge Chart
 *
 * Holds the segment labels, the total mask and the ordered layer list of a
 * bridge (waterfall) chart. Every mutation recomputes all bottoms.
 */

import { ConfigurationError } from "./errors";
import { recomputeOffsets } from "./offsets";
import type {
	AnnotatedLayer,
	LayerInput,
	LayerStyle,
	LayerValue,
} from "./types";

export interface BridgeLayerView {
	values: readonly LayerValue[];
	bottom: readonly number[];
	style: LayerStyle;
}

export class BridgeChart {
	readonly segmentLabels: readonly string[];
	readonly totalSegments: readonly boolean[];

	private inputs: readonly LayerInput[] = Object.freeze([]);
	private annotated: readonly AnnotatedLayer[] = Object.freeze([]);

	/**
	 * @param segmentLabels - Labels shown along the x axis
	 * @param totalSegments - Which segments are totals; all false when omitted
	 */
	constructor(segmentLabels: readonly string[], totalSegments?: readonly boolean[]) {
		if (totalSegments && totalSegments.length !== segmentLabels.length) {
			throw new ConfigurationError(
				"mask-length-mismatch",
				`totalSegments has ${totalSegments.length} entries but there are ${segmentLabels.length} segment labels.`
			);
		}
		this.segmentLabels = Object.freeze([...segmentLabels]);
		this.totalSegments = Object.freeze(
			totalSegments ? [...totalSegments] : segmentLabels.map(() => false)
		);
	}

	get segmentCount(): number {
		return this.segmentLabels.length;
	}

	get layerCount(): number {
		return this.annotated.length;
	}

	/**
	 * Adds a layer of segments. Bottom layers are drawn first, so inserting
	 * at the bottom moves every layer above it.
	 */
	addLayer(
		values: readonly LayerValue[],
		addToBottom = true,
		style: LayerStyle = {}
	): void {
		if (values.length !== this.segmentCount) {
			throw new ConfigurationError(
				"layer-length-mismatch",
				`Layer has ${values.length} values but there are ${this.segmentCount} segment labels.`
			);
		}

		const layer: LayerInput = Object.freeze({
			values: Object.freeze([...values]),
			style: Object.freeze({ ...style }),
		});
		const inputs = Object.freeze(
			addToBottom ? [layer, ...this.inputs] : [...this.inputs, layer]
		);
		const annotated = recomputeOffsets(inputs, this.totalSegments);

		this.inputs = inputs;
		this.annotated = annotated;
	}

	/**
	 * Layers in bottom-to-top order. The returned iterable can be walked any
	 * number of times and keeps showing the layers present when it was taken.
	 */
	layers(): Iterable<BridgeLayerView> {
		const snapshot = this.annotated;
		return {
			*[Symbol.iterator]() {
				for (const layer of snapshot) {
					yield {
						values: layer.values,
						bottom: layer.bottom,
						style: layer.style,
					};
				}
			},
		};
	}
}
