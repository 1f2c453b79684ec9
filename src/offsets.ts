/**
 * Offset Engine
 *
 * Computes the bottom of every stacked segment of a bridge chart. Layers are
 * processed bottom to top; each one starts from the tops left by the layers
 * below it.
 */

import { ConfigurationError } from "./errors";
import type {
	AnnotatedLayer,
	LayerInput,
	LayerValue,
	OffsetResult,
} from "./types";

// ============================================================================
// Helpers
// ============================================================================

/**
 * Replaces gaps (`null`, `undefined`, NaN) with 0.
 */
export function cleanValues(values: readonly LayerValue[]): number[] {
	return values.map((v) => (v == null || Number.isNaN(v) ? 0 : v));
}

// ============================================================================
// Bottom Calculation
// ============================================================================

/**
 * Calculates the bottom of each segment of one layer.
 *
 * Each category carries the value of its left neighbour in the same layer
 * on top of the current tops, and those carries are summed across
 * categories. A total category drops both the carry and the running sum and
 * starts at its own top.
 *
 * @param values - Raw layer values, gaps allowed
 * @param tops - Cumulative tops left by the layers below
 * @param totalSegments - Mask of total categories
 * @returns Bottoms for this layer and the tops after it is applied
 * @throws ConfigurationError when the three sequences differ in length
 */
export function calcBottom(
	values: readonly LayerValue[],
	tops: readonly number[],
	totalSegments: readonly boolean[]
): OffsetResult {
	if (tops.length !== values.length || totalSegments.length !== values.length) {
		throw new ConfigurationError(
			"layer-length-mismatch",
			`Layer has ${values.length} values but tops has ${tops.length} and totalSegments has ${totalSegments.length}.`
		);
	}

	const clean = cleanValues(values);
	const bottom: number[] = [];
	let cumulative = 0;

	for (let i = 0; i < clean.length; i++) {
		const shifted = i === 0 ? 0 : clean[i - 1];
		if (totalSegments[i]) {
			bottom.push(tops[i]);
			cumulative = tops[i];
		} else {
			cumulative += tops[i] + shifted;
			bottom.push(cumulative);
		}
	}

	return {
		bottom,
		tops: tops.map((t, i) => t + clean[i]),
	};
}

/**
 * Recomputes the bottoms of all layers from scratch, in stacking order.
 * The input is left untouched; a new frozen list is returned.
 */
export function recomputeOffsets(
	layers: readonly LayerInput[],
	totalSegments: readonly boolean[]
): readonly AnnotatedLayer[] {
	let tops: number[] = totalSegments.map(() => 0);
	const out: AnnotatedLayer[] = [];

	for (const layer of layers) {
		const result = calcBottom(layer.values, tops, totalSegments);
		out.push(
			Object.freeze({
				values: layer.values,
				style: layer.style,
				bottom: Object.freeze(result.bottom),
			})
		);
		tops = result.tops;
	}

	return Object.freeze(out);
}
