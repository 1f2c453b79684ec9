// src/errors.ts

export type ConfigurationErrorKind =
	| "mask-length-mismatch"
	| "layer-length-mismatch"
	| "invalid-setting"
	| "invalid-block";

export class ConfigurationError extends Error {
	readonly kind: ConfigurationErrorKind;

	constructor(kind: ConfigurationErrorKind, message: string) {
		super(message);
		this.name = "ConfigurationError";
		this.kind = kind;
	}
}
