/**
 * Malformed meeting metadata in a single export (missing or invalid start
 * time, duration, or meeting-info section). Aborts that export only.
 */
export class FatalParseError extends Error {
	readonly origin: string;
	readonly reason: string;

	constructor(origin: string, reason: string) {
		super(`${origin}: ${reason}`);
		this.name = "FatalParseError";
		this.origin = origin;
		this.reason = reason;
	}
}

/** Invalid thresholds or ratio. Raised before any export is read. */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}
