/** Base class of every error raised while turning a document into a Config. */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * A field is missing, has the wrong shape, or holds a value outside its
 * domain. `path` locates the field, e.g. `macros[0].actions[1].data.count`.
 */
export class InvalidConfigError extends ConfigError {
	readonly path: string;
	readonly detail: string;

	constructor(path: string, detail: string) {
		super(`invalid config: ${path === "" ? "<root>" : path}: ${detail}`);
		this.name = "InvalidConfigError";
		this.path = path;
		this.detail = detail;
	}
}

/** No resolver is registered for the declared schema version. */
export class UnsupportedVersionError extends ConfigError {
	readonly version: string;
	readonly supported: string[];

	constructor(version: string, supported: string[]) {
		const sorted = [...supported].sort();
		super(`unsupported config version "${version}" (supported: ${sorted.join(", ")})`);
		this.name = "UnsupportedVersionError";
		this.version = version;
		this.supported = sorted;
	}
}

/** The configuration text could not be parsed as YAML or JSON. */
export class ConfigParseError extends ConfigError {
	readonly origin: string;

	constructor(origin: string, message: string) {
		super(`cannot parse ${origin}: ${message}`);
		this.name = "ConfigParseError";
		this.origin = origin;
	}
}
