import { ConfigError } from "./errors";

export type CollectionFormat = "csv" | "ssv" | "tsv" | "pipes" | "multi";

export type ParameterScalar = string | number | boolean | Date;
export type ParameterValue = ParameterScalar | ReadonlyArray<ParameterScalar>;

const DELIMITERS: Record<Exclude<CollectionFormat, "multi">, string> = {
	csv: ",",
	ssv: " ",
	tsv: "\t",
	pipes: "|",
};

/**
 * Converts a parameter to its wire form. Arrays are joined with the
 * collection delimiter; dates are RFC 3339, with milliseconds only when set.
 */
export function parameterToString(
	value: ParameterValue,
	format: CollectionFormat = "csv",
): string {
	if (isArray(value)) {
		const delimiter = format === "multi" ? "," : DELIMITERS[format];
		return value.map((v) => scalarToString(v)).join(delimiter);
	}
	return scalarToString(value);
}

export function appendQuery(
	query: URLSearchParams,
	name: string,
	value: ParameterValue | undefined,
	format: CollectionFormat = "csv",
): void {
	if (value === undefined) return;
	if (format === "multi" && isArray(value)) {
		for (const item of value) {
			query.append(name, scalarToString(item));
		}
		return;
	}
	query.append(name, parameterToString(value, format));
}

/**
 * Replaces `{name}` placeholders with percent-escaped parameter values.
 */
export function expandPath(
	template: string,
	params: Record<string, string | number>,
): string {
	return template.replace(/\{([^}]+)\}/g, (_match, name: string) => {
		const value = params[name];
		if (value === undefined || String(value).trim() === "") {
			throw new ConfigError(`${name} is required`);
		}
		return encodeURIComponent(String(value));
	});
}

function scalarToString(value: ParameterScalar): string {
	if (value instanceof Date) {
		return formatTime(value);
	}
	return String(value);
}

function formatTime(value: Date): string {
	const iso = value.toISOString();
	return value.getUTCMilliseconds() === 0 ? iso.replace(/\.000Z$/, "Z") : iso;
}

function isArray(value: ParameterValue): value is ReadonlyArray<ParameterScalar> {
	return Array.isArray(value);
}
