import { z } from "zod";

/**
 * Raw JSON of a model that could not be decoded into its declared shape
 * because the server sent a value this client does not know yet (an enum
 * member or a oneOf branch). It serializes back to the JSON it was read from.
 */
export class UnparsedObject {
	readonly raw: Record<string, unknown>;

	constructor(raw: Record<string, unknown>) {
		this.raw = raw;
	}

	toJSON(): Record<string, unknown> {
		return this.raw;
	}
}

export function isUnparsed(value: unknown): value is UnparsedObject {
	return value instanceof UnparsedObject;
}

/**
 * Object schema that keeps properties it does not declare.
 */
export function model<T extends z.ZodRawShape>(shape: T) {
	return z.object(shape).passthrough();
}

/**
 * Optional field that may also be explicitly `null`.
 */
export function nullable<T extends z.ZodTypeAny>(schema: T) {
	return schema.nullable().optional();
}

/**
 * Decodes with `schema`, falling back to {@link UnparsedObject} when the only
 * problems are unknown enum values. Missing required fields and wrong types
 * still fail.
 */
export function tolerant<T extends z.ZodTypeAny>(schema: T) {
	return z.unknown().transform((raw, ctx): z.output<T> | UnparsedObject => {
		const result = schema.safeParse(raw);
		if (result.success) {
			const value: z.output<T> = result.data;
			return value;
		}
		const forwardCompatible = result.error.issues.every(
			(issue) => issue.code === z.ZodIssueCode.invalid_enum_value,
		);
		if (forwardCompatible && isRecord(raw)) {
			return new UnparsedObject(raw);
		}
		for (const issue of result.error.issues) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: issue.message,
				path: issue.path,
			});
		}
		return z.NEVER;
	});
}

/**
 * Polymorphic field: exactly one matching variant wins, otherwise the raw
 * object is kept as {@link UnparsedObject}.
 */
export function oneOf<const V extends readonly [z.ZodTypeAny, ...z.ZodTypeAny[]]>(
	name: string,
	variants: V,
) {
	return z
		.unknown()
		.transform((raw, ctx): z.output<V[number]> | UnparsedObject => {
			const matches: Array<z.output<V[number]>> = [];
			for (const variant of variants) {
				const result = variant.safeParse(raw);
				if (result.success) {
					matches.push(result.data);
				}
			}
			if (matches.length === 1) {
				return matches[0];
			}
			if (isRecord(raw)) {
				return new UnparsedObject(raw);
			}
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `${name}: expected an object`,
			});
			return z.NEVER;
		});
}

/**
 * Failure body. Most endpoints answer `{ "errors": ["..."] }`; log intake
 * answers `{ "errors": [{ "status", "title", "detail" }] }`.
 */
export const APIErrorResponseSchema = model({
	errors: z.array(
		z.union([
			z.string(),
			model({
				status: nullable(z.string()),
				title: nullable(z.string()),
				detail: nullable(z.string()),
			}),
		]),
	),
});
export type APIErrorResponse = z.infer<typeof APIErrorResponseSchema>;

/**
 * Cursor block shared by the search endpoints: `meta.page.after`.
 */
export const CursorMetaSchema = model({
	elapsed: z.number().optional(),
	page: model({ after: z.string().optional() }).optional(),
	request_id: z.string().optional(),
	status: z.string().optional(),
	warnings: z.array(z.unknown()).optional(),
});
export type CursorMeta = z.infer<typeof CursorMetaSchema>;

export const PaginationLinksSchema = model({
	next: z.string().optional(),
});

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
