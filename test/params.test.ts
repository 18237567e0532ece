import { describe, expect, it } from "vitest";

import { ConfigError, appendQuery, expandPath, parameterToString } from "../src";

describe("parameterToString", () => {
	it("joins arrays with the collection delimiter", () => {
		expect(parameterToString(["a", "b"])).toBe("a,b");
		expect(parameterToString(["a", "b"], "ssv")).toBe("a b");
		expect(parameterToString(["a", "b"], "tsv")).toBe("a\tb");
		expect(parameterToString(["a", "b"], "pipes")).toBe("a|b");
	});

	it("formats dates without zero milliseconds", () => {
		expect(parameterToString(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe(
			"2024-01-02T03:04:05Z",
		);
		expect(parameterToString(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 120)))).toBe(
			"2024-01-02T03:04:05.120Z",
		);
	});

	it("stringifies scalars", () => {
		expect(parameterToString(42)).toBe("42");
		expect(parameterToString(false)).toBe("false");
	});
});

describe("appendQuery", () => {
	it("skips undefined values", () => {
		const query = new URLSearchParams();
		appendQuery(query, "sort", undefined);
		expect(query.toString()).toBe("");
	});

	it("repeats the key for the multi format", () => {
		const query = new URLSearchParams();
		appendQuery(query, "probe_dc", ["aws:eu-west-1", "aws:us-east-1"], "multi");
		expect(query.getAll("probe_dc")).toEqual(["aws:eu-west-1", "aws:us-east-1"]);
	});

	it("joins csv arrays into one entry", () => {
		const query = new URLSearchParams();
		appendQuery(query, "include", ["users", "attachments"], "csv");
		expect(query.getAll("include")).toEqual(["users,attachments"]);
	});
});

describe("expandPath", () => {
	it("escapes path parameters", () => {
		expect(expandPath("/api/v2/users/{user_id}", { user_id: "a b/c" })).toBe(
			"/api/v2/users/a%20b%2Fc",
		);
	});

	it("requires every parameter", () => {
		expect(() => expandPath("/api/v2/users/{user_id}", { user_id: " " })).toThrow(
			ConfigError,
		);
		expect(() => expandPath("/api/v2/users/{user_id}", {})).toThrow(
			"user_id is required",
		);
	});
});
