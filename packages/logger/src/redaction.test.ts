import { describe, expect, test } from "vitest";
import { DEFAULT_REDACT_PATHS, mergeRedactPaths, redactUrl } from "./redaction.js";

describe("mergeRedactPaths", () => {
	test("returns the defaults when nothing extra is given", () => {
		expect(mergeRedactPaths()).toEqual([...DEFAULT_REDACT_PATHS]);
	});

	test("appends extra paths without duplicates", () => {
		const merged = mergeRedactPaths(["token", "secret"]);
		expect(merged.filter((p) => p === "token")).toHaveLength(1);
		expect(merged[merged.length - 1]).toBe("secret");
	});
});

describe("redactUrl", () => {
	test("censors the token query parameter", () => {
		expect(redactUrl("https://example.test/hist/strikes?ticker=SPX&token=test-secret&fields=ticker")).toBe(
			"https://example.test/hist/strikes?ticker=SPX&token=[REDACTED]&fields=ticker"
		);
	});

	test("leaves URLs without a token untouched", () => {
		expect(redactUrl("https://example.test/hist/strikes?ticker=SPX")).toBe(
			"https://example.test/hist/strikes?ticker=SPX"
		);
	});
});
