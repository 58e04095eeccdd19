/**
 * Test Helpers for Marketdata Package
 */

import { type MockInstance, vi } from "vitest";

export type FetchSpy = MockInstance<typeof fetch>;

export type RouteHandler = (url: URL, init?: RequestInit) => Response | Promise<Response>;

/**
 * Create a mock JSON response.
 */
export function createJsonResponse(data: unknown, status = 200): Response {
	return new Response(JSON.stringify(data), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

/**
 * Create a plain-text error response.
 */
export function createErrorResponse(status: number, body = "error"): Response {
	return new Response(body, { status });
}

/**
 * Replace global fetch with a single handler. Restore with `vi.restoreAllMocks()`.
 */
export function mockFetch(handler: RouteHandler): FetchSpy {
	return vi
		.spyOn(globalThis, "fetch")
		.mockImplementation(async (input, init) => handler(new URL(String(input)), init));
}

/**
 * Replace global fetch with handlers keyed by the path after the base URL
 * (e.g. "hist/strikes"). Unrouted paths answer 404.
 */
export function routeFetch(basePath: string, routes: Record<string, RouteHandler>): FetchSpy {
	return mockFetch((url, init) => {
		const route = url.pathname.replace(`${basePath}/`, "");
		const handler = routes[route];
		return handler ? handler(url, init) : createErrorResponse(404, `no route ${route}`);
	});
}

/**
 * Get the URL of a recorded fetch call.
 */
export function getCallUrl(spy: FetchSpy, callIndex = 0): URL {
	const call = spy.mock.calls[callIndex];
	if (!call) {
		throw new Error(`Expected mock fetch to have call at index ${callIndex}`);
	}
	return new URL(String(call[0]));
}

/**
 * Get the request options of a recorded fetch call.
 */
export function getCallOptions(spy: FetchSpy, callIndex = 0): RequestInit | undefined {
	const call = spy.mock.calls[callIndex];
	if (!call) {
		throw new Error(`Expected mock fetch to have call at index ${callIndex}`);
	}
	return call[1];
}

/**
 * Paths requested so far, relative to `basePath`.
 */
export function calledRoutes(spy: FetchSpy, basePath: string): string[] {
	return spy.mock.calls.map(([input]) => new URL(String(input)).pathname.replace(`${basePath}/`, ""));
}
