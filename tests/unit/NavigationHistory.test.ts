import { describe, expect, it } from "vitest";
import { NavigationHistory } from "../../src/services/NavigationHistory.js";

const A = new URL("gemini://example.org/a");
const B = new URL("gemini://example.org/b");
const C = new URL("gemini://example.org/c");
const D = new URL("gemini://example.org/d");

describe("NavigationHistory", () => {
	it("starts with one entry under the cursor", () => {
		const history = new NavigationHistory(A);
		expect(history.current().href).toBe(A.href);
		expect(history.position).toBe(1);
		expect(history.length).toBe(1);
		expect(history.canGoBack()).toBe(false);
		expect(history.canAdvance()).toBe(false);
	});

	it("moves onto each pushed entry", () => {
		const history = new NavigationHistory(A);
		history.push(B);
		history.push(C);
		expect(history.current().href).toBe(C.href);

		history.back();
		expect(history.canAdvance()).toBe(true);
		history.advance();
		expect(history.current().href).toBe(C.href);
		expect(history.position).toBe(3);
		expect(history.canGoBack()).toBe(true);
	});

	it("drops the forward branch when pushing after going back", () => {
		const history = new NavigationHistory(A);
		history.push(B);
		history.back();
		expect(history.current().href).toBe(A.href);

		history.push(D);
		expect(history.length).toBe(2);
		expect(history.current().href).toBe(D.href);
		expect(history.canAdvance()).toBe(false);
		history.back();
		expect(history.current().href).toBe(A.href);
	});

	it("does not move back past the first entry", () => {
		const history = new NavigationHistory(A);
		history.push(B);
		history.back();
		history.back();
		expect(history.position).toBe(1);
		expect(history.current().href).toBe(A.href);
	});

	it("does not advance past the last entry", () => {
		const history = new NavigationHistory(A);
		history.push(B);
		history.advance();
		expect(history.position).toBe(2);
		expect(history.current().href).toBe(B.href);
	});

	it("keeps duplicate entries", () => {
		const history = new NavigationHistory(A);
		history.push(A);
		history.push(A);
		expect(history.length).toBe(3);
	});

	it("hands out copies of its entries", () => {
		const history = new NavigationHistory(A);
		const current = history.current();
		current.search = "changed";
		expect(history.current().href).toBe(A.href);

		const pushed = new URL(B.href);
		history.push(pushed);
		pushed.pathname = "/elsewhere";
		expect(history.current().href).toBe(B.href);
	});
});
