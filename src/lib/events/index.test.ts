import { describe, expect, it, vi } from "vitest";
import { TypedEmitter } from "./index.js";

type FeedEvents = {
	quote: (venue: "home" | "hedge", bid: string) => void;
	dropped: () => void;
};

describe("TypedEmitter", () => {
	it("passes every argument to each listener in order", () => {
		const events = new TypedEmitter<FeedEvents>();
		const seen: string[] = [];
		events.on("quote", (venue, bid) => seen.push(`a:${venue}:${bid}`));
		events.on("quote", (venue, bid) => seen.push(`b:${venue}:${bid}`));

		events.emit("quote", "hedge", "100.5");

		expect(seen).toEqual(["a:hedge:100.5", "b:hedge:100.5"]);
	});

	it("stops delivering after off()", () => {
		const events = new TypedEmitter<FeedEvents>();
		const listener = vi.fn();
		events.on("dropped", listener);
		events.emit("dropped");
		events.off("dropped", listener);
		events.emit("dropped");

		expect(listener).toHaveBeenCalledTimes(1);
		expect(events.listenerCount("dropped")).toBe(0);
	});

	it("reports whether an emit reached a listener", () => {
		const events = new TypedEmitter<FeedEvents>();
		expect(events.emit("dropped")).toBe(false);
		events.on("dropped", () => {});
		expect(events.emit("dropped")).toBe(true);
	});
});
