import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";

const price = fc
	.integer({ min: 1, max: 10_000_000 })
	.map((cents) => Decimal.from(cents).mul(Decimal.from("0.01")));

describe("Decimal (property-based)", () => {
	it("addition is commutative", () => {
		fc.assert(
			fc.property(price, price, (a, b) => {
				expect(a.add(b).toString()).toBe(b.add(a).toString());
			}),
		);
	});

	it("addition is associative", () => {
		fc.assert(
			fc.property(price, price, price, (a, b, c) => {
				expect(a.add(b).add(c).toString()).toBe(a.add(b.add(c)).toString());
			}),
		);
	});

	it("sub undoes add", () => {
		fc.assert(
			fc.property(price, price, (a, b) => {
				expect(a.add(b).sub(b).eq(a)).toBe(true);
			}),
		);
	});

	it("spread is antisymmetric: (a - b) == -(b - a)", () => {
		fc.assert(
			fc.property(price, price, (bid, ask) => {
				expect(bid.sub(ask).eq(ask.sub(bid).neg())).toBe(true);
			}),
		);
	});

	it("exactly one of lt, eq, gt holds", () => {
		fc.assert(
			fc.property(price, price, (a, b) => {
				const holds = [a.lt(b), a.eq(b), a.gt(b)].filter(Boolean);
				expect(holds).toHaveLength(1);
			}),
		);
	});

	it("toFixed(2) of a cent-aligned value round-trips", () => {
		fc.assert(
			fc.property(price, (p) => {
				expect(Decimal.from(p.toFixed(2)).eq(p)).toBe(true);
			}),
		);
	});
});
