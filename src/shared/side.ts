/**
 * OrderSide — direction of an order on either venue.
 */

export const OrderSide = {
	Buy: "buy",
	Sell: "sell",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

/** The side that closes a position opened by `side`. */
export function oppositeSide(side: OrderSide): OrderSide {
	return side === OrderSide.Buy ? OrderSide.Sell : OrderSide.Buy;
}
