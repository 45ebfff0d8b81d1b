/**
 * ArbitrageEngine — fuses both venues' top of book and trades the cross spread.
 *
 * Lifecycle: `start()` connects and subscribes both streams, waits for both
 * quotes, then runs the decision loop and the status reporter until `stop()`.
 * Each tick reads both quotes, gates on the hedge account and the risk
 * controller, and fires at most one two-leg trade.
 */

import type { Logger } from "../lib/logger/index.js";
import { MarketView } from "../market/market-view.js";
import { crossSpreads } from "../market/orderbook.js";
import type { VenueId } from "../market/types.js";
import type { RiskController } from "../risk/risk-controller.js";
import { isBlocked } from "../risk/types.js";
import { Decimal } from "../shared/decimal.js";
import { SystemError, TimeoutError, classifyError } from "../shared/errors.js";
import type { TradingError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { OrderSide, oppositeSide } from "../shared/side.js";
import { SystemClock, sleep } from "../shared/time.js";
import type { Clock } from "../shared/time.js";
import type { OrderHandle, OrderRequest, VenueDialect } from "../venue/types.js";
import type {
	EngineConfig,
	EngineState,
	ExecutionOutcome,
	HedgeVenueLink,
	MarketStream,
	Opportunity,
	StatusReport,
	StreamStatus,
	TickOutcome,
	VenueLink,
} from "./types.js";

const DEFAULT_READY_POLL_MS = 100;

export interface ArbitrageEngineDeps {
	readonly home: VenueLink;
	readonly hedge: HedgeVenueLink;
	readonly risk: RiskController;
	readonly logger: Logger;
	readonly clock?: Clock;
}

export class ArbitrageEngine {
	private readonly config: EngineConfig;
	private readonly home: VenueLink;
	private readonly hedge: HedgeVenueLink;
	private readonly risk: RiskController;
	private readonly logger: Logger;
	private readonly clock: Clock;

	private readonly market = new MarketView();
	private readonly shutdown = new AbortController();
	private loops: Promise<void>[] = [];
	private state: EngineState = "idle";
	private stopping: Promise<void> | null = null;
	private stopRequested = false;
	private tickInProgress = false;

	// Single writer: only execute() mutates these, synchronously between awaits.
	private netPosition: Decimal = Decimal.zero();
	private totalPnl: Decimal = Decimal.zero();

	constructor(config: EngineConfig, deps: ArbitrageEngineDeps) {
		this.config = config;
		this.home = deps.home;
		this.hedge = deps.hedge;
		this.risk = deps.risk;
		this.logger = deps.logger.child({ component: "engine" });
		this.clock = deps.clock ?? SystemClock;
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Connects and subscribes both venues, waits for both quotes, then starts
	 * the decision loop and status reporter. Any failure closes both streams.
	 */
	async start(): Promise<Result<void, TradingError>> {
		if (this.state !== "idle") {
			return err(new SystemError(`engine cannot start from state ${this.state}`));
		}
		this.state = "starting";
		this.logger.info(
			{
				homeSymbol: this.config.homeSymbol,
				hedgeSymbol: this.config.hedgeSymbol,
				minSpread: this.config.minSpread.toString(),
				orderSize: this.config.orderSize.toString(),
				hedgeMode: this.config.hedgeMode,
			},
			"engine starting",
		);

		const wired = await this.wire();
		if (!wired.ok) {
			this.logger.error({ err: wired.error }, "engine start failed");
			this.home.stream.close();
			this.hedge.stream.close();
			this.state = "stopped";
			return wired;
		}

		this.state = "running";
		const signal = this.shutdown.signal;
		this.loops = [
			this.every(this.config.tickIntervalMs, signal, async () => {
				await this.tick();
			}),
			this.every(this.config.statusIntervalMs, signal, async () => {
				this.reportStatus();
			}),
		];
		this.logger.info("market data ready, engine running");
		return ok(undefined);
	}

	/**
	 * Stops both loops and waits for them to exit, then cancels resting hedge
	 * orders, closes both streams and logs the final PnL. Idempotent.
	 */
	stop(): Promise<void> {
		this.stopping ??= this.teardown();
		return this.stopping;
	}

	getState(): EngineState {
		return this.state;
	}

	position(): Decimal {
		return this.netPosition;
	}

	cumulativePnl(): Decimal {
		return this.totalPnl;
	}

	private async wire(): Promise<Result<void, TradingError>> {
		const venues: [VenueId, VenueLink, string][] = [
			["home", this.home, this.config.homeSymbol],
			["hedge", this.hedge, this.config.hedgeSymbol],
		];
		for (const [venue, link, symbol] of venues) {
			const connected = await link.stream.connect();
			if (!connected.ok) return connected;
			const topic = link.dialect.orderBookTopic(symbol);
			const subscribed = link.stream.subscribe(topic, this.quoteHandler(venue, link.dialect));
			if (!subscribed.ok) return subscribed;
			this.logger.info({ venue, topic }, "subscribed");
		}
		return this.waitForMarketData();
	}

	private async waitForMarketData(): Promise<Result<void, TradingError>> {
		const timeoutMs = this.config.readyTimeoutMs;
		const pollMs = this.config.readyPollMs ?? DEFAULT_READY_POLL_MS;
		const deadline = this.clock.now() + timeoutMs;
		while (!this.market.isReady()) {
			if (this.clock.now() >= deadline) {
				return err(new TimeoutError("timed out waiting for market data", { timeoutMs }));
			}
			if (!(await sleep(pollMs, this.shutdown.signal))) {
				return err(new SystemError("engine stopped while waiting for market data"));
			}
		}
		return ok(undefined);
	}

	private async teardown(): Promise<void> {
		this.state = "stopping";
		this.logger.info("engine stopping");
		this.shutdown.abort();
		await Promise.all(this.loops);

		const cancelled = await this.hedge.orders.cancelAllOrders(this.config.hedgeSymbol);
		if (cancelled.ok) {
			this.logger.info({ symbol: this.config.hedgeSymbol }, "hedge orders cancelled");
		} else {
			this.logger.warn({ err: cancelled.error }, "hedge cancel-all failed");
		}

		this.home.stream.close();
		this.hedge.stream.close();
		this.state = "stopped";
		this.logger.info(
			{ pnl: this.totalPnl.toString(), position: this.netPosition.toString() },
			"engine stopped",
		);
	}

	/** Runs `fn` every `intervalMs` until `signal` aborts; `fn` is awaited, so an exit joins it. */
	private async every(
		intervalMs: number,
		signal: AbortSignal,
		fn: () => Promise<void>,
	): Promise<void> {
		while (await sleep(intervalMs, signal)) {
			await fn();
		}
	}

	// ── Market data ────────────────────────────────────────────────

	private quoteHandler(venue: VenueId, dialect: VenueDialect): (payload: unknown) => void {
		return (payload) => {
			const decoded = dialect.decodeTopOfBook(payload);
			if (!decoded.ok) {
				this.logger.warn({ venue, issues: decoded.error.summary() }, "malformed orderbook dropped");
				return;
			}
			if (decoded.value === null) return;
			this.market.update(venue, decoded.value, this.clock.now());
		};
	}

	// ── Decision loop ──────────────────────────────────────────────

	/** One decision-loop iteration. Never throws. */
	async tick(): Promise<TickOutcome> {
		if (this.tickInProgress) return { kind: "skipped", reason: "busy" };
		if (this.stopRequested || this.shutdown.signal.aborted) {
			return { kind: "skipped", reason: "stopping" };
		}
		this.tickInProgress = true;
		try {
			return await this.evaluate();
		} catch (e) {
			this.logger.error({ err: classifyError(e) }, "tick failed");
			return { kind: "skipped", reason: "error" };
		} finally {
			this.tickInProgress = false;
		}
	}

	private async evaluate(): Promise<TickOutcome> {
		if (!this.market.isReady()) return { kind: "skipped", reason: "quotes_not_ready" };

		const account = await this.hedge.account.getAccount();
		if (this.shutdown.signal.aborted) return { kind: "skipped", reason: "stopping" };
		if (!account.ok) {
			this.logger.warn({ err: account.error }, "account query failed, skipping tick");
			return { kind: "skipped", reason: "account_unavailable" };
		}

		const verdict = this.risk.check(account.value.availableBalance);
		if (isBlocked(verdict)) {
			this.logger.debug({ guard: verdict.guard, reason: verdict.reason }, "risk rejected trade");
			return { kind: "skipped", reason: "risk_blocked" };
		}

		const pnl = this.totalPnl;
		if (pnl.gte(this.config.takeProfit)) {
			this.requestStop("take_profit");
			return { kind: "stop_requested", reason: "take_profit" };
		}
		if (pnl.lte(this.config.stopLoss.neg())) {
			this.requestStop("stop_loss");
			return { kind: "stop_requested", reason: "stop_loss" };
		}

		const opportunity = this.findOpportunity(this.netPosition);
		if (opportunity === null) return { kind: "no_opportunity" };

		this.logger.info(
			{
				direction: opportunity.direction,
				homePrice: opportunity.homePrice.toString(),
				hedgePrice: opportunity.hedgePrice.toString(),
				spread: opportunity.spread.toString(),
			},
			"opportunity found",
		);
		const execution = await this.execute(opportunity);
		return { kind: "executed", opportunity, execution };
	}

	/**
	 * Opportunity 1 (buy home, sell hedge) is checked before opportunity 2;
	 * each needs the spread at or above `minSpread` and room under the position cap.
	 */
	private findOpportunity(position: Decimal): Opportunity | null {
		const home = this.market.get("home");
		const hedge = this.market.get("hedge");
		const spreads = crossSpreads(home, hedge);
		const { minSpread, maxPosition } = this.config;

		if (spreads.buyHomeSellHedge.gte(minSpread) && position.lt(maxPosition)) {
			return {
				direction: "buy_home_sell_hedge",
				homeSide: OrderSide.Buy,
				homePrice: home.bestAsk,
				hedgePrice: hedge.bestBid,
				spread: spreads.buyHomeSellHedge,
			};
		}
		if (spreads.sellHomeBuyHedge.gte(minSpread) && position.gt(maxPosition.neg())) {
			return {
				direction: "sell_home_buy_hedge",
				homeSide: OrderSide.Sell,
				homePrice: home.bestBid,
				hedgePrice: hedge.bestAsk,
				spread: spreads.sellHomeBuyHedge,
			};
		}
		return null;
	}

	private requestStop(reason: "take_profit" | "stop_loss"): void {
		if (this.stopRequested) return;
		this.stopRequested = true;
		this.logger.warn({ reason, pnl: this.totalPnl.toString() }, "pnl target reached, stopping");
		this.stop().catch((e: unknown) => {
			this.logger.error({ err: classifyError(e) }, "stop failed");
		});
	}

	// ── Execution ──────────────────────────────────────────────────

	/**
	 * Places leg 1 on the home venue, then (in hedge mode) the opposite leg on
	 * the hedge venue. Once leg 1 is accepted the position and estimated PnL
	 * are booked even if leg 2 fails.
	 */
	private async execute(opportunity: Opportunity): Promise<ExecutionOutcome> {
		const size = this.config.orderSize.toFixed(this.config.sizePrecision);
		const leg1 = await this.home.orders.placeOrder(
			this.ioc(this.config.homeSymbol, opportunity.homeSide, size, opportunity.homePrice),
		);
		if (!leg1.ok) {
			this.logger.error({ err: leg1.error, direction: opportunity.direction }, "home leg failed");
			return { status: "leg1_failed", error: leg1.error };
		}
		this.logger.info(
			{ orderId: leg1.value.orderId, side: opportunity.homeSide, size },
			"home leg accepted",
		);

		let leg2: Result<OrderHandle, TradingError> | null = null;
		if (this.config.hedgeMode) {
			leg2 = await this.hedge.orders.placeOrder(
				this.ioc(
					this.config.hedgeSymbol,
					oppositeSide(opportunity.homeSide),
					size,
					opportunity.hedgePrice,
				),
			);
			if (leg2.ok) {
				this.logger.info({ orderId: leg2.value.orderId, size }, "hedge leg accepted");
			} else {
				this.logger.error(
					{ err: leg2.error, homeOrderId: leg1.value.orderId, side: opportunity.homeSide, size },
					"NAKED POSITION: hedge leg failed after home leg was accepted",
				);
			}
		}

		const pnl = this.book(opportunity);
		if (leg2 === null) return { status: "unhedged", home: leg1.value, pnl };
		if (!leg2.ok) return { status: "naked", home: leg1.value, error: leg2.error, pnl };
		return { status: "hedged", home: leg1.value, hedge: leg2.value, pnl };
	}

	/** Books position and the spread-based PnL estimate; returns the trade's PnL. */
	private book(opportunity: Opportunity): Decimal {
		const size = this.config.orderSize;
		this.netPosition =
			opportunity.homeSide === OrderSide.Buy
				? this.netPosition.add(size)
				: this.netPosition.sub(size);
		const pnl = opportunity.spread.mul(size);
		this.totalPnl = this.totalPnl.add(pnl);
		this.risk.recordTrade(pnl);
		this.logger.info(
			{
				pnl: pnl.toString(),
				cumulativePnl: this.totalPnl.toString(),
				position: this.netPosition.toString(),
			},
			"trade booked",
		);
		return pnl;
	}

	private ioc(symbol: string, side: OrderSide, size: string, price: Decimal): OrderRequest {
		return {
			symbol,
			side,
			orderType: "limit",
			size,
			price: price.toFixed(this.config.pricePrecision),
			timeInForce: "ioc",
			reduceOnly: false,
		};
	}

	// ── Status ─────────────────────────────────────────────────────

	/** Logs and returns a snapshot of quotes, spreads, position, PnL and stream health. */
	reportStatus(): StatusReport {
		const home = this.market.get("home");
		const hedge = this.market.get("hedge");
		const report: StatusReport = {
			home,
			hedge,
			spreads: crossSpreads(home, hedge),
			absPosition: this.netPosition.abs(),
			cumulativePnl: this.totalPnl,
			dailyPnl: this.risk.dailyPnl(),
			streams: {
				home: streamStatus(this.home.stream),
				hedge: streamStatus(this.hedge.stream),
			},
		};
		this.logger.info(
			{
				home: { bid: home.bestBid.toString(), ask: home.bestAsk.toString() },
				hedge: { bid: hedge.bestBid.toString(), ask: hedge.bestAsk.toString() },
				buyHomeSellHedge: report.spreads.buyHomeSellHedge.toString(),
				sellHomeBuyHedge: report.spreads.sellHomeBuyHedge.toString(),
				absPosition: report.absPosition.toString(),
				cumulativePnl: report.cumulativePnl.toString(),
				dailyPnl: report.dailyPnl.toString(),
				streams: report.streams,
			},
			"status",
		);
		return report;
	}
}

function streamStatus(stream: MarketStream): StreamStatus {
	const state = stream.getConnectionState();
	return {
		connected: state.connected,
		reconnectCount: state.reconnectCount,
		roundTripMs: state.roundTripMs,
	};
}
