/**
 * Periodic world tick.
 *
 * Every `intervalMs` the scheduler advances wandering NPCs and publishes the
 * resulting events. A tick that is still running when the next one is due is
 * not overlapped; the due tick is skipped. Errors are logged and the schedule
 * keeps going.
 *
 * @module core/tick
 */

import logger from "../logger.js";
import { BroadcastRouter } from "./broadcast.js";
import type { World } from "./world.js";

export class TickScheduler {
	private readonly world: World;
	private readonly router: BroadcastRouter;
	private readonly intervalMs: number;
	private timer?: NodeJS.Timeout;
	private running = false;
	private ticks = 0;

	constructor(world: World, router: BroadcastRouter, intervalMs: number) {
		if (!(intervalMs > 0))
			throw new Error(`Tick interval must be positive, got ${intervalMs}`);
		this.world = world;
		this.router = router;
		this.intervalMs = intervalMs;
	}

	start(): void {
		if (this.timer !== undefined) return;
		logger.debug(`Tick scheduler started (${this.intervalMs}ms)`);
		this.timer = setInterval(() => {
			this.tick();
		}, this.intervalMs);
	}

	stop(): void {
		if (this.timer === undefined) return;
		clearInterval(this.timer);
		this.timer = undefined;
		logger.debug(`Tick scheduler stopped after ${this.ticks} ticks`);
	}

	isRunning(): boolean {
		return this.timer !== undefined;
	}

	/**
	 * Run one tick now.
	 *
	 * @returns `false` if a tick was already in progress and this one was skipped.
	 */
	tick(): boolean {
		if (this.running) {
			logger.warn("Tick skipped: previous tick still running");
			return false;
		}
		this.running = true;
		try {
			this.ticks++;
			const events = this.world.tickAdvanceNpcs();
			this.router.publishAll(events);
		} catch (error) {
			logger.error(`Tick ${this.ticks} failed: ${error}`);
		} finally {
			this.running = false;
		}
		return true;
	}
}
