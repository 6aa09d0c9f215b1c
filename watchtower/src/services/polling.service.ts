import { Mutex } from "async-mutex"
import { evaluatePayload, hashDerivedOrder } from "@linked-bets/sdk"

import BaseService from "./base.service.js"

import type { ConditionStatusSource, PollResult, SettlementDomain } from "@linked-bets/sdk"
import type { BaseServiceOpts } from "./base.service.js"
import type { Clock } from "../BlockClock.js"
import type { PollRoundSummary, WatchedOrder } from "../types.js"

export type PollingServiceOpts = BaseServiceOpts & {
  clock: Clock
  source: ConditionStatusSource
  settlementDomain: SettlementDomain
  pollIntervalMs: number
}

const emptySummary = (skipped: boolean): PollRoundSummary => ({
  skipped,
  tradeable: 0,
  never: 0,
  retryLater: 0,
  failed: 0,
})

class PollingService extends BaseService {
  clock: Clock
  source: ConditionStatusSource
  settlementDomain: SettlementDomain
  pollIntervalMs: number
  pollMutex: Mutex
  private timer?: NodeJS.Timeout
  private stopped: boolean

  constructor(opts: PollingServiceOpts) {
    super(opts)

    this.clock = opts.clock
    this.source = opts.source
    this.settlementDomain = opts.settlementDomain
    this.pollIntervalMs = opts.pollIntervalMs

    this.pollMutex = new Mutex()
    this.stopped = false
  }

  async start(): Promise<void> {
    this.stopped = false
    this.logger.info(`polling watched orders every ${this.pollIntervalMs} ms ...`)
    await this.poll()
    // stop() may have been called while the first round was running
    if (this.stopped) return
    this.timer = setInterval(() => {
      this.poll().catch((err) => this.logger.error(err))
    }, this.pollIntervalMs)
  }

  stop(): void {
    this.stopped = true
    if (this.timer) clearInterval(this.timer)
    this.timer = undefined
  }

  async poll(): Promise<PollRoundSummary> {
    if (this.pollMutex.isLocked()) {
      this.logger.warn("previous round still running. skipping ...")
      return emptySummary(true)
    }

    const release = await this.pollMutex.acquire()
    const summary = emptySummary(false)
    try {
      const orders = await this.store.findWatched()
      if (orders.length === 0) {
        this.logger.info("no watched orders found ...")
        return summary
      }

      const now = await this.clock.now()
      this.logger.info(`evaluating ${orders.length} orders at ${now} ...`)
      for (const order of orders) {
        try {
          const outcome = await evaluatePayload(order.payload, now, this.source)
          await this.record(order, outcome)
          summary[outcome.result]++
        } catch (err) {
          summary.failed++
          this.logger.error(`cannot evaluate order ${order.orderId}: ${String(err)}`)
        }
      }

      this.logger.info(
        `round done: ${summary.tradeable} tradeable, ${summary.never} never, ${summary.retryLater} retry later, ${summary.failed} failed`,
      )
      return summary
    } catch (err) {
      this.logger.error(err)
      return summary
    } finally {
      release()
    }
  }

  private async record(order: WatchedOrder, outcome: PollResult): Promise<void> {
    const polledAt = new Date()
    switch (outcome.result) {
      case "tradeable": {
        const orderHash = hashDerivedOrder(outcome.order, this.settlementDomain)
        this.logger.info(`order ${order.orderId} is tradeable. order hash: ${orderHash}`)
        await this.store.markTradeable(order.orderId, outcome.order, orderHash, polledAt)
        return
      }
      case "never":
        this.logger.info(`order ${order.orderId} will never trade: ${outcome.reason}. dropping it ...`)
        await this.store.markNever(order.orderId, outcome.reason, polledAt)
        return
      case "retryLater":
        this.logger.info(`order ${order.orderId} is not tradeable yet: ${outcome.reason}`)
        await this.store.markRetry(order.orderId, outcome.reason, polledAt)
        return
    }
  }
}

export default PollingService
