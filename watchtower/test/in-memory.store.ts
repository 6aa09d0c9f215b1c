import { ORDER_STATUS_NEVER, ORDER_STATUS_TRADEABLE, ORDER_STATUS_WATCHING, POLLED_ORDER_STATUSES } from "../src/constants.js"
import { serializeDerivedOrder } from "../src/stores/order.store.js"

import type { Hex } from "viem"
import type { DerivedOrder, PollReason } from "@linked-bets/sdk"
import type { OrderStore } from "../src/stores/order.store.js"
import type { WatchedOrder, WatchedOrderDocument, WatchedOrderStatus } from "../src/types.js"

const isPolled = (status: WatchedOrderStatus): boolean =>
  POLLED_ORDER_STATUSES.some((polled) => polled === status)

export class InMemoryOrderStore implements OrderStore {
  docs = new Map<string, WatchedOrderDocument>()

  insert(orderId: string, payload: Hex): void {
    this.docs.set(orderId, { orderId, payload, status: ORDER_STATUS_WATCHING })
  }

  get(orderId: string): WatchedOrderDocument | undefined {
    return this.docs.get(orderId)
  }

  async findWatched(): Promise<WatchedOrder[]> {
    return [...this.docs.values()]
      .filter(({ status }) => isPolled(status))
      .map(({ orderId, payload, status }) => ({ orderId, payload, status }))
  }

  async markTradeable(orderId: string, order: DerivedOrder, orderHash: Hex, polledAt: Date): Promise<void> {
    this.update(orderId, {
      status: ORDER_STATUS_TRADEABLE,
      derivedOrder: serializeDerivedOrder(order),
      orderHash,
      lastPolledAt: polledAt,
      reason: undefined,
    })
  }

  async markNever(orderId: string, reason: PollReason, polledAt: Date): Promise<void> {
    this.update(orderId, { status: ORDER_STATUS_NEVER, reason, lastPolledAt: polledAt })
  }

  async markRetry(orderId: string, reason: PollReason, polledAt: Date): Promise<void> {
    this.update(orderId, { status: ORDER_STATUS_WATCHING, reason, lastPolledAt: polledAt })
  }

  private update(orderId: string, changes: Partial<WatchedOrderDocument>): void {
    const doc = this.docs.get(orderId)
    if (!doc) throw new Error(`order ${orderId} not found`)
    this.docs.set(orderId, { ...doc, ...changes })
  }
}
