import type { Hex } from "viem"
import type { DerivedOrder, PollReason } from "@linked-bets/sdk"
import type { StoredDerivedOrder, WatchedOrder } from "../types.js"

export interface OrderStore {
  findWatched(): Promise<WatchedOrder[]>
  markTradeable(orderId: string, order: DerivedOrder, orderHash: Hex, polledAt: Date): Promise<void>
  markNever(orderId: string, reason: PollReason, polledAt: Date): Promise<void>
  markRetry(orderId: string, reason: PollReason, polledAt: Date): Promise<void>
}

export const serializeDerivedOrder = (order: DerivedOrder): StoredDerivedOrder => ({
  ...order,
  sellAmount: order.sellAmount.toString(),
  buyAmount: order.buyAmount.toString(),
  feeAmount: order.feeAmount.toString(),
})
