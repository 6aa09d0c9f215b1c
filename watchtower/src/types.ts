import type { Hex } from "viem"
import type { PollReason } from "@linked-bets/sdk"
import type { ORDER_STATUS_NEVER, ORDER_STATUS_TRADEABLE, ORDER_STATUS_WATCHING } from "./constants.js"

export type WatchedOrderStatus =
  | typeof ORDER_STATUS_WATCHING
  | typeof ORDER_STATUS_TRADEABLE
  | typeof ORDER_STATUS_NEVER

export interface WatchedOrder {
  orderId: string
  payload: Hex
  status: WatchedOrderStatus
}

// Derived order as stored: amounts are decimal strings so they survive BSON.
export interface StoredDerivedOrder {
  sellToken: Hex
  buyToken: Hex
  receiver: Hex
  sellAmount: string
  buyAmount: string
  validTo: number
  appData: Hex
  feeAmount: string
  kind: string
  partiallyFillable: boolean
  sellTokenBalance: string
  buyTokenBalance: string
}

export interface WatchedOrderDocument extends WatchedOrder {
  reason?: PollReason
  derivedOrder?: StoredDerivedOrder
  orderHash?: Hex
  lastPolledAt?: Date
}

export interface PollRoundSummary {
  skipped: boolean
  tradeable: number
  never: number
  retryLater: number
  failed: number
}
