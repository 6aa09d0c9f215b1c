import { padHex } from "viem"

import type { ConditionStatus, ConditionStatusSource, OrderSpec } from "../src/types.js"

export const NOW = 1_700_000_000n

export const SELL_TOKEN = "0x1111111111111111111111111111111111111111"
export const BUY_TOKEN = "0x2222222222222222222222222222222222222222"
export const RECEIVER = "0x3333333333333333333333333333333333333333"
export const CONDITION_REF = padHex("0xabc", { size: 32 })

export const buildSpec = (overrides: Partial<OrderSpec> = {}): OrderSpec => ({
  sellToken: SELL_TOKEN,
  buyToken: BUY_TOKEN,
  receiver: RECEIVER,
  sellAmount: 100n,
  minBuyAmount: 50n,
  validFrom: NOW + 10n,
  validUntil: NOW + 1000n,
  conditionRef: CONDITION_REF,
  ...overrides,
})

export const FILLED: ConditionStatus = { remaining: 0n, resolvedOrCancelled: true }
export const CANCELLED: ConditionStatus = { remaining: 5n, resolvedOrCancelled: true }
export const OPEN: ConditionStatus = { remaining: 5n, resolvedOrCancelled: false }
export const UNKNOWN: ConditionStatus = { remaining: 0n, resolvedOrCancelled: false }

export const staticSource = (status: ConditionStatus): ConditionStatusSource => ({
  getStatus: async () => status,
})
