import type { Address, Hex } from "viem"

export interface OrderSpec {
  sellToken: Address
  buyToken: Address
  receiver: Address
  sellAmount: bigint
  minBuyAmount: bigint
  validFrom: bigint // unix seconds
  validUntil: bigint // unix seconds, must fit in a uint32
  conditionRef: Hex // bytes32
}

export interface ConditionStatus {
  remaining: bigint
  resolvedOrCancelled: boolean
}

export type OrderKind = "sell" | "buy"
export type TokenBalance = "erc20" | "external" | "internal"

export interface DerivedOrder {
  sellToken: Address
  buyToken: Address
  receiver: Address
  sellAmount: bigint
  buyAmount: bigint
  validTo: number // uint32
  appData: Hex
  feeAmount: bigint
  kind: OrderKind
  partiallyFillable: boolean
  sellTokenBalance: TokenBalance
  buyTokenBalance: TokenBalance
}

export type StructuralReason =
  | "SameToken"
  | "InvalidToken"
  | "InvalidEndDate"
  | "InvalidSellAmount"
  | "InvalidMinBuyAmount"
  | "InvalidConditionRef"
export type TemporalReason = "InvalidStartDate"
export type ValidationReason = StructuralReason | TemporalReason

export type PollReason = ValidationReason | "ConditionCancelled" | "ConditionOpen"

export type PollResult =
  | { result: "tradeable"; order: DerivedOrder }
  | { result: "never"; reason: Exclude<PollReason, TemporalReason | "ConditionOpen"> }
  | { result: "retryLater"; reason: TemporalReason | "ConditionOpen" }

export interface ConditionStatusSource {
  getStatus(conditionRef: Hex): Promise<ConditionStatus>
}

// Anything that can validate itself and derive a settlement order can be polled.
export interface ConditionalOrder {
  readonly spec: OrderSpec
  validateFields(now: bigint): void
  validateCondition(status: ConditionStatus): void
  deriveOrder(now: bigint, status: ConditionStatus): DerivedOrder
}

export interface SettlementDomain {
  chainId: number
  verifyingContract: Address
}
