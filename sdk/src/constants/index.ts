import { zeroAddress } from "viem"

// validUntil has to fit a uint32 and stay below its max value
export const MAX_VALID_UNTIL = 2n ** 32n - 1n

export const NULL_TOKEN = zeroAddress

// Which condition references the field check rejects. "rejectZero" is the contract
// accepted payloads rely on: the reference must point at an order. "rejectNonZero"
// reproduces the inverted check of the deployed order handler.
export type ConditionRefPolarity = "rejectZero" | "rejectNonZero"
export const CONDITION_REF_POLARITY: ConditionRefPolarity = "rejectZero"

export const ZERO_FEE = 0n

export const SETTLEMENT_DOMAIN_NAME = "Gnosis Protocol"
export const SETTLEMENT_DOMAIN_VERSION = "v2"

export const SETTLEMENT_ORDER_TYPES = {
  Order: [
    { name: "sellToken", type: "address" },
    { name: "buyToken", type: "address" },
    { name: "receiver", type: "address" },
    { name: "sellAmount", type: "uint256" },
    { name: "buyAmount", type: "uint256" },
    { name: "validTo", type: "uint32" },
    { name: "appData", type: "bytes32" },
    { name: "feeAmount", type: "uint256" },
    { name: "kind", type: "string" },
    { name: "partiallyFillable", type: "bool" },
    { name: "sellTokenBalance", type: "string" },
    { name: "buyTokenBalance", type: "string" },
  ],
} as const

export const LINKED_BET_ORDER_ABI_PARAMETERS = [
  {
    type: "tuple",
    components: [
      { name: "sellToken", type: "address" },
      { name: "buyToken", type: "address" },
      { name: "receiver", type: "address" },
      { name: "sellAmount", type: "uint256" },
      { name: "minBuyAmount", type: "uint256" },
      { name: "validFrom", type: "uint256" },
      { name: "validUntil", type: "uint256" },
      { name: "conditionRef", type: "bytes32" },
    ],
  },
] as const

// 8 static words
export const LINKED_BET_ORDER_PAYLOAD_LENGTH = 256 as const
