import { hashTypedData } from "viem"

import { SETTLEMENT_DOMAIN_NAME, SETTLEMENT_DOMAIN_VERSION, SETTLEMENT_ORDER_TYPES } from "../constants/index.js"

import type { Hex } from "viem"
import type { DerivedOrder, SettlementDomain } from "../types.js"

// EIP-712 digest of a derived order, as the settlement contract would sign and key it.
export const hashDerivedOrder = (order: DerivedOrder, { chainId, verifyingContract }: SettlementDomain): Hex =>
  hashTypedData({
    domain: {
      name: SETTLEMENT_DOMAIN_NAME,
      version: SETTLEMENT_DOMAIN_VERSION,
      chainId,
      verifyingContract,
    },
    types: SETTLEMENT_ORDER_TYPES,
    primaryType: "Order",
    message: {
      sellToken: order.sellToken,
      buyToken: order.buyToken,
      receiver: order.receiver,
      sellAmount: order.sellAmount,
      buyAmount: order.buyAmount,
      validTo: order.validTo,
      appData: order.appData,
      feeAmount: order.feeAmount,
      kind: order.kind,
      partiallyFillable: order.partiallyFillable,
      sellTokenBalance: order.sellTokenBalance,
      buyTokenBalance: order.buyTokenBalance,
    },
  })
