import exchangeAbi from "../abis/exchange.js"

import type { Address, Hex, PublicClient } from "viem"
import type { ConditionStatus, ConditionStatusSource } from "../types.js"

export interface ExchangeConditionStatusSourceConfigs {
  client: PublicClient
  exchangeAddress: Address
}

// Reads order status from a prediction-market exchange contract. Errors propagate to the caller.
export class ExchangeConditionStatusSource implements ConditionStatusSource {
  client: PublicClient
  exchangeAddress: Address

  constructor(configs: ExchangeConditionStatusSourceConfigs) {
    this.client = configs.client
    this.exchangeAddress = configs.exchangeAddress
  }

  async getStatus(conditionRef: Hex): Promise<ConditionStatus> {
    const { isFilledOrCancelled, remaining } = await this.client.readContract({
      address: this.exchangeAddress,
      abi: exchangeAbi,
      functionName: "getOrderStatus",
      args: [conditionRef],
    })
    return { remaining, resolvedOrCancelled: isFilledOrCancelled }
  }
}

export default ExchangeConditionStatusSource
