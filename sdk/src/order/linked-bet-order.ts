import { isHex, size } from "viem"

import { CONDITION_REF_POLARITY, MAX_VALID_UNTIL, NULL_TOKEN, ZERO_FEE } from "../constants/index.js"
import { OrderValidationError } from "../errors.js"

import type { Address } from "viem"
import type { ConditionalOrder, ConditionStatus, DerivedOrder, OrderSpec } from "../types.js"

const sameAddress = (a: Address, b: Address): boolean => a.toLowerCase() === b.toLowerCase()

/**
 * A swap that only becomes tradeable once the referenced prediction-market order
 * has been filled. The spec is immutable, every check recomputes from it.
 */
export class LinkedBetOrder implements ConditionalOrder {
  readonly spec: OrderSpec

  constructor(spec: OrderSpec) {
    this.spec = Object.freeze({ ...spec })
  }

  // Pure field rules, in the order they are enforced. The first one broken wins.
  validateFields(now: bigint): void {
    const { sellToken, buyToken, sellAmount, minBuyAmount, validFrom, validUntil, conditionRef } = this.spec

    if (sameAddress(sellToken, buyToken)) throw new OrderValidationError("SameToken")
    if (sameAddress(sellToken, NULL_TOKEN) || sameAddress(buyToken, NULL_TOKEN)) {
      throw new OrderValidationError("InvalidToken")
    }
    if (validFrom <= now) throw new OrderValidationError("InvalidStartDate")
    if (validUntil <= validFrom || validUntil >= MAX_VALID_UNTIL) throw new OrderValidationError("InvalidEndDate")
    if (sellAmount <= 0n) throw new OrderValidationError("InvalidSellAmount")
    if (minBuyAmount <= 0n) throw new OrderValidationError("InvalidMinBuyAmount")

    // bytes32 only, a shorter reference cannot name an exchange order
    if (!isHex(conditionRef, { strict: true }) || size(conditionRef) !== 32) {
      throw new OrderValidationError("InvalidConditionRef")
    }
    const isZeroRef = /^0x0*$/.test(conditionRef)
    const rejected = CONDITION_REF_POLARITY === "rejectZero" ? isZeroRef : !isZeroRef
    if (rejected) throw new OrderValidationError("InvalidConditionRef")
  }

  // The exchange reports unknown orders as open with nothing remaining.
  validateCondition(status: ConditionStatus): void {
    if (!status.resolvedOrCancelled && status.remaining === 0n) {
      throw new OrderValidationError("InvalidConditionRef")
    }
  }

  validate(now: bigint, status: ConditionStatus): void {
    this.validateFields(now)
    this.validateCondition(status)
  }

  deriveOrder(now: bigint, status: ConditionStatus): DerivedOrder {
    this.validate(now, status)

    const { sellToken, buyToken, receiver, sellAmount, minBuyAmount, validUntil, conditionRef } = this.spec
    return {
      sellToken,
      buyToken,
      receiver,
      sellAmount,
      buyAmount: minBuyAmount,
      validTo: Number(validUntil),
      appData: conditionRef,
      feeAmount: ZERO_FEE,
      kind: "sell",
      partiallyFillable: false,
      sellTokenBalance: "erc20",
      buyTokenBalance: "erc20",
    }
  }
}

export default LinkedBetOrder
