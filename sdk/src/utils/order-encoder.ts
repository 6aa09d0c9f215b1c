import { decodeAbiParameters, encodeAbiParameters, isHex, size } from "viem"

import { LINKED_BET_ORDER_ABI_PARAMETERS, LINKED_BET_ORDER_PAYLOAD_LENGTH } from "../constants/index.js"
import { PayloadDecodeError } from "../errors.js"

import type { Address, Hex } from "viem"
import type { OrderSpec } from "../types.js"

export type LinkedBetOrderTuple = readonly [
  Address, // sellToken
  Address, // buyToken
  Address, // receiver
  bigint, // sellAmount
  bigint, // minBuyAmount
  bigint, // validFrom
  bigint, // validUntil
  Hex, // bytes32 conditionRef
]

export class LinkedBetOrderEncoder {
  #sellToken: Address
  #buyToken: Address
  #receiver: Address
  #sellAmount: bigint
  #minBuyAmount: bigint
  #validFrom: bigint
  #validUntil: bigint
  #conditionRef: Hex

  constructor(params: OrderSpec) {
    this.#sellToken = params.sellToken
    this.#buyToken = params.buyToken
    this.#receiver = params.receiver
    this.#sellAmount = params.sellAmount
    this.#minBuyAmount = params.minBuyAmount
    this.#validFrom = params.validFrom
    this.#validUntil = params.validUntil
    this.#conditionRef = params.conditionRef
  }

  toTuple(): LinkedBetOrderTuple {
    return [
      this.#sellToken,
      this.#buyToken,
      this.#receiver,
      this.#sellAmount,
      this.#minBuyAmount,
      this.#validFrom,
      this.#validUntil,
      this.#conditionRef,
    ]
  }

  static decode(payload: Hex): OrderSpec {
    if (!isHex(payload, { strict: true })) throw new PayloadDecodeError("Invalid payload: not a hex string")
    const length = size(payload)
    if (length !== LINKED_BET_ORDER_PAYLOAD_LENGTH) {
      throw new PayloadDecodeError(
        `Invalid payload length: got ${length}, expected ${LINKED_BET_ORDER_PAYLOAD_LENGTH}`,
      )
    }

    try {
      const [spec] = decodeAbiParameters(LINKED_BET_ORDER_ABI_PARAMETERS, payload)
      return {
        sellToken: spec.sellToken,
        buyToken: spec.buyToken,
        receiver: spec.receiver,
        sellAmount: spec.sellAmount,
        minBuyAmount: spec.minBuyAmount,
        validFrom: spec.validFrom,
        validUntil: spec.validUntil,
        conditionRef: spec.conditionRef,
      }
    } catch (err) {
      throw new PayloadDecodeError("Invalid payload: cannot decode linked bet order", err)
    }
  }

  encode(): Hex {
    const [sellToken, buyToken, receiver, sellAmount, minBuyAmount, validFrom, validUntil, conditionRef] =
      this.toTuple()
    return encodeAbiParameters(LINKED_BET_ORDER_ABI_PARAMETERS, [
      { sellToken, buyToken, receiver, sellAmount, minBuyAmount, validFrom, validUntil, conditionRef },
    ])
  }
}
