import { describe, it, expect } from "vitest"
import { size } from "viem"

import { hashDerivedOrder } from "../src/utils/order-hash.js"
import { LinkedBetOrder } from "../src/order/linked-bet-order.js"
import { FILLED, NOW, buildSpec } from "./fixtures.js"

const SETTLEMENT = "0x9008000000000000000000000000000000000000"

describe("hashDerivedOrder", () => {
  const order = new LinkedBetOrder(buildSpec()).deriveOrder(NOW, FILLED)

  it("returns a 32 byte digest that only depends on its inputs", () => {
    const digest = hashDerivedOrder(order, { chainId: 1, verifyingContract: SETTLEMENT })
    expect(size(digest)).toBe(32)
    expect(hashDerivedOrder({ ...order }, { chainId: 1, verifyingContract: SETTLEMENT })).toBe(digest)
  })

  it("binds the digest to the chain", () => {
    expect(hashDerivedOrder(order, { chainId: 1, verifyingContract: SETTLEMENT })).not.toBe(
      hashDerivedOrder(order, { chainId: 100, verifyingContract: SETTLEMENT }),
    )
  })

  it("binds the digest to every order field", () => {
    const base = hashDerivedOrder(order, { chainId: 1, verifyingContract: SETTLEMENT })
    expect(hashDerivedOrder({ ...order, buyAmount: 51n }, { chainId: 1, verifyingContract: SETTLEMENT })).not.toBe(base)
    expect(hashDerivedOrder({ ...order, partiallyFillable: true }, { chainId: 1, verifyingContract: SETTLEMENT })).not.toBe(
      base,
    )
  })
})
