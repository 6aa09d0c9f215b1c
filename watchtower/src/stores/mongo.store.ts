import { ORDER_STATUS_NEVER, ORDER_STATUS_TRADEABLE, ORDER_STATUS_WATCHING, POLLED_ORDER_STATUSES } from "../constants.js"
import { serializeDerivedOrder } from "./order.store.js"

import type { Collection, Db } from "mongodb"
import type { Hex } from "viem"
import type { DerivedOrder, PollReason } from "@linked-bets/sdk"
import type { OrderStore } from "./order.store.js"
import type { WatchedOrder, WatchedOrderDocument } from "../types.js"

export type MongoOrderStoreOpts = {
  db: Db
  collectionName: string
}

class MongoOrderStore implements OrderStore {
  private orders: Collection<WatchedOrderDocument>

  constructor(opts: MongoOrderStoreOpts) {
    this.orders = opts.db.collection<WatchedOrderDocument>(opts.collectionName)
  }

  async findWatched(): Promise<WatchedOrder[]> {
    const docs = await this.orders
      .find({ status: { $in: [...POLLED_ORDER_STATUSES] } })
      .project<WatchedOrder>({ _id: 0, orderId: 1, payload: 1, status: 1 })
      .toArray()
    return docs
  }

  async markTradeable(orderId: string, order: DerivedOrder, orderHash: Hex, polledAt: Date): Promise<void> {
    await this.orders.updateOne(
      { orderId },
      {
        $set: {
          status: ORDER_STATUS_TRADEABLE,
          derivedOrder: serializeDerivedOrder(order),
          orderHash,
          lastPolledAt: polledAt,
        },
        $unset: { reason: "" },
      },
    )
  }

  async markNever(orderId: string, reason: PollReason, polledAt: Date): Promise<void> {
    await this.orders.updateOne(
      { orderId },
      {
        $set: { status: ORDER_STATUS_NEVER, reason, lastPolledAt: polledAt },
        $unset: { derivedOrder: "", orderHash: "" },
      },
    )
  }

  async markRetry(orderId: string, reason: PollReason, polledAt: Date): Promise<void> {
    await this.orders.updateOne(
      { orderId },
      {
        $set: { status: ORDER_STATUS_WATCHING, reason, lastPolledAt: polledAt },
        $unset: { derivedOrder: "", orderHash: "" },
      },
    )
  }
}

export default MongoOrderStore
