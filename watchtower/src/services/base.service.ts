import type { Logger } from "winston"
import type { OrderStore } from "../stores/order.store.js"

export type BaseServiceOpts = {
  store: OrderStore
  logger: Logger
}

class BaseService {
  store: OrderStore
  logger: Logger

  constructor(opts: BaseServiceOpts) {
    this.logger = opts.logger.child({ service: this.constructor.name })
    this.store = opts.store
  }
}

export default BaseService
