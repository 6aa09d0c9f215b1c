export * from "./constants/index.js"
export * from "./errors.js"
export * from "./evaluator.js"
export * from "./order/linked-bet-order.js"
export * from "./sources/exchange.source.js"
export * from "./utils/index.js"
export type * from "./types.js"
