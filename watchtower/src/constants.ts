export const ORDER_STATUS_WATCHING = "watching"
export const ORDER_STATUS_TRADEABLE = "tradeable"
export const ORDER_STATUS_NEVER = "never"

// statuses that are picked up again on the next round
export const POLLED_ORDER_STATUSES = [ORDER_STATUS_WATCHING, ORDER_STATUS_TRADEABLE] as const

export const ORDERS_COLLECTION = "orders"

export const DEFAULT_MONGO_DB_NAME = "watchtower"
export const DEFAULT_POLL_INTERVAL_MS = 30000
