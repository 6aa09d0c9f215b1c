export * from "./order-encoder.js"
export * from "./order-hash.js"
