import { isAddress } from "viem"

import { DEFAULT_MONGO_DB_NAME, DEFAULT_POLL_INTERVAL_MS } from "./constants.js"

import type { Address } from "viem"

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

export interface WatchtowerConfig {
  rpcUrl: string
  chainId: number
  exchangeAddress: Address
  settlementAddress: Address
  mongoDbUri: string
  mongoDbName: string
  pollIntervalMs: number
}

type Env = Record<string, string | undefined>

const required = (env: Env, name: string): string => {
  const value = env[name]
  if (!value) throw new ConfigError(`Missing environment variable ${name}`)
  return value
}

const positiveInteger = (name: string, value: string): number => {
  const parsed = Number(value)
  if (!Number.isSafeInteger(parsed) || parsed <= 0) throw new ConfigError(`${name} must be a positive integer`)
  return parsed
}

const address = (name: string, value: string): Address => {
  if (!isAddress(value, { strict: false })) throw new ConfigError(`${name} must be an address`)
  return value
}

export const loadConfig = (env: Env = process.env): WatchtowerConfig => ({
  rpcUrl: required(env, "RPC_URL"),
  chainId: positiveInteger("CHAIN_ID", required(env, "CHAIN_ID")),
  exchangeAddress: address("EXCHANGE_ADDRESS", required(env, "EXCHANGE_ADDRESS")),
  settlementAddress: address("SETTLEMENT_ADDRESS", required(env, "SETTLEMENT_ADDRESS")),
  mongoDbUri: required(env, "MONGO_DB_URI"),
  mongoDbName: env.MONGO_DB_NAME || DEFAULT_MONGO_DB_NAME,
  pollIntervalMs: env.POLL_INTERVAL_MS
    ? positiveInteger("POLL_INTERVAL_MS", env.POLL_INTERVAL_MS)
    : DEFAULT_POLL_INTERVAL_MS,
})
