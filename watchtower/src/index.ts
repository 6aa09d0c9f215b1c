import "dotenv/config"
import { createPublicClient, http } from "viem"
import { MongoClient } from "mongodb"
import { ExchangeConditionStatusSource } from "@linked-bets/sdk"

import logger from "./utils/logger.js"
import { loadConfig } from "./config.js"
import { ORDERS_COLLECTION } from "./constants.js"
import BlockClock from "./BlockClock.js"
import MongoOrderStore from "./stores/mongo.store.js"
import PollingService from "./services/polling.service.js"

const main = async () => {
  const config = loadConfig()

  const mongoClient = new MongoClient(config.mongoDbUri)
  await mongoClient.connect()
  const db = mongoClient.db(config.mongoDbName)

  const client = createPublicClient({ transport: http(config.rpcUrl) })

  const pollingService = new PollingService({
    store: new MongoOrderStore({ db, collectionName: ORDERS_COLLECTION }),
    logger,
    clock: new BlockClock(client),
    source: new ExchangeConditionStatusSource({ client, exchangeAddress: config.exchangeAddress }),
    settlementDomain: { chainId: config.chainId, verifyingContract: config.settlementAddress },
    pollIntervalMs: config.pollIntervalMs,
  })

  const shutdown = async () => {
    logger.info("shutting down ...")
    pollingService.stop()
    await mongoClient.close()
  }
  process.once("SIGINT", () => {
    shutdown().catch((err) => logger.error(err))
  })
  process.once("SIGTERM", () => {
    shutdown().catch((err) => logger.error(err))
  })

  await pollingService.start()
}

main().catch((err) => {
  logger.error(err)
  process.exitCode = 1
})
