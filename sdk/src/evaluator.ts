import { ConditionStatusUnavailableError, OrderValidationError } from "./errors.js"
import { LinkedBetOrder } from "./order/linked-bet-order.js"
import { LinkedBetOrderEncoder } from "./utils/order-encoder.js"

import type { Hex } from "viem"
import type {
  ConditionalOrder,
  ConditionStatus,
  ConditionStatusSource,
  PollResult,
  ValidationReason,
} from "./types.js"

const fromValidationError = (reason: ValidationReason): PollResult =>
  reason === "InvalidStartDate" ? { result: "retryLater", reason } : { result: "never", reason }

const readStatus = async (source: ConditionStatusSource, conditionRef: Hex): Promise<ConditionStatus> => {
  let status: ConditionStatus
  try {
    status = await source.getStatus(conditionRef)
  } catch (err) {
    throw new ConditionStatusUnavailableError(conditionRef, err)
  }
  const malformed = typeof status?.resolvedOrCancelled !== "boolean" || typeof status?.remaining !== "bigint"
  if (malformed || status.remaining < 0n) {
    throw new ConditionStatusUnavailableError(conditionRef, new Error("malformed condition status"))
  }
  return status
}

/**
 * Classifies a conditional order as tradeable, dead, or worth another look later.
 *
 * Field rules run first so a malformed order never costs a status read. The status is
 * read exactly once; a failed read rejects with {@link ConditionStatusUnavailableError}
 * instead of being folded into one of the three outcomes.
 */
export const evaluateOrder = async (
  order: ConditionalOrder,
  now: bigint,
  source: ConditionStatusSource,
): Promise<PollResult> => {
  try {
    order.validateFields(now)
  } catch (err) {
    if (err instanceof OrderValidationError) return fromValidationError(err.reason)
    throw err
  }

  const status = await readStatus(source, order.spec.conditionRef)

  try {
    const derived = order.deriveOrder(now, status)
    if (status.resolvedOrCancelled) {
      return status.remaining === 0n
        ? { result: "tradeable", order: derived }
        : { result: "never", reason: "ConditionCancelled" }
    }
    return { result: "retryLater", reason: "ConditionOpen" }
  } catch (err) {
    if (err instanceof OrderValidationError) return fromValidationError(err.reason)
    throw err
  }
}

// Decodes a static payload into a linked bet order and evaluates it.
export const evaluatePayload = async (
  payload: Hex,
  now: bigint,
  source: ConditionStatusSource,
): Promise<PollResult> => evaluateOrder(new LinkedBetOrder(LinkedBetOrderEncoder.decode(payload)), now, source)
