import type { Hex } from "viem"
import type { ValidationReason } from "./types.js"

export type ValidationKind = "structural" | "temporal"

export class OrderValidationError extends Error {
  readonly reason: ValidationReason
  readonly kind: ValidationKind

  constructor(reason: ValidationReason) {
    super(`order is not valid: ${reason}`)
    this.name = "OrderValidationError"
    this.reason = reason
    this.kind = reason === "InvalidStartDate" ? "temporal" : "structural"
  }
}

export class ConditionStatusUnavailableError extends Error {
  readonly conditionRef: Hex

  constructor(conditionRef: Hex, cause: unknown) {
    super(`cannot read the status of condition ${conditionRef}`, { cause })
    this.name = "ConditionStatusUnavailableError"
    this.conditionRef = conditionRef
  }
}

export class PayloadDecodeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause })
    this.name = "PayloadDecodeError"
  }
}
