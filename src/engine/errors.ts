export type LedgerErrorKind = "validation" | "authorization" | "state-conflict" | "transfer-failure";

export type LedgerErrorCode =
  | "INVALID_IDENTITY"
  | "INVALID_AMOUNT"
  | "BELOW_MIN_STAKE"
  | "ABOVE_MAX_STAKE"
  | "BETTING_CLOSED"
  | "OUTCOME_OUT_OF_RANGE"
  | "OUTCOME_MOVE_TOO_LARGE"
  | "INVALID_CONFIG"
  | "UNSOLICITED_TRANSFER"
  | "INSUFFICIENT_BALANCE"
  | "NOT_OWNER"
  | "NOT_KEEPER"
  | "PAUSED"
  | "NOT_PAUSED"
  | "ROUND_NOT_SETTLEABLE"
  | "ROUND_NOT_SETTLED"
  | "ALREADY_CLAIMED"
  | "NOTHING_TO_CLAIM"
  | "CLAIM_WINDOW_CLOSED"
  | "REENTRANT_CALL"
  | "TRANSFER_FAILED";

const KIND_BY_CODE: Record<LedgerErrorCode, LedgerErrorKind> = {
  INVALID_IDENTITY: "validation",
  INVALID_AMOUNT: "validation",
  BELOW_MIN_STAKE: "validation",
  ABOVE_MAX_STAKE: "validation",
  BETTING_CLOSED: "validation",
  OUTCOME_OUT_OF_RANGE: "validation",
  OUTCOME_MOVE_TOO_LARGE: "validation",
  INVALID_CONFIG: "validation",
  UNSOLICITED_TRANSFER: "validation",
  INSUFFICIENT_BALANCE: "validation",
  NOT_OWNER: "authorization",
  NOT_KEEPER: "authorization",
  PAUSED: "state-conflict",
  NOT_PAUSED: "state-conflict",
  ROUND_NOT_SETTLEABLE: "state-conflict",
  ROUND_NOT_SETTLED: "state-conflict",
  ALREADY_CLAIMED: "state-conflict",
  NOTHING_TO_CLAIM: "state-conflict",
  CLAIM_WINDOW_CLOSED: "state-conflict",
  REENTRANT_CALL: "state-conflict",
  TRANSFER_FAILED: "transfer-failure",
};

/** Every failed ledger operation throws one of these; state is unchanged when it does. */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(`Ledger: ${message}`, options);
    this.name = "LedgerError";
    this.code = code;
    this.kind = KIND_BY_CODE[code];
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
