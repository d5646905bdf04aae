export { WagerMarket, parseMarketConfig } from "./market.js";
export type { WagerMarketOptions } from "./market.js";
export { AuditLog } from "./audit-log.js";
export type { AuditQuery, LedgerEventListener } from "./audit-log.js";
export { LedgerError, isLedgerError } from "./errors.js";
export type { LedgerErrorCode, LedgerErrorKind } from "./errors.js";
export { classifyRound, computeFee } from "./settlement-engine.js";
export { computePayout } from "./claim-engine.js";
export {
  bettingOpen,
  bettingDeadline,
  settlementDue,
  timeUntilBettingCloses,
  timeUntilSettlement,
} from "./window-policy.js";
