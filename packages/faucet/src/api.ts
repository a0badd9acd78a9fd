/**
 * Faucet API contract — request/response types.
 */

// ─── Dispense ─────────────────────────────────────────────────────────────

export interface FaucetRequest {
  /** EIP-55 checksummed recipient address (0x + 40 hex chars). */
  address: string;
}

export interface FaucetResponse {
  /** Hash of the broadcast transaction (0x + 64 hex chars). */
  transaction_hash: string;
}

export const DISPENSE_ERROR_CODES = [
  "invalid_address",
  "insufficient_balance",
  "already_funded",
  "upstream_error",
  "build_error",
  "submission_error",
] as const;

export type DispenseErrorCode = (typeof DISPENSE_ERROR_CODES)[number];

// ─── Health ───────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: "healthy";
  /** RFC 3339 timestamp. */
  timestamp: string;
}
