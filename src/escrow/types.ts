/**
 * Escrow Types
 *
 * An escrow locks the purchase payment and both parties' collateral behind a
 * payment hash until the buyer reveals the preimage or the timeout passes.
 */

export enum EscrowState {
  PENDING = 'Pending',
  ACTIVE = 'Active',
  COMPLETED = 'Completed',
  EXPIRED = 'Expired',
  REFUNDED = 'Refunded',
}

export const TERMINAL_ESCROW_STATES: readonly EscrowState[] = [
  EscrowState.COMPLETED,
  EscrowState.EXPIRED,
  EscrowState.REFUNDED,
];

export type EscrowError =
  | 'NotFound'
  | 'InvalidState'
  | 'IncompleteFunding'
  | 'AmountMismatch'
  | 'PreimageMismatch'
  | 'NotExpired';

export type EscrowParty = 'buyer' | 'seller';

export type FundPurpose = 'purchase' | 'buyer_collateral' | 'seller_collateral';

export interface DepositRecord {
  purpose: FundPurpose;
  /** Key of the party that paid */
  depositor: string;
  paymentHash: string;
  amountSats: number;
  verifiedAt: number;
}

export interface Escrow {
  escrowId: string;
  paymentHash: string;
  /** Set once a valid preimage has been revealed */
  preimage?: string;
  purchaseAmountSats: number;
  buyerCollateralSats: number;
  sellerCollateralSats: number;
  buyer: string;
  seller: string;
  /** Absolute unix seconds */
  timeout: number;
  timeoutBlocks: number;
  createdAt: number;
  fundedAt?: number;
  closedAt?: number;
  deposits: DepositRecord[];
  state: EscrowState;
}

export type EscrowSummary = Omit<Escrow, 'preimage' | 'deposits'> & {
  hasPreimage: boolean;
  deposits: DepositRecord[];
  totalLockedSats: number;
};

export interface Payout {
  recipient: string;
  amountSats: number;
  purpose: FundPurpose;
}

export interface FundDistribution {
  escrowId: string;
  outcome: 'released' | 'expired' | 'refunded';
  payouts: Payout[];
}

export interface CreateEscrowParams {
  transactionId: string;
  purchaseAmountSats: number;
  buyerCollateralSats: number;
  sellerCollateralSats: number;
  /** Absolute unix seconds */
  timeout: number;
  timeoutBlocks: number;
  buyer: string;
  seller: string;
  /** Hash chosen by the buyer at bid time; a fresh secret is generated otherwise */
  paymentHash?: string;
  createdAt?: number;
}

export interface PaymentSecret {
  preimage: string;
  paymentHash: string;
}
