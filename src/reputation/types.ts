/**
 * Reputation Types
 */

export type SubjectKind = 'user' | 'arbitrator' | 'relay';

export type ReputationError = 'DuplicateReference' | 'InvalidRating' | 'NotAParticipant' | 'TransactionNotTerminal';

export interface ReputationRecord {
  /** Rated public key, or relay URL for relay feedback */
  subject: string;
  subjectKind: SubjectKind;
  rater: string;
  /** Transaction (or relay URL) the rating is about; one record per rater */
  referencedEventId: string;
  /** Event the record was derived from */
  sourceEventId: string;
  rating: number;
  itemQuality?: number;
  shippingSpeed?: number;
  communication?: number;
  paymentReliability?: number;
  amountSats: number;
  /** Unix seconds */
  timestamp: number;
  verifiedPurchase: boolean;
  escrowCompleted: boolean;
  disputed: boolean;
  review?: string;
}

export type ReliabilityLabel =
  | 'Unknown'
  | 'New Seller'
  | 'Limited Data'
  | 'Excellent'
  | 'Good'
  | 'Average'
  | 'Below Average'
  | 'Poor';

export interface ReputationSummary {
  subject: string;
  totalTransactions: number;
  totalVolumeSats: number;
  volumeBtc: number;
  overallScore: number;
  avgItemQuality?: number;
  avgShippingSpeed?: number;
  avgCommunication?: number;
  avgPaymentReliability?: number;
  verifiedPurchases: number;
  completedEscrows: number;
  /** Fraction of rated transactions that went through a dispute */
  disputeRate: number;
  firstTimestamp?: number;
  lastTimestamp?: number;
  /** Records in the last 30 days */
  recentActivity: number;
  uniqueReviewers: number;
  /** Gini coefficient of reviews per reviewer; 0 is evenly spread */
  reviewConcentration: number;
  reliability: ReliabilityLabel;
}
