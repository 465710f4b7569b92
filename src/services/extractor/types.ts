/**
 * @fileoverview Transaction extraction contract.
 */

/** Marker for a field the extractor could not determine. */
export const UNKNOWN = 'Unknown';

export interface SampleEmail {
  subject: string;
  body: string;
  /** Sender of the sample; narrows which mail gets fetched at all */
  from?: string;
}

/** Fields pulled from one bank notification. Undeterminable fields are UNKNOWN. */
export interface ExtractedTransaction {
  amount: string;
  /** DD-MM-YYYY once standardised */
  date: string;
  transactionTime: string;
  accountNumber: string;
  recipient: string;
  /** Currency `amount` is expressed in after any conversion */
  currency: string;
  /** Set when the email quoted another currency and the amount was converted */
  originalAmount?: string;
  originalCurrency?: string;
}

export interface TransactionExtractor {
  extract(emailBody: string, samples: readonly SampleEmail[]): Promise<ExtractedTransaction>;
}
